/**
 * Sequences that carry their element type at runtime
 *
 * JavaScript collections do not keep type arguments, so a sequence that
 * wants its element type known (even when empty, or when its elements are a
 * mix of subclasses) says so explicitly:
 *
 * - TypedSequence<T> holds the element type as data (reified type argument)
 * - any iterable, or its constructor, may expose [ELEMENT_TYPE]
 */

import { type TypeToken, isTypeToken } from "../types/type-token.js";

export const ELEMENT_TYPE: unique symbol = Symbol.for("pairmap.elementType");

/**
 * Capability: "I am a sequence of elementType"
 */
export type ElementTypeCarrier = {
  readonly [ELEMENT_TYPE]: TypeToken;
};

export class TypedSequence<T> implements Iterable<T> {
  constructor(
    readonly elementType: TypeToken<T>,
    private readonly items: Iterable<T>
  ) {}

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}

export const sequenceOf = <T>(
  elementType: TypeToken<T>,
  items: Iterable<T>
): TypedSequence<T> => new TypedSequence(elementType, items);

/**
 * Element type declared through [ELEMENT_TYPE], if any
 */
export const declaredElementType = (carrier: object): TypeToken | undefined => {
  if (!(ELEMENT_TYPE in carrier)) {
    return undefined;
  }
  const declared = carrier[ELEMENT_TYPE];
  return isTypeToken(declared) ? declared : undefined;
};
