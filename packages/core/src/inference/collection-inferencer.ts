/**
 * Collection element type inference
 *
 * Attempts, in order, returning on the first success:
 * 1. Reified element type (TypedSequence)
 * 2. Declared element type: [ELEMENT_TYPE] on the sequence or its
 *    constructor, or a built-in whose elements have a fixed type
 * 3. Runtime type of the first non-null element
 * 4. TypeInferenceError
 *
 * 1 and 2 work on empty sequences and win over element inspection, so a
 * sequence of mixed subclasses keys on its declared type. 3 reads only up to
 * the first present element and hands back a sequence that replays what it
 * read, so the input is still enumerated exactly once. Failing after that
 * read closes the input's iterator.
 */

import { ArgumentError, TypeInferenceError } from "../errors.js";
import { resumeSequence } from "../sequence.js";
import { type TypeToken, runtimeTypeOf } from "../types/type-token.js";
import { TypedSequence, declaredElementType } from "./typed-sequence.js";

export type InferredSequence = {
  readonly elementType: TypeToken;
  /** The sequence to enumerate from here on (replaces the input) */
  readonly sequence: Iterable<unknown>;
  /** Close the input if it was partly read and `sequence` will not be used */
  readonly close: () => void;
};

const noop = (): void => {};

const builtinElementType = (sequence: object): TypeToken | undefined => {
  if (sequence instanceof BigInt64Array || sequence instanceof BigUint64Array) {
    return undefined;
  }
  if (ArrayBuffer.isView(sequence) && !(sequence instanceof DataView)) {
    return Number;
  }
  return undefined;
};

const staticElementType = (
  sequence: Iterable<unknown>
): TypeToken | undefined => {
  if (typeof sequence === "string") {
    return String;
  }
  if (sequence instanceof TypedSequence) {
    return sequence.elementType;
  }

  const owner = runtimeTypeOf(sequence);
  return (
    declaredElementType(sequence) ??
    (owner ? declaredElementType(owner) : undefined) ??
    builtinElementType(sequence)
  );
};

export const inferElementType = (
  sequence: Iterable<unknown> | null | undefined
): InferredSequence => {
  if (sequence === null || sequence === undefined) {
    throw new ArgumentError("sources");
  }

  const declared = staticElementType(sequence);
  if (declared) {
    return { elementType: declared, sequence, close: noop };
  }

  const iterator = sequence[Symbol.iterator]();
  const leading: unknown[] = [];
  for (let step = iterator.next(); !step.done; step = iterator.next()) {
    const element: unknown = step.value;
    leading.push(element);
    if (element === null || element === undefined) {
      continue;
    }

    const elementType = runtimeTypeOf(element);
    if (!elementType) {
      iterator.return?.();
      throw new TypeInferenceError(
        `Cannot infer source type from the collection: elements of type '${typeof element}' have no runtime type`
      );
    }
    return {
      elementType,
      sequence: resumeSequence(leading, iterator),
      close: () => {
        iterator.return?.();
      },
    };
  }

  throw new TypeInferenceError();
};
