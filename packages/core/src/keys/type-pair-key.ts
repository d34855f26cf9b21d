/**
 * TypePairKey - identity of an ordered (source, destination) type pair
 *
 * INVARIANT: two keys are equal iff both type identities are identical.
 * The hash is computed once at construction; keys are frozen.
 */

import { ArgumentError } from "../errors.js";
import {
  type TypeToken,
  isTypeToken,
  typeIdOf,
  typeName,
} from "../types/type-token.js";

const combineHash = (sourceId: number, destinationId: number): number =>
  (Math.imul(sourceId, 0x9e3779b1) ^ destinationId) | 0;

export class TypePairKey<S = unknown, D = unknown> {
  readonly hash: number;

  private constructor(
    readonly sourceType: TypeToken<S>,
    readonly destinationType: TypeToken<D>
  ) {
    this.hash = combineHash(typeIdOf(sourceType), typeIdOf(destinationType));
    Object.freeze(this);
  }

  /**
   * Create the key for a type pair.
   * Throws ArgumentError when either identity is absent or not a constructor.
   */
  static of<S, D>(
    sourceType: TypeToken<S> | null | undefined,
    destinationType: TypeToken<D> | null | undefined
  ): TypePairKey<S, D> {
    if (!isTypeToken(sourceType)) {
      throw new ArgumentError(
        "sourceType",
        "'sourceType' must be a class or constructor function"
      );
    }
    if (!isTypeToken(destinationType)) {
      throw new ArgumentError(
        "destinationType",
        "'destinationType' must be a class or constructor function"
      );
    }
    return new TypePairKey(sourceType, destinationType);
  }

  get sourceTypeName(): string {
    return typeName(this.sourceType);
  }

  get destinationTypeName(): string {
    return typeName(this.destinationType);
  }

  equals(other: TypePairKey): boolean {
    return (
      this === other ||
      (this.hash === other.hash &&
        this.sourceType === other.sourceType &&
        this.destinationType === other.destinationType)
    );
  }

  toString(): string {
    return `${this.sourceTypeName} -> ${this.destinationTypeName}`;
  }
}
