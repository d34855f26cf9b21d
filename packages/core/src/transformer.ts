/**
 * Transformers - pure functions from a source value to a destination value
 *
 * Mappers are synchronous and side-effect free. They take no constructor
 * arguments: anything they need comes from the source value. Work that needs
 * I/O or awaiting belongs in the caller, not in a mapper (the analyzer
 * package reports mappers that break these rules).
 */

import type { TypeToken } from "./types/type-token.js";

export type Transformer<S, D> = {
  map(source: S): D;
};

/**
 * A transformer with its types erased, as stored by the registry
 */
export type AnyTransformer = Transformer<never, unknown>;

/**
 * Adapt a plain function into a Transformer
 */
export const transformer = <S, D>(fn: (source: S) => D): Transformer<S, D> => ({
  map: fn,
});

/**
 * Base class for mapper implementations.
 *
 * Subclasses declare the pair they handle as static tokens so discovery can
 * key them without creating an instance:
 *
 * ```ts
 * class UserMapper extends BaseMapper<User, UserDto> {
 *   static readonly sourceType = User;
 *   static readonly destinationType = UserDto;
 *
 *   map(user: User): UserDto {
 *     return new UserDto(`${user.firstName} ${user.lastName}`);
 *   }
 * }
 * ```
 */
export abstract class BaseMapper<S, D> implements Transformer<S, D> {
  abstract map(source: S): D;
}

/**
 * Constructor of a discoverable mapper class
 */
export type MapperClass<S = unknown, D = unknown> = (new () => Transformer<
  S,
  D
>) & {
  readonly sourceType: TypeToken<S>;
  readonly destinationType: TypeToken<D>;
};
