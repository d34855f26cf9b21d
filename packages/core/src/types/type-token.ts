/**
 * Runtime type identities
 *
 * A TypeToken is the runtime identity of a type: its constructor. Classes are
 * their own tokens; primitive strings, numbers and booleans use the String,
 * Number and Boolean constructors.
 */

/**
 * Runtime identity for values of type T
 */
export type TypeToken<T = unknown> = abstract new (...args: never[]) => T;

/**
 * True for anything usable as a type identity (a constructor function)
 */
export const isTypeToken = (value: unknown): value is TypeToken =>
  typeof value === "function" && value.prototype !== undefined;

/**
 * Human-readable name of a token, used in error messages and key formatting
 */
export const typeName = (type: TypeToken): string =>
  type.name === "" ? "<anonymous>" : type.name;

const typeIds = new WeakMap<TypeToken, number>();
let nextTypeId = 1;

/**
 * Small integer identity for a token, allocated on first use.
 *
 * Ids are held weakly: a token that is no longer referenced anywhere
 * releases its id along with itself.
 */
export const typeIdOf = (type: TypeToken): number => {
  const existing = typeIds.get(type);
  if (existing !== undefined) {
    return existing;
  }

  const id = nextTypeId++;
  typeIds.set(type, id);
  return id;
};

/**
 * Runtime type of a value.
 *
 * Returns undefined for null, undefined, bigint and symbol values, none of
 * which have a constructor usable as a key.
 */
export const runtimeTypeOf = (value: unknown): TypeToken | undefined => {
  switch (typeof value) {
    case "string":
      return String;
    case "number":
      return Number;
    case "boolean":
      return Boolean;
    case "function":
      return Function;
    case "object": {
      if (value === null) {
        return undefined;
      }
      const prototype: unknown = Object.getPrototypeOf(value);
      // Object.create(null) values
      if (typeof prototype !== "object" || prototype === null) {
        return Object;
      }
      const constructor =
        "constructor" in prototype ? prototype.constructor : undefined;
      return isTypeToken(constructor) ? constructor : Object;
    }
    default:
      return undefined;
  }
};
