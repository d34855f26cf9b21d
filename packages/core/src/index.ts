/**
 * pairmap core - type-pair mapper registry with cached runtime dispatch
 */

export {
  type TypeToken,
  isTypeToken,
  typeName,
  typeIdOf,
  runtimeTypeOf,
} from "./types/type-token.js";

export * from "./errors.js";
export * from "./keys/type-pair-key.js";
export * from "./keys/type-pair-map.js";
export * from "./transformer.js";
export * from "./options.js";
export * from "./registry/registry.js";
export * from "./dispatch/dispatch-cache.js";
export * from "./inference/typed-sequence.js";
export * from "./inference/collection-inferencer.js";
export { mapSequence } from "./sequence.js";
export * from "./mapper.js";
