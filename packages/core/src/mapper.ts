/**
 * Mapper - the public call shapes
 *
 * |            | single       | collection      |
 * | ---------- | ------------ | --------------- |
 * | inferred   | map          | mapAll          |
 * | explicit   | mapFrom      | mapAllFrom      |
 *
 * All four are synchronous. Collection forms resolve their transformer when
 * called (so NotFoundError and TypeInferenceError surface immediately) and
 * transform elements lazily, in one pass, skipping null and undefined.
 */

import { DispatchCache } from "./dispatch/dispatch-cache.js";
import { ArgumentError, TypeInferenceError } from "./errors.js";
import { inferElementType } from "./inference/collection-inferencer.js";
import { TypePairKey } from "./keys/type-pair-key.js";
import type { MapperOptions } from "./options.js";
import { type Registration, MapperRegistry } from "./registry/registry.js";
import { mapSequence } from "./sequence.js";
import { type TypeToken, runtimeTypeOf } from "./types/type-token.js";

export type MapperApi = {
  map<D>(source: unknown, destinationType: TypeToken<D>): D;
  mapFrom<S, D>(
    source: S | null | undefined,
    sourceType: TypeToken<S>,
    destinationType: TypeToken<D>
  ): D;
  mapAll<D>(
    sources: Iterable<unknown> | null | undefined,
    destinationType: TypeToken<D>
  ): Iterable<D>;
  mapAllFrom<S, D>(
    sources: Iterable<S | null | undefined> | null | undefined,
    sourceType: TypeToken<S>,
    destinationType: TypeToken<D>
  ): Iterable<D>;
};

export class Mapper implements MapperApi {
  readonly dispatchCache: DispatchCache;

  constructor(
    readonly registry: MapperRegistry,
    options: MapperOptions = {}
  ) {
    this.dispatchCache = new DispatchCache(registry, options);
  }

  /**
   * Map a value whose source type is taken from its runtime type
   */
  map<D>(source: unknown, destinationType: TypeToken<D>): D {
    if (source === null || source === undefined) {
      throw new ArgumentError("source");
    }

    const sourceType = runtimeTypeOf(source);
    if (!sourceType) {
      throw new TypeInferenceError(
        `Cannot infer source type: values of type '${typeof source}' have no runtime type`
      );
    }

    return this.dispatchCache
      .invokerFor(sourceType, destinationType)
      .invoke(source);
  }

  mapFrom<S, D>(
    source: S | null | undefined,
    sourceType: TypeToken<S>,
    destinationType: TypeToken<D>
  ): D {
    if (source === null || source === undefined) {
      throw new ArgumentError("source");
    }

    return this.registry
      .resolve(TypePairKey.of(sourceType, destinationType))
      .map(source);
  }

  /**
   * Map a sequence whose element type is inferred once, up front
   */
  mapAll<D>(
    sources: Iterable<unknown> | null | undefined,
    destinationType: TypeToken<D>
  ): Iterable<D> {
    const inferred = inferElementType(sources);
    try {
      return this.dispatchCache
        .invokerFor(inferred.elementType, destinationType)
        .invokeAll(inferred.sequence);
    } catch (error) {
      inferred.close();
      throw error;
    }
  }

  mapAllFrom<S, D>(
    sources: Iterable<S | null | undefined> | null | undefined,
    sourceType: TypeToken<S>,
    destinationType: TypeToken<D>
  ): Iterable<D> {
    if (sources === null || sources === undefined) {
      throw new ArgumentError("sources");
    }

    const transformer = this.registry.resolve(
      TypePairKey.of(sourceType, destinationType)
    );
    return mapSequence(sources, transformer);
  }
}

/**
 * Registry and mapper over a fixed set of registrations, with no container
 */
export const createMapper = (
  registrations: readonly Registration[] = [],
  options: MapperOptions = {}
): Mapper => {
  const registry = new MapperRegistry(undefined, options);
  registry.register(registrations);
  return new Mapper(registry, options);
};
