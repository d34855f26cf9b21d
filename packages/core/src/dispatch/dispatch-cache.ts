/**
 * DispatchCache - type-erased invokers for inferred calls
 *
 * An inferred call knows the runtime type of its source and the requested
 * destination type. The first call for a pair builds an entry whose invokers
 * close over the pair's key; later calls reuse the entry and go straight to
 * registry.resolve() + map(), with no per-call type inspection beyond the
 * key lookup.
 *
 * Entries depend only on their key, so they never go stale. Growth is bounded
 * by a soft ceiling: once an insertion pushes the entry count past it, the
 * whole cache is cleared and entries rebuild on demand.
 */

import { TypePairKey } from "../keys/type-pair-key.js";
import { TypePairMap } from "../keys/type-pair-map.js";
import {
  type Logger,
  type MapperOptions,
  createLogger,
  resolveMapperOptions,
} from "../options.js";
import type { MapperRegistry } from "../registry/registry.js";
import { mapSequence } from "../sequence.js";
import type { TypeToken } from "../types/type-token.js";

export type DispatchEntry<D = unknown> = {
  readonly key: TypePairKey<unknown, D>;
  /** Map one value whose runtime type is the key's source type */
  readonly invoke: (source: unknown) => D;
  /**
   * Resolve the transformer now and map the present elements lazily.
   * The returned sequence is single-pass.
   */
  readonly invokeAll: (sources: Iterable<unknown>) => Iterable<D>;
};

const isEntryFor = <D>(
  entry: DispatchEntry,
  key: TypePairKey<unknown, D>
): entry is DispatchEntry<D> => entry.key.equals(key);

export class DispatchCache {
  private readonly entries = new TypePairMap<DispatchEntry>();
  private readonly maxCachedEntries: number;
  private readonly log: Logger;

  constructor(
    private readonly registry: MapperRegistry,
    options: MapperOptions = {}
  ) {
    const resolved = resolveMapperOptions(options);
    this.maxCachedEntries = resolved.maxCachedEntries;
    this.log = createLogger(resolved);
  }

  get size(): number {
    return this.entries.size;
  }

  invokerFor<D>(
    sourceType: TypeToken,
    destinationType: TypeToken<D>
  ): DispatchEntry<D> {
    const key = TypePairKey.of(sourceType, destinationType);
    const entry = this.entries.getOrAdd(key, () => this.build(key));

    if (this.entries.size > this.maxCachedEntries) {
      this.log(
        `Dispatch cache exceeded ${this.maxCachedEntries} entries, clearing`
      );
      this.entries.clear();
    }

    if (!isEntryFor(entry, key)) {
      throw new Error(`Internal error: entry for ${entry.key} stored under ${key}`);
    }
    return entry;
  }

  clear(): void {
    this.entries.clear();
  }

  private build<D>(key: TypePairKey<unknown, D>): DispatchEntry<D> {
    this.log(`Building dispatch entry for ${key}`);
    const registry = this.registry;

    return {
      key,
      invoke: (source) => registry.resolve(key).map(source),
      invokeAll: (sources) => mapSequence(sources, registry.resolve(key)),
    };
  }
}
