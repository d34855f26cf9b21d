/**
 * TypePairMap - entries keyed by TypePairKey
 *
 * Buckets entries by the key's precomputed hash and compares with equals(),
 * so lookups never rebuild a composite key. Used by both the registry and
 * the dispatch cache.
 *
 * getOrAdd is get-or-create, NOT exactly-once-compute: a factory that runs
 * while another computation for the same key is in flight (re-entrancy,
 * interleaved callers) may run more than once. The first value stored wins
 * and every caller gets that stored value back.
 */

import type { TypePairKey } from "./type-pair-key.js";

export type KeyedEntry = {
  readonly key: TypePairKey;
};

export class TypePairMap<E extends KeyedEntry> implements Iterable<E> {
  private readonly buckets = new Map<number, E[]>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(key: TypePairKey): E | undefined {
    const bucket = this.buckets.get(key.hash);
    return bucket?.find((entry) => entry.key.equals(key));
  }

  has(key: TypePairKey): boolean {
    return this.get(key) !== undefined;
  }

  /**
   * Store an entry, replacing any entry with an equal key
   */
  set(entry: E): void {
    const bucket = this.buckets.get(entry.key.hash);
    if (!bucket) {
      this.buckets.set(entry.key.hash, [entry]);
      this.count++;
      return;
    }

    const index = bucket.findIndex((existing) => existing.key.equals(entry.key));
    if (index === -1) {
      bucket.push(entry);
      this.count++;
    } else {
      bucket[index] = entry;
    }
  }

  /**
   * Return the stored entry for key, creating and storing it if absent.
   * A factory that throws stores nothing.
   */
  getOrAdd(key: TypePairKey, create: () => E): E {
    const existing = this.get(key);
    if (existing !== undefined) {
      return existing;
    }

    const created = create();

    // Another computation for this key may have finished first
    const winner = this.get(key);
    if (winner !== undefined) {
      return winner;
    }

    this.set(created);
    return created;
  }

  delete(key: TypePairKey): boolean {
    const bucket = this.buckets.get(key.hash);
    if (!bucket) {
      return false;
    }

    const index = bucket.findIndex((entry) => entry.key.equals(key));
    if (index === -1) {
      return false;
    }

    bucket.splice(index, 1);
    if (bucket.length === 0) {
      this.buckets.delete(key.hash);
    }
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  keys(): readonly TypePairKey[] {
    return Array.from(this, (entry) => entry.key);
  }

  *[Symbol.iterator](): Iterator<E> {
    for (const bucket of this.buckets.values()) {
      yield* bucket;
    }
  }
}
