/**
 * ServiceCollection - a minimal singleton container for transformers
 *
 * Services are keyed by their TypePairKey. The provider is a live view over
 * its collection: a service added after the provider was built still
 * resolves, and instances are created lazily on first request.
 */

import {
  type AnyTransformer,
  type Registration,
  type Transformer,
  TypePairKey,
  TypePairMap,
  registration,
} from "@pairmap/core";

type SingletonEntry = {
  readonly key: TypePairKey;
  readonly instance: AnyTransformer;
};

const isSingletonFor = <S, D>(
  entry: SingletonEntry,
  key: TypePairKey<S, D>
): entry is SingletonEntry & { readonly instance: Transformer<S, D> } =>
  entry.key.equals(key);

export class ServiceCollection {
  private readonly services = new TypePairMap<Registration>();

  get size(): number {
    return this.services.size;
  }

  /**
   * Add (or replace) the singleton for a pair
   */
  addSingleton<S, D>(
    key: TypePairKey<S, D>,
    factory: () => Transformer<S, D>,
    implementation: string
  ): this {
    this.services.set(registration(key, factory, implementation));
    return this;
  }

  /**
   * Add the singleton unless the pair already has one.
   * Returns false when an existing service was kept.
   */
  tryAddSingleton<S, D>(
    key: TypePairKey<S, D>,
    factory: () => Transformer<S, D>,
    implementation: string
  ): boolean {
    if (this.services.has(key)) {
      return false;
    }
    this.services.set(registration(key, factory, implementation));
    return true;
  }

  has(key: TypePairKey): boolean {
    return this.services.has(key);
  }

  /**
   * Implementation name registered for a pair
   */
  implementationOf(key: TypePairKey): string | undefined {
    return this.services.get(key)?.implementation;
  }

  lookup(key: TypePairKey): Registration | undefined {
    return this.services.get(key);
  }

  buildServiceProvider(): ServiceProvider {
    return new ServiceProvider(this);
  }
}

export class ServiceProvider {
  private readonly singletons = new TypePairMap<SingletonEntry>();

  constructor(private readonly services: ServiceCollection) {}

  /**
   * Singleton for the pair, created on first request.
   * Returns undefined when nothing is registered for it.
   */
  getService<S, D>(key: TypePairKey<S, D>): Transformer<S, D> | undefined {
    const descriptor = this.services.lookup(key);
    if (!descriptor) {
      return undefined;
    }

    const entry = this.singletons.getOrAdd(key, () => ({
      key,
      instance: descriptor.provide(),
    }));
    if (!isSingletonFor(entry, key)) {
      throw new Error(`Internal error: service for ${entry.key} stored under ${key}`);
    }
    return entry.instance;
  }
}
