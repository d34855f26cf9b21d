/**
 * MapperRegistry - at most one transformer per type pair
 *
 * Transformers are resolved on first use, either from a provider function
 * registered for the pair or from the external provider (the service
 * container), and cached for the registry's lifetime. A failed resolution is
 * never cached: the next call asks again, so a mapper registered after an
 * early failed call still resolves later.
 */

import { ConfigurationError, NotFoundError } from "../errors.js";
import type { MapperConflict } from "../errors.js";
import { TypePairKey } from "../keys/type-pair-key.js";
import { TypePairMap } from "../keys/type-pair-map.js";
import {
  type Logger,
  type MapperOptions,
  createLogger,
  resolveMapperOptions,
} from "../options.js";
import type { AnyTransformer, Transformer } from "../transformer.js";

/**
 * External provider contract: a transformer for the key, or undefined.
 * The registry does not distinguish "not yet" from "never".
 */
export type TransformerProvider = (key: TypePairKey) => AnyTransformer | undefined;

/**
 * One candidate produced by a discovery pass
 */
export type Registration = {
  readonly key: TypePairKey;
  readonly provide: () => AnyTransformer;
  readonly implementation: string;
};

export const registration = <S, D>(
  key: TypePairKey<S, D>,
  provide: () => Transformer<S, D>,
  implementation: string
): Registration => ({ key, provide, implementation });

type RegisteredTransformer = {
  readonly key: TypePairKey;
  readonly transformer: AnyTransformer;
};

type RegistrationGroup = {
  readonly key: TypePairKey;
  readonly registrations: Registration[];
};

/**
 * Equal keys mean equal type identities, so the stored transformer maps
 * exactly the key's pair.
 */
const isRegisteredFor = <S, D>(
  entry: RegisteredTransformer,
  key: TypePairKey<S, D>
): entry is RegisteredTransformer & {
  readonly transformer: Transformer<S, D>;
} => entry.key.equals(key);

/**
 * Group a batch by key and report every key with more than one registration
 */
export const findConflicts = (
  batch: readonly Registration[]
): readonly MapperConflict[] => {
  const groups = new TypePairMap<RegistrationGroup>();
  for (const candidate of batch) {
    groups
      .getOrAdd(candidate.key, () => ({ key: candidate.key, registrations: [] }))
      .registrations.push(candidate);
  }

  return Array.from(groups)
    .filter((group) => group.registrations.length > 1)
    .map((group) => ({
      sourceTypeName: group.key.sourceTypeName,
      destinationTypeName: group.key.destinationTypeName,
      implementations: group.registrations.map((r) => r.implementation),
    }));
};

/**
 * Throw a single ConfigurationError naming every conflict in the batch
 */
export const assertNoConflicts = (batch: readonly Registration[]): void => {
  const conflicts = findConflicts(batch);
  if (conflicts.length > 0) {
    throw new ConfigurationError(conflicts);
  }
};

const noProvider: TransformerProvider = () => undefined;

export class MapperRegistry {
  private readonly transformers = new TypePairMap<RegisteredTransformer>();
  private readonly registrations = new TypePairMap<Registration>();
  private readonly log: Logger;

  constructor(
    private readonly provider: TransformerProvider = noProvider,
    options: MapperOptions = {}
  ) {
    this.log = createLogger(resolveMapperOptions(options));
  }

  /**
   * Register a discovery batch. The whole batch is validated before any of
   * it is committed. A pair registered by an earlier batch keeps its first
   * registration.
   */
  register(batch: readonly Registration[]): void {
    assertNoConflicts(batch);

    for (const candidate of batch) {
      const existing = this.registrations.get(candidate.key);
      if (existing) {
        this.log(
          `Skipping ${candidate.implementation} for ${candidate.key}: already registered by ${existing.implementation}`
        );
        continue;
      }
      this.registrations.set(candidate);
    }
  }

  /**
   * Transformer for the key's pair. Throws NotFoundError when nothing is
   * registered and the provider has nothing.
   */
  resolve<S, D>(key: TypePairKey<S, D>): Transformer<S, D> {
    const entry =
      this.transformers.get(key) ??
      this.transformers.getOrAdd(key, () => this.createEntry(key));

    if (!isRegisteredFor(entry, key)) {
      throw new Error(`Internal error: entry for ${entry.key} stored under ${key}`);
    }
    return entry.transformer;
  }

  isRegistered(key: TypePairKey): boolean {
    return this.registrations.has(key);
  }

  isResolved(key: TypePairKey): boolean {
    return this.transformers.has(key);
  }

  registeredKeys(): readonly TypePairKey[] {
    return this.registrations.keys();
  }

  private createEntry(key: TypePairKey): RegisteredTransformer {
    const registered = this.registrations.get(key);
    const transformer = registered ? registered.provide() : this.provider(key);

    if (transformer === undefined) {
      throw new NotFoundError(key.sourceTypeName, key.destinationTypeName);
    }

    this.log(
      `Resolved ${key} via ${registered ? registered.implementation : "provider"}`
    );
    return { key, transformer };
  }
}
