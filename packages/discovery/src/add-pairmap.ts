/**
 * addPairmap - wire discovered mappers into a container and a Mapper
 */

import {
  Mapper,
  type MapperOptions,
  MapperRegistry,
  assertNoConflicts,
  createLogger,
  resolveMapperOptions,
} from "@pairmap/core";
import { discoverMappers } from "./discovery.js";
import { type ServiceProvider, ServiceCollection } from "./service-collection.js";

export type PairmapServices = {
  readonly services: ServiceCollection;
  readonly provider: ServiceProvider;
  readonly registry: MapperRegistry;
  readonly mapper: Mapper;
};

/**
 * Discover mappers from the modules as one batch, validate the batch, and
 * add each mapper to the container as a singleton.
 *
 * A conflict anywhere in the batch throws a single ConfigurationError and
 * leaves the container untouched. Pairs the container already serves keep
 * their existing service. The returned registry resolves through the
 * container.
 */
export const addPairmap = (
  services: ServiceCollection,
  modules: readonly object[],
  options: MapperOptions = {}
): PairmapServices => {
  const log = createLogger(resolveMapperOptions(options));
  const batch = discoverMappers(...modules);
  assertNoConflicts(batch);

  for (const candidate of batch) {
    if (services.tryAddSingleton(candidate.key, candidate.provide, candidate.implementation)) {
      log(`Discovered ${candidate.implementation} for ${candidate.key}`);
    } else {
      log(
        `Skipping ${candidate.implementation} for ${candidate.key}: already registered by ${services.implementationOf(candidate.key)}`
      );
    }
  }

  const provider = services.buildServiceProvider();
  const registry = new MapperRegistry((key) => provider.getService(key), options);
  return {
    services,
    provider,
    registry,
    mapper: new Mapper(registry, options),
  };
};

/**
 * Container, registry and mapper over the given modules, from scratch
 */
export const createPairmap = (
  modules: readonly object[],
  options: MapperOptions = {}
): PairmapServices => addPairmap(new ServiceCollection(), modules, options);
