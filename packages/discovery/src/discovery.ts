/**
 * Mapper discovery from module namespaces
 *
 * A discoverable mapper is a BaseMapper subclass exported from a module that
 * declares static `sourceType` and `destinationType` tokens. Abstract
 * intermediate bases declare no tokens and are passed over.
 */

import {
  BaseMapper,
  type MapperClass,
  type Registration,
  TypePairKey,
  isTypeToken,
  registration,
} from "@pairmap/core";

export const isMapperClass = (value: unknown): value is MapperClass =>
  typeof value === "function" &&
  value.prototype instanceof BaseMapper &&
  "sourceType" in value &&
  "destinationType" in value &&
  isTypeToken(value.sourceType) &&
  isTypeToken(value.destinationType);

/**
 * Every mapper class exported by the given modules, in export order.
 * A class exported more than once (re-exports, aliases) is listed once.
 */
export const findMapperClasses = (
  modules: readonly object[]
): readonly MapperClass[] => {
  const found = new Set<MapperClass>();
  for (const moduleExports of modules) {
    const exported: readonly unknown[] = Object.values(moduleExports);
    for (const value of exported) {
      if (isMapperClass(value)) {
        found.add(value);
      }
    }
  }
  return Array.from(found);
};

/**
 * One registration per discovered mapper class, named after the class
 */
export const discoverMappers = (
  ...modules: readonly object[]
): readonly Registration[] =>
  findMapperClasses(modules).map((mapperClass) =>
    registration(
      TypePairKey.of(mapperClass.sourceType, mapperClass.destinationType),
      () => new mapperClass(),
      mapperClass.name
    )
  );
