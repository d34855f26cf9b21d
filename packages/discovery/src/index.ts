/**
 * pairmap discovery - service container and mapper discovery
 */

export { ServiceCollection, ServiceProvider } from "./service-collection.js";
export {
  isMapperClass,
  findMapperClasses,
  discoverMappers,
} from "./discovery.js";
export {
  type PairmapServices,
  addPairmap,
  createPairmap,
} from "./add-pairmap.js";
