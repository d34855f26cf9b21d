/**
 * pairmap analyzer - static purity checks for mapper classes
 */

export * from "./types/diagnostic.js";
export * from "./types/result.js";
export * from "./options.js";
export { analyzeSource, analyzeFiles, type AnalysisReport } from "./analyzer.js";
export { collectSourceFiles } from "./files.js";
export { findMapperClasses, isMapperClass } from "./validation/mapper-classes.js";
