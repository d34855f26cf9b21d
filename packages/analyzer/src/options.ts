/**
 * Analyzer options
 */

import type { DiagnosticSeverity, RuleCode } from "./types/diagnostic.js";

export type RuleSetting = DiagnosticSeverity | "off";

export type AnalyzerOptions = {
  /** Base classes that make a class a mapper (matched by name) */
  readonly mapperBaseNames?: readonly string[];
  /** Interfaces that make a class a mapper (matched by name) */
  readonly mapperInterfaceNames?: readonly string[];
  readonly rules?: Partial<Record<RuleCode, RuleSetting>>;
};

export type ResolvedAnalyzerOptions = {
  readonly mapperBaseNames: readonly string[];
  readonly mapperInterfaceNames: readonly string[];
  readonly rules: Partial<Record<RuleCode, RuleSetting>>;
};

export const DEFAULT_MAPPER_BASE_NAMES: readonly string[] = ["BaseMapper"];
export const DEFAULT_MAPPER_INTERFACE_NAMES: readonly string[] = ["Transformer"];

export const resolveAnalyzerOptions = (
  options: AnalyzerOptions = {}
): ResolvedAnalyzerOptions => ({
  mapperBaseNames: options.mapperBaseNames ?? DEFAULT_MAPPER_BASE_NAMES,
  mapperInterfaceNames:
    options.mapperInterfaceNames ?? DEFAULT_MAPPER_INTERFACE_NAMES,
  rules: options.rules ?? {},
});
