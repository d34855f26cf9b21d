/**
 * Type definitions for CLI
 */

import type { RuleCode, RuleSetting } from "@pairmap/analyzer";

/**
 * pairmap configuration file (pairmap.json)
 */
export type PairmapConfig = {
  readonly $schema?: string;
  readonly include?: readonly string[];
  readonly exclude?: readonly string[];
  readonly mapperBaseNames?: readonly string[];
  readonly mapperInterfaceNames?: readonly string[];
  readonly rules?: Partial<Record<RuleCode, RuleSetting>>;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  base?: string[]; // Extra mapper base class names
};

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  readonly projectRoot: string; // Directory containing pairmap.json
  readonly include: readonly string[];
  readonly exclude: readonly string[];
  readonly mapperBaseNames: readonly string[];
  readonly mapperInterfaceNames: readonly string[];
  readonly rules: Partial<Record<RuleCode, RuleSetting>>;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

export type { Result } from "@pairmap/analyzer";
