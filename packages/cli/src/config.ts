/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import {
  DEFAULT_MAPPER_BASE_NAMES,
  DEFAULT_MAPPER_INTERFACE_NAMES,
  type RuleCode,
  type RuleSetting,
  isRuleCode,
} from "@pairmap/analyzer";
import type {
  PairmapConfig,
  CliOptions,
  ResolvedConfig,
  Result,
} from "./types.js";

export const CONFIG_FILE_NAME = "pairmap.json";

export const DEFAULT_INCLUDE: readonly string[] = ["src"];

const RULE_SETTINGS: readonly RuleSetting[] = ["error", "warning", "off"];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isRuleSetting = (value: unknown): value is RuleSetting =>
  RULE_SETTINGS.some((setting) => setting === value);

const readStringList = (
  raw: Record<string, unknown>,
  field: string
): Result<readonly string[] | undefined, string> => {
  const value = raw[field];
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (
    !Array.isArray(value) ||
    !value.every((item): item is string => typeof item === "string")
  ) {
    return {
      ok: false,
      error: `${CONFIG_FILE_NAME}: '${field}' must be an array of strings`,
    };
  }
  return { ok: true, value };
};

const readRules = (
  raw: Record<string, unknown>
): Result<Partial<Record<RuleCode, RuleSetting>> | undefined, string> => {
  const value = raw.rules;
  if (value === undefined) {
    return { ok: true, value: undefined };
  }
  if (!isRecord(value)) {
    return { ok: false, error: `${CONFIG_FILE_NAME}: 'rules' must be an object` };
  }

  const rules: Partial<Record<RuleCode, RuleSetting>> = {};
  for (const [code, setting] of Object.entries(value)) {
    if (!isRuleCode(code)) {
      return { ok: false, error: `${CONFIG_FILE_NAME}: unknown rule '${code}'` };
    }
    if (!isRuleSetting(setting)) {
      return {
        ok: false,
        error: `${CONFIG_FILE_NAME}: rule '${code}' must be "error", "warning" or "off"`,
      };
    }
    rules[code] = setting;
  }
  return { ok: true, value: rules };
};

/**
 * Validate parsed pairmap.json content
 */
export const parseConfig = (raw: unknown): Result<PairmapConfig, string> => {
  if (!isRecord(raw)) {
    return { ok: false, error: `${CONFIG_FILE_NAME} must contain an object` };
  }

  const include = readStringList(raw, "include");
  if (!include.ok) return include;
  const exclude = readStringList(raw, "exclude");
  if (!exclude.ok) return exclude;
  const mapperBaseNames = readStringList(raw, "mapperBaseNames");
  if (!mapperBaseNames.ok) return mapperBaseNames;
  const mapperInterfaceNames = readStringList(raw, "mapperInterfaceNames");
  if (!mapperInterfaceNames.ok) return mapperInterfaceNames;
  const rules = readRules(raw);
  if (!rules.ok) return rules;

  return {
    ok: true,
    value: {
      include: include.value,
      exclude: exclude.value,
      mapperBaseNames: mapperBaseNames.value,
      mapperInterfaceNames: mapperInterfaceNames.value,
      rules: rules.value,
    },
  };
};

/**
 * Load pairmap.json
 */
export const loadConfig = (
  configPath: string
): Result<PairmapConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const raw: unknown = JSON.parse(content);
    return parseConfig(raw);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE_NAME}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find pairmap.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find pairmap.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE_NAME);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

/**
 * Resolve final configuration from file + CLI overrides.
 * Positional paths replace `include`; `--base` names add to the base list.
 */
export const resolveConfig = (
  config: PairmapConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  paths: readonly string[] = []
): ResolvedConfig => {
  const mapperBaseNames = config.mapperBaseNames ?? DEFAULT_MAPPER_BASE_NAMES;

  return {
    projectRoot,
    include: paths.length > 0 ? paths : (config.include ?? DEFAULT_INCLUDE),
    exclude: config.exclude ?? [],
    mapperBaseNames: [
      ...mapperBaseNames,
      ...(cliOptions.base ?? []).filter((name) => !mapperBaseNames.includes(name)),
    ],
    mapperInterfaceNames:
      config.mapperInterfaceNames ?? DEFAULT_MAPPER_INTERFACE_NAMES,
    rules: config.rules ?? {},
    verbose: cliOptions.verbose ?? false,
    quiet: cliOptions.quiet ?? false,
  };
};
