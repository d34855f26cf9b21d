/**
 * CLI command dispatcher
 */

import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { loadConfig, findConfig, resolveConfig } from "../config.js";
import { checkCommand } from "../commands/check.js";
import type { PairmapConfig } from "../types.js";
import {
  EXIT_ANALYSIS_ERRORS,
  EXIT_NO_CONFIG,
  EXIT_OK,
  EXIT_USAGE,
  VERSION,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

type LoadedConfig = {
  readonly config: PairmapConfig;
  readonly projectRoot: string;
};

/**
 * pairmap.json from --config, else the nearest one above cwd, else defaults
 * rooted at cwd. Returns an exit code on failure.
 */
const loadProjectConfig = (
  configOption: string | undefined,
  cwd: string
): LoadedConfig | number => {
  if (configOption) {
    const configPath = resolve(cwd, configOption);
    if (!existsSync(configPath)) {
      console.error(`Error: Config file not found: ${configPath}`);
      return EXIT_NO_CONFIG;
    }
    const result = loadConfig(configPath);
    if (!result.ok) {
      console.error(`Error: ${result.error}`);
      return EXIT_USAGE;
    }
    return { config: result.value, projectRoot: dirname(configPath) };
  }

  const configPath = findConfig(cwd);
  if (!configPath) {
    return { config: {}, projectRoot: cwd };
  }

  const result = loadConfig(configPath);
  if (!result.ok) {
    console.error(`Error: ${result.error}`);
    return EXIT_USAGE;
  }
  return { config: result.value, projectRoot: dirname(configPath) };
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  if (parsed.error) {
    console.error(`Error: ${parsed.error}`);
    console.error("Run 'pairmap --help' for usage information");
    return EXIT_USAGE;
  }

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`pairmap v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  switch (parsed.command) {
    case "check": {
      const loaded = loadProjectConfig(parsed.options.config, cwd);
      if (typeof loaded === "number") {
        return loaded;
      }

      // Positional paths are relative to where the command was run
      const paths = parsed.paths.map((path) => resolve(cwd, path));
      const config = resolveConfig(
        loaded.config,
        parsed.options,
        loaded.projectRoot,
        paths
      );

      const result = checkCommand(config);
      if (!result.ok) {
        console.error(`Error: ${result.error}`);
        return EXIT_USAGE;
      }
      return result.value.errorCount > 0 ? EXIT_ANALYSIS_ERRORS : EXIT_OK;
    }

    default:
      console.error(`Error: Unknown command '${parsed.command}'`);
      console.error("Run 'pairmap --help' for usage information");
      return EXIT_USAGE;
  }
};
