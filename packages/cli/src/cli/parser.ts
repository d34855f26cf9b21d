/**
 * CLI argument parser
 */

import type { CliOptions } from "../types.js";

export type ParsedArgs = {
  command: string;
  paths: string[];
  options: CliOptions;
  error?: string;
};

/**
 * Parse CLI arguments
 */
export const parseArgs = (args: string[]): ParsedArgs => {
  const options: CliOptions = {};
  let command = "";
  const paths: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (!arg) continue; // Skip if undefined

    // Commands
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }

    // Positional paths after the command
    if (command && !arg.startsWith("-")) {
      paths.push(arg);
      continue;
    }

    // Options
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help", paths: [], options: {} };
      case "-v":
      case "--version":
        return { command: "version", paths: [], options: {} };
      case "-V":
      case "--verbose":
        options.verbose = true;
        break;
      case "-q":
      case "--quiet":
        options.quiet = true;
        break;
      case "-c":
      case "--config": {
        const configPath = args[++i];
        if (!configPath) {
          return { command, paths, options, error: `${arg} requires a file path` };
        }
        options.config = configPath;
        break;
      }
      case "--base": {
        const baseName = args[++i];
        if (!baseName) {
          return { command, paths, options, error: "--base requires a class name" };
        }
        options.base = options.base || [];
        options.base.push(baseName);
        break;
      }
      default:
        return { command, paths, options, error: `Unknown option '${arg}'` };
    }
  }

  return { command, paths, options };
};
