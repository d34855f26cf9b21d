/**
 * CLI constants
 */

import { existsSync, readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Version from the nearest package.json above this module. Sources and
 * built output sit at different depths, so the path is searched, not fixed.
 */
const findPackageVersion = (startDir: string): string => {
  let currentDir = startDir;

  while (true) {
    const packagePath = join(currentDir, "package.json");
    if (existsSync(packagePath)) {
      const packageJson: unknown = JSON.parse(readFileSync(packagePath, "utf-8"));
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return "0.0.0";
    }
    currentDir = parentDir;
  }
};

export const VERSION = findPackageVersion(
  dirname(fileURLToPath(import.meta.url))
);

/**
 * Exit codes
 */
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_ANALYSIS_ERRORS = 2;
export const EXIT_NO_CONFIG = 3;
