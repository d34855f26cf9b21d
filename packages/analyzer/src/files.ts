/**
 * Source file collection
 */

import { existsSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  type Diagnostic,
  createDiagnostic,
} from "./types/diagnostic.js";
import { type Result, error, ok } from "./types/result.js";

const SKIPPED_DIRECTORIES = ["node_modules", "dist", ".git"];

const isSourceFile = (name: string): boolean =>
  (name.endsWith(".ts") || name.endsWith(".tsx")) && !name.endsWith(".d.ts");

const walk = (directory: string, found: string[]): void => {
  const entries = readdirSync(directory, { withFileTypes: true }).sort((a, b) =>
    a.name.localeCompare(b.name)
  );
  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      if (!SKIPPED_DIRECTORIES.includes(entry.name)) {
        walk(path, found);
      }
    } else if (entry.isFile() && isSourceFile(entry.name)) {
      found.push(path);
    }
  }
};

/**
 * Expand include paths (files or directories, relative to `cwd`) into
 * TypeScript source files. Paths containing any `exclude` entry are dropped.
 * Declaration files are never collected.
 */
export const collectSourceFiles = (
  include: readonly string[],
  exclude: readonly string[] = [],
  cwd: string = process.cwd()
): Result<readonly string[], Diagnostic> => {
  const found: string[] = [];

  for (const entry of include) {
    const path = resolve(cwd, entry);
    if (!existsSync(path)) {
      return error(
        createDiagnostic("PM901", "error", `Include path not found: ${entry}`)
      );
    }
    if (statSync(path).isDirectory()) {
      walk(path, found);
    } else {
      found.push(path);
    }
  }

  const files = Array.from(new Set(found)).filter(
    (file) => !exclude.some((pattern) => file.includes(pattern))
  );
  return ok(files);
};
