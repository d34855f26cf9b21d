/**
 * pairmap check command - run the mapper analyzer over configured sources
 */

import { relative } from "node:path";
import {
  type AnalysisReport,
  type Diagnostic,
  analyzeFiles,
  collectSourceFiles,
  formatDiagnostic,
} from "@pairmap/analyzer";
import type { ResolvedConfig, Result } from "../types.js";

/**
 * Show locations relative to the project root
 */
const relativeTo = (projectRoot: string, diagnostic: Diagnostic): Diagnostic =>
  diagnostic.location
    ? {
        ...diagnostic,
        location: {
          ...diagnostic.location,
          file: relative(projectRoot, diagnostic.location.file),
        },
      }
    : diagnostic;

const plural = (count: number, word: string): string =>
  `${count} ${word}${count === 1 ? "" : "s"}`;

export const formatSummary = (report: AnalysisReport): string =>
  `Checked ${plural(report.mapperCount, "mapper")} in ${plural(report.fileCount, "file")}: ` +
  `${plural(report.errorCount, "error")}, ${plural(report.warningCount, "warning")}`;

/**
 * Analyze the configured files. Fails only when the file set cannot be
 * collected; findings are reported in the returned AnalysisReport.
 */
export const checkCommand = (
  config: ResolvedConfig
): Result<AnalysisReport, string> => {
  const files = collectSourceFiles(
    config.include,
    config.exclude,
    config.projectRoot
  );
  if (!files.ok) {
    return { ok: false, error: files.error.message };
  }

  if (config.verbose) {
    console.log(`[pairmap] Checking ${plural(files.value.length, "file")}`);
    for (const file of files.value) {
      console.log(`[pairmap]   ${relative(config.projectRoot, file)}`);
    }
  }

  const report = analyzeFiles(files.value, {
    mapperBaseNames: config.mapperBaseNames,
    mapperInterfaceNames: config.mapperInterfaceNames,
    rules: config.rules,
  });

  for (const diagnostic of report.diagnostics) {
    console.log(formatDiagnostic(relativeTo(config.projectRoot, diagnostic)));
  }

  if (!config.quiet) {
    console.log(formatSummary(report));
  }

  return { ok: true, value: report };
};
