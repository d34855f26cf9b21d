/**
 * Mapper analysis - runs every rule over the mapper classes of a file
 */

import { readFileSync } from "node:fs";
import * as ts from "typescript";
import {
  type AnalyzerOptions,
  type ResolvedAnalyzerOptions,
  resolveAnalyzerOptions,
} from "./options.js";
import {
  type Diagnostic,
  type DiagnosticsCollector,
  createDiagnostic,
  createDiagnosticsCollector,
  isError,
  isRuleCode,
} from "./types/diagnostic.js";
import { validateAsyncMembers } from "./validation/async-members.js";
import { validateConstructor } from "./validation/constructor.js";
import { validateContinuations } from "./validation/continuations.js";
import { findMapperClasses } from "./validation/mapper-classes.js";

export type AnalysisReport = {
  readonly fileCount: number;
  readonly mapperCount: number;
  readonly diagnostics: readonly Diagnostic[];
  readonly errorCount: number;
  readonly warningCount: number;
};

type FileAnalysis = {
  readonly mapperCount: number;
  readonly diagnostics: readonly Diagnostic[];
};

/**
 * Apply pairmap.json severity overrides; "off" drops the diagnostic
 */
const applyRuleSettings = (
  diagnostics: readonly Diagnostic[],
  options: ResolvedAnalyzerOptions
): readonly Diagnostic[] =>
  diagnostics.flatMap((diagnostic) => {
    const setting = isRuleCode(diagnostic.code)
      ? options.rules[diagnostic.code]
      : undefined;
    if (setting === undefined) {
      return [diagnostic];
    }
    return setting === "off" ? [] : [{ ...diagnostic, severity: setting }];
  });

const analyzeFile = (
  fileName: string,
  text: string,
  options: ResolvedAnalyzerOptions
): FileAnalysis => {
  const sourceFile = ts.createSourceFile(
    fileName,
    text,
    ts.ScriptTarget.Latest,
    true,
    fileName.endsWith(".tsx") ? ts.ScriptKind.TSX : ts.ScriptKind.TS
  );

  const mappers = findMapperClasses(sourceFile, options);
  const collector = mappers.reduce<DiagnosticsCollector>(
    (current, mapper) =>
      validateContinuations(
        sourceFile,
        mapper,
        validateAsyncMembers(
          sourceFile,
          mapper,
          validateConstructor(sourceFile, mapper, current)
        )
      ),
    createDiagnosticsCollector()
  );

  return {
    mapperCount: mappers.length,
    diagnostics: applyRuleSettings(collector.diagnostics, options),
  };
};

/**
 * Diagnostics for one source text
 */
export const analyzeSource = (
  fileName: string,
  text: string,
  options: AnalyzerOptions = {}
): readonly Diagnostic[] =>
  analyzeFile(fileName, text, resolveAnalyzerOptions(options)).diagnostics;

const readFailure = (file: string, cause: unknown): Diagnostic =>
  createDiagnostic(
    "PM900",
    "error",
    `Cannot read file '${file}': ${cause instanceof Error ? cause.message : String(cause)}`
  );

/**
 * Analyze files from disk. A file that cannot be read yields PM900 and the
 * remaining files are still analyzed.
 */
export const analyzeFiles = (
  files: readonly string[],
  options: AnalyzerOptions = {}
): AnalysisReport => {
  const resolved = resolveAnalyzerOptions(options);
  const diagnostics: Diagnostic[] = [];
  let mapperCount = 0;

  for (const file of files) {
    let text: string;
    try {
      text = readFileSync(file, "utf-8");
    } catch (cause) {
      diagnostics.push(readFailure(file, cause));
      continue;
    }

    const analysis = analyzeFile(file, text, resolved);
    mapperCount += analysis.mapperCount;
    diagnostics.push(...analysis.diagnostics);
  }

  const errorCount = diagnostics.filter(isError).length;
  return {
    fileCount: files.length,
    mapperCount,
    diagnostics,
    errorCount,
    warningCount: diagnostics.length - errorCount,
  };
};
