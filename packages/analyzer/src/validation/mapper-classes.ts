/**
 * Mapper class detection
 */

import * as ts from "typescript";
import type { ResolvedAnalyzerOptions } from "../options.js";
import { heritageName } from "./helpers.js";

/**
 * A class is a mapper when it extends one of the configured base classes or
 * implements one of the configured interfaces. Matching is by name only, so
 * it works on a single file without a type checker.
 */
export const isMapperClass = (
  node: ts.ClassLikeDeclaration,
  options: ResolvedAnalyzerOptions
): boolean =>
  (node.heritageClauses ?? []).some((clause) => {
    const names =
      clause.token === ts.SyntaxKind.ExtendsKeyword
        ? options.mapperBaseNames
        : options.mapperInterfaceNames;
    return clause.types.some((heritage) => {
      const name = heritageName(heritage);
      return name !== undefined && names.includes(name);
    });
  });

/**
 * Every mapper class in the file, nested ones included, in source order
 */
export const findMapperClasses = (
  sourceFile: ts.SourceFile,
  options: ResolvedAnalyzerOptions
): readonly ts.ClassLikeDeclaration[] => {
  const found: ts.ClassLikeDeclaration[] = [];

  const visitor = (node: ts.Node): void => {
    if (ts.isClassLike(node) && isMapperClass(node, options)) {
      found.push(node);
    }
    ts.forEachChild(node, visitor);
  };

  visitor(sourceFile);
  return found;
};
