/**
 * Validation helper functions
 */

import * as ts from "typescript";
import type { SourceLocation } from "../types/diagnostic.js";

/**
 * Get location information for a node
 */
export const getNodeLocation = (
  sourceFile: ts.SourceFile,
  node: ts.Node
): SourceLocation => {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

/**
 * Rightmost name of a heritage clause target: `Base`, `lib.Base` and
 * `Base<A, B>` all give "Base"
 */
export const heritageName = (
  heritage: ts.ExpressionWithTypeArguments
): string | undefined => {
  const expression = heritage.expression;
  if (ts.isIdentifier(expression)) {
    return expression.text;
  }
  if (ts.isPropertyAccessExpression(expression)) {
    return expression.name.text;
  }
  return undefined;
};

export const className = (node: ts.ClassLikeDeclaration): string =>
  node.name?.text ?? "<anonymous>";

export const memberName = (
  sourceFile: ts.SourceFile,
  member: ts.ClassElement
): string => member.name?.getText(sourceFile) ?? "<anonymous>";

export const hasAsyncModifier = (node: ts.Node): boolean =>
  ts.canHaveModifiers(node) &&
  (ts.getModifiers(node) ?? []).some(
    (modifier) => modifier.kind === ts.SyntaxKind.AsyncKeyword
  );
