/**
 * PM003 - no promise continuations inside mappers
 */

import * as ts from "typescript";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";
import { className, getNodeLocation } from "./helpers.js";

const CONTINUATION_NAMES = ["then", "catch", "finally"];

export const validateContinuations = (
  sourceFile: ts.SourceFile,
  mapper: ts.ClassLikeDeclaration,
  collector: DiagnosticsCollector
): DiagnosticsCollector => {
  const visitor = (node: ts.Node): void => {
    // Nested classes are checked on their own
    if (ts.isClassLike(node)) {
      return;
    }

    if (
      ts.isCallExpression(node) &&
      ts.isPropertyAccessExpression(node.expression)
    ) {
      const methodName = node.expression.name.text;
      if (CONTINUATION_NAMES.includes(methodName)) {
        collector = addDiagnostic(
          collector,
          createDiagnostic(
            "PM003",
            "error",
            `Mapper '${className(mapper)}' contains promise continuation '.${methodName}()'. Mappers should be synchronous.`,
            getNodeLocation(sourceFile, node),
            "Resolve the promise in the caller"
          )
        );
      }
    }

    ts.forEachChild(node, visitor);
  };

  mapper.members.forEach(visitor);
  return collector;
};
