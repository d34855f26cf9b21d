/**
 * PM002 - mappers are synchronous
 */

import * as ts from "typescript";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";
import {
  className,
  getNodeLocation,
  hasAsyncModifier,
  memberName,
} from "./helpers.js";

const PROMISE_TYPE_NAMES = ["Promise", "PromiseLike"];

const returnsPromise = (
  node: ts.SignatureDeclarationBase
): boolean => {
  const type = node.type;
  if (!type || !ts.isTypeReferenceNode(type)) {
    return false;
  }
  const name = ts.isIdentifier(type.typeName)
    ? type.typeName.text
    : type.typeName.right.text;
  return PROMISE_TYPE_NAMES.includes(name);
};

const isAsyncFunctionLike = (
  node: ts.SignatureDeclarationBase
): boolean => hasAsyncModifier(node) || returnsPromise(node);

/**
 * Methods and accessors, and properties initialized with a function
 */
const isAsyncMember = (member: ts.ClassElement): boolean => {
  if (ts.isMethodDeclaration(member) || ts.isGetAccessorDeclaration(member)) {
    return isAsyncFunctionLike(member);
  }
  if (ts.isPropertyDeclaration(member) && member.initializer) {
    const initializer = member.initializer;
    return (
      (ts.isArrowFunction(initializer) ||
        ts.isFunctionExpression(initializer)) &&
      isAsyncFunctionLike(initializer)
    );
  }
  return false;
};

export const validateAsyncMembers = (
  sourceFile: ts.SourceFile,
  mapper: ts.ClassLikeDeclaration,
  collector: DiagnosticsCollector
): DiagnosticsCollector =>
  mapper.members.filter(isAsyncMember).reduce(
    (current, member) =>
      addDiagnostic(
        current,
        createDiagnostic(
          "PM002",
          "error",
          `Mapper '${className(mapper)}' contains async member '${memberName(sourceFile, member)}'. Mappers should be synchronous.`,
          getNodeLocation(sourceFile, member),
          "Await in the caller and pass the result to the mapper"
        )
      ),
    collector
  );
