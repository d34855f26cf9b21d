/**
 * PM001 - mappers take no constructor parameters
 */

import * as ts from "typescript";
import {
  type DiagnosticsCollector,
  addDiagnostic,
  createDiagnostic,
} from "../types/diagnostic.js";
import { className, getNodeLocation } from "./helpers.js";

export const validateConstructor = (
  sourceFile: ts.SourceFile,
  mapper: ts.ClassLikeDeclaration,
  collector: DiagnosticsCollector
): DiagnosticsCollector =>
  mapper.members
    .filter(ts.isConstructorDeclaration)
    .filter((constructor) => constructor.parameters.length > 0)
    .reduce(
      (current, constructor) =>
        addDiagnostic(
          current,
          createDiagnostic(
            "PM001",
            "error",
            `Mapper '${className(mapper)}' should not have constructor parameters. Mappers should be pure data transformations with no dependencies.`,
            getNodeLocation(sourceFile, constructor),
            "Move services and I/O to the caller"
          )
        ),
      collector
    );
