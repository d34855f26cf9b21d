/**
 * Error kinds raised by the mapping core
 *
 * Each kind is its own class so callers can tell "nothing registered" from
 * "inference failed" from "the transformer itself threw" with instanceof or
 * by code. Errors thrown by transformers are never wrapped.
 */

export type PairmapErrorCode =
  | "PAIRMAP_CONFIGURATION" // Conflicting registrations in one batch
  | "PAIRMAP_NOT_FOUND" // No mapper for a type pair
  | "PAIRMAP_TYPE_INFERENCE" // Element or value type could not be inferred
  | "PAIRMAP_ARGUMENT"; // Absent or invalid argument

export class PairmapError extends Error {
  constructor(
    message: string,
    public readonly code: PairmapErrorCode
  ) {
    super(message);
    this.name = "PairmapError";
  }
}

/**
 * One type pair that received more than one mapper in a registration batch
 */
export type MapperConflict = {
  readonly sourceTypeName: string;
  readonly destinationTypeName: string;
  readonly implementations: readonly string[];
};

export const formatConflicts = (
  conflicts: readonly MapperConflict[]
): string => {
  const lines = conflicts.map(
    (conflict) =>
      `${conflict.sourceTypeName} -> ${conflict.destinationTypeName}: ${conflict.implementations.join(", ")}`
  );
  return [
    "Multiple mappers found for the same source/destination pairs:",
    ...lines,
    "Only one mapper per source/destination pair is allowed.",
  ].join("\n");
};

export class ConfigurationError extends PairmapError {
  constructor(public readonly conflicts: readonly MapperConflict[]) {
    super(formatConflicts(conflicts), "PAIRMAP_CONFIGURATION");
    this.name = "ConfigurationError";
  }
}

export class NotFoundError extends PairmapError {
  constructor(
    public readonly sourceTypeName: string,
    public readonly destinationTypeName: string
  ) {
    super(
      `No mapper registered for ${sourceTypeName} -> ${destinationTypeName}`,
      "PAIRMAP_NOT_FOUND"
    );
    this.name = "NotFoundError";
  }
}

export class TypeInferenceError extends PairmapError {
  constructor(
    message = "Cannot infer source type from the collection. The collection is empty or contains only null or undefined values."
  ) {
    super(message, "PAIRMAP_TYPE_INFERENCE");
    this.name = "TypeInferenceError";
  }
}

export class ArgumentError extends PairmapError {
  constructor(
    public readonly argumentName: string,
    message = `'${argumentName}' must not be null or undefined`
  ) {
    super(message, "PAIRMAP_ARGUMENT");
    this.name = "ArgumentError";
  }
}
