// =============================================================================
// Engine Errors
// =============================================================================

/**
 * Legacy status codes returned by the status-based entry points
 * (`legacyGetNode`, `legacyNewNode`).
 */
export type StatusCode = "OK" | "INVALID_ARGUMENT" | "NOT_FOUND" | "INTERNAL";

export interface Status {
  readonly code: StatusCode;
  readonly message: string;
}

export const statusOk: Status = { code: "OK", message: "" };

/**
 * Base error class for all engine errors.
 */
export class TreeEngineError extends Error {
  readonly _tag: string = "TreeEngineError";
  constructor(message: string) {
    super(message);
    this.name = "TreeEngineError";
  }
}

/**
 * Raised when generated metadata and the schema tree disagree: a field
 * without path metadata, a path that does not resolve in the schema, or a
 * broken leafref. Always fatal to the call.
 */
export class SchemaMismatchError extends TreeEngineError {
  readonly _tag = "SchemaMismatchError";
  readonly schemaName: string | undefined;

  constructor(message: string, schemaName?: string) {
    super(message);
    this.name = "SchemaMismatchError";
    this.schemaName = schemaName;
  }
}

/**
 * Raised when a path does not correspond to any schema or data node.
 */
export class PathNotFoundError extends TreeEngineError {
  readonly _tag = "PathNotFoundError";
  readonly schemaName: string | undefined;
  readonly typeName: string | undefined;
  readonly remainingPath: string;

  constructor(options: {
    readonly message: string;
    readonly remainingPath: string;
    readonly schemaName?: string;
    readonly typeName?: string;
  }) {
    super(options.message);
    this.name = "PathNotFoundError";
    this.schemaName = options.schemaName;
    this.typeName = options.typeName;
    this.remainingPath = options.remainingPath;
  }
}

/**
 * Raised for malformed input: missing key maps, values of the wrong shape,
 * mismatched node types.
 */
export class InvalidArgumentError extends TreeEngineError {
  readonly _tag = "InvalidArgumentError";
  readonly remainingPath: string | undefined;

  constructor(message: string, remainingPath?: string) {
    super(message);
    this.name = "InvalidArgumentError";
    this.remainingPath = remainingPath;
  }
}

export type ConstraintKind =
  | "range"
  | "length"
  | "pattern"
  | "enum"
  | "union"
  | "type"
  | "key"
  | "leafref"
  | "schema";

/**
 * One constraint violation found by the validator. Violations are collected,
 * never thrown by `validate`.
 */
export class ConstraintViolationError extends TreeEngineError {
  readonly _tag = "ConstraintViolationError";
  readonly kind: ConstraintKind;
  readonly schemaPath: string;

  constructor(kind: ConstraintKind, schemaPath: string, message: string) {
    super(`${schemaPath}: ${message}`);
    this.name = "ConstraintViolationError";
    this.kind = kind;
    this.schemaPath = schemaPath;
  }
}

/**
 * Wraps an unexpected lower-level failure.
 */
export class InternalError extends TreeEngineError {
  readonly _tag = "InternalError";
  readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "InternalError";
    this.cause = cause;
  }
}

export type EngineError =
  | SchemaMismatchError
  | PathNotFoundError
  | InvalidArgumentError
  | ConstraintViolationError
  | InternalError;

/**
 * Maps an error to the legacy status taxonomy.
 */
export const toStatus = (error: unknown): Status => {
  if (error instanceof PathNotFoundError) {
    return { code: "NOT_FOUND", message: error.message };
  }
  if (error instanceof InvalidArgumentError || error instanceof SchemaMismatchError) {
    return { code: "INVALID_ARGUMENT", message: error.message };
  }
  if (error instanceof Error) {
    return { code: "INTERNAL", message: error.message };
  }
  return { code: "INTERNAL", message: String(error) };
};
