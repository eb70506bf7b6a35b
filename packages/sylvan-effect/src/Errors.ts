/**
 * Error types of the effect layer: tree index failures, validation reports,
 * and the mapping of engine throws into the typed error channel.
 */
import { Data } from "effect";
import {
  ConstraintViolationError,
  InternalError,
  InvalidArgumentError,
  PathNotFoundError,
  SchemaMismatchError,
} from "sylvan";
import type { EngineError } from "sylvan";

// =============================================================================
// Tree Index Errors
// =============================================================================

/**
 * A path step with an empty name, or with a key component that has an empty
 * name.
 */
export class InvalidPathStepError extends Data.TaggedError("InvalidPathStepError")<{
  readonly step: string;
  readonly reason: string;
}> {}

/**
 * A path handed to `addAll` with fewer than two steps.
 */
export class InvalidPathLengthError extends Data.TaggedError("InvalidPathLengthError")<{
  readonly path: string;
  readonly length: number;
}> {}

/**
 * A child that holds a leaf value together with a subtree or a node
 * reference.
 */
export class InvalidTreeNodeError extends Data.TaggedError("InvalidTreeNodeError")<{
  readonly step: string;
}> {}

/**
 * Replacing a leaf entry with a branch entry, or the reverse.
 */
export class MismatchedKindError extends Data.TaggedError("MismatchedKindError")<{
  readonly step: string;
  readonly existingIsLeaf: boolean;
  readonly newIsLeaf: boolean;
}> {}

/**
 * `addAll` met a leaf where it needed to descend.
 */
export class BranchThroughLeafError extends Data.TaggedError("BranchThroughLeafError")<{
  readonly step: string;
}> {}

export type TreeIndexError =
  | InvalidPathStepError
  | InvalidPathLengthError
  | InvalidTreeNodeError
  | MismatchedKindError
  | BranchThroughLeafError;

// =============================================================================
// Validation Errors
// =============================================================================

/**
 * Raised by `TreeEngine.validateOrFail` when a tree has violations.
 */
export class ValidationFailedError extends Data.TaggedError("ValidationFailedError")<{
  readonly violations: ReadonlyArray<ConstraintViolationError>;
}> {}

// =============================================================================
// Engine Errors
// =============================================================================

/**
 * Narrows a value thrown by the engine to one of its error classes. Anything
 * else becomes an `InternalError` carrying the original as its cause.
 */
export const fromUnknown = (error: unknown): EngineError => {
  if (
    error instanceof SchemaMismatchError ||
    error instanceof PathNotFoundError ||
    error instanceof InvalidArgumentError ||
    error instanceof ConstraintViolationError ||
    error instanceof InternalError
  ) {
    return error;
  }
  return new InternalError(error instanceof Error ? error.message : String(error), error);
};
