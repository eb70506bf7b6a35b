/**
 * Tree engine service: the navigator, validator, differ, merger and codec
 * bound to one schema, as effects.
 */
import * as Context from "effect/Context";
import * as Effect from "effect/Effect";
import * as Layer from "effect/Layer";
import * as Metric from "effect/Metric";
import { Codec, Diff, Merge, Navigator, Path, Trace, Validate } from "sylvan";
import type { ConstraintViolationError, EngineError, Node } from "sylvan";

import { EngineConfigTag } from "./EngineConfig";
import { ValidationFailedError, fromUnknown } from "./Errors";
import type { TreeIndexError } from "./Errors";
import * as Metrics from "./Metrics";
import * as TreeIndex from "./TreeIndex";

/** A structured path, or its string form. */
export type PathInput = Path.StructuredPath | string;

// =============================================================================
// Tree Engine Service
// =============================================================================

/**
 * Service interface for the TreeEngine. Every operation starts at the
 * configured schema root.
 */
export interface TreeEngine {
  /**
   * Create an empty root node.
   */
  readonly create: () => Effect.Effect<Node.StructNode>;

  readonly getNode: (
    root: Node.StructNode,
    path: PathInput,
    options?: Navigator.GetNodeOptions
  ) => Effect.Effect<Navigator.TreeMatch[], EngineError>;

  readonly setNode: (
    root: Node.StructNode,
    path: PathInput,
    value: Navigator.SetValue,
    options?: Navigator.SetNodeOptions
  ) => Effect.Effect<void, EngineError>;

  readonly getOrCreateNode: (
    root: Node.StructNode,
    path: PathInput
  ) => Effect.Effect<Navigator.TreeMatch, EngineError>;

  readonly deleteNode: (root: Node.StructNode, path: PathInput) => Effect.Effect<void, EngineError>;

  /**
   * Create a zero-valued instance of the type at `path` below the root type.
   */
  readonly newNode: (path: PathInput) => Effect.Effect<Node.NodeValue, EngineError>;

  /**
   * All constraint violations of `root`. Succeeds with an empty array for a
   * valid tree.
   */
  readonly validate: (
    root: Node.StructNode,
    options?: Validate.ValidateOptions
  ) => Effect.Effect<ConstraintViolationError[], EngineError>;

  /**
   * Fails with the violations of `root`, if it has any.
   */
  readonly validateOrFail: (
    root: Node.StructNode,
    options?: Validate.ValidateOptions
  ) => Effect.Effect<void, ValidationFailedError | EngineError>;

  readonly diff: (
    a: Node.StructNode,
    b: Node.StructNode,
    options?: Diff.DiffOptions
  ) => Effect.Effect<Diff.Update[], EngineError>;

  readonly diffDeletions: (
    a: Node.StructNode,
    b: Node.StructNode
  ) => Effect.Effect<Path.StructuredPath[], EngineError>;

  /**
   * Merge `src` into a copy of `dst`.
   */
  readonly merge: (
    dst: Node.StructNode,
    src: Node.StructNode,
    policy?: Merge.MergePolicy
  ) => Effect.Effect<Node.StructNode, EngineError>;

  readonly toJSON: (root: Node.StructNode, options?: Codec.ToJsonOptions) => Effect.Effect<Codec.JsonObject, EngineError>;

  /**
   * Decode interchange JSON into a new root node.
   */
  readonly fromJSON: (
    json: Codec.JsonValue,
    options?: Codec.UnmarshalOptions
  ) => Effect.Effect<Node.StructNode, EngineError>;

  /**
   * Build a tree index over `root`.
   */
  readonly index: (root: Node.StructNode) => Effect.Effect<TreeIndex.TreeIndexNode, TreeIndexError>;
}

/**
 * Context tag for TreeEngine.
 */
export class TreeEngineTag extends Context.Tag("sylvan-effect/TreeEngine")<TreeEngineTag, TreeEngine>() {}

// =============================================================================
// Tree Engine Implementation
// =============================================================================

const toPath = (path: PathInput): Path.StructuredPath => (typeof path === "string" ? Path.fromString(path) : path);

const showPath = (path: PathInput): string => (typeof path === "string" ? path : Path.toString(path));

const flush = (trace: Trace.TraceContext | undefined): Effect.Effect<void> =>
  Effect.suspend(() =>
    trace === undefined ? Effect.void : Effect.forEach(trace.flush(), (line) => Effect.logDebug(line), { discard: true })
  );

const makeTreeEngine = Effect.gen(function* () {
  const config = yield* EngineConfigTag;

  /**
   * Runs an engine call with a fresh trace when tracing is on. Thrown engine
   * errors land in the error channel.
   */
  const run = <A>(
    operation: string,
    annotations: Record<string, unknown>,
    f: (trace: Trace.TraceContext | undefined) => A
  ): Effect.Effect<A, EngineError> =>
    Effect.suspend(() => {
      const trace = config.trace ? Trace.make() : undefined;
      return Effect.try({ try: () => f(trace), catch: fromUnknown }).pipe(
        Effect.tapError((error) =>
          Effect.zipRight(
            Metric.increment(Metrics.failures),
            Effect.logDebug(`${operation} failed`, { error: error._tag, message: error.message })
          )
        ),
        Effect.ensuring(flush(trace))
      );
    }).pipe(Effect.annotateLogs(annotations), Effect.withLogSpan(`sylvan.${operation}`));

  const create = (): Effect.Effect<Node.StructNode> => Effect.sync(() => config.rootType.create());

  const getNode = (
    root: Node.StructNode,
    path: PathInput,
    options: Navigator.GetNodeOptions = {}
  ): Effect.Effect<Navigator.TreeMatch[], EngineError> =>
    Effect.gen(function* () {
      const matches = yield* run("getNode", { path: showPath(path) }, (trace) =>
        Navigator.getNode(config.schema, root, toPath(path), { trace, ...config.getNode, ...options })
      );
      yield* Metric.increment(Metrics.lookups);
      yield* Metric.update(Metrics.lookupMatches, matches.length);
      yield* Effect.logDebug("lookup done", { path: showPath(path), matches: matches.length });
      return matches;
    });

  const setNode = (
    root: Node.StructNode,
    path: PathInput,
    value: Navigator.SetValue,
    options: Navigator.SetNodeOptions = {}
  ): Effect.Effect<void, EngineError> =>
    run("setNode", { path: showPath(path) }, (trace) =>
      Navigator.setNode(config.schema, root, toPath(path), value, { trace, ...config.setNode, ...options })
    ).pipe(Effect.zipLeft(Metric.increment(Metrics.writes)));

  const getOrCreateNode = (root: Node.StructNode, path: PathInput): Effect.Effect<Navigator.TreeMatch, EngineError> =>
    run("getOrCreateNode", { path: showPath(path) }, (trace) =>
      Navigator.getOrCreateNode(config.schema, root, toPath(path), { trace })
    ).pipe(Effect.zipLeft(Metric.increment(Metrics.writes)));

  const deleteNode = (root: Node.StructNode, path: PathInput): Effect.Effect<void, EngineError> =>
    run("deleteNode", { path: showPath(path) }, (trace) =>
      Navigator.deleteNode(config.schema, root, toPath(path), { trace })
    ).pipe(Effect.zipLeft(Metric.increment(Metrics.writes)));

  const newNode = (path: PathInput): Effect.Effect<Node.NodeValue, EngineError> =>
    run("newNode", { path: showPath(path) }, (trace) => Navigator.newNode(config.rootType, toPath(path), { trace }));

  const validate = (
    root: Node.StructNode,
    options: Validate.ValidateOptions = {}
  ): Effect.Effect<ConstraintViolationError[], EngineError> =>
    Effect.gen(function* () {
      const violations = yield* run("validate", { type: root.type.name }, (trace) =>
        Validate.validate(config.schema, root, { trace, ...config.validation, ...options })
      );
      yield* Metric.increment(Metrics.validations);
      yield* Metric.incrementBy(Metrics.violations, violations.length);
      if (violations.length > 0) {
        yield* Effect.logWarning("constraint violations found", {
          type: root.type.name,
          count: violations.length,
        });
      }
      return violations;
    });

  const validateOrFail = (
    root: Node.StructNode,
    options: Validate.ValidateOptions = {}
  ): Effect.Effect<void, ValidationFailedError | EngineError> =>
    Effect.gen(function* () {
      const violations = yield* validate(root, options);
      if (violations.length > 0) {
        return yield* Effect.fail(new ValidationFailedError({ violations }));
      }
    });

  const diff = (
    a: Node.StructNode,
    b: Node.StructNode,
    options: Diff.DiffOptions = {}
  ): Effect.Effect<Diff.Update[], EngineError> =>
    Effect.gen(function* () {
      const updates = yield* run("diff", { type: a.type.name }, (trace) => Diff.diff(a, b, { trace, ...options }));
      yield* Metric.increment(Metrics.diffs);
      yield* Metric.update(Metrics.diffUpdates, updates.length);
      return updates;
    });

  const diffDeletions = (a: Node.StructNode, b: Node.StructNode): Effect.Effect<Path.StructuredPath[], EngineError> =>
    run("diffDeletions", { type: a.type.name }, (trace) => Diff.diffDeletions(a, b, { trace }));

  const merge = (
    dst: Node.StructNode,
    src: Node.StructNode,
    policy: Merge.MergePolicy = {}
  ): Effect.Effect<Node.StructNode, EngineError> =>
    run("merge", { type: dst.type.name }, () => Merge.merge(dst, src, { ...config.mergePolicy, ...policy })).pipe(
      Effect.zipLeft(Metric.increment(Metrics.merges))
    );

  const toJSON = (root: Node.StructNode, options: Codec.ToJsonOptions = {}): Effect.Effect<Codec.JsonObject, EngineError> =>
    run("toJSON", { type: root.type.name }, () => Codec.toJSON(config.schema, root, options));

  const fromJSON = (
    json: Codec.JsonValue,
    options: Codec.UnmarshalOptions = {}
  ): Effect.Effect<Node.StructNode, EngineError> =>
    run("fromJSON", { type: config.rootType.name }, (trace) => {
      const root = config.rootType.create();
      Codec.unmarshal(config.schema, root, json, { trace, ...options });
      return root;
    });

  const index = (root: Node.StructNode): Effect.Effect<TreeIndex.TreeIndexNode, TreeIndexError> =>
    TreeIndex.fromNode(root).pipe(Effect.withLogSpan("sylvan.index"));

  const engine: TreeEngine = {
    create,
    getNode,
    setNode,
    getOrCreateNode,
    deleteNode,
    newNode,
    validate,
    validateOrFail,
    diff,
    diffDeletions,
    merge,
    toJSON,
    fromJSON,
    index,
  };

  return engine;
});

/**
 * Layer that provides TreeEngine.
 * Requires EngineConfigTag.
 */
export const layer: Layer.Layer<TreeEngineTag, never, EngineConfigTag> = Layer.effect(TreeEngineTag, makeTreeEngine);
