/**
 * Concurrent tree index.
 *
 * A mutation-friendly view of a node tree keyed by path steps, for building
 * a tree incrementally from discrete path/value pairs. Every node carries
 * its own reentrant read/write lock: `addNode` holds the write lock of the
 * node it inserts into, and nothing else, so inserts into disjoint subtrees
 * run concurrently. `find` takes no lock; a caller that needs a consistent
 * view across several calls holds a read lock itself.
 */
import * as Effect from "effect/Effect";
import * as STM from "effect/STM";
import * as TReentrantLock from "effect/TReentrantLock";
import { Node, Path, SchemaPaths } from "sylvan";

import {
  BranchThroughLeafError,
  InvalidPathLengthError,
  InvalidPathStepError,
  InvalidTreeNodeError,
  MismatchedKindError,
} from "./Errors";
import type { TreeIndexError } from "./Errors";

// =============================================================================
// Types
// =============================================================================

export type LeafValue = Node.ScalarValue | Node.LeafListValue;

export interface NodeContent {
  /** The generated instance this node stands for. */
  readonly struct?: Node.StructNode;
  readonly leaf?: LeafValue;
}

interface Entry {
  readonly step: Path.PathStep;
  readonly node: TreeIndexNode;
}

/**
 * One node of the index. Holds a child map, a reference to a generated
 * instance, or a leaf value.
 */
export class TreeIndexNode {
  readonly _tag = "TreeIndexNode" as const;
  readonly lock: TReentrantLock.TReentrantLock;
  readonly struct: Node.StructNode | undefined;
  readonly leaf: LeafValue | undefined;

  private subtree: Map<string, Entry> | undefined;

  constructor(lock: TReentrantLock.TReentrantLock, content: NodeContent = {}) {
    this.lock = lock;
    this.struct = content.struct;
    this.leaf = content.leaf;
  }

  /** Number of direct children. */
  get size(): number {
    return this.subtree?.size ?? 0;
  }

  get hasSubtree(): boolean {
    return this.subtree !== undefined;
  }

  /** Direct children with the steps they were added at. */
  children(): ReadonlyArray<Entry> {
    return this.subtree === undefined ? [] : [...this.subtree.values()];
  }

  /** Child stored under the canonical form of a step. */
  lookup(key: string): TreeIndexNode | undefined {
    return this.subtree?.get(key)?.node;
  }

  /**
   * Stores `node` at `step`. Callers hold the write lock.
   * @internal
   */
  put(step: Path.PathStep, node: TreeIndexNode): void {
    if (this.subtree === undefined) {
      this.subtree = new Map();
    }
    this.subtree.set(Path.stepToString(step), { step, node });
  }
}

// =============================================================================
// Constructors & Guards
// =============================================================================

/**
 * Creates a node with its own lock. Without content the node is an empty
 * branch.
 */
export const make = (content: NodeContent = {}): Effect.Effect<TreeIndexNode> =>
  Effect.map(STM.commit(TReentrantLock.make), (lock) => new TreeIndexNode(lock, content));

export const leaf = (value: LeafValue): Effect.Effect<TreeIndexNode> => make({ leaf: value });

export const struct = (node: Node.StructNode): Effect.Effect<TreeIndexNode> => make({ struct: node });

export const isLeaf = (self: TreeIndexNode): boolean => self.leaf !== undefined;

export const isStruct = (self: TreeIndexNode): boolean => self.struct !== undefined;

/**
 * A node is valid when it is not both a leaf and a struct reference, and a
 * leaf has no children.
 */
export const isValid = (self: TreeIndexNode): boolean => {
  if (isStruct(self) && isLeaf(self)) return false;
  if (isLeaf(self) && self.hasSubtree) return false;
  return true;
};

/**
 * Returns the child at `step`, comparing steps by their canonical form.
 * Takes no lock.
 */
export const find = (self: TreeIndexNode, step: Path.PathStep): TreeIndexNode | undefined =>
  self.lookup(Path.stepToString(step));

// =============================================================================
// Mutation
// =============================================================================

const checkStep = (step: Path.PathStep): Effect.Effect<void, InvalidPathStepError> => {
  if (step.name === "") {
    return Effect.fail(new InvalidPathStepError({ step: Path.stepToString(step), reason: "empty step name" }));
  }
  if (step.key !== undefined && Object.prototype.hasOwnProperty.call(step.key, "")) {
    return Effect.fail(new InvalidPathStepError({ step: Path.stepToString(step), reason: "empty key name" }));
  }
  return Effect.void;
};

/**
 * Adds `child` at `step` under the write lock of `self`. An existing entry
 * at the same step is replaced when both are leaves or both are not.
 */
export const addNode = Effect.fn("tree-index.add-node")(function* (
  self: TreeIndexNode,
  step: Path.PathStep,
  child: TreeIndexNode
) {
  yield* checkStep(step);
  const key = Path.stepToString(step);
  if (!isValid(child)) {
    return yield* Effect.fail(new InvalidTreeNodeError({ step: key }));
  }

  yield* TReentrantLock.withWriteLock(self.lock)(
    Effect.gen(function* () {
      if (isLeaf(self)) {
        return yield* Effect.fail(new BranchThroughLeafError({ step: key }));
      }
      const existing = self.lookup(key);
      if (existing !== undefined && isLeaf(existing) !== isLeaf(child)) {
        return yield* Effect.fail(
          new MismatchedKindError({ step: key, existingIsLeaf: isLeaf(existing), newIsLeaf: isLeaf(child) })
        );
      }
      self.put(step, child);
    })
  );
});

/**
 * Returns the branch at `step`, creating it when absent. Lookup and insert
 * happen under one write lock so concurrent callers share the branch.
 */
const branch = (self: TreeIndexNode, step: Path.PathStep): Effect.Effect<TreeIndexNode, TreeIndexError> =>
  TReentrantLock.withWriteLock(self.lock)(
    Effect.gen(function* () {
      yield* checkStep(step);
      const existing = find(self, step);
      if (existing !== undefined) {
        if (isLeaf(existing)) {
          return yield* Effect.fail(new BranchThroughLeafError({ step: Path.stepToString(step) }));
        }
        return existing;
      }
      const created = yield* make();
      yield* addNode(self, step, created);
      return created;
    })
  );

/**
 * Adds `child` at the end of `steps`, creating the intermediate branches.
 * `steps` holds at least two steps.
 */
export const addAll = Effect.fn("tree-index.add-all")(function* (
  self: TreeIndexNode,
  steps: ReadonlyArray<Path.PathStep>,
  child: TreeIndexNode
) {
  const last = steps[steps.length - 1];
  if (!isValid(child)) {
    return yield* Effect.fail(new InvalidTreeNodeError({ step: Path.toString(Path.make(steps)) }));
  }
  if (steps.length < 2 || last === undefined) {
    return yield* Effect.fail(
      new InvalidPathLengthError({ path: Path.toString(Path.make(steps)), length: steps.length })
    );
  }

  let current = self;
  for (const step of steps.slice(0, -1)) {
    current = yield* branch(current, step);
  }
  yield* addNode(current, last, child);
});

/**
 * Adds `child` under every path in `paths`.
 */
export const add = Effect.fn("tree-index.add")(function* (
  self: TreeIndexNode,
  paths: ReadonlyArray<ReadonlyArray<Path.PathStep>>,
  child: TreeIndexNode
) {
  for (const steps of paths) {
    const [only] = steps;
    if (steps.length === 1 && only !== undefined) {
      yield* addNode(self, only, child);
    } else {
      yield* addAll(self, steps, child);
    }
  }
});

// =============================================================================
// Population from Generated Instances
// =============================================================================

const routeSteps = (route: ReadonlyArray<string>, key?: Path.PathKey): Path.PathStep[] =>
  route.map((name, i) => Path.step(name, i === route.length - 1 ? key : undefined));

const addChildren = (self: TreeIndexNode, node: Node.StructNode): Effect.Effect<void, TreeIndexError> =>
  Effect.gen(function* () {
    for (const [, spec, value] of node.fields()) {
      if (value === undefined) continue;
      const routes = SchemaPaths.schemaPaths(spec);

      if (Node.isKeyedList(value)) {
        for (const [key, element] of value) {
          const child = yield* struct(element);
          yield* addChildren(child, element);
          const pathKey = value.pathKey(key);
          yield* add(self, routes.map((route) => routeSteps(route, pathKey)), child);
        }
        continue;
      }

      if (Node.isStructNode(value)) {
        const child = yield* struct(value);
        yield* addChildren(child, value);
        yield* add(self, routes.map((route) => routeSteps(route)), child);
        continue;
      }

      yield* add(self, routes.map((route) => routeSteps(route)), yield* leaf(value));
    }
  });

/**
 * Builds an index from a generated instance. Each populated field is added
 * at every one of its path alternatives; list entries carry their key on
 * the last step.
 */
export const fromNode = Effect.fn("tree-index.from-node")(function* (node: Node.StructNode) {
  const root = yield* struct(node);
  yield* addChildren(root, node);
  yield* Effect.logDebug("tree index built", { type: node.type.name, children: root.size });
  return root;
});

// =============================================================================
// Comparison
// =============================================================================

/**
 * Deep comparison under read locks of both nodes. Struct references compare
 * by identity, leaves by value.
 */
export const equal = (self: TreeIndexNode, that: TreeIndexNode): Effect.Effect<boolean> =>
  TReentrantLock.withReadLock(that.lock)(
    TReentrantLock.withReadLock(self.lock)(
      Effect.gen(function* () {
        if (self.hasSubtree !== that.hasSubtree || self.size !== that.size) {
          return false;
        }
        for (const { step, node } of self.children()) {
          const other = find(that, step);
          if (other === undefined) return false;
          if (!(yield* equal(node, other))) return false;
        }
        if (!Node.valueEquals(self.leaf, that.leaf)) {
          return false;
        }
        return self.struct === that.struct;
      })
    )
  );
