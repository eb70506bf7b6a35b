import { InvalidArgumentError } from "./errors";
import type { FieldValue, LeafListValue, ScalarValue, StructNode } from "./Node";
import { isKeyedList, isStructNode, valueEquals } from "./Node";
import * as Path from "./Path";
import type { StructuredPath } from "./Path";
import { canonicalRoute, schemaPaths } from "./SchemaPaths";
import type { TraceContext } from "./Trace";
import { indented } from "./Trace";

/**
 * A leaf-level change: set the leaf at `path` to `value`.
 */
export interface Update {
  readonly path: StructuredPath;
  readonly value: ScalarValue | LeafListValue;
}

export interface DiffOptions {
  /** Emit one update per path alternative of a changed leaf instead of its canonical route only. */
  readonly allPaths?: boolean;
  readonly trace?: TraceContext;
}

const stepsOf = (route: ReadonlyArray<string>): Path.PathStep[] => route.map((name) => Path.step(name));

/**
 * Walks every populated leaf of `from`, in lockstep with `other`, and
 * reports the leaves for which `emit` holds.
 */
const walk = (
  from: StructNode,
  other: StructNode | undefined,
  prefix: StructuredPath,
  options: DiffOptions,
  emit: (path: StructuredPath, mine: ScalarValue | LeafListValue, theirs: FieldValue | undefined) => void
): void => {
  for (const [name, spec, mine] of from.fields()) {
    if (mine === undefined) continue;
    const theirs = other?.get(name);

    if (isStructNode(mine)) {
      const route = canonicalRoute(spec);
      options.trace?.log(`container ${name} at ${Path.toString(prefix)}`);
      indented(options.trace, () =>
        walk(mine, isStructNode(theirs) ? theirs : undefined, Path.append(prefix, ...stepsOf(route)), options, emit)
      );
      continue;
    }

    if (isKeyedList(mine)) {
      const route = canonicalRoute(spec);
      const listName = route[route.length - 1] ?? name;
      const base = Path.append(prefix, ...stepsOf(route.slice(0, -1)));
      const otherList = isKeyedList(theirs) ? theirs : undefined;
      for (const [key, entry] of mine) {
        const path = Path.append(base, Path.step(listName, mine.pathKey(key)));
        indented(options.trace, () => walk(entry, otherList?.get(key), path, options, emit));
      }
      continue;
    }

    const routes = options.allPaths === true ? schemaPaths(spec) : [canonicalRoute(spec)];
    for (const route of routes) {
      emit(Path.append(prefix, ...stepsOf(route)), mine, theirs);
    }
  }
};

const checkSameType = (a: StructNode, b: StructNode): void => {
  if (a.type !== b.type) {
    throw new InvalidArgumentError(`cannot diff ${a.type.name} against ${b.type.name}: types differ`);
  }
};

/**
 * Computes the updates that, applied to `a`, produce the leaf values of `b`.
 * Leaves present only in `a` are not reported; see {@link diffDeletions}.
 * The order of the result is not significant.
 */
export const diff = (a: StructNode, b: StructNode, options: DiffOptions = {}): Update[] => {
  checkSameType(a, b);
  const updates: Update[] = [];
  walk(b, a, Path.empty, options, (path, mine, theirs) => {
    if (theirs === undefined || !valueEquals(mine, theirs)) {
      options.trace?.log(`update ${Path.toString(path)}`);
      updates.push({ path, value: mine });
    }
  });
  return updates;
};

/**
 * Paths of the leaves populated in `a` and absent from `b`.
 */
export const diffDeletions = (a: StructNode, b: StructNode, options: DiffOptions = {}): StructuredPath[] => {
  checkSameType(a, b);
  const deletions: StructuredPath[] = [];
  walk(a, b, Path.empty, options, (path, _mine, theirs) => {
    if (theirs === undefined) {
      options.trace?.log(`delete ${Path.toString(path)}`);
      deletions.push(path);
    }
  });
  return deletions;
};
