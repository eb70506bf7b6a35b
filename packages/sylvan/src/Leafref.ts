import { SchemaMismatchError } from "./errors";
import { stripModulePrefix } from "./Schema";
import type { SchemaEntry } from "./Schema";
import type { TraceContext } from "./Trace";

// =============================================================================
// Path Expressions
// =============================================================================

/**
 * Removes every `[...]` predicate from a path expression:
 * `/a/b[name=current()/../x]/c` becomes `/a/b/c`.
 */
export const removePredicates = (expr: string): string => {
  let out = "";
  let rest = expr;
  while (rest.length > 0) {
    const open = rest.indexOf("[");
    const close = rest.indexOf("]");
    if (open === -1 && close === -1) {
      out += rest;
      break;
    }
    if (open === -1 || close === -1) {
      throw new SchemaMismatchError(`mismatched brackets in ${rest} of path expression ${expr}`);
    }
    if (open > close) {
      throw new SchemaMismatchError(`] before [ in ${rest} of path expression ${expr}`);
    }
    out += rest.slice(0, open);
    rest = rest.slice(close + 1);
  }
  return out;
};

/**
 * A key predicate of a leafref path step. A literal value was quoted in the
 * expression; otherwise `value` is a path relative to the referencing leaf.
 */
export interface Predicate {
  readonly key: string;
  readonly value: string;
  readonly literal: boolean;
}

export interface ExprStep {
  readonly name: string;
  readonly predicates: ReadonlyArray<Predicate>;
}

export interface ParsedExpr {
  readonly absolute: boolean;
  readonly steps: ReadonlyArray<ExprStep>;
}

const splitOutsideBrackets = (expr: string): string[] => {
  const out: string[] = [];
  let current = "";
  let depth = 0;
  let quote: string | undefined;
  for (const ch of expr) {
    if (quote !== undefined) {
      if (ch === quote) quote = undefined;
      current += ch;
      continue;
    }
    if (ch === '"' || ch === "'") quote = ch;
    if (ch === "[") depth++;
    if (ch === "]") depth--;
    if (ch === "/" && depth === 0) {
      out.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  out.push(current);
  return out;
};

const isQuoted = (s: string): boolean =>
  s.length >= 2 && (s[0] === '"' || s[0] === "'") && s[s.length - 1] === s[0];

const parsePredicate = (body: string, expr: string): Predicate => {
  const eq = body.indexOf("=");
  if (eq <= 0) {
    throw new SchemaMismatchError(`bad predicate [${body}] in path expression ${expr}`);
  }
  const key = stripModulePrefix(body.slice(0, eq).trim());
  const raw = body.slice(eq + 1).trim();
  if (isQuoted(raw)) {
    return { key, value: raw.slice(1, -1), literal: true };
  }
  if (!raw.startsWith("current()/")) {
    throw new SchemaMismatchError(
      `predicate [${body}] in ${expr} must be quoted or begin with current()/`
    );
  }
  const relative = raw
    .slice("current()/".length)
    .split("/")
    .map((s) => stripModulePrefix(s.trim()))
    .join("/");
  return { key, value: relative, literal: false };
};

const parseStep = (segment: string, expr: string): ExprStep => {
  const open = segment.indexOf("[");
  if (open === -1) {
    return { name: stripModulePrefix(segment.trim()), predicates: [] };
  }
  const name = stripModulePrefix(segment.slice(0, open).trim());
  const predicates: Predicate[] = [];
  let rest = segment.slice(open);
  while (rest.length > 0) {
    const close = rest.indexOf("]");
    if (!rest.startsWith("[") || close === -1) {
      throw new SchemaMismatchError(`malformed path element ${segment} in ${expr}`);
    }
    predicates.push(parsePredicate(rest.slice(1, close), expr));
    rest = rest.slice(close + 1).trim();
  }
  return { name, predicates };
};

/**
 * Parses a leafref path expression, keeping its predicates.
 */
export const parse = (expr: string): ParsedExpr => {
  if (expr === "") {
    throw new SchemaMismatchError("empty leafref path expression");
  }
  const absolute = expr.startsWith("/");
  const body = absolute ? expr.slice(1) : expr;
  return {
    absolute,
    steps: splitOutsideBrackets(body)
      .filter((s) => s !== "")
      .map((s) => parseStep(s, expr)),
  };
};

// =============================================================================
// Schema Resolution
// =============================================================================

const findTarget = (entry: SchemaEntry, expr: string): SchemaEntry => {
  const stripped = removePredicates(expr);
  if (stripped === "") {
    throw new SchemaMismatchError(`leafref schema ${entry.name} has empty path`, entry.name);
  }

  let current: SchemaEntry = entry;
  let segments = stripped.split("/");
  if (stripped.startsWith("/")) {
    current = entry.root();
    segments = segments.slice(1);
  }

  for (let i = 0; i < segments.length; i++) {
    const raw = segments[i];
    if (raw === undefined || raw === "") continue;
    const segment = stripModulePrefix(raw);

    if (segment === "..") {
      const parent = current.parent;
      if (parent === undefined) {
        throw new SchemaMismatchError(
          `parent of ${current.name} is nil for leafref schema ${entry.name} with path ${expr}`,
          entry.name
        );
      }
      current = parent;
      continue;
    }

    const next = current.child(segment);
    if (next !== undefined) {
      current = next;
      continue;
    }

    // A synthesized root may elide the wrapper named by this segment.
    const following = segments[i + 1];
    const elided = current.fakeRoot && following !== undefined ? current.child(stripModulePrefix(following)) : undefined;
    if (elided !== undefined) {
      current = elided;
      i++;
      continue;
    }

    throw new SchemaMismatchError(
      `schema node ${segment} is nil for leafref schema ${entry.name} with path ${expr}`,
      entry.name
    );
  }
  return current;
};

/**
 * Follows leafref types until reaching an entry that is not a leafref.
 * Returns `entry` itself when it is not a leafref.
 */
export const resolveIfLeafRef = (entry: SchemaEntry, trace?: TraceContext): SchemaEntry => {
  const visited = new Set<SchemaEntry>();
  let current = entry;
  for (let type = current.type; type?.kind === "leafref"; type = current.type) {
    if (visited.has(current)) {
      throw new SchemaMismatchError(`leafref cycle starting at ${entry.path()}`, entry.name);
    }
    visited.add(current);
    if (type.path === undefined) {
      throw new SchemaMismatchError(`leafref schema ${current.name} has empty path`, current.name);
    }
    current = findTarget(current, type.path);
  }
  if (current !== entry) {
    trace?.log(`follow leafref from ${entry.path()} to ${current.path()}, type ${current.type?.kind ?? "none"}`);
  }
  return current;
};
