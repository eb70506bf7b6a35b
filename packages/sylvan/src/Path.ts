import { InvalidArgumentError } from "./errors";

export type PathKey = Readonly<Record<string, string>>;

/**
 * A single step of a structured path. `key` is only present when the step
 * selects an element of a keyed list.
 */
export interface PathStep {
  readonly name: string;
  readonly key?: PathKey;
}

export interface StructuredPath {
  readonly _tag: "StructuredPath";
  readonly origin?: string;
  readonly steps: ReadonlyArray<PathStep>;
}

/**
 * Creates a new structured path.
 * @param steps - The steps of the path, outermost first.
 * @param origin - Optional origin qualifier for the whole path.
 */
export function make(steps: ReadonlyArray<PathStep> = [], origin?: string): StructuredPath {
  return origin === undefined
    ? { _tag: "StructuredPath", steps }
    : { _tag: "StructuredPath", origin, steps };
}

export const empty: StructuredPath = make();

/**
 * Creates a path from plain element names, none of them keyed.
 */
export const fromNames = (names: ReadonlyArray<string>): StructuredPath =>
  make(names.map((name) => ({ name })));

export const step = (name: string, key?: PathKey): PathStep =>
  key === undefined ? { name } : { name, key };

// =============================================================================
// String Form
// =============================================================================

const splitElements = (input: string): string[] => {
  const out: string[] = [];
  let current = "";
  let inKey = false;
  let escaped = false;

  for (const ch of input) {
    if (escaped) {
      current += `\\${ch}`;
      escaped = false;
      continue;
    }
    if (ch === "\\") {
      escaped = true;
      continue;
    }
    if (ch === "[") inKey = true;
    if (ch === "]") inKey = false;
    if (ch === "/" && !inKey) {
      out.push(current);
      current = "";
      continue;
    }
    current += ch;
  }
  if (inKey) {
    throw new InvalidArgumentError(`unterminated key in path ${input}`);
  }
  out.push(current);
  return out;
};

const unescape = (s: string): string => s.replace(/\\(.)/g, "$1");

const parseElement = (element: string): PathStep => {
  const open = element.indexOf("[");
  if (open === -1) {
    return { name: unescape(element) };
  }

  const name = unescape(element.slice(0, open));
  if (name === "") {
    throw new InvalidArgumentError(`path element ${element} has keys but no name`);
  }

  const key: Record<string, string> = {};
  let rest = element.slice(open);
  while (rest.length > 0) {
    if (!rest.startsWith("[")) {
      throw new InvalidArgumentError(`trailing characters after key in path element ${element}`);
    }
    const close = findClose(rest);
    const body = rest.slice(1, close);
    const eq = body.indexOf("=");
    if (eq <= 0) {
      throw new InvalidArgumentError(`key ${body} in path element ${element} is not of the form name=value`);
    }
    key[unescape(body.slice(0, eq))] = unescape(body.slice(eq + 1));
    rest = rest.slice(close + 1);
  }
  return { name, key };
};

const findClose = (s: string): number => {
  for (let i = 1; i < s.length; i++) {
    if (s[i] === "\\") {
      i++;
      continue;
    }
    if (s[i] === "]") return i;
  }
  throw new InvalidArgumentError(`unterminated key in ${s}`);
};

/**
 * Parses the string form `/a/b[k=v][k2=v2]/c`. A leading `/` marks an
 * absolute path and is dropped.
 */
export function fromString(input: string): StructuredPath {
  const trimmed = input.startsWith("/") ? input.slice(1) : input;
  if (trimmed === "") {
    return empty;
  }
  return make(splitElements(trimmed).map(parseElement));
}

const escapeName = (s: string): string => s.replace(/[/[\]\\]/g, (c) => `\\${c}`);
const escapeKeyValue = (s: string): string => s.replace(/[\]\\]/g, (c) => `\\${c}`);

/**
 * Returns the canonical string form of a single step; keys are sorted by name.
 */
export const stepToString = (s: PathStep): string => {
  const keys = s.key === undefined ? [] : Object.keys(s.key).sort();
  const key = s.key;
  return (
    escapeName(s.name) +
    keys.map((k) => `[${escapeName(k)}=${escapeKeyValue(key?.[k] ?? "")}]`).join("")
  );
};

/**
 * Returns the string form of a path, always starting with `/`.
 */
export function toString(path: StructuredPath): string {
  const body = path.steps.map(stepToString).join("/");
  const prefix = path.origin === undefined ? "" : `${path.origin}:`;
  return `${prefix}/${body}`;
}

// =============================================================================
// Path Utility Functions
// =============================================================================

/**
 * Drops the absolute-path marker (an empty-named first step), if present.
 */
export const stripAbsoluteMarker = (path: StructuredPath): StructuredPath => {
  const first = path.steps[0];
  if (first !== undefined && first.name === "") {
    return make(path.steps.slice(1), path.origin);
  }
  return path;
};

/**
 * Checks whether the element names of `path` start with `prefix`.
 */
export const matchesPrefix = (path: StructuredPath, prefix: ReadonlyArray<string>): boolean => {
  if (path.steps.length < prefix.length) {
    return false;
  }
  return prefix.every((name, i) => path.steps[i]?.name === name);
};

/**
 * Removes `prefix` from the front of `path`; returns `path` unchanged if it
 * does not match.
 */
export const trimPrefix = (path: StructuredPath, prefix: ReadonlyArray<string>): StructuredPath => {
  if (!matchesPrefix(path, prefix)) {
    return path;
  }
  return make(path.steps.slice(prefix.length), path.origin);
};

/**
 * Removes the first step of the path.
 */
export const pop = (path: StructuredPath): StructuredPath =>
  path.steps.length === 0 ? path : make(path.steps.slice(1), path.origin);

export const append = (path: StructuredPath, ...steps: ReadonlyArray<PathStep>): StructuredPath =>
  make([...path.steps, ...steps], path.origin);

export const concat = (path: StructuredPath, other: StructuredPath): StructuredPath =>
  make([...path.steps, ...other.steps], path.origin);

/**
 * Returns the path without its last step.
 */
export const parent = (path: StructuredPath): StructuredPath =>
  make(path.steps.slice(0, -1), path.origin);

export const head = (path: StructuredPath): PathStep | undefined => path.steps[0];

export const isEmpty = (path: StructuredPath): boolean => path.steps.length === 0;

export const keysEqual = (a: PathKey | undefined, b: PathKey | undefined): boolean => {
  const ak = a === undefined ? [] : Object.keys(a);
  const bk = b === undefined ? [] : Object.keys(b);
  if (ak.length !== bk.length) {
    return false;
  }
  return ak.every((k) => a?.[k] === b?.[k] && b !== undefined && k in b);
};

export const stepEquals = (a: PathStep, b: PathStep): boolean =>
  a.name === b.name && keysEqual(a.key, b.key);

export const equals = (a: StructuredPath, b: StructuredPath): boolean =>
  a.origin === b.origin &&
  a.steps.length === b.steps.length &&
  a.steps.every((s, i) => {
    const other = b.steps[i];
    return other !== undefined && stepEquals(s, other);
  });
