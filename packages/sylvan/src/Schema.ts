import { SchemaMismatchError } from "./errors";

// =============================================================================
// Scalar Types
// =============================================================================

export type IntegerKind =
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint8"
  | "uint16"
  | "uint32"
  | "uint64";

export type ScalarKind =
  | IntegerKind
  | "string"
  | "decimal64"
  | "boolean"
  | "empty"
  | "enumeration"
  | "identityref"
  | "union"
  | "binary"
  | "leafref";

/**
 * Inclusive bounds. An absent side is unbounded (up to the kind's own limits).
 */
export interface Bounds {
  readonly min?: number | bigint;
  readonly max?: number | bigint;
}

export interface ScalarType {
  readonly kind: ScalarKind;
  /** Value ranges for integer and decimal64 kinds. */
  readonly ranges?: ReadonlyArray<Bounds>;
  /** Length ranges for string (characters) and binary (bytes) kinds. */
  readonly lengths?: ReadonlyArray<Bounds>;
  /** Anchored patterns; a string must match all of them. */
  readonly patterns?: ReadonlyArray<string>;
  /** Allowed names for enumeration and identityref kinds. */
  readonly enumValues?: ReadonlyArray<string>;
  /** Member types of a union, tried in order. */
  readonly members?: ReadonlyArray<ScalarType>;
  /** Path expression of a leafref. */
  readonly path?: string;
}

export const isIntegerKind = (kind: ScalarKind): kind is IntegerKind =>
  kind.startsWith("int") || kind.startsWith("uint");

// =============================================================================
// Schema Entries
// =============================================================================

export type EntryKind = "container" | "list" | "leaf" | "leaf-list" | "choice" | "case";

interface EntryOptions {
  readonly children?: ReadonlyArray<SchemaEntry>;
  readonly key?: ReadonlyArray<string>;
  readonly type?: ScalarType;
  readonly module?: string;
  readonly fakeRoot?: boolean;
}

/**
 * One node of the schema descriptor tree. Built once, bottom-up, and shared
 * read-only afterwards; children are attached to their parent on
 * construction.
 */
export class SchemaEntry {
  readonly _tag = "SchemaEntry" as const;
  readonly name: string;
  readonly kind: EntryKind;
  readonly children: ReadonlyMap<string, SchemaEntry>;
  readonly key: ReadonlyArray<string>;
  readonly type: ScalarType | undefined;
  readonly fakeRoot: boolean;

  private readonly _module: string | undefined;
  private _parent: SchemaEntry | undefined;

  constructor(name: string, kind: EntryKind, options: EntryOptions = {}) {
    this.name = name;
    this.kind = kind;
    this.key = options.key ?? [];
    this.type = options.type;
    this.fakeRoot = options.fakeRoot ?? false;
    this._module = options.module;

    const children = new Map<string, SchemaEntry>();
    for (const child of options.children ?? []) {
      if (children.has(child.name)) {
        throw new SchemaMismatchError(`duplicate child ${child.name} in schema node ${name}`, name);
      }
      child.attach(this);
      children.set(child.name, child);
    }
    this.children = children;
  }

  private attach(parent: SchemaEntry): void {
    if (this._parent !== undefined) {
      throw new SchemaMismatchError(
        `schema node ${this.name} is already attached to ${this._parent.name}`,
        this.name
      );
    }
    this._parent = parent;
  }

  /** The enclosing entry; undefined for the root. */
  get parent(): SchemaEntry | undefined {
    return this._parent;
  }

  /** The module that defines this entry, inherited from the nearest ancestor that declares one. */
  get module(): string | undefined {
    return this._module ?? this._parent?.module;
  }

  isContainer(): boolean {
    return this.kind === "container";
  }

  isList(): boolean {
    return this.kind === "list";
  }

  isLeaf(): boolean {
    return this.kind === "leaf";
  }

  isLeafList(): boolean {
    return this.kind === "leaf-list";
  }

  isChoiceOrCase(): boolean {
    return this.kind === "choice" || this.kind === "case";
  }

  isDir(): boolean {
    return this.children.size > 0 || this.kind === "container" || this.kind === "list";
  }

  isLeafRef(): boolean {
    return this.type?.kind === "leafref";
  }

  isKeyedList(): boolean {
    return this.kind === "list" && this.key.length > 0;
  }

  child(name: string): SchemaEntry | undefined {
    return this.children.get(name);
  }

  /** Root of the schema tree containing this entry. */
  root(): SchemaEntry {
    let current: SchemaEntry = this;
    while (current._parent !== undefined) {
      current = current._parent;
    }
    return current;
  }

  /** Number of entries between this entry and the root, inclusive. */
  depth(): number {
    let depth = 1;
    for (let p = this._parent; p !== undefined; p = p._parent) depth++;
    return depth;
  }

  /** Schema path of this entry, e.g. `/device/interfaces/interface/name`. */
  path(): string {
    const names: string[] = [];
    for (let e: SchemaEntry | undefined = this; e !== undefined; e = e._parent) {
      names.unshift(e.name);
    }
    return `/${names.join("/")}`;
  }
}

// =============================================================================
// Builders
// =============================================================================

export const Container = (
  name: string,
  children: ReadonlyArray<SchemaEntry> = [],
  options: { readonly module?: string; readonly fakeRoot?: boolean } = {}
): SchemaEntry => new SchemaEntry(name, "container", { ...options, children });

/** Synthesized root standing for the whole device. */
export const FakeRoot = (
  name: string,
  children: ReadonlyArray<SchemaEntry> = []
): SchemaEntry => new SchemaEntry(name, "container", { children, fakeRoot: true });

export const List = (
  name: string,
  key: ReadonlyArray<string>,
  children: ReadonlyArray<SchemaEntry> = [],
  options: { readonly module?: string } = {}
): SchemaEntry => new SchemaEntry(name, "list", { ...options, key, children });

export const Leaf = (
  name: string,
  type: ScalarType,
  options: { readonly module?: string } = {}
): SchemaEntry => new SchemaEntry(name, "leaf", { ...options, type });

export const LeafList = (
  name: string,
  type: ScalarType,
  options: { readonly module?: string } = {}
): SchemaEntry => new SchemaEntry(name, "leaf-list", { ...options, type });

export const Choice = (name: string, cases: ReadonlyArray<SchemaEntry>): SchemaEntry =>
  new SchemaEntry(name, "choice", { children: cases });

export const Case = (name: string, children: ReadonlyArray<SchemaEntry>): SchemaEntry =>
  new SchemaEntry(name, "case", { children });

/** Shorthand for a leafref scalar type. */
export const leafref = (path: string): ScalarType => ({ kind: "leafref", path });

// =============================================================================
// Helpers
// =============================================================================

/**
 * Strips a module qualifier: `prefix:name` becomes `name`.
 */
export const stripModulePrefix = (segment: string): string => {
  const i = segment.lastIndexOf(":");
  return i === -1 ? segment : segment.slice(i + 1);
};

export const stripModulePrefixes = (segments: ReadonlyArray<string>): string[] =>
  segments.map(stripModulePrefix);

/**
 * Returns the first descendants of `entry` that are neither choice nor case
 * nodes, keyed by name. These are the names visible in data paths.
 */
export const firstNonChoiceOrCase = (entry: SchemaEntry): Map<string, SchemaEntry> => {
  const out = new Map<string, SchemaEntry>();
  const visit = (e: SchemaEntry) => {
    if (!e.isChoiceOrCase()) {
      out.set(e.name, e);
      return;
    }
    for (const child of e.children.values()) visit(child);
  };
  for (const child of entry.children.values()) visit(child);
  return out;
};
