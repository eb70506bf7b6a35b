import { InvalidArgumentError, SchemaMismatchError } from "./errors";
import type { PathKey } from "./Path";
import { schemaPaths } from "./SchemaPaths";

// =============================================================================
// Values
// =============================================================================

export type ScalarValue = string | number | bigint | boolean | Uint8Array;

export type LeafListValue = ReadonlyArray<ScalarValue>;

/** Key of a compound-keyed list entry, by schema key name. */
export type KeyTuple = Readonly<Record<string, ScalarValue>>;

export type KeyValue = ScalarValue | KeyTuple;

/** Anything a generated field can hold. */
export type FieldValue = ScalarValue | LeafListValue | StructNode | KeyedList;

/** TypeScript representation chosen by the schema compiler for a leaf. */
export type Repr = "string" | "number" | "bigint" | "boolean" | "bytes";

export const isScalarValue = (value: unknown): value is ScalarValue =>
  typeof value === "string" ||
  typeof value === "number" ||
  typeof value === "bigint" ||
  typeof value === "boolean" ||
  value instanceof Uint8Array;

export const isLeafListValue = (value: unknown): value is LeafListValue =>
  Array.isArray(value) && value.every(isScalarValue);

export const isStructNode = (value: unknown): value is StructNode => value instanceof StructNode;

export const isKeyedList = (value: unknown): value is KeyedList => value instanceof KeyedList;

export const zeroValue = (repr: Repr): ScalarValue => {
  switch (repr) {
    case "string":
      return "";
    case "number":
      return 0;
    case "bigint":
      return 0n;
    case "boolean":
      return false;
    case "bytes":
      return new Uint8Array();
  }
};

/**
 * Renders a scalar the way it appears in a path key.
 */
export const keyValueAsString = (value: ScalarValue): string => {
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("base64");
  }
  return String(value);
};

const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean =>
  a.length === b.length && a.every((byte, i) => byte === b[i]);

/**
 * Value equality for scalars. Integral numbers and bigints compare by value.
 */
export const scalarEquals = (a: ScalarValue, b: ScalarValue): boolean => {
  if (a instanceof Uint8Array || b instanceof Uint8Array) {
    return a instanceof Uint8Array && b instanceof Uint8Array && bytesEqual(a, b);
  }
  if (typeof a === "bigint" && typeof b === "number") {
    return Number.isInteger(b) && a === BigInt(b);
  }
  if (typeof a === "number" && typeof b === "bigint") {
    return Number.isInteger(a) && BigInt(a) === b;
  }
  return a === b;
};

/**
 * Deep value equality over field values.
 */
export const valueEquals = (a: FieldValue | undefined, b: FieldValue | undefined): boolean => {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  if (isStructNode(a)) {
    return isStructNode(b) && a.equals(b);
  }
  if (isKeyedList(a)) {
    return isKeyedList(b) && a.equals(b);
  }
  if (isScalarValue(a)) {
    return isScalarValue(b) && scalarEquals(a, b);
  }
  return (
    isLeafListValue(b) &&
    !isScalarValue(b) &&
    a.length === b.length &&
    a.every((v, i) => {
      const other = b[i];
      return other !== undefined && scalarEquals(v, other);
    })
  );
};

// =============================================================================
// Field Descriptors
// =============================================================================

interface FieldBase {
  /** Schema path alternatives, pipe-separated (`config/name|name`). */
  readonly path: string;
  /** Alternative paths the field also answers to without storing data. */
  readonly shadowPath?: string;
  /** Name of a fake-root child addressed directly in the schema. */
  readonly rootName?: string;
}

export interface LeafField extends FieldBase {
  readonly _tag: "Leaf";
  readonly repr: Repr;
}

export interface LeafListField extends FieldBase {
  readonly _tag: "LeafList";
  readonly repr: Repr;
}

export interface ChildField extends FieldBase {
  readonly _tag: "Child";
  readonly type: () => NodeType;
}

export interface ListField extends FieldBase {
  readonly _tag: "List";
  readonly type: () => NodeType;
  /** Schema key leaf names, in declaration order. */
  readonly key: ReadonlyArray<string>;
}

export type FieldSpec = LeafField | LeafListField | ChildField | ListField;

type FieldOptions = Omit<FieldBase, "path">;

export const Leaf = (path: string, repr: Repr = "string", options: FieldOptions = {}): LeafField => ({
  _tag: "Leaf",
  path,
  repr,
  ...options,
});

export const LeafList = (path: string, repr: Repr = "string", options: FieldOptions = {}): LeafListField => ({
  _tag: "LeafList",
  path,
  repr,
  ...options,
});

/** A single child container. `type` is a thunk so types can refer to each other. */
export const Child = (path: string, type: () => NodeType, options: FieldOptions = {}): ChildField => ({
  _tag: "Child",
  path,
  type,
  ...options,
});

export const List = (
  path: string,
  type: () => NodeType,
  key: ReadonlyArray<string>,
  options: FieldOptions = {}
): ListField => ({
  _tag: "List",
  path,
  type,
  key,
  ...options,
});

// =============================================================================
// Node Types
// =============================================================================

/**
 * The descriptor table of one generated type: its name and its fields in
 * declaration order.
 */
export class NodeType {
  readonly _tag = "NodeType" as const;
  readonly name: string;
  readonly fields: Readonly<Record<string, FieldSpec>>;

  private _keyFields: Map<string, string> | undefined;

  constructor(name: string, fields: Readonly<Record<string, FieldSpec>>) {
    this.name = name;
    this.fields = fields;
  }

  /** Creates a zero-valued instance. */
  create(): StructNode {
    return new StructNode(this);
  }

  field(name: string): FieldSpec | undefined {
    return Object.prototype.hasOwnProperty.call(this.fields, name) ? this.fields[name] : undefined;
  }

  fieldEntries(): Array<[string, FieldSpec]> {
    return Object.entries(this.fields);
  }

  /**
   * Name of the field holding the key leaf `keyName`: the leaf whose path
   * has a single-segment alternative equal to the key name.
   */
  keyField(keyName: string): string | undefined {
    if (this._keyFields === undefined) {
      const found = new Map<string, string>();
      for (const [name, spec] of this.fieldEntries()) {
        if (spec._tag !== "Leaf") continue;
        for (const p of schemaPaths(spec)) {
          const only = p[0];
          if (p.length === 1 && only !== undefined && !found.has(only)) {
            found.set(only, name);
          }
        }
      }
      this._keyFields = found;
    }
    return this._keyFields.get(keyName);
  }
}

/** Creates the descriptor table of a generated container or list-entry type. */
export const Struct = (name: string, fields: Readonly<Record<string, FieldSpec>>): NodeType =>
  new NodeType(name, fields);

const checkShape = (type: NodeType, name: string, spec: FieldSpec, value: FieldValue): void => {
  const where = `${type.name}.${name}`;
  switch (spec._tag) {
    case "Leaf":
      if (!isScalarValue(value)) {
        throw new InvalidArgumentError(`field ${where} holds a scalar, got ${describe(value)}`);
      }
      return;
    case "LeafList":
      if (isScalarValue(value) || !isLeafListValue(value)) {
        throw new InvalidArgumentError(`field ${where} holds a leaf-list, got ${describe(value)}`);
      }
      return;
    case "Child":
      if (!isStructNode(value) || value.type !== spec.type()) {
        throw new InvalidArgumentError(`field ${where} holds a ${spec.type().name}, got ${describe(value)}`);
      }
      return;
    case "List":
      if (!isKeyedList(value) || value.type !== spec.type()) {
        throw new InvalidArgumentError(`field ${where} holds a list of ${spec.type().name}, got ${describe(value)}`);
      }
      return;
  }
};

/**
 * Short, human-readable description of a value for error messages.
 */
export const describe = (value: FieldValue | undefined): string => {
  if (value === undefined) return "undefined";
  if (isStructNode(value)) return value.type.name;
  if (isKeyedList(value)) return `list of ${value.type.name}`;
  if (value instanceof Uint8Array) return "bytes";
  if (isScalarValue(value)) return typeof value;
  return "leaf-list";
};

// =============================================================================
// Struct Node
// =============================================================================

/**
 * An instance of a generated type. Field values are addressed by field name;
 * an absent field is `undefined`.
 */
export class StructNode {
  readonly _tag = "StructNode" as const;
  readonly type: NodeType;
  private readonly values = new Map<string, FieldValue>();

  constructor(type: NodeType) {
    this.type = type;
  }

  private spec(name: string): FieldSpec {
    const spec = this.type.field(name);
    if (spec === undefined) {
      throw new SchemaMismatchError(`type ${this.type.name} has no field ${name}`);
    }
    return spec;
  }

  get(name: string): FieldValue | undefined {
    this.spec(name);
    return this.values.get(name);
  }

  /** Sets a field; `undefined` clears it. */
  set(name: string, value: FieldValue | undefined): this {
    const spec = this.spec(name);
    if (value === undefined) {
      this.values.delete(name);
      return this;
    }
    checkShape(this.type, name, spec, value);
    this.values.set(name, value);
    return this;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  /** Unsets every field. */
  clear(): void {
    this.values.clear();
  }

  leaf(name: string): ScalarValue | undefined {
    const value = this.get(name);
    return isScalarValue(value) ? value : undefined;
  }

  leafList(name: string): LeafListValue | undefined {
    const value = this.get(name);
    return value === undefined || isScalarValue(value) || isStructNode(value) || isKeyedList(value)
      ? undefined
      : value;
  }

  child(name: string): StructNode | undefined {
    const value = this.get(name);
    return isStructNode(value) ? value : undefined;
  }

  list(name: string): KeyedList | undefined {
    const value = this.get(name);
    return isKeyedList(value) ? value : undefined;
  }

  getOrCreateChild(name: string): StructNode {
    const spec = this.spec(name);
    if (spec._tag !== "Child") {
      throw new InvalidArgumentError(`field ${this.type.name}.${name} is not a container`);
    }
    const existing = this.child(name);
    if (existing !== undefined) return existing;
    const created = spec.type().create();
    this.values.set(name, created);
    return created;
  }

  getOrCreateList(name: string): KeyedList {
    const spec = this.spec(name);
    if (spec._tag !== "List") {
      throw new InvalidArgumentError(`field ${this.type.name}.${name} is not a keyed list`);
    }
    const existing = this.list(name);
    if (existing !== undefined) return existing;
    const created = new KeyedList(spec.type(), spec.key);
    this.values.set(name, created);
    return created;
  }

  /** Fields in declaration order, with their current values. */
  fields(): Array<readonly [string, FieldSpec, FieldValue | undefined]> {
    return this.type.fieldEntries().map(([name, spec]) => [name, spec, this.values.get(name)] as const);
  }

  isEmpty(): boolean {
    return this.values.size === 0;
  }

  equals(other: StructNode): boolean {
    if (other.type !== this.type) return false;
    return this.type.fieldEntries().every(([name]) => valueEquals(this.values.get(name), other.values.get(name)));
  }

  clone(): StructNode {
    const copy = new StructNode(this.type);
    for (const [name, value] of this.values) {
      copy.values.set(name, cloneValue(value));
    }
    return copy;
  }
}

export const cloneValue = (value: FieldValue): FieldValue => {
  if (isStructNode(value) || isKeyedList(value)) return value.clone();
  if (value instanceof Uint8Array) return value.slice();
  if (isScalarValue(value)) return value;
  return [...value];
};

// =============================================================================
// Keyed List
// =============================================================================

interface ListEntry {
  readonly key: KeyValue;
  readonly node: StructNode;
}

/**
 * A keyed collection of list entries. Single-key lists are keyed by a
 * scalar, compound-key lists by a record of schema key name to scalar.
 */
export class KeyedList {
  readonly _tag = "KeyedList" as const;
  readonly type: NodeType;
  readonly keyNames: ReadonlyArray<string>;
  private readonly entries = new Map<string, ListEntry>();

  constructor(type: NodeType, keyNames: ReadonlyArray<string>) {
    if (keyNames.length === 0) {
      throw new InvalidArgumentError(`keyed list of ${type.name} must declare at least one key`);
    }
    this.type = type;
    this.keyNames = keyNames;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Identity of a key: its path key components in key order. */
  keyString(key: KeyValue): string {
    const pathKey = this.pathKey(key);
    return JSON.stringify(this.keyNames.map((name) => pathKey[name]));
  }

  /** Key rendered as a path key map. */
  pathKey(key: KeyValue): PathKey {
    const [only] = this.keyNames;
    if (isScalarValue(key)) {
      if (this.keyNames.length !== 1 || only === undefined) {
        throw new InvalidArgumentError(
          `list of ${this.type.name} has compound key (${this.keyNames.join(", ")}), got scalar key`
        );
      }
      return { [only]: keyValueAsString(key) };
    }
    const out: Record<string, string> = {};
    for (const name of this.keyNames) {
      const component = key[name];
      if (component === undefined) {
        throw new InvalidArgumentError(`key for list of ${this.type.name} is missing component ${name}`);
      }
      out[name] = keyValueAsString(component);
    }
    return out;
  }

  /** Component `keyName` of `key`. */
  keyComponent(key: KeyValue, keyName: string): ScalarValue | undefined {
    return isScalarValue(key) ? (this.keyNames[0] === keyName ? key : undefined) : key[keyName];
  }

  get(key: KeyValue): StructNode | undefined {
    return this.entries.get(this.keyString(key))?.node;
  }

  has(key: KeyValue): boolean {
    return this.entries.has(this.keyString(key));
  }

  set(key: KeyValue, node: StructNode): this {
    if (node.type !== this.type) {
      throw new InvalidArgumentError(`list of ${this.type.name} cannot hold ${node.type.name}`);
    }
    this.entries.set(this.keyString(key), { key, node });
    return this;
  }

  delete(key: KeyValue): boolean {
    return this.entries.delete(this.keyString(key));
  }

  /**
   * Creates an entry for `key` with its key leaves populated, or returns
   * the existing one.
   */
  getOrCreate(key: KeyValue): StructNode {
    const existing = this.get(key);
    if (existing !== undefined) return existing;
    const node = this.type.create();
    for (const keyName of this.keyNames) {
      const fieldName = this.type.keyField(keyName);
      const component = this.keyComponent(key, keyName);
      if (fieldName === undefined) {
        throw new SchemaMismatchError(`type ${this.type.name} has no field for key ${keyName}`);
      }
      if (component !== undefined) {
        node.set(fieldName, component);
      }
    }
    this.set(key, node);
    return node;
  }

  /**
   * Key of an entry computed from its own key leaves.
   */
  keyOf(node: StructNode): KeyValue {
    const components: Record<string, ScalarValue> = {};
    for (const keyName of this.keyNames) {
      const fieldName = this.type.keyField(keyName);
      if (fieldName === undefined) {
        throw new SchemaMismatchError(`type ${this.type.name} has no field for key ${keyName}`);
      }
      const value = node.leaf(fieldName);
      if (value === undefined) {
        throw new InvalidArgumentError(`key leaf ${keyName} of ${this.type.name} is not set`);
      }
      components[keyName] = value;
    }
    const [only] = this.keyNames;
    const single = only === undefined ? undefined : components[only];
    return this.keyNames.length === 1 && single !== undefined ? single : components;
  }

  /** Inserts `node` under the key computed from its key leaves. */
  append(node: StructNode): this {
    return this.set(this.keyOf(node), node);
  }

  *[Symbol.iterator](): IterableIterator<[KeyValue, StructNode]> {
    for (const { key, node } of this.entries.values()) {
      yield [key, node];
    }
  }

  keys(): KeyValue[] {
    return [...this.entries.values()].map((e) => e.key);
  }

  values(): StructNode[] {
    return [...this.entries.values()].map((e) => e.node);
  }

  equals(other: KeyedList): boolean {
    if (other.type !== this.type || other.size !== this.size) return false;
    for (const [id, entry] of this.entries) {
      const theirs = other.entries.get(id);
      if (theirs === undefined || !entry.node.equals(theirs.node)) return false;
    }
    return true;
  }

  clone(): KeyedList {
    const copy = new KeyedList(this.type, this.keyNames);
    for (const [id, entry] of this.entries) {
      copy.entries.set(id, { key: entry.key, node: entry.node.clone() });
    }
    return copy;
  }
}

/** Everything a navigator lookup can produce or synthesize. */
export type NodeValue = FieldValue;
