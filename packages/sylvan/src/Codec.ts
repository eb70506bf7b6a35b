import { InvalidArgumentError } from "./errors";
import { resolveIfLeafRef } from "./Leafref";
import type { FieldSpec, FieldValue, ScalarValue, StructNode } from "./Node";
import { isKeyedList, isScalarValue, isStructNode } from "./Node";
import * as Scalar from "./Scalar";
import { firstNonChoiceOrCase, stripModulePrefix } from "./Schema";
import type { SchemaEntry, ScalarType } from "./Schema";
import { resolveOrThrow, schemaPaths, shadowSchemaPaths } from "./SchemaPaths";
import type { TraceContext } from "./Trace";
import { indented } from "./Trace";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | ReadonlyArray<JsonValue>
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

type MutableJsonObject = { [key: string]: JsonValue };

export const isJsonObject = (value: JsonValue | undefined): value is MutableJsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isJsonArray = (value: JsonValue | undefined): value is ReadonlyArray<JsonValue> => Array.isArray(value);

// =============================================================================
// Encoding
// =============================================================================

export interface ToJsonOptions {
  /**
   * Qualify a member name with its module whenever the module differs from
   * the module of the enclosing node.
   */
  readonly prependModuleNames?: boolean;
}

const leafType = (entry: SchemaEntry): ScalarType => {
  const type = resolveIfLeafRef(entry).type;
  if (type === undefined) {
    throw new InvalidArgumentError(`schema ${entry.path()} has no type`);
  }
  return type;
};

/**
 * Encodes a scalar the way the interchange format carries it: 64-bit and
 * decimal numbers as strings, binary as base64, empty as `[null]`.
 */
export const encodeScalar = (type: ScalarType, value: ScalarValue): JsonValue => {
  if (value instanceof Uint8Array) {
    return Buffer.from(value).toString("base64");
  }
  if (typeof value === "bigint") {
    return value.toString();
  }
  if (typeof value === "number") {
    return type.kind === "int64" || type.kind === "uint64" || type.kind === "decimal64" ? String(value) : value;
  }
  if (typeof value === "boolean" && type.kind === "empty") {
    return [null];
  }
  return value;
};

const memberName = (segment: string, entry: SchemaEntry | undefined, parent: SchemaEntry, qualify: boolean): string => {
  if (!qualify || entry === undefined) return segment;
  const module = entry.module;
  return module !== undefined && module !== parent.module ? `${module}:${segment}` : segment;
};

const descend = (obj: MutableJsonObject, key: string): MutableJsonObject => {
  const existing = obj[key];
  if (isJsonObject(existing)) return existing;
  const created: MutableJsonObject = {};
  obj[key] = created;
  return created;
};

const encodeValue = (entry: SchemaEntry, value: FieldValue, options: ToJsonOptions): JsonValue => {
  if (isStructNode(value)) {
    return encodeNode(entry, value, options);
  }
  if (isKeyedList(value)) {
    return value.values().map((element) => encodeNode(entry, element, options));
  }
  const type = leafType(entry);
  return isScalarValue(value) ? encodeScalar(type, value) : value.map((element) => encodeScalar(type, element));
};

const encodeNode = (schema: SchemaEntry, node: StructNode, options: ToJsonOptions): MutableJsonObject => {
  const out: MutableJsonObject = {};
  const qualify = options.prependModuleNames === true;

  for (const [name, spec, value] of node.fields()) {
    if (value === undefined) continue;
    const entry = resolveOrThrow(schema, spec, node.type.name, name);

    // Written once per path alternative, so a compressed key leaf also
    // appears beside its list entry.
    for (const route of schemaPaths(spec)) {
      let target = out;
      let parent = schema;
      for (let i = 0; i < route.length - 1; i++) {
        const segment = route[i] ?? "";
        const next = parent.child(segment) ?? firstNonChoiceOrCase(parent).get(segment);
        target = descend(target, memberName(segment, next, parent, qualify));
        if (next !== undefined) parent = next;
      }
      target[memberName(route[route.length - 1] ?? name, entry, parent, qualify)] = encodeValue(entry, value, options);
    }
  }
  return out;
};

/**
 * Encodes `node`, whose schema is `schema`, as an interchange JSON object.
 */
export const toJSON = (schema: SchemaEntry, node: StructNode, options: ToJsonOptions = {}): JsonObject =>
  encodeNode(schema, node, options);

// =============================================================================
// Decoding
// =============================================================================

export interface UnmarshalOptions {
  /** Unknown members are skipped instead of rejected. */
  readonly ignoreExtraFields?: boolean;
  /** Decode shadow-path members and skip the primary ones. */
  readonly preferShadowPath?: boolean;
  /** Skip shadow-path members instead of rejecting them. */
  readonly allowShadowPaths?: boolean;
  readonly trace?: TraceContext;
}

const lookup = (json: JsonObject, route: ReadonlyArray<string>): JsonValue | undefined => {
  let current: JsonValue = json;
  for (const segment of route) {
    if (!isJsonObject(current)) return undefined;
    const member: string | undefined = Object.keys(current).find((k) => stripModulePrefix(k) === segment);
    if (member === undefined) return undefined;
    const next: JsonValue | undefined = current[member];
    if (next === undefined) return undefined;
    current = next;
  }
  return current;
};

const sameRoute = (a: ReadonlyArray<string>, b: ReadonlyArray<string>): boolean =>
  a.length === b.length && a.every((s, i) => s === b[i]);

const startsWith = (route: ReadonlyArray<string>, prefix: ReadonlyArray<string>): boolean =>
  route.length > prefix.length && prefix.every((s, i) => s === route[i]);

interface Routes {
  readonly decoded: ReadonlyArray<ReadonlyArray<string>>;
  readonly skipped: ReadonlyArray<ReadonlyArray<string>>;
  readonly rejected: ReadonlyArray<ReadonlyArray<string>>;
}

const checkMembers = (
  json: JsonObject,
  prefix: ReadonlyArray<string>,
  routes: Routes,
  typeName: string,
  options: UnmarshalOptions
): void => {
  const all = [...routes.decoded, ...routes.skipped, ...routes.rejected];
  for (const [member, value] of Object.entries(json)) {
    const candidate = [...prefix, stripModulePrefix(member)];
    if (routes.rejected.some((r) => sameRoute(r, candidate))) {
      throw new InvalidArgumentError(
        `JSON member ${candidate.join("/")} of ${typeName} is a shadow path, which is not allowed here`
      );
    }
    if (all.some((r) => sameRoute(r, candidate))) continue;
    if (isJsonObject(value) && all.some((r) => startsWith(r, candidate))) {
      checkMembers(value, candidate, routes, typeName, options);
      continue;
    }
    if (options.ignoreExtraFields === true) {
      options.trace?.log(`ignoring extra member ${candidate.join("/")} of ${typeName}`);
      continue;
    }
    throw new InvalidArgumentError(`JSON contains unexpected field ${candidate.join("/")} for type ${typeName}`);
  }
};

const decodeField = (
  schema: SchemaEntry,
  node: StructNode,
  name: string,
  spec: FieldSpec,
  value: JsonValue,
  options: UnmarshalOptions
): void => {
  const entry = resolveOrThrow(schema, spec, node.type.name, name);
  switch (spec._tag) {
    case "Leaf":
      node.set(name, Scalar.decode(leafType(entry), spec.repr, value));
      return;
    case "LeafList":
      node.set(name, Scalar.decodeList(leafType(entry), spec.repr, value));
      return;
    case "Child":
      unmarshal(entry, node.getOrCreateChild(name), value, options);
      return;
    case "List": {
      if (!isJsonArray(value)) {
        throw new InvalidArgumentError(`JSON value for list ${entry.name} of ${node.type.name} is not an array`);
      }
      const list = node.getOrCreateList(name);
      for (const element of value) {
        const fresh = list.type.create();
        unmarshal(entry, fresh, element, options);
        const key = list.keyOf(fresh);
        const existing = list.get(key);
        if (existing === undefined) {
          list.set(key, fresh);
        } else {
          unmarshal(entry, existing, element, options);
        }
      }
      return;
    }
  }
};

/**
 * Decodes an interchange JSON object into `node`, whose schema is `schema`.
 * Members may be module-qualified.
 */
export const unmarshal = (
  schema: SchemaEntry,
  node: StructNode,
  json: JsonValue,
  options: UnmarshalOptions = {}
): void => {
  if (!isJsonObject(json)) {
    throw new InvalidArgumentError(`cannot unmarshal a non-object JSON value into ${node.type.name}`);
  }
  options.trace?.log(`unmarshal into ${node.type.name} (schema ${schema.name})`);

  const decoded: Array<ReadonlyArray<string>> = [];
  const skipped: Array<ReadonlyArray<string>> = [];
  const rejected: Array<ReadonlyArray<string>> = [];

  indented(options.trace, () => {
    for (const [name, spec] of node.type.fieldEntries()) {
      const primary = schemaPaths(spec);
      const shadows = shadowSchemaPaths(spec);
      const preferShadow = options.preferShadowPath === true && shadows.length > 0;
      const use = preferShadow ? shadows : primary;
      decoded.push(...use);
      if (preferShadow) {
        skipped.push(...primary);
      } else if (options.allowShadowPaths === true || options.preferShadowPath === true) {
        skipped.push(...shadows);
      } else {
        rejected.push(...shadows);
      }

      for (const route of use) {
        const value = lookup(json, route);
        if (value === undefined) continue;
        options.trace?.log(`field ${name} <- ${route.join("/")}`);
        decodeField(schema, node, name, spec, value, options);
        break;
      }
    }
  });

  checkMembers(json, [], { decoded, skipped, rejected }, node.type.name, options);
};
