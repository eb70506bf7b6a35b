import * as Codec from "./Codec";
import type { JsonValue } from "./Codec";
import { InvalidArgumentError, PathNotFoundError, SchemaMismatchError, toStatus, statusOk } from "./errors";
import type { Status } from "./errors";
import { resolveIfLeafRef } from "./Leafref";
import { KeyedList, isKeyedList, isStructNode, zeroValue } from "./Node";
import type {
  FieldSpec,
  FieldValue,
  KeyValue,
  LeafField,
  LeafListField,
  LeafListValue,
  ListField,
  NodeType,
  NodeValue,
  ScalarValue,
  StructNode,
} from "./Node";
import * as Path from "./Path";
import type { PathKey, StructuredPath } from "./Path";
import * as Scalar from "./Scalar";
import { stripModulePrefix } from "./Schema";
import type { SchemaEntry } from "./Schema";
import { resolve, resolvePreferShadow, schemaPaths, shadowSchemaPaths } from "./SchemaPaths";
import type { TraceContext } from "./Trace";
import { indented } from "./Trace";

// =============================================================================
// Types
// =============================================================================

/**
 * One node found by {@link getNode}. A match on a shadow path carries
 * neither schema nor data.
 */
export interface TreeMatch {
  readonly path: StructuredPath;
  readonly schema: SchemaEntry | undefined;
  readonly data: FieldValue | undefined;
}

export interface GetNodeOptions {
  /**
   * Accumulate every matching list entry. Keys may be omitted from a step,
   * and `*` matches any value of a key.
   */
  readonly partialKeyMatch?: boolean;
  /** An absent node with path remaining yields no matches instead of an error. */
  readonly tolerateNil?: boolean;
  /** Look at shadow paths before primary paths. */
  readonly preferShadowPath?: boolean;
  readonly trace?: TraceContext;
}

export interface SetNodeOptions {
  /** Create absent containers and list entries along the path. */
  readonly initMissingElements?: boolean;
  readonly preferShadowPath?: boolean;
  /** A path naming no field is a no-op instead of an error. */
  readonly ignoreExtraFields?: boolean;
  readonly trace?: TraceContext;
}

export interface GetOrCreateNodeOptions {
  readonly preferShadowPath?: boolean;
  readonly trace?: TraceContext;
}

export interface DeleteNodeOptions {
  readonly preferShadowPath?: boolean;
  readonly trace?: TraceContext;
}

/** A value accepted by {@link setNode}: a native scalar or leaf-list, or interchange JSON. */
export type SetValue = ScalarValue | LeafListValue | JsonValue;

interface RetrieveArgs {
  readonly partialKeyMatch: boolean;
  readonly handleWildcards: boolean;
  readonly modifyRoot: boolean;
  readonly initializeLeafs: boolean;
  readonly tolerateNil: boolean;
  readonly preferShadowPath: boolean;
  readonly ignoreExtraFields: boolean;
  readonly delete: boolean;
  readonly value: { readonly input: SetValue } | undefined;
  readonly trace: TraceContext | undefined;
}

const defaultArgs: RetrieveArgs = {
  partialKeyMatch: false,
  handleWildcards: false,
  modifyRoot: false,
  initializeLeafs: false,
  tolerateNil: false,
  preferShadowPath: false,
  ignoreExtraFields: false,
  delete: false,
  value: undefined,
  trace: undefined,
};

// =============================================================================
// Helpers
// =============================================================================

const matchesRoute = (path: StructuredPath, route: ReadonlyArray<string>): boolean => {
  let end = route.length;
  while (end > 0 && route[end - 1] === "") end--;
  if (path.steps.length < end) return false;
  for (let i = 0; i < end; i++) {
    const step = path.steps[i];
    if (step === undefined || stripModulePrefix(step.name) !== route[i]) return false;
  }
  return true;
};

const isJsonObject = (value: SetValue): value is { readonly [key: string]: JsonValue } =>
  typeof value === "object" && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);

const leafSchemaType = (schema: SchemaEntry) => {
  const type = schema.type;
  if (type === undefined) {
    throw new SchemaMismatchError(`schema ${schema.path()} has no type`, schema.name);
  }
  return type;
};

const childSchemaOf = (
  schema: SchemaEntry,
  node: StructNode,
  name: string,
  spec: FieldSpec,
  args: RetrieveArgs
): SchemaEntry => {
  const found = args.preferShadowPath
    ? resolvePreferShadow(schema, spec, args.trace)
    : resolve(schema, spec, args.trace);
  if (found === undefined) {
    throw new SchemaMismatchError(`could not find schema for type ${node.type.name}, field ${name}`, schema.name);
  }
  return resolveIfLeafRef(found, args.trace);
};

/**
 * Builds the key of a new list entry from the textual key of a path step.
 */
const keyFromPath = (schema: SchemaEntry, list: KeyedList, key: PathKey | undefined): KeyValue => {
  const components: Record<string, ScalarValue> = {};
  for (const keyName of list.keyNames) {
    const text = key?.[keyName];
    if (text === undefined || text === "*") {
      throw new InvalidArgumentError(`cannot create entry of list ${schema.name}: no value given for key ${keyName}`);
    }
    const fieldName = list.type.keyField(keyName);
    const spec = fieldName === undefined ? undefined : list.type.field(fieldName);
    const keySchema = schema.child(keyName);
    if (spec === undefined || spec._tag !== "Leaf" || keySchema === undefined) {
      throw new SchemaMismatchError(`list ${schema.name} has no key leaf ${keyName}`, schema.name);
    }
    components[keyName] = Scalar.decodeText(leafSchemaType(resolveIfLeafRef(keySchema)), spec.repr, text);
  }
  const [only] = list.keyNames;
  const single = only === undefined ? undefined : components[only];
  return list.keyNames.length === 1 && single !== undefined ? single : components;
};

// =============================================================================
// Traversal
// =============================================================================

const retrieve = (
  schema: SchemaEntry | undefined,
  root: FieldValue | undefined,
  path: StructuredPath,
  traversed: StructuredPath,
  args: RetrieveArgs
): TreeMatch[] => {
  if (Path.isEmpty(path)) {
    const value = args.value;
    if (value !== undefined && schema !== undefined && !(schema.isLeaf() || schema.isLeafList())) {
      if (!isJsonObject(value.input) || !isStructNode(root)) {
        throw new InvalidArgumentError(
          `path ${Path.toString(traversed)} points to a node with non-leaf schema ${schema.name}`
        );
      }
      Codec.unmarshal(schema, root, value.input, {
        preferShadowPath: args.preferShadowPath,
        ignoreExtraFields: args.ignoreExtraFields,
        trace: args.trace,
      });
    }
    return [{ path: traversed, schema, data: root }];
  }

  if (root === undefined) {
    if (args.delete || args.tolerateNil) {
      return [];
    }
    throw new PathNotFoundError({
      message: `could not find children ${Path.toString(path)} at path ${Path.toString(traversed)}`,
      remainingPath: Path.toString(path),
      schemaName: schema?.name,
    });
  }
  if (schema === undefined) {
    throw new InvalidArgumentError(`schema is nil for remaining path ${Path.toString(path)}`, Path.toString(path));
  }

  if (isStructNode(root) && (schema.isContainer() || schema.isList())) {
    return retrieveContainer(schema, root, path, traversed, args);
  }
  if (isKeyedList(root) && schema.isList()) {
    return retrieveList(schema, root, path, traversed, args);
  }
  throw new InvalidArgumentError(
    `can not use a parent that is not a container or list; schema ${schema.name}, path ${Path.toString(path)}`,
    Path.toString(path)
  );
};

const retrieveContainer = (
  schema: SchemaEntry,
  node: StructNode,
  path: StructuredPath,
  traversed: StructuredPath,
  args: RetrieveArgs
): TreeMatch[] => {
  args.trace?.log(`container ${schema.name} (${node.type.name}), path ${Path.toString(path)}`);

  for (const [name, spec] of node.type.fieldEntries()) {
    const checkPath = (route: ReadonlyArray<string>, shadowLeaf: boolean): TreeMatch[] => {
      const cschema = childSchemaOf(schema, node, name, spec, args);
      // A keyed list consumes its name and key in a single step.
      const to = spec._tag === "List" ? route.length - 1 : route.length;
      const consumed = path.steps.slice(0, to);
      const next = Path.append(traversed, ...consumed);
      const remaining = Path.make(path.steps.slice(to), path.origin);

      // The path names a shadow of this leaf; there is nothing to store.
      if (shadowLeaf) {
        if (!cschema.isLeaf()) {
          throw new InvalidArgumentError(
            `shadow path traverses a non-leaf node, this is not allowed, path: ${Path.toString(next)}`
          );
        }
        return [{ path: next, schema: undefined, data: undefined }];
      }

      if (args.modifyRoot) {
        initializeField(node, name, spec, args.initializeLeafs);
      }

      if (args.delete) {
        const [only] = remaining.steps;
        const wholeList = spec._tag === "List" && remaining.steps.length === 1 && only !== undefined && only.key === undefined;
        if (Path.isEmpty(remaining) || wholeList) {
          node.set(name, undefined);
          return [];
        }
      }

      const value = args.value;
      if (value !== undefined && Path.isEmpty(remaining)) {
        if (spec._tag === "Leaf") {
          node.set(name, Scalar.decode(leafSchemaType(cschema), spec.repr, value.input));
        } else if (spec._tag === "LeafList") {
          node.set(name, Scalar.decodeList(leafSchemaType(cschema), spec.repr, value.input));
        }
      }

      const matches = indented(args.trace, () => retrieve(cschema, node.get(name), remaining, next, args));

      if (args.delete) {
        const child = node.get(name);
        if ((isStructNode(child) && child.isEmpty()) || (isKeyedList(child) && child.size === 0)) {
          node.set(name, undefined);
        }
      }
      return matches;
    };

    let shadowLeaf = false;
    if (args.preferShadowPath) {
      const shadows = shadowSchemaPaths(spec);
      for (const route of shadows) {
        if (matchesRoute(path, route)) {
          return checkPath(route, false);
        }
      }
      // Primary paths now stand in for the shadow.
      shadowLeaf = shadows.length > 0;
    }
    for (const route of schemaPaths(spec)) {
      if (matchesRoute(path, route)) {
        return checkPath(route, shadowLeaf);
      }
    }
    if (!args.preferShadowPath) {
      for (const route of shadowSchemaPaths(spec)) {
        if (matchesRoute(path, route)) {
          return checkPath(route, true);
        }
      }
    }
  }

  if (args.ignoreExtraFields) {
    return [];
  }
  throw new PathNotFoundError({
    message: `no match found in ${node.type.name} (schema ${schema.name}) for path ${Path.toString(path)}`,
    remainingPath: Path.toString(path),
    schemaName: schema.name,
    typeName: node.type.name,
  });
};

const initializeField = (node: StructNode, name: string, spec: FieldSpec, initializeLeafs: boolean): void => {
  switch (spec._tag) {
    case "Child":
      node.getOrCreateChild(name);
      return;
    case "List":
      node.getOrCreateList(name);
      return;
    case "Leaf":
      if (initializeLeafs && !node.has(name)) node.set(name, zeroValue(spec.repr));
      return;
    case "LeafList":
      if (initializeLeafs && !node.has(name)) node.set(name, []);
      return;
  }
};

const retrieveList = (
  schema: SchemaEntry,
  list: KeyedList,
  path: StructuredPath,
  traversed: StructuredPath,
  args: RetrieveArgs
): TreeMatch[] => {
  const first = Path.head(path);
  if (schema.key.length === 0) {
    throw new InvalidArgumentError(
      `unkeyed list can't be traversed, type ${list.type.name}, path ${Path.toString(path)}`,
      Path.toString(path)
    );
  }
  if (first === undefined) {
    throw new InvalidArgumentError(`path length is 0, schema ${schema.name}`);
  }
  const stepKey = first.key;
  const keyless = stepKey === undefined || Object.keys(stepKey).length === 0;
  if (keyless && !args.partialKeyMatch) {
    throw new InvalidArgumentError(
      `path step ${Path.stepToString(first)} selects no entry of keyed list ${schema.name}`,
      Path.toString(path)
    );
  }

  args.trace?.log(`list ${schema.name} (${list.size} entries), step ${Path.stepToString(first)}`);

  const remaining = Path.pop(path);
  const matches: TreeMatch[] = [];
  for (const [key, entry] of [...list]) {
    const entryKey = list.pathKey(key);
    let match = true;
    for (const keyName of list.keyNames) {
      const want = stepKey?.[keyName];
      if (want === undefined) {
        if (args.partialKeyMatch) continue;
        throw new InvalidArgumentError(
          `path ${Path.toString(path)} does not contain a value for key ${keyName} of list ${schema.name}`,
          Path.toString(path)
        );
      }
      if (args.handleWildcards && want === "*") continue;
      if (want !== entryKey[keyName]) {
        match = false;
        break;
      }
    }
    if (!match) continue;

    if (args.delete && Path.isEmpty(remaining)) {
      list.delete(key);
      return [];
    }
    const found = indented(args.trace, () =>
      retrieve(schema, entry, remaining, Path.append(traversed, Path.step(first.name, entryKey)), args)
    );
    if (args.delete && entry.isEmpty()) {
      list.delete(key);
    }
    matches.push(...found);
    if (!args.partialKeyMatch) {
      return matches;
    }
  }

  if (matches.length === 0 && args.modifyRoot) {
    const entry = list.getOrCreate(keyFromPath(schema, list, stepKey));
    args.trace?.log(`created entry ${Path.stepToString(first)} in ${schema.name}`);
    return indented(args.trace, () => retrieve(schema, entry, remaining, Path.append(traversed, first), args));
  }
  if (matches.length === 0 && !args.partialKeyMatch && !args.delete) {
    throw new PathNotFoundError({
      message: `no entry of list ${schema.name} matches ${Path.stepToString(first)}`,
      remainingPath: Path.toString(path),
      schemaName: schema.name,
      typeName: list.type.name,
    });
  }
  return matches;
};

// =============================================================================
// Operations
// =============================================================================

const checkRoot = (schema: SchemaEntry | undefined, root: StructNode | undefined, path: StructuredPath): void => {
  if (root === undefined) {
    throw new InvalidArgumentError(`root is nil, remaining path ${Path.toString(path)}`, Path.toString(path));
  }
  if (schema === undefined) {
    throw new InvalidArgumentError(`schema is nil for type ${root.type.name}`, Path.toString(path));
  }
};

/**
 * Finds the nodes addressed by `path` below `root`, whose schema is `schema`.
 * Without `partialKeyMatch` at most one node matches.
 */
export const getNode = (
  schema: SchemaEntry | undefined,
  root: StructNode | undefined,
  path: StructuredPath,
  options: GetNodeOptions = {}
): TreeMatch[] => {
  const target = Path.stripAbsoluteMarker(path);
  if (Path.isEmpty(target)) {
    return [{ path: Path.empty, schema, data: root }];
  }
  if (root === undefined && options.tolerateNil === true) {
    return [];
  }
  checkRoot(schema, root, target);
  return retrieve(schema, root, target, Path.make([], target.origin), {
    ...defaultArgs,
    partialKeyMatch: options.partialKeyMatch ?? false,
    handleWildcards: options.partialKeyMatch ?? false,
    tolerateNil: options.tolerateNil ?? false,
    preferShadowPath: options.preferShadowPath ?? false,
    trace: options.trace,
  });
};

/**
 * Decodes `value` into the leaf or leaf-list at `path`. A JSON object value
 * addressed at a container or list entry is unmarshalled into it.
 */
export const setNode = (
  schema: SchemaEntry | undefined,
  root: StructNode | undefined,
  path: StructuredPath,
  value: SetValue,
  options: SetNodeOptions = {}
): void => {
  const target = Path.stripAbsoluteMarker(path);
  checkRoot(schema, root, target);
  const matches = retrieve(schema, root, target, Path.make([], target.origin), {
    ...defaultArgs,
    modifyRoot: options.initMissingElements ?? false,
    preferShadowPath: options.preferShadowPath ?? false,
    ignoreExtraFields: options.ignoreExtraFields ?? false,
    value: { input: value },
    trace: options.trace,
  });
  if (matches.length === 0 && options.ignoreExtraFields !== true) {
    throw new PathNotFoundError({
      message: `unable to find any nodes for the given path ${Path.toString(target)}`,
      remainingPath: Path.toString(target),
      schemaName: schema?.name,
    });
  }
};

/**
 * Returns the node at `path`, creating absent containers, list entries and
 * leaves along the way. Keys are matched exactly.
 */
export const getOrCreateNode = (
  schema: SchemaEntry | undefined,
  root: StructNode | undefined,
  path: StructuredPath,
  options: GetOrCreateNodeOptions = {}
): TreeMatch => {
  const target = Path.stripAbsoluteMarker(path);
  checkRoot(schema, root, target);
  const [match] = retrieve(schema, root, target, Path.make([], target.origin), {
    ...defaultArgs,
    modifyRoot: true,
    initializeLeafs: true,
    preferShadowPath: options.preferShadowPath ?? false,
    trace: options.trace,
  });
  if (match === undefined) {
    throw new PathNotFoundError({
      message: `no node created for path ${Path.toString(target)}`,
      remainingPath: Path.toString(target),
      schemaName: schema?.name,
    });
  }
  return match;
};

/**
 * Unsets the node at `path`. Containers and lists left empty along the path
 * are unset too. Deleting something already absent is a no-op.
 */
export const deleteNode = (
  schema: SchemaEntry | undefined,
  root: StructNode | undefined,
  path: StructuredPath,
  options: DeleteNodeOptions = {}
): void => {
  const target = Path.stripAbsoluteMarker(path);
  checkRoot(schema, root, target);
  if (root === undefined) return;
  if (Path.isEmpty(target)) {
    root.clear();
    return;
  }
  retrieve(schema, root, target, Path.make([], target.origin), {
    ...defaultArgs,
    delete: true,
    preferShadowPath: options.preferShadowPath ?? false,
    trace: options.trace,
  });
};

// =============================================================================
// Types Only
// =============================================================================

type TypeRef =
  | { readonly _tag: "Struct"; readonly type: NodeType }
  | { readonly _tag: "Collection"; readonly field: ListField }
  | { readonly _tag: "Scalar"; readonly field: LeafField | LeafListField };

const refOf = (spec: FieldSpec): TypeRef => {
  switch (spec._tag) {
    case "Child":
      return { _tag: "Struct", type: spec.type() };
    case "List":
      return { _tag: "Collection", field: spec };
    case "Leaf":
    case "LeafList":
      return { _tag: "Scalar", field: spec };
  }
};

const instantiate = (ref: TypeRef): NodeValue => {
  switch (ref._tag) {
    case "Struct":
      return ref.type.create();
    case "Collection":
      return new KeyedList(ref.field.type(), ref.field.key);
    case "Scalar":
      return ref.field._tag === "Leaf" ? zeroValue(ref.field.repr) : [];
  }
};

const newNodeOf = (ref: TypeRef, path: StructuredPath, trace: TraceContext | undefined): NodeValue => {
  if (Path.isEmpty(path)) {
    return instantiate(ref);
  }
  switch (ref._tag) {
    case "Struct": {
      trace?.log(`new node: type ${ref.type.name}, path ${Path.toString(path)}`);
      for (const [, spec] of ref.type.fieldEntries()) {
        for (const route of schemaPaths(spec)) {
          if (!matchesRoute(path, route)) continue;
          const to = spec._tag === "List" ? route.length - 1 : route.length;
          const rest = Path.make(path.steps.slice(to), path.origin);
          return indented(trace, () => newNodeOf(refOf(spec), rest, trace));
        }
      }
      throw new PathNotFoundError({
        message: `could not find path in tree beyond type ${ref.type.name}, remaining path ${Path.toString(path)}`,
        remainingPath: Path.toString(path),
        typeName: ref.type.name,
      });
    }
    case "Collection":
      // No data exists yet, so the key of the step is irrelevant.
      return newNodeOf({ _tag: "Struct", type: ref.field.type() }, Path.pop(path), trace);
    case "Scalar":
      throw new InvalidArgumentError(
        `path ${Path.toString(path)} continues below a leaf`,
        Path.toString(path)
      );
  }
};

/**
 * Creates a zero-valued instance of the type found at `path` below
 * `rootType`. Works on types alone, without data or schema.
 */
export const newNode = (rootType: NodeType, path: StructuredPath, options: { readonly trace?: TraceContext } = {}): NodeValue =>
  newNodeOf({ _tag: "Struct", type: rootType }, Path.stripAbsoluteMarker(path), options.trace);

// =============================================================================
// Status Entry Points
// =============================================================================

export interface LegacyResult<A> {
  readonly value: A | undefined;
  readonly status: Status;
}

/**
 * Status-returning form of {@link getNode}: a single, strictly keyed match.
 */
export const legacyGetNode = (
  schema: SchemaEntry | undefined,
  root: StructNode | undefined,
  path: StructuredPath
): LegacyResult<FieldValue> & { readonly schema: SchemaEntry | undefined } => {
  try {
    const [match] = getNode(schema, root, path);
    if (match === undefined) {
      return { value: undefined, schema: undefined, status: { code: "NOT_FOUND", message: `no node at ${Path.toString(path)}` } };
    }
    return { value: match.data, schema: match.schema, status: statusOk };
  } catch (error) {
    return { value: undefined, schema: undefined, status: toStatus(error) };
  }
};

/**
 * Status-returning form of {@link newNode}.
 */
export const legacyNewNode = (rootType: NodeType, path: StructuredPath): LegacyResult<NodeValue> => {
  try {
    return { value: newNode(rootType, path), status: statusOk };
  } catch (error) {
    return { value: undefined, status: toStatus(error) };
  }
};
