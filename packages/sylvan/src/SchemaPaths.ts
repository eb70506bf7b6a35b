import { SchemaMismatchError } from "./errors";
import type { FieldSpec } from "./Node";
import { firstNonChoiceOrCase, stripModulePrefix, stripModulePrefixes } from "./Schema";
import type { SchemaEntry } from "./Schema";
import type { TraceContext } from "./Trace";

const splitRoute = (route: string): string[] =>
  (route.startsWith("/") ? route.slice(1) : route).split("/");

const alternatives = (tag: string): string[][] => tag.split("|").map(splitRoute);

/**
 * Every path alternative of a field, module prefixes stripped. A field
 * carrying a `rootName` answers to that name first.
 */
export const schemaPaths = (field: FieldSpec): string[][] => {
  const out: string[][] = [];
  if (field.rootName !== undefined && field.rootName !== "") {
    out.push(splitRoute(field.rootName));
  }
  if (field.path === "") {
    if (out.length === 0) {
      throw new SchemaMismatchError(`field of kind ${field._tag} did not specify a path`);
    }
    return out;
  }
  for (const alt of alternatives(field.path)) {
    out.push(stripModulePrefixes(alt));
  }
  return out;
};

/**
 * Shadow path alternatives of a field; empty when it declares none.
 */
export const shadowSchemaPaths = (field: FieldSpec): string[][] =>
  field.shadowPath === undefined || field.shadowPath === ""
    ? []
    : alternatives(field.shadowPath).map(stripModulePrefixes);

const pickRoute = (tag: string, what: string): string[] => {
  const alts = alternatives(tag);
  const [only] = alts;
  if (alts.length === 1 && only !== undefined) {
    return only;
  }
  const route = alts.find((alt) => alt.length > 1);
  if (route === undefined) {
    throw new SchemaMismatchError(`${what} ${tag} has alternatives but none of the form a/b`);
  }
  return route;
};

/**
 * The schema route of a field: its only path, or its first multi-segment
 * alternative when several are declared. Module prefixes are kept.
 */
export const pathToSchema = (field: FieldSpec): string[] => {
  if (field.path === "") {
    throw new SchemaMismatchError(`field of kind ${field._tag} did not specify a path`);
  }
  return pickRoute(field.path, "path");
};

/**
 * Route a field occupies in data paths, relative to its enclosing node.
 */
export const canonicalRoute = (field: FieldSpec): string[] =>
  field.rootName !== undefined && field.rootName !== ""
    ? splitRoute(field.rootName)
    : stripModulePrefixes(pathToSchema(field));

const walk = (entry: SchemaEntry, route: ReadonlyArray<string>, trace?: TraceContext): SchemaEntry | undefined => {
  let segments = route;
  const [first] = segments;
  // Field routes of a container may repeat the container's own name.
  if (entry.isContainer() && segments.length > 1 && first !== undefined && stripModulePrefix(first) === entry.name) {
    segments = segments.slice(1);
  }

  let current = entry;
  for (const segment of segments) {
    const name = stripModulePrefix(segment);
    const next = current.child(name);
    if (next !== undefined) {
      current = next;
      continue;
    }
    // Entries under choice and case nodes carry only their own name.
    const below = firstNonChoiceOrCase(current).get(name);
    if (below === undefined) {
      trace?.log(`${segment} not found in ${current.name}`);
      return undefined;
    }
    trace?.log(`${segment} found below choice/case of ${current.name}`);
    current = below;
  }
  return current;
};

/**
 * Resolves the schema entry of `field`, relative to the entry of the node
 * that declares it. Returns undefined when the route does not exist in the
 * schema.
 */
export const resolve = (entry: SchemaEntry, field: FieldSpec, trace?: TraceContext): SchemaEntry | undefined => {
  if (field.rootName !== undefined && field.rootName !== "") {
    return entry.child(field.rootName);
  }
  const found = walk(entry, pathToSchema(field), trace);
  trace?.log(`resolve ${field.path} in ${entry.name}: ${found === undefined ? "not found" : found.path()}`);
  return found;
};

/**
 * Like {@link resolve}, but follows the shadow path when the field has one.
 */
export const resolvePreferShadow = (
  entry: SchemaEntry,
  field: FieldSpec,
  trace?: TraceContext
): SchemaEntry | undefined => {
  if (field.shadowPath === undefined || field.shadowPath === "") {
    return resolve(entry, field, trace);
  }
  return walk(entry, pickRoute(field.shadowPath, "shadow path"), trace);
};

/**
 * Like {@link resolve}, but a missing entry is a schema mismatch.
 */
export const resolveOrThrow = (
  entry: SchemaEntry,
  field: FieldSpec,
  typeName: string,
  fieldName: string,
  trace?: TraceContext
): SchemaEntry => {
  const found = resolve(entry, field, trace);
  if (found === undefined) {
    throw new SchemaMismatchError(
      `could not find schema for type ${typeName}, field ${fieldName} (path ${field.path}) below ${entry.path()}`,
      entry.name
    );
  }
  return found;
};
