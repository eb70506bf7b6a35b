import { ConstraintViolationError, TreeEngineError } from "./errors";
import * as Leafref from "./Leafref";
import type { KeyedList, ScalarValue, StructNode } from "./Node";
import { isKeyedList, isScalarValue, isStructNode, keyValueAsString, scalarEquals } from "./Node";
import { getNode } from "./Navigator";
import * as Path from "./Path";
import type { PathStep, StructuredPath } from "./Path";
import * as Scalar from "./Scalar";
import type { SchemaEntry } from "./Schema";
import { canonicalRoute, resolve } from "./SchemaPaths";
import type { TraceContext } from "./Trace";
import { indented } from "./Trace";

export interface ValidateOptions {
  /** Skip leafref referential integrity checks entirely. */
  readonly ignoreMissingData?: boolean;
  /** Report leafref failures to the trace instead of returning them. */
  readonly logLeafrefErrors?: boolean;
  readonly trace?: TraceContext;
}

interface LeafrefSite {
  readonly entry: SchemaEntry;
  readonly path: StructuredPath;
  readonly values: ReadonlyArray<ScalarValue>;
}

const stepsOf = (route: ReadonlyArray<string>): PathStep[] => route.map((name) => Path.step(name));

const asViolation = (error: unknown, kind: "schema" | "leafref", schemaPath: string): ConstraintViolationError => {
  if (error instanceof ConstraintViolationError) return error;
  if (error instanceof TreeEngineError) return new ConstraintViolationError(kind, schemaPath, error.message);
  throw error;
};

// =============================================================================
// Structure & Scalars
// =============================================================================

const checkListKeys = (entry: SchemaEntry, list: KeyedList, errors: ConstraintViolationError[]): void => {
  const schemaPath = entry.path();
  if (entry.key.length === 0) {
    errors.push(new ConstraintViolationError("key", schemaPath, "unkeyed list cannot be held in a keyed collection"));
    return;
  }
  const declared = [...entry.key].sort().join(",");
  const generated = [...list.keyNames].sort().join(",");
  if (declared !== generated) {
    errors.push(
      new ConstraintViolationError("key", schemaPath, `schema declares key (${declared}), generated type uses (${generated})`)
    );
    return;
  }

  for (const [key, element] of list) {
    for (const keyName of list.keyNames) {
      const fieldName = element.type.keyField(keyName);
      const expected = list.keyComponent(key, keyName);
      const actual = fieldName === undefined ? undefined : element.leaf(fieldName);
      if (expected === undefined || actual === undefined || !scalarEquals(expected, actual)) {
        errors.push(
          new ConstraintViolationError(
            "key",
            schemaPath,
            `key field ${keyName} has value ${actual === undefined ? "unset" : keyValueAsString(actual)}, ` +
              `map key has ${expected === undefined ? "unset" : keyValueAsString(expected)}`
          )
        );
      }
    }
  }
};

const visit = (
  schema: SchemaEntry,
  node: StructNode,
  dataPath: StructuredPath,
  errors: ConstraintViolationError[],
  sites: LeafrefSite[],
  options: ValidateOptions
): void => {
  options.trace?.log(`validate ${node.type.name} at ${Path.toString(dataPath)}`);

  for (const [name, spec, value] of node.fields()) {
    if (value === undefined) continue;
    const where = `${schema.path()}/${name}`;

    let entry: SchemaEntry | undefined;
    let route: string[];
    try {
      entry = resolve(schema, spec, options.trace);
      route = canonicalRoute(spec);
    } catch (error) {
      errors.push(asViolation(error, "schema", where));
      continue;
    }
    if (entry === undefined) {
      errors.push(new ConstraintViolationError("schema", where, `no schema for field ${name} of ${node.type.name}`));
      continue;
    }
    const path = Path.append(dataPath, ...stepsOf(route));

    if (isStructNode(value)) {
      const child = entry;
      indented(options.trace, () => visit(child, value, path, errors, sites, options));
      continue;
    }

    if (isKeyedList(value)) {
      checkListKeys(entry, value, errors);
      const listName = route[route.length - 1] ?? name;
      const base = Path.append(dataPath, ...stepsOf(route.slice(0, -1)));
      for (const [key, element] of value) {
        const elementPath = Path.append(base, Path.step(listName, value.pathKey(key)));
        const listEntry = entry;
        indented(options.trace, () => visit(listEntry, element, elementPath, errors, sites, options));
      }
      continue;
    }

    const values = isScalarValue(value) ? [value] : value;
    let target: SchemaEntry;
    try {
      target = Leafref.resolveIfLeafRef(entry, options.trace);
    } catch (error) {
      errors.push(asViolation(error, "schema", entry.path()));
      continue;
    }
    const type = target.type;
    if (type === undefined) {
      errors.push(new ConstraintViolationError("schema", entry.path(), "leaf has no type"));
      continue;
    }
    for (const v of values) {
      errors.push(...Scalar.check(type, v, entry.path()));
    }
    if (entry.isLeafRef()) {
      sites.push({ entry, path, values });
    }
  }
};

// =============================================================================
// Referential Integrity
// =============================================================================

const relativeTo = (base: StructuredPath, relative: string): StructuredPath | undefined => {
  const steps = [...base.steps];
  for (const segment of relative.split("/")) {
    if (segment === "" || segment === ".") continue;
    if (segment === "..") {
      if (steps.pop() === undefined) return undefined;
      continue;
    }
    steps.push(Path.step(segment));
  }
  return Path.make(steps);
};

const valuesAt = (rootSchema: SchemaEntry, root: StructNode, path: StructuredPath): ScalarValue[] =>
  getNode(rootSchema, root, path, { partialKeyMatch: true, tolerateNil: true }).flatMap((match) => {
    const data = match.data;
    if (data === undefined || isStructNode(data) || isKeyedList(data)) return [];
    return isScalarValue(data) ? [data] : [...data];
  });

/**
 * Builds the data path a leafref expression designates for the leaf at
 * `site.path`, with key predicates replaced by the values they refer to.
 */
const targetPath = (rootSchema: SchemaEntry, root: StructNode, site: LeafrefSite, expr: string): StructuredPath => {
  const parsed = Leafref.parse(expr);
  const steps: PathStep[] = parsed.absolute ? [] : [...site.path.steps];

  let exprSteps = parsed.steps;
  const [first] = exprSteps;
  if (parsed.absolute && !rootSchema.fakeRoot && first !== undefined && first.name === rootSchema.name) {
    exprSteps = exprSteps.slice(1);
  }

  for (const exprStep of exprSteps) {
    if (exprStep.name === "..") {
      if (steps.pop() === undefined) {
        throw new ConstraintViolationError("leafref", site.entry.path(), `path ${expr} climbs above the root`);
      }
      continue;
    }
    if (exprStep.predicates.length === 0) {
      steps.push(Path.step(exprStep.name));
      continue;
    }
    const key: Record<string, string> = {};
    for (const predicate of exprStep.predicates) {
      if (predicate.literal) {
        key[predicate.key] = predicate.value;
        continue;
      }
      const at = relativeTo(site.path, predicate.value);
      const found = at === undefined ? [] : valuesAt(rootSchema, root, at);
      const [only] = found;
      if (found.length > 1) {
        throw new ConstraintViolationError(
          "leafref",
          site.entry.path(),
          `expect single node to match value at path ${predicate.value}, got ${found.length}`
        );
      }
      key[predicate.key] = only === undefined ? "" : keyValueAsString(only);
    }
    steps.push(Path.step(exprStep.name, key));
  }
  return Path.make(steps);
};

const checkLeafref = (rootSchema: SchemaEntry, root: StructNode, site: LeafrefSite): ConstraintViolationError[] => {
  const expr = site.entry.type?.path ?? "";
  const schemaPath = site.entry.path();
  let targets: ScalarValue[];
  try {
    targets = valuesAt(rootSchema, root, targetPath(rootSchema, root, site, expr));
  } catch (error) {
    return [asViolation(error, "leafref", schemaPath)];
  }

  const out: ConstraintViolationError[] = [];
  for (const value of site.values) {
    if (targets.length === 0) {
      out.push(
        new ConstraintViolationError(
          "leafref",
          schemaPath,
          `pointed-to value with path ${expr} from value ${keyValueAsString(value)} is empty set`
        )
      );
      continue;
    }
    if (!targets.some((target) => scalarEquals(value, target))) {
      out.push(
        new ConstraintViolationError(
          "leafref",
          schemaPath,
          `value ${keyValueAsString(value)} has leafref path ${expr} not equal to any target nodes`
        )
      );
    }
  }
  return out;
};

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Checks `node` against `schema` and returns every violation found; an empty
 * result means the tree is valid. Leafref integrity is checked only when
 * `schema` is the root of its schema tree, since targets may lie anywhere in
 * the tree.
 */
export const validate = (schema: SchemaEntry, node: StructNode, options: ValidateOptions = {}): ConstraintViolationError[] => {
  const errors: ConstraintViolationError[] = [];
  const sites: LeafrefSite[] = [];
  visit(schema, node, Path.empty, errors, sites, options);

  if (options.ignoreMissingData === true) {
    return errors;
  }
  if (schema.parent !== undefined) {
    options.trace?.log(`leafref checks skipped: ${schema.path()} is not the schema root`);
    return errors;
  }

  for (const site of sites) {
    const failures = checkLeafref(schema, node, site);
    if (options.logLeafrefErrors === true) {
      for (const failure of failures) options.trace?.log(`leafref: ${failure.message}`);
      continue;
    }
    errors.push(...failures);
  }
  return errors;
};
