import { ConstraintViolationError, InvalidArgumentError } from "./errors";
import type { Repr, ScalarValue } from "./Node";
import { isScalarValue } from "./Node";
import { isIntegerKind, stripModulePrefix } from "./Schema";
import type { Bounds, IntegerKind, ScalarType } from "./Schema";

// =============================================================================
// Integer Limits
// =============================================================================

const INTEGER_LIMITS: Record<IntegerKind, { readonly min: bigint; readonly max: bigint }> = {
  int8: { min: -(2n ** 7n), max: 2n ** 7n - 1n },
  int16: { min: -(2n ** 15n), max: 2n ** 15n - 1n },
  int32: { min: -(2n ** 31n), max: 2n ** 31n - 1n },
  int64: { min: -(2n ** 63n), max: 2n ** 63n - 1n },
  uint8: { min: 0n, max: 2n ** 8n - 1n },
  uint16: { min: 0n, max: 2n ** 16n - 1n },
  uint32: { min: 0n, max: 2n ** 32n - 1n },
  uint64: { min: 0n, max: 2n ** 64n - 1n },
};

const asBigInt = (value: number | bigint): bigint | undefined =>
  typeof value === "bigint" ? value : Number.isInteger(value) ? BigInt(value) : undefined;

const compare = (a: number | bigint, b: number | bigint): number => {
  if (typeof a === "bigint" && typeof b === "bigint") return a < b ? -1 : a > b ? 1 : 0;
  const x = Number(a);
  const y = Number(b);
  return x < y ? -1 : x > y ? 1 : 0;
};

const withinBounds = (value: number | bigint, bounds: Bounds): boolean =>
  (bounds.min === undefined || compare(value, bounds.min) >= 0) &&
  (bounds.max === undefined || compare(value, bounds.max) <= 0);

const formatBounds = (ranges: ReadonlyArray<Bounds>): string =>
  ranges.map((r) => `${r.min === undefined ? "min" : String(r.min)}..${r.max === undefined ? "max" : String(r.max)}`).join(" | ");

/**
 * Compiles a pattern anchored at both ends. `undefined` when the pattern
 * is not a valid regular expression.
 */
const anchored = (pattern: string): RegExp | undefined => {
  try {
    return new RegExp(`^(?:${pattern})$`, "u");
  } catch (error) {
    if (error instanceof SyntaxError) return undefined;
    throw error;
  }
};

// =============================================================================
// Checks
// =============================================================================

const expectedRepr = (type: ScalarType): ReadonlyArray<Repr> => {
  switch (type.kind) {
    case "string":
    case "enumeration":
    case "identityref":
      return ["string"];
    case "boolean":
    case "empty":
      return ["boolean"];
    case "binary":
      return ["bytes"];
    case "decimal64":
      return ["number"];
    case "int64":
    case "uint64":
      return ["bigint", "number"];
    case "union":
      return (type.members ?? []).flatMap(expectedRepr);
    case "leafref":
      return ["string", "number", "bigint", "boolean", "bytes"];
    default:
      return ["number", "bigint"];
  }
};

export const reprOf = (value: ScalarValue): Repr => {
  if (value instanceof Uint8Array) return "bytes";
  if (typeof value === "string") return "string";
  if (typeof value === "number") return "number";
  if (typeof value === "bigint") return "bigint";
  return "boolean";
};

/**
 * Checks `value` against the constraints of `type`. Returns one violation
 * per failed constraint; an empty result means the value is valid.
 */
export const check = (type: ScalarType, value: ScalarValue, schemaPath: string): ConstraintViolationError[] => {
  const repr = reprOf(value);
  if (!expectedRepr(type).includes(repr)) {
    return [new ConstraintViolationError("type", schemaPath, `${repr} value is not valid for ${type.kind} type`)];
  }

  if (type.kind === "union") {
    const members = type.members ?? [];
    if (members.length === 0) {
      return [new ConstraintViolationError("union", schemaPath, "union type declares no member types")];
    }
    const ok = members.some((member) => check(member, value, schemaPath).length === 0);
    return ok
      ? []
      : [new ConstraintViolationError("union", schemaPath, `value ${String(value)} does not match any union member type`)];
  }

  const errors: ConstraintViolationError[] = [];

  if (isIntegerKind(type.kind) && (typeof value === "number" || typeof value === "bigint")) {
    const n = asBigInt(value);
    const limits = INTEGER_LIMITS[type.kind];
    if (n === undefined) {
      errors.push(new ConstraintViolationError("type", schemaPath, `${value} is not an integer`));
    } else if (n < limits.min || n > limits.max) {
      errors.push(new ConstraintViolationError("range", schemaPath, `${n} is outside the ${type.kind} range`));
    }
  }

  if ((isIntegerKind(type.kind) || type.kind === "decimal64") && (typeof value === "number" || typeof value === "bigint")) {
    const ranges = type.ranges ?? [];
    if (ranges.length > 0 && !ranges.some((r) => withinBounds(value, r))) {
      errors.push(
        new ConstraintViolationError("range", schemaPath, `${String(value)} is outside range ${formatBounds(ranges)}`)
      );
    }
  }

  if (type.kind === "string" && typeof value === "string") {
    const lengths = type.lengths ?? [];
    const length = [...value].length;
    if (lengths.length > 0 && !lengths.some((r) => withinBounds(length, r))) {
      errors.push(
        new ConstraintViolationError("length", schemaPath, `length ${length} is outside range ${formatBounds(lengths)}`)
      );
    }
    for (const pattern of type.patterns ?? []) {
      const regex = anchored(pattern);
      if (regex === undefined) {
        errors.push(new ConstraintViolationError("pattern", schemaPath, `pattern ${pattern} cannot be compiled`));
      } else if (!regex.test(value)) {
        errors.push(new ConstraintViolationError("pattern", schemaPath, `${value} does not match pattern ${pattern}`));
      }
    }
  }

  if (type.kind === "binary" && value instanceof Uint8Array) {
    const lengths = type.lengths ?? [];
    if (lengths.length > 0 && !lengths.some((r) => withinBounds(value.length, r))) {
      errors.push(
        new ConstraintViolationError("length", schemaPath, `length ${value.length} is outside range ${formatBounds(lengths)}`)
      );
    }
  }

  if ((type.kind === "enumeration" || type.kind === "identityref") && typeof value === "string") {
    const allowed = type.enumValues ?? [];
    if (!allowed.includes(stripModulePrefix(value))) {
      errors.push(new ConstraintViolationError("enum", schemaPath, `${value} is not one of ${allowed.join(", ")}`));
    }
  }

  return errors;
};

// =============================================================================
// Decoding
// =============================================================================

const INTEGER_TEXT = /^[-+]?\d+$/;
const DECIMAL_TEXT = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

const mismatch = (input: unknown, repr: Repr, type: ScalarType): InvalidArgumentError =>
  new InvalidArgumentError(
    `cannot use ${describeInput(input)} as ${repr} value of ${type.kind} type`
  );

const describeInput = (input: unknown): string => {
  if (input === null) return "null";
  if (Array.isArray(input)) return "array";
  if (input instanceof Uint8Array) return "bytes";
  return `${typeof input} ${typeof input === "object" ? "" : String(input)}`.trim();
};

const isEmptyMarker = (input: unknown): boolean =>
  Array.isArray(input) && input.length === 1 && input[0] === null;

const BASE64_TEXT = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const decodeInteger = (type: ScalarType, repr: Repr, input: unknown): bigint => {
  if (typeof input === "bigint") return input;
  if (typeof input === "number" && Number.isInteger(input)) return BigInt(input);
  if (typeof input === "string" && INTEGER_TEXT.test(input)) return BigInt(input);
  throw mismatch(input, repr, type);
};

/**
 * Integer leaves only take whole values within the width of their kind.
 */
const decodeSized = (type: ScalarType & { kind: IntegerKind }, repr: Repr, input: unknown): ScalarValue => {
  const n = decodeInteger(type, repr, input);
  const limits = INTEGER_LIMITS[type.kind];
  if (n < limits.min || n > limits.max) {
    throw new InvalidArgumentError(`${n} is outside the ${type.kind} range`);
  }
  if (repr === "bigint") return n;
  if (n < BigInt(Number.MIN_SAFE_INTEGER) || n > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw mismatch(input, repr, type);
  }
  return Number(n);
};

const isSized = (type: ScalarType): type is ScalarType & { kind: IntegerKind } => isIntegerKind(type.kind);

/**
 * Decodes an input value into the representation of a leaf. Accepts the
 * native representation and the interchange forms: integers as decimal
 * strings, binary as base64, empty as `[null]`, identityref values with a
 * module prefix.
 */
export const decode = (type: ScalarType, repr: Repr, input: unknown): ScalarValue => {
  if (isSized(type) && (repr === "number" || repr === "bigint")) {
    return decodeSized(type, repr, input);
  }
  switch (repr) {
    case "string": {
      if (typeof input !== "string") throw mismatch(input, repr, type);
      if (type.kind !== "enumeration" && type.kind !== "identityref") return input;
      const name = type.kind === "identityref" ? stripModulePrefix(input) : input;
      const allowed = type.enumValues ?? [];
      if (allowed.length > 0 && !allowed.includes(name)) {
        throw new InvalidArgumentError(`${input} is not a value of ${type.kind} type (${allowed.join(", ")})`);
      }
      return name;
    }
    case "boolean": {
      if (typeof input === "boolean") return input;
      if (type.kind === "empty" && isEmptyMarker(input)) return true;
      throw mismatch(input, repr, type);
    }
    case "bigint":
      return decodeInteger(type, repr, input);
    case "number": {
      if (typeof input === "number") return input;
      if (typeof input === "bigint" && input >= BigInt(Number.MIN_SAFE_INTEGER) && input <= BigInt(Number.MAX_SAFE_INTEGER)) {
        return Number(input);
      }
      if (typeof input === "string" && DECIMAL_TEXT.test(input)) return Number(input);
      throw mismatch(input, repr, type);
    }
    case "bytes": {
      if (input instanceof Uint8Array) return input;
      if (typeof input === "string" && BASE64_TEXT.test(input)) return new Uint8Array(Buffer.from(input, "base64"));
      throw mismatch(input, repr, type);
    }
  }
};

/**
 * Decodes the textual form used in path keys.
 */
export const decodeText = (type: ScalarType, repr: Repr, text: string): ScalarValue => {
  if (repr === "boolean") {
    if (text === "true") return true;
    if (text === "false") return false;
    throw mismatch(text, repr, type);
  }
  return decode(type, repr, text);
};

/**
 * Decodes every element of a leaf-list input.
 */
export const decodeList = (type: ScalarType, repr: Repr, input: unknown): ScalarValue[] => {
  if (!Array.isArray(input)) {
    if (isScalarValue(input)) {
      return [decode(type, repr, input)];
    }
    throw mismatch(input, repr, type);
  }
  return input.map((element: unknown) => decode(type, repr, element));
};
