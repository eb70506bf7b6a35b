/**
 * Schema-aware tree engine: navigation, diff, merge and validation over
 * schema-described configuration trees.
 */

export * as Schema from "./Schema";
export * as Path from "./Path";
export * as Node from "./Node";
export * as SchemaPaths from "./SchemaPaths";
export * as Leafref from "./Leafref";
export * as Scalar from "./Scalar";
export * as Navigator from "./Navigator";
export * as Codec from "./Codec";
export * as Diff from "./Diff";
export * as Merge from "./Merge";
export * as Validate from "./Validate";
export * as Trace from "./Trace";
export * from "./errors";
