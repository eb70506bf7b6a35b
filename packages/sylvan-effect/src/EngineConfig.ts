/**
 * Configuration of the tree engine service.
 */
import * as Context from "effect/Context";
import * as Layer from "effect/Layer";
import type { Merge, Navigator, Node, Schema, Validate } from "sylvan";

// =============================================================================
// Engine Configuration
// =============================================================================

/** Navigator defaults applied to lookups. The trace is owned by the engine. */
export type GetNodeDefaults = Omit<Navigator.GetNodeOptions, "trace">;

/** Navigator defaults applied to writes. */
export type SetNodeDefaults = Omit<Navigator.SetNodeOptions, "trace">;

export type ValidationDefaults = Omit<Validate.ValidateOptions, "trace">;

export interface EngineConfig {
  /**
   * Root of the schema tree every operation starts from.
   */
  readonly schema: Schema.SchemaEntry;

  /**
   * Generated type of the root node. Used to create fresh roots.
   */
  readonly rootType: Node.NodeType;

  /**
   * Collect the engine's decision trace for each call and emit it as debug
   * log lines.
   * @default false
   */
  readonly trace: boolean;

  /**
   * @default {}
   */
  readonly getNode: GetNodeDefaults;

  /**
   * @default { initMissingElements: true }
   */
  readonly setNode: SetNodeDefaults;

  /**
   * @default {}
   */
  readonly validation: ValidationDefaults;

  /**
   * @default {}
   */
  readonly mergePolicy: Merge.MergePolicy;
}

export interface EngineConfigOptions {
  readonly schema: Schema.SchemaEntry;
  readonly rootType: Node.NodeType;
  readonly trace?: boolean;
  readonly getNode?: GetNodeDefaults;
  readonly setNode?: SetNodeDefaults;
  readonly validation?: ValidationDefaults;
  readonly mergePolicy?: Merge.MergePolicy;
}

/**
 * Create an EngineConfig from options.
 */
export const make = (options: EngineConfigOptions): EngineConfig => ({
  schema: options.schema,
  rootType: options.rootType,
  trace: options.trace ?? false,
  getNode: options.getNode ?? {},
  setNode: options.setNode ?? { initMissingElements: true },
  validation: options.validation ?? {},
  mergePolicy: options.mergePolicy ?? {},
});

// =============================================================================
// Context Tag
// =============================================================================

export class EngineConfigTag extends Context.Tag("sylvan-effect/EngineConfig")<
  EngineConfigTag,
  EngineConfig
>() {}

/**
 * Create a Layer that provides EngineConfig.
 */
export const layer = (options: EngineConfigOptions): Layer.Layer<EngineConfigTag> =>
  Layer.succeed(EngineConfigTag, make(options));
