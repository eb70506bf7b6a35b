/**
 * sylvan-effect
 *
 * Effect services for the sylvan tree engine.
 */

// =============================================================================
// Engine Service
// =============================================================================

export * as TreeEngine from "./TreeEngine";

// =============================================================================
// Configuration
// =============================================================================

export * as EngineConfig from "./EngineConfig";

// =============================================================================
// Tree Index
// =============================================================================

export * as TreeIndex from "./TreeIndex";

// =============================================================================
// Observability
// =============================================================================

export * as Metrics from "./Metrics";

// =============================================================================
// Errors
// =============================================================================

export * from "./Errors";
