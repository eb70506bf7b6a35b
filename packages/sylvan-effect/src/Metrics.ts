/**
 * Engine metrics using Effect's Metric API.
 */
import { Metric, MetricBoundaries } from "effect";

// =============================================================================
// Navigation Metrics
// =============================================================================

/**
 * Lookups served by getNode
 */
export const lookups = Metric.counter("sylvan.lookups.total");

/**
 * Nodes returned per lookup
 */
export const lookupMatches = Metric.histogram(
  "sylvan.lookups.matches",
  MetricBoundaries.exponential({ start: 1, factor: 2, count: 10 })
);

/**
 * Writes through setNode, getOrCreateNode and deleteNode
 */
export const writes = Metric.counter("sylvan.writes.total");

/**
 * Operations that failed with an engine error
 */
export const failures = Metric.counter("sylvan.failures.total");

// =============================================================================
// Validation Metrics
// =============================================================================

export const validations = Metric.counter("sylvan.validations.total");

/**
 * Constraint violations found, across all validations
 */
export const violations = Metric.counter("sylvan.validations.violations");

// =============================================================================
// Diff & Merge Metrics
// =============================================================================

export const diffs = Metric.counter("sylvan.diffs.total");

/**
 * Updates produced per diff
 */
export const diffUpdates = Metric.histogram(
  "sylvan.diffs.updates",
  MetricBoundaries.exponential({ start: 1, factor: 2, count: 12 })
);

export const merges = Metric.counter("sylvan.merges.total");
