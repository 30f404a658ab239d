/**
 * CVSS v2 / v3.x Type Definitions
 *
 * Based on the FIRST CVSS specification documents
 * https://www.first.org/cvss/v2/guide
 * https://www.first.org/cvss/v3.1/specification-document
 */

// =============================================================================
// Versions
// =============================================================================

/** Supported vector formats. All 3.x minor versions share one format. */
export type CvssVersion = '2' | '3';

// =============================================================================
// Parsed Vectors
// =============================================================================

/**
 * Metric identifier -> value code, in order of first appearance.
 * Identifiers keep the case they had in the vector (`Au`, `AV`, ...).
 */
export type MetricPairs = Record<string, string>;

// =============================================================================
// Lookup Tables
// =============================================================================

export interface MetricValueEntry {
  /** Display label, e.g. "Network" */
  label: string;
  /** Explanatory sentence */
  description: string;
}

/** Value code -> entry for one metric in one CVSS version */
export type MetricTable = Readonly<Record<string, MetricValueEntry>>;

export type TableName =
  | 'accessVector'
  | 'accessComplexityV2'
  | 'accessComplexityV3'
  | 'authentication'
  | 'privilegesRequired'
  | 'userInteraction'
  | 'scope'
  | 'confidentialityV2'
  | 'integrityV2'
  | 'availabilityV2'
  | 'confidentialityV3'
  | 'integrityV3'
  | 'availabilityV3';

// =============================================================================
// Resolved Definitions
// =============================================================================

export interface MetricDefinition {
  /** Identifier as it appeared in the vector */
  identifier: string;
  /** Value code as it appeared in the vector */
  value: string;
  label: string;
  code: string;
  description: string;
  /** Full definition, e.g. "Network (N): The attacker can remotely exploit the vulnerability." */
  text: string;
}

/** Identifier -> definition, in the order the identifiers were parsed */
export type MetricDefinitions = Record<string, MetricDefinition>;

export interface VectorExplanation {
  version: CvssVersion;
  /** The trimmed input vector */
  vector: string;
  metrics: MetricPairs;
  definitions: MetricDefinitions;
}
