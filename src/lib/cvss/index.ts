/**
 * CVSS Vector Explainer Module
 *
 * Decodes CVSS v2 and v3.x vector strings into a description of every metric.
 *
 * Usage:
 * ```typescript
 * import { explainVector } from './lib/cvss';
 *
 * const result = explainVector('CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:L/I:L/A:N');
 *
 * console.log(result.version);               // '3'
 * console.log(result.definitions.AV.text);   // 'Network (N): The attacker can remotely exploit the vulnerability.'
 * ```
 */

import type { VectorExplanation } from './types';
import { detectVersion } from './parser';
import { VECTOR_FORMATS, type VectorFormat } from './formats';
import { silentLogger, type Logger } from '../../core/logger';

// Types
export type {
  CvssVersion,
  MetricPairs,
  MetricTable,
  MetricValueEntry,
  TableName,
  MetricDefinition,
  MetricDefinitions,
  VectorExplanation,
} from './types';
export type { VectorFormat } from './formats';

// Errors
export { InvalidVectorError, UnknownMetricValueError } from './errors';

// Parsing and resolution
export { detectVersion, parseMetrics, stripV2Prefix, stripV3Prefix } from './parser';
export { CVSS2, CVSS3, VECTOR_FORMATS, resolveMetric, tableFor } from './formats';

// Lookup tables (for advanced usage)
export { METRIC_TABLES, formatDefinition } from './definitions';

export interface ExplainOptions {
  logger?: Logger;
}

/** Pick the format that applies to a raw vector string */
export function selectFormat(vector: string): VectorFormat {
  return VECTOR_FORMATS[detectVersion(vector.trim())];
}

/**
 * Parse and explain a vector. Throws InvalidVectorError for malformed input
 * and UnknownMetricValueError for a value code no table defines.
 */
export function explainVector(vector: string, options: ExplainOptions = {}): VectorExplanation {
  const logger = options.logger ?? silentLogger;
  const trimmed = vector.trim();
  const format = selectFormat(trimmed);
  logger.debug(`Detected CVSS v${format.version} vector: ${trimmed}`);

  const metrics = format.parse(trimmed);
  logger.debug(`Parsed ${Object.keys(metrics).length} metrics`);

  const definitions = format.resolve(metrics);

  return {
    version: format.version,
    vector: trimmed,
    metrics,
    definitions,
  };
}
