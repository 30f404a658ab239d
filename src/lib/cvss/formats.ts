/**
 * CVSS Vector Formats
 *
 * One variant per supported version. Each knows how to strip its own label
 * and which lookup table explains each metric identifier.
 */

import type {
  CvssVersion,
  MetricDefinition,
  MetricDefinitions,
  MetricPairs,
  MetricTable,
} from './types';
import { METRIC_TABLES, formatDefinition } from './definitions';
import { UnknownMetricValueError } from './errors';
import { parseMetrics, stripV2Prefix, stripV3Prefix } from './parser';

export interface VectorFormat {
  readonly version: CvssVersion;
  /** Split a full vector string (label included) into identifier/value pairs */
  parse(vector: string): MetricPairs;
  /** Explain every parsed pair, keyed by identifier as given */
  resolve(metrics: MetricPairs): MetricDefinitions;
}

// =============================================================================
// Table Dispatch
// =============================================================================

/**
 * Pick the table for a lowercased identifier. Anything unrecognised is
 * treated as Availability.
 */
export function tableFor(identifier: string, version: CvssVersion): MetricTable {
  if (version === '2') {
    switch (identifier) {
      case 'av':
        return METRIC_TABLES.accessVector;
      case 'ac':
        return METRIC_TABLES.accessComplexityV2;
      case 'au':
        return METRIC_TABLES.authentication;
      case 'c':
        return METRIC_TABLES.confidentialityV2;
      case 'i':
        return METRIC_TABLES.integrityV2;
      default:
        return METRIC_TABLES.availabilityV2;
    }
  }

  switch (identifier) {
    case 'av':
      return METRIC_TABLES.accessVector;
    case 'ac':
      return METRIC_TABLES.accessComplexityV3;
    case 'pr':
      return METRIC_TABLES.privilegesRequired;
    case 'ui':
      return METRIC_TABLES.userInteraction;
    case 's':
      return METRIC_TABLES.scope;
    case 'c':
      return METRIC_TABLES.confidentialityV3;
    case 'i':
      return METRIC_TABLES.integrityV3;
    default:
      return METRIC_TABLES.availabilityV3;
  }
}

// =============================================================================
// Resolution
// =============================================================================

export function resolveMetric(
  identifier: string,
  value: string,
  version: CvssVersion
): MetricDefinition {
  const table = tableFor(identifier.toLowerCase(), version);
  const entry = Object.hasOwn(table, value) ? table[value] : undefined;

  if (!entry) {
    throw new UnknownMetricValueError({
      message: `Unknown metric value '${value}' for identifier ${identifier}`,
      identifier,
      value,
      version,
    });
  }

  return {
    identifier,
    value,
    label: entry.label,
    code: value,
    description: entry.description,
    text: formatDefinition(value, entry),
  };
}

function resolveAll(metrics: MetricPairs, version: CvssVersion): MetricDefinitions {
  return Object.fromEntries(
    Object.entries(metrics).map(([identifier, value]) => [
      identifier,
      resolveMetric(identifier, value, version),
    ])
  );
}

// =============================================================================
// Formats
// =============================================================================

export const CVSS2: VectorFormat = {
  version: '2',
  parse: (vector) => parseMetrics(stripV2Prefix(vector), vector),
  resolve: (metrics) => resolveAll(metrics, '2'),
};

export const CVSS3: VectorFormat = {
  version: '3',
  parse: (vector) => parseMetrics(stripV3Prefix(vector), vector),
  resolve: (metrics) => resolveAll(metrics, '3'),
};

export const VECTOR_FORMATS: Readonly<Record<CvssVersion, VectorFormat>> = {
  '2': CVSS2,
  '3': CVSS3,
};
