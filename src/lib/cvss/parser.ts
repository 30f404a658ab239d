/**
 * CVSS Vector String Parsing
 *
 * Splits the metric portion of a vector into identifier/value pairs.
 *
 *   CVSS2#AV:N/AC:L/Au:N/C:C/I:C/A:C
 *   CVSS:3.1/AV:N/AC:L/PR:H/UI:N/S:U/C:L/I:L/A:N
 */

import type { CvssVersion, MetricPairs } from './types';
import { InvalidVectorError } from './errors';

/** Length of the v2 label, e.g. "CVSS2#" */
export const V2_PREFIX_LENGTH = 6;

// =============================================================================
// Version Detection
// =============================================================================

/**
 * Version 2 if any of the first six characters is a "2", otherwise 3.
 * A v3 vector with a "2" in that window is misread as v2.
 */
export function detectVersion(vector: string): CvssVersion {
  return vector.slice(0, V2_PREFIX_LENGTH).includes('2') ? '2' : '3';
}

// =============================================================================
// Prefix Handling
// =============================================================================

/** Drop the fixed-length v2 label and return the metric portion */
export function stripV2Prefix(vector: string): string {
  if (vector.length <= V2_PREFIX_LENGTH) {
    throw invalid(vector, 'no metrics after the CVSS v2 label');
  }
  return vector.slice(V2_PREFIX_LENGTH);
}

/** Drop everything up to and including the first "/" */
export function stripV3Prefix(vector: string): string {
  const slash = vector.indexOf('/');
  if (slash === -1) {
    throw invalid(vector, 'missing "/" after the CVSS version label');
  }
  return vector.slice(slash + 1);
}

// =============================================================================
// Metric Splitting
// =============================================================================

/**
 * Parse "AV:N/AC:L/..." into pairs. Each segment splits on its last colon.
 * A repeated identifier keeps its first position and its last value.
 * Any identifier is kept as an own key, `__proto__` included.
 */
export function parseMetrics(metricsString: string, vector: string = metricsString): MetricPairs {
  const metrics = new Map<string, string>();

  for (const segment of metricsString.split('/')) {
    const colon = segment.lastIndexOf(':');
    if (colon === -1) {
      throw invalid(vector, `segment '${segment}' has no ':' separator`);
    }

    const identifier = segment.slice(0, colon);
    const value = segment.slice(colon + 1);
    if (!identifier || !value) {
      throw invalid(vector, `segment '${segment}' needs both an identifier and a value`);
    }

    metrics.set(identifier, value);
  }

  return Object.fromEntries(metrics);
}

function invalid(vector: string, reason: string) {
  return new InvalidVectorError({
    message: `Invalid vector format: ${reason}`,
    vector,
  });
}
