/**
 * CVSS Metric Value Definitions
 *
 * Lookup tables for every metric value the explainer knows about, loaded from
 * definitions.json. Metrics whose value set or wording differs between v2 and
 * v3.x have one table per version.
 *
 * Sources:
 *   - CompTIA CySA+ Study Guide (Chapple, Seidl)
 *   - https://www.first.org/cvss/v3.0/specification-document
 */

import { z } from 'zod';
import rawDefinitions from './definitions.json';
import type { MetricTable, MetricValueEntry, TableName } from './types';

// =============================================================================
// Schema
// =============================================================================

const MetricValueEntrySchema = z.object({
  label: z.string().min(1),
  description: z.string().min(1),
});

const MetricTableSchema = z.record(z.string().length(1), MetricValueEntrySchema);

const DefinitionsSchema = z.object({
  accessVector: MetricTableSchema,
  accessComplexityV2: MetricTableSchema,
  accessComplexityV3: MetricTableSchema,
  authentication: MetricTableSchema,
  privilegesRequired: MetricTableSchema,
  userInteraction: MetricTableSchema,
  scope: MetricTableSchema,
  confidentialityV2: MetricTableSchema,
  integrityV2: MetricTableSchema,
  availabilityV2: MetricTableSchema,
  confidentialityV3: MetricTableSchema,
  integrityV3: MetricTableSchema,
  availabilityV3: MetricTableSchema,
});

// =============================================================================
// Tables
// =============================================================================

function freezeTables(
  tables: z.infer<typeof DefinitionsSchema>
): Readonly<Record<TableName, MetricTable>> {
  for (const table of Object.values(tables)) {
    for (const entry of Object.values(table)) {
      Object.freeze(entry);
    }
    Object.freeze(table);
  }
  return Object.freeze(tables);
}

export const METRIC_TABLES = freezeTables(DefinitionsSchema.parse(rawDefinitions));

/** Format an entry the way it is shown to users: "Network (N): The attacker ..." */
export function formatDefinition(code: string, entry: MetricValueEntry): string {
  return `${entry.label} (${code}): ${entry.description}`;
}
