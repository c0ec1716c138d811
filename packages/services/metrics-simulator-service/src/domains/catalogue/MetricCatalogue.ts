/**
 * Metric Catalogue
 *
 * Immutable list of metric definitions, loaded once at startup and handed to
 * the query service. Lookups come in two strengths: the direct-by-id endpoint
 * needs an exact match, the query endpoint falls back until it finds something.
 */

import type { MetricDefinition } from '@metricsim/contracts';

export type MetricCatalogue = readonly MetricDefinition[];

export type LookupMode = 'strict' | 'permissive';

/**
 * strict: exact metricId match only.
 * permissive: exact match, then first id containing `baseMetricId` (when non-empty),
 * then the first catalogue entry. Undefined only for an empty catalogue.
 */
export function findMetric(
  catalogue: MetricCatalogue,
  baseMetricId: string,
  mode: LookupMode = 'strict'
): MetricDefinition | undefined {
  const exact = catalogue.find(metric => metric.metricId === baseMetricId);
  if (exact || mode === 'strict') return exact;

  if (baseMetricId.length > 0) {
    const partial = catalogue.find(metric => metric.metricId.includes(baseMetricId));
    if (partial) return partial;
  }

  return catalogue[0];
}

export interface MetricFilter {
  text?: string;
  metricSelector?: string;
}

/**
 * List-endpoint filtering: `text` matches id or display name ignoring case,
 * `metricSelector` is a case-sensitive substring of the id.
 */
export function filterMetrics(catalogue: MetricCatalogue, filter: MetricFilter): MetricDefinition[] {
  const text = filter.text?.toLowerCase();
  const selector = filter.metricSelector;

  return catalogue.filter(metric => {
    if (
      text &&
      !metric.metricId.toLowerCase().includes(text) &&
      !metric.displayName.toLowerCase().includes(text)
    ) {
      return false;
    }
    return !selector || metric.metricId.includes(selector);
  });
}
