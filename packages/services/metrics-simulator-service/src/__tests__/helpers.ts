import type { MetricDefinition } from '@metricsim/contracts';
import type { RandomSource } from '../domains/series';

export const constantRandom =
  (value: number): RandomSource =>
  () =>
    value;

export function buildMetric(metricId: string, displayName = metricId): MetricDefinition {
  return {
    metricId,
    displayName,
    description: `${displayName} description`,
    unit: 'Count',
    aggregationTypes: ['avg'],
    transformations: [],
    defaultAggregation: { type: 'avg' },
    dimensionDefinitions: [],
    entityType: ['HOST'],
  };
}
