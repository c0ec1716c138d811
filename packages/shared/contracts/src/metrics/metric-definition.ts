import { z } from 'zod';

export const DimensionDefinitionSchema = z.object({
  key: z.string().min(1),
  name: z.string(),
  index: z.number().int().nonnegative(),
  type: z.string(),
});
export type DimensionDefinition = z.infer<typeof DimensionDefinitionSchema>;

export const MetricDefinitionSchema = z.object({
  metricId: z.string().min(1),
  displayName: z.string(),
  description: z.string(),
  unit: z.string(),
  aggregationTypes: z.array(z.string()),
  transformations: z.array(z.string()).default([]),
  defaultAggregation: z.object({
    type: z.string(),
  }),
  dimensionDefinitions: z.array(DimensionDefinitionSchema),
  entityType: z.array(z.string()),
});
export type MetricDefinition = z.infer<typeof MetricDefinitionSchema>;

/**
 * Catalogue file layout: `{ "metrics": [ ...definitions ] }`.
 * Metric ids must be unique; lookups rely on it.
 */
export const MetricCatalogueFileSchema = z
  .object({
    metrics: z.array(MetricDefinitionSchema),
  })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.metrics.forEach((metric, index) => {
      if (seen.has(metric.metricId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['metrics', index, 'metricId'],
          message: `Duplicate metricId '${metric.metricId}'`,
        });
      }
      seen.add(metric.metricId);
    });
  });
export type MetricCatalogueFile = z.infer<typeof MetricCatalogueFileSchema>;
