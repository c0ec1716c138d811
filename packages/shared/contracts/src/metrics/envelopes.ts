/**
 * Metrics v2 response envelopes
 *
 * Wire shapes returned by the list, data-points and query endpoints.
 * Paging is not simulated, so `nextPageKey` is always null.
 */

import { z } from 'zod';
import { MetricDefinitionSchema } from './metric-definition.js';

export const MetricListResponseSchema = z.object({
  totalCount: z.number().int().nonnegative(),
  nextPageKey: z.null(),
  metrics: z.array(MetricDefinitionSchema),
});
export type MetricListResponse = z.infer<typeof MetricListResponseSchema>;

export const MetricSeriesDataSchema = z.object({
  dimensions: z.array(z.string()),
  dimensionMap: z.record(z.string()),
  timestamps: z.array(z.number().int()),
  values: z.array(z.number()),
});
export type MetricSeriesData = z.infer<typeof MetricSeriesDataSchema>;

export const MetricDataResultSchema = z.object({
  metricId: z.string(),
  dataPointCountRatio: z.number(),
  dimensionCountRatio: z.number(),
  data: z.array(MetricSeriesDataSchema),
});
export type MetricDataResult = z.infer<typeof MetricDataResultSchema>;

export const MetricDataResponseSchema = z.object({
  totalCount: z.number().int().nonnegative(),
  nextPageKey: z.null(),
  resolution: z.string(),
  result: z.array(MetricDataResultSchema),
});
export type MetricDataResponse = z.infer<typeof MetricDataResponseSchema>;
