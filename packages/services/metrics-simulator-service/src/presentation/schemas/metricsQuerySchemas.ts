/**
 * Request schemas for the Metrics v2 endpoints.
 * Query-string values arrive as strings; JSON bodies may send numbers.
 */

import { z } from 'zod';

const numberToString = (value: unknown): unknown => (typeof value === 'number' ? String(value) : value);

const TimestampString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Expected an integer timestamp in epoch milliseconds')
  .transform(Number)
  .refine(value => Number.isSafeInteger(value), 'Timestamp is out of range');

const RequiredTimestamp = z.preprocess(numberToString, TimestampString);

// `to` defaults to the time the request is parsed
const OptionalTimestamp = z
  .preprocess(numberToString, TimestampString.optional())
  .transform(value => value ?? Date.now());

export const DEFAULT_RESOLUTION = '1m';

const Resolution = z.string().default(DEFAULT_RESOLUTION);

export const ListMetricsQuerySchema = z.object({
  text: z.string().optional(),
  metricSelector: z.string().optional(),
  fields: z.string().optional(),
  pageSize: z
    .string()
    .regex(/^\d+$/, 'Expected a positive integer')
    .transform(Number)
    .refine(value => value >= 1, 'pageSize must be at least 1')
    .optional(),
});
export type ListMetricsQuery = z.infer<typeof ListMetricsQuerySchema>;

export const DataPointsQuerySchema = z.object({
  from: RequiredTimestamp,
  to: OptionalTimestamp,
  resolution: Resolution,
  entitySelector: z.string().optional(),
});
export type DataPointsQuery = z.infer<typeof DataPointsQuerySchema>;

export const MetricQuerySchema = z.object({
  metricSelector: z.string().default(''),
  from: RequiredTimestamp,
  to: OptionalTimestamp,
  resolution: Resolution,
});
export type MetricQuery = z.infer<typeof MetricQuerySchema>;
