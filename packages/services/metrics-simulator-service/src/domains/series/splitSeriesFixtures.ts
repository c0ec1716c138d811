import type { ValueRange } from './types';

/**
 * One synthetic series returned for split-by queries on service metrics.
 */
export interface SplitSeriesFixture {
  dimensionKey: string;
  entityId: string;
  displayName: string;
  range: ValueRange;
}

export const SERVICE_METHOD_DIMENSION = 'dt.entity.service_method';

export const DEFAULT_SPLIT_SERIES_FIXTURES: readonly SplitSeriesFixture[] = [
  {
    dimensionKey: SERVICE_METHOD_DIMENSION,
    entityId: 'SERVICE_METHOD-3F1A9C2B7D4E6A01',
    displayName: 'POST /api/checkout',
    range: { kind: 'integer', min: 2000, max: 2800 },
  },
  {
    dimensionKey: SERVICE_METHOD_DIMENSION,
    entityId: 'SERVICE_METHOD-3F1A9C2B7D4E6A02',
    displayName: 'GET /api/products',
    range: { kind: 'integer', min: 1000, max: 1400 },
  },
  {
    dimensionKey: SERVICE_METHOD_DIMENSION,
    entityId: 'SERVICE_METHOD-3F1A9C2B7D4E6A03',
    displayName: 'GET /api/cart',
    range: { kind: 'integer', min: 500, max: 1000 },
  },
];
