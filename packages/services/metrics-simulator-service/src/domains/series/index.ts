export { SeriesGenerator } from './SeriesGenerator';
export { countDataPoints, resolveInterval, SUPPORTED_RESOLUTIONS, ONE_MINUTE_MS, FIVE_MINUTES_MS } from './resolution';
export { DEFAULT_SPLIT_SERIES_FIXTURES, SERVICE_METHOD_DIMENSION, type SplitSeriesFixture } from './splitSeriesFixtures';
export type { DataPoint, RandomSource, Series, ValueRange } from './types';
