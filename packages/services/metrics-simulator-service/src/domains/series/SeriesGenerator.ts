/**
 * Series Generator
 *
 * Synthesizes evenly spaced data points for a metric. Values are drawn
 * independently per step from a range picked by metric-name heuristics.
 * The random source and the split-by fixture table are injected so tests can
 * pin the output.
 */

import { buildTimestamps, FIVE_MINUTES_MS, ONE_MINUTE_MS, resolveInterval } from './resolution';
import { DEFAULT_VALUE_RANGE, drawValue, selectValueRange } from './valueDistributions';
import { DEFAULT_SPLIT_SERIES_FIXTURES, type SplitSeriesFixture } from './splitSeriesFixtures';
import type { DataPoint, RandomSource, Series } from './types';

const SPLIT_METRIC_FRAGMENTS = ['keyRequest.count', 'service'] as const;

export class SeriesGenerator {
  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly fixtures: readonly SplitSeriesFixture[] = DEFAULT_SPLIT_SERIES_FIXTURES
  ) {}

  /**
   * Flat series; unknown resolutions step by one minute.
   */
  generate(metricId: string, fromMillis: number, toMillis: number, resolution: string): DataPoint[] {
    const range = selectValueRange(metricId);
    return buildTimestamps(fromMillis, toMillis, resolveInterval(resolution, ONE_MINUTE_MS)).map(timestampMillis => ({
      timestampMillis,
      value: drawValue(range, this.random),
    }));
  }

  /**
   * Split-by series; unknown resolutions step by five minutes.
   * Service metrics get one series per fixture row, everything else a single
   * unlabeled series.
   */
  generateMultiSeries(metricId: string, fromMillis: number, toMillis: number, resolution: string): Series[] {
    const timestamps = buildTimestamps(fromMillis, toMillis, resolveInterval(resolution, FIVE_MINUTES_MS));

    if (!SPLIT_METRIC_FRAGMENTS.some(fragment => metricId.includes(fragment))) {
      return [
        {
          dimensionLabels: [],
          dimensionValues: {},
          timestamps,
          values: timestamps.map(() => drawValue(DEFAULT_VALUE_RANGE, this.random)),
        },
      ];
    }

    return this.fixtures.map(fixture => ({
      dimensionLabels: [fixture.dimensionKey],
      dimensionValues: {
        [fixture.dimensionKey]: fixture.entityId,
        [`${fixture.dimensionKey}.name`]: fixture.displayName,
      },
      timestamps: [...timestamps],
      values: timestamps.map(() => drawValue(fixture.range, this.random)),
    }));
  }
}
