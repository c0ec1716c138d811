/**
 * Metrics Query Service
 *
 * Answers the three simulated read operations and shapes the vendor envelopes.
 * Holds no per-request state; the catalogue and generator are injected.
 */

import type { MetricDataResponse, MetricListResponse, MetricSeriesData } from '@metricsim/contracts';
import { findMetric, filterMetrics, type MetricCatalogue } from '../../domains/catalogue/MetricCatalogue';
import { parseMetricSelector } from '../../domains/selectors/MetricSelectorParser';
import {
  countDataPoints,
  resolveInterval,
  FIVE_MINUTES_MS,
  ONE_MINUTE_MS,
  type DataPoint,
  type Series,
  type SeriesGenerator,
} from '../../domains/series';
import { SimulatorError } from '../errors';
import { getLogger } from '../../config/logger';

const logger = getLogger('metrics-query-service');

export interface MetricsQueryServiceOptions {
  maxDataPoints: number;
  defaultPageSize: number;
}

export interface ListMetricsRequest {
  text?: string;
  metricSelector?: string;
  pageSize?: number;
}

export interface TimeRangeRequest {
  from: number;
  to: number;
  resolution: string;
}

export interface MetricQueryRequest extends TimeRangeRequest {
  metricSelector: string;
}

function flatSeriesData(points: DataPoint[]): MetricSeriesData {
  return {
    dimensions: [],
    dimensionMap: {},
    timestamps: points.map(point => point.timestampMillis),
    values: points.map(point => point.value),
  };
}

function splitSeriesData(series: Series): MetricSeriesData {
  return {
    dimensions: [...series.dimensionLabels],
    dimensionMap: { ...series.dimensionValues },
    timestamps: series.timestamps,
    values: series.values,
  };
}

function dataResponse(metricId: string, resolution: string, data: MetricSeriesData[]): MetricDataResponse {
  return {
    totalCount: 1,
    nextPageKey: null,
    resolution,
    result: [
      {
        metricId,
        dataPointCountRatio: 1.0,
        dimensionCountRatio: 1.0,
        data,
      },
    ],
  };
}

export class MetricsQueryService {
  constructor(
    private readonly catalogue: MetricCatalogue,
    private readonly generator: SeriesGenerator,
    private readonly options: MetricsQueryServiceOptions
  ) {}

  listMetrics(request: ListMetricsRequest): MetricListResponse {
    const matches = filterMetrics(this.catalogue, request);
    const pageSize = request.pageSize ?? this.options.defaultPageSize;

    return {
      totalCount: matches.length,
      nextPageKey: null,
      metrics: matches.slice(0, pageSize),
    };
  }

  /**
   * Direct lookup by id; only an exact match answers.
   */
  getDataPoints(metricId: string, request: TimeRangeRequest): MetricDataResponse {
    const metric = findMetric(this.catalogue, metricId, 'strict');
    if (!metric) {
      throw SimulatorError.metricNotFound(metricId);
    }

    this.assertWithinPointLimit(request, ONE_MINUTE_MS);
    const points = this.generator.generate(metric.metricId, request.from, request.to, request.resolution);

    logger.debug('Generated data points', { metricId, resolution: request.resolution, points: points.length });
    return dataResponse(metric.metricId, request.resolution, [flatSeriesData(points)]);
  }

  /**
   * Selector query; permissive lookup, split into several series when the
   * selector asks for splitBy.
   */
  queryMetrics(request: MetricQueryRequest): MetricDataResponse {
    const selector = parseMetricSelector(request.metricSelector);
    const metric = findMetric(this.catalogue, selector.baseMetricId, 'permissive');
    if (!metric) {
      throw SimulatorError.noMatchingMetric(request.metricSelector);
    }

    if (selector.hasSplitBy) {
      this.assertWithinPointLimit(request, FIVE_MINUTES_MS);
      const series = this.generator.generateMultiSeries(metric.metricId, request.from, request.to, request.resolution);

      logger.debug('Generated split series', {
        metricSelector: request.metricSelector,
        metricId: metric.metricId,
        seriesCount: series.length,
      });
      return dataResponse(metric.metricId, request.resolution, series.map(splitSeriesData));
    }

    this.assertWithinPointLimit(request, ONE_MINUTE_MS);
    const points = this.generator.generate(metric.metricId, request.from, request.to, request.resolution);

    logger.debug('Generated query data points', {
      metricSelector: request.metricSelector,
      metricId: metric.metricId,
      points: points.length,
    });
    return dataResponse(metric.metricId, request.resolution, [flatSeriesData(points)]);
  }

  private assertWithinPointLimit(request: TimeRangeRequest, fallbackIntervalMs: number): void {
    const interval = resolveInterval(request.resolution, fallbackIntervalMs);
    const requested = countDataPoints(request.from, request.to, interval);
    if (requested > this.options.maxDataPoints) {
      throw SimulatorError.tooManyDataPoints(requested, this.options.maxDataPoints);
    }
  }
}
