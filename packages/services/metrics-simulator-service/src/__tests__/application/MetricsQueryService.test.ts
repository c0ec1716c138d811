import { describe, it, expect } from 'vitest';
import { MetricsQueryService } from '../../application/services/MetricsQueryService';
import { SimulatorError, SimulatorErrorCode } from '../../application/errors';
import { SeriesGenerator } from '../../domains/series';
import { buildMetric, constantRandom } from '../helpers';

const catalogue = [
  buildMetric('builtin:host.cpu.usage', 'CPU usage %'),
  buildMetric('builtin:host.mem.usage', 'Memory usage %'),
  buildMetric('builtin:service.keyRequest.count.total', 'Key request count'),
];

function createService(maxDataPoints = 10000, defaultPageSize = 500): MetricsQueryService {
  return new MetricsQueryService(catalogue, new SeriesGenerator(constantRandom(0.5)), {
    maxDataPoints,
    defaultPageSize,
  });
}

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('MetricsQueryService', () => {
  describe('listMetrics', () => {
    it('should return every metric without filters', () => {
      const response = createService().listMetrics({});

      expect(response.totalCount).toBe(3);
      expect(response.nextPageKey).toBeNull();
      expect(response.metrics).toHaveLength(3);
    });

    it('should count all matches but truncate to the page size', () => {
      const response = createService().listMetrics({ text: 'host', pageSize: 1 });

      expect(response.totalCount).toBe(2);
      expect(response.metrics.map(metric => metric.metricId)).toEqual(['builtin:host.cpu.usage']);
    });

    it('should fall back to the configured default page size', () => {
      const response = createService(10000, 2).listMetrics({});

      expect(response.totalCount).toBe(3);
      expect(response.metrics).toHaveLength(2);
    });

    it('should filter by selector substring', () => {
      const response = createService().listMetrics({ metricSelector: 'keyRequest' });

      expect(response.metrics.map(metric => metric.metricId)).toEqual(['builtin:service.keyRequest.count.total']);
    });
  });

  describe('getDataPoints', () => {
    it('should build a single flat series', () => {
      const response = createService().getDataPoints('builtin:host.cpu.usage', {
        from: 0,
        to: 120000,
        resolution: '1m',
      });

      expect(response).toEqual({
        totalCount: 1,
        nextPageKey: null,
        resolution: '1m',
        result: [
          {
            metricId: 'builtin:host.cpu.usage',
            dataPointCountRatio: 1,
            dimensionCountRatio: 1,
            data: [{ dimensions: [], dimensionMap: {}, timestamps: [0, 60000, 120000], values: [55, 55, 55] }],
          },
        ],
      });
    });

    it('should echo the requested resolution even when it is unknown', () => {
      const response = createService().getDataPoints('builtin:host.cpu.usage', { from: 0, to: 0, resolution: '7m' });
      expect(response.resolution).toBe('7m');
    });

    it('should return an empty series when from is after to', () => {
      const response = createService().getDataPoints('builtin:host.cpu.usage', { from: 10, to: 0, resolution: '1m' });
      expect(response.result[0].data[0].timestamps).toEqual([]);
    });

    it('should reject unknown and partial ids', () => {
      const error = catchError(() =>
        createService().getDataPoints('builtin:host.cpu', { from: 0, to: 0, resolution: '1m' })
      );

      expect(error).toBeInstanceOf(SimulatorError);
      if (error instanceof SimulatorError) {
        expect(error.statusCode).toBe(404);
        expect(error.code).toBe(SimulatorErrorCode.METRIC_NOT_FOUND);
        expect(error.message).toBe("Metric 'builtin:host.cpu' not found");
      }
    });

    it('should reject ranges above the point limit', () => {
      expect(() =>
        createService(10).getDataPoints('builtin:host.cpu.usage', { from: 0, to: 600000, resolution: '1m' })
      ).toThrow(
        'Requested time range yields 11 data points, which exceeds the limit of 10. Narrow the range or use a coarser resolution.'
      );
    });

    it('should accept ranges exactly at the point limit', () => {
      const response = createService(10).getDataPoints('builtin:host.cpu.usage', {
        from: 0,
        to: 540000,
        resolution: '1m',
      });
      expect(response.result[0].data[0].values).toHaveLength(10);
    });
  });

  describe('queryMetrics', () => {
    it('should resolve the selector prefix exactly', () => {
      const response = createService().queryMetrics({
        metricSelector: 'builtin:host.mem.usage:filter(eq("dt.entity.host","HOST-1"))',
        from: 0,
        to: 0,
        resolution: '1m',
      });

      expect(response.result[0].metricId).toBe('builtin:host.mem.usage');
      expect(response.result[0].data).toHaveLength(1);
    });

    it('should fall back to a partial id match', () => {
      const response = createService().queryMetrics({ metricSelector: 'mem', from: 0, to: 0, resolution: '1m' });
      expect(response.result[0].metricId).toBe('builtin:host.mem.usage');
    });

    it('should fall back to the first catalogue entry', () => {
      const response = createService().queryMetrics({
        metricSelector: 'custom:nothing.like.this',
        from: 0,
        to: 0,
        resolution: '1m',
      });
      expect(response.result[0].metricId).toBe('builtin:host.cpu.usage');
    });

    it('should treat an empty selector as the first catalogue entry', () => {
      const response = createService().queryMetrics({ metricSelector: '', from: 0, to: 0, resolution: '1m' });
      expect(response.result[0].metricId).toBe('builtin:host.cpu.usage');
    });

    it('should split key request metrics by service method', () => {
      const response = createService().queryMetrics({
        metricSelector: 'builtin:service.keyRequest.count.total:splitBy("dt.entity.service_method"):sort(value(auto,descending))',
        from: 0,
        to: 300000,
        resolution: '5m',
      });

      const [result] = response.result;
      expect(result.metricId).toBe('builtin:service.keyRequest.count.total');
      expect(result.data).toHaveLength(3);
      expect(result.data[0]).toEqual({
        dimensions: ['dt.entity.service_method'],
        dimensionMap: {
          'dt.entity.service_method': 'SERVICE_METHOD-3F1A9C2B7D4E6A01',
          'dt.entity.service_method.name': 'POST /api/checkout',
        },
        timestamps: [0, 300000],
        values: [2400, 2400],
      });
    });

    it('should return one unlabeled series when splitting a non-service metric', () => {
      const response = createService().queryMetrics({
        metricSelector: 'builtin:host.cpu.usage:splitBy("dt.entity.host")',
        from: 0,
        to: 0,
        resolution: '1m',
      });

      expect(response.result[0].data).toEqual([{ dimensions: [], dimensionMap: {}, timestamps: [0], values: [50] }]);
    });

    it('should report an empty catalogue as no matching metric', () => {
      const service = new MetricsQueryService([], new SeriesGenerator(constantRandom(0.5)), {
        maxDataPoints: 10000,
        defaultPageSize: 500,
      });
      const error = catchError(() => service.queryMetrics({ metricSelector: 'x', from: 0, to: 0, resolution: '1m' }));

      expect(error).toBeInstanceOf(SimulatorError);
      if (error instanceof SimulatorError) {
        expect(error.code).toBe(SimulatorErrorCode.NO_MATCHING_METRIC);
        expect(error.message).toBe("No metrics found matching selector 'x'");
      }
    });

    it('should size the point limit by the split fallback interval', () => {
      const service = createService(10);
      const request = { from: 0, to: 2700000, resolution: 'unknown' };

      const split = service.queryMetrics({ ...request, metricSelector: 'builtin:host.cpu.usage:splitBy()' });
      expect(split.result[0].data[0].timestamps).toHaveLength(10);

      expect(() => service.queryMetrics({ ...request, metricSelector: 'builtin:host.cpu.usage' })).toThrow(
        'Requested time range yields 46 data points, which exceeds the limit of 10. Narrow the range or use a coarser resolution.'
      );
    });
  });
});
