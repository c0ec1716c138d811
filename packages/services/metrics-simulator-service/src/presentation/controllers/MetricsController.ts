/**
 * Metrics Controller
 * HTTP handlers for the simulated Metrics v2 endpoints
 */

import type { Request, Response } from 'express';
import { getCorrelationId } from '@metricsim/platform-core';
import type { MetricsQueryService } from '../../application/services/MetricsQueryService';
import type { DataPointsQuery, ListMetricsQuery, MetricQuery } from '../schemas/metricsQuerySchemas';
import { getLogger } from '../../config/logger';

const logger = getLogger('metrics-controller');

export class MetricsController {
  constructor(private readonly queryService: MetricsQueryService) {}

  listMetrics = (query: ListMetricsQuery, _req: Request, res: Response): void => {
    const response = this.queryService.listMetrics({
      text: query.text,
      metricSelector: query.metricSelector,
      pageSize: query.pageSize,
    });

    logger.debug('Listed metrics', {
      correlationId: getCorrelationId(res),
      totalCount: response.totalCount,
      returned: response.metrics.length,
    });
    res.status(200).json(response);
  };

  getDataPoints = (query: DataPointsQuery, req: Request, res: Response): void => {
    const response = this.queryService.getDataPoints(req.params.metricId, {
      from: query.from,
      to: query.to,
      resolution: query.resolution,
    });
    res.status(200).json(response);
  };

  queryMetrics = (query: MetricQuery, _req: Request, res: Response): void => {
    logger.debug('Metric query received', {
      correlationId: getCorrelationId(res),
      metricSelector: query.metricSelector,
      resolution: query.resolution,
    });

    const response = this.queryService.queryMetrics({
      metricSelector: query.metricSelector,
      from: query.from,
      to: query.to,
      resolution: query.resolution,
    });
    res.status(200).json(response);
  };
}
