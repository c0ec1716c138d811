/**
 * Metrics v2 Routes
 *
 * `/query` is registered before `/:metricId` so it is not taken for a metric id.
 */

import { Router, type RequestHandler } from 'express';
import { createValidation } from '@metricsim/platform-core';
import type { MetricsController } from '../controllers/MetricsController';
import { DataPointsQuerySchema, ListMetricsQuerySchema, MetricQuerySchema } from '../schemas/metricsQuerySchemas';
import { SERVICE_NAME } from '../../config/logger';

export function createMetricsRoutes(controller: MetricsController, authenticate: RequestHandler): Router {
  const router = Router();
  const { validateQuery, validateBody } = createValidation(SERVICE_NAME);

  router.use(authenticate);

  router.get('/', validateQuery(ListMetricsQuerySchema, controller.listMetrics));
  router.get('/query', validateQuery(MetricQuerySchema, controller.queryMetrics));
  router.post('/query', validateBody(MetricQuerySchema, controller.queryMetrics));
  router.get('/:metricId', validateQuery(DataPointsQuerySchema, controller.getDataPoints));

  return router;
}
