/**
 * Health and service info routes (no authentication)
 */

import { Router, type Request, type Response } from 'express';
import { SERVICE_NAME } from '../../config/logger';
import { SUPPORTED_RESOLUTIONS } from '../../domains/series';

export const SERVICE_VERSION = '1.0.0';

export function createHealthRoutes(): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ status: 'ok', message: 'Metrics API simulator is running' });
  });

  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      name: 'Metrics v2 API Simulator',
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: {
        list_metrics: 'GET /api/v2/metrics',
        get_metric_data: 'GET /api/v2/metrics/{metricId}',
        query_metrics: 'GET|POST /api/v2/metrics/query',
        health: 'GET /health',
      },
      resolutions: SUPPORTED_RESOLUTIONS,
    });
  });

  return router;
}
