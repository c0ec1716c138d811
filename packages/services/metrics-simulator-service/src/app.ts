/**
 * Metrics Simulator Service - Express App Factory
 *
 * Builds the app from injected dependencies so tests can mount it in process
 * with a fixed catalogue and random source.
 */

import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { errorHandler, notFoundHandler, requestLogger } from '@metricsim/platform-core';
import { MetricsQueryService } from './application/services/MetricsQueryService';
import type { MetricCatalogue } from './domains/catalogue/MetricCatalogue';
import { SeriesGenerator, type RandomSource, type SplitSeriesFixture } from './domains/series';
import { MetricsController } from './presentation/controllers/MetricsController';
import { createApiTokenAuth } from './presentation/middleware/apiTokenAuth';
import { createHealthRoutes } from './presentation/routes/healthRoutes';
import { createMetricsRoutes } from './presentation/routes/metricsRoutes';
import type { EnvironmentConfig } from './config/environment';
import { SERVICE_NAME } from './config/logger';

export type AppConfig = Pick<EnvironmentConfig, 'apiTokens' | 'maxDataPoints' | 'defaultPageSize' | 'corsOrigins'>;

export interface AppDependencies {
  config: AppConfig;
  catalogue: MetricCatalogue;
  random?: RandomSource;
  fixtures?: readonly SplitSeriesFixture[];
}

export function createApp({ config, catalogue, random, fixtures }: AppDependencies): Express {
  const app = express();

  setupMiddleware(app, config);

  const queryService = new MetricsQueryService(catalogue, new SeriesGenerator(random, fixtures), {
    maxDataPoints: config.maxDataPoints,
    defaultPageSize: config.defaultPageSize,
  });
  const controller = new MetricsController(queryService);

  app.use(createHealthRoutes());
  app.use('/api/v2/metrics', createMetricsRoutes(controller, createApiTokenAuth(config.apiTokens)));

  app.use(notFoundHandler());
  app.use(errorHandler());

  return app;
}

function setupMiddleware(app: Express, config: AppConfig): void {
  app.disable('x-powered-by');
  app.use(helmet());
  app.use(
    cors({
      origin: config.corsOrigins.length > 0 ? config.corsOrigins : true,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Correlation-ID', 'X-Request-ID'],
    })
  );
  app.use(compression());
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(SERVICE_NAME));
}
