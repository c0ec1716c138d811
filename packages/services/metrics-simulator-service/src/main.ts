// Load environment variables first (never override the process environment)
import { config } from 'dotenv';
import { resolve } from 'path';
config({ path: resolve(process.cwd(), '.env'), override: false });

/**
 * Metrics Simulator Service
 * Startup: configuration, catalogue, HTTP listener, graceful shutdown
 */

import { createLogger, serializeError, setupGracefulShutdown } from '@metricsim/platform-core';
import { createApp } from './app';
import { loadEnvironmentConfig } from './config/environment';
import { SERVICE_NAME } from './config/logger';
import { loadMetricCatalogue } from './domains/catalogue/loadMetricCatalogue';

const logger = createLogger(SERVICE_NAME);

function main(): void {
  const environment = loadEnvironmentConfig();
  const catalogue = loadMetricCatalogue(environment.cataloguePath);
  const app = createApp({ config: environment, catalogue });

  const server = app.listen(environment.port, environment.host, () => {
    logger.info('Metrics API simulator listening', {
      host: environment.host,
      port: environment.port,
      metrics: catalogue.length,
      tokenCount: environment.apiTokens.length,
      maxDataPoints: environment.maxDataPoints,
    });
  });

  server.on('error', error => {
    logger.error('HTTP server error', { error: serializeError(error) });
    process.exit(1);
  });

  setupGracefulShutdown(server, environment.shutdownTimeoutMs);
}

try {
  main();
} catch (error) {
  logger.error('Failed to start metrics-simulator-service', { error: serializeError(error) });
  process.exit(1);
}
