/**
 * Environment Configuration
 *
 * Typed settings for metrics-simulator-service, read once at startup.
 */

import { parseInteger, parseList, serializeError } from '@metricsim/platform-core';
import { DEFAULT_CATALOGUE_PATH } from '../domains/catalogue/loadMetricCatalogue';
import { getLogger } from './logger';

const logger = getLogger('environment');

export const DEFAULT_API_TOKENS = ['dt0c01.sample.token1', 'dt0c01.sample.token2', 'test-token'];

export interface EnvironmentConfig {
  port: number;
  host: string;
  nodeEnv: string;
  apiTokens: string[];
  cataloguePath: string;
  maxDataPoints: number;
  defaultPageSize: number;
  corsOrigins: string[];
  shutdownTimeoutMs: number;
}

export function loadEnvironmentConfig(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  try {
    const apiTokens = parseList(env.DT_API_TOKENS);

    return {
      port: parseInteger('PORT', env.PORT, 8080, { min: 0, max: 65535 }),
      host: env.HOST || '0.0.0.0',
      nodeEnv: env.NODE_ENV || 'development',
      apiTokens: apiTokens.length > 0 ? apiTokens : [...DEFAULT_API_TOKENS],
      cataloguePath: env.METRIC_CATALOGUE_PATH || DEFAULT_CATALOGUE_PATH,
      maxDataPoints: parseInteger('MAX_DATA_POINTS', env.MAX_DATA_POINTS, 10000, { min: 1 }),
      defaultPageSize: parseInteger('DEFAULT_PAGE_SIZE', env.DEFAULT_PAGE_SIZE, 500, { min: 1 }),
      corsOrigins: parseList(env.ALLOWED_ORIGINS),
      shutdownTimeoutMs: parseInteger('SHUTDOWN_TIMEOUT_MS', env.SHUTDOWN_TIMEOUT_MS, 30000, { min: 0 }),
    };
  } catch (error) {
    logger.error('Environment configuration validation failed', { error: serializeError(error) });
    throw error;
  }
}
