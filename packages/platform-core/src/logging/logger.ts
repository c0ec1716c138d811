/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import { hostname } from 'os';
import type { LoggerMeta } from './types';
import { createDevFormat, createJsonFormat } from './formatting';

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;

  switch (env.NODE_ENV) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

/**
 * Create a Winston logger instance
 */
export function createLogger(serviceName: string, options: Partial<LoggerMeta> = {}): winston.Logger {
  const meta: LoggerMeta = {
    service: serviceName,
    env: process.env.NODE_ENV || 'development',
    version: process.env.npm_package_version,
    instanceId: process.env.INSTANCE_ID || process.env.HOSTNAME || hostname() || 'unknown',
    ...options,
  };

  return winston.createLogger({
    level: resolveLogLevel(),
    defaultMeta: meta,
    format: process.env.NODE_ENV === 'development' ? createDevFormat() : createJsonFormat(),
    transports: [new winston.transports.Console()],
  });
}

const loggers = new Map<string, winston.Logger>();

/**
 * Get or create a logger, one instance per service or module name
 */
export function getLogger(serviceOrModule: string): winston.Logger {
  const existing = loggers.get(serviceOrModule);
  if (existing) return existing;

  const logger = createLogger(serviceOrModule);
  loggers.set(serviceOrModule, logger);
  return logger;
}
