/**
 * Logging Middleware
 *
 * One log line per finished request, levelled by status code.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger } from './logger';
import { CORRELATION_HEADER, correlationStorage, resolveCorrelationId } from './correlation';

export function getCorrelationId(res: Response): string | undefined {
  const value: unknown = res.locals.correlationId;
  return typeof value === 'string' ? value : undefined;
}

export function requestLogger(serviceName: string): RequestHandler {
  const logger = getLogger(serviceName);

  return (req: Request, res: Response, next: NextFunction) => {
    const correlationId = resolveCorrelationId(req.headers);
    const startedAt = Date.now();

    res.locals.correlationId = correlationId;
    res.setHeader(CORRELATION_HEADER, correlationId);

    res.on('finish', () => {
      const meta = {
        correlationId,
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.error('Request failed', meta);
      } else if (res.statusCode >= 400) {
        logger.warn('Request rejected', meta);
      } else {
        logger.info('Request completed', meta);
      }
    });

    correlationStorage.run({ correlationId, service: serviceName, method: req.method, url: req.originalUrl }, next);
  };
}
