import type { Request, Response, NextFunction, ErrorRequestHandler, RequestHandler } from 'express';
import { sendVendorError } from '@metricsim/contracts';
import { getLogger } from '../logging/logger.js';
import { serializeError } from '../logging/error-serializer.js';
import { getCorrelationId } from '../logging/middleware.js';

const middlewareLogger = getLogger('error-handling:middleware');

export enum DomainErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  UNAUTHORIZED = 'UNAUTHORIZED',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public readonly code?: string;

  constructor(message: string, statusCode: number = 500, cause?: Error, code?: string) {
    super(message, cause ? { cause } : undefined);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.code = code;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

type BaseErrorCodes = {
  UNAUTHORIZED: string;
  INTERNAL_ERROR: string;
};

/**
 * Builds a service-specific error class whose codes extend DomainErrorCode.
 */
export function createDomainServiceError<C extends BaseErrorCodes>(serviceName: string, domainErrorCodes: C) {
  type Code = C[keyof C] & string;

  class ServiceError extends DomainServiceError<Code> {
    constructor(message: string, statusCode = 500, code?: Code, cause?: Error) {
      super(message, statusCode, code ?? (domainErrorCodes.INTERNAL_ERROR as Code), cause, serviceName);
    }

    static unauthorized(message = 'Unauthorized') {
      return new ServiceError(message, 401, domainErrorCodes.UNAUTHORIZED as Code);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

/**
 * HTTP status carried by errors that are not DomainErrors, such as
 * body-parser's `entity.parse.failed` (status 400).
 */
function statusOf(error: unknown): number {
  if (error instanceof DomainError) return error.statusCode;
  if (error && typeof error === 'object') {
    for (const field of ['statusCode', 'status']) {
      const value: unknown = Reflect.get(error, field);
      if (typeof value === 'number' && value >= 400 && value < 600) return value;
    }
  }
  return 500;
}

/**
 * Final Express error middleware. Every error leaves as the vendor error envelope.
 */
export function errorHandler(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const statusCode = statusOf(error);
    const correlationId = getCorrelationId(res);

    if (statusCode >= 500) {
      middlewareLogger.error('Unhandled error', {
        error: serializeError(error),
        correlationId,
        url: req.originalUrl,
        method: req.method,
      });
    } else {
      middlewareLogger.debug('Request failed with client error', {
        error: errorMessage(error),
        statusCode,
        correlationId,
        url: req.originalUrl,
      });
    }

    const message =
      statusCode >= 500 && process.env.NODE_ENV === 'production' ? 'Internal Server Error' : errorMessage(error);

    sendVendorError(res, statusCode, message);
  };
}

export function notFoundHandler(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    next(new DomainError(`Route ${req.method} ${req.path} not found`, 404, undefined, DomainErrorCode.NOT_FOUND));
  };
}
