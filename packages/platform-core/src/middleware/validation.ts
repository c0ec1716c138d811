import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { z } from 'zod';
import { sendVendorError, type ConstraintViolation, type ParameterLocation } from '@metricsim/contracts';
import { getLogger } from '../logging/logger.js';
import { getCorrelationId } from '../logging/middleware.js';

export type ValidatedHandler<T> = (input: T, req: Request, res: Response) => void | Promise<void>;

function isMissingValue(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined';
}

export function toConstraintViolations(error: z.ZodError, location: ParameterLocation): ConstraintViolation[] {
  return error.issues.map(issue => ({
    path: issue.path.join('.'),
    message: issue.message,
    parameterLocation: location,
  }));
}

/**
 * Vendor-style summary: a single missing parameter is named explicitly,
 * anything else reports the generic constraint message.
 */
export function describeValidationFailure(error: z.ZodError): string {
  const missing = error.issues.find(isMissingValue);
  if (missing && missing.path.length > 0) {
    return `Missing required parameter '${missing.path.join('.')}'`;
  }
  return 'Constraints violated.';
}

function createValidator(serviceName: string, location: ParameterLocation, pick: (req: Request) => unknown) {
  const logger = getLogger(`${serviceName}:validation`);

  return function validate<S extends z.ZodTypeAny>(schema: S, handler: ValidatedHandler<z.infer<S>>): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const result = schema.safeParse(pick(req));
      if (!result.success) {
        logger.debug('Request validation failed', {
          location,
          correlationId: getCorrelationId(res),
          issues: result.error.issues.length,
        });
        sendVendorError(
          res,
          400,
          describeValidationFailure(result.error),
          toConstraintViolations(result.error, location)
        );
        return;
      }

      Promise.resolve()
        .then(() => handler(result.data, req, res))
        .catch(next);
    };
  };
}

export function createValidateQuery(serviceName: string) {
  return createValidator(serviceName, 'QUERY', req => req.query);
}

export function createValidateBody(serviceName: string) {
  return createValidator(serviceName, 'PAYLOAD_BODY', req => req.body);
}

export interface ValidationMiddleware {
  validateQuery: ReturnType<typeof createValidateQuery>;
  validateBody: ReturnType<typeof createValidateBody>;
}

export function createValidation(serviceName: string): ValidationMiddleware {
  return {
    validateQuery: createValidateQuery(serviceName),
    validateBody: createValidateBody(serviceName),
  };
}
