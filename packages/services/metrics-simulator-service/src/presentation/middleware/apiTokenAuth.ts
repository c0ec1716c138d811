/**
 * Api-Token Authentication
 *
 * Accepts `Authorization: Api-Token <token>` when the token is one of the
 * configured ones. Rejections are passed on as 401 SimulatorErrors.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { getCorrelationId } from '@metricsim/platform-core';
import { SimulatorError } from '../../application/errors';
import { getLogger } from '../../config/logger';

const logger = getLogger('api-token-auth');

export const API_TOKEN_SCHEME = 'Api-Token';

export const AuthMessages = {
  MISSING_HEADER: "Missing Authorization header. Expected format: 'Api-Token {token}'",
  INVALID_FORMAT: "Invalid Authorization header format. Expected format: 'Api-Token {token}'",
  INVALID_TOKEN: 'Invalid API token',
} as const;

// Hashing first gives equal-length buffers, so the comparison time does not depend on the token
function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf8').digest();
}

export function createApiTokenAuth(validTokens: readonly string[]): RequestHandler {
  const tokenDigests = validTokens.map(digest);

  const isValidToken = (token: string): boolean => {
    const candidate = digest(token);
    return tokenDigests.reduce((matched, known) => timingSafeEqual(candidate, known) || matched, false);
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    const header = req.headers.authorization ?? '';

    if (!header) {
      next(SimulatorError.unauthorized(AuthMessages.MISSING_HEADER));
      return;
    }

    const separator = header.indexOf(' ');
    const scheme = separator === -1 ? header : header.substring(0, separator);
    const token = separator === -1 ? '' : header.substring(separator + 1);

    if (separator === -1 || scheme !== API_TOKEN_SCHEME) {
      logger.debug('Rejected authorization scheme', { correlationId: getCorrelationId(res), path: req.path });
      next(SimulatorError.unauthorized(AuthMessages.INVALID_FORMAT));
      return;
    }

    if (!isValidToken(token)) {
      logger.warn('Rejected API token', { correlationId: getCorrelationId(res), path: req.path });
      next(SimulatorError.unauthorized(AuthMessages.INVALID_TOKEN));
      return;
    }

    next();
  };
}
