import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import express, { type NextFunction, type Request, type Response } from 'express';
import { DomainError, DomainErrorCode } from '@metricsim/platform-core';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../config/logger', () => ({
  SERVICE_NAME: 'metrics-simulator-service',
  getLogger: () => mockLogger,
}));

import { AuthMessages, createApiTokenAuth } from '../../presentation/middleware/apiTokenAuth';

function buildApp(received: unknown[]) {
  const app = express();
  app.get('/guarded', createApiTokenAuth(['test-token']), (_req: Request, res: Response) => {
    res.status(200).json({ passed: true });
  });
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    received.push(error);
    res.status(418).end();
  });
  return app;
}

describe('createApiTokenAuth', () => {
  it('should pass a valid token through', async () => {
    const received: unknown[] = [];
    const response = await request(buildApp(received)).get('/guarded').set('Authorization', 'Api-Token test-token');

    expect(response.status).toBe(200);
    expect(received).toEqual([]);
  });

  it.each([
    ['no header', undefined, AuthMessages.MISSING_HEADER],
    ['another scheme', 'Bearer test-token', AuthMessages.INVALID_FORMAT],
    ['a scheme without a token', 'Api-Token', AuthMessages.INVALID_FORMAT],
    ['an unknown token', 'Api-Token other-token', AuthMessages.INVALID_TOKEN],
  ])('should hand %s to the error middleware as unauthorized', async (_label, authorization, message) => {
    const received: unknown[] = [];
    const call = request(buildApp(received)).get('/guarded');
    await (authorization === undefined ? call : call.set('Authorization', authorization));

    expect(received).toHaveLength(1);
    const [error] = received;
    expect(error).toBeInstanceOf(DomainError);
    if (error instanceof DomainError) {
      expect(error.statusCode).toBe(401);
      expect(error.code).toBe(DomainErrorCode.UNAUTHORIZED);
      expect(error.message).toBe(message);
    }
  });
});
