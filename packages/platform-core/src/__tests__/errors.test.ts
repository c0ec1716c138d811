import { describe, it, expect } from 'vitest';
import express, { type Request, type Response, type NextFunction } from 'express';
import request from 'supertest';
import {
  DomainError,
  DomainErrorCode,
  createDomainServiceError,
  errorHandler,
  errorMessage,
  notFoundHandler,
} from '../error-handling/errors';

const SampleCodes = { ...DomainErrorCode, SAMPLE_MISSING: 'SAMPLE_MISSING' } as const;
const SampleError = createDomainServiceError('Sample', SampleCodes);

describe('DomainError', () => {
  it('should default to status 500', () => {
    const error = new DomainError('boom');
    expect(error.statusCode).toBe(500);
    expect(error.name).toBe('DomainError');
  });

  it('should keep the cause', () => {
    const cause = new Error('root');
    const error = new DomainError('wrapped', 502, cause);
    expect(error.cause).toBe(cause);
  });
});

describe('createDomainServiceError', () => {
  it('should name errors after the service', () => {
    expect(new SampleError('x').name).toBe('SampleError');
  });

  it('should use INTERNAL_ERROR when no code is given', () => {
    const error = new SampleError('x');
    expect(error.code).toBe(DomainErrorCode.INTERNAL_ERROR);
    expect(error.statusCode).toBe(500);
  });

  it('unauthorized should map to 401', () => {
    const error = SampleError.unauthorized('Invalid API token');
    expect(error.statusCode).toBe(401);
    expect(error.message).toBe('Invalid API token');
    expect(error.code).toBe(DomainErrorCode.UNAUTHORIZED);
  });

  it('should accept service-specific codes', () => {
    const error = new SampleError('gone', 404, SampleCodes.SAMPLE_MISSING);
    expect(error.code).toBe('SAMPLE_MISSING');
    expect(error).toBeInstanceOf(DomainError);
  });
});

describe('errorMessage', () => {
  it('should read messages from errors and strings', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('errorHandler', () => {
  function buildApp(error: unknown) {
    const app = express();
    app.get('/fail', (_req: Request, _res: Response, next: NextFunction) => next(error));
    app.use(notFoundHandler());
    app.use(errorHandler());
    return app;
  }

  it('should render DomainErrors as the vendor envelope', async () => {
    const res = await request(buildApp(new DomainError("Metric 'x' not found", 404))).get('/fail');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 404, message: "Metric 'x' not found" } });
  });

  it('should honour a status field on foreign errors', async () => {
    const parseError = Object.assign(new Error('Unexpected token'), { status: 400 });
    const res = await request(buildApp(parseError)).get('/fail');

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ error: { code: 400, message: 'Unexpected token' } });
  });

  it('should fall back to 500 for plain errors', async () => {
    const res = await request(buildApp(new Error('kaput'))).get('/fail');

    expect(res.status).toBe(500);
    expect(res.body.error.code).toBe(500);
  });

  it('should answer unknown routes with 404', async () => {
    const res = await request(buildApp(new Error('unused'))).get('/missing');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ error: { code: 404, message: 'Route GET /missing not found' } });
  });
});
