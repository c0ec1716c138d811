/**
 * Correlation ids: carried in AsyncLocalStorage for the log formats and
 * echoed to the client in the x-correlation-id header.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';
import type { IncomingHttpHeaders } from 'http';
import type { RequestLogContext } from './types';

export const CORRELATION_HEADER = 'x-correlation-id';
const REQUEST_ID_HEADER = 'x-request-id';

export const correlationStorage = new AsyncLocalStorage<RequestLogContext>();

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  const trimmed = first?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Incoming x-correlation-id, then x-request-id, otherwise a fresh UUID.
 */
export function resolveCorrelationId(headers: IncomingHttpHeaders): string {
  return firstHeader(headers[CORRELATION_HEADER]) ?? firstHeader(headers[REQUEST_ID_HEADER]) ?? randomUUID();
}

export function currentCorrelationId(): string | undefined {
  return correlationStorage.getStore()?.correlationId;
}
