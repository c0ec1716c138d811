export type { Logger } from 'winston';

/**
 * Request-scoped fields attached to every log line written while a request
 * is in flight.
 */
export interface RequestLogContext {
  correlationId: string;
  service: string;
  method: string;
  url: string;
}

export interface LoggerMeta {
  service: string;
  env: string;
  version?: string;
  instanceId?: string;
}
