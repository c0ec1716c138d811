/**
 * Log Formatting
 *
 * Console formats for development and JSON lines for everything else. Both
 * pass metadata through secret masking before it is written.
 */

import * as winston from 'winston';
import { currentCorrelationId } from './correlation';

// Key-based matching; the Api-Token header and configured tokens must never reach the logs
const SECRET_PATTERNS = [/authorization/i, /api[-_]?key/i, /token/i, /secret/i, /password/i, /cookie/i];
// Counts such as tokenCount carry no secret
const COUNT_KEY = /count$/i;

export const REDACTED = '[REDACTED]';

const DEV_META_LIMIT = 1000;
const JSON_LINE_LIMIT = 50000;

export function isSecretKey(key: string): boolean {
  return !COUNT_KEY.test(key) && SECRET_PATTERNS.some(pattern => pattern.test(key));
}

export function maskSecrets(value: unknown, maxDepth = 3): unknown {
  if (maxDepth <= 0 || value === null || typeof value !== 'object') {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map(item => maskSecrets(item, maxDepth - 1));
  }
  return Object.fromEntries(
    Object.entries(value).map(([key, entry]) => [key, isSecretKey(key) ? REDACTED : maskSecrets(entry, maxDepth - 1)])
  );
}

export function safeStringify(value: unknown, maxSize = 10000): string {
  try {
    const json = JSON.stringify(maskSecrets(value, 5));
    return json.length > maxSize ? `${json.substring(0, maxSize)}...[TRUNCATED]` : json;
  } catch {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

// Fills correlationId from the active request when the caller did not pass one
const attachCorrelation = winston.format(info => {
  if (!info.correlationId) {
    const correlationId = currentCorrelationId();
    if (correlationId) info.correlationId = correlationId;
  }
  return info;
});

export function createDevFormat(): winston.Logform.Format {
  return winston.format.combine(
    attachCorrelation(),
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, ...meta }) => {
      const serviceTag = service ? `[${String(service)}]` : '';
      const correlationTag = correlationId ? ` [${String(correlationId).slice(0, 8)}]` : '';
      const metaText = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, DEV_META_LIMIT)}` : '';

      return `${String(timestamp)} ${level}${serviceTag}${correlationTag}: ${String(message)}${metaText}`;
    })
  );
}

export function createJsonFormat(): winston.Logform.Format {
  return winston.format.combine(
    attachCorrelation(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => safeStringify(info, JSON_LINE_LIMIT))
  );
}
