export type { Logger, LoggerMeta, RequestLogContext } from './types.js';
export { createLogger, getLogger, resolveLogLevel } from './logger.js';
export { maskSecrets, safeStringify, isSecretKey, REDACTED } from './formatting.js';
export { requestLogger, getCorrelationId } from './middleware.js';
export { CORRELATION_HEADER, resolveCorrelationId, currentCorrelationId } from './correlation.js';
export { serializeError, type SerializedError } from './error-serializer.js';
