/**
 * Platform Core
 *
 * Shared backend plumbing for the simulator services: logging, errors,
 * environment parsing, request validation and lifecycle.
 */

export * from './logging/index.js';

export * from './error-handling/errors.js';

export * from './config/index.js';

export * from './middleware/index.js';

export * from './lifecycle/gracefulShutdown.js';
