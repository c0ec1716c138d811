/**
 * Shared contracts for the metrics simulator
 *
 * Wire formats of the simulated Metrics v2 API. The service and platform-core
 * import these instead of declaring local copies.
 */

export * from './metrics/index.js';

export * from './errors/index.js';
