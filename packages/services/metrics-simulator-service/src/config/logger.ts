/**
 * Service-scoped logger factory for metrics-simulator-service
 */

import { getLogger as getPlatformLogger, type Logger } from '@metricsim/platform-core';

export const SERVICE_NAME = 'metrics-simulator-service';

export function getLogger(module: string): Logger {
  return getPlatformLogger(`${SERVICE_NAME}:${module}`);
}
