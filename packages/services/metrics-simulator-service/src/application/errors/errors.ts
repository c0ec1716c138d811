import { DomainErrorCode, createDomainServiceError } from '@metricsim/platform-core';

const SimulatorDomainCodes = {
  METRIC_NOT_FOUND: 'METRIC_NOT_FOUND',
  NO_MATCHING_METRIC: 'NO_MATCHING_METRIC',
  TOO_MANY_DATA_POINTS: 'TOO_MANY_DATA_POINTS',
  INVALID_CATALOGUE: 'INVALID_CATALOGUE',
} as const;

export const SimulatorErrorCode = { ...DomainErrorCode, ...SimulatorDomainCodes } as const;

const SimulatorErrorBase = createDomainServiceError('Simulator', SimulatorErrorCode);

export class SimulatorError extends SimulatorErrorBase {
  static metricNotFound(metricId: string) {
    return new SimulatorError(`Metric '${metricId}' not found`, 404, SimulatorErrorCode.METRIC_NOT_FOUND);
  }

  static noMatchingMetric(metricSelector: string) {
    return new SimulatorError(
      `No metrics found matching selector '${metricSelector}'`,
      404,
      SimulatorErrorCode.NO_MATCHING_METRIC
    );
  }

  static tooManyDataPoints(requested: number, limit: number) {
    return new SimulatorError(
      `Requested time range yields ${requested} data points, which exceeds the limit of ${limit}. Narrow the range or use a coarser resolution.`,
      400,
      SimulatorErrorCode.TOO_MANY_DATA_POINTS
    );
  }

  static invalidCatalogue(source: string, reason: string, cause?: Error) {
    return new SimulatorError(
      `Invalid metric catalogue (${source}): ${reason}`,
      500,
      SimulatorErrorCode.INVALID_CATALOGUE,
      cause
    );
  }
}
