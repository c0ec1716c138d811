import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { MetricCatalogueFileSchema, type MetricDefinition } from '@metricsim/contracts';
import { errorMessage } from '@metricsim/platform-core';
import { SimulatorError } from '../../application/errors';
import { getLogger } from '../../config/logger';
import type { MetricCatalogue } from './MetricCatalogue';

const logger = getLogger('metric-catalogue');

export const DEFAULT_CATALOGUE_PATH = fileURLToPath(new URL('../../../data/metric-catalogue.json', import.meta.url));

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validates raw catalogue JSON and freezes the result.
 */
export function parseMetricCatalogue(raw: unknown, source = 'inline'): MetricCatalogue {
  const result = MetricCatalogueFileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw SimulatorError.invalidCatalogue(source, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  }
  const metrics: readonly MetricDefinition[] = result.data.metrics;
  return deepFreeze(metrics);
}

export function loadMetricCatalogue(filePath: string = DEFAULT_CATALOGUE_PATH): MetricCatalogue {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw SimulatorError.invalidCatalogue(filePath, errorMessage(error), error instanceof Error ? error : undefined);
  }

  const catalogue = parseMetricCatalogue(raw, filePath);
  logger.info('Metric catalogue loaded', { filePath, metricCount: catalogue.length });
  return catalogue;
}
