/**
 * Metrics Simulator Service - Exports
 */

export { createApp, type AppConfig, type AppDependencies } from './app';
export { loadEnvironmentConfig, type EnvironmentConfig } from './config/environment';
export { MetricsQueryService } from './application/services/MetricsQueryService';
export { SimulatorError, SimulatorErrorCode } from './application/errors';
export { parseMetricSelector, type ParsedSelector } from './domains/selectors/MetricSelectorParser';
export { findMetric, filterMetrics, type MetricCatalogue, type LookupMode } from './domains/catalogue/MetricCatalogue';
export { loadMetricCatalogue, parseMetricCatalogue } from './domains/catalogue/loadMetricCatalogue';
export * from './domains/series';
