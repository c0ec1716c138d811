export * from './metric-definition.js';
export * from './envelopes.js';
