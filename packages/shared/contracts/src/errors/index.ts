export * from './vendor-error.js';
