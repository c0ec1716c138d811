export * from './env-parsing.js';
