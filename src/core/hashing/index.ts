export * from './scanner.js';
export * from './pipeline.js';
