export * from './types.js';
export * from './record.js';
export * from './loader.js';
export * from './writer.js';
