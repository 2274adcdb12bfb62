export * from './types.js';
export * from './scanner.js';
