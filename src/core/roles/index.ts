export * from './types.js';
export * from './classifier.js';
