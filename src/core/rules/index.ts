export * from './types.js';
export * from './graph.js';
export * from './ownership.js';
export * from './engine.js';
