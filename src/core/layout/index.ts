export * from './types.js';
export * from './project-layout.js';
export * from './location-validator.js';
export * from './layout-checker.js';
