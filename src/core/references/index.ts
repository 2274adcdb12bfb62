export * from './types.js';
export * from './comments.js';
export * from './include-extractor.js';
export * from './symbol-extractor.js';
export * from './forbidden-apis.js';
