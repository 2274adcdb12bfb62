export * from './cross-feature.js';
