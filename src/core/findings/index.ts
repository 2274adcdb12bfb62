export * from './types.js';
export * from './aggregator.js';
