/**
 * layergate library exports.
 */

// Configuration
export * from './core/config/index.js';

// Engine
export * from './core/roles/index.js';
export * from './core/layout/index.js';
export * from './core/discovery/index.js';
export * from './core/references/index.js';
export * from './core/rules/index.js';
export * from './core/isolation/index.js';
export * from './core/red-flags/index.js';
export * from './core/findings/index.js';
export * from './core/gate/index.js';
export * from './core/report/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
