/**
 * Types for a gate run.
 */
import type { Config } from '../config/schema.js';
import type { Finding, FindingSummary } from '../findings/types.js';

/**
 * `include` - C-family sources checked through `#include` directives.
 * `symbol` - object-oriented sources checked through imports and
 * identifier occurrences.
 */
export type GateBinding = 'include' | 'symbol';

export const GATE_BINDINGS: readonly GateBinding[] = ['include', 'symbol'];

export interface GateOptions {
  root: string;
  binding: GateBinding;
  config: Config;
  /** Overrides the binding's configured extensions */
  extensions?: readonly string[];
}

/**
 * Raw output of one binding, before aggregation.
 */
export interface BindingRun {
  filesScanned: number;
  findings: Finding[];
  /** Nothing in the tree was subject to the binding's checks */
  noop: boolean;
}

export interface GateResult {
  /** Absolute root, forward slashes */
  root: string;
  binding: GateBinding;
  filesScanned: number;
  /** Deduplicated, sorted by (file, line, rule) */
  findings: Finding[];
  summary: FindingSummary;
  passed: boolean;
  noop: boolean;
}
