/**
 * Types for gate findings and their aggregate.
 */

export type Severity = 'error' | 'warning';

/**
 * One pass/fail observation about a file (or the tree, for layout findings).
 */
export interface Finding {
  severity: Severity;
  /** Absolute path of the offending file, or of the root for tree-level findings */
  file: string;
  /** 1-based line, 0 when the finding concerns the whole file */
  line: number;
  rule: string;
  message: string;
}

export interface FindingSummary {
  errors: number;
  warnings: number;
}
