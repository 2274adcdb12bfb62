/**
 * Formatter type definitions.
 */
import type { GateResult } from '../../core/gate/types.js';

/**
 * Output format options.
 */
export type OutputFormat = 'human' | 'json' | 'compact';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['human', 'json', 'compact'];

/**
 * Options for output formatting.
 */
export interface FormatOptions {
  /** Use colors in output */
  colors: boolean;
  /** Only show errors, hide warnings (default: false) */
  errorsOnly: boolean;
}

/**
 * Interface for output formatters.
 */
export interface IFormatter {
  format(result: GateResult): string;
}
