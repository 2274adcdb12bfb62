/**
 * Option parsing and exit-code policy for the check command.
 */
import type { Config, ExitCodesConfig } from '../../core/config/schema.js';
import { isGateBinding } from '../../core/gate/index.js';
import type { GateBinding, GateResult } from '../../core/gate/types.js';
import { ErrorCodes, GateError } from '../../utils/errors.js';
import type { LogLevel } from '../../utils/logger.js';
import { OUTPUT_FORMATS, type OutputFormat } from '../formatters/types.js';

/** Exit code when the run aborts before a config is available. */
export const DEFAULT_FATAL_EXIT_CODE = 1;

export interface CheckOptions {
  binding: string;
  extensions?: string;
  report?: string;
  format: string;
  config?: string;
  redFlags: boolean;
  errorsOnly?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export function parseBinding(value: string): GateBinding {
  const binding = value.trim().toLowerCase();
  if (!isGateBinding(binding)) {
    throw new GateError(ErrorCodes.UNKNOWN_BINDING, `Unknown binding '${value}'. Use 'include' or 'symbol'.`, {
      binding: value,
    });
  }
  return binding;
}

export function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new GateError(ErrorCodes.INVALID_OPTION, `Unknown format '${value}'. Use human, json or compact.`, {
      format: value,
    });
  }
  return format;
}

export function resolveLogLevel(options: Pick<CheckOptions, 'quiet' | 'verbose'>): LogLevel {
  if (options.quiet) return 'silent';
  if (options.verbose) return 'debug';
  return 'info';
}

/**
 * Config with the red-flag switch forced by the command line.
 */
export function applyRedFlagOption(config: Config, enabled: boolean): Config {
  if (enabled) {
    return config;
  }
  return { ...config, red_flags: { ...config.red_flags, enabled: false } };
}

/**
 * A no-op run and a passing run both succeed; any error fails.
 */
export function getExitCode(result: GateResult, exitCodes: ExitCodesConfig): number {
  if (result.noop || result.passed) {
    return exitCodes.success;
  }
  return exitCodes.failure;
}
