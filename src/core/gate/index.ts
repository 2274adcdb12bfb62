/**
 * Gate entry point: resolves the root, runs one binding and folds its
 * findings into a verdict.
 */
import * as path from 'node:path';
import { aggregateFindings, isPassing, summarize } from '../findings/aggregator.js';
import { normalizeExtensions } from '../discovery/scanner.js';
import { ErrorCodes, GateError } from '../../utils/errors.js';
import { isDirectory, toPosixPath } from '../../utils/file-system.js';
import { logger } from '../../utils/logger.js';
import { runIncludeGate } from './include-gate.js';
import { runSymbolGate } from './symbol-gate.js';
import { GATE_BINDINGS, type BindingRun, type GateBinding, type GateOptions, type GateResult } from './types.js';

export * from './types.js';
export { INCLUDE_TAG_CASE, runIncludeGate } from './include-gate.js';
export { runSymbolGate, SYMBOL_TAG_CASE } from './symbol-gate.js';

export function isGateBinding(value: string): value is GateBinding {
  return GATE_BINDINGS.some((binding) => binding === value);
}

/**
 * Run one binding over `options.root`.
 * @throws GateError when the root is not a directory
 */
export async function runGate(options: GateOptions): Promise<GateResult> {
  const root = toPosixPath(path.resolve(options.root));
  if (!(await isDirectory(root))) {
    throw new GateError(ErrorCodes.ROOT_NOT_FOUND, `Root directory not found: ${root}`, { root });
  }

  const { config, binding } = options;
  const configured =
    binding === 'include' ? config.bindings.include.extensions : config.bindings.symbol.extensions;
  const extensions = normalizeExtensions(options.extensions ?? configured);

  logger.debug(`Running ${binding} gate`, { root, extensions });
  const run: BindingRun =
    binding === 'include'
      ? await runIncludeGate(root, config, extensions)
      : await runSymbolGate(root, config, extensions);

  const findings = aggregateFindings(run.findings);
  const summary = summarize(findings);
  logger.debug(`Gate finished`, { files: run.filesScanned, ...summary });

  return {
    root,
    binding,
    filesScanned: run.filesScanned,
    findings,
    summary,
    passed: isPassing(findings),
    noop: run.noop,
  };
}
