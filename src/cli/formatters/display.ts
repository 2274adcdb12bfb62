import type { Finding } from '../../core/findings/types.js';
import type { GateResult } from '../../core/gate/types.js';

/**
 * Path of a finding relative to the scanned root, forward slashes.
 * Paths outside the root are shown as given.
 */
export function displayPath(file: string, root: string): string {
  if (file === root) {
    return '.';
  }
  const prefix = root.endsWith('/') ? root : `${root}/`;
  return file.startsWith(prefix) ? file.slice(prefix.length) : file;
}

export function visibleFindings(result: GateResult, errorsOnly: boolean): Finding[] {
  return errorsOnly ? result.findings.filter((f) => f.severity === 'error') : result.findings;
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
