/**
 * Compact output formatter for CI/pre-commit hooks.
 * One line per finding for easy parsing.
 */
import type { Finding } from '../../core/findings/types.js';
import type { GateResult } from '../../core/gate/types.js';
import { displayPath, plural, visibleFindings } from './display.js';
import type { FormatOptions, IFormatter } from './types.js';

/**
 * Format: file:line: SEVERITY [rule] message
 */
export class CompactFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  format(result: GateResult): string {
    const lines = visibleFindings(result, this.errorsOnly).map((finding) => this.formatFinding(finding, result.root));
    if (lines.length > 0) {
      lines.push('');
    }
    lines.push(this.formatSummary(result));
    return lines.join('\n');
  }

  private formatFinding(finding: Finding, root: string): string {
    const severity = finding.severity === 'error' ? 'ERROR' : 'WARN';
    return `${displayPath(finding.file, root)}:${finding.line}: ${severity} [${finding.rule}] ${finding.message}`;
  }

  private formatSummary(result: GateResult): string {
    if (result.noop) {
      return 'SUMMARY: nothing to verify (0 files checked)';
    }
    const { errors, warnings } = result.summary;
    const parts: string[] = [];
    if (errors > 0) {
      parts.push(plural(errors, 'error'));
    }
    if (warnings > 0) {
      parts.push(plural(warnings, 'warning'));
    }
    if (parts.length === 0) {
      parts.push('0 issues');
    }
    return `SUMMARY: ${parts.join(', ')} (${plural(result.filesScanned, 'file')} checked)`;
  }
}
