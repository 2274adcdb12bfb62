import chalk from 'chalk';
import type { Finding } from '../../core/findings/types.js';
import type { GateResult } from '../../core/gate/types.js';
import { displayPath, plural, visibleFindings } from './display.js';
import type { FormatOptions, IFormatter } from './types.js';

/**
 * Human-readable output formatter.
 */
export class HumanFormatter implements IFormatter {
  private options: FormatOptions;

  constructor(options: Partial<FormatOptions> = {}) {
    this.options = {
      colors: options.colors ?? true,
      errorsOnly: options.errorsOnly ?? false,
    };
  }

  format(result: GateResult): string {
    const lines: string[] = [];
    lines.push('═'.repeat(60));
    lines.push(this.formatHeadline(result));
    lines.push('═'.repeat(60));

    for (const finding of visibleFindings(result, this.options.errorsOnly)) {
      lines.push(this.formatFinding(finding, result.root));
    }
    return lines.join('\n');
  }

  private formatHeadline(result: GateResult): string {
    const title = `layergate ${result.binding} gate`;
    if (result.noop) {
      return `${title} - ${this.colorize('NOTHING TO VERIFY', 'dim')} (no ida_/prx_/poi_ files under ${result.root})`;
    }

    const { errors, warnings } = result.summary;
    const counts = `${plural(errors, 'error')}, ${plural(warnings, 'warning')}, ${plural(result.filesScanned, 'file')} scanned`;
    if (errors > 0) {
      return `${title} - ${this.colorize('FAILED', 'red')} (${counts})`;
    }
    if (warnings > 0) {
      return `${title} - ${this.colorize('PASSED (with warnings)', 'yellow')} (${counts})`;
    }
    return `${title} - ${this.colorize('PASSED', 'green')} (${counts})`;
  }

  private formatFinding(finding: Finding, root: string): string {
    const icon = finding.severity === 'error' ? this.colorize('✗', 'red') : this.colorize('⚠', 'yellow');
    const location = `${displayPath(finding.file, root)}:${finding.line}`;
    return `  ${icon} ${location} [${finding.rule}] ${finding.message}`;
  }

  private colorize(text: string, color: 'red' | 'green' | 'yellow' | 'dim'): string {
    if (!this.options.colors) {
      return text;
    }

    switch (color) {
      case 'red':
        return chalk.red(text);
      case 'green':
        return chalk.green(text);
      case 'yellow':
        return chalk.yellow(text);
      case 'dim':
        return chalk.dim(text);
    }
  }
}
