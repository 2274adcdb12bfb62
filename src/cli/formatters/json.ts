import type { GateResult } from '../../core/gate/types.js';
import { buildReport, serializeReport } from '../../core/report/writer.js';
import { visibleFindings } from './display.js';
import type { FormatOptions, IFormatter } from './types.js';

/**
 * JSON output formatter for machine consumption. Same shape as the
 * structured report.
 */
export class JsonFormatter implements IFormatter {
  private errorsOnly: boolean;

  constructor(options: Partial<FormatOptions> = {}) {
    this.errorsOnly = options.errorsOnly ?? false;
  }

  format(result: GateResult): string {
    const report = buildReport({ ...result, findings: visibleFindings(result, this.errorsOnly) });
    return serializeReport(report).trimEnd();
  }
}
