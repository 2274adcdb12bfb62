/**
 * Structured JSON report of a gate run.
 */
import type { Finding } from '../findings/types.js';
import type { GateBinding, GateResult } from '../gate/types.js';
import { writeFile } from '../../utils/file-system.js';
import { describeError, ErrorCodes, SystemError } from '../../utils/errors.js';

export interface GateReport {
  /** ISO-8601, UTC */
  generatedAt: string;
  root: string;
  binding: GateBinding;
  filesScanned: number;
  errorCount: number;
  warningCount: number;
  passed: boolean;
  findings: Finding[];
}

export function buildReport(result: GateResult, now: Date = new Date()): GateReport {
  return {
    generatedAt: now.toISOString(),
    root: result.root,
    binding: result.binding,
    filesScanned: result.filesScanned,
    errorCount: result.summary.errors,
    warningCount: result.summary.warnings,
    passed: result.passed,
    findings: result.findings.map(({ severity, file, line, rule, message }) => ({
      severity,
      file,
      line,
      rule,
      message,
    })),
  };
}

export function serializeReport(report: GateReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}

/**
 * Write the report, creating parent directories.
 * @throws SystemError when the file cannot be written
 */
export async function writeReport(reportPath: string, report: GateReport): Promise<void> {
  try {
    await writeFile(reportPath, serializeReport(report));
  } catch (error) {
    throw new SystemError(ErrorCodes.REPORT_WRITE_ERROR, `Cannot write report ${reportPath}: ${describeError(error)}`, {
      reportPath,
    });
  }
}
