/**
 * Finding aggregation: deduplicate by (file, line, rule), sort, count.
 */
import type { Finding, FindingSummary, Severity } from './types.js';

export function createFinding(
  severity: Severity,
  file: string,
  line: number,
  rule: string,
  message: string
): Finding {
  return { severity, file, line, rule, message };
}

export function error(file: string, line: number, rule: string, message: string): Finding {
  return createFinding('error', file, line, rule, message);
}

export function warning(file: string, line: number, rule: string, message: string): Finding {
  return createFinding('warning', file, line, rule, message);
}

/**
 * Total order used for every rendering of findings.
 */
export function compareFindings(a: Finding, b: Finding): number {
  if (a.file !== b.file) {
    return a.file < b.file ? -1 : 1;
  }
  if (a.line !== b.line) {
    return a.line - b.line;
  }
  if (a.rule !== b.rule) {
    return a.rule < b.rule ? -1 : 1;
  }
  return 0;
}

/**
 * Sort findings and keep the first finding for each (file, line, rule) key.
 * The sort is stable, so the surviving finding is the first one produced.
 */
export function aggregateFindings(findings: readonly Finding[]): Finding[] {
  const sorted = [...findings].sort(compareFindings);
  const seen = new Set<string>();
  const unique: Finding[] = [];

  for (const finding of sorted) {
    const key = `${finding.file}\u0000${finding.line}\u0000${finding.rule}`;
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    unique.push(finding);
  }

  return unique;
}

export function summarize(findings: readonly Finding[]): FindingSummary {
  let errors = 0;
  let warnings = 0;
  for (const finding of findings) {
    if (finding.severity === 'error') {
      errors++;
    } else {
      warnings++;
    }
  }
  return { errors, warnings };
}

/**
 * Only error-severity findings fail the gate.
 */
export function isPassing(findings: readonly Finding[]): boolean {
  return findings.every((finding) => finding.severity !== 'error');
}
