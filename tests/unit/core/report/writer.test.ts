/**
 * Tests for the JSON report.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { buildReport, serializeReport, writeReport } from '../../../../src/core/report/writer.js';
import { error, warning } from '../../../../src/core/findings/aggregator.js';
import type { GateResult } from '../../../../src/core/gate/types.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

const result: GateResult = {
  root: '/proj',
  binding: 'include',
  filesScanned: 4,
  findings: [
    error('/proj/project/features/Motor/poi_Motor.c', 2, 'poi.include', 'Poiesis must not include Idea headers: ida_Motor.h'),
    warning('/proj/project/features/Motor/ida_Motor.c', 0, 'red-flag-empty-idea', 'Possible empty Idea'),
  ],
  summary: { errors: 1, warnings: 1 },
  passed: false,
  noop: false,
};

describe('buildReport', () => {
  it('should copy the run and stamp it in UTC', () => {
    const report = buildReport(result, new Date(Date.UTC(2026, 0, 2, 3, 4, 5)));
    expect(report).toEqual({
      generatedAt: '2026-01-02T03:04:05.000Z',
      root: '/proj',
      binding: 'include',
      filesScanned: 4,
      errorCount: 1,
      warningCount: 1,
      passed: false,
      findings: result.findings,
    });
  });
});

describe('serializeReport', () => {
  it('should pretty-print with a trailing newline', () => {
    const text = serializeReport(buildReport(result));
    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[1]).toMatch(/^ {2}"generatedAt": /);
  });
});

describe('writeReport', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'layergate-report-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should create parent directories', async () => {
    const reportPath = path.join(dir, 'out', 'gate.json');
    const report = buildReport(result);
    await writeReport(reportPath, report);
    const written: unknown = JSON.parse(await fs.promises.readFile(reportPath, 'utf-8'));
    expect(written).toEqual(report);
  });

  it('should raise SystemError when the path cannot be written', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.promises.writeFile(blocker, '');
    const reportPath = path.join(blocker, 'gate.json');
    try {
      await writeReport(reportPath, buildReport(result));
      expect.unreachable('writeReport should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(SystemError);
      if (err instanceof SystemError) {
        expect(err.code).toBe(ErrorCodes.REPORT_WRITE_ERROR);
        expect(err.message.startsWith(`Cannot write report ${reportPath}: `)).toBe(true);
      }
    }
  });
});
