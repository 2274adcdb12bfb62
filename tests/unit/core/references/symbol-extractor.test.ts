/**
 * Tests for identifier-reference extraction.
 */
import { describe, it, expect } from 'vitest';
import {
  extractApiUsages,
  extractSymbolReferences,
  wholeWordPattern,
} from '../../../../src/core/references/symbol-extractor.js';
import { importDenylistFor, FORBIDDEN_IMPORTS_CS, FORBIDDEN_IMPORTS_VB } from '../../../../src/core/references/forbidden-apis.js';

describe('wholeWordPattern', () => {
  it('should match whole identifiers only', () => {
    const pattern = wholeWordPattern('ida_Motor');
    expect(pattern.test('Dim m As New ida_Motor()')).toBe(true);
    expect(pattern.test('ida_Motor.Compute(x)')).toBe(true);
    expect(pattern.test('ida_MotorSpeed.Compute(x)')).toBe(false);
    expect(pattern.test('my_ida_Motor')).toBe(false);
  });

  it('should escape regular expression characters in names', () => {
    expect(wholeWordPattern('a.b').test('axb')).toBe(false);
    expect(wholeWordPattern('a.b').test('use a.b here')).toBe(true);
  });
});

describe('extractSymbolReferences', () => {
  it('should report one reference per line and candidate', () => {
    const content = ['Imports Foo', 'Dim a = ida_Motor.Run(prx_Pump)', "' ida_Motor in a comment", 'ida_Motor.Stop()'].join('\n');
    const refs = extractSymbolReferences(content, ['ida_Motor', 'prx_Pump']);
    expect(refs.map((r) => [r.target, r.line])).toEqual([
      ['ida_Motor', 2],
      ['prx_Pump', 2],
      ['ida_Motor', 4],
    ]);
    expect(refs[0]).toMatchObject({ kind: 'symbol', path: 'ida_Motor', raw: 'Dim a = ida_Motor.Run(prx_Pump)' });
  });

  it('should skip block comments', () => {
    const content = ['/*', ' ida_Motor m;', '*/', 'var x = 1;'].join('\n');
    expect(extractSymbolReferences(content, ['ida_Motor'])).toEqual([]);
  });

  it('should return nothing without candidates', () => {
    expect(extractSymbolReferences('ida_Motor', [])).toEqual([]);
  });
});

describe('importDenylistFor', () => {
  it('should use the Imports form for .vb and the using form otherwise', () => {
    expect(importDenylistFor('.vb')).toBe(FORBIDDEN_IMPORTS_VB);
    expect(importDenylistFor('.cs')).toBe(FORBIDDEN_IMPORTS_CS);
  });
});

describe('extractApiUsages', () => {
  it('should find forbidden VB imports', () => {
    const usages = extractApiUsages(['Imports System.Windows.Forms', 'Imports System.Drawing.Color', 'Imports System.Text'].join('\n'), '.vb');
    expect(usages.map((u) => [u.rule, u.line, u.form])).toEqual([['ida-no-winforms', 1, 'import']]);
  });

  it('should report both serial port and file I/O for System.IO.Ports', () => {
    const usages = extractApiUsages('Imports System.IO.Ports', '.vb');
    expect(usages.map((u) => u.rule)).toEqual(['ida-no-serialport', 'ida-no-fileio']);
  });

  it('should find forbidden C# using directives', () => {
    const usages = extractApiUsages(['using System.IO;', 'using System.IO.Compression;', 'using System.Drawing;'].join('\n'), '.cs');
    expect(usages.map((u) => [u.rule, u.line])).toEqual([
      ['ida-no-fileio', 1],
      ['ida-no-drawing', 3],
    ]);
  });

  it('should find forbidden calls anywhere on a line', () => {
    const content = ['If x Then MessageBox.Show("hi")', 'Me.BeginInvoke(d)', 'Thread.Sleep(10)', 'Process.Start("cmd")'].join('\n');
    expect(extractApiUsages(content, '.vb').map((u) => [u.rule, u.form])).toEqual([
      ['ida-no-messagebox', 'call'],
      ['ida-no-invoke', 'call'],
      ['ida-no-threadsleep', 'call'],
      ['ida-no-processstart', 'call'],
    ]);
  });

  it('should ignore commented-out usages', () => {
    expect(extractApiUsages("' Thread.Sleep(10)\n// Process.Start(x)", '.vb')).toEqual([]);
  });
});
