/**
 * Tests for comment-aware line scanning.
 */
import { describe, it, expect } from 'vitest';
import { C_COMMENTS, OOP_COMMENTS, scanLines, splitLines } from '../../../../src/core/references/comments.js';

describe('splitLines', () => {
  it('should split on LF and CRLF and drops the final empty line', () => {
    expect(splitLines('a\r\nb\nc\n')).toEqual(['a', 'b', 'c']);
    expect(splitLines('')).toEqual([]);
  });
});

describe('scanLines', () => {
  it('should number lines from 1 and marks blanks', () => {
    const lines = scanLines('int a;\n\n  \n', C_COMMENTS);
    expect(lines.map((l) => [l.number, l.blank, l.comment])).toEqual([
      [1, false, false],
      [2, true, false],
      [3, true, false],
    ]);
  });

  it('should track block comments across lines', () => {
    const content = ['/* header', '#include "prx_X.h"', '*/', 'int x;'].join('\n');
    expect(scanLines(content, C_COMMENTS).map((l) => l.comment)).toEqual([true, true, true, false]);
  });

  it('should treat a one-line block comment as a comment without opening a block', () => {
    const content = ['/* note */', 'int x;'].join('\n');
    expect(scanLines(content, C_COMMENTS).map((l) => l.comment)).toEqual([true, false]);
  });

  it('should count code after a closed block on the opening line as comment', () => {
    const content = ['/* x */ int a;', '#include "prx_X.h"'].join('\n');
    expect(scanLines(content, C_COMMENTS).map((l) => l.comment)).toEqual([true, false]);
  });

  it('should know both OOP line comment markers', () => {
    const content = ["' vb comment", '// cs comment', 'Dim x = 1'].join('\n');
    expect(scanLines(content, OOP_COMMENTS).map((l) => l.comment)).toEqual([true, true, false]);
  });

  it('should not treat an apostrophe as a comment in C sources', () => {
    expect(scanLines("'a';", C_COMMENTS)[0].comment).toBe(false);
  });
});
