/**
 * Line classification shared by the extractors and the red-flag heuristics.
 */
import type { CommentSyntax } from './types.js';

export const C_COMMENTS: CommentSyntax = { line: ['//'], block: true };

/** VB uses `'`, C# uses `//` and block comments. */
export const OOP_COMMENTS: CommentSyntax = { line: ["'", '//'], block: true };

export interface SourceLine {
  /** 1-based */
  number: number;
  text: string;
  /** Whole line is comment (line comment, block comment, or block continuation) */
  comment: boolean;
  blank: boolean;
}

export function splitLines(content: string): string[] {
  const lines = content.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Walk a file line by line, tracking block comments across lines.
 * Every line that starts with a block opener counts as comment, including
 * any code that follows the block's close on the same line.
 */
export function scanLines(content: string, syntax: CommentSyntax): SourceLine[] {
  const result: SourceLine[] = [];
  let inBlock = false;

  splitLines(content).forEach((text, index) => {
    const stripped = text.trim();
    const entry = { number: index + 1, text, blank: stripped.length === 0 };

    if (inBlock) {
      if (stripped.includes('*/')) {
        inBlock = false;
      }
      result.push({ ...entry, comment: true });
      return;
    }

    if (syntax.block && stripped.startsWith('/*')) {
      if (!stripped.slice(2).includes('*/')) {
        inBlock = true;
      }
      result.push({ ...entry, comment: true });
      return;
    }

    const comment =
      syntax.line.some((marker) => stripped.startsWith(marker)) ||
      (syntax.block && stripped.startsWith('*'));
    result.push({ ...entry, comment });
  });

  return result;
}
