/**
 * Textual-include binding: quoted `#include` directives.
 * Angle-bracket (system library) includes never reach the rule engine.
 */
import { C_COMMENTS, scanLines } from './comments.js';
import type { Reference } from './types.js';

const INCLUDE_REGEX = /^\s*#\s*include\s*[<"]([^">]+)[">]/;
const SYSTEM_INCLUDE_REGEX = /^\s*#\s*include\s*</;

export function leafName(includePath: string): string {
  const segments = includePath.split(/[\\/]/);
  return segments[segments.length - 1];
}

export function extractIncludes(content: string): Reference[] {
  const references: Reference[] = [];

  for (const line of scanLines(content, C_COMMENTS)) {
    if (line.comment) {
      continue;
    }
    const match = INCLUDE_REGEX.exec(line.text);
    if (!match || SYSTEM_INCLUDE_REGEX.test(line.text)) {
      continue;
    }
    const includePath = match[1];
    references.push({
      kind: 'include',
      target: leafName(includePath),
      path: includePath,
      line: line.number,
      raw: line.text,
    });
  }

  return references;
}
