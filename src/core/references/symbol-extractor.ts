/**
 * Identifier-reference binding. There is no import graph for these
 * sources, so a reference is a whole-word occurrence of another file's
 * class name on a non-comment line. This is a textual approximation:
 * a name inside a string literal counts, a fully qualified alias does not.
 */
import { OOP_COMMENTS, scanLines } from './comments.js';
import { importDenylistFor, FORBIDDEN_CALLS } from './forbidden-apis.js';
import type { ApiUsage, Reference } from './types.js';

const WORD_CHAR = '[\\p{L}\\p{N}_]';

/**
 * Build a matcher for `name` as a whole word.
 */
export function wholeWordPattern(name: string): RegExp {
  const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`(?<!${WORD_CHAR})${escaped}(?!${WORD_CHAR})`, 'u');
}

/**
 * One reference per (line, candidate) pair found in the file.
 */
export function extractSymbolReferences(content: string, candidates: readonly string[]): Reference[] {
  if (candidates.length === 0) {
    return [];
  }
  const matchers = candidates.map((name) => ({ name, pattern: wholeWordPattern(name) }));
  const references: Reference[] = [];

  for (const line of scanLines(content, OOP_COMMENTS)) {
    if (line.comment || line.blank) {
      continue;
    }
    for (const { name, pattern } of matchers) {
      if (pattern.test(line.text)) {
        references.push({ kind: 'symbol', target: name, path: name, line: line.number, raw: line.text });
      }
    }
  }

  return references;
}

/**
 * Denylisted namespace imports and API calls, outside comments.
 */
export function extractApiUsages(content: string, extension: string): ApiUsage[] {
  const imports = importDenylistFor(extension);
  const usages: ApiUsage[] = [];

  for (const line of scanLines(content, OOP_COMMENTS)) {
    if (line.comment || line.blank) {
      continue;
    }
    for (const entry of imports) {
      if (entry.pattern.test(line.text)) {
        usages.push({ form: 'import', rule: entry.rule, description: entry.description, line: line.number, raw: line.text });
      }
    }
    for (const entry of FORBIDDEN_CALLS) {
      if (entry.pattern.test(line.text)) {
        usages.push({ form: 'call', rule: entry.rule, description: entry.description, line: line.number, raw: line.text });
      }
    }
  }

  return usages;
}
