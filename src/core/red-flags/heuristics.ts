/**
 * Advisory structural heuristics. They only ever produce warnings.
 */
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { warning } from '../findings/aggregator.js';
import { scanLines } from '../references/comments.js';
import type { CommentSyntax } from '../references/types.js';
import type { Layer } from '../roles/types.js';
import type { RedFlagsConfig } from '../config/schema.js';

export const EMPTY_IDEA_RULE = 'red-flag-empty-idea';
export const FAT_POIESIS_RULE = 'red-flag-fat-poiesis';

/**
 * Non-blank lines that are neither comments nor preprocessor directives.
 */
export function countCodeLines(content: string, syntax: CommentSyntax): number {
  return scanLines(content, syntax).filter(
    (line) => !line.blank && !line.comment && !line.text.trim().startsWith('#')
  ).length;
}

export function domainConditionalPattern(keywords: readonly string[]): RegExp | null {
  const words = keywords.map((word) => word.trim()).filter((word) => /^\w+$/.test(word));
  if (words.length === 0) {
    return null;
  }
  return new RegExp(`\\b(?:if|switch|case)\\b.*\\b(?:${words.join('|')})\\b`, 'i');
}

export function checkEmptyIdea(file: SourceFile, content: string, syntax: CommentSyntax, minLines: number): Finding[] {
  const count = countCodeLines(content, syntax);
  if (count >= minLines) {
    return [];
  }
  return [
    warning(
      file.path,
      0,
      EMPTY_IDEA_RULE,
      `Possible empty Idea: only ${count} code line(s) (threshold: ${minLines}). ` +
        'Verify that domain judgment is present, not just pass-through calls.'
    ),
  ];
}

/**
 * At most one warning per file, on the first matching line.
 */
export function checkFatPoiesis(
  file: SourceFile,
  content: string,
  syntax: CommentSyntax,
  keywords: readonly string[]
): Finding[] {
  const pattern = domainConditionalPattern(keywords);
  if (!pattern) {
    return [];
  }
  const hits = scanLines(content, syntax).filter((line) => !line.comment && pattern.test(line.text));
  if (hits.length === 0) {
    return [];
  }
  return [
    warning(
      file.path,
      hits[0].number,
      FAT_POIESIS_RULE,
      `Possible fat Poiesis: ${hits.length} domain-meaningful conditional(s). ` +
        'Consider moving domain logic to ida_ or prx_.'
    ),
  ];
}

export function checkRedFlags(
  file: SourceFile,
  layer: Layer | null,
  content: string,
  syntax: CommentSyntax,
  config: RedFlagsConfig
): Finding[] {
  if (!config.enabled) {
    return [];
  }
  switch (layer) {
    case 'idea':
      return checkEmptyIdea(file, content, syntax, config.min_idea_lines);
    case 'poiesis':
      return checkFatPoiesis(file, content, syntax, config.domain_keywords);
    default:
      return [];
  }
}
