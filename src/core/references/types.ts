/**
 * Types for line-level dependency mentions.
 */

/**
 * `include` - a quoted `#include` directive (textual-include binding).
 * `symbol` - a whole-word occurrence of another file's class name
 * (identifier-reference binding).
 */
export type ReferenceKind = 'include' | 'symbol';

export interface Reference {
  kind: ReferenceKind;
  /** Leaf name: the included file's base name, or the referenced class name */
  target: string;
  /** Include path as written; equals `target` for symbol references */
  path: string;
  line: number;
  /** Source line without its line terminator */
  raw: string;
}

/**
 * A denylisted namespace import or API call found in a source line.
 */
export interface ApiUsage {
  form: 'import' | 'call';
  rule: string;
  description: string;
  line: number;
  raw: string;
}

/**
 * Comment syntax of a source dialect.
 */
export interface CommentSyntax {
  /** Markers that turn the rest of a line into a comment */
  line: readonly string[];
  /** Whether `/* ... *\/` block comments exist */
  block: boolean;
}
