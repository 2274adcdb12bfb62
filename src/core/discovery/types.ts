/**
 * Types for discovered source files.
 */

/**
 * Identity of one discovered file. Role, feature and placement are derived
 * from it on demand and never stored.
 */
export interface SourceFile {
  /** Absolute path, forward slashes */
  path: string;
  /** Base name, e.g. `prx_Motor.h` */
  name: string;
  /** Base name without extension, e.g. `prx_Motor` */
  stem: string;
  /** Lower-case extension with its dot, e.g. `.h` */
  extension: string;
}

export type SourceText =
  | { kind: 'text'; content: string }
  | { kind: 'unreadable'; reason: string };

export interface LoadedSource {
  file: SourceFile;
  text: SourceText;
}

export interface DiscoveryOptions {
  /** Extensions to scan, normalized (`.c`) */
  extensions: readonly string[];
  /** Glob patterns never scanned */
  exclude?: readonly string[];
}
