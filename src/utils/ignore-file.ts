/**
 * .layergateignore support - gitignore-style patterns for excluding files
 * from discovery.
 */
import ignore, { type Ignore } from 'ignore';
import * as path from 'node:path';
import { fileExists, readFile, toPosixPath } from './file-system.js';

export const IGNORE_FILENAME = '.layergateignore';

/**
 * Ignore filter over root-relative paths.
 */
export interface GateIgnore {
  /**
   * Check if a file path should be ignored.
   * @param filePath - Relative path from the scanned root
   */
  ignores(filePath: string): boolean;

  /**
   * Filter an array of file paths, returning only non-ignored ones.
   */
  filter(filePaths: string[]): string[];

  patterns(): string[];
}

/**
 * Load .layergateignore from the scanned root.
 * Returns an empty filter if the file doesn't exist.
 */
export async function loadGateIgnore(root: string): Promise<GateIgnore> {
  const ignorePath = path.join(root, IGNORE_FILENAME);
  if (!(await fileExists(ignorePath))) {
    return createGateIgnore([]);
  }
  const content = await readFile(ignorePath);
  return createGateIgnore(parseIgnoreFile(content));
}

/**
 * Create an ignore filter from patterns.
 */
export function createGateIgnore(patterns: string[]): GateIgnore {
  // Under NodeNext the CommonJS typings expose the factory as `default`.
  const ig: Ignore = ignore.default().add(patterns);

  return {
    ignores(filePath: string): boolean {
      const normalized = toPosixPath(filePath);
      if (!normalized || normalized.startsWith('../')) {
        return false;
      }
      return ig.ignores(normalized);
    },

    filter(filePaths: string[]): string[] {
      return filePaths.filter((fp) => !this.ignores(fp));
    },

    patterns(): string[] {
      return [...patterns];
    },
  };
}

/**
 * Parse ignore-file content into patterns (blank lines and comments dropped).
 */
export function parseIgnoreFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
}
