/**
 * Source discovery: one recursive walk per run, read-only afterwards.
 */
import * as path from 'node:path';
import { globFiles, readFile, toPosixPath } from '../../utils/file-system.js';
import { loadGateIgnore } from '../../utils/ignore-file.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { DiscoveryOptions, LoadedSource, SourceFile } from './types.js';

/**
 * Normalize an extension list: `".vb,.cs"`, `"vb, cs"` or an array.
 */
export function normalizeExtensions(input: string | readonly string[]): string[] {
  const raw = typeof input === 'string' ? input.split(',') : input;
  const normalized: string[] = [];
  for (const entry of raw) {
    const trimmed = entry.trim().toLowerCase();
    if (!trimmed || trimmed === '.') {
      continue;
    }
    const ext = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
    if (!normalized.includes(ext)) {
      normalized.push(ext);
    }
  }
  return normalized;
}

export function toSourceFile(filePath: string): SourceFile {
  const absolute = toPosixPath(path.resolve(filePath));
  const name = path.posix.basename(absolute);
  const ext = path.posix.extname(name);
  return {
    path: absolute,
    name,
    stem: ext ? name.slice(0, -ext.length) : name,
    extension: ext.toLowerCase(),
  };
}

/**
 * Find every file under `root` whose extension is in the scan set,
 * minus excluded and `.layergateignore`d paths, sorted by path.
 */
export async function discoverSourceFiles(
  root: string,
  options: DiscoveryOptions
): Promise<SourceFile[]> {
  if (options.extensions.length === 0) {
    return [];
  }

  const patterns = options.extensions.map((ext) => `**/*${ext}`);
  const found = await globFiles(patterns, {
    cwd: root,
    absolute: false,
    caseSensitive: false,
    ignore: [...(options.exclude ?? [])],
  });

  const gateIgnore = await loadGateIgnore(root);
  const kept = gateIgnore.filter(found.map(toPosixPath));
  const wanted = new Set(options.extensions);

  const files = kept
    .map((relative) => toSourceFile(path.resolve(root, relative)))
    .filter((file) => wanted.has(file.extension))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  logger.debug(`Discovered ${files.length} source file(s) under ${root}`, {
    extensions: [...options.extensions],
    ignored: found.length - kept.length,
  });
  return files;
}

/** Files read at once; keeps a large tree under the open-file limit. */
export const READ_BATCH_SIZE = 50;

/**
 * Read every file, `READ_BATCH_SIZE` at a time, in input order. A failed
 * read becomes an `unreadable` entry for that file only.
 */
export async function loadSources(files: readonly SourceFile[]): Promise<LoadedSource[]> {
  const loaded: LoadedSource[] = [];

  for (let i = 0; i < files.length; i += READ_BATCH_SIZE) {
    const batch = files.slice(i, i + READ_BATCH_SIZE);
    const batchResults = await Promise.all(batch.map(loadSource));
    loaded.push(...batchResults);
  }

  return loaded;
}

async function loadSource(file: SourceFile): Promise<LoadedSource> {
  try {
    const content = await readFile(file.path);
    return { file, text: { kind: 'text', content } };
  } catch (error) {
    return { file, text: { kind: 'unreadable', reason: describeError(error) } };
  }
}
