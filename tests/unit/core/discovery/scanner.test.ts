/**
 * Tests for source discovery.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  discoverSourceFiles,
  loadSources,
  normalizeExtensions,
  READ_BATCH_SIZE,
  toSourceFile,
} from '../../../../src/core/discovery/scanner.js';
import { toPosixPath } from '../../../../src/utils/file-system.js';

describe('normalizeExtensions', () => {
  it('should accept comma lists with or without dots', () => {
    expect(normalizeExtensions('.vb, CS,,.')).toEqual(['.vb', '.cs']);
  });

  it('should drop duplicates from arrays', () => {
    expect(normalizeExtensions(['.c', 'C', '.h'])).toEqual(['.c', '.h']);
  });
});

describe('toSourceFile', () => {
  it('should split name, stem and lower-case extension', () => {
    expect(toSourceFile('/proj/a/Prx_Motor.H')).toEqual({
      path: '/proj/a/Prx_Motor.H',
      name: 'Prx_Motor.H',
      stem: 'Prx_Motor',
      extension: '.h',
    });
  });

  it('should handle names without extension', () => {
    expect(toSourceFile('/proj/Makefile')).toMatchObject({ stem: 'Makefile', extension: '' });
  });
});

describe('discoverSourceFiles', () => {
  let root: string;

  async function touch(relative: string, content = ''): Promise<void> {
    const file = path.join(root, relative);
    await fs.promises.mkdir(path.dirname(file), { recursive: true });
    await fs.promises.writeFile(file, content);
  }

  beforeEach(async () => {
    root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'layergate-scan-'));
    await touch('src/b.H');
    await touch('src/a.c');
    await touch('src/notes.txt');
    await touch('build/gen.c');
    await touch('.git/objects/x.c');
    await touch('.layergateignore', 'build/\n');
  });

  afterEach(async () => {
    await fs.promises.rm(root, { recursive: true, force: true });
  });

  it('should find matching files minus excluded and ignored paths, sorted', async () => {
    const files = await discoverSourceFiles(root, { extensions: ['.c', '.h'], exclude: ['**/.git/**'] });
    const base = toPosixPath(root);
    expect(files.map((f) => f.path)).toEqual([`${base}/src/a.c`, `${base}/src/b.H`]);
  });

  it('should find nothing without extensions', async () => {
    await expect(discoverSourceFiles(root, { extensions: [] })).resolves.toEqual([]);
  });

  it('should load text and mark unreadable files', async () => {
    await touch('src/a.c', 'int a;');
    const sources = await loadSources([
      toSourceFile(path.join(root, 'src/a.c')),
      toSourceFile(path.join(root, 'src/gone.c')),
    ]);
    expect(sources[0].text).toEqual({ kind: 'text', content: 'int a;' });
    expect(sources[1].text.kind).toBe('unreadable');
    if (sources[1].text.kind === 'unreadable') {
      expect(sources[1].text.reason).toMatch(/ENOENT/);
    }
  });

  it('should load a tree larger than one read batch in full and in order', async () => {
    const count = READ_BATCH_SIZE * 2 + 7;
    const names = Array.from({ length: count }, (_, i) => `prx_F${String(i).padStart(3, '0')}.c`);
    for (const name of names) {
      await touch(`big/${name}`, `// ${name}`);
    }

    const files = await discoverSourceFiles(path.join(root, 'big'), { extensions: ['.c'] });
    const sources = await loadSources(files);

    expect(sources).toHaveLength(count);
    expect(sources.filter((s) => s.text.kind === 'unreadable')).toEqual([]);
    expect(sources.map((s) => s.file.name)).toEqual(names);
    expect(sources[count - 1].text).toEqual({ kind: 'text', content: `// ${names[count - 1]}` });
  });
});
