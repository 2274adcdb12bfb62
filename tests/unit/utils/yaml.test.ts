/**
 * Tests for YAML utility functions.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { z } from 'zod';
import { formatZodError, loadYamlWithSchema, parseYaml, parseYamlWithSchema } from '../../../src/utils/yaml.js';
import { ErrorCodes, SystemError } from '../../../src/utils/errors.js';

describe('parseYaml', () => {
  it('should parse mappings and sequences', () => {
    expect(parseYaml('name: gate\nitems:\n  - one\n  - two\n')).toEqual({ name: 'gate', items: ['one', 'two'] });
  });

  it('should throw SystemError on invalid YAML', () => {
    expect(() => parseYaml('a: [1, 2')).toThrow(SystemError);
    try {
      parseYaml('a: [1, 2');
    } catch (error) {
      expect(error).toBeInstanceOf(SystemError);
      if (error instanceof SystemError) {
        expect(error.code).toBe(ErrorCodes.PARSE_ERROR);
        expect(error.message).toMatch(/^Failed to parse YAML: /);
      }
    }
  });
});

describe('parseYamlWithSchema', () => {
  const schema = z.object({ name: z.string(), count: z.number().default(1) });

  it('should return validated data with defaults', () => {
    expect(parseYamlWithSchema('name: gate\n', schema)).toEqual({ name: 'gate', count: 1 });
  });

  it('should report the failing path', () => {
    expect(() => parseYamlWithSchema('name: 5\n', schema)).toThrow(/^YAML validation failed: name: /);
  });
});

describe('formatZodError', () => {
  it('should join nested paths with dots', () => {
    const result = z.object({ a: z.object({ b: z.number() }) }).safeParse({ a: { b: 'x' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(formatZodError(result.error)).toMatch(/^a\.b: /);
    }
  });
});

describe('loadYamlWithSchema', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'layergate-yaml-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('should read and validate a file', async () => {
    const file = path.join(dir, 'config.yaml');
    await fs.promises.writeFile(file, 'name: gate\ncount: 3\n');
    const schema = z.object({ name: z.string(), count: z.number() });
    await expect(loadYamlWithSchema(file, schema)).resolves.toEqual({ name: 'gate', count: 3 });
  });
});
