/**
 * Tests for the rules command.
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createRulesCommand, formatEdge, formatRoleRules } from '../../../../src/cli/commands/rules.js';
import { edgesFor, INCLUDE_GRAPH, SYMBOL_GRAPH } from '../../../../src/core/rules/graph.js';
import { ALL_ROLES } from '../../../../src/core/roles/classifier.js';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: {
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

import { logger } from '../../../../src/utils/logger.js';

describe('formatEdge', () => {
  it('should list allowances', () => {
    expect(formatEdge(edgesFor(INCLUDE_GRAPH, 'praxis')[4])).toBe(
      "  [prx.include] cfg_*: Praxis must not include other features' config (allowed: project config, same feature)"
    );
    expect(formatEdge(edgesFor(INCLUDE_GRAPH, 'core-idea')[1])).toBe(
      '  [ida_core.include] prx_*: ida_core must not include feature praxis (allowed: prx_core)'
    );
  });
});

describe('formatRoleRules', () => {
  it('should list every edge of a role', () => {
    expect(formatRoleRules(INCLUDE_GRAPH, 'hal')).toEqual([
      'hal',
      '  [platform.include] ida_*, prx_*, poi_*, mdw_*, svc_*: Platform must not include upper-layer/resource/module headers',
      '  [platform.include] project resource headers: Platform must not include upper-layer/resource/module headers',
    ]);
  });

  it('should say when a role has no edges', () => {
    expect(formatRoleRules(SYMBOL_GRAPH, 'idea')).toEqual(['idea', '  (no forbidden edges)']);
  });
});

describe('rules command', () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let processExitSpy: MockInstance<typeof process.exit>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
  });

  it('should print one role', async () => {
    await createRulesCommand().parseAsync(['node', 'test', 'praxis', '--binding', 'symbol']);
    expect(consoleLogSpy).toHaveBeenCalledWith('praxis\n  [prx_no-idea-ref] ida_*: prx_ must not reference the idea layer');
  });

  it('should print every constrained role by default', async () => {
    await createRulesCommand().parseAsync(['node', 'test', '--binding', 'symbol']);
    const printed = String(consoleLogSpy.mock.calls[0][0]);
    expect(printed.split('\n\n').map((block) => block.split('\n')[0])).toEqual([
      'core-praxis',
      'core-poiesis',
      'praxis',
      'poiesis',
    ]);
  });

  it('should exit 1 on an unknown role', async () => {
    await expect(createRulesCommand().parseAsync(['node', 'test', 'nope'])).rejects.toThrow('process.exit called');
    expect(logger.error).toHaveBeenCalledWith(`Unknown role 'nope'. Known roles: ${ALL_ROLES.join(', ')}`);
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });

  it('should exit 1 on an unknown binding', async () => {
    await expect(createRulesCommand().parseAsync(['node', 'test', '--binding', 'x'])).rejects.toThrow(
      'process.exit called'
    );
    expect(processExitSpy).toHaveBeenCalledWith(1);
  });
});
