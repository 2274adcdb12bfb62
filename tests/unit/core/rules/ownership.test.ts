/**
 * Tests for the run-wide header lookup tables.
 */
import { describe, it, expect } from 'vitest';
import {
  buildHeaderOwnership,
  collectProjectResourceHeaders,
  collectProjectSharedHeaders,
  isSameFeatureReference,
} from '../../../../src/core/rules/ownership.js';
import { file, layout } from '../../../helpers/factories.js';

const HEADERS = ['.h', '.hpp'];

describe('buildHeaderOwnership', () => {
  it('should map a leaf name to every feature that defines it', () => {
    const owners = buildHeaderOwnership(
      [
        file('project/features/Motor/cfg_shared.h'),
        file('project/features/Pump/cfg_shared.h'),
        file('project/features/Motor/prx_Motor.c'),
        file('infra/service/svc_uart.h'),
      ],
      layout(),
      HEADERS
    );
    expect([...owners.keys()]).toEqual(['cfg_shared.h']);
    expect(owners.get('cfg_shared.h')).toEqual(new Set(['Motor', 'Pump']));
  });
});

describe('collectProjectResourceHeaders', () => {
  it('should collect resource headers under project resource directories, nested units included', () => {
    const names = collectProjectResourceHeaders(
      [
        file('project/features/Motor/cfg_Motor.h'),
        file('project/config/cfg_project.h'),
        file('project/datastreams/stm_bus.h'),
        file('infra/bootstrap/cfg_core.h'),
        file('deps/extern/lib/project/config/cfg_lib.h'),
        file('project/features/Motor/prx_Motor.h'),
        file('project/config/cfg_project.c'),
      ],
      layout(),
      HEADERS
    );
    expect(names).toEqual(new Set(['cfg_Motor.h', 'cfg_project.h', 'stm_bus.h', 'cfg_lib.h']));
  });
});

describe('collectProjectSharedHeaders', () => {
  it('should collect headers sitting directly in the config directory', () => {
    const names = collectProjectSharedHeaders(
      [
        file('project/config/cfg_project.h'),
        file('project/config/db_project.h'),
        file('project/config/sub/cfg_x.h'),
        file('project/config/notes.c'),
      ],
      layout(),
      HEADERS
    );
    expect(names).toEqual(new Set(['cfg_project.h', 'db_project.h']));
  });
});

describe('isSameFeatureReference', () => {
  const noOwners = new Map<string, Set<string>>();

  it('should match the feature name and suffixed variants', () => {
    expect(isSameFeatureReference('prx_Motor.h', 'prx', 'Motor', noOwners)).toBe(true);
    expect(isSameFeatureReference('prx_Motor_Io.h', 'prx', 'Motor', noOwners)).toBe(true);
    expect(isSameFeatureReference('PRX_motor.h', 'prx', 'Motor', noOwners)).toBe(true);
    expect(isSameFeatureReference('prx_MotorX.h', 'prx', 'Motor', noOwners)).toBe(false);
  });

  it('should never be true without a feature scope', () => {
    expect(isSameFeatureReference('prx_Motor.h', 'prx', null, noOwners)).toBe(false);
  });

  it('should let the ownership map override the name', () => {
    const owners = new Map([['cfg_Motor.h', new Set(['Pump'])]]);
    expect(isSameFeatureReference('cfg_Motor.h', 'cfg', 'Motor', owners)).toBe(false);
    expect(isSameFeatureReference('cfg_Motor.h', 'cfg', 'Pump', owners)).toBe(true);
  });
});
