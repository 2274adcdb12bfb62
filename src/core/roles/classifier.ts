/**
 * Role classifier: filename stem -> (role, implied feature).
 *
 * Matching order, first hit wins:
 *   1. the reserved `inf_` prefix is always `invalid-prefix`
 *   2. exact core names (`ida_core`, `prx_core`, `poi_core`)
 *   3. `<tag>_<feature>` for the feature-scoped tags
 *   4. single-prefix infrastructure tags
 *   5. `unknown`
 * Tag matching ignores case unless the caller asks otherwise; the feature
 * keeps the case it was written in.
 */
import * as path from 'node:path';
import type {
  Classification,
  ClassifyOptions,
  CoreRole,
  FeatureRole,
  InfrastructureRole,
  Layer,
  Role,
  RoleTag,
} from './types.js';

const RESERVED_PREFIX = 'inf_';

const CORE_STEMS: ReadonlyMap<string, CoreRole> = new Map<string, CoreRole>([
  ['ida_core', 'core-idea'],
  ['prx_core', 'core-praxis'],
  ['poi_core', 'core-poiesis'],
]);

const FEATURE_TAGS: Readonly<Partial<Record<RoleTag, FeatureRole>>> = {
  ida: 'idea',
  prx: 'praxis',
  poi: 'poiesis',
  cfg: 'feature-config',
  db: 'feature-data',
};

const INFRASTRUCTURE_TAGS: Readonly<Partial<Record<RoleTag, InfrastructureRole>>> = {
  svc: 'service',
  mdw: 'middleware',
  hal: 'hal',
  bsp: 'bsp',
  stm: 'datastream',
};

/** Every role, in the order the rule tables list them. */
export const ALL_ROLES: readonly Role[] = [
  'core-idea',
  'core-praxis',
  'core-poiesis',
  'idea',
  'praxis',
  'poiesis',
  'feature-config',
  'feature-data',
  'datastream',
  'service',
  'middleware',
  'hal',
  'bsp',
  'unknown',
  'invalid-prefix',
];

const TAG_PATTERN = /^(ida|prx|poi|cfg|db|stm|svc|mdw|hal|bsp)_/i;
const EXACT_TAG_PATTERN = /^(ida|prx|poi|cfg|db|stm|svc|mdw|hal|bsp)_/;

/**
 * Classify a filename stem (no directory, no extension).
 * With `ignoreCase: false` only lower-case prefixes and core names match.
 */
export function classify(stem: string, options: ClassifyOptions = {}): Classification {
  const ignoreCase = options.ignoreCase ?? true;
  const key = ignoreCase ? stem.toLowerCase() : stem;

  if (key.startsWith(RESERVED_PREFIX)) {
    return { role: 'invalid-prefix', feature: null };
  }

  const coreRole = CORE_STEMS.get(key);
  if (coreRole) {
    return { role: coreRole, feature: null };
  }

  const tag = leadingTag(stem, ignoreCase);
  if (tag) {
    const featureRole = FEATURE_TAGS[tag];
    const feature = stem.slice(tag.length + 1);
    if (featureRole && feature.length > 0) {
      return { role: featureRole, feature };
    }
    const infraRole = INFRASTRUCTURE_TAGS[tag];
    if (infraRole) {
      return { role: infraRole, feature: null };
    }
  }

  return { role: 'unknown', feature: null };
}

/**
 * Classify a file by its name or path.
 */
export function classifyFile(filePath: string, options: ClassifyOptions = {}): Classification {
  return classify(stemOf(filePath), options);
}

/**
 * Filename stem: base name without its last extension.
 */
export function stemOf(filePath: string): string {
  const base = path.basename(filePath.replace(/\\/g, '/'));
  const ext = path.extname(base);
  return ext ? base.slice(0, -ext.length) : base;
}

/**
 * Prefix tag of a referenced file name, if it carries one.
 */
export function tagOf(name: string, options: ClassifyOptions = {}): RoleTag | null {
  return leadingTag(path.basename(name.replace(/\\/g, '/')), options.ignoreCase ?? true);
}

function leadingTag(text: string, ignoreCase: boolean): RoleTag | null {
  const match = (ignoreCase ? TAG_PATTERN : EXACT_TAG_PATTERN).exec(text);
  if (!match) {
    return null;
  }
  return parseTag(match[1]);
}

function parseTag(value: string): RoleTag | null {
  switch (value.toLowerCase()) {
    case 'ida':
      return 'ida';
    case 'prx':
      return 'prx';
    case 'poi':
      return 'poi';
    case 'cfg':
      return 'cfg';
    case 'db':
      return 'db';
    case 'stm':
      return 'stm';
    case 'svc':
      return 'svc';
    case 'mdw':
      return 'mdw';
    case 'hal':
      return 'hal';
    case 'bsp':
      return 'bsp';
    default:
      return null;
  }
}

export function isRole(value: string): value is Role {
  return ALL_ROLES.some((role) => role === value);
}

export function isCoreRole(role: Role): role is CoreRole {
  return role === 'core-idea' || role === 'core-praxis' || role === 'core-poiesis';
}

/**
 * Conceptual layer of a core or feature layer role.
 */
export function layerOf(role: Role): Layer | null {
  switch (role) {
    case 'idea':
    case 'core-idea':
      return 'idea';
    case 'praxis':
    case 'core-praxis':
      return 'praxis';
    case 'poiesis':
    case 'core-poiesis':
      return 'poiesis';
    default:
      return null;
  }
}

/**
 * Roles that carry a feature scope.
 */
export function isFeatureScoped(role: Role): role is FeatureRole {
  return (
    role === 'idea' ||
    role === 'praxis' ||
    role === 'poiesis' ||
    role === 'feature-config' ||
    role === 'feature-data'
  );
}
