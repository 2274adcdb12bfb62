/**
 * The directed role graphs. Each source role lists the edges it must not
 * take; the engine walks them generically.
 */
import type { Role, RoleTag } from '../roles/types.js';
import type { Reference } from '../references/types.js';
import type { DependencyEdge, DependencyGraph, EdgeException, TargetMatcher } from './types.js';

const UPPER_LAYERS: readonly RoleTag[] = ['ida', 'prx', 'poi'];
const LOWER_LAYERS: readonly RoleTag[] = ['db', 'stm', 'mdw', 'svc', 'hal', 'bsp'];

function tags(...values: RoleTag[]): TargetMatcher {
  return { kind: 'tag', tags: values };
}

function edge(
  rule: string,
  target: TargetMatcher,
  summary: string,
  options: { allowStems?: readonly string[]; except?: readonly EdgeException[] } = {}
): DependencyEdge {
  return {
    rule,
    target,
    summary,
    ...options,
    message: (ref: Reference) => `${summary}: ${ref.path}`,
  };
}

const DEPS_PATH = edge(
  'include.deps_path',
  { kind: 'dependency-path' },
  'Do not include dependency repository paths directly from core/project layers'
);

const SAME_FEATURE: readonly EdgeException[] = ['same-feature'];
const PROJECT_OR_SAME_FEATURE: readonly EdgeException[] = ['project-shared', 'same-feature'];

const RESOURCE_EDGES: readonly DependencyEdge[] = [
  edge('resource.include', { kind: 'tag', tags: UPPER_LAYERS }, 'Resources must not include upper-layer headers'),
];

const MODULE_EDGES: readonly DependencyEdge[] = [
  edge('module.include', { kind: 'tag', tags: UPPER_LAYERS }, 'Modules must not include upper-layer headers'),
  edge('module.resource', { kind: 'project-resource' }, 'Modules must not include resources (cfg_/db_/stm_) directly'),
];

const PLATFORM_EDGES: readonly DependencyEdge[] = [
  edge(
    'platform.include',
    { kind: 'tag', tags: [...UPPER_LAYERS, 'mdw', 'svc'] },
    'Platform must not include upper-layer/resource/module headers'
  ),
  edge('platform.include', { kind: 'project-resource' }, 'Platform must not include upper-layer/resource/module headers'),
];

/**
 * Textual-include binding.
 */
export const INCLUDE_GRAPH: DependencyGraph = {
  'core-idea': [
    DEPS_PATH,
    edge('ida_core.include', tags('prx'), 'ida_core must not include feature praxis', { allowStems: ['prx_core'] }),
    edge('ida_core.include', tags('poi'), 'ida_core must not include feature poiesis', { allowStems: ['poi_core'] }),
    edge('ida_core.include', tags('cfg'), 'ida_core may include only core contract headers'),
    edge('ida_core.include', { kind: 'tag', tags: LOWER_LAYERS }, 'ida_core must not include lower layer/resource headers directly'),
  ],
  'core-poiesis': [
    DEPS_PATH,
    edge('poi_core.include', tags('ida'), 'poi_core must not include feature ideas', { allowStems: ['ida_core'] }),
    edge('poi_core.include', tags('prx', 'poi'), 'poi_core must not include feature PRX/POI headers', {
      allowStems: ['poi_core'],
    }),
    edge('poi_core.include', tags('hal', 'bsp'), 'poi_core must not include platform headers directly'),
    edge('poi_core.include', tags('cfg'), 'poi_core may include only core contract headers'),
  ],
  'core-praxis': [
    DEPS_PATH,
    edge('prx_core.include', tags('ida'), 'prx_core must not include feature ideas', { allowStems: ['ida_core'] }),
    edge('prx_core.include', tags('prx', 'poi'), 'prx_core must not include feature PRX/POI headers', {
      allowStems: ['prx_core', 'poi_core'],
    }),
    edge('prx_core.include', tags('hal', 'bsp'), 'prx_core must not include platform headers directly'),
    edge('prx_core.include', tags('cfg'), 'prx_core may include only core contract headers'),
  ],
  idea: [
    DEPS_PATH,
    edge('ida.include', tags('prx'), 'Idea must include only its own feature Praxis headers', { except: SAME_FEATURE }),
    edge('ida.include', tags('poi'), 'Idea must include only its own feature Poiesis headers', { except: SAME_FEATURE }),
    edge('ida.include', tags('ida'), "Idea must not include other features' Idea headers", { except: SAME_FEATURE }),
    edge('ida.include', tags('cfg'), 'Idea must not include cfg_ directly (except core contract)'),
    edge('ida.include', { kind: 'tag', tags: LOWER_LAYERS }, 'Idea must not include lower layer/resource headers directly'),
  ],
  praxis: [
    DEPS_PATH,
    edge('prx.include', tags('ida'), 'Praxis must not include Idea headers'),
    edge('prx.include', tags('prx'), "Praxis must not include other features' Praxis", { except: SAME_FEATURE }),
    edge('prx.include', tags('poi'), "Praxis must not include other features' Poiesis", { except: SAME_FEATURE }),
    edge('prx.include', tags('cfg'), "Praxis must not include other features' config", {
      except: PROJECT_OR_SAME_FEATURE,
    }),
    edge('prx.include', tags('db'), "Praxis must not include other features' database headers", {
      except: PROJECT_OR_SAME_FEATURE,
    }),
  ],
  poiesis: [
    DEPS_PATH,
    edge('poi.include', tags('ida'), 'Poiesis must not include Idea headers'),
    edge('poi.include', tags('prx'), 'Poiesis must not include Praxis headers (no reverse dependency)'),
    edge('poi.include', tags('poi'), "Poiesis must not include other features' Poiesis", { except: SAME_FEATURE }),
    edge('poi.include', tags('cfg'), "Poiesis must not include other features' config", {
      except: PROJECT_OR_SAME_FEATURE,
    }),
    edge('poi.include', tags('db'), "Poiesis must not include other features' database headers", {
      except: PROJECT_OR_SAME_FEATURE,
    }),
  ],
  'feature-config': RESOURCE_EDGES,
  'feature-data': RESOURCE_EDGES,
  datastream: RESOURCE_EDGES,
  service: MODULE_EDGES,
  middleware: MODULE_EDGES,
  hal: PLATFORM_EDGES,
  bsp: [
    edge('platform.direction', tags('hal'), 'BSP must not include HAL headers (direction is HAL -> BSP)'),
    ...PLATFORM_EDGES,
  ],
};

function reverseEdge(sourcePrefix: 'prx_' | 'poi_', layer: 'idea' | 'praxis', tag: RoleTag): DependencyEdge {
  const summary = `${sourcePrefix} must not reference the ${layer} layer`;
  return {
    rule: `${sourcePrefix}no-${layer}-ref`,
    target: tags(tag),
    summary,
    message: (ref: Reference) => `Reverse dependency: ${sourcePrefix} references ${ref.target} (${layer} layer)`,
  };
}

const PRAXIS_SYMBOL_EDGES: readonly DependencyEdge[] = [reverseEdge('prx_', 'idea', 'ida')];
const POIESIS_SYMBOL_EDGES: readonly DependencyEdge[] = [
  reverseEdge('poi_', 'idea', 'ida'),
  reverseEdge('poi_', 'praxis', 'prx'),
];

/**
 * Identifier-reference binding: reverse references between layers,
 * regardless of feature.
 */
export const SYMBOL_GRAPH: DependencyGraph = {
  praxis: PRAXIS_SYMBOL_EDGES,
  'core-praxis': PRAXIS_SYMBOL_EDGES,
  poiesis: POIESIS_SYMBOL_EDGES,
  'core-poiesis': POIESIS_SYMBOL_EDGES,
};

export function edgesFor(graph: DependencyGraph, role: Role): readonly DependencyEdge[] {
  return graph[role] ?? [];
}

/**
 * Human-readable description of an edge target, for `rules` output.
 */
export function describeTarget(target: TargetMatcher): string {
  switch (target.kind) {
    case 'tag':
      return target.tags.map((tag) => `${tag}_*`).join(', ');
    case 'project-resource':
      return 'project resource headers';
    case 'dependency-path':
      return 'paths through the dependency root';
  }
}
