/**
 * Types for the directed role dependency graph.
 */
import type { Role, RoleTag } from '../roles/types.js';
import type { Reference } from '../references/types.js';

/**
 * What a forbidden edge points at.
 * - `tag`: referenced leaf carries one of the prefix tags
 * - `project-resource`: referenced leaf is a config/data/stream header that
 *   lives in the project's managed resource directories
 * - `dependency-path`: the include path walks through the dependency root
 */
export type TargetMatcher =
  | { kind: 'tag'; tags: readonly RoleTag[] }
  | { kind: 'project-resource' }
  | { kind: 'dependency-path' };

/**
 * Exceptions an edge honours on top of the shared-contract exception,
 * which every tag and resource edge honours.
 */
export type EdgeException = 'same-feature' | 'project-shared';

export interface DependencyEdge {
  rule: string;
  target: TargetMatcher;
  /** Exact stems that never match this edge (core counterparts) */
  allowStems?: readonly string[];
  except?: readonly EdgeException[];
  /** One-line statement of the constraint, used by `rules` output */
  summary: string;
  message(ref: Reference): string;
}

export type DependencyGraph = Readonly<Partial<Record<Role, readonly DependencyEdge[]>>>;

/**
 * Leaf name -> features that define a header with that name under their
 * own feature folder.
 */
export type HeaderOwnership = ReadonlyMap<string, ReadonlySet<string>>;

/**
 * Everything the engine needs beyond the file and its references.
 * Built once per run and never mutated.
 */
export interface RuleContext {
  /** Feature scope of the source file */
  feature: string | null;
  /** Shared-contract headers, allowed from any role */
  coreHeaders: ReadonlySet<string>;
  /** Project-level config/data headers, allowed where an edge lists `project-shared` */
  projectShared: ReadonlySet<string>;
  /** Resource headers living in managed project directories */
  projectResources: ReadonlySet<string>;
  owners: HeaderOwnership;
  /** Name of the dependency root segment, e.g. `deps` */
  dependencyDir: string;
  /** Whether role tags of referenced names match regardless of letter case */
  ignoreCase: boolean;
}
