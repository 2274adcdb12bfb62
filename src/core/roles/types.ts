/**
 * Types for filename-derived architectural roles.
 */

/** Cross-cutting contracts living in the bootstrap directory. */
export type CoreRole = 'core-idea' | 'core-praxis' | 'core-poiesis';

/** Feature-scoped layers and resources. */
export type FeatureRole = 'idea' | 'praxis' | 'poiesis' | 'feature-config' | 'feature-data';

/** Infrastructure and shared-resource roles that belong to no feature. */
export type InfrastructureRole = 'datastream' | 'service' | 'middleware' | 'hal' | 'bsp';

/**
 * Closed set of roles a source file can carry.
 */
export type Role = CoreRole | FeatureRole | InfrastructureRole | 'unknown' | 'invalid-prefix';

/**
 * Filename prefix tags, the part before the first underscore.
 */
export type RoleTag = 'ida' | 'prx' | 'poi' | 'cfg' | 'db' | 'stm' | 'svc' | 'mdw' | 'hal' | 'bsp';

/**
 * The three conceptual layers shared by core and feature variants.
 */
export type Layer = 'idea' | 'praxis' | 'poiesis';

/**
 * Result of classifying a filename stem.
 */
export interface Classification {
  role: Role;
  /** Feature implied by the filename (`ida_Motor` -> `Motor`); null when the role has none */
  feature: string | null;
}

export interface ClassifyOptions {
  /** Match role prefixes and core names regardless of letter case (default true) */
  ignoreCase?: boolean;
}
