/**
 * Types for the directory convention and file placement.
 */
import type { LegacyDirectory } from '../config/schema.js';

/** Directories the convention names. */
export type LayoutArea =
  | 'bootstrap'
  | 'service'
  | 'hal'
  | 'bsp'
  | 'deps'
  | 'depsExtern'
  | 'depsMiddleware'
  | 'features'
  | 'config'
  | 'datastreams';

/** Areas a vendored dependency copy may replicate (nested architecture unit). */
export type NestedArea = 'bootstrap' | 'service' | 'hal' | 'bsp' | 'features' | 'config' | 'datastreams';

/**
 * The directory convention resolved against one scanned root.
 */
export interface ProjectLayout {
  /** Absolute root, forward slashes */
  root: string;
  /** Absolute directory per area, forward slashes */
  dirs: Record<LayoutArea, string>;
  /** Root-relative directory per area, forward slashes, e.g. `infra/bootstrap` */
  relative: Record<LayoutArea, string>;
  legacy: LegacyDirectory[];
}

/**
 * Where one file sits relative to the convention.
 */
export interface Placement {
  /** Directly under the root-level area directory */
  under: Record<LayoutArea, boolean>;
  /** Inside `deps/extern` or `deps/middleware` */
  nested: boolean;
  /** Path contains the area as a segment anywhere (e.g. `/infra/bootstrap/`) */
  segment: Record<NestedArea, boolean>;
  /** Under the root-level area, or under a nested unit that replicates it */
  anywhere: Record<NestedArea, boolean>;
}
