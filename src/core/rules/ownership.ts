/**
 * Run-wide lookup tables derived from the full file list before any rule
 * is evaluated.
 */
import * as path from 'node:path';
import type { SourceFile } from '../discovery/types.js';
import type { ProjectLayout } from '../layout/types.js';
import { featureFromPath, placementOf } from '../layout/project-layout.js';
import { classify, stemOf } from '../roles/classifier.js';
import type { ClassifyOptions, RoleTag } from '../roles/types.js';
import type { HeaderOwnership } from './types.js';

function isHeader(file: SourceFile, headerExtensions: readonly string[]): boolean {
  return headerExtensions.includes(file.extension);
}

/**
 * Map each header leaf name to the features that own a copy of it.
 */
export function buildHeaderOwnership(
  files: readonly SourceFile[],
  layout: ProjectLayout,
  headerExtensions: readonly string[]
): HeaderOwnership {
  const owners = new Map<string, Set<string>>();
  for (const file of files) {
    if (!isHeader(file, headerExtensions)) {
      continue;
    }
    const feature = featureFromPath(file.path, layout);
    if (!feature) {
      continue;
    }
    const existing = owners.get(file.name);
    if (existing) {
      existing.add(feature);
    } else {
      owners.set(file.name, new Set([feature]));
    }
  }
  return owners;
}

/**
 * Config/data/stream headers that live under the project's features,
 * config or datastreams directories (root or nested unit).
 */
export function collectProjectResourceHeaders(
  files: readonly SourceFile[],
  layout: ProjectLayout,
  headerExtensions: readonly string[],
  options: ClassifyOptions = {}
): Set<string> {
  const names = new Set<string>();
  for (const file of files) {
    if (!isHeader(file, headerExtensions)) {
      continue;
    }
    const { role } = classify(file.stem, options);
    if (role !== 'feature-config' && role !== 'feature-data' && role !== 'datastream') {
      continue;
    }
    const placement = placementOf(file.path, layout);
    if (placement.anywhere.features || placement.anywhere.config || placement.anywhere.datastreams) {
      names.add(file.name);
    }
  }
  return names;
}

/**
 * Headers sitting directly in the project config directory.
 */
export function collectProjectSharedHeaders(
  files: readonly SourceFile[],
  layout: ProjectLayout,
  headerExtensions: readonly string[]
): Set<string> {
  const configDir = layout.dirs.config.toLowerCase();
  const names = new Set<string>();
  for (const file of files) {
    if (isHeader(file, headerExtensions) && path.posix.dirname(file.path).toLowerCase() === configDir) {
      names.add(file.name);
    }
  }
  return names;
}

/**
 * Whether a referenced leaf belongs to `feature`. The ownership map wins
 * when it knows the leaf; otherwise the name decides
 * (`<tag>_<feature>` or `<tag>_<feature>_<suffix>`).
 */
export function isSameFeatureReference(
  leaf: string,
  tag: RoleTag,
  feature: string | null,
  owners: HeaderOwnership
): boolean {
  if (!feature) {
    return false;
  }
  const owningFeatures = owners.get(leaf);
  if (owningFeatures) {
    return owningFeatures.has(feature);
  }
  const stem = stemOf(leaf).toLowerCase();
  const base = `${tag}_${feature}`.toLowerCase();
  return stem === base || stem.startsWith(`${base}_`);
}
