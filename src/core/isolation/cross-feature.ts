/**
 * Lateral coupling between features, seen as bare symbol usage.
 */
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import { extractSymbolReferences } from '../references/symbol-extractor.js';
import { classify, isCoreRole, layerOf } from '../roles/classifier.js';

export const CROSS_FEATURE_RULE = 'cross-feature-layer-ref';

/** Prefixes of files that belong to no feature. */
export const SHARED_RESOURCE_PREFIXES: readonly string[] = ['cfg_', 'db_', 'stm_', 'svc_', 'mdw_', 'hal_', 'bsp_'];

/** Isolation scope shared by the three core contract files. */
export const CORE_FEATURE = 'core';

export function isSharedResource(file: SourceFile): boolean {
  const name = file.name.toLowerCase();
  return SHARED_RESOURCE_PREFIXES.some((prefix) => name.startsWith(prefix));
}

/**
 * Feature of a layer file: `core` for the core contracts, null for shared
 * resources and files outside the three layers.
 */
export function layerFeatureOf(file: SourceFile): string | null {
  if (isSharedResource(file)) {
    return null;
  }
  const { role, feature } = classify(file.stem);
  if (isCoreRole(role)) {
    return CORE_FEATURE;
  }
  return layerOf(role) ? feature : null;
}

/**
 * Error per line that names a layer file of another feature.
 */
export function checkCrossFeature(file: SourceFile, layerFiles: readonly SourceFile[], content: string): Finding[] {
  const ownFeature = layerFeatureOf(file);
  if (!ownFeature) {
    return [];
  }

  const foreign = new Map<string, string>();
  for (const other of layerFiles) {
    const otherFeature = layerFeatureOf(other);
    if (otherFeature && otherFeature.toLowerCase() !== ownFeature.toLowerCase()) {
      foreign.set(other.stem, otherFeature);
    }
  }
  if (foreign.size === 0) {
    return [];
  }

  return extractSymbolReferences(content, [...foreign.keys()]).map((ref) =>
    error(
      file.path,
      ref.line,
      CROSS_FEATURE_RULE,
      `Cross-feature reference: references ${ref.target} from feature '${foreign.get(ref.target) ?? ''}' (use stm_ data plane)`
    )
  );
}
