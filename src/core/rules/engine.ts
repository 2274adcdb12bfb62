/**
 * Dependency rule engine: one generic walk over the role graph plus the
 * exception predicates.
 */
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import type { Reference } from '../references/types.js';
import { stemOf, tagOf } from '../roles/classifier.js';
import type { Role } from '../roles/types.js';
import { edgesFor } from './graph.js';
import { isSameFeatureReference } from './ownership.js';
import type { DependencyEdge, DependencyGraph, RuleContext } from './types.js';

function matchesTarget(edge: DependencyEdge, ref: Reference, context: RuleContext): boolean {
  switch (edge.target.kind) {
    case 'tag': {
      const tag = tagOf(ref.target, context);
      return tag !== null && edge.target.tags.includes(tag);
    }
    case 'project-resource':
      return context.projectResources.has(ref.target);
    case 'dependency-path': {
      const segments = ref.path.split(/[\\/]/);
      return segments.includes(context.dependencyDir);
    }
  }
}

function isExempt(edge: DependencyEdge, ref: Reference, context: RuleContext): boolean {
  if (edge.target.kind !== 'dependency-path' && context.coreHeaders.has(ref.target)) {
    return true;
  }

  if (edge.allowStems) {
    const stem = stemOf(ref.target).toLowerCase();
    if (edge.allowStems.includes(stem)) {
      return true;
    }
  }

  for (const exception of edge.except ?? []) {
    if (exception === 'project-shared' && context.projectShared.has(ref.target)) {
      return true;
    }
    if (exception === 'same-feature') {
      const tag = tagOf(ref.target, context);
      if (tag && isSameFeatureReference(ref.target, tag, context.feature, context.owners)) {
        return true;
      }
    }
  }

  return false;
}

/**
 * One error per (reference, violated edge).
 */
export function checkDependencies(
  file: SourceFile,
  role: Role,
  references: readonly Reference[],
  graph: DependencyGraph,
  context: RuleContext
): Finding[] {
  const edges = edgesFor(graph, role);
  if (edges.length === 0) {
    return [];
  }

  const findings: Finding[] = [];
  for (const ref of references) {
    for (const edge of edges) {
      if (matchesTarget(edge, ref, context) && !isExempt(edge, ref, context)) {
        findings.push(error(file.path, ref.line, edge.rule, edge.message(ref)));
      }
    }
  }
  return findings;
}
