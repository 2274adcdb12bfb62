/**
 * `layergate rules [role]`: print the forbidden edges of the role graph.
 */
import { Command } from 'commander';
import { ALL_ROLES, isRole } from '../../core/roles/classifier.js';
import type { Role } from '../../core/roles/types.js';
import { describeTarget, edgesFor, INCLUDE_GRAPH, SYMBOL_GRAPH } from '../../core/rules/graph.js';
import type { DependencyEdge, DependencyGraph } from '../../core/rules/types.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseBinding } from './check-helpers.js';

export function formatEdge(edge: DependencyEdge): string {
  const allowances: string[] = [...(edge.allowStems ?? [])];
  for (const exception of edge.except ?? []) {
    allowances.push(exception === 'same-feature' ? 'same feature' : 'project config');
  }
  const allowed = allowances.length > 0 ? ` (allowed: ${allowances.join(', ')})` : '';
  return `  [${edge.rule}] ${describeTarget(edge.target)}: ${edge.summary}${allowed}`;
}

export function formatRoleRules(graph: DependencyGraph, role: Role): string[] {
  const edges = edgesFor(graph, role);
  if (edges.length === 0) {
    return [role, '  (no forbidden edges)'];
  }
  return [role, ...edges.map(formatEdge)];
}

/**
 * Create the rules command.
 */
export function createRulesCommand(): Command {
  return new Command('rules')
    .description('Show the dependency rules for every role, or for one role')
    .argument('[role]', `Role name (${ALL_ROLES.join(', ')})`)
    .option('--binding <binding>', 'Source binding: include or symbol', 'include')
    .action((roleArg: string | undefined, options: { binding: string }) => {
      let graph: DependencyGraph;
      try {
        graph = parseBinding(options.binding) === 'include' ? INCLUDE_GRAPH : SYMBOL_GRAPH;
      } catch (error) {
        logger.error(describeError(error));
        process.exit(1);
      }

      let roles: readonly Role[];
      if (roleArg === undefined) {
        roles = ALL_ROLES.filter((role) => edgesFor(graph, role).length > 0);
      } else if (isRole(roleArg)) {
        roles = [roleArg];
      } else {
        logger.error(`Unknown role '${roleArg}'. Known roles: ${ALL_ROLES.join(', ')}`);
        process.exit(1);
      }

      console.log(roles.map((role) => formatRoleRules(graph, role).join('\n')).join('\n\n'));
    });
}
