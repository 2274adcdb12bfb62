/**
 * Location validator: each role must live in its own directory.
 *
 * Roles with a nested-unit exemption accept a vendored copy under
 * `deps/extern` or `deps/middleware` that replicates the required
 * directory somewhere in its own tree.
 */
import type { ContractsConfig } from '../config/schema.js';
import type { Classification, Role } from '../roles/types.js';
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import type { Placement, ProjectLayout } from './types.js';

interface PlacementViolation {
  rule: string;
  message: string;
}

type PlacementRule = (
  file: SourceFile,
  placement: Placement,
  layout: ProjectLayout,
  contracts: ContractsConfig
) => PlacementViolation | null;

const NESTED_NOTE = '(root or nested architecture unit)';

function requireArea(
  rule: string,
  accepts: (p: Placement) => boolean,
  message: (layout: ProjectLayout, file: SourceFile) => string
): PlacementRule {
  return (file, placement, layout) => (accepts(placement) ? null : { rule, message: message(layout, file) });
}

function bootstrapRule(stem: string): PlacementRule {
  return requireArea(
    'path.bootstrap',
    (p) => p.anywhere.bootstrap,
    (layout) => `${stem} must be located under /${layout.relative.bootstrap} ${NESTED_NOTE}.`
  );
}

function featureLayerRule(tag: string): PlacementRule {
  return requireArea(
    'path.project_feature',
    (p) => p.anywhere.features,
    (layout) => `${tag}_* feature files must be located under /${layout.relative.features} ${NESTED_NOTE}.`
  );
}

/**
 * Config and data resources. Vendored copies that do not replicate the
 * project layout are external code and exempt; the project-level singleton
 * header must sit in the project config directory.
 */
function resourceRule(tag: 'cfg' | 'db', singleton: (c: ContractsConfig) => string): PlacementRule {
  return (file, p, layout, contracts) => {
    const externalNonFractal = p.nested && !p.segment.features && !p.segment.config;
    if (externalNonFractal || sameName(file.name, contracts.core_header)) {
      return null;
    }
    if (sameName(file.name, singleton(contracts))) {
      return p.anywhere.config
        ? null
        : {
            rule: 'path.project_config',
            message: `${singleton(contracts)} must be located under /${layout.relative.config} ${NESTED_NOTE}.`,
          };
    }
    if (p.anywhere.features || p.anywhere.config) {
      return null;
    }
    return {
      rule: 'path.feature_resource',
      message: `${tag}_* feature files must be located under /${layout.relative.features}/ or /${layout.relative.config}/ ${NESTED_NOTE}: ${file.name}`,
    };
  };
}

const PLACEMENT_RULES: Partial<Record<Role, PlacementRule>> = {
  'core-idea': bootstrapRule('ida_core'),
  'core-praxis': bootstrapRule('prx_core'),
  'core-poiesis': bootstrapRule('poi_core'),
  service: requireArea(
    'path.infra_service',
    (p) => p.anywhere.service,
    (layout) => `svc_* files must be located under /${layout.relative.service} ${NESTED_NOTE}.`
  ),
  hal: requireArea(
    'path.infra_hal',
    (p) => p.anywhere.hal,
    (layout) => `hal_* files must be located under /${layout.relative.hal} ${NESTED_NOTE}.`
  ),
  bsp: requireArea(
    'path.infra_bsp',
    (p) => p.anywhere.bsp,
    (layout) => `bsp_* files must be located under /${layout.relative.bsp} ${NESTED_NOTE}.`
  ),
  middleware: requireArea(
    'path.deps_middleware',
    (p) => p.under.depsMiddleware || p.under.depsExtern,
    (layout) => `mdw_* files must be located under /${layout.relative.depsMiddleware} or /${layout.relative.depsExtern}.`
  ),
  idea: featureLayerRule('ida'),
  praxis: featureLayerRule('prx'),
  poiesis: featureLayerRule('poi'),
  'feature-config': resourceRule('cfg', (c) => c.project_config_header),
  'feature-data': resourceRule('db', (c) => c.project_data_header),
  datastream: requireArea(
    'path.datastream',
    (p) => p.anywhere.datastreams || p.under.depsMiddleware || p.under.depsExtern,
    (layout, file) =>
      `stm_* files must be located under /${layout.relative.datastreams}/, /${layout.relative.depsMiddleware}/, or /${layout.relative.depsExtern}/: ${file.name}`
  ),
};

/**
 * Naming check. Returns findings and whether the file takes part in
 * the remaining checks.
 */
export function validateNaming(
  file: SourceFile,
  classification: Classification,
  placement: Placement
): { findings: Finding[]; proceed: boolean } {
  if (classification.role === 'invalid-prefix') {
    return {
      findings: [
        error(
          file.path,
          0,
          'naming.prefix',
          "Invalid role prefix 'inf_'. Keep role prefixes (ida_/prx_/poi_/mdw_/svc_/hal_/bsp_/stm_/cfg_/db_)."
        ),
      ],
      proceed: false,
    };
  }

  if (classification.role === 'unknown') {
    // Only the root-level managed directories are policed; anything else
    // outside the convention is left alone.
    const managed =
      placement.under.features ||
      placement.under.config ||
      placement.under.datastreams ||
      placement.under.bootstrap;
    return {
      findings: managed
        ? [error(file.path, 0, 'naming.prefix', `Unknown architecture file role prefix: ${file.name}`)]
        : [],
      proceed: false,
    };
  }

  return { findings: [], proceed: true };
}

/**
 * Placement check for a classified file.
 */
export function validateLocation(
  file: SourceFile,
  role: Role,
  placement: Placement,
  layout: ProjectLayout,
  contracts: ContractsConfig
): Finding[] {
  const findings: Finding[] = [];

  if (sameName(file.name, contracts.core_header) && !placement.anywhere.bootstrap) {
    findings.push(
      error(
        file.path,
        0,
        'path.bootstrap',
        `${contracts.core_header} must be located under /${layout.relative.bootstrap} ${NESTED_NOTE}.`
      )
    );
  }

  const rule = PLACEMENT_RULES[role];
  const violation = rule ? rule(file, placement, layout, contracts) : null;
  if (violation) {
    findings.push(error(file.path, 0, violation.rule, violation.message));
  }

  return findings;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
