/**
 * Textual-include binding: layout, naming, placement, include rules and
 * red flags over a C-family tree.
 */
import type { Config } from '../config/schema.js';
import { discoverSourceFiles, loadSources } from '../discovery/scanner.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import { checkLayout, probeLayout } from '../layout/layout-checker.js';
import { validateLocation, validateNaming } from '../layout/location-validator.js';
import { createProjectLayout, featureFromPath, placementOf } from '../layout/project-layout.js';
import { checkRedFlags } from '../red-flags/heuristics.js';
import { C_COMMENTS } from '../references/comments.js';
import { extractIncludes } from '../references/include-extractor.js';
import { classify } from '../roles/classifier.js';
import type { ClassifyOptions, Layer, Role } from '../roles/types.js';
import { checkDependencies } from '../rules/engine.js';
import { INCLUDE_GRAPH } from '../rules/graph.js';
import {
  buildHeaderOwnership,
  collectProjectResourceHeaders,
  collectProjectSharedHeaders,
} from '../rules/ownership.js';
import type { RuleContext } from '../rules/types.js';
import { logger } from '../../utils/logger.js';
import type { BindingRun } from './types.js';

/** C sources spell role prefixes and core names in lower case only. */
export const INCLUDE_TAG_CASE: ClassifyOptions = { ignoreCase: false };

/** Red flags look at feature Idea and Poiesis sources only. */
function redFlagLayer(role: Role): Layer | null {
  if (role === 'idea') return 'idea';
  if (role === 'poiesis') return 'poiesis';
  return null;
}

export async function runIncludeGate(
  root: string,
  config: Config,
  extensions: readonly string[]
): Promise<BindingRun> {
  const layout = createProjectLayout(root, config.layout);
  const binding = config.bindings.include;

  const files = await discoverSourceFiles(layout.root, { extensions, exclude: config.files.exclude });
  const facts = await probeLayout(layout, config.contracts);
  const findings: Finding[] = checkLayout(layout, config.contracts, facts, files);

  const baseContext: Omit<RuleContext, 'feature'> = {
    coreHeaders: new Set([config.contracts.core_header]),
    projectShared: collectProjectSharedHeaders(files, layout, binding.header_extensions),
    projectResources: collectProjectResourceHeaders(files, layout, binding.header_extensions, INCLUDE_TAG_CASE),
    owners: buildHeaderOwnership(files, layout, binding.header_extensions),
    dependencyDir: layout.relative.deps.split('/')[0],
    ignoreCase: false,
  };
  logger.debug('Include rule context', {
    projectShared: [...baseContext.projectShared],
    projectResources: baseContext.projectResources.size,
    ownedHeaders: baseContext.owners.size,
  });

  for (const { file, text } of await loadSources(files)) {
    const classification = classify(file.stem, INCLUDE_TAG_CASE);
    const placement = placementOf(file.path, layout);

    const naming = validateNaming(file, classification, placement);
    findings.push(...naming.findings);
    if (!naming.proceed) {
      continue;
    }

    const { role } = classification;
    findings.push(...validateLocation(file, role, placement, layout, config.contracts));

    if (text.kind === 'unreadable') {
      findings.push(error(file.path, 0, 'read', `Failed to read file: ${text.reason}`));
      continue;
    }

    const feature = featureFromPath(file.path, layout) ?? classification.feature;
    findings.push(...checkDependencies(file, role, extractIncludes(text.content), INCLUDE_GRAPH, { ...baseContext, feature }));

    if (binding.implementation_extensions.includes(file.extension)) {
      findings.push(...checkRedFlags(file, redFlagLayer(role), text.content, C_COMMENTS, config.red_flags));
    }
  }

  return { filesScanned: files.length, findings, noop: false };
}
