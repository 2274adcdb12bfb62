/**
 * Identifier-reference binding: Idea-layer denylists, reverse references
 * and cross-feature isolation over an object-oriented tree.
 */
import type { Config } from '../config/schema.js';
import { discoverSourceFiles, loadSources } from '../discovery/scanner.js';
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import { checkCrossFeature } from '../isolation/cross-feature.js';
import { checkRedFlags } from '../red-flags/heuristics.js';
import { OOP_COMMENTS } from '../references/comments.js';
import { extractApiUsages, extractSymbolReferences } from '../references/symbol-extractor.js';
import { classify, layerOf } from '../roles/classifier.js';
import type { ClassifyOptions } from '../roles/types.js';
import { checkDependencies } from '../rules/engine.js';
import { edgesFor, SYMBOL_GRAPH } from '../rules/graph.js';
import type { RuleContext } from '../rules/types.js';
import { logger } from '../../utils/logger.js';
import type { BindingRun } from './types.js';

/** VB and C# role prefixes match in any case. */
export const SYMBOL_TAG_CASE: ClassifyOptions = { ignoreCase: true };

const EMPTY_CONTEXT: Omit<RuleContext, 'feature'> = {
  coreHeaders: new Set(),
  projectShared: new Set(),
  projectResources: new Set(),
  owners: new Map(),
  dependencyDir: '',
  ignoreCase: true,
};

function isLayerFile(file: SourceFile): boolean {
  return layerOf(classify(file.stem, SYMBOL_TAG_CASE).role) !== null;
}

export async function runSymbolGate(
  root: string,
  config: Config,
  extensions: readonly string[]
): Promise<BindingRun> {
  const files = await discoverSourceFiles(root, { extensions, exclude: config.files.exclude });
  const layerFiles = files.filter(isLayerFile);

  if (layerFiles.length === 0) {
    logger.debug(`No ida_/prx_/poi_ files found under ${root}`);
    return { filesScanned: 0, findings: [], noop: true };
  }

  const findings: Finding[] = [];
  for (const { file, text } of await loadSources(layerFiles)) {
    if (text.kind === 'unreadable') {
      findings.push(error(file.path, 0, 'file-read-error', text.reason));
      continue;
    }

    const { role, feature } = classify(file.stem, SYMBOL_TAG_CASE);
    const layer = layerOf(role);

    if (layer === 'idea') {
      for (const usage of extractApiUsages(text.content, file.extension)) {
        findings.push(error(file.path, usage.line, usage.rule, `Forbidden in ida_: ${usage.description}`));
      }
    }

    if (edgesFor(SYMBOL_GRAPH, role).length > 0) {
      const candidates = layerFiles.filter((other) => other.stem !== file.stem).map((other) => other.stem);
      const references = extractSymbolReferences(text.content, candidates);
      findings.push(...checkDependencies(file, role, references, SYMBOL_GRAPH, { ...EMPTY_CONTEXT, feature }));
    }

    findings.push(...checkCrossFeature(file, layerFiles, text.content));
    findings.push(...checkRedFlags(file, layer, text.content, OOP_COMMENTS, config.red_flags));
  }

  return { filesScanned: layerFiles.length, findings, noop: false };
}
