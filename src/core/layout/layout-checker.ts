/**
 * Tree-level layout checks: required directories and contract headers,
 * legacy folders, and the empty-tree case.
 * Each finding points at the path it is about.
 */
import * as path from 'node:path';
import type { ContractsConfig } from '../config/schema.js';
import type { SourceFile } from '../discovery/types.js';
import type { Finding } from '../findings/types.js';
import { error } from '../findings/aggregator.js';
import { fileExists, isDirectory } from '../../utils/file-system.js';
import type { ProjectLayout } from './types.js';

/**
 * Which of the probed paths exist on disk.
 */
export interface LayoutFacts {
  directories: ReadonlySet<string>;
  files: ReadonlySet<string>;
}

export function coreHeaderPath(layout: ProjectLayout, contracts: ContractsConfig): string {
  return path.posix.join(layout.dirs.bootstrap, contracts.core_header);
}

export function projectHeaderPath(layout: ProjectLayout, contracts: ContractsConfig): string {
  return path.posix.join(layout.dirs.config, contracts.project_config_header);
}

/**
 * Probe the file system for every path the layout checks need.
 */
export async function probeLayout(layout: ProjectLayout, contracts: ContractsConfig): Promise<LayoutFacts> {
  const dirCandidates = [
    layout.dirs.bootstrap,
    layout.dirs.deps,
    layout.dirs.config,
    ...layout.legacy.map((entry) => path.posix.join(layout.root, entry.path)),
  ];
  const fileCandidates = [coreHeaderPath(layout, contracts), projectHeaderPath(layout, contracts)];

  const [dirHits, fileHits] = await Promise.all([
    Promise.all(dirCandidates.map(async (dir) => ((await isDirectory(dir)) ? dir : null))),
    Promise.all(fileCandidates.map(async (file) => ((await fileExists(file)) ? file : null))),
  ]);

  return {
    directories: new Set(dirHits.filter((dir): dir is string => dir !== null)),
    files: new Set(fileHits.filter((file): file is string => file !== null)),
  };
}

/**
 * Required-file checks only run when the tree has sources at all; an empty
 * tree reports the single "no source files" finding instead.
 */
export function checkLayout(
  layout: ProjectLayout,
  contracts: ContractsConfig,
  facts: LayoutFacts,
  sources: readonly SourceFile[]
): Finding[] {
  const findings: Finding[] = [];
  const hasSources = sources.length > 0;

  if (!facts.directories.has(layout.dirs.bootstrap)) {
    findings.push(
      error(layout.dirs.bootstrap, 0, 'layout.required', `Missing required infra bootstrap path: ${layout.dirs.bootstrap}`)
    );
  }
  if (!facts.directories.has(layout.dirs.deps)) {
    findings.push(
      error(layout.dirs.deps, 0, 'layout.required', `Missing required dependency repository path: ${layout.dirs.deps}`)
    );
  }

  const coreHeader = coreHeaderPath(layout, contracts);
  if (hasSources && !facts.files.has(coreHeader)) {
    findings.push(error(coreHeader, 0, 'layout.required', `Missing required Core Contract header: ${coreHeader}`));
  }

  for (const legacy of layout.legacy) {
    const legacyDir = path.posix.join(layout.root, legacy.path);
    if (facts.directories.has(legacyDir)) {
      findings.push(error(legacyDir, 0, 'layout.legacy', `${legacy.message}: ${legacyDir}`));
    }
  }

  if (facts.directories.has(layout.dirs.config)) {
    const projectHeader = projectHeaderPath(layout, contracts);
    if (hasSources && !facts.files.has(projectHeader)) {
      findings.push(
        error(projectHeader, 0, 'layout.required', `Missing required project target interface header: ${projectHeader}`)
      );
    }
  } else {
    findings.push(
      error(layout.dirs.config, 0, 'layout.required', `Missing required project config folder: ${layout.dirs.config}`)
    );
  }

  if (!hasSources) {
    findings.push(error(layout.root, 0, 'layout.required', `No source files found under: ${layout.root}`));
  }

  return findings;
}
