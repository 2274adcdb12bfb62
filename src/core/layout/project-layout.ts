/**
 * Path predicates over the directory convention.
 * Comparisons are case-insensitive on forward-slash paths.
 */
import * as path from 'node:path';
import type { LayoutConfig } from '../config/schema.js';
import { toPosixPath } from '../../utils/file-system.js';
import type { LayoutArea, NestedArea, Placement, ProjectLayout } from './types.js';

export function createProjectLayout(root: string, config: LayoutConfig): ProjectLayout {
  const absoluteRoot = toPosixPath(path.resolve(root));
  const relative: Record<LayoutArea, string> = {
    bootstrap: trimSlashes(config.bootstrap),
    service: trimSlashes(config.service),
    hal: trimSlashes(config.hal),
    bsp: trimSlashes(config.bsp),
    deps: trimSlashes(config.deps),
    depsExtern: trimSlashes(config.deps_extern),
    depsMiddleware: trimSlashes(config.deps_middleware),
    features: trimSlashes(config.features),
    config: trimSlashes(config.config),
    datastreams: trimSlashes(config.datastreams),
  };
  const join = (rel: string): string => toPosixPath(path.posix.join(absoluteRoot, rel));

  return {
    root: absoluteRoot,
    relative,
    dirs: {
      bootstrap: join(relative.bootstrap),
      service: join(relative.service),
      hal: join(relative.hal),
      bsp: join(relative.bsp),
      deps: join(relative.deps),
      depsExtern: join(relative.depsExtern),
      depsMiddleware: join(relative.depsMiddleware),
      features: join(relative.features),
      config: join(relative.config),
      datastreams: join(relative.datastreams),
    },
    legacy: config.legacy.map((entry) => ({ ...entry, path: trimSlashes(entry.path) })),
  };
}

/**
 * True when `filePath` lies strictly inside `dir`.
 */
export function isUnderPath(filePath: string, dir: string): boolean {
  const file = toPosixPath(filePath).toLowerCase();
  const base = toPosixPath(dir).toLowerCase();
  const prefix = base.endsWith('/') ? base : `${base}/`;
  return file.startsWith(prefix);
}

/**
 * True when `filePath` contains `/<relative>/` anywhere.
 */
export function containsSegment(filePath: string, relative: string): boolean {
  const file = toPosixPath(filePath).toLowerCase();
  return file.includes(`/${trimSlashes(relative).toLowerCase()}/`);
}

export function placementOf(filePath: string, layout: ProjectLayout): Placement {
  const under: Record<LayoutArea, boolean> = {
    bootstrap: isUnderPath(filePath, layout.dirs.bootstrap),
    service: isUnderPath(filePath, layout.dirs.service),
    hal: isUnderPath(filePath, layout.dirs.hal),
    bsp: isUnderPath(filePath, layout.dirs.bsp),
    deps: isUnderPath(filePath, layout.dirs.deps),
    depsExtern: isUnderPath(filePath, layout.dirs.depsExtern),
    depsMiddleware: isUnderPath(filePath, layout.dirs.depsMiddleware),
    features: isUnderPath(filePath, layout.dirs.features),
    config: isUnderPath(filePath, layout.dirs.config),
    datastreams: isUnderPath(filePath, layout.dirs.datastreams),
  };
  const nested = under.depsExtern || under.depsMiddleware;

  const segment = byNestedArea((area) => containsSegment(filePath, layout.relative[area]));
  const anywhere = byNestedArea((area) => under[area] || (nested && segment[area]));

  return { under, nested, segment, anywhere };
}

/**
 * Feature implied by the nearest enclosing `<features>/<name>/` directory.
 */
export function featureFromPath(filePath: string, layout: ProjectLayout): string | null {
  const file = toPosixPath(filePath);
  const needle = `/${layout.relative.features.toLowerCase()}/`;
  const lower = file.toLowerCase();
  const at = lower.lastIndexOf(needle);
  if (at < 0) {
    return null;
  }
  const rest = file.slice(at + needle.length);
  const slash = rest.indexOf('/');
  if (slash <= 0) {
    return null;
  }
  return rest.slice(0, slash);
}

function byNestedArea(predicate: (area: NestedArea) => boolean): Record<NestedArea, boolean> {
  return {
    bootstrap: predicate('bootstrap'),
    service: predicate('service'),
    hal: predicate('hal'),
    bsp: predicate('bsp'),
    features: predicate('features'),
    config: predicate('config'),
    datastreams: predicate('datastreams'),
  };
}

function trimSlashes(value: string): string {
  return toPosixPath(value).replace(/^\/+|\/+$/g, '');
}
