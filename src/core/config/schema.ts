import { z } from 'zod';

/**
 * Helper to create an optional object field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Extension list entry, e.g. ".c" */
const ExtensionSchema = z.string().regex(/^\.[A-Za-z0-9_+-]+$/, 'extensions must look like ".ext"');

/** Legacy top-level directory flagged for migration. */
export const LegacyDirectorySchema = z.object({
  path: z.string().min(1),
  message: z.string().min(1),
});

/** Directory convention, every entry relative to the scanned root. */
export const LayoutSchema = z.object({
  bootstrap: z.string().default('infra/bootstrap'),
  service: z.string().default('infra/service'),
  hal: z.string().default('infra/platform/hal'),
  bsp: z.string().default('infra/platform/bsp'),
  deps: z.string().default('deps'),
  deps_extern: z.string().default('deps/extern'),
  deps_middleware: z.string().default('deps/middleware'),
  features: z.string().default('project/features'),
  config: z.string().default('project/config'),
  datastreams: z.string().default('project/datastreams'),
  legacy: z.array(LegacyDirectorySchema).default([
    { path: 'core/config', message: 'Legacy core config folder detected. Migrate to /infra/bootstrap/cfg_core.h' },
    { path: 'features', message: 'Legacy features folder detected. Migrate to /project/features/' },
    { path: 'modules', message: 'Legacy modules folder detected. Migrate to /infra/ and /deps/' },
    { path: 'platform', message: 'Legacy platform folder detected. Migrate to /infra/platform/' },
  ]),
});

/** Well-known contract headers. */
export const ContractsSchema = z.object({
  core_header: z.string().default('cfg_core.h'),
  project_config_header: z.string().default('cfg_project.h'),
  project_data_header: z.string().default('db_project.h'),
});

/** Textual-include binding (C-family sources). */
export const IncludeBindingSchema = z.object({
  extensions: z.array(ExtensionSchema).default(['.c', '.h', '.cpp', '.hpp']),
  header_extensions: z.array(ExtensionSchema).default(['.h', '.hpp']),
  /** Files the red-flag heuristics inspect */
  implementation_extensions: z.array(ExtensionSchema).default(['.c']),
});

/** Identifier-reference binding (OOP sources). */
export const SymbolBindingSchema = z.object({
  extensions: z.array(ExtensionSchema).default(['.vb', '.cs']),
});

export const BindingsSchema = z.object({
  include: withDefaults(IncludeBindingSchema),
  symbol: withDefaults(SymbolBindingSchema),
});

export const FilesSchema = z.object({
  exclude: z.array(z.string()).default(['**/.git/**']),
});

export const RedFlagsSchema = z.object({
  enabled: z.boolean().default(true),
  min_idea_lines: z.number().int().min(0).default(10),
  domain_keywords: z.array(z.string().regex(/^\w+$/)).min(1).default([
    'mode',
    'state',
    'status',
    'level',
    'type',
    'flag',
    'enable',
    'disable',
    'active',
    'threshold',
  ]),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  failure: z.number().int().default(2),
  fatal: z.number().int().default(1),
});

export const ConfigSchema = z.object({
  layout: withDefaults(LayoutSchema),
  contracts: withDefaults(ContractsSchema),
  bindings: withDefaults(BindingsSchema),
  files: withDefaults(FilesSchema),
  red_flags: withDefaults(RedFlagsSchema),
  exit_codes: withDefaults(ExitCodesSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type LayoutConfig = z.infer<typeof LayoutSchema>;
export type ContractsConfig = z.infer<typeof ContractsSchema>;
export type RedFlagsConfig = z.infer<typeof RedFlagsSchema>;
export type ExitCodesConfig = z.infer<typeof ExitCodesSchema>;
export type LegacyDirectory = z.infer<typeof LegacyDirectorySchema>;
