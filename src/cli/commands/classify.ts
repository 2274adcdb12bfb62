/**
 * `layergate classify <names...>`: show the role a file name maps to.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { INCLUDE_TAG_CASE, SYMBOL_TAG_CASE } from '../../core/gate/index.js';
import type { GateBinding } from '../../core/gate/types.js';
import { classifyFile } from '../../core/roles/classifier.js';
import type { Classification } from '../../core/roles/types.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseBinding } from './check-helpers.js';

export interface ClassifiedName extends Classification {
  name: string;
}

/**
 * Classify names the way `binding` does: the include binding matches
 * role prefixes case-sensitively.
 */
export function classifyNames(names: readonly string[], binding: GateBinding = 'include'): ClassifiedName[] {
  const options = binding === 'include' ? INCLUDE_TAG_CASE : SYMBOL_TAG_CASE;
  return names.map((name) => ({ name: path.basename(name), ...classifyFile(name, options) }));
}

export function formatClassification(entry: ClassifiedName): string {
  const feature = entry.feature === null ? '' : `  (feature: ${entry.feature})`;
  return `${entry.name}  ${entry.role}${feature}`;
}

/**
 * Create the classify command.
 */
export function createClassifyCommand(): Command {
  return new Command('classify')
    .description('Print the architectural role and implied feature of file names')
    .argument('<names...>', 'File names or paths')
    .option('--binding <binding>', 'Source binding: include or symbol', 'include')
    .option('--json', 'Output in JSON format')
    .action((names: string[], options: { binding: string; json?: boolean }) => {
      let binding: GateBinding;
      try {
        binding = parseBinding(options.binding);
      } catch (error) {
        logger.error(describeError(error));
        process.exit(1);
      }

      const entries = classifyNames(names, binding);
      if (options.json) {
        console.log(JSON.stringify(entries, null, 2));
        return;
      }
      for (const entry of entries) {
        console.log(formatClassification(entry));
      }
    });
}
