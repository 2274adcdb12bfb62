/**
 * `layergate check [root]`: run one binding and gate on its findings.
 */
import { Command } from 'commander';
import * as path from 'node:path';
import { loadConfig } from '../../core/config/loader.js';
import { normalizeExtensions } from '../../core/discovery/scanner.js';
import { runGate } from '../../core/gate/index.js';
import { buildReport, writeReport } from '../../core/report/writer.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { createFormatter } from '../formatters/index.js';
import {
  applyRedFlagOption,
  DEFAULT_FATAL_EXIT_CODE,
  getExitCode,
  parseBinding,
  parseFormat,
  resolveLogLevel,
  type CheckOptions,
} from './check-helpers.js';

/**
 * Create the check command.
 */
export function createCheckCommand(): Command {
  return new Command('check')
    .description('Verify a source tree against the layered architecture rules')
    .argument('[root]', 'Project root directory to scan (default: current directory)')
    .option('--binding <binding>', 'Source binding: include (C-family) or symbol (VB/C#)', 'include')
    .option('--extensions <list>', 'Comma-separated file extensions to scan (overrides config)')
    .option('--report <path>', 'Write a structured JSON report to this path')
    .option('--format <format>', 'Output format: human, json, or compact', 'human')
    .option('--config <path>', 'Path to config file')
    .option('--no-red-flags', 'Skip the advisory red-flag heuristics')
    .option('--errors-only', 'Only show errors in output (still runs all checks)')
    .option('--quiet', 'Suppress all output except JSON')
    .option('--verbose', 'Show debug logging')
    .action(async (rootArg: string | undefined, options: CheckOptions) => {
      logger.setLevel(resolveLogLevel(options));
      let exitCode = DEFAULT_FATAL_EXIT_CODE;
      let fatalExitCode = DEFAULT_FATAL_EXIT_CODE;

      try {
        const root = path.resolve(rootArg ?? process.cwd());
        const binding = parseBinding(options.binding);
        const format = parseFormat(options.format);
        const loaded = await loadConfig(root, options.config);
        fatalExitCode = loaded.exit_codes.fatal;
        const config = applyRedFlagOption(loaded, options.redFlags);

        const result = await runGate({
          root,
          binding,
          config,
          extensions: options.extensions ? normalizeExtensions(options.extensions) : undefined,
        });

        if (!options.quiet || format === 'json') {
          const formatter = createFormatter(format, { errorsOnly: options.errorsOnly ?? false });
          console.log(formatter.format(result));
        }

        if (options.report) {
          const reportPath = path.resolve(options.report);
          await writeReport(reportPath, buildReport(result));
          if (format !== 'json') {
            logger.info(`Report written: ${reportPath}`);
          }
        }

        exitCode = getExitCode(result, config.exit_codes);
      } catch (error) {
        logger.error(`Check failed: ${describeError(error)}`);
        if (error instanceof Error && error.stack) {
          logger.debug(error.stack);
        }
        exitCode = fatalExitCode;
      }

      process.exit(exitCode);
    });
}
