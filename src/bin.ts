#!/usr/bin/env node
import { createCli } from './cli/index.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

createCli()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(describeError(error));
    process.exit(1);
  });
