import { Command } from 'commander';
import { readFileSync } from 'fs';
import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';
import { createCheckCommand } from './commands/check.js';
import { createClassifyCommand } from './commands/classify.js';
import { createRulesCommand } from './commands/rules.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

function readVersion(): string {
  const manifest: unknown = JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/** Create the CLI program. */
export function createCli(): Command {
  const program = new Command()
    .name('layergate')
    .description('Layered-architecture conformance gate for C-family and VB/C# source trees')
    .version(readVersion());
  [createCheckCommand, createClassifyCommand, createRulesCommand].forEach((cmd) => program.addCommand(cmd()));
  return program;
}
