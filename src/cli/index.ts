#!/usr/bin/env node
import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerIndexCommand } from './commands/index.js';
import { registerSearchCommand } from './commands/search.js';
import { registerAnalyzeCommand } from './commands/analyze.js';

const require = createRequire(import.meta.url);

const pkg = require('../../package.json') as { version: string; description: string };

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('sifter')
    .description(pkg.description)
    .version(pkg.version);

  registerIndexCommand(program);
  registerSearchCommand(program);
  registerAnalyzeCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`[sifter] Error: ${message}\n`);
  process.exit(1);
});
