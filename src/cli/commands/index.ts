import type { Command } from 'commander';
import { openEngine } from '../engine.js';
import { formatIndexReport } from '../format.js';

export function registerIndexCommand(program: Command): void {
  program
    .command('index <directory>')
    .description('Index a directory into the local snapshot')
    .option('--reset', 'Clear the existing index before re-indexing (use after switching embedders)')
    .action(async (directory: string, options: { reset?: boolean }) => {
      const engine = await openEngine(directory);
      try {
        if (options.reset) {
          process.stderr.write('[sifter] Clearing existing index...\n');
          await engine.clearIndex();
        }
        const report = await engine.indexDirectory(directory);
        process.stdout.write(formatIndexReport(directory, report));
      } finally {
        await engine.dispose();
      }
    });
}
