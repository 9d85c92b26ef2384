import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { openEngine } from '../engine.js';
import { formatSearchResults } from '../format.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search the indexed corpus')
    .option('--dir <directory>', 'Corpus root whose snapshot to search', '.')
    .option('--top <n>', 'Max results', parsePositiveInt, 5)
    .option('--json', 'Print results as JSON')
    .action(async (query: string, opts: { dir: string; top: number; json?: boolean }) => {
      const engine = await openEngine(opts.dir);
      try {
        const hits = await engine.search(query, { topK: opts.top });
        if (opts.json) {
          const rows = hits.map((hit) => ({
            id: hit.unit.id,
            metadata: hit.unit.metadata,
            score: hit.score,
            similarity: hit.similarity,
            strategies: hit.strategies,
          }));
          process.stdout.write(`${JSON.stringify(rows, null, 2)}\n`);
        } else {
          process.stdout.write(formatSearchResults(query, hits));
        }
      } finally {
        await engine.dispose();
      }
    });
}
