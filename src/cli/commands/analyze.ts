import type { Command } from 'commander';
import { openEngine } from '../engine.js';
import { formatIndexReport, formatRunResult } from '../format.js';
import { parsePositiveInt } from './search.js';

interface AnalyzeOptions {
  dir: string;
  index?: boolean;
  maxTasks?: number;
  json?: boolean;
}

export function registerAnalyzeCommand(program: Command): void {
  program
    .command('analyze <goal>')
    .description('Iteratively analyze the indexed corpus towards a goal')
    .option('--dir <directory>', 'Corpus root', '.')
    .option('--index', 'Index the corpus root before analyzing')
    .option('--max-tasks <n>', 'Task budget for this run', parsePositiveInt)
    .option('--json', 'Print the run result as JSON')
    .action(async (goal: string, opts: AnalyzeOptions) => {
      const engine = await openEngine(opts.dir, (config) =>
        opts.maxTasks !== undefined ? { ...config, loop: { ...config.loop, maxTasks: opts.maxTasks } } : config,
      );

      const controller = new AbortController();
      const onSigint = (): void => controller.abort();
      process.once('SIGINT', onSigint);
      try {
        if (opts.index) {
          const report = await engine.indexDirectory(opts.dir);
          process.stderr.write(formatIndexReport(opts.dir, report));
        }
        const result = await engine.analyze(goal, { signal: controller.signal });
        process.stdout.write(opts.json ? `${JSON.stringify(result, null, 2)}\n` : formatRunResult(result));
        if (result.state === 'failed') process.exitCode = 2;
      } finally {
        process.removeListener('SIGINT', onSigint);
        await engine.dispose();
      }
    });
}
