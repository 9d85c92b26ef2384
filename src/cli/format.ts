import type { RunResult } from '../types/analysis.types.js';
import type { IndexReport, RetrievedUnit } from '../types/unit.types.js';
import { unitLabel } from '../reasoning/contextFormatter.js';

export function formatIndexReport(directory: string, report: IndexReport): string {
  return (
    `Indexed ${report.documents} files (${report.units} units) from ${directory}\n` +
    `  embedded ${report.embedded}, reused ${report.reused}, truncated ${report.truncated}, ` +
    `removed ${report.removed}, skipped ${report.skipped}\n`
  );
}

export function formatSearchResults(query: string, hits: RetrievedUnit[]): string {
  if (hits.length === 0) return `No results found for: ${query}\n`;
  return hits
    .map((hit, i) => `${i + 1}. ${unitLabel(hit.unit)}  score=${hit.score.toFixed(3)} [${hit.strategies.join('+')}]\n`)
    .join('');
}

export function formatRunResult(result: RunResult): string {
  const lines = [
    `Goal: ${result.goal}`,
    `Status: ${result.state} (${result.stopReason}${result.partial ? ', partial' : ''}) after ${result.iterations} iteration(s)`,
  ];
  if (result.error) lines.push(`Error: [${result.error.code}] ${result.error.message}`);

  const queries = new Map(result.tasks.map((task) => [task.id, task.goalDescription]));
  for (const finding of result.findings) {
    lines.push(
      '',
      `## ${finding.taskId}: ${queries.get(finding.taskId) ?? finding.query}`,
      `status=${finding.status} confidence=${finding.confidence} units=${finding.retrievedUnitIds.length}`,
      finding.conclusion,
    );
  }
  return lines.join('\n') + '\n';
}
