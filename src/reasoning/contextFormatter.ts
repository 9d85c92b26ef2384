import type { Unit } from '../types/unit.types.js';

export interface FormatOptions {
  maxCharsPerUnit?: number;
  maxUnitsPerSource?: number;
}

/** Short human-readable location of a unit, e.g. `src/a.ts:10-24 (parseArgs)`. */
export function unitLabel(unit: Unit): string {
  const source = unit.metadata['source'] ?? unit.id;
  const start = unit.metadata['startLine'];
  const end = unit.metadata['endLine'];
  const symbol = unit.metadata['symbol'];
  const lines = start && end ? `:${start}-${end}` : '';
  return `${source}${lines}${symbol ? ` (${symbol})` : ''}`;
}

function escapeAttr(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;');
}

/**
 * Formats units into a <corpus_context> block for the reasoning prompt.
 * Returns an empty string when there is nothing to show.
 *
 * Units keep the order given. Per-source caps and content deduplication are
 * applied first, then oversized units are cut at a line boundary.
 */
export function formatContext(
  units: readonly Unit[],
  instruction: string,
  options: FormatOptions = {},
): string {
  if (units.length === 0) return '';

  const maxChars = options.maxCharsPerUnit ?? 2000;
  const maxPerSource = options.maxUnitsPerSource ?? Number.POSITIVE_INFINITY;

  const perSource = new Map<string, number>();
  const seen = new Set<string>();
  const kept = units.filter((unit) => {
    const source = unit.metadata['source'] ?? '';
    const count = perSource.get(source) ?? 0;
    if (count >= maxPerSource) return false;
    const key = unit.text.slice(0, 200);
    if (seen.has(key)) return false;
    perSource.set(source, count + 1);
    seen.add(key);
    return true;
  });

  const blocks = kept.map((unit, i) => {
    let content = unit.text;
    if (content.length > maxChars) {
      const lastNewline = content.lastIndexOf('\n', maxChars);
      content =
        (lastNewline > 0 ? content.slice(0, lastNewline) : content.slice(0, maxChars)) +
        '\n... [truncated]';
    }

    const { source, language, startLine, endLine, symbol } = unit.metadata;
    const attrs = [
      `rank="${i + 1}"`,
      `id="${unit.id}"`,
      `source="${escapeAttr(source ?? '')}"`,
      ...(startLine && endLine ? [`lines="${startLine}-${endLine}"`] : []),
      `language="${escapeAttr(language ?? 'text')}"`,
      ...(symbol ? [`symbol="${escapeAttr(symbol)}"`] : []),
    ];
    return `<unit ${attrs.join(' ')}>\n${content}\n</unit>`;
  });

  return (
    `<corpus_context instruction="${escapeAttr(instruction)}" units="${kept.length}">\n` +
    blocks.join('\n') +
    '\n</corpus_context>'
  );
}
