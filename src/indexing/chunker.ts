import type { CorpusDocument, Unit, UnitMetadata } from '../types/unit.types.js';
import type { ChunkerConfig } from '../types/config.types.js';
import type { Corpus, SkipHandler } from '../corpus/corpus.js';
import { sha256 } from '../util/hash.js';

export interface Chunker {
  chunk(doc: CorpusDocument): Iterable<Unit>;
}

export type ChunkSizing = Pick<ChunkerConfig, 'maxUnitChars' | 'overlapChars' | 'hardMaxChars'>;

export const DEFAULT_SIZING: ChunkSizing = {
  maxUnitChars: 1500,
  overlapChars: 200,
  hardMaxChars: 4000,
};

// Regex patterns for identifying top-level declarations per language
interface LangPattern {
  pattern: RegExp;
  nameGroup: number;
}

const LANGUAGE_PATTERNS: Record<string, LangPattern[]> = {
  typescript: [
    { pattern: /^(?:export\s+)?(?:default\s+)?(?:async\s+)?function\*?\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:export\s+)?(?:default\s+)?(?:abstract\s+)?class\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:export\s+)?(?:interface|type|enum)\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:export\s+)?(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s+)?(?:\(|function)/, nameGroup: 1 },
  ],
  javascript: [
    { pattern: /^(?:export\s+)?(?:default\s+)?(?:async\s+)?function\*?\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:export\s+)?(?:default\s+)?class\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:export\s+)?(?:const|let|var)\s+(\w+)\s*=\s*(?:async\s+)?(?:\(|function)/, nameGroup: 1 },
  ],
  python: [
    { pattern: /^(?:async\s+)?def\s+(\w+)\s*\(/, nameGroup: 1 },
    { pattern: /^class\s+(\w+)/, nameGroup: 1 },
  ],
  go: [
    { pattern: /^func\s+(?:\(\w+\s+\*?\w+\)\s+)?(\w+)\s*\(/, nameGroup: 1 },
    { pattern: /^type\s+(\w+)\s+(?:struct|interface)/, nameGroup: 1 },
  ],
  rust: [
    { pattern: /^(?:pub(?:\(\w+\))?\s+)?(?:async\s+)?fn\s+(\w+)/, nameGroup: 1 },
    { pattern: /^(?:pub(?:\(\w+\))?\s+)?(?:struct|enum|trait)\s+(\w+)/, nameGroup: 1 },
    { pattern: /^impl(?:<[^>]*>)?\s+(?:\w+\s+for\s+)?(\w+)/, nameGroup: 1 },
  ],
  java: [
    { pattern: /^(?:public\s+|protected\s+|private\s+)?(?:abstract\s+|final\s+)*(?:class|interface|enum|record)\s+(\w+)/, nameGroup: 1 },
  ],
};

/** A logical span of a document that should stay in one unit when it fits. */
interface Block {
  startLine: number; // 0-based index into the document's lines
  lines: string[];
  symbol?: string;
}

interface Piece {
  startLine: number;
  lines: string[];
  truncated: boolean;
}

function isBlank(lines: string[]): boolean {
  return lines.every((line) => line.trim() === '');
}

function joinedLength(lines: string[]): number {
  return lines.reduce((total, line) => total + line.length, 0) + Math.max(0, lines.length - 1);
}

/** Split into paragraphs separated by one or more blank lines. */
export function paragraphBlocks(lines: string[]): Block[] {
  const blocks: Block[] = [];
  let current: Block | null = null;

  lines.forEach((line, i) => {
    if (line.trim() === '') {
      current = null;
      return;
    }
    if (!current) {
      current = { startLine: i, lines: [] };
      blocks.push(current);
    }
    current.lines.push(line);
  });

  return blocks;
}

function declarationBlocks(lines: string[], patterns: LangPattern[]): Block[] {
  const boundaries: Array<{ line: number; name: string }> = [];

  lines.forEach((line, i) => {
    for (const { pattern, nameGroup } of patterns) {
      const name = line.match(pattern)?.[nameGroup];
      if (name) {
        boundaries.push({ line: i, name });
        break;
      }
    }
  });

  if (boundaries.length === 0) return paragraphBlocks(lines);

  const blocks: Block[] = [];
  const first = boundaries[0];
  if (first && first.line > 0) {
    // Imports, headers and other prelude before the first declaration
    blocks.push(...paragraphBlocks(lines.slice(0, first.line)));
  }

  boundaries.forEach((boundary, i) => {
    const end = boundaries[i + 1]?.line ?? lines.length;
    let slice = lines.slice(boundary.line, end);
    // Trailing blank lines belong to the gap, not to the declaration
    while (slice.length > 0 && (slice[slice.length - 1] ?? '').trim() === '') {
      slice = slice.slice(0, -1);
    }
    blocks.push({ startLine: boundary.line, lines: slice, symbol: boundary.name });
  });

  return blocks;
}

/**
 * Split an oversized block at line boundaries. Consecutive windows share up
 * to `overlapChars` of trailing lines. A line longer than `maxUnitChars`
 * stands alone and is cut to `hardMaxChars` when it exceeds that too.
 */
export function splitBlock(block: Block, sizing: ChunkSizing): Piece[] {
  const { maxUnitChars, overlapChars, hardMaxChars } = sizing;
  const { lines } = block;
  if (joinedLength(lines) <= maxUnitChars) {
    return [{ startLine: block.startLine, lines, truncated: false }];
  }

  const pieces: Piece[] = [];
  let i = 0;
  while (i < lines.length) {
    const line = lines[i] ?? '';
    if (line.length > maxUnitChars) {
      const truncated = line.length > hardMaxChars;
      pieces.push({
        startLine: block.startLine + i,
        lines: [truncated ? line.slice(0, hardMaxChars) : line],
        truncated,
      });
      i++;
      continue;
    }

    let j = i;
    let size = 0;
    while (j < lines.length) {
      const next = (lines[j] ?? '').length;
      const added = j > i ? next + 1 : next;
      if (next > maxUnitChars || size + added > maxUnitChars) break;
      size += added;
      j++;
    }
    pieces.push({ startLine: block.startLine + i, lines: lines.slice(i, j), truncated: false });
    if (j >= lines.length) break;

    const nextLength = (lines[j] ?? '').length;
    if (nextLength > maxUnitChars) {
      i = j;
      continue;
    }

    // Back up for overlap, keeping room for line j so the next window advances
    let k = j;
    let overlap = 0;
    while (k - 1 > i) {
      const candidate = (lines[k - 1] ?? '').length + 1;
      if (overlap + candidate > overlapChars) break;
      if (overlap + candidate + nextLength + 1 > maxUnitChars) break;
      overlap += candidate;
      k--;
    }
    i = k;
  }

  return pieces;
}

function unitId(source: string, occurrence: number, text: string): string {
  return sha256(`${source}\u0000${occurrence}\u0000${text}`).slice(0, 32);
}

abstract class BaseChunker implements Chunker {
  protected readonly sizing: ChunkSizing;

  constructor(sizing: Partial<ChunkSizing> = {}) {
    this.sizing = { ...DEFAULT_SIZING, ...sizing };
  }

  protected abstract blocks(doc: CorpusDocument, lines: string[]): Block[];

  *chunk(doc: CorpusDocument): Generator<Unit> {
    const lines = doc.contents.split(/\r?\n/);
    const occurrences = new Map<string, number>();

    for (const block of this.blocks(doc, lines)) {
      if (block.lines.length === 0 || isBlank(block.lines)) continue;
      const pieces = splitBlock(block, this.sizing);

      for (const [index, piece] of pieces.entries()) {
        const text = piece.lines.join('\n');
        const occurrence = occurrences.get(text) ?? 0;
        occurrences.set(text, occurrence + 1);

        const metadata: UnitMetadata = {
          source: doc.path,
          language: doc.language,
          startLine: String(piece.startLine + 1),
          endLine: String(piece.startLine + piece.lines.length),
          ...(block.symbol !== undefined && { symbol: block.symbol }),
          ...(pieces.length > 1 && { part: `${index + 1}/${pieces.length}` }),
          ...(piece.truncated && { truncated: 'true' }),
        };

        yield { id: unitId(doc.path, occurrence, text), text, metadata };
      }
    }
  }
}

/**
 * Splits source files at top-level declarations (functions, classes, types)
 * and everything else at paragraph boundaries.
 */
export class StructuralChunker extends BaseChunker {
  protected blocks(doc: CorpusDocument, lines: string[]): Block[] {
    const patterns = LANGUAGE_PATTERNS[doc.language];
    return patterns ? declarationBlocks(lines, patterns) : paragraphBlocks(lines);
  }
}

/** Paragraph-only chunking, whatever the language. */
export class TextChunker extends BaseChunker {
  protected blocks(_doc: CorpusDocument, lines: string[]): Block[] {
    return paragraphBlocks(lines);
  }
}

export function createChunker(config: ChunkerConfig): Chunker {
  const sizing: ChunkSizing = {
    maxUnitChars: config.maxUnitChars,
    overlapChars: config.overlapChars,
    hardMaxChars: config.hardMaxChars,
  };
  return config.strategy === 'text' ? new TextChunker(sizing) : new StructuralChunker(sizing);
}

/** Lazily chunk every document of a corpus, in corpus order. */
export async function* chunkCorpus(
  corpus: Corpus,
  chunker: Chunker,
  onSkip?: SkipHandler,
): AsyncGenerator<Unit> {
  for await (const doc of corpus.documents(onSkip)) {
    yield* chunker.chunk(doc);
  }
}
