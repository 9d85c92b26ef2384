import { readdir, readFile, stat } from 'node:fs/promises';
import { join, extname } from 'node:path';
import type { CorpusDocument } from '../types/unit.types.js';
import type { Corpus, SkipHandler } from './corpus.js';
import { ChunkingError } from '../errors/indexing.js';
import { errorMessage } from '../errors/base.js';

const DEFAULT_MAX_FILE_SIZE = 1_048_576; // 1 MB

const SKIP_DIRS = new Set([
  'node_modules',
  'dist',
  'build',
  'coverage',
  '__pycache__',
  'venv',
  'target', // Rust/Java build output
  'vendor',
]);

const EXT_TO_LANGUAGE: Record<string, string> = {
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
  '.js': 'javascript',
  '.jsx': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.py': 'python',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.rb': 'ruby',
  '.cs': 'csharp',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.kt': 'kotlin',
  '.swift': 'swift',
  '.sh': 'bash',
  '.sql': 'sql',
  '.yaml': 'yaml',
  '.yml': 'yaml',
  '.toml': 'toml',
  '.md': 'markdown',
  '.mdx': 'markdown',
  '.txt': 'text',
  '.rst': 'text',
};

const TEXT_EXTENSIONS = new Set(Object.keys(EXT_TO_LANGUAGE));

export function getLanguage(filePath: string): string {
  return EXT_TO_LANGUAGE[extname(filePath).toLowerCase()] ?? 'text';
}

/**
 * Detects if a buffer is likely binary by sampling bytes.
 * Returns true if >5% of sampled bytes are non-printable non-whitespace.
 */
export function isBinary(buf: Buffer): boolean {
  const sampleSize = Math.min(buf.length, 8000);
  if (sampleSize === 0) return false;
  let nonPrintable = 0;
  for (let i = 0; i < sampleSize; i++) {
    const b = buf[i] ?? 0;
    // Null byte is a strong binary indicator
    if (b === 0) return true;
    if (b < 9 || (b > 13 && b < 32 && b !== 27)) nonPrintable++;
  }
  return nonPrintable / sampleSize > 0.05;
}

export interface DirectoryCorpusOptions {
  maxFileSizeBytes?: number;
}

/**
 * Walks a directory tree in sorted order, yielding text files.
 * Hidden entries, known build/dependency directories and unknown extensions
 * are ignored; unreadable, oversized or binary files are reported through
 * the skip handler.
 */
export class DirectoryCorpus implements Corpus {
  private readonly maxFileSize: number;

  constructor(
    readonly root: string,
    options: DirectoryCorpusOptions = {},
  ) {
    this.maxFileSize = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE;
  }

  documents(onSkip?: SkipHandler): AsyncIterable<CorpusDocument> {
    return this.walk(this.root, onSkip);
  }

  private async *walk(dirPath: string, onSkip?: SkipHandler): AsyncGenerator<CorpusDocument> {
    let entries;
    try {
      entries = await readdir(dirPath, { withFileTypes: true });
    } catch (err) {
      onSkip?.(new ChunkingError(`Cannot read directory: ${errorMessage(err)}`, dirPath, err));
      return;
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const fullPath = join(dirPath, entry.name);

      if (entry.isDirectory()) {
        if (!SKIP_DIRS.has(entry.name)) {
          yield* this.walk(fullPath, onSkip);
        }
        continue;
      }

      if (!entry.isFile()) continue;
      if (!TEXT_EXTENSIONS.has(extname(entry.name).toLowerCase())) continue;

      const doc = await this.readDocument(fullPath, onSkip);
      if (doc) yield doc;
    }
  }

  private async readDocument(path: string, onSkip?: SkipHandler): Promise<CorpusDocument | null> {
    try {
      const info = await stat(path);
      if (info.size > this.maxFileSize) {
        onSkip?.(new ChunkingError(`File exceeds ${this.maxFileSize} bytes`, path));
        return null;
      }
      const raw = await readFile(path);
      if (isBinary(raw)) {
        onSkip?.(new ChunkingError('Binary content', path));
        return null;
      }
      return { path, contents: raw.toString('utf8'), language: getLanguage(path) };
    } catch (err) {
      onSkip?.(new ChunkingError(`Cannot read file: ${errorMessage(err)}`, path, err));
      return null;
    }
  }
}
