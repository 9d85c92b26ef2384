import type { TaskKind } from '../types/analysis.types.js';
import { tokenize } from '../indexing/tokenizer.js';
import { sha256 } from '../util/hash.js';

// Words that carry no retrieval intent; "how is X used" and "X usage" should collide.
const STOPWORDS = new Set([
  'a', 'an', 'the', 'is', 'are', 'was', 'were', 'be', 'been', 'of', 'in', 'on', 'at',
  'for', 'to', 'and', 'or', 'by', 'with', 'from', 'it', 'its', 'this', 'that', 'these',
  'how', 'what', 'where', 'which', 'why', 'when', 'who', 'does', 'do', 'did', 'used',
  'use', 'usage', 'uses', 'find', 'show', 'list', 'all', 'any',
]);

/** Sorted, deduplicated content tokens of a query. */
export function intentTokens(text: string): string[] {
  const tokens = new Set(tokenize(text).filter((t) => !STOPWORDS.has(t)));
  return [...tokens].sort();
}

/**
 * Coverage fingerprint of a query's intent: word order, case, punctuation and
 * stopwords do not change it; the task kind does.
 */
export function intentFingerprint(kind: TaskKind, text: string): string {
  const tokens = intentTokens(text);
  const basis = tokens.length > 0 ? tokens.join(' ') : text.trim().toLowerCase();
  return `${kind}:${sha256(basis).slice(0, 16)}`;
}
