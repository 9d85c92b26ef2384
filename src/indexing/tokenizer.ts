import type { Unit } from '../types/unit.types.js';

/**
 * Split a camelCase or PascalCase identifier into lowercase space-separated words.
 *
 * Examples:
 *   authenticateUser  → "authenticate user"
 *   HTMLParser        → "html parser"
 *   _privateField     → "private field"
 */
export function splitCamelCase(str: string): string {
  return str
    .replace(/^[_]+/, '') // strip leading underscores
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2') // camelCase boundary: "tU" → "t U"
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1 $2') // acronym boundary: "HTMLParser" → "HTML Parser"
    .replace(/[-_]+/g, ' ') // hyphens/underscores → spaces
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim();
}

/** Lowercased word tokens, with identifiers split on case boundaries. */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const word of text.match(/[A-Za-z0-9_]+/g) ?? []) {
    const split = /[A-Z]/.test(word) || word.includes('_') ? splitCamelCase(word) : word.toLowerCase();
    for (const token of split.split(' ')) {
      if (token) tokens.push(token);
    }
  }
  return tokens;
}

/**
 * Extract all camelCase/PascalCase identifiers from source code,
 * split them, deduplicate, and return as a single space-separated token string.
 * Appended to keyword-indexed text so "auth service" finds `AuthService`.
 */
export function extractCodeTokens(content: string): string {
  const re = /\b([a-zA-Z][a-zA-Z0-9_]*)\b/g;
  const seen = new Set<string>();
  const tokens: string[] = [];
  let m: RegExpExecArray | null;

  while ((m = re.exec(content)) !== null) {
    const id = m[1] ?? '';
    // Only process identifiers that actually have mixed case
    if (/[A-Z]/.test(id) && /[a-z]/.test(id)) {
      for (const token of splitCamelCase(id).split(/\s+/)) {
        if (token.length >= 2 && !seen.has(token)) {
          seen.add(token);
          tokens.push(token);
        }
      }
    }
  }

  return tokens.join(' ');
}

/**
 * Normalise a user query before keyword search or fingerprinting:
 * split camelCase identifiers and strip punctuation.
 */
export function normalizeQuery(query: string): string {
  return tokenize(query).join(' ');
}

/**
 * Build an enriched text for embedding only (never stored).
 * Prepends source, language, and symbol so the vector captures where the
 * unit lives, not just what it says. Line numbers are excluded: a unit's
 * vector must not change when only its position in the file does.
 */
export function buildContextualContent(unit: Unit): string {
  const lines: string[] = [
    `Source: ${unit.metadata['source'] ?? 'unknown'}`,
    `Language: ${unit.metadata['language'] ?? 'text'}`,
  ];
  const symbol = unit.metadata['symbol'];
  if (symbol) {
    lines.push(`Symbol: ${symbol}`);
  }
  lines.push('', unit.text);
  return lines.join('\n');
}
