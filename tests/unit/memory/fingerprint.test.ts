import { describe, it, expect } from 'vitest';
import { intentFingerprint, intentTokens } from '../../../src/memory/fingerprint.js';

describe('intentTokens', () => {
  it('drops stopwords, splits identifiers and sorts', () => {
    expect(intentTokens('How is parseArgs used?')).toEqual(['args', 'parse']);
    expect(intentTokens('Where are the retry delays?')).toEqual(['delays', 'retry']);
  });
});

describe('intentFingerprint', () => {
  it('ignores word order, case, punctuation and stopwords', () => {
    const a = intentFingerprint('analyze', 'How is parseArgs used?');
    expect(intentFingerprint('analyze', 'parse_args usage')).toBe(a);
    expect(intentFingerprint('analyze', 'ARGS parse!')).toBe(a);
  });

  it('separates task kinds and different intents', () => {
    const a = intentFingerprint('analyze', 'parseArgs');
    expect(intentFingerprint('search', 'parseArgs')).not.toBe(a);
    expect(intentFingerprint('analyze', 'parseOptions')).not.toBe(a);
  });

  it('prefixes the kind to a 16-character digest', () => {
    expect(intentFingerprint('search', 'retry')).toMatch(/^search:[0-9a-f]{16}$/);
  });

  it('falls back to the raw text when only stopwords remain', () => {
    expect(intentFingerprint('analyze', 'how is it')).not.toBe(intentFingerprint('analyze', 'what is it'));
  });
});
