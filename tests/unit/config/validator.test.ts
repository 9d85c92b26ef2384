import { describe, it, expect } from 'vitest';
import { validateConfig, ConfigValidationError } from '../../../src/config/validator.js';
import { DEFAULT_CONFIG } from '../../../src/config/defaults.js';
import type { AppConfig } from '../../../src/types/config.types.js';

function makeConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...DEFAULT_CONFIG, ...overrides };
}

describe('validateConfig', () => {
  it('accepts the defaults, which need no backend or keys', () => {
    expect(() => validateConfig(makeConfig())).not.toThrow();
  });

  it('throws when openai-compatible has no baseUrl', () => {
    const config = makeConfig({
      backend: { type: 'openai-compatible', baseUrl: '', model: 'gpt-4' },
    });
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
    expect(() => validateConfig(config)).toThrow('baseUrl');
  });

  it('throws when ollama has no model', () => {
    const config = makeConfig({ backend: { type: 'ollama', baseUrl: 'http://localhost:11434', model: ' ' } });
    expect(() => validateConfig(config)).toThrow('Backend type "ollama" requires model.');
  });

  it('accepts valid openai-compatible config with baseUrl', () => {
    const config = makeConfig({
      backend: { type: 'openai-compatible', baseUrl: 'http://localhost:8000', model: 'llama3' },
    });
    expect(() => validateConfig(config)).not.toThrow();
  });

  it('requires overlap smaller than the unit size', () => {
    const config = makeConfig({ chunker: { ...DEFAULT_CONFIG.chunker, overlapChars: 1500 } });
    expect(() => validateConfig(config)).toThrow('chunker.overlapChars must be smaller than chunker.maxUnitChars.');
  });

  it('requires the hard maximum to be at least the unit size', () => {
    const config = makeConfig({ chunker: { ...DEFAULT_CONFIG.chunker, hardMaxChars: 100 } });
    expect(() => validateConfig(config)).toThrow('chunker.hardMaxChars must be >= chunker.maxUnitChars.');
  });

  it('rejects non-positive limits', () => {
    expect(() => validateConfig(makeConfig({ loop: { ...DEFAULT_CONFIG.loop, maxTasks: 0 } }))).toThrow(
      'loop.maxTasks must be >= 1, got 0.',
    );
    expect(() =>
      validateConfig(makeConfig({ retrieval: { ...DEFAULT_CONFIG.retrieval, topK: Number.NaN } })),
    ).toThrow('retrieval.topK must be >= 1, got NaN.');
  });

  it('requires a positive memory capacity when one is set', () => {
    const config = makeConfig({ loop: { ...DEFAULT_CONFIG.loop, memoryCapacity: 0 } });
    expect(() => validateConfig(config)).toThrow('loop.memoryCapacity must be >= 1, got 0.');
  });

  it('requires at least one retrieval strategy', () => {
    const config = makeConfig({ retrieval: { ...DEFAULT_CONFIG.retrieval, strategies: [] } });
    expect(() => validateConfig(config)).toThrow(ConfigValidationError);
  });
});
