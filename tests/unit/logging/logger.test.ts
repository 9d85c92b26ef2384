import { describe, it, expect } from 'vitest';
import { createLogger, isLogLevel, silentLogger } from '../../../src/logging/logger.js';

describe('createLogger', () => {
  it('writes scoped lines at or above the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', 'sifter', (line) => lines.push(line));
    logger.info('hidden');
    logger.warn('careful');
    logger.error('broken');
    expect(lines).toEqual(['[sifter] warn careful\n', '[sifter] error broken\n']);
  });

  it('nests child scopes', () => {
    const lines: string[] = [];
    const logger = createLogger('debug', 'sifter', (line) => lines.push(line));
    logger.child('loop').child('tools').debug('hello');
    expect(lines).toEqual(['[sifter:loop:tools] debug hello\n']);
  });

  it('silentLogger drops everything', () => {
    expect(() => silentLogger.child('x').error('nothing')).not.toThrow();
  });
});

describe('isLogLevel', () => {
  it('accepts only the four levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
