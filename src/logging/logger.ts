import type { LogLevel } from '../types/config.types.js';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export type LogSink = (line: string) => void;

// Logs go to stderr so stdout stays clean for command output.
const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createLogger(
  level: LogLevel = 'info',
  scope = 'sifter',
  sink: LogSink = stderrSink,
): Logger {
  const threshold = LEVEL_ORDER[level];
  const emit = (at: LogLevel, message: string): void => {
    if (LEVEL_ORDER[at] < threshold) return;
    sink(`[${scope}] ${at} ${message}\n`);
  };
  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (child) => createLogger(level, `${scope}:${child}`, sink),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
