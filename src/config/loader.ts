import { z } from 'zod';
import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { AppConfig } from '../types/config.types.js';
import { DEFAULT_CONFIG, DEFAULT_OLLAMA_URL } from './defaults.js';
import { ConfigValidationError } from './validator.js';
import { isLogLevel } from '../logging/logger.js';

export const CONFIG_FILE_NAMES = ['.sifter.json', 'sifter.config.json'] as const;

const positiveInt = z.number().int().positive();

const backendSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ollama'),
    baseUrl: z.string().default(DEFAULT_OLLAMA_URL),
    model: z.string(),
    temperature: z.number().optional(),
    maxTokens: positiveInt.optional(),
  }),
  z.object({
    type: z.literal('openai-compatible'),
    baseUrl: z.string(),
    apiKey: z.string().optional(),
    model: z.string(),
    temperature: z.number().optional(),
    maxTokens: positiveInt.optional(),
  }),
  z.object({ type: z.literal('none') }),
]);

/** Shape of `.sifter.json`: every section optional, every field within it optional. */
export const fileConfigSchema = z
  .object({
    chunker: z
      .object({
        strategy: z.enum(['structural', 'text']),
        maxUnitChars: positiveInt,
        overlapChars: z.number().int().nonnegative(),
        hardMaxChars: positiveInt,
      })
      .partial(),
    embedder: z
      .object({
        type: z.enum(['hashing', 'ollama']),
        dimensions: positiveInt,
        baseUrl: z.string(),
        model: z.string(),
      })
      .partial(),
    index: z.object({ persistPath: z.string(), concurrency: positiveInt }).partial(),
    retrieval: z
      .object({
        topK: positiveInt,
        strategies: z.array(z.enum(['vector', 'keyword'])).min(1),
        retryAttempts: positiveInt,
        retryBaseDelayMs: z.number().int().nonnegative(),
      })
      .partial(),
    backend: backendSchema,
    loop: z
      .object({
        taskKind: z.enum(['search', 'analyze']),
        maxTasks: positiveInt,
        maxIterations: positiveInt,
        maxDurationMs: positiveInt,
        concurrency: positiveInt,
        maxConsecutiveFailures: z.number().int().nonnegative(),
        followUpsPerFinding: z.number().int().nonnegative(),
        maxDepth: z.number().int().nonnegative(),
        stopOnConfidence: z.enum(['medium', 'high']).nullable(),
        memoryCapacity: positiveInt,
      })
      .partial(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  })
  .partial()
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

export function mergeConfig(base: AppConfig, override: FileConfig): AppConfig {
  return {
    chunker: { ...base.chunker, ...override.chunker },
    embedder: { ...base.embedder, ...override.embedder },
    index: { ...base.index, ...override.index },
    retrieval: { ...base.retrieval, ...override.retrieval },
    backend: override.backend ?? base.backend,
    loop: { ...base.loop, ...override.loop },
    logLevel: override.logLevel ?? base.logLevel,
  };
}

function loadFileConfig(cwd: string): FileConfig {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = join(cwd, name);
    if (!existsSync(candidate)) continue;

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(candidate, 'utf-8'));
    } catch (err) {
      throw new ConfigValidationError(`Cannot read ${candidate}: ${String(err)}`, err);
    }
    const parsed = fileConfigSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      throw new ConfigValidationError(`Invalid ${candidate}: ${issues.join('; ')}`);
    }
    return parsed.data;
  }
  return {};
}

function applyEnvOverrides(config: AppConfig, env: NodeJS.ProcessEnv): AppConfig {
  const next: AppConfig = { ...config, index: { ...config.index }, loop: { ...config.loop } };

  const logLevel = env['SIFTER_LOG_LEVEL'];
  if (logLevel) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigValidationError(`SIFTER_LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`);
    }
    next.logLevel = logLevel;
  }

  const persistPath = env['SIFTER_PERSIST_PATH'];
  if (persistPath) next.index.persistPath = persistPath;

  const embedder = env['SIFTER_EMBEDDER'];
  if (embedder) {
    if (embedder !== 'hashing' && embedder !== 'ollama') {
      throw new ConfigValidationError(`SIFTER_EMBEDDER must be hashing or ollama, got "${embedder}"`);
    }
    next.embedder = { ...config.embedder, type: embedder };
  }

  const maxTasks = env['SIFTER_MAX_TASKS'];
  if (maxTasks) {
    const parsed = Number(maxTasks);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new ConfigValidationError(`SIFTER_MAX_TASKS must be a positive integer, got "${maxTasks}"`);
    }
    next.loop.maxTasks = parsed;
  }

  const openaiBaseUrl = env['OPENAI_BASE_URL'];
  const ollamaBaseUrl = env['OLLAMA_BASE_URL'];
  if (openaiBaseUrl) {
    const apiKey = env['OPENAI_API_KEY'];
    next.backend = {
      type: 'openai-compatible',
      baseUrl: openaiBaseUrl,
      model: env['OPENAI_MODEL'] ?? 'gpt-4o-mini',
      ...(apiKey ? { apiKey } : {}),
    };
  } else if (ollamaBaseUrl) {
    const current = config.backend;
    next.backend =
      current.type === 'ollama'
        ? { ...current, baseUrl: ollamaBaseUrl }
        : { type: 'ollama', baseUrl: ollamaBaseUrl, model: env['OLLAMA_MODEL'] ?? 'llama3.1' };
  }
  if (ollamaBaseUrl && next.embedder.type === 'ollama') {
    next.embedder = { ...next.embedder, baseUrl: ollamaBaseUrl };
  }

  return next;
}

/** Defaults, then `.sifter.json` / `sifter.config.json` in `cwd`, then environment overrides. */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env): AppConfig {
  return applyEnvOverrides(mergeConfig(DEFAULT_CONFIG, loadFileConfig(cwd)), env);
}
