import { join, resolve } from 'node:path';
import { loadConfig } from '../config/loader.js';
import { validateConfig } from '../config/validator.js';
import { createAnalysisEngine, type AnalysisEngine } from '../engine/index.js';
import type { AppConfig } from '../types/config.types.js';

/** Snapshot location for a corpus root unless the config names one. */
export function defaultPersistPath(root: string): string {
  return join(resolve(root), '.sifter', 'index.json');
}

export async function openEngine(root: string, patch: (config: AppConfig) => AppConfig = (c) => c): Promise<AnalysisEngine> {
  const loaded = loadConfig();
  const config = patch({
    ...loaded,
    index: { ...loaded.index, persistPath: loaded.index.persistPath ?? defaultPersistPath(root) },
  });
  validateConfig(config);
  return createAnalysisEngine(config);
}
