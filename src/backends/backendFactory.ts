import type { BackendConfig } from '../types/config.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { OllamaBackend } from './ollamaBackend.js';
import { OpenAICompatibleBackend } from './openaiCompatibleBackend.js';

/** Returns undefined for `none`: analysis then runs without a model. */
export function createBackend(config: BackendConfig): InferenceBackend | undefined {
  switch (config.type) {
    case 'ollama':
      return new OllamaBackend(config);
    case 'openai-compatible':
      return new OpenAICompatibleBackend(config);
    case 'none':
      return undefined;
    default: {
      const _exhaustive: never = config;
      throw new Error(`Unknown backend type: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
