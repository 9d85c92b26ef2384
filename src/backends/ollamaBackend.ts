import type { OllamaConfig } from '../types/config.types.js';
import type { InferenceRequest, InferenceResponse } from '../types/inference.types.js';
import type { InferenceBackend } from './inferenceBackend.js';
import { parseChatCompletion } from './inferenceBackend.js';
import { BackendError } from '../errors/backend.js';

export class OllamaBackend implements InferenceBackend {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly temperature: number | undefined;
  private readonly maxTokens: number | undefined;

  constructor(config: OllamaConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.model = config.model;
    this.temperature = config.temperature;
    this.maxTokens = config.maxTokens;
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    const body = {
      model: request.model ?? this.model,
      messages: request.messages,
      temperature: request.temperature ?? this.temperature,
      max_tokens: request.maxTokens ?? this.maxTokens,
      stream: false,
    };

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new BackendError(`Failed to connect to Ollama at ${this.baseUrl}`, undefined, err);
    }

    if (!res.ok) {
      throw new BackendError(
        `Ollama request failed: ${res.status} ${res.statusText}`,
        res.status,
      );
    }

    return parseChatCompletion(await res.json(), body.model);
  }

  async isAvailable(): Promise<boolean> {
    try {
      const res = await fetch(`${this.baseUrl}/api/tags`);
      return res.ok;
    } catch {
      return false;
    }
  }
}
