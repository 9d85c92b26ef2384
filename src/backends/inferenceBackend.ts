import { z } from 'zod';
import type { InferenceRequest, InferenceResponse } from '../types/inference.types.js';
import { BackendError } from '../errors/backend.js';

export interface InferenceBackend {
  complete(request: InferenceRequest): Promise<InferenceResponse>;
  isAvailable(): Promise<boolean>;
}

const chatCompletionSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable().optional(),
    }),
  ),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

/** Shape an OpenAI-style `/v1/chat/completions` payload into an InferenceResponse. */
export function parseChatCompletion(payload: unknown, requestedModel: string): InferenceResponse {
  const parsed = chatCompletionSchema.safeParse(payload);
  if (!parsed.success) {
    throw new BackendError('Malformed chat completion response', undefined, parsed.error);
  }
  const data = parsed.data;
  const choice = data.choices[0];
  return {
    content: choice?.message.content ?? '',
    model: data.model ?? requestedModel,
    ...(data.usage?.prompt_tokens !== undefined && { inputTokens: data.usage.prompt_tokens }),
    ...(data.usage?.completion_tokens !== undefined && { outputTokens: data.usage.completion_tokens }),
    ...(typeof choice?.finish_reason === 'string' && { finishReason: choice.finish_reason }),
  };
}
