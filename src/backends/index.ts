export { createBackend } from './backendFactory.js';
export type { InferenceBackend } from './inferenceBackend.js';
export { parseChatCompletion } from './inferenceBackend.js';
export { OllamaBackend } from './ollamaBackend.js';
export { OpenAICompatibleBackend } from './openaiCompatibleBackend.js';
