// Model Gateway registry
// Picks the configured LLM backend

import { env, isProviderConfigured } from '../env.js';
import type { ModelProviderName } from '../env.js';
import { OllamaGateway } from './ollama.js';
import { OpenAIGateway } from './openai.js';
import type { ModelGateway } from './types.js';

export function createModelGateway(name: ModelProviderName = env.MODEL_PROVIDER): ModelGateway {
  if (!isProviderConfigured(name)) {
    throw new Error(`Model provider "${name}" is not available or not configured`);
  }

  switch (name) {
    case 'openai':
      return new OpenAIGateway({
        apiKey: env.OPENAI_API_KEY,
        baseURL: env.OPENAI_BASE_URL,
        model: env.OPENAI_MODEL,
      });
    case 'ollama':
      return new OllamaGateway({
        url: env.OLLAMA_URL,
        model: env.OLLAMA_MODEL,
      });
  }
}

export { GatewayError, serializeFunctionPayload } from './types.js';
export type {
  AssistantMessage,
  ChatMessage,
  FunctionCallRequest,
  FunctionMessage,
  FunctionMessagePayload,
  GatewayReply,
  GatewayRequest,
  ModelGateway,
  UserMessage,
} from './types.js';
