// Model Gateway interface
// Every LLM backend turns a transcript plus the function catalog into a final answer or one function call

import type { FunctionError, FunctionSchema } from '../services/functions/types.js';

export interface FunctionCallRequest {
  id: string;
  name: string;
  // As emitted by the model; may be an object, a JSON string, or garbage
  arguments: unknown;
  // Assistant text sent alongside the call, if any
  text?: string;
}

export type FunctionMessagePayload =
  | { ok: true; data: unknown }
  | { ok: false; error: FunctionError };

export interface UserMessage {
  role: 'user';
  content: string;
}

export interface AssistantMessage {
  role: 'assistant';
  content: string;
  functionCall?: FunctionCallRequest;
}

export interface FunctionMessage {
  role: 'function';
  name: string;
  callId: string;
  payload: FunctionMessagePayload;
}

export type ChatMessage = UserMessage | AssistantMessage | FunctionMessage;

export interface GatewayRequest {
  instructions: string;
  messages: readonly ChatMessage[];
  functions: readonly FunctionSchema[];
  signal?: AbortSignal;
}

export type GatewayReply =
  | { type: 'final'; text: string }
  | { type: 'function_call'; call: FunctionCallRequest };

export interface ModelGateway {
  name: string;
  complete(request: GatewayRequest): Promise<GatewayReply>;
}

// Transport failure or unusable response from the model backend
export class GatewayError extends Error {
  constructor(
    message: string,
    public readonly provider: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'GatewayError';
  }
}

// What the model sees as the function's output
export function serializeFunctionPayload(payload: FunctionMessagePayload): string {
  if (payload.ok) {
    return JSON.stringify(payload.data ?? null);
  }
  return JSON.stringify({ error: payload.error });
}
