// Ollama Provider
// Local models without native function calling: the catalog goes into the system prompt
// and the model answers with a JSON envelope naming a function or carrying the final text

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { describeError } from '../utils/errors.js';
import { GatewayError, serializeFunctionPayload } from './types.js';
import type { ChatMessage, FunctionCallRequest, GatewayReply, GatewayRequest, ModelGateway } from './types.js';
import type { FunctionSchema } from '../services/functions/types.js';

export interface OllamaGatewayOptions {
  url: string;
  model: string;
}

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
}

const ChatResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
});

const EnvelopeSchema = z.union([
  z.object({
    tool: z.string().min(1),
    arguments: z.unknown().optional(),
  }),
  z.object({
    tool: z.null().optional(),
    final: z.string(),
  }),
]);

export function buildProtocolPrompt(instructions: string, functions: readonly FunctionSchema[]): string {
  return [
    instructions,
    '',
    'Reply with exactly one JSON object and nothing else.',
    'To call a function:',
    '{"tool":"FUNCTION_NAME","arguments":{...}}',
    'To answer the user:',
    '{"tool":null,"final":"..."}',
    '',
    'Function results arrive as tool messages. Never describe a function instead of calling it.',
    '',
    'Available functions:',
    JSON.stringify(functions, null, 2),
  ].join('\n');
}

function stripCodeFence(content: string): string {
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(content.trim());
  return fenced?.[1] ?? content.trim();
}

/**
 * Reads the JSON envelope out of the model's reply. Content that is not an
 * envelope is taken as the final answer, which is how small models usually
 * fall out of the protocol.
 */
export function parseEnvelope(content: string): GatewayReply {
  let decoded: unknown;
  try {
    decoded = JSON.parse(stripCodeFence(content));
  } catch {
    return { type: 'final', text: content.trim() };
  }

  const envelope = EnvelopeSchema.safeParse(decoded);
  if (!envelope.success) {
    return { type: 'final', text: content.trim() };
  }

  if ('final' in envelope.data) {
    return { type: 'final', text: envelope.data.final };
  }

  const call: FunctionCallRequest = {
    id: `call_${randomUUID()}`,
    name: envelope.data.tool,
    arguments: envelope.data.arguments ?? {},
  };
  return { type: 'function_call', call };
}

export class OllamaGateway implements ModelGateway {
  name = 'ollama';

  constructor(private options: OllamaGatewayOptions) {}

  private formatMessages(request: GatewayRequest): OllamaMessage[] {
    const formatted: OllamaMessage[] = [
      { role: 'system', content: buildProtocolPrompt(request.instructions, request.functions) },
    ];

    for (const m of request.messages) {
      formatted.push(this.formatMessage(m));
    }

    return formatted;
  }

  private formatMessage(m: ChatMessage): OllamaMessage {
    switch (m.role) {
      case 'user':
        return { role: 'user', content: m.content };
      case 'assistant':
        return m.functionCall
          ? {
              role: 'assistant',
              content: JSON.stringify({ tool: m.functionCall.name, arguments: m.functionCall.arguments ?? {} }),
            }
          : { role: 'assistant', content: JSON.stringify({ tool: null, final: m.content }) };
      case 'function':
        return { role: 'tool', content: serializeFunctionPayload(m.payload) };
    }
  }

  async complete(request: GatewayRequest): Promise<GatewayReply> {
    let response: Response;
    try {
      response = await fetch(this.options.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: this.options.model,
          messages: this.formatMessages(request),
          stream: false,
          options: { temperature: 0 },
        }),
        signal: request.signal,
      });
    } catch (error) {
      throw new GatewayError(`Ollama is unreachable: ${describeError(error)}`, this.name, { cause: error });
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new GatewayError(`Ollama API error (${response.status})${body ? `: ${body.slice(0, 200)}` : ''}`, this.name);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (error) {
      throw new GatewayError('Ollama returned a response that is not JSON', this.name, { cause: error });
    }

    const parsed = ChatResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GatewayError('Ollama returned an unexpected response shape', this.name);
    }

    return parseEnvelope(parsed.data.message.content);
  }
}
