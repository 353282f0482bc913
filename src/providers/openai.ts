// OpenAI Provider
// Native function calling through the chat completions API (any OpenAI-compatible endpoint)

import OpenAI from 'openai';
import { describeError } from '../utils/errors.js';
import { GatewayError, serializeFunctionPayload } from './types.js';
import type { ChatMessage, GatewayReply, GatewayRequest, ModelGateway } from './types.js';

export interface OpenAIGatewayOptions {
  model: string;
  apiKey?: string;
  baseURL?: string;
  client?: OpenAI;
  temperature?: number;
}

function encodeArguments(args: unknown): string {
  return typeof args === 'string' ? args : JSON.stringify(args ?? {});
}

function decodeArguments(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    // Left as text; the registry reports it as a BadArgument
    return raw;
  }
}

export class OpenAIGateway implements ModelGateway {
  name = 'openai';
  private client: OpenAI;
  private model: string;
  private temperature: number;

  constructor(options: OpenAIGatewayOptions) {
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseURL || undefined,
        maxRetries: 1,
      });
    this.model = options.model;
    this.temperature = options.temperature ?? 0;
  }

  private formatMessages(instructions: string, messages: readonly ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
    const formatted: OpenAI.ChatCompletionMessageParam[] = [{ role: 'system', content: instructions }];

    for (const m of messages) {
      switch (m.role) {
        case 'user':
          formatted.push({ role: 'user', content: m.content });
          break;
        case 'assistant':
          if (m.functionCall) {
            formatted.push({
              role: 'assistant',
              content: m.content || null,
              tool_calls: [
                {
                  id: m.functionCall.id,
                  type: 'function',
                  function: {
                    name: m.functionCall.name,
                    arguments: encodeArguments(m.functionCall.arguments),
                  },
                },
              ],
            });
          } else {
            formatted.push({ role: 'assistant', content: m.content });
          }
          break;
        case 'function':
          formatted.push({
            role: 'tool',
            tool_call_id: m.callId,
            content: serializeFunctionPayload(m.payload),
          });
          break;
      }
    }

    return formatted;
  }

  async complete(request: GatewayRequest): Promise<GatewayReply> {
    const tools: OpenAI.ChatCompletionTool[] = request.functions.map(fn => ({
      type: 'function',
      function: {
        name: fn.name,
        description: fn.description,
        parameters: fn.parameters,
      },
    }));

    let completion: OpenAI.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: this.formatMessages(request.instructions, request.messages),
          temperature: this.temperature,
          tools: tools.length > 0 ? tools : undefined,
          tool_choice: tools.length > 0 ? 'auto' : undefined,
          parallel_tool_calls: tools.length > 0 ? false : undefined,
        },
        { signal: request.signal },
      );
    } catch (error) {
      throw new GatewayError(`OpenAI request failed: ${describeError(error)}`, this.name, { cause: error });
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      throw new GatewayError('OpenAI returned no choices', this.name);
    }

    // Calls are dispatched one at a time; extra parallel calls are dropped
    const toolCall = message.tool_calls?.find(tc => tc.type === 'function');
    if (toolCall) {
      return {
        type: 'function_call',
        call: {
          id: toolCall.id,
          name: toolCall.function.name,
          arguments: decodeArguments(toolCall.function.arguments),
          ...(message.content ? { text: message.content } : {}),
        },
      };
    }

    return { type: 'final', text: message.content ?? '' };
  }
}
