// Chat session transcript
// Immutable: every append returns a new session, so each orchestrator step
// takes a session in and hands a session back

import type {
  ChatMessage,
  FunctionCallRequest,
  FunctionMessagePayload,
} from '../../providers/types.js';

export class ChatSession {
  private constructor(private readonly transcript: readonly ChatMessage[]) {}

  static empty(): ChatSession {
    return new ChatSession([]);
  }

  static from(messages: readonly ChatMessage[]): ChatSession {
    return new ChatSession(Object.freeze([...messages]));
  }

  get messages(): readonly ChatMessage[] {
    return this.transcript;
  }

  get length(): number {
    return this.transcript.length;
  }

  appendUser(text: string): ChatSession {
    return this.append({ role: 'user', content: text });
  }

  appendAssistantFinal(text: string): ChatSession {
    return this.append({ role: 'assistant', content: text });
  }

  appendAssistantCallRequest(request: FunctionCallRequest): ChatSession {
    return this.append({ role: 'assistant', content: request.text ?? '', functionCall: request });
  }

  /**
   * A function result must answer the call request immediately before it.
   * Anything else would produce a transcript the model APIs reject.
   */
  appendFunctionResult(name: string, payload: FunctionMessagePayload): ChatSession {
    const last = this.transcript[this.transcript.length - 1];
    if (last?.role !== 'assistant' || !last.functionCall || last.functionCall.name !== name) {
      throw new Error(`Function result for "${name}" does not follow a matching call request`);
    }

    return this.append({ role: 'function', name, callId: last.functionCall.id, payload });
  }

  lastAssistantText(): string {
    for (let i = this.transcript.length - 1; i >= 0; i--) {
      const message = this.transcript[i];
      if (message?.role === 'assistant' && message.content) {
        return message.content;
      }
    }
    return '';
  }

  private append(message: ChatMessage): ChatSession {
    return new ChatSession(Object.freeze([...this.transcript, message]));
  }
}
