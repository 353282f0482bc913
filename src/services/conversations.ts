// Conversation store
// Keeps finished transcripts for a while so a caller can continue by conversation id

import { TTLCache } from '../utils/ttl-cache.js';
import { ChatSession } from './orchestrator/session.js';

// Oldest turns are dropped past this many messages
export const MAX_HISTORY_MESSAGES = 40;

export class ConversationStore {
  private cache: TTLCache<string, ChatSession>;

  constructor(ttlMs: number = 15 * 60 * 1000) {
    this.cache = new TTLCache<string, ChatSession>(ttlMs);
  }

  get(conversationId: string): ChatSession | undefined {
    return this.cache.get(conversationId);
  }

  save(conversationId: string, session: ChatSession): void {
    this.cache.set(conversationId, trimHistory(session));
  }

  get size(): number {
    return this.cache.size;
  }

  close(): void {
    this.cache.destroy();
  }
}

/**
 * Cuts the transcript at a user message so no function result is left
 * without the call request it answers.
 */
export function trimHistory(session: ChatSession): ChatSession {
  const messages = session.messages;
  if (messages.length <= MAX_HISTORY_MESSAGES) return session;

  const start = messages.length - MAX_HISTORY_MESSAGES;
  const firstUser = messages.findIndex((m, i) => i >= start && m.role === 'user');
  if (firstUser === -1) return session;

  return ChatSession.from(messages.slice(firstUser));
}
