// Chat route
// POST /v1/chat runs one orchestrated request and answers with its status and reply

import { randomUUID } from 'crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { env } from '../env.js';
import type { ConversationStore } from '../services/conversations.js';
import type { ChatOutcome, Orchestrator } from '../services/orchestrator/index.js';
import { AppError } from '../utils/errors.js';

export const MAX_MESSAGE_LENGTH = 4000;

const ChatRequestSchema = z.object({
  message: z.string().trim().min(1).max(MAX_MESSAGE_LENGTH),
  conversation_id: z.string().trim().min(1).max(128).optional(),
  user_id: z.string().trim().min(1).max(128).optional(),
});

export interface ChatRouteOptions {
  orchestrator: Orchestrator;
  conversations: ConversationStore;
  requestTimeoutMs?: number;
}

function toResponse(outcome: ChatOutcome, conversationId: string, correlationId: string) {
  return {
    status: outcome.status,
    reply: outcome.text,
    conversation_id: conversationId,
    correlation_id: correlationId,
    function_calls: outcome.calls.map(call => ({
      name: call.name,
      arguments: call.arguments,
      outcome: call.outcome,
      result: call.result,
    })),
    ...(outcome.error ? { error: outcome.error } : {}),
  };
}

export async function chatRoutes(server: FastifyInstance, options: ChatRouteOptions) {
  const { orchestrator, conversations } = options;
  const requestTimeoutMs = options.requestTimeoutMs ?? env.CHAT_REQUEST_TIMEOUT_MS;

  // POST /v1/chat - Send a message, get the model's answer
  server.post('/chat', async (request, reply) => {
    const body = ChatRequestSchema.parse(request.body);
    const conversationId = body.conversation_id ?? randomUUID();
    const correlationId = randomUUID();

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), requestTimeoutMs);
    let disconnected = false;
    const onClose = () => {
      if (reply.raw.writableEnded) return;
      disconnected = true;
      controller.abort();
    };
    reply.raw.on('close', onClose);

    request.log.info(
      { correlationId, conversationId, userId: body.user_id, length: body.message.length },
      'Chat request received',
    );

    let outcome: ChatOutcome;
    try {
      outcome = await orchestrator.run(body.message, {
        correlationId,
        signal: controller.signal,
        history: body.conversation_id ? conversations.get(body.conversation_id) : undefined,
      });
    } finally {
      clearTimeout(timer);
      reply.raw.off('close', onClose);
    }

    if (outcome.status === 'cancelled') {
      if (disconnected) {
        request.log.info({ correlationId }, 'Client disconnected before the answer was ready');
        throw AppError.timeout(`Chat request ${correlationId} was cancelled by the client`);
      }
      throw AppError.timeout(`Chat request ${correlationId} did not finish in time`);
    }

    if (outcome.status === 'ok') {
      conversations.save(conversationId, outcome.session);
    }

    return reply.send(toResponse(outcome, conversationId, correlationId));
  });
}
