#!/usr/bin/env node
// Chat CLI - talk to the function-calling API from a terminal
// Interactive by default; --message sends one message and exits

import readline from 'readline';
import { parseArgs } from 'util';
import { z } from 'zod';

const ChatResponseSchema = z.object({
  status: z.string(),
  reply: z.string(),
  conversation_id: z.string(),
  correlation_id: z.string(),
  function_calls: z.array(
    z.object({
      name: z.string(),
      arguments: z.unknown(),
      outcome: z.string(),
      result: z.unknown(),
    }),
  ),
  error: z.object({ kind: z.string(), message: z.string() }).optional(),
});

type ChatResponse = z.infer<typeof ChatResponseSchema>;

const { values } = parseArgs({
  options: {
    url: { type: 'string', default: process.env.API_URL || 'http://localhost:3737' },
    message: { type: 'string', short: 'm' },
    verbose: { type: 'boolean', short: 'v', default: false },
  },
});

const API_URL = (values.url ?? 'http://localhost:3737').replace(/\/+$/, '');

async function sendMessage(message: string, conversationId?: string): Promise<ChatResponse> {
  const response = await fetch(`${API_URL}/v1/chat`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ message, conversation_id: conversationId }),
  });

  const body: unknown = await response.json();
  if (!response.ok) {
    throw new Error(`API error (${response.status}): ${JSON.stringify(body)}`);
  }
  return ChatResponseSchema.parse(body);
}

function printResponse(response: ChatResponse) {
  if (values.verbose) {
    for (const call of response.function_calls) {
      console.log(`  ↳ ${call.name}(${JSON.stringify(call.arguments)}) → ${call.outcome}`);
      console.log(`    ${JSON.stringify(call.result)}`);
    }
  }
  if (response.status !== 'ok') {
    console.log(`[${response.status}] ${response.error?.message ?? ''}`.trim());
  }
  console.log(`\nassistant> ${response.reply}\n`);
}

async function main() {
  if (values.message) {
    printResponse(await sendMessage(values.message));
    return;
  }

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const question = (prompt: string): Promise<string> => {
    return new Promise(resolve => rl.question(prompt, resolve));
  };

  console.log(`Connected to ${API_URL}. Type /new for a fresh conversation, /quit to exit.\n`);

  let conversationId: string | undefined;
  while (true) {
    const input = (await question('you> ')).trim();
    if (!input) continue;
    if (input === '/quit') break;
    if (input === '/new') {
      conversationId = undefined;
      console.log('Started a new conversation.\n');
      continue;
    }

    try {
      const response = await sendMessage(input, conversationId);
      conversationId = response.conversation_id;
      printResponse(response);
    } catch (e) {
      console.log(`\n✗ ${e instanceof Error ? e.message : String(e)}\n`);
    }
  }

  rl.close();
}

main().catch(err => {
  console.error(err);
  process.exit(1);
});
