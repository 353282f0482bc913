import { describe, it, expect, vi } from 'vitest';
import { GatewayError } from '../../../providers/types.js';
import type { GatewayReply, GatewayRequest, FunctionMessage } from '../../../providers/types.js';
import { CallLogger } from '../../call-log/call-logger.js';
import { InMemoryCallLogStore } from '../../call-log/memory-store.js';
import type { CallLogPolicy } from '../../call-log/types.js';
import { FunctionRegistry } from '../../functions/registry.js';
import { Orchestrator } from '../orchestrator.js';
import { ChatSession } from '../session.js';

const now = () => new Date('2025-03-31T10:00:00Z');

function call(name: string, args: unknown, id = 'call_1'): GatewayReply {
  return { type: 'function_call', call: { id, name, arguments: args } };
}

function final(text: string): GatewayReply {
  return { type: 'final', text };
}

function scriptedGateway(replies: GatewayReply[]) {
  const queue = [...replies];
  return {
    name: 'stub',
    complete: vi.fn(async (_request: GatewayRequest): Promise<GatewayReply> => {
      const next = queue.shift();
      if (!next) throw new Error('script exhausted');
      return next;
    }),
  };
}

function createHarness(
  gateway: { name: string; complete: (request: GatewayRequest) => Promise<GatewayReply> },
  options: { maxRounds?: number; policy?: CallLogPolicy; modelTimeoutMs?: number } = {},
) {
  const executors = {
    get_weather_for_date: vi.fn(async () => ({ city: 'Pune', date: '2025-04-01', condition: 'clear sky' })),
    get_news_for_city: vi.fn(async () => ({ city: 'Pune', count: 0, articles: [] })),
    convert_currency: vi.fn(async () => ({ converted: 1.17 })),
  };
  const registry = new FunctionRegistry({ executors, now, timeoutMs: 1000 });
  const store = new InMemoryCallLogStore();
  const callLogger = new CallLogger(store, options.policy);
  const orchestrator = new Orchestrator(
    { gateway, registry, callLogger },
    { maxRounds: options.maxRounds, modelTimeoutMs: options.modelTimeoutMs, now },
  );
  return { orchestrator, executors, store, callLogger };
}

function lastFunctionMessage(request: GatewayRequest | undefined): FunctionMessage | undefined {
  const last = request?.messages[request.messages.length - 1];
  return last?.role === 'function' ? last : undefined;
}

describe('Orchestrator', () => {
  it('should answer a weather question with one executed call', async () => {
    const gateway = scriptedGateway([
      call('get_weather_for_date', { city: 'pune', date: '2025-04-01' }),
      final('Tomorrow in Pune: clear sky.'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);

    const outcome = await orchestrator.run('What is the weather in Pune tomorrow?', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.text).toBe('Tomorrow in Pune: clear sky.');
    expect(outcome.rounds).toBe(1);
    expect(outcome.calls).toEqual([
      {
        name: 'get_weather_for_date',
        arguments: { city: 'Pune', date: '2025-04-01' },
        outcome: 'success',
        result: { city: 'Pune', date: '2025-04-01', condition: 'clear sky' },
      },
    ]);
    expect(executors.get_weather_for_date).toHaveBeenCalledTimes(1);
    expect(gateway.complete).toHaveBeenCalledTimes(2);

    const records = await store.list();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      correlationId: 'req-1',
      functionName: 'get_weather_for_date',
      arguments: { city: 'Pune', date: '2025-04-01' },
      outcome: 'success',
      result: { city: 'Pune', date: '2025-04-01', condition: 'clear sky' },
      error: null,
      startedAt: '2025-03-31T10:00:00.000Z',
    });

    expect(lastFunctionMessage(gateway.complete.mock.calls[1]?.[0])).toEqual({
      role: 'function',
      name: 'get_weather_for_date',
      callId: 'call_1',
      payload: { ok: true, data: { city: 'Pune', date: '2025-04-01', condition: 'clear sky' } },
    });
    expect(outcome.session.messages.map(m => m.role)).toEqual(['user', 'assistant', 'function', 'assistant']);
  });

  it('should send the instructions with the current date', async () => {
    const gateway = scriptedGateway([final('Hi!')]);
    const { orchestrator } = createHarness(gateway);

    await orchestrator.run('hello', { correlationId: 'req-1' });

    expect(gateway.complete.mock.calls[0]?.[0].instructions).toContain('Today is 2025-03-31.');
    expect(gateway.complete.mock.calls[0]?.[0].functions).toHaveLength(3);
  });

  it('should feed a malformed date back without executing', async () => {
    const gateway = scriptedGateway([
      call('get_weather_for_date', { city: 'Paris', date: '13/32/2024' }),
      final('Which date did you mean?'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);

    const outcome = await orchestrator.run('Weather in Paris on 13/32/2024?', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.calls).toEqual([
      {
        name: 'get_weather_for_date',
        arguments: { city: 'Paris', date: '13/32/2024' },
        outcome: 'bad_argument',
        result: { error: expect.objectContaining({ kind: 'BadArgument' }) },
      },
    ]);
    expect(executors.get_weather_for_date).not.toHaveBeenCalled();
    expect(store.size).toBe(0);
    expect(lastFunctionMessage(gateway.complete.mock.calls[1]?.[0])?.payload).toEqual({
      ok: false,
      error: {
        kind: 'BadArgument',
        message: 'Invalid arguments: date: must be a calendar date in YYYY-MM-DD format',
        detail: ['date: must be a calendar date in YYYY-MM-DD format'],
      },
    });
  });

  it('should answer an unsupported currency without logging', async () => {
    const gateway = scriptedGateway([
      call('convert_currency', { amount: 100, base: 'INR', target: 'XXX' }),
      final('XXX is not a currency I can convert to.'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);

    const outcome = await orchestrator.run('Convert 100 INR to XXX', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.text).toBe('XXX is not a currency I can convert to.');
    expect(executors.convert_currency).not.toHaveBeenCalled();
    expect(store.size).toBe(0);
  });

  it('should record rejected arguments under the resolved policy', async () => {
    const gateway = scriptedGateway([
      call('convert_currency', { amount: 100, base: 'INR', target: 'XXX' }),
      final('Sorry.'),
    ]);
    const { orchestrator, store } = createHarness(gateway, { policy: 'resolved' });

    await orchestrator.run('Convert 100 INR to XXX', { correlationId: 'req-1' });

    const records = await store.list();
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      functionName: 'convert_currency',
      outcome: 'bad_argument',
      result: null,
      error: { kind: 'BadArgument', message: 'Invalid arguments: target: XXX is not a supported currency code' },
    });
  });

  it('should continue after an unknown function', async () => {
    const gateway = scriptedGateway([
      call('get_stock_price', { symbol: 'ACME' }),
      final('I cannot look up stock prices.'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);

    const outcome = await orchestrator.run('Price of ACME?', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.calls).toEqual([
      {
        name: 'get_stock_price',
        arguments: { symbol: 'ACME' },
        outcome: 'unknown_function',
        result: {
          error: {
            kind: 'UnknownFunction',
            message:
              'Unknown function "get_stock_price". Available functions: get_weather_for_date, get_news_for_city, convert_currency',
          },
        },
      },
    ]);
    expect(executors.get_weather_for_date).not.toHaveBeenCalled();
    expect(executors.get_news_for_city).not.toHaveBeenCalled();
    expect(executors.convert_currency).not.toHaveBeenCalled();
    expect(store.size).toBe(0);
    expect(lastFunctionMessage(gateway.complete.mock.calls[1]?.[0])?.payload).toEqual({
      ok: false,
      error: {
        kind: 'UnknownFunction',
        message:
          'Unknown function "get_stock_price". Available functions: get_weather_for_date, get_news_for_city, convert_currency',
      },
    });
  });

  it('should record unknown functions under the all policy', async () => {
    const gateway = scriptedGateway([call('get_stock_price', {}), final('No.')]);
    const { orchestrator, store } = createHarness(gateway, { policy: 'all' });

    await orchestrator.run('Price of ACME?', { correlationId: 'req-1' });

    const records = await store.list();
    expect(records.map(r => [r.functionName, r.outcome])).toEqual([['get_stock_price', 'unknown_function']]);
  });

  it('should stop after the round limit when the model keeps calling', async () => {
    const gateway = {
      name: 'stub',
      complete: vi.fn(async (): Promise<GatewayReply> => call('get_news_for_city', { city: 'Pune' })),
    };
    const { orchestrator, executors, store } = createHarness(gateway, { maxRounds: 3 });

    const outcome = await orchestrator.run('News in Pune', { correlationId: 'req-1' });

    expect(outcome.status).toBe('turn-limit-exceeded');
    expect(outcome.error).toEqual({ kind: 'TurnLimitExceeded', message: 'Model requested more than 3 function calls' });
    expect(outcome.text).toBe('I could not finish answering within the allowed number of function calls.');
    expect(outcome.rounds).toBe(3);
    expect(executors.get_news_for_city).toHaveBeenCalledTimes(3);
    expect(gateway.complete).toHaveBeenCalledTimes(4);
    expect(store.size).toBe(3);
  });

  it('should keep assistant text as the partial reply at the limit', async () => {
    const gateway = {
      name: 'stub',
      complete: vi.fn(
        async (): Promise<GatewayReply> => ({
          type: 'function_call',
          call: { id: 'call_1', name: 'get_news_for_city', arguments: { city: 'Pune' }, text: 'Still looking...' },
        }),
      ),
    };
    const { orchestrator } = createHarness(gateway, { maxRounds: 1 });

    const outcome = await orchestrator.run('News in Pune', { correlationId: 'req-1' });

    expect(outcome.status).toBe('turn-limit-exceeded');
    expect(outcome.text).toBe('Still looking...');
  });

  it('should log identical calls from two requests twice', async () => {
    const gateway = scriptedGateway([
      call('convert_currency', { amount: 100, base: 'INR', target: 'USD' }),
      final('About 1.17 USD.'),
      call('convert_currency', { amount: 100, base: 'INR', target: 'USD' }),
      final('Still about 1.17 USD.'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);

    await orchestrator.run('Convert 100 INR to USD', { correlationId: 'req-1' });
    await orchestrator.run('Convert 100 INR to USD', { correlationId: 'req-2' });

    expect(executors.convert_currency).toHaveBeenCalledTimes(2);
    expect((await store.list()).map(r => r.correlationId)).toEqual(['req-2', 'req-1']);
  });

  it('should feed an execution error back and log it', async () => {
    const gateway = scriptedGateway([
      call('convert_currency', { amount: 100, base: 'INR', target: 'USD' }),
      final('The exchange service is down.'),
    ]);
    const { orchestrator, executors, store } = createHarness(gateway);
    executors.convert_currency.mockRejectedValueOnce(new Error('Frankfurter error (503)'));

    const outcome = await orchestrator.run('Convert 100 INR to USD', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.calls[0]?.outcome).toBe('execution_error');
    expect(outcome.calls[0]?.result).toEqual({
      error: { kind: 'ExecutionError', message: 'Frankfurter error (503)' },
    });
    const records = await store.list();
    expect(records[0]).toMatchObject({
      outcome: 'execution_error',
      result: null,
      error: { kind: 'ExecutionError', message: 'Frankfurter error (503)' },
    });
  });

  it('should report an unreachable gateway without logging calls', async () => {
    const gateway = {
      name: 'stub',
      complete: vi.fn(async (): Promise<GatewayReply> => {
        throw new GatewayError('Ollama is unreachable: fetch failed', 'stub');
      }),
    };
    const { orchestrator, store } = createHarness(gateway);

    const outcome = await orchestrator.run('Weather in Pune?', { correlationId: 'req-1' });

    expect(outcome.status).toBe('gateway-error');
    expect(outcome.text).toBe('The language model is unavailable right now. Please try again later.');
    expect(outcome.error).toEqual({ kind: 'GatewayError', message: 'Ollama is unreachable: fetch failed' });
    expect(store.size).toBe(0);
  });

  it('should treat a slow gateway as a gateway error', async () => {
    const gateway = {
      name: 'stub',
      complete: vi.fn((request: GatewayRequest) => {
        return new Promise<GatewayReply>((_, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
      }),
    };
    const { orchestrator } = createHarness(gateway, { modelTimeoutMs: 20 });

    const outcome = await orchestrator.run('hello', { correlationId: 'req-1' });

    expect(outcome.status).toBe('gateway-error');
    expect(outcome.error?.message).toBe('stub gateway timed out after 20ms');
  });

  it('should propagate errors that are not gateway failures', async () => {
    const gateway = scriptedGateway([]);
    const { orchestrator } = createHarness(gateway);

    await expect(orchestrator.run('hello', { correlationId: 'req-1' })).rejects.toThrow('script exhausted');
  });

  it('should not call the model once the request is cancelled', async () => {
    const gateway = scriptedGateway([final('unused')]);
    const { orchestrator } = createHarness(gateway);
    const controller = new AbortController();
    controller.abort();

    const outcome = await orchestrator.run('hello', { correlationId: 'req-1', signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.text).toBe('');
    expect(gateway.complete).not.toHaveBeenCalled();
  });

  it('should discard a function result that lands after cancellation', async () => {
    const controller = new AbortController();
    const gateway = scriptedGateway([call('get_news_for_city', { city: 'Pune' }), final('unused')]);
    const { orchestrator, executors, store } = createHarness(gateway);
    executors.get_news_for_city.mockImplementationOnce(async () => {
      controller.abort();
      return { city: 'Pune', count: 0, articles: [] };
    });

    const outcome = await orchestrator.run('News in Pune', { correlationId: 'req-1', signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(store.size).toBe(0);
    expect(gateway.complete).toHaveBeenCalledTimes(1);
    expect(outcome.session.messages.some(m => m.role === 'function')).toBe(false);
  });

  it('should keep going when the call log fails', async () => {
    const gateway = scriptedGateway([
      call('convert_currency', { amount: 1, base: 'EUR', target: 'USD' }),
      final('About 1.08 USD.'),
    ]);
    const { orchestrator, store } = createHarness(gateway);
    vi.spyOn(store, 'append').mockRejectedValue(new Error('database is locked'));

    const outcome = await orchestrator.run('Convert 1 EUR to USD', { correlationId: 'req-1' });

    expect(outcome.status).toBe('ok');
    expect(outcome.text).toBe('About 1.08 USD.');
  });

  it('should continue from earlier turns', async () => {
    const gateway = scriptedGateway([final('You asked about Pune.')]);
    const { orchestrator } = createHarness(gateway);
    const history = ChatSession.empty().appendUser('Weather in Pune?').appendAssistantFinal('Sunny.');

    const outcome = await orchestrator.run('Which city did I ask about?', { correlationId: 'req-1', history });

    expect(gateway.complete.mock.calls[0]?.[0].messages).toEqual([
      { role: 'user', content: 'Weather in Pune?' },
      { role: 'assistant', content: 'Sunny.' },
      { role: 'user', content: 'Which city did I ask about?' },
    ]);
    expect(outcome.session.length).toBe(4);
  });
});
