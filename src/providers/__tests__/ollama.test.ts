import { describe, it, expect, vi, afterEach } from 'vitest';
import { OllamaGateway, buildProtocolPrompt, parseEnvelope } from '../ollama.js';
import { GatewayError } from '../types.js';

describe('Ollama Provider', () => {
  describe('parseEnvelope', () => {
    it('should read a function call envelope', () => {
      const reply = parseEnvelope('{"tool":"get_news_for_city","arguments":{"city":"Mumbai"}}');
      expect(reply).toMatchObject({
        type: 'function_call',
        call: { name: 'get_news_for_city', arguments: { city: 'Mumbai' } },
      });
      if (reply.type === 'function_call') {
        expect(reply.call.id).toMatch(/^call_/);
      }
    });

    it('should strip a code fence', () => {
      const reply = parseEnvelope('```json\n{"tool":"convert_currency","arguments":{"amount":5}}\n```');
      expect(reply).toMatchObject({ type: 'function_call', call: { name: 'convert_currency' } });
    });

    it('should read a final envelope', () => {
      expect(parseEnvelope('{"tool":null,"final":"It will be sunny."}')).toEqual({
        type: 'final',
        text: 'It will be sunny.',
      });
    });

    it('should treat anything else as final text', () => {
      expect(parseEnvelope('  Plain answer. ')).toEqual({ type: 'final', text: 'Plain answer.' });
      expect(parseEnvelope('{"answer":42}')).toEqual({ type: 'final', text: '{"answer":42}' });
    });
  });

  it('should put the protocol and catalog in the system prompt', () => {
    const prompt = buildProtocolPrompt('Be helpful.', []);
    expect(prompt.startsWith('Be helpful.\n')).toBe(true);
    expect(prompt).toContain('{"tool":null,"final":"..."}');
  });

  describe('OllamaGateway', () => {
    afterEach(() => {
      vi.unstubAllGlobals();
    });

    const gateway = new OllamaGateway({ url: 'http://localhost:11434/api/chat', model: 'llama3.1:8b' });
    const request = {
      instructions: 'Be helpful.',
      messages: [{ role: 'user' as const, content: 'News in Mumbai?' }],
      functions: [],
    };

    it('should post the transcript and parse the reply', async () => {
      const fetchMock = vi.fn(async () =>
        new Response(JSON.stringify({ message: { role: 'assistant', content: '{"tool":null,"final":"Nothing new."}' } })),
      );
      vi.stubGlobal('fetch', fetchMock);

      await expect(gateway.complete(request)).resolves.toEqual({ type: 'final', text: 'Nothing new.' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should raise a GatewayError when the server is unreachable', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => {
          throw new TypeError('fetch failed');
        }),
      );

      const promise = gateway.complete(request);
      await expect(promise).rejects.toBeInstanceOf(GatewayError);
      await expect(promise).rejects.toThrow('Ollama is unreachable: fetch failed');
    });

    it('should raise a GatewayError for error statuses and odd shapes', async () => {
      vi.stubGlobal('fetch', vi.fn(async () => new Response('model not found', { status: 404 })));
      await expect(gateway.complete(request)).rejects.toThrow('Ollama API error (404): model not found');

      vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ done: true }))));
      await expect(gateway.complete(request)).rejects.toThrow('Ollama returned an unexpected response shape');
    });
  });
});
