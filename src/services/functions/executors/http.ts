// Shared fetch helper for the function providers

import type { z } from 'zod';

export async function fetchJson<T>(
  url: URL,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: { provider: string; signal: AbortSignal },
): Promise<T> {
  const response = await fetch(url.toString(), {
    method: 'GET',
    headers: { Accept: 'application/json' },
    signal: options.signal,
  });

  if (!response.ok) {
    const body = await response.text();
    throw new Error(`${options.provider} error (${response.status})${body ? `: ${body.slice(0, 200)}` : ''}`);
  }

  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    throw new Error(`${options.provider} returned an unexpected payload`);
  }
  return parsed.data;
}
