// Currency conversion using the Frankfurter exchange-rate API

import { z } from 'zod';
import { env } from '../../../env.js';
import { currencyName } from '../currencies.js';
import type { CurrencyArgs, ExecutionContext } from '../types.js';
import { fetchJson } from './http.js';

const LatestRatesSchema = z.object({
  amount: z.number(),
  base: z.string(),
  date: z.string().optional(),
  rates: z.record(z.string(), z.number()),
});

export interface CurrencyConversion {
  amount: number;
  base: string;
  base_name: string | null;
  target: string;
  target_name: string | null;
  converted: number;
  rate: number | null;
  rate_date: string | null;
}

export async function convertCurrency(
  args: CurrencyArgs,
  context: ExecutionContext,
): Promise<CurrencyConversion> {
  const names = {
    base_name: currencyName(args.base) ?? null,
    target_name: currencyName(args.target) ?? null,
  };

  // Frankfurter rejects identical currencies
  if (args.base === args.target) {
    return {
      amount: args.amount,
      base: args.base,
      target: args.target,
      ...names,
      converted: args.amount,
      rate: 1,
      rate_date: null,
    };
  }

  const endpoint = new URL('/latest', env.FRANKFURTER_BASE_URL);
  endpoint.searchParams.set('amount', String(args.amount));
  endpoint.searchParams.set('from', args.base);
  endpoint.searchParams.set('to', args.target);

  const payload = await fetchJson(endpoint, LatestRatesSchema, {
    provider: 'Frankfurter',
    signal: context.signal,
  });

  const converted = payload.rates[args.target];
  if (converted === undefined) {
    throw new Error(`No exchange rate available for ${args.base} to ${args.target}`);
  }

  return {
    amount: args.amount,
    base: args.base,
    target: args.target,
    ...names,
    converted,
    rate: args.amount > 0 ? converted / args.amount : null,
    rate_date: payload.date ?? null,
  };
}
