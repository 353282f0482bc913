// Supported ISO 4217 currency codes, loaded from data/currencies.json

import { readFileSync } from 'fs';
import { z } from 'zod';

const CurrencyTableSchema = z.record(z.string().regex(/^[A-Z]{3}$/), z.string());

const currencyTable = CurrencyTableSchema.parse(
  JSON.parse(readFileSync(new URL('../../../data/currencies.json', import.meta.url), 'utf-8')),
);

export const SUPPORTED_CURRENCIES: ReadonlySet<string> = new Set(Object.keys(currencyTable));

export function isSupportedCurrency(code: string): boolean {
  return SUPPORTED_CURRENCIES.has(code);
}

export function currencyName(code: string): string | undefined {
  return currencyTable[code];
}
