// Function catalog
// Signatures and argument schemas of the three callable functions

import { z } from 'zod';
import {
  isIsoCalendarDate,
  normalizeCity,
  normalizeCurrency,
  resolveRelativeDate,
} from '../../utils/normalizers.js';
import { isSupportedCurrency } from './currencies.js';
import type {
  FunctionParameter,
  FunctionSpec,
  ValidatedArguments,
  ValidationResult,
} from './types.js';

export const NEWS_PAGE_SIZE_DEFAULT = 5;
export const NEWS_PAGE_SIZE_MAX = 20;

const NUMERIC_STRING = /^\d+(\.\d+)?$/;
const CURRENCY_CODE = /^[A-Z]{3}$/;

export interface CatalogOptions {
  now: () => Date;
}

// Models sometimes quote numbers and send null for omitted optionals
function numberish(value: unknown): unknown {
  if (value === null) return undefined;
  if (typeof value === 'string' && NUMERIC_STRING.test(value.trim())) return Number(value.trim());
  return value;
}

const text = () =>
  z.string({ required_error: 'is required', invalid_type_error: 'must be a string' });

const citySchema = text()
  .transform(normalizeCity)
  .refine(city => city.length > 0, 'must not be empty');

const dateSchema = (now: () => Date) =>
  text()
    .transform(value => resolveRelativeDate(value, now()))
    .refine(isIsoCalendarDate, 'must be a calendar date in YYYY-MM-DD format');

const currencySchema = text().transform((value, ctx) => {
  const code = normalizeCurrency(value);
  if (!CURRENCY_CODE.test(code)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a 3-letter currency code' });
    return z.NEVER;
  }
  if (!isSupportedCurrency(code)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${code} is not a supported currency code` });
    return z.NEVER;
  }
  return code;
});

const amountSchema = z.preprocess(
  numberish,
  z
    .number({ required_error: 'is required', invalid_type_error: 'must be a number' })
    .finite('must be a finite number')
    .nonnegative('must not be negative'),
);

const pageSizeSchema = z
  .preprocess(
    numberish,
    z
      .number({ invalid_type_error: 'must be a number' })
      .int('must be an integer')
      .min(1, 'must be at least 1')
      .max(NEWS_PAGE_SIZE_MAX, `must be at most ${NEWS_PAGE_SIZE_MAX}`)
      .optional(),
  )
  .transform(value => value ?? NEWS_PAGE_SIZE_DEFAULT);

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}

function parseWith<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: Record<string, unknown>,
  tag: (values: T) => ValidatedArguments,
): ValidationResult {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const detail = formatIssues(parsed.error);
    return {
      ok: false,
      error: {
        kind: 'BadArgument',
        message: `Invalid arguments: ${detail.join('; ')}`,
        detail,
      },
    };
  }
  return { ok: true, arguments: tag(parsed.data) };
}

const weatherParameters: FunctionParameter[] = [
  {
    name: 'city',
    type: 'string',
    description: 'City name, e.g. "Pune" or "Paris"',
    required: true,
  },
  {
    name: 'date',
    type: 'date',
    description: 'Date in YYYY-MM-DD format. "today" and "tomorrow" are also accepted.',
    required: true,
  },
];

const newsParameters: FunctionParameter[] = [
  {
    name: 'city',
    type: 'string',
    description: 'City the news articles should mention',
    required: true,
  },
  {
    name: 'page_size',
    type: 'integer',
    description: `Number of articles to return (1-${NEWS_PAGE_SIZE_MAX}, default: ${NEWS_PAGE_SIZE_DEFAULT})`,
    required: false,
    minimum: 1,
    maximum: NEWS_PAGE_SIZE_MAX,
    default: NEWS_PAGE_SIZE_DEFAULT,
  },
];

const currencyParameters: FunctionParameter[] = [
  {
    name: 'amount',
    type: 'number',
    description: 'Non-negative amount to convert',
    required: true,
    minimum: 0,
  },
  {
    name: 'base',
    type: 'currency',
    description: '3-letter ISO 4217 code of the currency to convert from, e.g. "INR"',
    required: true,
  },
  {
    name: 'target',
    type: 'currency',
    description: '3-letter ISO 4217 code of the currency to convert to, e.g. "USD"',
    required: true,
  },
];

export function createFunctionSpecs(options: CatalogOptions): FunctionSpec[] {
  const weatherSchema = z.object({ city: citySchema, date: dateSchema(options.now) }).strict();
  const newsSchema = z.object({ city: citySchema, page_size: pageSizeSchema }).strict();
  const currencyArgsSchema = z
    .object({ amount: amountSchema, base: currencySchema, target: currencySchema })
    .strict();

  return [
    {
      name: 'get_weather_for_date',
      description:
        'Get the weather for a city on a particular date (YYYY-MM-DD). Covers today and the next ~5 days.',
      parameters: weatherParameters,
      parse: raw => parseWith(weatherSchema, raw, values => ({ name: 'get_weather_for_date', values })),
    },
    {
      name: 'get_news_for_city',
      description: 'Get recent news articles mentioning a city',
      parameters: newsParameters,
      parse: raw => parseWith(newsSchema, raw, values => ({ name: 'get_news_for_city', values })),
    },
    {
      name: 'convert_currency',
      description: 'Convert an amount from a base currency to a target currency using the latest exchange rates',
      parameters: currencyParameters,
      parse: raw => parseWith(currencyArgsSchema, raw, values => ({ name: 'convert_currency', values })),
    },
  ];
}
