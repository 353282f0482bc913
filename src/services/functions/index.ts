// Function system initialization
// Wires the real provider-backed executors into the registry

import { env } from '../../env.js';
import { logger } from '../../logger.js';
import { FunctionRegistry } from './registry.js';
import { convertCurrency } from './executors/currency.js';
import { getNewsForCity } from './executors/news.js';
import { getWeatherForDate } from './executors/weather.js';
import type { FunctionExecutors } from './types.js';

export { FunctionRegistry } from './registry.js';
export type { FunctionRegistryOptions } from './registry.js';
export type {
  FunctionExecutors,
  FunctionName,
  FunctionResult,
  FunctionSchema,
  FunctionSpec,
  ValidatedArguments,
  ValidationResult,
} from './types.js';

export const defaultExecutors: FunctionExecutors = {
  get_weather_for_date: getWeatherForDate,
  get_news_for_city: getNewsForCity,
  convert_currency: convertCurrency,
};

export function initializeFunctions(): FunctionRegistry {
  const registry = new FunctionRegistry({
    executors: defaultExecutors,
    timeoutMs: env.FUNCTION_TIMEOUT_MS,
  });

  const names = registry.list().map(spec => spec.name);
  logger.info({ functions: names }, `Function registry initialized with ${names.length} function(s)`);

  if (!env.OPENWEATHER_API_KEY) {
    logger.warn('OPENWEATHER_API_KEY not set - get_weather_for_date will report an execution error');
  }
  if (!env.NEWSAPI_KEY) {
    logger.warn('NEWSAPI_KEY not set - get_news_for_city will report an execution error');
  }

  return registry;
}
