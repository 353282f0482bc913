// Environment configuration for the function-calling chat API
// Provider credentials, orchestration limits and storage settings come from environment variables

import type { CallLogPolicy } from './services/call-log/types.js';

export type ModelProviderName = 'openai' | 'ollama';

const strEnv = (value: string | undefined, fallback = '') => (value ?? fallback).trim();

function parsePort(value: string | undefined, defaultPort: number): number {
  if (!value) return defaultPort;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1 || parsed > 65535) {
    console.error(`Invalid PORT "${value}", using default ${defaultPort}`);
    return defaultPort;
  }
  return parsed;
}

function parsePositiveInt(value: string | undefined, defaultValue: number, name: string): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    console.error(`Invalid ${name} "${value}", using default ${defaultValue}`);
    return defaultValue;
  }
  return parsed;
}

function parseModelProvider(value: string | undefined): ModelProviderName {
  const normalized = strEnv(value, 'openai').toLowerCase();
  if (normalized === 'openai' || normalized === 'ollama') return normalized;
  console.error(`Invalid MODEL_PROVIDER "${value}", using default openai`);
  return 'openai';
}

function parseCallLogPolicy(value: string | undefined): CallLogPolicy {
  const normalized = strEnv(value, 'executed').toLowerCase();
  if (normalized === 'executed' || normalized === 'resolved' || normalized === 'all') return normalized;
  console.error(`Invalid CALL_LOG_POLICY "${value}", using default executed`);
  return 'executed';
}

export const env = {
  // Server
  PORT: parsePort(process.env.PORT, 3737),
  HOST: process.env.HOST || '127.0.0.1',
  NODE_ENV: process.env.NODE_ENV || 'development',
  CORS_ORIGINS: (process.env.CORS_ORIGINS || 'http://localhost:3000,http://127.0.0.1:3000')
    .split(',')
    .map(s => s.trim())
    .filter(Boolean),

  // Model gateway
  MODEL_PROVIDER: parseModelProvider(process.env.MODEL_PROVIDER),
  OPENAI_API_KEY: strEnv(process.env.OPENAI_API_KEY),
  OPENAI_BASE_URL: strEnv(process.env.OPENAI_BASE_URL),
  OPENAI_MODEL: strEnv(process.env.OPENAI_MODEL, 'gpt-4o-mini'),
  OLLAMA_URL: strEnv(process.env.OLLAMA_URL, 'http://localhost:11434/api/chat'),
  OLLAMA_MODEL: strEnv(process.env.OLLAMA_MODEL, 'llama3.1:8b'),

  // Function providers
  OPENWEATHER_API_KEY: strEnv(process.env.OPENWEATHER_API_KEY),
  OPENWEATHER_BASE_URL: strEnv(process.env.OPENWEATHER_BASE_URL, 'https://api.openweathermap.org'),
  NEWSAPI_KEY: strEnv(process.env.NEWSAPI_KEY),
  NEWSAPI_BASE_URL: strEnv(process.env.NEWSAPI_BASE_URL, 'https://newsapi.org'),
  FRANKFURTER_BASE_URL: strEnv(process.env.FRANKFURTER_BASE_URL, 'https://api.frankfurter.app'),

  // Orchestration
  MAX_FUNCTION_ROUNDS: parsePositiveInt(process.env.MAX_FUNCTION_ROUNDS, 5, 'MAX_FUNCTION_ROUNDS'),
  MODEL_TIMEOUT_MS: parsePositiveInt(process.env.MODEL_TIMEOUT_MS, 60000, 'MODEL_TIMEOUT_MS'),
  FUNCTION_TIMEOUT_MS: parsePositiveInt(process.env.FUNCTION_TIMEOUT_MS, 12000, 'FUNCTION_TIMEOUT_MS'),
  CHAT_REQUEST_TIMEOUT_MS: parsePositiveInt(process.env.CHAT_REQUEST_TIMEOUT_MS, 120000, 'CHAT_REQUEST_TIMEOUT_MS'),
  CONVERSATION_TTL_MS: parsePositiveInt(process.env.CONVERSATION_TTL_MS, 15 * 60 * 1000, 'CONVERSATION_TTL_MS'),

  // Call log
  CALL_LOG_POLICY: parseCallLogPolicy(process.env.CALL_LOG_POLICY),
  // Empty keeps the call log in memory
  DATABASE_URL: strEnv(process.env.DATABASE_URL),

  // Logging
  LOG_LEVEL: process.env.LOG_LEVEL || 'info',
};

export function isProviderConfigured(provider: ModelProviderName): boolean {
  switch (provider) {
    case 'openai':
      return !!env.OPENAI_API_KEY;
    case 'ollama':
      return !!env.OLLAMA_URL;
    default:
      return false;
  }
}

// Summary for the startup log, secrets reduced to presence flags
export function describeConfiguration(): Record<string, unknown> {
  return {
    environment: env.NODE_ENV,
    server: `${env.HOST}:${env.PORT}`,
    modelProvider: env.MODEL_PROVIDER,
    modelProviderConfigured: isProviderConfigured(env.MODEL_PROVIDER),
    model: env.MODEL_PROVIDER === 'openai' ? env.OPENAI_MODEL : env.OLLAMA_MODEL,
    weatherConfigured: !!env.OPENWEATHER_API_KEY,
    newsConfigured: !!env.NEWSAPI_KEY,
    maxFunctionRounds: env.MAX_FUNCTION_ROUNDS,
    callLogPolicy: env.CALL_LOG_POLICY,
    callLogPersistent: !!env.DATABASE_URL,
  };
}
