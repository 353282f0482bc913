// Call log database (drizzle-orm + Postgres)
import { sql } from 'drizzle-orm';
import { index, jsonb, pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { env } from './env.js';
import { logger } from './logger.js';

export const functionCalls = pgTable(
  'function_calls',
  {
    id: serial('id').primaryKey(),
    correlationId: text('correlation_id').notNull(),
    functionName: text('function_name').notNull(),
    arguments: jsonb('arguments'),
    outcome: text('outcome', {
      enum: ['success', 'execution_error', 'bad_argument', 'unknown_function'],
    }).notNull(),
    result: jsonb('result'),
    error: jsonb('error'),
    startedAt: timestamp('started_at', { withTimezone: true }).notNull(),
    finishedAt: timestamp('finished_at', { withTimezone: true }).notNull(),
  },
  table => ({
    correlationIdx: index('function_calls_correlation_idx').on(table.correlationId),
  }),
);

export type Database = PostgresJsDatabase;

export interface DatabaseConnection {
  db: Database;
  close(): Promise<void>;
}

export function createDatabase(url: string = env.DATABASE_URL): DatabaseConnection {
  const client = postgres(url, {
    max: 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: notice => logger.debug({ notice: notice.message }, 'Postgres notice'),
    connection: {
      application_name: 'fncall_chat_api',
    },
  });

  return {
    db: drizzle(client),
    close: () => client.end(),
  };
}

// Insert-only table; created on startup when missing
export async function ensureCallLogSchema<TQueryResult extends PgQueryResultHKT>(
  db: PgDatabase<TQueryResult>,
): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS function_calls (
      id SERIAL PRIMARY KEY,
      correlation_id TEXT NOT NULL,
      function_name TEXT NOT NULL,
      arguments JSONB,
      outcome TEXT NOT NULL,
      result JSONB,
      error JSONB,
      started_at TIMESTAMPTZ NOT NULL,
      finished_at TIMESTAMPTZ NOT NULL
    )
  `);
  await db.execute(
    sql`CREATE INDEX IF NOT EXISTS function_calls_correlation_idx ON function_calls (correlation_id)`,
  );
}
