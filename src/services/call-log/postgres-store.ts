// Postgres call log store (drizzle-orm)
// Insert-only: the core never issues UPDATE or DELETE against function_calls

import { and, desc, eq } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { z } from 'zod';
import { functionCalls } from '../../db.js';
import { DEFAULT_LIST_LIMIT } from './types.js';
import type { CallLogFilter, CallLogRecord, CallLogStore, StoredCallLogRecord } from './types.js';

const StoredErrorSchema = z.object({
  kind: z.enum(['UnknownFunction', 'BadArgument', 'ExecutionError']),
  message: z.string(),
  detail: z.array(z.string()).optional(),
});

export class PostgresCallLogStore<TQueryResult extends PgQueryResultHKT> implements CallLogStore {
  constructor(private readonly db: PgDatabase<TQueryResult>) {}

  async append(record: CallLogRecord): Promise<void> {
    await this.db.insert(functionCalls).values({
      correlationId: record.correlationId,
      functionName: record.functionName,
      arguments: record.arguments ?? null,
      outcome: record.outcome,
      result: record.result ?? null,
      error: record.error,
      startedAt: new Date(record.startedAt),
      finishedAt: new Date(record.finishedAt),
    });
  }

  async list(filter: CallLogFilter = {}): Promise<StoredCallLogRecord[]> {
    const rows = await this.db
      .select()
      .from(functionCalls)
      .where(
        and(
          filter.correlationId ? eq(functionCalls.correlationId, filter.correlationId) : undefined,
          filter.functionName ? eq(functionCalls.functionName, filter.functionName) : undefined,
        ),
      )
      .orderBy(desc(functionCalls.id))
      .limit(filter.limit ?? DEFAULT_LIST_LIMIT);

    return rows.map(row => ({
      id: row.id,
      correlationId: row.correlationId,
      functionName: row.functionName,
      arguments: row.arguments,
      outcome: row.outcome,
      result: row.result,
      error: row.error === null ? null : StoredErrorSchema.parse(row.error),
      startedAt: row.startedAt.toISOString(),
      finishedAt: row.finishedAt.toISOString(),
    }));
  }
}
