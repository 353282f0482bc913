// In-memory call log store, used when no database is wanted (tests, ephemeral runs)

import { DEFAULT_LIST_LIMIT } from './types.js';
import type { CallLogFilter, CallLogRecord, CallLogStore, StoredCallLogRecord } from './types.js';

export class InMemoryCallLogStore implements CallLogStore {
  private records: StoredCallLogRecord[] = [];
  private nextId = 1;

  async append(record: CallLogRecord): Promise<void> {
    this.records.push(Object.freeze({ ...record, id: this.nextId++ }));
  }

  async list(filter: CallLogFilter = {}): Promise<StoredCallLogRecord[]> {
    return this.records
      .filter(r => !filter.correlationId || r.correlationId === filter.correlationId)
      .filter(r => !filter.functionName || r.functionName === filter.functionName)
      .reverse()
      .slice(0, filter.limit ?? DEFAULT_LIST_LIMIT);
  }

  get size(): number {
    return this.records.length;
  }
}
