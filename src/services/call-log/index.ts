// Call log module exports

export { CallLogger } from './call-logger.js';
export type { RecordResult } from './call-logger.js';
export { InMemoryCallLogStore } from './memory-store.js';
export { PostgresCallLogStore } from './postgres-store.js';
export { DEFAULT_LIST_LIMIT, StorageError } from './types.js';
export type {
  CallLogFilter,
  CallLogPolicy,
  CallLogRecord,
  CallLogStore,
  CallOutcome,
  StoredCallLogRecord,
} from './types.js';
