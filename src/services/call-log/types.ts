// Call log types
// Records are append-only: written once per invocation attempt, never updated or deleted

import type { FunctionError } from '../functions/types.js';

export type CallOutcome = 'success' | 'execution_error' | 'bad_argument' | 'unknown_function';

/**
 * Which invocation attempts produce a record.
 * - executed: calls that reached an executor (success or execution error)
 * - resolved: also arguments rejected for a known function
 * - all: also requests naming an unknown function
 */
export type CallLogPolicy = 'executed' | 'resolved' | 'all';

export interface CallLogRecord {
  readonly correlationId: string;
  readonly functionName: string;
  readonly arguments: unknown;
  readonly outcome: CallOutcome;
  readonly result: unknown;
  readonly error: FunctionError | null;
  readonly startedAt: string;
  readonly finishedAt: string;
}

export interface StoredCallLogRecord extends CallLogRecord {
  readonly id: number;
}

export interface CallLogFilter {
  correlationId?: string;
  functionName?: string;
  limit?: number;
}

export interface CallLogStore {
  append(record: CallLogRecord): Promise<void>;
  // Newest first
  list(filter?: CallLogFilter): Promise<StoredCallLogRecord[]>;
}

export class StorageError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export const DEFAULT_LIST_LIMIT = 50;
