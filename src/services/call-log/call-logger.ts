// Call Logger
// Best-effort audit trail: a failing store is reported, never allowed to break the chat turn

import { logger as rootLogger } from '../../logger.js';
import type { Logger } from '../../logger.js';
import { describeError } from '../../utils/errors.js';
import { StorageError } from './types.js';
import type { CallLogFilter, CallLogPolicy, CallLogRecord, CallLogStore, CallOutcome, StoredCallLogRecord } from './types.js';

export type RecordResult = { ok: true } | { ok: false; error: StorageError };

const LOGGED_OUTCOMES: Record<CallLogPolicy, ReadonlySet<CallOutcome>> = {
  executed: new Set<CallOutcome>(['success', 'execution_error']),
  resolved: new Set<CallOutcome>(['success', 'execution_error', 'bad_argument']),
  all: new Set<CallOutcome>(['success', 'execution_error', 'bad_argument', 'unknown_function']),
};

export class CallLogger {
  private readonly log: Logger;

  constructor(
    private readonly store: CallLogStore,
    private readonly policy: CallLogPolicy = 'executed',
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ component: 'call-log' });
  }

  shouldRecord(outcome: CallOutcome): boolean {
    return LOGGED_OUTCOMES[this.policy].has(outcome);
  }

  async record(record: CallLogRecord): Promise<RecordResult> {
    try {
      await this.store.append(Object.freeze({ ...record }));
      return { ok: true };
    } catch (error) {
      const storageError = new StorageError(`Failed to record function call: ${describeError(error)}`, {
        cause: error,
      });
      this.log.warn(
        { err: storageError, correlationId: record.correlationId, functionName: record.functionName },
        'Function call was not recorded',
      );
      return { ok: false, error: storageError };
    }
  }

  list(filter?: CallLogFilter): Promise<StoredCallLogRecord[]> {
    return this.store.list(filter);
  }
}
