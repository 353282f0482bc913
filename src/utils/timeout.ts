// Deadline helper for calls that leave the process (model gateway, function providers)

export class TimeoutError extends Error {
  constructor(
    public readonly label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

export interface TimeoutOptions {
  label?: string;
  // Aborting this signal aborts the task as well
  signal?: AbortSignal;
}

/**
 * Runs `task` with its own abort signal and rejects with a TimeoutError once
 * `timeoutMs` elapses. The task's signal is aborted on timeout, and also when
 * the optional parent signal aborts.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {},
): Promise<T> {
  const label = options.label ?? 'Operation';
  const parent = options.signal;
  const controller = new AbortController();

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      // Reject first so the race settles with the TimeoutError, not the task's abort error
      reject(error);
      controller.abort(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
