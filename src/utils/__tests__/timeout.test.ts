import { describe, it, expect } from 'vitest';
import { TimeoutError, withTimeout } from '../timeout.js';

function never(signal: AbortSignal): Promise<string> {
  return new Promise((_, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('withTimeout', () => {
  it('should resolve with the task result', async () => {
    await expect(withTimeout(async () => 'done', 100)).resolves.toBe('done');
  });

  it('should reject with a TimeoutError and abort the task signal', async () => {
    let taskSignal: AbortSignal | undefined;
    const promise = withTimeout(
      signal => {
        taskSignal = signal;
        return never(signal);
      },
      20,
      { label: 'lookup' },
    );

    await expect(promise).rejects.toBeInstanceOf(TimeoutError);
    await expect(promise).rejects.toThrow('lookup timed out after 20ms');
    expect(taskSignal?.aborted).toBe(true);
  });

  it('should abort the task when the parent signal aborts', async () => {
    const parent = new AbortController();
    const promise = withTimeout(never, 1000, { signal: parent.signal });
    parent.abort();

    await expect(promise).rejects.toThrow('aborted');
  });

  it('should not start waiting when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    let seen = false;

    await expect(
      withTimeout(
        async signal => {
          seen = signal.aborted;
          return 'ran';
        },
        1000,
        { signal: parent.signal },
      ),
    ).resolves.toBe('ran');
    expect(seen).toBe(true);
  });
});
