/**
 * Deadline and worker-pool helpers for adapter calls
 */

import { AdapterTimeoutError, toError, type AdapterOutcome } from '../errors.js';

/**
 * Run `fn` with a signal that aborts after `timeoutMs` or when `parent`
 * aborts. Rejects with AdapterTimeoutError in either case, even if `fn`
 * ignores the signal.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const abortWith = (reason: 'timeout' | 'deadline') => (): void =>
    controller.abort(new AdapterTimeoutError(operation, timeoutMs, reason));
  const abortFromParent = abortWith('deadline');
  let timer: ReturnType<typeof setTimeout> | undefined;
  let rejectDeadline: (reason: unknown) => void = () => undefined;

  const deadline = new Promise<never>((_, reject) => {
    rejectDeadline = reject;
  });
  const onAbort = (): void => rejectDeadline(controller.signal.reason);
  controller.signal.addEventListener('abort', onAbort, { once: true });

  if (parent?.aborted) {
    abortFromParent();
  } else {
    parent?.addEventListener('abort', abortFromParent, { once: true });
    timer = setTimeout(abortWith('timeout'), timeoutMs);
  }

  try {
    return await Promise.race([fn(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', abortFromParent);
    controller.signal.removeEventListener('abort', onAbort);
  }
}

/**
 * `withTimeout` that never rejects: failures become AdapterOutcome values
 */
export async function guardAdapterCall<T>(
  operation: string,
  timeoutMs: number,
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<AdapterOutcome<T>> {
  try {
    return { ok: true, value: await withTimeout(operation, timeoutMs, fn, parent) };
  } catch (error) {
    if (error instanceof AdapterTimeoutError) {
      return { ok: false, kind: 'timeout', message: error.message };
    }
    return { ok: false, kind: 'error', message: toError(error).message };
  }
}

/**
 * Map over `items` with at most `concurrency` tasks in flight.
 * Results keep input order. `fn` is expected to handle its own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await fn(item, index);
    }
  }

  const workerCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
