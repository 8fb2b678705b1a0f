/**
 * Timeout and sleep helpers for browser operations.
 *
 * Browser calls can hang indefinitely when the page stops responding, so
 * every probe call goes through runWithTimeout. sleep takes an AbortSignal so a
 * stop request cuts short the delay between recovery attempts.
 */

import { TimeoutError } from '../errors/app-errors';

export interface TimeoutOptions {
  /**
   * Timeout duration in milliseconds
   */
  timeoutMs: number;

  /**
   * Operation name for error messages
   */
  operation: string;
}

/**
 * Races a promise against a timer. The timer is always cleared; the promise
 * keeps running after a timeout (see runWithTimeout).
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, operation } = options;

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface AbortableTimeoutOptions extends TimeoutOptions {
  /**
   * Outer cancellation, forwarded to the task
   */
  signal?: AbortSignal;
}

/**
 * Runs `task` under a timeout. On timeout the task's signal is aborted and the
 * TimeoutError is only thrown once the task has settled, so the caller never
 * starts the next operation while the previous one is still running.
 *
 * @example
 * ```typescript
 * const connected = await runWithTimeout((signal) => probe.isConnected(signal), {
 *   timeoutMs: 60_000,
 *   operation: 'connection-check',
 * });
 * ```
 */
export async function runWithTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  options: AbortableTimeoutOptions
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(options.signal?.reason);

  if (options.signal?.aborted) {
    controller.abort(options.signal.reason);
  } else {
    options.signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  const pending = task(controller.signal);

  try {
    return await withTimeout(pending, options);
  } catch (error) {
    if (error instanceof TimeoutError) {
      controller.abort(error);
      await Promise.allSettled([pending]);
    }
    throw error;
  } finally {
    options.signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Resolves after `ms`, or early (without rejecting) when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type SleepFn = typeof sleep;
