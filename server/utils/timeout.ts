/**
 * Timeout helpers with AbortController support.
 *
 * - Promise.race wrapper that always clears its timer
 * - TimeoutError (see errors/app-errors) so callers can classify the failure
 * - AbortSignal propagation so the underlying request is cancelled too
 */

import { TimeoutError } from '../errors/app-errors';
import { log } from './logger';

export interface TimeoutOptions {
  /**
   * Timeout duration in milliseconds
   */
  timeoutMs: number;

  /**
   * Operation name for logging/error messages
   */
  operation: string;

  /**
   * Aborted when the timeout fires, so fetch-based clients stop the request
   */
  abortController?: AbortController;
}

/**
 * Wraps a promise with a hard timeout.
 *
 * @example
 * ```typescript
 * const controller = new AbortController();
 * const completion = await withTimeout(
 *   client.complete(request, controller.signal),
 *   { timeoutMs: 5000, operation: 'interpreter.complete', abortController: controller }
 * );
 * ```
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  options: TimeoutOptions
): Promise<T> {
  const { timeoutMs, operation, abortController } = options;

  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      log.debug({ component: 'timeout', operation, timeoutMs }, 'Operation timed out');
      abortController?.abort();
      reject(new TimeoutError(
        `Operation '${operation}' timed out after ${timeoutMs}ms`,
        timeoutMs,
        operation
      ));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Resolves after `ms`, or rejects early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error('Aborted'));
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Aborted'));
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
