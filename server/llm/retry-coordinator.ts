/**
 * Retry Coordinator - bounded, jittered retries under a shared deadline
 *
 * - Exponential delay: min(maxDelay, base * 2^(attempt-1)) with
 *   multiplicative jitter in [0.7, 1.3]
 * - Hard per-attempt timeout, clipped to what is left of the deadline
 * - Only failures the caller classifies as transient are retried
 * - Never throws: the caller gets a typed outcome and decides what a
 *   failure means (the router turns it into the `unavailable` sentinel)
 *
 * @module retry-coordinator
 */

import { withTimeout, sleep } from '../utils/timeout';
import { getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
  deadlineMs: number;
}

/**
 * Injected for deterministic tests
 */
export interface RetryDeps {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  random: () => number;
}

const defaultDeps: RetryDeps = {
  now: () => Date.now(),
  sleep,
  random: Math.random,
};

/**
 * Shared orchestration budget
 * Guarantees retries never run past the overall deadline
 */
export class OrchestrationBudget {
  private readonly startTime: number;

  constructor(
    private readonly deadlineMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now();
  }

  /**
   * Remaining time in ms (negative once expired)
   */
  getRemainingMs(): number {
    return this.deadlineMs - (this.now() - this.startTime);
  }

  canAfford(requiredMs: number): boolean {
    return this.getRemainingMs() >= requiredMs;
  }

  isExpired(): boolean {
    return this.getRemainingMs() <= 0;
  }
}

/** Upper bound of the multiplicative jitter in backoffDelay */
const MAX_JITTER = 1.3;

export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, random: () => number): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return exponential * (0.7 + 0.6 * random());
}

/**
 * Longest a run of maxAttempts timed-out attempts can take, with every
 * backoff at its largest jitter. A deadline below this cuts attempts short.
 */
export function worstCaseRetryMs(policy: RetryPolicy): number {
  let total = policy.maxAttempts * policy.attemptTimeoutMs;
  for (let attempt = 1; attempt < policy.maxAttempts; attempt++) {
    total += Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1)) * MAX_JITTER;
  }
  return total;
}

export type RetryStopReason = 'exhausted' | 'non_transient' | 'deadline' | 'aborted';

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; reason: RetryStopReason; error: unknown; attempts: number };

export interface RetryOptions {
  policy: RetryPolicy;
  operation: string;
  isTransient: (error: unknown) => boolean;
  signal?: AbortSignal;
  deps?: Partial<RetryDeps>;
}

export async function retryWithBackoff<T>(
  fn: (attempt: number, signal: AbortSignal) => Promise<T>,
  options: RetryOptions
): Promise<RetryOutcome<T>> {
  const { policy, operation, isTransient, signal } = options;
  const deps: RetryDeps = { ...defaultDeps, ...options.deps };
  const budget = new OrchestrationBudget(policy.deadlineMs, deps.now);

  let lastError: unknown = new Error(`${operation} was not attempted`);
  let attempts = 0;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (signal?.aborted) {
      return { ok: false, reason: 'aborted', error: lastError, attempts };
    }
    if (budget.isExpired()) {
      return { ok: false, reason: 'deadline', error: lastError, attempts };
    }

    attempts = attempt;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const timeoutMs = Math.max(1, Math.min(policy.attemptTimeoutMs, budget.getRemainingMs()));
      const value = await withTimeout(fn(attempt, controller.signal), {
        timeoutMs,
        operation,
        abortController: controller,
      });
      return { ok: true, value, attempts };
    } catch (error) {
      lastError = error;

      if (!isTransient(error)) {
        log.warn({ component: 'RetryCoordinator', operation, attempt, error: getErrorMessage(error) }, 'Non-transient failure - not retrying');
        return { ok: false, reason: 'non_transient', error, attempts };
      }
      if (attempt === policy.maxAttempts) {
        break;
      }

      const delayMs = backoffDelay(attempt, policy.baseDelayMs, policy.maxDelayMs, deps.random);
      if (!budget.canAfford(delayMs)) {
        log.warn({ component: 'RetryCoordinator', operation, attempt, remainingMs: budget.getRemainingMs() }, 'Deadline reached - giving up');
        return { ok: false, reason: 'deadline', error, attempts };
      }

      log.info({
        component: 'RetryCoordinator',
        operation,
        attempt,
        maxAttempts: policy.maxAttempts,
        delayMs: Math.round(delayMs),
        error: getErrorMessage(error),
      }, 'Transient failure - retrying');

      try {
        await deps.sleep(delayMs, signal);
      } catch {
        return { ok: false, reason: 'aborted', error, attempts };
      }
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  log.warn({ component: 'RetryCoordinator', operation, attempts, error: getErrorMessage(lastError) }, 'Retries exhausted');
  return { ok: false, reason: 'exhausted', error: lastError, attempts };
}
