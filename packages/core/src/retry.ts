import { GridError } from './errors.js';
import { sleep as defaultSleep } from './sleep.js';

export type Backoff = 'exponential' | 'constant';

export interface RetryOptions {
  /** Total number of invocations allowed, including the first one. */
  maxAttempts: number;
  /** Delay before the second attempt. */
  initialDelayMs: number;
  /** `exponential` doubles the delay after every failed attempt; `constant` keeps it. */
  backoff?: Backoff;
  signal?: AbortSignal;
  /** Called after a failed attempt that will be retried, before the backoff sleep. */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void | Promise<void>;
  /** Injectable sleep; must reject when `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; attempts: number; lastError: unknown };

/**
 * Compute the delay that follows failed attempt number `attempt` (1-based).
 */
export function computeDelay(initialDelayMs: number, backoff: Backoff, attempt: number): number {
  switch (backoff) {
    case 'constant':
      return initialDelayMs;
    case 'exponential':
      return initialDelayMs * Math.pow(2, attempt - 1);
  }
}

/**
 * Run `operation` up to `maxAttempts` times, sleeping between failures.
 *
 * - Every failure is retried except a GridError with retryable=false, which ends the loop
 * - Errors thrown by the backoff sleep (cancellation) propagate
 * - Never throws the operation's own error; the final one is reported in the outcome
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<RetryOutcome<T>> {
  const backoff = options.backoff ?? 'exponential';
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, options.maxAttempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const value = await operation(attempt);
      return { ok: true, value, attempts: attempt };
    } catch (error: unknown) {
      lastError = error;

      if (error instanceof GridError && !error.retryable) {
        return { ok: false, attempts: attempt, lastError };
      }

      if (attempt < maxAttempts) {
        const delayMs = computeDelay(options.initialDelayMs, backoff, attempt);
        await options.onRetry?.({ attempt, delayMs, error });
        await sleep(delayMs, options.signal);
      }
    }
  }

  return { ok: false, attempts: maxAttempts, lastError };
}

/**
 * Throwing form of executeWithRetry: resolves with the value or rethrows the last error.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const outcome = await executeWithRetry(operation, options);
  if (outcome.ok) return outcome.value;
  throw outcome.lastError;
}
