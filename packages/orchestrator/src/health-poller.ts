import {
  createLogger,
  describeError,
  ReadinessTimeoutError,
  sleep,
  throwIfCancelled,
} from '@trialgrid/core';

import type { ReadinessPredicate } from './types.js';

const log = createLogger('health-poller');

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Clock used to measure elapsed time. */
  now?: () => number;
}

async function evaluate(predicate: ReadinessPredicate): Promise<boolean> {
  try {
    return await predicate.check();
  } catch (err) {
    log.debug({ predicate: predicate.describe, err: describeError(err) }, 'readiness check errored');
    return false;
  }
}

async function collectDiagnostics(predicate: ReadinessPredicate): Promise<string | undefined> {
  if (!predicate.diagnostics) return undefined;
  try {
    return await predicate.diagnostics();
  } catch (err) {
    return `diagnostics unavailable: ${describeError(err)}`;
  }
}

/**
 * Evaluate `predicate` now and then every `intervalMs` until it holds.
 *
 * The final wait is shortened so the last evaluation happens at the deadline, which keeps the
 * total time under `timeoutMs + intervalMs`. A check that throws counts as "not ready".
 *
 * @throws ReadinessTimeoutError when the deadline passes, with the predicate's diagnostics
 * @throws CancelledError as soon as `signal` aborts
 */
export async function poll(predicate: ReadinessPredicate, opts: PollOptions): Promise<void> {
  const now = opts.now ?? Date.now;
  const startedAt = now();

  for (;;) {
    throwIfCancelled(opts.signal);
    if (await evaluate(predicate)) {
      log.debug({ predicate: predicate.describe, elapsedMs: now() - startedAt }, 'ready');
      return;
    }

    const elapsed = now() - startedAt;
    if (elapsed >= opts.timeoutMs) {
      const diagnostics = await collectDiagnostics(predicate);
      log.error({ predicate: predicate.describe, timeoutMs: opts.timeoutMs, diagnostics }, 'readiness timeout');
      throw new ReadinessTimeoutError(
        `Timed out after ${opts.timeoutMs}ms waiting for ${predicate.describe}`,
        'TIMEOUT',
        { diagnostics },
      );
    }

    await sleep(Math.min(opts.intervalMs, opts.timeoutMs - elapsed), opts.signal);
  }
}
