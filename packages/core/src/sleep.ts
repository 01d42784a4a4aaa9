import { CancelledError } from './errors.js';

/**
 * Wait `ms` milliseconds. Rejects with CancelledError as soon as `signal` aborts,
 * including when it is already aborted on entry.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError(abortReason(signal)));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError(abortReason(signal)));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/** Throw CancelledError if `signal` has already been aborted. */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError(abortReason(signal));
  }
}

function abortReason(signal?: AbortSignal): string {
  const reason: unknown = signal?.reason;
  if (typeof reason === 'string') return `Cancelled: ${reason}`;
  if (reason instanceof Error) return `Cancelled: ${reason.message}`;
  return 'Operation cancelled';
}
