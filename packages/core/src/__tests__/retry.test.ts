import { afterEach, describe, expect, it, vi } from 'vitest';

import { CancelledError, PreflightFailureError, StartFailureError } from '../errors.js';
import { computeDelay, executeWithRetry, withRetry } from '../retry.js';

const noSleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

afterEach(() => {
  noSleep.mockClear();
  vi.useRealTimers();
});

describe('computeDelay', () => {
  it('doubles the delay for exponential backoff', () => {
    expect([1, 2, 3, 4].map((a) => computeDelay(100, 'exponential', a))).toEqual([100, 200, 400, 800]);
  });

  it('keeps the delay for constant backoff', () => {
    expect([1, 2, 3].map((a) => computeDelay(250, 'constant', a))).toEqual([250, 250, 250]);
  });
});

describe('executeWithRetry', () => {
  it('invokes the operation exactly n times on persistent failure', async () => {
    const op = vi.fn().mockRejectedValue(new StartFailureError('exit 1'));

    const outcome = await executeWithRetry(op, { maxAttempts: 4, initialDelayMs: 10, sleep: noSleep });

    expect(op).toHaveBeenCalledTimes(4);
    expect(outcome.ok).toBe(false);
    expect(outcome.attempts).toBe(4);
    if (!outcome.ok) {
      expect(outcome.lastError).toBeInstanceOf(StartFailureError);
    }
  });

  it('stops at the attempt that succeeds', async () => {
    const op = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('ready');

    const outcome = await executeWithRetry(op, { maxAttempts: 5, initialDelayMs: 10, sleep: noSleep });

    expect(outcome).toEqual({ ok: true, value: 'ready', attempts: 3 });
    expect(op).toHaveBeenCalledTimes(3);
  });

  it('passes the 1-based attempt number to the operation', async () => {
    const op = vi.fn().mockRejectedValue(new Error('fail'));
    await executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 1, sleep: noSleep });
    expect(op.mock.calls.map((call) => call[0])).toEqual([1, 2, 3]);
  });

  it('doubles the backoff delay between attempts', async () => {
    const op = vi.fn().mockRejectedValue(new Error('fail'));
    await executeWithRetry(op, { maxAttempts: 4, initialDelayMs: 100, sleep: noSleep });
    expect(noSleep.mock.calls.map((call) => call[0])).toEqual([100, 200, 400]);
  });

  it('uses a fixed delay for constant backoff', async () => {
    const op = vi.fn().mockRejectedValue(new Error('fail'));
    await executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 50, backoff: 'constant', sleep: noSleep });
    expect(noSleep.mock.calls.map((call) => call[0])).toEqual([50, 50]);
  });

  it('does not retry a non-retryable GridError', async () => {
    const op = vi.fn().mockRejectedValue(new PreflightFailureError('missing input'));

    const outcome = await executeWithRetry(op, { maxAttempts: 4, initialDelayMs: 1, sleep: noSleep });

    expect(op).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
    expect(noSleep).not.toHaveBeenCalled();
  });

  it('reports each retry before sleeping', async () => {
    const onRetry = vi.fn();
    const error = new Error('fail');
    const op = vi.fn().mockRejectedValueOnce(error).mockResolvedValue('ok');

    await executeWithRetry(op, { maxAttempts: 2, initialDelayMs: 30, onRetry, sleep: noSleep });

    expect(onRetry).toHaveBeenCalledWith({ attempt: 1, delayMs: 30, error });
  });

  it('treats maxAttempts below 1 as a single attempt', async () => {
    const op = vi.fn().mockRejectedValue(new Error('fail'));
    const outcome = await executeWithRetry(op, { maxAttempts: 0, initialDelayMs: 1, sleep: noSleep });
    expect(op).toHaveBeenCalledTimes(1);
    expect(outcome.attempts).toBe(1);
  });

  it('propagates cancellation from the backoff sleep', async () => {
    const controller = new AbortController();
    controller.abort();
    const op = vi.fn().mockRejectedValue(new Error('fail'));

    await expect(
      executeWithRetry(op, { maxAttempts: 3, initialDelayMs: 10_000, signal: controller.signal }),
    ).rejects.toBeInstanceOf(CancelledError);
    expect(op).toHaveBeenCalledTimes(1);
  });

  it('waits the real backoff with the default sleep', async () => {
    vi.useFakeTimers();
    const op = vi.fn().mockRejectedValueOnce(new Error('fail')).mockResolvedValue('ok');

    const pending = executeWithRetry(op, { maxAttempts: 2, initialDelayMs: 1_000 });
    await vi.advanceTimersByTimeAsync(999);
    expect(op).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);

    await expect(pending).resolves.toEqual({ ok: true, value: 'ok', attempts: 2 });
  });
});

describe('withRetry', () => {
  it('returns the value', async () => {
    await expect(withRetry(async () => 'up', { maxAttempts: 1, initialDelayMs: 1 })).resolves.toBe('up');
  });

  it('throws the last error once attempts are exhausted', async () => {
    const op = vi
      .fn()
      .mockRejectedValueOnce(new StartFailureError('first'))
      .mockRejectedValue(new StartFailureError('second'));

    await expect(withRetry(op, { maxAttempts: 2, initialDelayMs: 1, sleep: noSleep })).rejects.toThrow('second');
  });
});
