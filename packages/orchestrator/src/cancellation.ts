import { CancelledError, createLogger, describeError } from '@trialgrid/core';

const log = createLogger('cancellation');

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_INTERRUPTED = 130;

const HANDLED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** The part of `process` the handler listens on. */
export interface SignalSource {
  on(event: NodeJS.Signals, listener: () => void): unknown;
  off(event: NodeJS.Signals, listener: () => void): unknown;
}

export interface CancellationHandlerOptions {
  /** Exit immediately if cleanup has not finished after this long. */
  forceExitAfterMs: number;
  signals?: SignalSource;
  exit?: (code: number) => void;
}

/**
 * Turns SIGINT/SIGTERM and `cancel()` into an abort of the run's signal, and guarantees the
 * cleanup passed to `run` executes exactly once on every exit path.
 *
 * A second signal while cleanup is running exits at once.
 */
export class CancellationHandler {
  private readonly controller = new AbortController();
  private readonly signals: SignalSource;
  private readonly exit: (code: number) => void;
  private readonly onSignal = (): void => {
    if (this.controller.signal.aborted) {
      log.warn('second interrupt, exiting without waiting for cleanup');
      this.exit(EXIT_INTERRUPTED);
      return;
    }
    this.cancel('interrupted');
  };

  constructor(private readonly opts: CancellationHandlerOptions) {
    this.signals = opts.signals ?? process;
    this.exit = opts.exit ?? ((code) => process.exit(code));
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason: string): void {
    if (this.controller.signal.aborted) return;
    log.warn({ reason }, 'cancelling run');
    this.controller.abort(reason);
  }

  /**
   * Run `body`, then `cleanup` exactly once.
   *
   * @returns the process exit code: 0 on completion, 130 when cancelled, 1 on a fatal error
   */
  async run(body: (signal: AbortSignal) => Promise<void>, cleanup: () => Promise<void>): Promise<number> {
    for (const sig of HANDLED_SIGNALS) this.signals.on(sig, this.onSignal);

    let code = EXIT_OK;
    try {
      await body(this.controller.signal);
    } catch (err) {
      if (err instanceof CancelledError || this.controller.signal.aborted) {
        code = EXIT_INTERRUPTED;
      } else {
        log.fatal({ err: describeError(err) }, 'run failed');
        code = EXIT_FATAL;
      }
    } finally {
      const watchdog = setTimeout(() => {
        log.error({ forceExitAfterMs: this.opts.forceExitAfterMs }, 'cleanup did not finish in time, forcing exit');
        this.exit(code === EXIT_OK ? EXIT_FATAL : code);
      }, this.opts.forceExitAfterMs);
      watchdog.unref();
      try {
        await cleanup();
      } catch (err) {
        log.error({ err: describeError(err) }, 'final cleanup failed');
      } finally {
        clearTimeout(watchdog);
        for (const sig of HANDLED_SIGNALS) this.signals.off(sig, this.onSignal);
      }
    }

    if (code === EXIT_OK && this.controller.signal.aborted) {
      code = EXIT_INTERRUPTED;
    }
    return code;
  }
}
