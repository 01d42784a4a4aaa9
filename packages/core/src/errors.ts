/**
 * Base error class for all orchestration errors.
 */
export class GridError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'GridError';
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * A port, namespace, session or PID file is held and could not be reclaimed.
 */
export class ResourceBusyError extends GridError {
  constructor(message: string, code: string = 'RESOURCE_BUSY', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'ResourceBusyError';
  }
}

/**
 * A readiness predicate never became true within its budget.
 *
 * `diagnostics` holds whatever context the predicate could gather (usually a log tail).
 */
export class ReadinessTimeoutError extends GridError {
  public readonly diagnostics?: string;

  constructor(
    message: string,
    code: string = 'TIMEOUT',
    options?: { cause?: unknown; diagnostics?: string },
  ) {
    super(message, code, true, options);
    this.name = 'ReadinessTimeoutError';
    this.diagnostics = options?.diagnostics;
  }
}

/**
 * A start action exited non-zero or threw.
 */
export class StartFailureError extends GridError {
  constructor(message: string, code: string = 'START_FAILURE', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'StartFailureError';
  }
}

/**
 * The produced metrics table is missing, malformed or outside the duration tolerance.
 */
export class ValidationFailureError extends GridError {
  constructor(message: string, code: string = 'VALIDATION_FAILURE', options?: { cause?: unknown }) {
    super(message, code, true, options);
    this.name = 'ValidationFailureError';
  }
}

/**
 * Required input files or directories are absent at startup. Fatal.
 */
export class PreflightFailureError extends GridError {
  constructor(message: string, code: string = 'PREFLIGHT_FAILURE', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'PreflightFailureError';
  }
}

/**
 * The enclosing run was cancelled (signal or explicit request).
 */
export class CancelledError extends GridError {
  constructor(message: string = 'Operation cancelled', code: string = 'CANCELLED', options?: { cause?: unknown }) {
    super(message, code, false, options);
    this.name = 'CancelledError';
  }
}

/**
 * A trial attempt stopped at `phase`. Retryable exactly when its cause is.
 */
export class PhaseFailedError extends GridError {
  public readonly phase: string;

  constructor(phase: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    const retryable = cause instanceof GridError ? cause.retryable : true;
    super(`failed-phase: ${phase}: ${reason}`, 'PHASE_FAILED', retryable, { cause });
    this.name = 'PhaseFailedError';
    this.phase = phase;
  }
}

/** Render an unknown thrown value as a one-line reason. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
