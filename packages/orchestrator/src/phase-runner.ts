import {
  CancelledError,
  createLogger,
  describeError,
  getMeter,
  getTracer,
  GridError,
  PhaseFailedError,
  ReadinessTimeoutError,
  StartFailureError,
  throwIfCancelled,
  withSpan,
  type PhaseName,
} from '@trialgrid/core';

import type { RunCheckpoint } from './checkpoint.js';
import { poll } from './health-poller.js';
import type { Phase, TrialContext } from './phases/context.js';
import { trialKey } from './types.js';

const log = createLogger('phase-runner');
const tracer = getTracer('trialgrid-orchestrator');
const meter = getMeter('trialgrid-orchestrator');
const phaseFailures = meter.createCounter('trialgrid.phase.failures');
const phaseDuration = meter.createHistogram('trialgrid.phase.duration_ms');

/**
 * Drives one trial attempt through the phase sequence. A phase is entered only after the
 * previous one's readiness gate has passed.
 */
export class PhaseRunner {
  private current: PhaseName | null = null;

  constructor(
    private readonly phases: Phase[],
    private readonly checkpoint: RunCheckpoint,
  ) {}

  /** Last phase entered by the most recent `runSequence`. */
  get lastPhase(): PhaseName | null {
    return this.current;
  }

  /**
   * Enter `phase`: run its start action, wait for its readiness gate, then its post-ready action.
   * Errors that are not GridErrors are reported as start failures.
   */
  async runPhase(phase: Phase, ctx: TrialContext): Promise<void> {
    throwIfCancelled(ctx.signal);
    this.current = phase.name;
    await this.checkpoint.enterPhase(phase.name, ctx.attempt);
    log.info({ trial: trialKey(ctx.trial), attempt: ctx.attempt, phase: phase.name }, 'entering phase');

    const startedAt = Date.now();
    await withSpan(
      tracer,
      'orchestrator.phase',
      { 'trial.key': trialKey(ctx.trial), 'trial.attempt': ctx.attempt, phase: phase.name },
      async () => {
        try {
          await phase.start(ctx);
        } catch (err) {
          if (err instanceof GridError) throw err;
          throw new StartFailureError(`${phase.name} start failed: ${describeError(err)}`, 'START_FAILURE', {
            cause: err,
          });
        }

        const gate = phase.readiness?.(ctx);
        if (gate) {
          await poll(gate.predicate, { intervalMs: gate.intervalMs, timeoutMs: gate.timeoutMs, signal: ctx.signal });
        }
        await phase.afterReady?.(ctx);
      },
    );
    phaseDuration.record(Date.now() - startedAt, { phase: phase.name });
  }

  /**
   * Run every phase in order.
   *
   * @throws CancelledError unchanged when the attempt is cancelled
   * @throws PhaseFailedError naming the phase that failed
   */
  async runSequence(ctx: TrialContext): Promise<void> {
    this.current = null;
    for (const phase of this.phases) {
      try {
        await this.runPhase(phase, ctx);
      } catch (err) {
        if (err instanceof CancelledError) throw err;
        phaseFailures.add(1, { phase: phase.name });
        const diagnostics = err instanceof ReadinessTimeoutError ? err.diagnostics : undefined;
        log.error(
          { trial: trialKey(ctx.trial), attempt: ctx.attempt, phase: phase.name, err: describeError(err), diagnostics },
          'phase failed',
        );
        throw new PhaseFailedError(phase.name, err);
      }
    }
  }
}
