import * as path from 'node:path';

import {
  CancelledError,
  createLogger,
  describeError,
  executeWithRetry,
  getMeter,
  PhaseFailedError,
  ReadinessTimeoutError,
  StartFailureError,
  type OrchestratorConfig,
  type TrialId,
} from '@trialgrid/core';

import type { RunCheckpoint } from './checkpoint.js';
import type { CleanupProtocol } from './cleanup.js';
import { PhaseRunner } from './phase-runner.js';
import { createPhaseSequence } from './phases/index.js';
import { emptyAttemptState, trialPaths, type Phase, type TrialContext } from './phases/context.js';
import type { ResourceGuard } from './resource-guard.js';
import { loadTrialDefinition, parseSubscribers, type ClientIdentity } from './trial-definition.js';
import { trialKey, type AttemptOutcome, type Host, type TrialAttempt, type TrialOutcome } from './types.js';

const log = createLogger('trial-controller');
const meter = getMeter('trialgrid-orchestrator');
const attemptCounter = meter.createCounter('trialgrid.trial.attempts');
const outcomeCounter = meter.createCounter('trialgrid.trial.outcomes');

export interface TrialControllerOptions {
  config: OrchestratorConfig;
  host: Host;
  guard: ResourceGuard;
  checkpoint: RunCheckpoint;
  cleanup: CleanupProtocol;
  /** Phase sequence; the standard nine phases when omitted. */
  phases?: Phase[];
  /** Sleep used between trial attempts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function classify(err: unknown): AttemptOutcome {
  const cause = err instanceof PhaseFailedError ? err.cause : err;
  return cause instanceof ReadinessTimeoutError ? 'timed-out' : 'failed-phase';
}

/**
 * Runs one trial: the whole phase sequence per attempt, full cleanup after every attempt, and a
 * fixed delay between attempts. Every failure restarts the trial from the first phase.
 */
export class TrialController {
  private readonly phases: Phase[];

  constructor(private readonly opts: TrialControllerOptions) {
    this.phases = opts.phases ?? createPhaseSequence();
  }

  /**
   * @throws CancelledError when `signal` aborts; cleanup for the running attempt has completed
   */
  async run(trial: TrialId, signal: AbortSignal): Promise<TrialOutcome> {
    const { config, checkpoint, cleanup } = this.opts;
    const key = trialKey(trial);
    const history: TrialAttempt[] = [];
    await checkpoint.beginTrial(trial);
    log.info({ trial: key, maxAttempts: config.retry.maxRetries + 1 }, 'starting trial');

    const result = await executeWithRetry(
      async (attempt) => {
        attemptCounter.add(1);
        const runner = new PhaseRunner(this.phases, checkpoint);
        const startedAt = new Date().toISOString();
        const record = (outcome: AttemptOutcome, reason?: string) => {
          history.push({ attempt, startedAt, endedAt: new Date().toISOString(), finalPhase: runner.lastPhase, outcome, reason });
        };

        let trialDir: string | undefined;
        try {
          const ctx = await this.prepareAttempt(trial, attempt, signal);
          trialDir = ctx.definition.dir;
          await runner.runSequence(ctx);
          record('success');
        } catch (err) {
          if (!(err instanceof CancelledError)) {
            record(classify(err), describeError(err));
          }
          throw err;
        } finally {
          await checkpoint.enterPhase('cleanup', attempt);
          await cleanup.run({ owner: key, trialDir });
        }
      },
      {
        maxAttempts: config.retry.maxRetries + 1,
        initialDelayMs: config.retry.retryDelayMs,
        backoff: 'constant',
        signal,
        sleep: this.opts.sleep,
        onRetry: async ({ attempt, delayMs, error }) => {
          log.warn({ trial: key, attempt, delayMs, err: describeError(error) }, 'trial attempt failed, retrying');
          await checkpoint.recordAttemptFailure(trial, attempt, describeError(error), delayMs);
        },
      },
    );

    if (result.ok) {
      await checkpoint.recordSuccess(trial);
      outcomeCounter.add(1, { status: 'Succeeded' });
      log.info({ trial: key, attempts: result.attempts }, 'trial succeeded');
      return { status: 'Succeeded', trial, attempts: result.attempts, history };
    }

    if (result.lastError instanceof CancelledError) {
      throw result.lastError;
    }

    const reason = describeError(result.lastError);
    const phase = history.at(-1)?.finalPhase ?? null;
    await checkpoint.recordPermanentFailure({ trial, attempts: result.attempts, phase: phase ?? undefined, reason });
    outcomeCounter.add(1, { status: 'PermanentlyFailed' });
    log.error({ trial: key, attempts: result.attempts, phase, reason }, 'trial permanently failed');
    return { status: 'PermanentlyFailed', trial, attempts: result.attempts, phase, reason, history };
  }

  private async prepareAttempt(trial: TrialId, attempt: number, signal: AbortSignal): Promise<TrialContext> {
    const { config, host, guard } = this.opts;
    const definition = await loadTrialDefinition(host.fs, config.grid.baseDir, trial, config.scenario.script);
    const paths = trialPaths(config, definition.dir);
    for (const dir of [paths.radioLogDir, paths.clientLogDir, path.dirname(paths.metricsFile)]) {
      await host.fs.mkdirp(dir);
    }

    return {
      trial,
      owner: trialKey(trial),
      attempt,
      definition,
      identities: await this.loadIdentities(),
      config,
      host,
      guard,
      signal,
      paths,
      state: emptyAttemptState(),
    };
  }

  private async loadIdentities(): Promise<ClientIdentity[]> {
    const file = this.opts.config.inputs.subscriberFile;
    if (!(await this.opts.host.fs.exists(file))) {
      throw new StartFailureError(`Subscriber table not found: ${file}`);
    }
    return parseSubscribers(await this.opts.host.fs.readText(file));
  }
}
