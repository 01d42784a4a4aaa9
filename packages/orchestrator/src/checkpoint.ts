import {
  createLogger,
  describeError,
  RunCheckpointSchema,
  type FailedCell,
  type PhaseName,
  type RetryState,
  type RunCheckpointRecord,
  type TrialId,
} from '@trialgrid/core';

import { trialKey, type FileSystem } from './types.js';

const log = createLogger('checkpoint');

/**
 * Persists the run checkpoint as JSON for operator inspection.
 *
 * Writes go to a sibling temp file that is then renamed over the target, so readers never see
 * a half-written record. Write failures are logged and swallowed: the checkpoint is a hint,
 * never required for the run to proceed.
 */
export class CheckpointStore {
  constructor(
    private readonly fs: FileSystem,
    readonly path: string,
  ) {}

  async save(record: RunCheckpointRecord): Promise<void> {
    const tmp = `${this.path}.tmp`;
    try {
      await this.fs.writeText(tmp, `${JSON.stringify(record, null, 2)}\n`);
      await this.fs.rename(tmp, this.path);
    } catch (err) {
      log.warn({ path: this.path, err: describeError(err) }, 'failed to write checkpoint');
    }
  }

  /** Read the last record, or null when there is none or it does not validate. */
  async load(): Promise<RunCheckpointRecord | null> {
    if (!(await this.fs.exists(this.path))) return null;
    try {
      const parsed = RunCheckpointSchema.safeParse(JSON.parse(await this.fs.readText(this.path)));
      if (!parsed.success) {
        log.warn({ path: this.path, issues: parsed.error.issues.length }, 'checkpoint failed validation');
        return null;
      }
      return parsed.data;
    } catch (err) {
      log.warn({ path: this.path, err: describeError(err) }, 'failed to read checkpoint');
      return null;
    }
  }
}

/**
 * Process-wide run progress. Passed by reference to the scheduler and controllers; every
 * mutation is persisted through the optional store.
 */
export class RunCheckpoint {
  private record: RunCheckpointRecord = {
    currentTrialSet: null,
    currentExperiment: null,
    phase: 'idle',
    attempt: 0,
    retryStates: {},
    lastCompleted: null,
    failed: [],
    updatedAt: new Date().toISOString(),
  };

  constructor(private readonly store?: CheckpointStore) {}

  async beginTrial(trial: TrialId): Promise<void> {
    this.record.currentTrialSet = trial.trialSet;
    this.record.currentExperiment = trial.experiment;
    this.record.phase = 'starting';
    this.record.attempt = 0;
    await this.persist();
  }

  async enterPhase(phase: PhaseName | 'cleanup', attempt: number): Promise<void> {
    this.record.phase = phase;
    this.record.attempt = attempt;
    await this.persist();
  }

  async recordAttemptFailure(trial: TrialId, attempts: number, reason: string, nextDelayMs?: number): Promise<void> {
    this.record.retryStates[trialKey(trial)] = { attempts, lastFailure: reason, nextDelayMs };
    await this.persist();
  }

  async recordSuccess(trial: TrialId): Promise<void> {
    delete this.record.retryStates[trialKey(trial)];
    this.record.lastCompleted = { ...trial };
    this.record.phase = 'idle';
    await this.persist();
  }

  async recordPermanentFailure(cell: FailedCell): Promise<void> {
    this.record.failed.push({ ...cell, trial: { ...cell.trial } });
    this.record.phase = 'idle';
    await this.persist();
  }

  retryState(trial: TrialId): RetryState | undefined {
    const state = this.record.retryStates[trialKey(trial)];
    return state ? { ...state } : undefined;
  }

  failedCells(): FailedCell[] {
    return this.record.failed.map((cell) => ({ ...cell, trial: { ...cell.trial } }));
  }

  snapshot(): RunCheckpointRecord {
    return structuredClone(this.record);
  }

  private async persist(): Promise<void> {
    this.record.updatedAt = new Date().toISOString();
    await this.store?.save(this.snapshot());
  }
}
