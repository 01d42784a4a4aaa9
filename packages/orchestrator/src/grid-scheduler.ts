import { createLogger, sleep as defaultSleep, type OrchestratorConfig, type TrialId } from '@trialgrid/core';

import type { CleanupProtocol } from './cleanup.js';
import type { TrialController } from './trial-controller.js';
import { trialKey, type TrialOutcome } from './types.js';

const log = createLogger('grid-scheduler');

export interface GridStart {
  startTrialSet: number;
  startExperiment: number;
  /** Run exactly the cell (startTrialSet, onlyExperiment) and stop. */
  onlyExperiment?: number;
}

export interface GridSummary {
  attempted: number;
  succeeded: number;
  failed: Array<{ trial: TrialId; attempts: number; reason: string }>;
}

export interface GridSchedulerOptions {
  config: OrchestratorConfig;
  controller: Pick<TrialController, 'run'>;
  cleanup: Pick<CleanupProtocol, 'run'>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Cells visited from `start`, in order. */
export function* gridCells(config: OrchestratorConfig, start: GridStart): Generator<TrialId> {
  if (start.onlyExperiment !== undefined) {
    yield { trialSet: start.startTrialSet, experiment: start.onlyExperiment };
    return;
  }
  for (let trialSet = start.startTrialSet; trialSet < config.grid.trialSetCount; trialSet++) {
    const first = trialSet === start.startTrialSet ? start.startExperiment : 1;
    for (let experiment = first; experiment <= config.grid.experimentsPerSet; experiment++) {
      yield { trialSet, experiment };
    }
  }
}

/**
 * Walks the trial grid strictly sequentially. A permanently failed cell is recorded and the
 * traversal continues; only cancellation stops it early.
 */
export class GridScheduler {
  constructor(private readonly opts: GridSchedulerOptions) {}

  async run(start: GridStart, signal: AbortSignal): Promise<GridSummary> {
    const { config, controller, cleanup } = this.opts;
    const sleep = this.opts.sleep ?? defaultSleep;
    const summary: GridSummary = { attempted: 0, succeeded: 0, failed: [] };

    let first = true;
    for (const trial of gridCells(config, start)) {
      if (!first) {
        await sleep(config.grid.interCellDelayMs, signal);
      }
      first = false;

      summary.attempted++;
      let outcome: TrialOutcome;
      try {
        outcome = await controller.run(trial, signal);
      } finally {
        await cleanup.run({ owner: trialKey(trial) });
      }

      if (outcome.status === 'Succeeded') {
        summary.succeeded++;
      } else {
        summary.failed.push({ trial, attempts: outcome.attempts, reason: outcome.reason });
      }
    }

    if (summary.failed.length > 0) {
      log.warn(
        {
          attempted: summary.attempted,
          succeeded: summary.succeeded,
          failed: summary.failed.map((f) => `${trialKey(f.trial)} (${f.attempts} attempts): ${f.reason}`),
        },
        'grid finished with permanently failed cells',
      );
    } else {
      log.info({ attempted: summary.attempted, succeeded: summary.succeeded }, 'grid finished');
    }
    return summary;
  }
}
