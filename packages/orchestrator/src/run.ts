import { createLogger, type OrchestratorConfig } from '@trialgrid/core';

import { CancellationHandler, type SignalSource } from './cancellation.js';
import { CheckpointStore, RunCheckpoint } from './checkpoint.js';
import { CleanupProtocol } from './cleanup.js';
import { GridScheduler, type GridStart, type GridSummary } from './grid-scheduler.js';
import { createHost } from './host.js';
import type { Phase } from './phases/context.js';
import { runPreflight } from './preflight.js';
import { createResourceGuard } from './resource-guard.js';
import { TrialController } from './trial-controller.js';
import type { Host } from './types.js';

const log = createLogger('run');

export interface RunOptions {
  config: OrchestratorConfig;
  start: GridStart;
  /** Host adapters; the real host when omitted. */
  host?: Host;
  phases?: Phase[];
  signals?: SignalSource;
  exit?: (code: number) => void;
  /** Sleep used between trial attempts and between cells. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RunResult {
  exitCode: number;
  summary: GridSummary | null;
  checkpoint: RunCheckpoint;
}

/**
 * Run the grid from `start` under signal handling: preflight, then every cell, then the final
 * cleanup, which runs on every exit path.
 */
export async function runOrchestrator(opts: RunOptions): Promise<RunResult> {
  const { config } = opts;
  const host = opts.host ?? createHost(config);
  const guard = createResourceGuard(host, { pidGraceMs: config.scenario.stopGraceMs });
  const cleanup = new CleanupProtocol(host, guard, config);
  const checkpoint = new RunCheckpoint(new CheckpointStore(host.fs, config.stateFile));
  const controller = new TrialController({
    config,
    host,
    guard,
    checkpoint,
    cleanup,
    phases: opts.phases,
    sleep: opts.sleep,
  });
  const scheduler = new GridScheduler({ config, controller, cleanup, sleep: opts.sleep });
  const handler = new CancellationHandler({
    forceExitAfterMs: config.cleanup.forceExitAfterMs,
    signals: opts.signals,
    exit: opts.exit,
  });

  let summary: GridSummary | null = null;
  const exitCode = await handler.run(
    async (signal) => {
      await runPreflight(host.fs, config);
      log.info({ ...opts.start, baseDir: config.grid.baseDir }, 'starting grid');
      summary = await scheduler.run(opts.start, signal);
    },
    async () => {
      await cleanup.run();
    },
  );

  log.info({ exitCode }, 'run finished');
  return { exitCode, summary, checkpoint };
}
