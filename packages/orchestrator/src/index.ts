export { runOrchestrator } from './run.js';
export type { RunOptions, RunResult } from './run.js';

export { GridScheduler, gridCells } from './grid-scheduler.js';
export type { GridStart, GridSummary, GridSchedulerOptions } from './grid-scheduler.js';
export { TrialController } from './trial-controller.js';
export type { TrialControllerOptions } from './trial-controller.js';
export { PhaseRunner } from './phase-runner.js';
export { CleanupProtocol } from './cleanup.js';
export type { CleanupReport, CleanupScope } from './cleanup.js';
export { CancellationHandler, EXIT_FATAL, EXIT_INTERRUPTED, EXIT_OK } from './cancellation.js';
export type { CancellationHandlerOptions, SignalSource } from './cancellation.js';
export { CheckpointStore, RunCheckpoint } from './checkpoint.js';
export { runPreflight } from './preflight.js';

export { ResourceGuard, createResourceGuard, createResourceDrivers, stopPidFile } from './resource-guard.js';
export type { ReleaseFailure, ResourceDriver, ResourceDrivers, ResourceHandle } from './resource-guard.js';
export { poll } from './health-poller.js';
export type { PollOptions } from './health-poller.js';
export { allOf, fileExists, interfaceWithAddress, logContains, portListening, processAlive, tailLines } from './readiness.js';
export { parseTimestamp, validateMetricsTable } from './output-validation.js';
export { loadTrialDefinition, parseConditions, parseSubscribers, trialDirectory } from './trial-definition.js';
export type { ClientAssignment, ClientIdentity, Conditions, TrialDefinition } from './trial-definition.js';

export * from './phases/index.js';

export { createHost } from './host.js';
export { createComposeService } from './docker-compose-service.js';

export { trialKey } from './types.js';
export type {
  AttemptOutcome,
  CommandExecutor,
  ExecOptions,
  ExecResult,
  FileSystem,
  Host,
  ManagedService,
  NetworkHost,
  ProcessTable,
  ReadinessPredicate,
  ResourceKind,
  SessionManager,
  TrialAttempt,
  TrialOutcome,
} from './types.js';
