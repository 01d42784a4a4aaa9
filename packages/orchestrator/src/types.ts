import type { PhaseName, TrialId } from '@trialgrid/core';

/**
 * Result of running a command to completion.
 */
export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ExecOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeoutMs?: number;
}

/**
 * Runs a command and waits for it. Never throws for a non-zero exit; reports it in `exitCode`.
 */
export interface CommandExecutor {
  exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult>;
}

/**
 * Long-running child processes and host-wide process lookup.
 */
export interface ProcessTable {
  /** Start a detached process writing stdout/stderr to `logFile`. Resolves with its PID. */
  spawnDetached(command: string, args: string[], options: { logFile: string; cwd?: string }): Promise<number>;
  isAlive(pid: number): boolean;
  /** Send `signal` to `pid`. A process that is already gone is not an error. */
  signal(pid: number, signal: NodeJS.Signals): Promise<void>;
  /** PIDs whose full command line matches `pattern`. */
  findByPattern(pattern: string): Promise<number[]>;
  /** PIDs holding TCP or UDP `port`. */
  pidsOnPort(port: number): Promise<number[]>;
}

export interface FileSystem {
  exists(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  /** Remove a file or directory tree. Missing paths are ignored. */
  remove(path: string): Promise<void>;
  mkdirp(path: string): Promise<void>;
  /** Entry names in `dir`, or an empty list when it does not exist. */
  list(dir: string): Promise<string[]>;
}

/**
 * Named terminal sessions (tmux) hosting the radio node and client processes.
 */
export interface SessionManager {
  has(name: string): Promise<boolean>;
  start(name: string, shellCommand: string): Promise<void>;
  kill(name: string): Promise<void>;
  list(): Promise<string[]>;
}

/**
 * Host networking: namespaces, routes and interfaces.
 */
export interface NetworkHost {
  listNamespaces(): Promise<string[]>;
  addNamespace(name: string): Promise<void>;
  deleteNamespace(name: string): Promise<void>;
  hasRoute(destination: string, via: string): Promise<boolean>;
  addRoute(destination: string, via: string): Promise<void>;
  deleteRoute(destination: string, via: string): Promise<void>;
  /** Name of the interface carrying `address`, or null. */
  interfaceWithAddress(address: string): Promise<string | null>;
  hasLink(namespace: string, device: string): Promise<boolean>;
  addDefaultRoute(namespace: string, gateway: string, device: string): Promise<void>;
}

/**
 * A readiness check gating a phase transition. `check` must not change host state.
 */
export interface ReadinessPredicate {
  describe: string;
  check(): Promise<boolean>;
  /** Context to surface when the predicate times out (a log tail, a status string). */
  diagnostics?(): Promise<string>;
}

/**
 * One of the two major subsystems, treated as an opaque start/stop/health box.
 */
export interface ManagedService {
  readonly name: string;
  /**
   * Bring the service up; `env` is added to the start command's environment.
   *
   * @throws StartFailureError when the start command fails
   */
  start(env?: Record<string, string>): Promise<void>;
  /** Orderly stop bounded by `timeoutMs`. Rejects on failure or timeout. */
  stop(timeoutMs: number): Promise<void>;
  /** Stop every container matching the service's name filter. */
  forceStop(): Promise<void>;
  /** Run a detached command inside the service. Resolves false if it could not be started. */
  execDetached(shellCommand: string): Promise<boolean>;
  readiness(): ReadinessPredicate;
}

/**
 * Everything the orchestrator touches on the host.
 */
export interface Host {
  executor: CommandExecutor;
  processes: ProcessTable;
  fs: FileSystem;
  sessions: SessionManager;
  network: NetworkHost;
  services: {
    controlPlane: ManagedService;
    core: ManagedService;
  };
}

/** Kinds of host-exclusive resources tracked by the ResourceGuard. */
export type ResourceKind = 'port' | 'namespace' | 'session' | 'pid-file';

/** Outcome of one execution of a trial. */
export type AttemptOutcome = 'success' | 'failed-phase' | 'timed-out';

export interface TrialAttempt {
  attempt: number;
  startedAt: string;
  endedAt: string;
  /** Last phase entered during the attempt. */
  finalPhase: PhaseName | null;
  outcome: AttemptOutcome;
  reason?: string;
}

export type TrialOutcome =
  | { status: 'Succeeded'; trial: TrialId; attempts: number; history: TrialAttempt[] }
  | {
      status: 'PermanentlyFailed';
      trial: TrialId;
      attempts: number;
      phase: PhaseName | null;
      reason: string;
      history: TrialAttempt[];
    };

/** Human-readable key for a trial, also used as the resource owner. */
export function trialKey(trial: TrialId): string {
  return `trialset${trial.trialSet}/exp${trial.experiment}`;
}
