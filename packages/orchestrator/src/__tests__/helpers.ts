import * as path from 'node:path';

import { OrchestratorConfigSchema, type OrchestratorConfig } from '@trialgrid/core';

import { createResourceGuard } from '../resource-guard.js';
import { emptyAttemptState, trialPaths, type TrialContext } from '../phases/context.js';
import { parseConditions, parseSubscribers } from '../trial-definition.js';
import { trialKey } from '../types.js';
import type {
  CommandExecutor,
  ExecOptions,
  ExecResult,
  FileSystem,
  Host,
  ManagedService,
  NetworkHost,
  ProcessTable,
  ReadinessPredicate,
  SessionManager,
} from '../types.js';

// ---------------------------------------------------------------------------
// File system
// ---------------------------------------------------------------------------

export class FakeFileSystem implements FileSystem {
  readonly files = new Map<string, string>();
  readonly dirs = new Set<string>(['/']);

  async exists(p: string): Promise<boolean> {
    return this.files.has(p) || this.dirs.has(p);
  }

  async readText(p: string): Promise<string> {
    const content = this.files.get(p);
    if (content === undefined) throw new Error(`ENOENT: ${p}`);
    return content;
  }

  async writeText(p: string, content: string): Promise<void> {
    this.put(p, content);
  }

  async rename(from: string, to: string): Promise<void> {
    const content = await this.readText(from);
    this.files.delete(from);
    this.files.set(to, content);
  }

  async remove(p: string): Promise<void> {
    this.files.delete(p);
    this.dirs.delete(p);
    for (const file of [...this.files.keys()]) {
      if (file.startsWith(`${p}/`)) this.files.delete(file);
    }
  }

  async mkdirp(p: string): Promise<void> {
    let current = p;
    while (current !== '/' && current !== '.') {
      this.dirs.add(current);
      current = path.dirname(current);
    }
  }

  async list(dir: string): Promise<string[]> {
    const names = new Set<string>();
    for (const entry of [...this.files.keys(), ...this.dirs]) {
      if (entry !== dir && path.dirname(entry) === dir) names.add(path.basename(entry));
    }
    return [...names].sort();
  }

  /** Write a file, creating its parent directories. */
  put(p: string, content: string): void {
    this.files.set(p, content);
    let current = path.dirname(p);
    while (current !== '/' && current !== '.') {
      this.dirs.add(current);
      current = path.dirname(current);
    }
  }
}

// ---------------------------------------------------------------------------
// Processes
// ---------------------------------------------------------------------------

export interface SpawnRecord {
  command: string;
  args: string[];
  logFile: string;
  pid: number;
}

export class FakeProcessTable implements ProcessTable {
  readonly alive = new Set<number>();
  readonly commandLines = new Map<number, string>();
  readonly portHolders = new Map<number, number[]>();
  readonly spawned: SpawnRecord[] = [];
  readonly signals: Array<{ pid: number; signal: NodeJS.Signals }> = [];
  /** Processes spawned while this is true exit immediately. */
  spawnDies = false;
  onSpawn: (record: SpawnRecord) => void = () => {};
  /** PIDs that ignore SIGTERM. */
  readonly ignoresTerm = new Set<number>();
  private nextPid = 1000;

  /** Register a running process, optionally holding ports. */
  start(commandLine: string, ports: number[] = []): number {
    const pid = this.nextPid++;
    this.alive.add(pid);
    this.commandLines.set(pid, commandLine);
    for (const port of ports) {
      this.portHolders.set(port, [...(this.portHolders.get(port) ?? []), pid]);
    }
    return pid;
  }

  async spawnDetached(command: string, args: string[], options: { logFile: string }): Promise<number> {
    const pid = this.start([command, ...args].join(' '));
    if (this.spawnDies) this.alive.delete(pid);
    const record = { command, args, logFile: options.logFile, pid };
    this.spawned.push(record);
    this.onSpawn(record);
    return pid;
  }

  isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  async signal(pid: number, signal: NodeJS.Signals): Promise<void> {
    this.signals.push({ pid, signal });
    if (signal === 'SIGTERM' && this.ignoresTerm.has(pid)) return;
    this.alive.delete(pid);
    for (const [port, holders] of this.portHolders) {
      this.portHolders.set(
        port,
        holders.filter((holder) => holder !== pid),
      );
    }
  }

  async findByPattern(pattern: string): Promise<number[]> {
    const re = new RegExp(pattern);
    return [...this.alive].filter((pid) => re.test(this.commandLines.get(pid) ?? ''));
  }

  async pidsOnPort(port: number): Promise<number[]> {
    return (this.portHolders.get(port) ?? []).filter((pid) => this.alive.has(pid));
  }
}

// ---------------------------------------------------------------------------
// Sessions
// ---------------------------------------------------------------------------

export class FakeSessions implements SessionManager {
  readonly live = new Map<string, string>();
  readonly started: Array<{ name: string; command: string }> = [];
  onStart: (name: string, command: string) => void = () => {};
  /** Number of upcoming starts of each session name that fail. */
  readonly failures = new Map<string, number>();

  async has(name: string): Promise<boolean> {
    return this.live.has(name);
  }

  async start(name: string, command: string): Promise<void> {
    const remaining = this.failures.get(name) ?? 0;
    if (remaining > 0) {
      this.failures.set(name, remaining - 1);
      throw new Error(`duplicate session: ${name}`);
    }
    this.live.set(name, command);
    this.started.push({ name, command });
    this.onStart(name, command);
  }

  async kill(name: string): Promise<void> {
    this.live.delete(name);
  }

  async list(): Promise<string[]> {
    return [...this.live.keys()];
  }
}

// ---------------------------------------------------------------------------
// Network
// ---------------------------------------------------------------------------

export class FakeNetwork implements NetworkHost {
  readonly namespaces = new Set<string>();
  readonly routes = new Set<string>();
  readonly addresses = new Map<string, string>([['10.53.1.1', 'br-trial']]);
  readonly defaultRoutes: string[] = [];
  /** Namespaces that survive deletion. */
  readonly stuck = new Set<string>();

  async listNamespaces(): Promise<string[]> {
    return [...this.namespaces];
  }

  async addNamespace(name: string): Promise<void> {
    if (this.namespaces.has(name)) throw new Error(`namespace ${name} exists`);
    this.namespaces.add(name);
  }

  async deleteNamespace(name: string): Promise<void> {
    if (!this.stuck.has(name)) this.namespaces.delete(name);
  }

  async hasRoute(destination: string, via: string): Promise<boolean> {
    return this.routes.has(`${destination} via ${via}`);
  }

  async addRoute(destination: string, via: string): Promise<void> {
    this.routes.add(`${destination} via ${via}`);
  }

  async deleteRoute(destination: string, via: string): Promise<void> {
    this.routes.delete(`${destination} via ${via}`);
  }

  async interfaceWithAddress(address: string): Promise<string | null> {
    return this.addresses.get(address) ?? null;
  }

  async hasLink(namespace: string): Promise<boolean> {
    return this.namespaces.has(namespace);
  }

  async addDefaultRoute(namespace: string, gateway: string, device: string): Promise<void> {
    this.defaultRoutes.push(`${namespace}: default via ${gateway} dev ${device}`);
  }
}

// ---------------------------------------------------------------------------
// Managed services
// ---------------------------------------------------------------------------

export class FakeService implements ManagedService {
  startCalls = 0;
  stopCalls = 0;
  forceStopCalls = 0;
  running = false;
  ready = true;
  stopFails = false;
  /** Number of upcoming starts that fail. */
  startFailures = 0;
  readonly startEnvs: Array<Record<string, string>> = [];
  readonly detached: string[] = [];
  onStart: (call: number) => void = () => {};

  constructor(readonly name: string) {}

  async start(env: Record<string, string> = {}): Promise<void> {
    this.startCalls++;
    this.startEnvs.push(env);
    if (this.startFailures > 0) {
      this.startFailures--;
      throw new Error(`${this.name} compose up failed`);
    }
    this.running = true;
    this.onStart(this.startCalls);
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    if (this.stopFails) throw new Error(`${this.name} stop timed out`);
    this.running = false;
  }

  async forceStop(): Promise<void> {
    this.forceStopCalls++;
    this.running = false;
  }

  async execDetached(shellCommand: string): Promise<boolean> {
    this.detached.push(shellCommand);
    return this.running;
  }

  readiness(): ReadinessPredicate {
    return {
      describe: `${this.name} ready`,
      check: async () => this.running && this.ready,
      diagnostics: async () => `${this.name} running=${this.running}`,
    };
  }
}

// ---------------------------------------------------------------------------
// Command executor
// ---------------------------------------------------------------------------

export type ExecHandler = (command: string, args: string[], options?: ExecOptions) => ExecResult | undefined;

export class FakeExecutor implements CommandExecutor {
  readonly calls: Array<{ command: string; args: string[]; options?: ExecOptions }> = [];
  handler: ExecHandler = () => undefined;

  async exec(command: string, args: string[], options?: ExecOptions): Promise<ExecResult> {
    this.calls.push({ command, args, options });
    return this.handler(command, args, options) ?? { stdout: '', stderr: '', exitCode: 0 };
  }
}

// ---------------------------------------------------------------------------
// Host
// ---------------------------------------------------------------------------

export interface FakeHost extends Host {
  executor: FakeExecutor;
  processes: FakeProcessTable;
  fs: FakeFileSystem;
  sessions: FakeSessions;
  network: FakeNetwork;
  services: { controlPlane: FakeService; core: FakeService };
}

export function createFakeHost(): FakeHost {
  return {
    executor: new FakeExecutor(),
    processes: new FakeProcessTable(),
    fs: new FakeFileSystem(),
    sessions: new FakeSessions(),
    network: new FakeNetwork(),
    services: { controlPlane: new FakeService('control-plane'), core: new FakeService('core') },
  };
}

// ---------------------------------------------------------------------------
// Configuration and trial fixtures
// ---------------------------------------------------------------------------

export const RADIO_CORE_MARKER = 'N2: Connection to AMF established';
export const RADIO_CONTROL_MARKER = 'E2AP: connection to RIC accepted';
export const CLIENT_SESSION_MARKER = 'PDU Session Establishment successful. IP: 10.45.1.2';
export const CLIENT_CONTROL_MARKER = 'RRC NR reconfiguration successful';

/**
 * A config with millisecond timings. Radio and client commands render to the log paths they
 * would write, which lets the fake sessions produce their logs. Tests adjust the returned
 * object directly.
 */
export function testConfig(): OrchestratorConfig {
  const service = (name: string, filter: string) => ({
    name,
    composeDir: `/srv/${name}`,
    readiness: { type: 'health-status' as const, container: `${name}-main` },
    readyTimeoutMs: 20,
    startAttempts: 3,
    startDelayMs: 0,
    stopTimeoutMs: 50,
    forceStopFilter: filter,
  });

  return OrchestratorConfigSchema.parse({
    stateFile: '/state/checkpoint.json',
    useSudo: false,
    inputs: { subscriberFile: '/inputs/ue.csv', radioConfig: '/inputs/gnb.yaml', clientConfig: '/inputs/ue.conf' },
    grid: { baseDir: '/trials', trialSetCount: 2, experimentsPerSet: 2, interCellDelayMs: 0 },
    retry: { maxRetries: 3, retryDelayMs: 0 },
    services: { controlPlane: service('control-plane', 'ric'), core: service('core', 'open5gs') },
    radio: {
      command: '{logDir}',
      coreMarker: RADIO_CORE_MARKER,
      controlMarker: RADIO_CONTROL_MARKER,
      readyTimeoutMs: 30,
      startDelayMs: 0,
    },
    clients: {
      command: '{logDir}/{namespace}_stdout.log',
      sessionMarker: CLIENT_SESSION_MARKER,
      controlMarker: CLIENT_CONTROL_MARKER,
      connectTimeoutMs: 30,
      logWaitMs: 30,
      startDelayMs: 0,
    },
    network: { bridgeTimeoutMs: 30 },
    scenario: { pidWaitMs: 30, stopGraceMs: 0 },
    traffic: { durationSec: 0.01 },
    polling: { serviceIntervalMs: 1, logIntervalMs: 1 },
    cleanup: { forceExitAfterMs: 5_000 },
  });
}

export const TRIAL_DIR = '/trials/trialset0/exp1';

const SUBSCRIBERS =
  'ue1,001010000000001,test-secret-1,350000000000001\n' +
  'ue2,001010000000002,test-secret-2,350000000000002\n' +
  'ue3,001010000000003,test-secret-3,350000000000003\n';

const CONDITIONS =
  'UE,iperf_path,delay_ms\nUE1,/profiles/ue1.sh,10\nUE2,/profiles/ue2.sh,20\nUE3,/profiles/ue3.sh,30\n';

/** Metrics table spanning the 0.01 s traffic duration of {@link testConfig}. */
export const HEALTHY_METRICS = 'Timestamp,ue,dl_mbps\n1000,ue1,5.0\n1000.005,ue2,4.0\n';

/** Lay down the run inputs and one trial directory per cell. */
export function seedInputs(host: FakeHost, cells: Array<[number, number]> = [[0, 1]]): void {
  host.fs.put('/inputs/ue.csv', SUBSCRIBERS);
  host.fs.put('/inputs/gnb.yaml', 'gnb: {}\n');
  host.fs.put('/inputs/ue.conf', '[rf]\n');
  host.fs.put('/profiles/ue1.sh', '#!/bin/bash\n');
  host.fs.put('/profiles/ue2.sh', '#!/bin/bash\n');
  host.fs.put('/profiles/ue3.sh', '#!/bin/bash\n');
  for (const [trialSet, experiment] of cells) {
    const dir = `/trials/trialset${trialSet}/exp${experiment}`;
    host.fs.put(`${dir}/conditions.csv`, CONDITIONS);
    host.fs.put(`${dir}/run_scenario.sh`, '#!/bin/bash\n');
  }
}

/**
 * Make every start action produce what its readiness gate looks for: radio and client logs
 * with their markers, a live scenario process recording its PID, and a metrics table in the
 * trial directory once traffic generators run.
 */
export function simulateHealthyHost(host: FakeHost, config: OrchestratorConfig): void {
  host.sessions.onStart = (name, command) => {
    if (name === config.radio.sessionName) {
      host.fs.put(`${command}/${config.radio.name}.log`, `${RADIO_CORE_MARKER}\n${RADIO_CONTROL_MARKER}\n`);
    } else {
      host.fs.put(command, `Attaching UE...\n${CLIENT_SESSION_MARKER}\n${CLIENT_CONTROL_MARKER}\n`);
    }
  };
  host.executor.handler = (command, args) => {
    if (command === 'bash' && args[0]?.endsWith(config.scenario.script)) {
      const pid = host.processes.start('python3 channel_scenario.py');
      host.fs.put(config.scenario.pidFile, `${pid}\n`);
    }
    return undefined;
  };
  host.processes.onSpawn = ({ args, logFile }) => {
    if (args.includes('netns')) {
      host.fs.put(path.join(path.dirname(logFile), config.validation.metricsPath), HEALTHY_METRICS);
    }
  };
}

/** Context of attempt 1 of trial (0, 1), as the controller would build it. */
export function testContext(host: FakeHost, config: OrchestratorConfig, signal = new AbortController().signal): TrialContext {
  const trial = { trialSet: 0, experiment: 1 };
  return {
    trial,
    owner: trialKey(trial),
    attempt: 1,
    definition: {
      trial,
      dir: TRIAL_DIR,
      conditionsFile: `${TRIAL_DIR}/conditions.csv`,
      scenarioScript: `${TRIAL_DIR}/${config.scenario.script}`,
      conditions: parseConditions(CONDITIONS),
    },
    identities: parseSubscribers(SUBSCRIBERS),
    config,
    host,
    guard: createResourceGuard(host, { pidGraceMs: 0 }),
    signal,
    paths: trialPaths(config, TRIAL_DIR),
    state: emptyAttemptState(),
  };
}
