import { createLogger, describeError, ResourceBusyError, sleep } from '@trialgrid/core';

import type { Host, ResourceKind } from './types.js';

const log = createLogger('resource-guard');

const DEFAULT_RECLAIM_ATTEMPTS = 5;
const DEFAULT_RECLAIM_WAIT_MS = 2_000;

/**
 * Host-side operations for one kind of resource.
 */
export interface ResourceDriver {
  /** True when something on the host currently holds `id`. */
  isBusy(id: string): Promise<boolean>;
  /** Forcefully free `id` from whoever holds it. */
  reclaim(id: string): Promise<void>;
  /** Free `id` after use. Must tolerate `id` already being gone. */
  release(id: string): Promise<void>;
}

export type ResourceDrivers = Record<ResourceKind, ResourceDriver>;

export interface ResourceHandle {
  readonly kind: ResourceKind;
  readonly id: string;
  readonly owner: string;
  readonly seq: number;
}

export interface ReleaseFailure {
  handle: ResourceHandle;
  error: string;
}

function resourceKey(kind: ResourceKind, id: string): string {
  return `${kind}:${id}`;
}

/**
 * Tracks exclusive host resources (ports, namespaces, sessions, PID files) and frees them.
 *
 * At most one live handle exists per (kind, id). Acquisition verifies the host resource is
 * free; `acquireWithReclaim` adds the kill-wait-retry fallback every caller here wants.
 */
export class ResourceGuard {
  private readonly live = new Map<string, ResourceHandle>();
  private nextSeq = 1;

  constructor(
    private readonly drivers: ResourceDrivers,
    private readonly killByPattern: (pattern: string) => Promise<number[]>,
  ) {}

  /**
   * Grant `(kind, id)` to `owner`.
   *
   * @throws ResourceBusyError if a live handle exists or the host reports the resource held
   */
  async acquire(kind: ResourceKind, id: string, owner: string): Promise<ResourceHandle> {
    const key = resourceKey(kind, id);
    const holder = this.live.get(key);
    if (holder) {
      throw new ResourceBusyError(`${key} is already held by ${holder.owner}`);
    }
    if (await this.drivers[kind].isBusy(id)) {
      throw new ResourceBusyError(`${key} is in use on the host`);
    }
    const handle: ResourceHandle = { kind, id, owner, seq: this.nextSeq++ };
    this.live.set(key, handle);
    log.debug({ kind, id, owner }, 'resource acquired');
    return handle;
  }

  /**
   * Acquire, force-reclaiming the resource between attempts.
   *
   * @throws ResourceBusyError once `attempts` acquisitions have failed
   */
  async acquireWithReclaim(
    kind: ResourceKind,
    id: string,
    owner: string,
    opts: { attempts?: number; waitMs?: number; signal?: AbortSignal } = {},
  ): Promise<ResourceHandle> {
    const attempts = opts.attempts ?? DEFAULT_RECLAIM_ATTEMPTS;
    const waitMs = opts.waitMs ?? DEFAULT_RECLAIM_WAIT_MS;
    let lastError: unknown;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      try {
        return await this.acquire(kind, id, owner);
      } catch (err) {
        if (!(err instanceof ResourceBusyError)) throw err;
        lastError = err;
        if (attempt === attempts) break;
        log.warn({ kind, id, attempt, attempts }, 'resource busy, reclaiming');
        try {
          await this.forceReclaim(kind, id);
        } catch (reclaimErr) {
          log.warn({ kind, id, err: describeError(reclaimErr) }, 'reclaim failed');
        }
        await sleep(waitMs, opts.signal);
      }
    }

    throw new ResourceBusyError(
      `Failed to free ${resourceKey(kind, id)} after ${attempts} attempts`,
      'RESOURCE_BUSY',
      { cause: lastError },
    );
  }

  /**
   * Release a handle. Releasing twice, or releasing a handle that was never granted, is a no-op.
   *
   * @returns false if the host-side release failed (the handle is dropped either way)
   */
  async release(handle: ResourceHandle): Promise<boolean> {
    const key = resourceKey(handle.kind, handle.id);
    const current = this.live.get(key);
    if (!current || current.seq !== handle.seq) {
      return true;
    }
    this.live.delete(key);
    try {
      await this.drivers[handle.kind].release(handle.id);
      log.debug({ kind: handle.kind, id: handle.id, owner: handle.owner }, 'resource released');
      return true;
    } catch (err) {
      log.error({ kind: handle.kind, id: handle.id, err: describeError(err) }, 'resource release failed');
      return false;
    }
  }

  /**
   * Release every handle of `owner`, newest first. A failure never stops the remaining releases.
   */
  async releaseAll(owner: string, kind?: ResourceKind): Promise<ReleaseFailure[]> {
    const handles = this.owned(owner)
      .filter((h) => kind === undefined || h.kind === kind)
      .reverse();
    const failures: ReleaseFailure[] = [];
    for (const handle of handles) {
      const ok = await this.release(handle);
      if (!ok) {
        failures.push({ handle, error: `release of ${resourceKey(handle.kind, handle.id)} failed` });
      }
    }
    return failures;
  }

  /** Live handles of `owner` in acquisition order. */
  owned(owner: string): ResourceHandle[] {
    return [...this.live.values()].filter((h) => h.owner === owner).sort((a, b) => a.seq - b.seq);
  }

  /** Owners holding at least one live handle. */
  owners(): string[] {
    return [...new Set([...this.live.values()].map((h) => h.owner))];
  }

  /** Forcefully free a resource on the host and forget any handle for it. */
  async forceReclaim(kind: ResourceKind, id: string): Promise<void> {
    this.live.delete(resourceKey(kind, id));
    await this.drivers[kind].reclaim(id);
  }

  /**
   * Kill every process whose command line matches `pattern`. The only name-pattern kill path.
   */
  async killMatching(pattern: string): Promise<number[]> {
    const killed = await this.killByPattern(pattern);
    if (killed.length > 0) {
      log.info({ pattern, pids: killed }, 'killed processes by pattern');
    }
    return killed;
  }
}

/**
 * Stop the process recorded in `pidFile` (TERM, grace period, KILL) and remove the file.
 */
export async function stopPidFile(host: Pick<Host, 'fs' | 'processes'>, pidFile: string, graceMs: number): Promise<void> {
  if (!(await host.fs.exists(pidFile))) return;
  const pid = Number.parseInt((await host.fs.readText(pidFile)).trim(), 10);
  if (Number.isInteger(pid) && pid > 0 && host.processes.isAlive(pid)) {
    await host.processes.signal(pid, 'SIGTERM');
    await sleep(graceMs);
    if (host.processes.isAlive(pid)) {
      log.warn({ pid, pidFile }, 'process survived SIGTERM, sending SIGKILL');
      await host.processes.signal(pid, 'SIGKILL');
    }
  }
  await host.fs.remove(pidFile);
}

async function pidFileBusy(host: Pick<Host, 'fs' | 'processes'>, pidFile: string): Promise<boolean> {
  if (!(await host.fs.exists(pidFile))) return false;
  const pid = Number.parseInt((await host.fs.readText(pidFile)).trim(), 10);
  return Number.isInteger(pid) && pid > 0 && host.processes.isAlive(pid);
}

async function freePort(host: Pick<Host, 'processes'>, port: string): Promise<void> {
  for (const pid of await host.processes.pidsOnPort(Number(port))) {
    log.info({ port, pid }, 'killing process holding port');
    await host.processes.signal(pid, 'SIGKILL');
  }
}

/** Build a guard whose drivers and pattern kill go through `host`. */
export function createResourceGuard(host: Host, opts: { pidGraceMs: number }): ResourceGuard {
  return new ResourceGuard(createResourceDrivers(host, opts), async (pattern) => {
    const pids = await host.processes.findByPattern(pattern);
    for (const pid of pids) {
      await host.processes.signal(pid, 'SIGKILL');
    }
    return pids;
  });
}

/**
 * Drivers backed by the host adapters.
 */
export function createResourceDrivers(host: Host, opts: { pidGraceMs: number }): ResourceDrivers {
  const deleteNamespace = async (name: string): Promise<void> => {
    if (!(await host.network.listNamespaces()).includes(name)) return;
    await host.network.deleteNamespace(name);
    if ((await host.network.listNamespaces()).includes(name)) {
      throw new Error(`namespace ${name} still exists after deletion`);
    }
  };

  const killSession = async (name: string): Promise<void> => {
    if (await host.sessions.has(name)) {
      await host.sessions.kill(name);
    }
  };

  return {
    port: {
      async isBusy(id) {
        return (await host.processes.pidsOnPort(Number(id))).length > 0;
      },
      reclaim: (id) => freePort(host, id),
      release: (id) => freePort(host, id),
    },
    namespace: {
      async isBusy(id) {
        return (await host.network.listNamespaces()).includes(id);
      },
      reclaim: deleteNamespace,
      release: deleteNamespace,
    },
    session: {
      isBusy: (id) => host.sessions.has(id),
      reclaim: killSession,
      release: killSession,
    },
    'pid-file': {
      isBusy: (id) => pidFileBusy(host, id),
      reclaim: (id) => stopPidFile(host, id, opts.pidGraceMs),
      release: (id) => stopPidFile(host, id, opts.pidGraceMs),
    },
  };
}
