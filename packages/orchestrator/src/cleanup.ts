import * as path from 'node:path';

import { createLogger, describeError, type OrchestratorConfig } from '@trialgrid/core';

import { clientNamespace } from './phases/context.js';
import type { ReleaseFailure, ResourceGuard } from './resource-guard.js';
import type { Host } from './types.js';

const log = createLogger('cleanup');

export interface CleanupScope {
  /** Trial whose remaining handles are released. All owners when omitted. */
  owner?: string;
  /** Trial directory whose per-attempt log artifacts are removed. */
  trialDir?: string;
}

export interface CleanupReport {
  failedSteps: string[];
  releaseFailures: ReleaseFailure[];
}

/**
 * The one teardown path, shared by attempt end, post-trial cleanup and cancellation.
 *
 * Nine ordered steps, each isolated: a failing step is logged and the next one still runs.
 * Every step tolerates its target already being gone, so the protocol can run any number of
 * times. Overlapping calls join the run already in flight.
 */
export class CleanupProtocol {
  private inFlight: Promise<CleanupReport> | null = null;

  constructor(
    private readonly host: Host,
    private readonly guard: ResourceGuard,
    private readonly config: OrchestratorConfig,
  ) {}

  run(scope: CleanupScope = {}): Promise<CleanupReport> {
    if (!this.inFlight) {
      this.inFlight = this.execute(scope).finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  private async execute(scope: CleanupScope): Promise<CleanupReport> {
    const failedSteps: string[] = [];
    const step = async (name: string, fn: () => Promise<void>): Promise<void> => {
      log.info({ step: name }, 'cleanup step');
      try {
        await fn();
      } catch (err) {
        failedSteps.push(name);
        log.error({ step: name, err: describeError(err) }, 'cleanup step failed');
      }
    };

    await step('traffic', () => this.stopTraffic());
    await step('scenario', () => this.guard.forceReclaim('pid-file', this.config.scenario.pidFile));
    await step('sessions', () => this.killSessions());
    await step('services', () => this.stopServices());
    await step('namespaces', () => this.removeNamespaces());
    await step('processes', () => this.killLingering());
    await step('ports', () => this.freePorts());
    await step('temp-files', () => this.removeTempFiles(scope.trialDir));
    await step('route', () => this.removeRoute());

    const owners = scope.owner !== undefined ? [scope.owner] : this.guard.owners();
    const releaseFailures: ReleaseFailure[] = [];
    for (const owner of owners) {
      releaseFailures.push(...(await this.guard.releaseAll(owner)));
    }

    if (failedSteps.length > 0 || releaseFailures.length > 0) {
      log.warn({ failedSteps, releaseFailures: releaseFailures.length }, 'cleanup finished with errors');
    } else {
      log.info('cleanup complete');
    }
    return { failedSteps, releaseFailures };
  }

  private async stopTraffic(): Promise<void> {
    const { pidDir, processPattern } = this.config.traffic;
    for (const entry of await this.host.fs.list(pidDir)) {
      if (/^traffic_.*\.pid$/.test(entry)) {
        await this.guard.forceReclaim('pid-file', path.join(pidDir, entry));
      }
    }
    await this.guard.killMatching(processPattern);
  }

  private async killSessions(): Promise<void> {
    const prefixes = this.config.cleanup.sessionPrefixes;
    for (const session of await this.host.sessions.list()) {
      if (prefixes.some((prefix) => session.startsWith(prefix))) {
        await this.guard.forceReclaim('session', session);
      }
    }
  }

  private async stopServices(): Promise<void> {
    const slots = ['controlPlane', 'core'] as const;
    const results = await Promise.allSettled(
      slots.map(async (slot) => {
        const service = this.host.services[slot];
        try {
          await service.stop(this.config.services[slot].stopTimeoutMs);
        } catch (err) {
          log.warn({ service: service.name, err: describeError(err) }, 'orderly stop failed, forcing');
          await service.forceStop();
        }
      }),
    );
    const failed = results.filter((r) => r.status === 'rejected');
    if (failed.length > 0) {
      throw new Error(`${failed.length} service(s) could not be stopped`);
    }
  }

  private async removeNamespaces(): Promise<void> {
    const failures: string[] = [];
    for (let i = 1; i <= this.config.clients.count; i++) {
      const name = clientNamespace(this.config, i);
      try {
        await this.guard.forceReclaim('namespace', name);
      } catch (err) {
        failures.push(`${name}: ${describeError(err)}`);
      }
    }
    if (failures.length > 0) {
      throw new Error(`namespaces not removed: ${failures.join('; ')}`);
    }
  }

  private async killLingering(): Promise<void> {
    for (const pattern of this.config.cleanup.processPatterns) {
      await this.guard.killMatching(pattern);
    }
    const sink = this.config.radio.metricsSink;
    if (sink) {
      await this.guard.forceReclaim('pid-file', sink.pidFile);
    }
  }

  private async freePorts(): Promise<void> {
    for (const port of this.config.radio.cleanupPorts) {
      await this.guard.forceReclaim('port', String(port));
    }
  }

  private async removeTempFiles(trialDir: string | undefined): Promise<void> {
    for (const { dir, patterns } of this.config.cleanup.tempFiles) {
      const matchers = patterns.map((p) => new RegExp(p));
      for (const entry of await this.host.fs.list(dir)) {
        if (matchers.some((m) => m.test(entry))) {
          await this.host.fs.remove(path.join(dir, entry));
        }
      }
    }
    if (trialDir === undefined) return;
    for (const logDir of this.config.cleanup.trialLogDirs) {
      const dir = path.join(trialDir, logDir);
      for (const entry of await this.host.fs.list(dir)) {
        if (entry.endsWith('.log')) {
          await this.host.fs.remove(path.join(dir, entry));
        }
      }
    }
  }

  private async removeRoute(): Promise<void> {
    const { destination, via } = this.config.network.route;
    if (await this.host.network.hasRoute(destination, via)) {
      await this.host.network.deleteRoute(destination, via);
      log.info({ destination, via }, 'route removed');
    }
  }
}
