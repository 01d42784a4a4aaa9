import * as path from 'node:path';

import { createLogger, sleep, StartFailureError } from '@trialgrid/core';

import { processAlive } from '../readiness.js';
import type { ResourceHandle } from '../resource-guard.js';
import type { ClientAssignment } from '../trial-definition.js';
import { clientNamespace, type Phase, type TrialContext } from './context.js';

const log = createLogger('phase.traffic');

function trafficPidFile(ctx: TrialContext, client: string): string {
  return path.join(ctx.config.traffic.pidDir, `traffic_${client}.pid`);
}

/**
 * Launch the generator of the `index`-th client (1-based). A client whose profile is missing
 * is skipped, which yields null.
 */
async function startGenerator(
  ctx: TrialContext,
  assignment: ClientAssignment,
  index: number,
): Promise<ResourceHandle | null> {
  if (!(await ctx.host.fs.exists(assignment.profilePath))) {
    log.warn({ client: assignment.client, profile: assignment.profilePath }, 'traffic profile not found, skipping client');
    return null;
  }

  const namespace = clientNamespace(ctx.config, index);
  const port = ctx.config.traffic.basePort + index;
  const pidFile = trafficPidFile(ctx, assignment.client);
  const handle = await ctx.guard.acquireWithReclaim('pid-file', pidFile, ctx.owner, { signal: ctx.signal });

  const args = ['ip', 'netns', 'exec', namespace, 'bash', assignment.profilePath, String(port)];
  const [command = 'ip', ...rest] = ctx.config.useSudo ? ['sudo', ...args] : args;
  const pid = await ctx.host.processes.spawnDetached(command, rest, {
    logFile: path.join(ctx.definition.dir, `${assignment.client}_traffic.log`),
  });

  if (!(await processAlive(ctx.host.processes, pid).check())) {
    await ctx.guard.release(handle);
    throw new StartFailureError(`traffic generator for ${assignment.client} exited immediately`);
  }
  await ctx.host.fs.writeText(pidFile, `${pid}\n`);
  log.info({ client: assignment.client, namespace, port, pid }, 'traffic generator started');
  return handle;
}

/**
 * TrafficRunning: the previous metrics table is removed, then one generator per assigned client
 * starts inside its client's namespace and the configured run duration elapses. Clients without
 * a profile are skipped. If a launched generator dies at once, those already started are stopped
 * before the phase fails.
 */
export function trafficRunningPhase(): Phase {
  return {
    name: 'TrafficRunning',
    async start(ctx) {
      const { traffic, clients } = ctx.config;
      await ctx.host.fs.remove(ctx.paths.metricsFile);

      const assignments = ctx.definition.conditions.assignments.slice(0, clients.count);
      const handles: ResourceHandle[] = [];
      try {
        for (const [i, assignment] of assignments.entries()) {
          const handle = await startGenerator(ctx, assignment, i + 1);
          if (handle) handles.push(handle);
        }
      } catch (err) {
        for (const handle of handles.reverse()) {
          await ctx.guard.release(handle);
        }
        throw err;
      }

      if (handles.length === 0) {
        log.warn({ conditions: ctx.definition.conditionsFile }, 'no traffic generators started');
        return;
      }

      log.info({ generators: handles.length, durationSec: traffic.durationSec }, 'traffic running');
      await sleep(traffic.durationSec * 1000, ctx.signal);

      for (const handle of handles.reverse()) {
        await ctx.guard.release(handle);
      }
      log.info('traffic duration elapsed');
    },
  };
}
