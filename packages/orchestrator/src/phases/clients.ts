import * as path from 'node:path';

import { createLogger, describeError, renderTemplate, StartFailureError, withRetry } from '@trialgrid/core';

import { poll } from '../health-poller.js';
import { allOf, fileExists, logContains } from '../readiness.js';
import type { ClientIdentity } from '../trial-definition.js';
import { clientNamespace, fanOut, type Phase, type TrialContext } from './context.js';

const log = createLogger('phase.clients');

/** Transport ports of the `index`-th client (1-based): groups of three, 1000 apart. */
export function clientPorts(index: number): { txPort: number; rxPort: number } {
  const group = Math.floor((index - 1) / 3);
  const offset = ((index - 1) % 3) * 100;
  return { txPort: 2101 + group * 1000 + offset, rxPort: 2100 + group * 1000 + offset };
}

function clientIndexes(ctx: TrialContext): number[] {
  return Array.from({ length: ctx.config.clients.count }, (_, i) => i + 1);
}

function stdoutLog(ctx: TrialContext, namespace: string): string {
  return path.join(ctx.paths.clientLogDir, `${namespace}_stdout.log`);
}

async function startClient(ctx: TrialContext, index: number, identity: ClientIdentity, signal: AbortSignal) {
  const { clients, inputs } = ctx.config;
  const namespace = clientNamespace(ctx.config, index);
  const { txPort, rxPort } = clientPorts(index);

  await ctx.guard.acquireWithReclaim('session', namespace, ctx.owner, { signal });

  const command = renderTemplate(clients.command, {
    clientConfig: inputs.clientConfig,
    namespace,
    txPort,
    rxPort,
    imsi: identity.imsi,
    key: identity.key,
    imei: identity.imei,
    logDir: ctx.paths.clientLogDir,
  });

  await withRetry(
    async () => {
      try {
        await ctx.host.sessions.start(namespace, command);
      } catch (err) {
        throw new StartFailureError(`client ${namespace} failed to start`, 'START_FAILURE', { cause: err });
      }
    },
    {
      maxAttempts: clients.startAttempts,
      initialDelayMs: clients.startDelayMs,
      signal,
      onRetry: async ({ attempt, delayMs, error }) => {
        log.warn({ client: namespace, attempt, delayMs, err: describeError(error) }, 'client start failed, retrying');
        if (await ctx.host.sessions.has(namespace)) {
          await ctx.host.sessions.kill(namespace);
        }
      },
    },
  );
  log.info({ client: namespace, imsi: identity.imsi, txPort, rxPort }, 'client started');
}

/**
 * ClientsAttached: every client session is started concurrently. One failed start aborts the
 * others.
 */
export function clientsAttachedPhase(): Phase {
  return {
    name: 'ClientsAttached',
    async start(ctx) {
      const count = ctx.config.clients.count;
      if (ctx.identities.length < count) {
        throw new StartFailureError(
          `subscriber table has ${ctx.identities.length} entries, ${count} clients are configured`,
        );
      }
      await ctx.host.fs.mkdirp(ctx.paths.clientLogDir);

      await fanOut(clientIndexes(ctx), ctx.signal, async (index, signal) => {
        const identity = ctx.identities[index - 1];
        if (!identity) {
          throw new StartFailureError(`no subscriber identity for client ${index}`);
        }
        await startClient(ctx, index, identity, signal);
      });
    },
  };
}

async function waitForConnection(ctx: TrialContext, index: number, signal: AbortSignal): Promise<void> {
  const { clients, polling } = ctx.config;
  const namespace = clientNamespace(ctx.config, index);
  const file = stdoutLog(ctx, namespace);

  await poll(fileExists(ctx.host.fs, file), {
    intervalMs: polling.logIntervalMs,
    timeoutMs: clients.logWaitMs,
    signal,
  });
  await poll(
    allOf(logContains(ctx.host.fs, file, [clients.sessionMarker]), logContains(ctx.host.fs, file, [clients.controlMarker])),
    { intervalMs: polling.logIntervalMs, timeoutMs: clients.connectTimeoutMs, signal },
  );
  log.info({ client: namespace }, 'client connected');
}

async function installDefaultRoute(ctx: TrialContext, namespace: string): Promise<void> {
  const { gateway, tunnelDevice } = ctx.config.clients;
  try {
    if (!(await ctx.host.network.hasLink(namespace, tunnelDevice))) {
      log.warn({ namespace, device: tunnelDevice }, 'tunnel device not found');
      return;
    }
    await ctx.host.network.addDefaultRoute(namespace, gateway, tunnelDevice);
  } catch (err) {
    log.warn({ namespace, err: describeError(err) }, 'failed to add default route');
  }
}

/**
 * ClientsConnected: each client's stdout log must appear and then report both an established
 * data session and a completed control reconfiguration. Default routes through the tunnel are
 * then added best effort.
 */
export function clientsConnectedPhase(): Phase {
  return {
    name: 'ClientsConnected',
    async start(ctx) {
      await fanOut(clientIndexes(ctx), ctx.signal, (index, signal) => waitForConnection(ctx, index, signal));
      for (const index of clientIndexes(ctx)) {
        await installDefaultRoute(ctx, clientNamespace(ctx.config, index));
      }
    },
  };
}
