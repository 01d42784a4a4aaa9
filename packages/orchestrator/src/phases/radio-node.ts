import * as path from 'node:path';

import { createLogger, describeError, renderTemplate, StartFailureError, withRetry } from '@trialgrid/core';

import { poll } from '../health-poller.js';
import { logContains, portListening } from '../readiness.js';
import type { Phase, TrialContext } from './context.js';

const log = createLogger('phase.radio-node');

/**
 * Start the radio node's metrics sink: its port and PID file are reclaimed first, then the sink
 * must bind the port before the node starts.
 */
async function startMetricsSink(ctx: TrialContext): Promise<void> {
  const { radio, polling } = ctx.config;
  const sink = radio.metricsSink;
  if (!sink) return;

  await ctx.guard.acquireWithReclaim('port', String(sink.port), ctx.owner, { signal: ctx.signal });
  await ctx.guard.acquireWithReclaim('pid-file', sink.pidFile, ctx.owner, { signal: ctx.signal });

  const command = renderTemplate(sink.command, {
    port: sink.port,
    logDir: ctx.paths.radioLogDir,
    name: radio.name,
  });
  const pid = await ctx.host.processes.spawnDetached('sh', ['-c', command], {
    logFile: path.join(ctx.paths.radioLogDir, 'metrics_sink.log'),
  });
  await ctx.host.fs.writeText(sink.pidFile, `${pid}\n`);
  log.info({ pid, port: sink.port }, 'metrics sink started');

  await poll(portListening(ctx.host.processes, sink.port), {
    intervalMs: polling.logIntervalMs,
    timeoutMs: sink.readyTimeoutMs,
    signal: ctx.signal,
  });
}

/**
 * RadioNodeUp: every radio port must be free before the node starts, and the node is ready only
 * once it reports attachment to both the core network and the control plane.
 */
export function radioNodeUpPhase(): Phase {
  return {
    name: 'RadioNodeUp',
    async start(ctx) {
      const { radio, inputs } = ctx.config;
      await ctx.host.fs.mkdirp(ctx.paths.radioLogDir);
      await startMetricsSink(ctx);

      for (const port of radio.ports) {
        await ctx.guard.acquireWithReclaim('port', String(port), ctx.owner, { signal: ctx.signal });
      }
      log.info({ ports: radio.ports }, 'radio ports available');

      await ctx.guard.acquireWithReclaim('session', radio.sessionName, ctx.owner, { signal: ctx.signal });

      const command = renderTemplate(radio.command, {
        radioConfig: inputs.radioConfig,
        name: radio.name,
        bindAddress: radio.bindAddress,
        logDir: ctx.paths.radioLogDir,
        metricsPort: radio.metricsPort,
      });

      await withRetry(
        async () => {
          try {
            await ctx.host.sessions.start(radio.sessionName, command);
          } catch (err) {
            throw new StartFailureError(`radio session ${radio.sessionName} failed to start`, 'START_FAILURE', {
              cause: err,
            });
          }
        },
        {
          maxAttempts: radio.startAttempts,
          initialDelayMs: radio.startDelayMs,
          signal: ctx.signal,
          onRetry: async ({ attempt, delayMs, error }) => {
            log.warn({ attempt, delayMs, err: describeError(error) }, 'radio node start failed, retrying');
            if (await ctx.host.sessions.has(radio.sessionName)) {
              await ctx.host.sessions.kill(radio.sessionName);
            }
          },
        },
      );
      log.info({ session: radio.sessionName }, 'radio node started');
    },
    readiness(ctx) {
      const { radio, polling } = ctx.config;
      return {
        predicate: logContains(ctx.host.fs, path.join(ctx.paths.radioLogDir, `${radio.name}.log`), [
          radio.coreMarker,
          radio.controlMarker,
        ]),
        timeoutMs: radio.readyTimeoutMs,
        intervalMs: polling.logIntervalMs,
      };
    },
  };
}
