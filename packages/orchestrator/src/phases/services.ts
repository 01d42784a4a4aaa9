import * as path from 'node:path';

import {
  createLogger,
  describeError,
  renderTemplate,
  withRetry,
  type PhaseName,
} from '@trialgrid/core';

import type { Host } from '../types.js';
import type { Phase, TrialContext } from './context.js';

const log = createLogger('phase.services');

type ServiceSlot = keyof Host['services'];

/**
 * Bring a managed service up: the start command runs under its own retry budget, independent of
 * the readiness wait that follows.
 */
function serviceUpPhase(
  name: PhaseName,
  slot: ServiceSlot,
  startEnv: (ctx: TrialContext) => Record<string, string> = () => ({}),
): Phase {
  return {
    name,
    async start(ctx) {
      const service = ctx.host.services[slot];
      const cfg = ctx.config.services[slot];
      await withRetry(() => service.start(startEnv(ctx)), {
        maxAttempts: cfg.startAttempts,
        initialDelayMs: cfg.startDelayMs,
        backoff: 'exponential',
        signal: ctx.signal,
        onRetry: ({ attempt, delayMs, error }) => {
          log.warn(
            { service: service.name, attempt, maxAttempts: cfg.startAttempts, delayMs, err: describeError(error) },
            'service start failed, retrying',
          );
        },
      });
      log.info({ service: service.name }, 'service start command succeeded');
    },
    readiness(ctx) {
      return {
        predicate: ctx.host.services[slot].readiness(),
        timeoutMs: ctx.config.services[slot].readyTimeoutMs,
        intervalMs: ctx.config.polling.serviceIntervalMs,
      };
    },
  };
}

export function controlPlaneUpPhase(): Phase {
  return serviceUpPhase('ControlPlaneUp', 'controlPlane', (ctx) => ({
    METRICS_PATH: path.dirname(ctx.paths.metricsFile),
  }));
}

export function coreUpPhase(): Phase {
  return {
    ...serviceUpPhase('CoreUp', 'core'),
    // Traffic sinks are best effort: a missing sink shows up later as a validation failure.
    async afterReady(ctx) {
      for (const port of ctx.config.traffic.sinkPorts) {
        const command = renderTemplate(ctx.config.traffic.sinkCommand, { port });
        if (!(await ctx.host.services.core.execDetached(command))) {
          log.warn({ port }, 'failed to start traffic sink');
        }
      }
    },
  };
}
