import { createLogger, StartFailureError } from '@trialgrid/core';

import { poll } from '../health-poller.js';
import { fileExists, processAlive } from '../readiness.js';
import type { Phase } from './context.js';

const log = createLogger('phase.scenario');

/**
 * ScenarioRunning: the trial's channel scenario script launches the simulator in the
 * background and records its PID. The simulator must be alive once the PID appears.
 */
export function scenarioRunningPhase(): Phase {
  return {
    name: 'ScenarioRunning',
    async start(ctx) {
      const { scenario, polling } = ctx.config;
      await ctx.guard.acquireWithReclaim('pid-file', scenario.pidFile, ctx.owner, { signal: ctx.signal });

      log.info({ script: ctx.definition.scenarioScript }, 'launching scenario');
      const result = await ctx.host.executor.exec('bash', [ctx.definition.scenarioScript], {
        cwd: ctx.definition.dir,
      });
      if (result.exitCode !== 0) {
        throw new StartFailureError(
          `scenario script exited with ${result.exitCode}: ${result.stderr.trim() || result.stdout.trim()}`,
        );
      }

      await poll(fileExists(ctx.host.fs, scenario.pidFile), {
        intervalMs: polling.logIntervalMs,
        timeoutMs: scenario.pidWaitMs,
        signal: ctx.signal,
      });

      const pid = Number.parseInt((await ctx.host.fs.readText(scenario.pidFile)).trim(), 10);
      if (!Number.isInteger(pid) || pid <= 0 || !(await processAlive(ctx.host.processes, pid).check())) {
        throw new StartFailureError(`scenario process recorded in ${scenario.pidFile} is not running`);
      }
      log.info({ pid }, 'scenario running');
    },
  };
}
