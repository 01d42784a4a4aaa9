import { createLogger, StartFailureError, type ManagedServiceConfig } from '@trialgrid/core';

import { tailLines } from './readiness.js';
import type { CommandExecutor, ManagedService, ReadinessPredicate } from './types.js';

const log = createLogger('compose-service');

const LOG_TAIL_LINES = 20;
const COMPOSE_UP_TIMEOUT_MS = 300_000;

/**
 * A managed service run as a docker compose project. Readiness is either a marker in one
 * container's log or that container's health status.
 */
export function createComposeService(
  executor: CommandExecutor,
  config: ManagedServiceConfig,
  useSudo: boolean,
): ManagedService {
  const docker = (...args: string[]): [string, string[]] =>
    useSudo ? ['sudo', ['docker', ...args]] : ['docker', args];
  const container = config.readiness.container;

  const containerLogs = async (): Promise<string> => {
    const [cmd, args] = docker('logs', container);
    const result = await executor.exec(cmd, args);
    return `${result.stdout}${result.stderr}`;
  };

  const healthStatus = async (): Promise<string> => {
    const [cmd, args] = docker('inspect', '--format', '{{.State.Health.Status}}', container);
    const result = await executor.exec(cmd, args);
    return result.exitCode === 0 ? result.stdout.trim() : 'unknown';
  };

  return {
    name: config.name,

    async start(env = {}) {
      const merged = { ...config.env, ...env };
      // sudo drops the caller's environment, so variables go through env(1)
      const assignments = Object.entries(merged).map(([key, value]) => `${key}=${value}`);
      const [cmd, args]: [string, string[]] = useSudo
        ? ['sudo', ['env', ...assignments, 'docker', 'compose', 'up', '-d']]
        : ['docker', ['compose', 'up', '-d']];
      const result = await executor.exec(cmd, args, {
        cwd: config.composeDir,
        env: useSudo ? undefined : merged,
        timeoutMs: COMPOSE_UP_TIMEOUT_MS,
      });
      if (result.exitCode !== 0) {
        throw new StartFailureError(
          `docker compose up for ${config.name} exited with ${result.exitCode}: ${result.stderr.trim()}`,
        );
      }
      log.info({ service: config.name }, 'compose project started');
    },

    async stop(timeoutMs) {
      const [cmd, args] = docker('compose', 'down', '-v', '--remove-orphans');
      const result = await executor.exec(cmd, args, { cwd: config.composeDir, timeoutMs });
      if (result.exitCode !== 0) {
        throw new Error(`docker compose down for ${config.name} failed: ${result.stderr.trim() || 'timed out'}`);
      }
    },

    async forceStop() {
      const [psCmd, psArgs] = docker('ps', '-q', '--filter', `name=${config.forceStopFilter}`);
      const ids = (await executor.exec(psCmd, psArgs)).stdout.split('\n').map((l) => l.trim()).filter(Boolean);
      if (ids.length === 0) return;
      const [cmd, args] = docker('stop', ...ids);
      const result = await executor.exec(cmd, args);
      if (result.exitCode !== 0) {
        throw new Error(`docker stop for ${config.name} failed: ${result.stderr.trim()}`);
      }
      log.warn({ service: config.name, containers: ids.length }, 'containers force-stopped');
    },

    async execDetached(shellCommand) {
      const [cmd, args] = docker('exec', '-d', container, 'sh', '-c', shellCommand);
      return (await executor.exec(cmd, args)).exitCode === 0;
    },

    readiness(): ReadinessPredicate {
      const readiness = config.readiness;
      if (readiness.type === 'log-marker') {
        return {
          describe: `"${readiness.marker}" in logs of ${readiness.container}`,
          check: async () => (await containerLogs()).includes(readiness.marker),
          diagnostics: async () => `last lines of ${readiness.container}:\n${tailLines(await containerLogs(), LOG_TAIL_LINES)}`,
        };
      }
      return {
        describe: `${readiness.container} to report healthy`,
        check: async () => (await healthStatus()) === 'healthy',
        diagnostics: async () => `health status of ${readiness.container}: ${await healthStatus()}`,
      };
    },
  };
}
