import { execFile, spawn } from 'node:child_process';
import { once } from 'node:events';
import { closeSync, openSync } from 'node:fs';
import * as fsp from 'node:fs/promises';
import { promisify } from 'node:util';

import { createLogger, StartFailureError, type OrchestratorConfig } from '@trialgrid/core';

import { createComposeService } from './docker-compose-service.js';
import type {
  CommandExecutor,
  ExecResult,
  FileSystem,
  Host,
  NetworkHost,
  ProcessTable,
  SessionManager,
} from './types.js';

const log = createLogger('host');
const execFileAsync = promisify(execFile);

const DEFAULT_EXEC_TIMEOUT_MS = 30_000;

function hasCode(err: unknown): err is { code: unknown } {
  return typeof err === 'object' && err !== null && 'code' in err;
}

function failedExec(err: unknown): ExecResult {
  if (typeof err !== 'object' || err === null) {
    return { stdout: '', stderr: String(err), exitCode: 1 };
  }
  const stdout = 'stdout' in err && typeof err.stdout === 'string' ? err.stdout : '';
  const stderr = 'stderr' in err && typeof err.stderr === 'string' ? err.stderr : String(err);
  const exitCode = 'code' in err && typeof err.code === 'number' ? err.code : 1;
  return { stdout, stderr, exitCode };
}

// ---------------------------------------------------------------------------
// CommandExecutor using child_process
// ---------------------------------------------------------------------------

export function createCommandExecutor(): CommandExecutor {
  return {
    async exec(command, args, options = {}) {
      try {
        const { stdout, stderr } = await execFileAsync(command, args, {
          cwd: options.cwd,
          env: options.env ? { ...process.env, ...options.env } : process.env,
          timeout: options.timeoutMs ?? DEFAULT_EXEC_TIMEOUT_MS,
          encoding: 'utf-8',
          maxBuffer: 16 * 1024 * 1024,
        });
        return { stdout, stderr, exitCode: 0 };
      } catch (err: unknown) {
        return failedExec(err);
      }
    },
  };
}

/** Prefix `sudo` when the run is configured for it. */
function privileged(useSudo: boolean, command: string, args: string[]): [string, string[]] {
  return useSudo ? ['sudo', [command, ...args]] : [command, args];
}

/** Run a command and throw when it exits non-zero. */
async function checked(executor: CommandExecutor, command: [string, string[]]): Promise<string> {
  const [cmd, args] = command;
  const result = await executor.exec(cmd, args);
  if (result.exitCode !== 0) {
    throw new Error(`${cmd} ${args.join(' ')} exited with ${result.exitCode}: ${result.stderr.trim()}`);
  }
  return result.stdout;
}

function parsePids(stdout: string): number[] {
  return stdout
    .split('\n')
    .map((line) => Number.parseInt(line.trim(), 10))
    .filter((pid) => Number.isInteger(pid) && pid > 0);
}

// ---------------------------------------------------------------------------
// ProcessTable using signals, pgrep and lsof
// ---------------------------------------------------------------------------

export function createProcessTable(executor: CommandExecutor, useSudo: boolean): ProcessTable {
  return {
    async spawnDetached(command, args, options) {
      const fd = openSync(options.logFile, 'a');
      try {
        const child = spawn(command, args, { cwd: options.cwd, detached: true, stdio: ['ignore', fd, fd] });
        await once(child, 'spawn');
        child.unref();
        if (child.pid === undefined) {
          throw new StartFailureError(`${command} started without a PID`);
        }
        return child.pid;
      } finally {
        closeSync(fd);
      }
    },
    isAlive(pid) {
      try {
        process.kill(pid, 0);
        return true;
      } catch (err) {
        // EPERM: alive but owned by another user
        return hasCode(err) && err.code === 'EPERM';
      }
    },
    async signal(pid, signal) {
      try {
        process.kill(pid, signal);
        return;
      } catch (err) {
        if (!hasCode(err) || err.code !== 'EPERM' || !useSudo) return;
      }
      await executor.exec('sudo', ['kill', `-${signal.replace(/^SIG/, '')}`, String(pid)]);
    },
    async findByPattern(pattern) {
      const result = await executor.exec('pgrep', ['-f', pattern]);
      return parsePids(result.stdout).filter((pid) => pid !== process.pid);
    },
    async pidsOnPort(port) {
      const [cmd, args] = privileged(useSudo, 'lsof', ['-ti', `:${port}`]);
      return parsePids((await executor.exec(cmd, args)).stdout);
    },
  };
}

// ---------------------------------------------------------------------------
// FileSystem
// ---------------------------------------------------------------------------

export function createFileSystem(executor: CommandExecutor, useSudo: boolean): FileSystem {
  return {
    async exists(path) {
      try {
        await fsp.access(path);
        return true;
      } catch {
        return false;
      }
    },
    readText: (path) => fsp.readFile(path, 'utf-8'),
    writeText: (path, content) => fsp.writeFile(path, content, 'utf-8'),
    rename: (from, to) => fsp.rename(from, to),
    async remove(path) {
      try {
        await fsp.rm(path, { recursive: true, force: true });
      } catch (err) {
        if (!useSudo || !hasCode(err) || (err.code !== 'EACCES' && err.code !== 'EPERM')) throw err;
        await checked(executor, ['sudo', ['rm', '-rf', path]]);
      }
    },
    async mkdirp(path) {
      await fsp.mkdir(path, { recursive: true });
    },
    async list(dir) {
      try {
        return await fsp.readdir(dir);
      } catch (err) {
        if (hasCode(err) && err.code === 'ENOENT') return [];
        throw err;
      }
    },
  };
}

// ---------------------------------------------------------------------------
// SessionManager using tmux
// ---------------------------------------------------------------------------

export function createSessionManager(executor: CommandExecutor): SessionManager {
  return {
    async has(name) {
      return (await executor.exec('tmux', ['has-session', '-t', name])).exitCode === 0;
    },
    async start(name, shellCommand) {
      await checked(executor, ['tmux', ['new-session', '-d', '-s', name, shellCommand]]);
    },
    async kill(name) {
      await executor.exec('tmux', ['kill-session', '-t', name]);
    },
    async list() {
      const result = await executor.exec('tmux', ['list-sessions', '-F', '#{session_name}']);
      if (result.exitCode !== 0) return [];
      return result.stdout.split('\n').map((line) => line.trim()).filter(Boolean);
    },
  };
}

// ---------------------------------------------------------------------------
// NetworkHost using iproute2
// ---------------------------------------------------------------------------

export function createNetworkHost(executor: CommandExecutor, useSudo: boolean): NetworkHost {
  const ip = (...args: string[]) => privileged(useSudo, 'ip', args);

  return {
    async listNamespaces() {
      const result = await executor.exec('ip', ['netns', 'list']);
      return result.stdout
        .split('\n')
        .map((line) => line.trim().split(/\s+/)[0] ?? '')
        .filter(Boolean);
    },
    async addNamespace(name) {
      await checked(executor, ip('netns', 'add', name));
    },
    async deleteNamespace(name) {
      await checked(executor, ip('netns', 'delete', name));
    },
    async hasRoute(destination, via) {
      const result = await executor.exec('ip', ['route', 'show', destination]);
      return result.stdout.includes(`via ${via}`);
    },
    async addRoute(destination, via) {
      await checked(executor, ip('route', 'add', destination, 'via', via));
    },
    async deleteRoute(destination, via) {
      await checked(executor, ip('route', 'del', destination, 'via', via));
    },
    async interfaceWithAddress(address) {
      const result = await executor.exec('ip', ['-o', '-4', 'addr', 'show']);
      const line = result.stdout.split('\n').find((l) => l.includes(`inet ${address}/`));
      return line?.trim().split(/\s+/)[1] ?? null;
    },
    async hasLink(namespace, device) {
      const [cmd, args] = ip('netns', 'exec', namespace, 'ip', 'link', 'show', device);
      return (await executor.exec(cmd, args)).exitCode === 0;
    },
    async addDefaultRoute(namespace, gateway, device) {
      await checked(executor, ip('netns', 'exec', namespace, 'ip', 'route', 'add', 'default', 'via', gateway, 'dev', device));
    },
  };
}

/**
 * Wire the host adapters for a real run.
 */
export function createHost(config: OrchestratorConfig): Host {
  const executor = createCommandExecutor();
  log.debug({ useSudo: config.useSudo }, 'creating host adapters');
  return {
    executor,
    processes: createProcessTable(executor, config.useSudo),
    fs: createFileSystem(executor, config.useSudo),
    sessions: createSessionManager(executor),
    network: createNetworkHost(executor, config.useSudo),
    services: {
      controlPlane: createComposeService(executor, config.services.controlPlane, config.useSudo),
      core: createComposeService(executor, config.services.core, config.useSudo),
    },
  };
}
