import type { FileSystem, NetworkHost, ProcessTable, ReadinessPredicate } from './types.js';

const DEFAULT_TAIL_LINES = 20;

/** Last `count` non-empty lines of `text`, indented for log output. */
export function tailLines(text: string, count: number): string {
  return text
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .slice(-count)
    .map((line) => `    ${line}`)
    .join('\n');
}

/**
 * Every marker must appear somewhere in `file`. A missing file is "not ready".
 */
export function logContains(
  fs: FileSystem,
  file: string,
  markers: string[],
  opts: { tailLines?: number } = {},
): ReadinessPredicate {
  return {
    describe: `${markers.map((m) => `"${m}"`).join(' and ')} in ${file}`,
    async check() {
      if (!(await fs.exists(file))) return false;
      const content = await fs.readText(file);
      return markers.every((marker) => content.includes(marker));
    },
    async diagnostics() {
      if (!(await fs.exists(file))) return `${file} was never created`;
      const content = await fs.readText(file);
      const seen = markers.map((marker) => `${marker}: ${content.includes(marker) ? 'seen' : 'missing'}`);
      return [...seen, `last lines of ${file}:`, tailLines(content, opts.tailLines ?? DEFAULT_TAIL_LINES)].join('\n');
    },
  };
}

export function fileExists(fs: FileSystem, file: string): ReadinessPredicate {
  return {
    describe: `${file} to exist`,
    check: () => fs.exists(file),
  };
}

export function processAlive(processes: ProcessTable, pid: number): ReadinessPredicate {
  return {
    describe: `process ${pid} to be alive`,
    check: async () => processes.isAlive(pid),
  };
}

export function portListening(processes: ProcessTable, port: number): ReadinessPredicate {
  return {
    describe: `port ${port} to be bound`,
    check: async () => (await processes.pidsOnPort(port)).length > 0,
  };
}

export function interfaceWithAddress(network: NetworkHost, address: string): ReadinessPredicate {
  return {
    describe: `an interface carrying ${address}`,
    check: async () => (await network.interfaceWithAddress(address)) !== null,
  };
}

/**
 * Holds only when every predicate holds. Diagnostics list each member's state.
 */
export function allOf(...predicates: ReadinessPredicate[]): ReadinessPredicate {
  return {
    describe: predicates.map((p) => p.describe).join(' AND '),
    async check() {
      for (const predicate of predicates) {
        if (!(await predicate.check())) return false;
      }
      return true;
    },
    async diagnostics() {
      const parts: string[] = [];
      for (const predicate of predicates) {
        const ok = await predicate.check().catch(() => false);
        parts.push(`[${ok ? 'ok' : 'pending'}] ${predicate.describe}`);
        if (!ok && predicate.diagnostics) {
          parts.push(await predicate.diagnostics());
        }
      }
      return parts.join('\n');
    },
  };
}
