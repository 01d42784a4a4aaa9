import { describe, expect, it } from 'vitest';

import {
  allOf,
  fileExists,
  interfaceWithAddress,
  logContains,
  portListening,
  processAlive,
  tailLines,
} from '../readiness.js';
import { createFakeHost } from './helpers.js';

describe('tailLines', () => {
  it('keeps the last non-empty lines, indented', () => {
    expect(tailLines('a\n\nb\nc\n', 2)).toBe('    b\n    c');
  });
});

describe('logContains', () => {
  it('is not ready while the file is missing', async () => {
    const { fs } = createFakeHost();
    const predicate = logContains(fs, '/logs/gnb.log', ['ready']);
    await expect(predicate.check()).resolves.toBe(false);
    await expect(predicate.diagnostics?.()).resolves.toBe('/logs/gnb.log was never created');
  });

  it('requires every marker', async () => {
    const { fs } = createFakeHost();
    fs.put('/logs/gnb.log', 'boot\nN2 up\n');
    const predicate = logContains(fs, '/logs/gnb.log', ['N2 up', 'E2 up']);

    await expect(predicate.check()).resolves.toBe(false);
    fs.put('/logs/gnb.log', 'boot\nN2 up\nE2 up\n');
    await expect(predicate.check()).resolves.toBe(true);
  });

  it('reports which markers were seen and the log tail', async () => {
    const { fs } = createFakeHost();
    fs.put('/logs/ue1.log', 'attach\nN2 up\n');
    const predicate = logContains(fs, '/logs/ue1.log', ['N2 up', 'E2 up'], { tailLines: 1 });

    await expect(predicate.diagnostics?.()).resolves.toBe(
      'N2 up: seen\nE2 up: missing\nlast lines of /logs/ue1.log:\n    N2 up',
    );
    expect(predicate.describe).toBe('"N2 up" and "E2 up" in /logs/ue1.log');
  });
});

describe('host predicates', () => {
  it('fileExists follows the file system', async () => {
    const { fs } = createFakeHost();
    const predicate = fileExists(fs, '/tmp/python_scenario.pid');
    await expect(predicate.check()).resolves.toBe(false);
    fs.put('/tmp/python_scenario.pid', '1');
    await expect(predicate.check()).resolves.toBe(true);
  });

  it('processAlive follows the process table', async () => {
    const { processes } = createFakeHost();
    const pid = processes.start('python3 scenario.py');
    const predicate = processAlive(processes, pid);
    await expect(predicate.check()).resolves.toBe(true);
    await processes.signal(pid, 'SIGKILL');
    await expect(predicate.check()).resolves.toBe(false);
  });

  it('portListening holds once something binds the port', async () => {
    const { processes } = createFakeHost();
    const predicate = portListening(processes, 55555);
    await expect(predicate.check()).resolves.toBe(false);
    processes.start('metrics-sink', [55555]);
    await expect(predicate.check()).resolves.toBe(true);
  });

  it('interfaceWithAddress looks up the address', async () => {
    const { network } = createFakeHost();
    await expect(interfaceWithAddress(network, '10.53.1.1').check()).resolves.toBe(true);
    await expect(interfaceWithAddress(network, '10.99.0.1').check()).resolves.toBe(false);
  });
});

describe('allOf', () => {
  it('holds only when every member holds', async () => {
    const yes = { describe: 'a', check: async () => true };
    const no = { describe: 'b', check: async () => false };
    await expect(allOf(yes, yes).check()).resolves.toBe(true);
    await expect(allOf(yes, no).check()).resolves.toBe(false);
    expect(allOf(yes, no).describe).toBe('a AND b');
  });

  it('lists member states with the diagnostics of pending members', async () => {
    const predicate = allOf(
      { describe: 'a', check: async () => true, diagnostics: async () => 'unused' },
      { describe: 'b', check: async () => false, diagnostics: async () => 'b tail' },
      {
        describe: 'c',
        check: async () => {
          throw new Error('unreadable');
        },
      },
    );
    await expect(predicate.diagnostics?.()).resolves.toBe('[ok] a\n[pending] b\nb tail\n[pending] c');
  });
});
