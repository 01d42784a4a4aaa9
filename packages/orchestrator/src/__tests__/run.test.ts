import { EventEmitter } from 'node:events';

import { describe, expect, it, vi } from 'vitest';

import { runOrchestrator } from '../run.js';
import { createFakeHost, seedInputs, simulateHealthyHost, testConfig } from './helpers.js';

function setup(cells: Array<[number, number]>) {
  const config = testConfig();
  const host = createFakeHost();
  seedInputs(host, cells);
  simulateHealthyHost(host, config);
  const signals = new EventEmitter();
  const exit = vi.fn((_code: number) => {});
  const base = { config, host, signals, exit, sleep: async () => {} };
  return { config, host, signals, exit, base };
}

describe('runOrchestrator', () => {
  it('runs only the requested experiment', async () => {
    const { host, base } = setup([[0, 2]]);

    const result = await runOrchestrator({ ...base, start: { startTrialSet: 0, startExperiment: 1, onlyExperiment: 2 } });

    expect(result.exitCode).toBe(0);
    expect(result.summary).toEqual({ attempted: 1, succeeded: 1, failed: [] });
    expect(result.checkpoint.snapshot().lastCompleted).toEqual({ trialSet: 0, experiment: 2 });
    expect(host.services.controlPlane.startEnvs).toEqual([{ METRICS_PATH: '/trials/trialset0/exp2/metrics' }]);
    expect(JSON.parse(await host.fs.readText('/state/checkpoint.json'))).toMatchObject({
      phase: 'idle',
      lastCompleted: { trialSet: 0, experiment: 2 },
    });
  });

  it('walks the grid past a cell that keeps failing', async () => {
    const { host, base } = setup([
      [0, 1],
      [0, 2],
      [1, 1],
      [1, 2],
    ]);
    host.fs.files.delete('/trials/trialset1/exp1/run_scenario.sh');

    const result = await runOrchestrator({ ...base, start: { startTrialSet: 0, startExperiment: 1 } });

    expect(result.exitCode).toBe(0);
    expect(result.summary).toEqual({
      attempted: 4,
      succeeded: 3,
      failed: [
        {
          trial: { trialSet: 1, experiment: 1 },
          attempts: 4,
          reason: 'Scenario script not found: /trials/trialset1/exp1/run_scenario.sh',
        },
      ],
    });
    expect(result.checkpoint.failedCells()).toHaveLength(1);
  });

  it('exits 1 without starting anything when inputs are missing', async () => {
    const { host, base } = setup([[0, 1]]);
    host.fs.files.delete('/inputs/gnb.yaml');

    const result = await runOrchestrator({ ...base, start: { startTrialSet: 0, startExperiment: 1 } });

    expect(result.exitCode).toBe(1);
    expect(result.summary).toBeNull();
    expect(host.services.controlPlane.startCalls).toBe(0);
    expect(host.services.core.stopCalls).toBe(1);
  });

  it('exits 130 after cleaning up when interrupted', async () => {
    const { host, signals, exit, base } = setup([[0, 1]]);
    host.services.core.onStart = () => {
      signals.emit('SIGINT');
    };

    const result = await runOrchestrator({ ...base, start: { startTrialSet: 0, startExperiment: 1 } });

    expect(result.exitCode).toBe(130);
    expect(exit).not.toHaveBeenCalled();
    expect(host.sessions.started).toEqual([]);
    expect(host.services.core.running).toBe(false);
    expect(host.services.controlPlane.running).toBe(false);
    expect(signals.listenerCount('SIGINT')).toBe(0);
  });
});
