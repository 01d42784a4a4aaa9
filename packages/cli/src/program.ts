import { Command, InvalidArgumentError } from 'commander';

import { initTelemetry, loadConfig, shutdownTelemetry } from '@trialgrid/core';
import { runOrchestrator } from '@trialgrid/orchestrator';

export interface ProgramOptions {
  /** Receives the run's exit code. Sets `process.exitCode` by default. */
  onExit?: (code: number) => void;
}

function parseIndex(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('must be a non-negative integer');
  }
  return Number(value);
}

export function createProgram(opts: ProgramOptions = {}): Command {
  const onExit = opts.onExit ?? ((code: number) => {
    process.exitCode = code;
  });

  const program = new Command();
  program
    .name('trialgrid')
    .description('Run a grid of radio network trials with readiness gating, retries and cleanup')
    .version('0.1.0')
    .argument('[start_trial_set]', 'first trial set to run', parseIndex, 0)
    .argument('[start_experiment]', 'first experiment within the first trial set', parseIndex, 1)
    .argument('[only_experiment]', 'run only this experiment of start_trial_set, then exit', parseIndex)
    .option('-c, --config <file>', 'JSON configuration file (default: $TRIALGRID_CONFIG)')
    .action(
      async (
        startTrialSet: number,
        startExperiment: number,
        onlyExperiment: number | undefined,
        options: { config?: string },
      ) => {
        const config = loadConfig({ configPath: options.config });
        initTelemetry({ serviceName: 'trialgrid' });
        try {
          const result = await runOrchestrator({
            config,
            start: { startTrialSet, startExperiment, onlyExperiment },
          });
          onExit(result.exitCode);
        } finally {
          await shutdownTelemetry();
        }
      },
    );

  return program;
}
