import { createLogger } from '@trialgrid/core';

import { validateMetricsTable } from '../output-validation.js';
import type { Phase } from './context.js';

const log = createLogger('phase.validated');

export function validatedPhase(): Phase {
  return {
    name: 'Validated',
    async start(ctx) {
      const { validation, traffic } = ctx.config;
      const summary = await validateMetricsTable(ctx.host.fs, ctx.paths.metricsFile, {
        expectedDurationSec: traffic.durationSec,
        toleranceSec: validation.toleranceSec,
        timestampColumn: validation.timestampColumn,
      });
      log.info({ file: ctx.paths.metricsFile, ...summary }, 'metrics table validated');
    },
  };
}
