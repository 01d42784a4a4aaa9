import { PreflightFailureError, type OrchestratorConfig } from '@trialgrid/core';

import type { FileSystem } from './types.js';

/**
 * Verify the run's fixed inputs exist before anything is started.
 *
 * @throws PreflightFailureError listing every missing path
 */
export async function runPreflight(fs: FileSystem, config: OrchestratorConfig): Promise<void> {
  const required: Array<[string, string]> = [
    ['subscriber table', config.inputs.subscriberFile],
    ['radio config', config.inputs.radioConfig],
    ['client config', config.inputs.clientConfig],
    ['trial directory', config.grid.baseDir],
  ];

  const missing: string[] = [];
  for (const [label, file] of required) {
    if (!(await fs.exists(file))) missing.push(`${label} ${file}`);
  }
  if (missing.length > 0) {
    throw new PreflightFailureError(`Missing required inputs: ${missing.join(', ')}`);
  }
}
