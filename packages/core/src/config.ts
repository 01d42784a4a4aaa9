import { readFileSync } from 'node:fs';

import { PreflightFailureError } from './errors.js';
import { OrchestratorConfigSchema } from './schemas.js';
import type { OrchestratorConfig } from './types.js';

type Env = Record<string, string | undefined>;

/** Environment overrides: variable name → [section, key, parser]. */
const ENV_OVERRIDES: Array<[string, string | null, string, (raw: string) => unknown]> = [
  ['TRIALGRID_STATE_FILE', null, 'stateFile', (raw) => raw],
  ['TRIALGRID_BASE_DIR', 'grid', 'baseDir', (raw) => raw],
  ['TRIALGRID_TRIAL_SETS', 'grid', 'trialSetCount', Number],
  ['TRIALGRID_EXPERIMENTS', 'grid', 'experimentsPerSet', Number],
  ['TRIALGRID_MAX_RETRIES', 'retry', 'maxRetries', Number],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readConfigFile(path: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new PreflightFailureError(`Cannot read config file ${path}`, 'CONFIG_UNREADABLE', { cause: err });
  }
  if (!isRecord(parsed)) {
    throw new PreflightFailureError(`Config file ${path} must contain a JSON object`, 'CONFIG_INVALID');
  }
  return parsed;
}

/**
 * Resolve the orchestrator configuration.
 *
 * Sources, later wins: schema defaults, the JSON file at `configPath` (or `TRIALGRID_CONFIG`),
 * then the `TRIALGRID_*` environment overrides.
 *
 * @throws PreflightFailureError if the file is unreadable or the result fails validation
 */
export function loadConfig(opts: { configPath?: string; env?: Env } = {}): OrchestratorConfig {
  const env = opts.env ?? process.env;
  const path = opts.configPath ?? env['TRIALGRID_CONFIG'];
  const raw: Record<string, unknown> = path ? readConfigFile(path) : {};

  for (const [variable, section, key, parse] of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') continue;
    if (section === null) {
      raw[key] = parse(value);
      continue;
    }
    const existing = raw[section];
    raw[section] = { ...(isRecord(existing) ? existing : {}), [key]: parse(value) };
  }

  const result = OrchestratorConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new PreflightFailureError(`Invalid configuration: ${issues}`, 'CONFIG_INVALID');
  }
  return result.data;
}

/**
 * Substitute `{name}` placeholders in a command template.
 *
 * @throws Error if the template references a variable that was not supplied
 */
export function renderTemplate(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (_match, name: string) => {
    const value = vars[name];
    if (value === undefined) {
      throw new Error(`Unknown placeholder "{${name}}" in template: ${template}`);
    }
    return String(value);
  });
}
