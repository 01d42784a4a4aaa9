import * as path from 'node:path';

import { StartFailureError, type TrialId } from '@trialgrid/core';

import type { FileSystem } from './types.js';

const CLIENT_LABEL = /^UE\d+$/i;

/** One client's traffic profile and per-client channel parameters. */
export interface ClientAssignment {
  client: string;
  profilePath: string;
  params: Record<string, string>;
}

export interface Conditions {
  assignments: ClientAssignment[];
  /** Run-wide channel parameters listed after the assignment block. */
  channelParams: Record<string, string>;
}

/** A subscriber identity from the client table. */
export interface ClientIdentity {
  name: string;
  imsi: string;
  key: string;
  imei: string;
}

export interface TrialDefinition {
  trial: TrialId;
  dir: string;
  conditionsFile: string;
  scenarioScript: string;
  conditions: Conditions;
}

function splitRow(line: string): string[] {
  return line.split(',').map((cell) => cell.trim());
}

/**
 * Parse a conditions table.
 *
 * The header is `UE,<profile column>[,param...]`. Rows whose first cell is a client label are
 * assignments; extra columns become that client's parameters. Once a blank or `#` line has been
 * seen, two-column `key,value` rows are collected as run-wide channel parameters.
 */
export function parseConditions(content: string): Conditions {
  const lines = content.split(/\r?\n/);
  const header = splitRow(lines[0] ?? '');
  if (header[0]?.toUpperCase() !== 'UE' || header.length < 2) {
    throw new StartFailureError(`conditions header must start with "UE,<profile>", got "${lines[0] ?? ''}"`);
  }
  const paramNames = header.slice(2);

  const assignments: ClientAssignment[] = [];
  const channelParams: Record<string, string> = {};
  let inParamSection = false;

  for (const raw of lines.slice(1)) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) {
      if (assignments.length > 0) inParamSection = true;
      continue;
    }
    const cells = splitRow(line);
    const first = cells[0] ?? '';

    if (!inParamSection && CLIENT_LABEL.test(first)) {
      const params: Record<string, string> = {};
      paramNames.forEach((name, i) => {
        const value = cells[i + 2];
        if (value !== undefined && value !== '') params[name] = value;
      });
      assignments.push({ client: first.toUpperCase(), profilePath: cells[1] ?? '', params });
    } else if (cells.length >= 2) {
      channelParams[first] = cells.slice(1).join(',');
    }
  }

  return { assignments, channelParams };
}

/**
 * Parse the subscriber table: `name,imsi,key,imei` per line, `#` comments and blank lines skipped.
 */
export function parseSubscribers(content: string): ClientIdentity[] {
  const identities: ClientIdentity[] = [];
  for (const raw of content.split(/\r?\n/)) {
    const line = raw.trim();
    if (line.length === 0 || line.startsWith('#')) continue;
    const [name = '', imsi = '', key = '', imei = ''] = splitRow(line);
    identities.push({ name, imsi, key, imei });
  }
  return identities;
}

/** Directory of a trial: `<base>/trialset<N>/exp<M>`. */
export function trialDirectory(baseDir: string, trial: TrialId): string {
  return path.join(baseDir, `trialset${trial.trialSet}`, `exp${trial.experiment}`);
}

/**
 * Load a trial's definition.
 *
 * @throws StartFailureError if the conditions table or the scenario script is missing
 */
export async function loadTrialDefinition(
  fs: FileSystem,
  baseDir: string,
  trial: TrialId,
  scenarioScriptName: string,
): Promise<TrialDefinition> {
  const dir = trialDirectory(baseDir, trial);
  const conditionsFile = path.join(dir, 'conditions.csv');
  const scenarioScript = path.join(dir, scenarioScriptName);

  if (!(await fs.exists(conditionsFile))) {
    throw new StartFailureError(`Conditions file not found: ${conditionsFile}`);
  }
  if (!(await fs.exists(scenarioScript))) {
    throw new StartFailureError(`Scenario script not found: ${scenarioScript}`);
  }

  return {
    trial,
    dir,
    conditionsFile,
    scenarioScript,
    conditions: parseConditions(await fs.readText(conditionsFile)),
  };
}
