import * as path from 'node:path';

import type { OrchestratorConfig, PhaseName, TrialId } from '@trialgrid/core';

import type { ResourceGuard } from '../resource-guard.js';
import type { ClientIdentity, TrialDefinition } from '../trial-definition.js';
import type { Host, ReadinessPredicate } from '../types.js';

/**
 * Everything one trial attempt's phases share. Created fresh for every attempt.
 */
export interface TrialContext {
  trial: TrialId;
  /** Resource owner key for this trial. */
  owner: string;
  attempt: number;
  definition: TrialDefinition;
  identities: ClientIdentity[];
  config: OrchestratorConfig;
  host: Host;
  guard: ResourceGuard;
  signal: AbortSignal;
  paths: TrialPaths;
  state: AttemptState;
}

export interface TrialPaths {
  radioLogDir: string;
  clientLogDir: string;
  metricsFile: string;
}

/** Facts learned while the phases run. */
export interface AttemptState {
  namespaces: string[];
}

export interface ReadinessGate {
  predicate: ReadinessPredicate;
  timeoutMs: number;
  intervalMs: number;
}

/**
 * A named step of the trial sequence: a start action, an optional readiness gate, and an
 * optional action run once the gate has passed.
 */
export interface Phase {
  readonly name: PhaseName;
  start(ctx: TrialContext): Promise<void>;
  readiness?(ctx: TrialContext): ReadinessGate;
  afterReady?(ctx: TrialContext): Promise<void>;
}

export function trialPaths(config: OrchestratorConfig, trialDir: string): TrialPaths {
  return {
    radioLogDir: path.join(trialDir, 'radio_logs'),
    clientLogDir: path.join(trialDir, 'client_logs'),
    metricsFile: path.join(trialDir, config.validation.metricsPath),
  };
}

export function emptyAttemptState(): AttemptState {
  return { namespaces: [] };
}

/** Namespace (and session) name of the `index`-th client, 1-based. */
export function clientNamespace(config: OrchestratorConfig, index: number): string {
  return `${config.clients.namespacePrefix}${index}`;
}

/**
 * Run `fn` for every item concurrently. The first failure aborts the siblings' signal; the
 * siblings are then awaited (they stop promptly) and the first error is rethrown.
 */
export async function fanOut<T>(
  items: T[],
  parent: AbortSignal,
  fn: (item: T, signal: AbortSignal) => Promise<void>,
): Promise<void> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent.reason);
  if (parent.aborted) controller.abort(parent.reason);
  parent.addEventListener('abort', onParentAbort, { once: true });

  const failures: unknown[] = [];
  try {
    await Promise.allSettled(
      items.map(async (item) => {
        try {
          await fn(item, controller.signal);
        } catch (error) {
          failures.push(error);
          controller.abort('sibling failed');
          throw error;
        }
      }),
    );
  } finally {
    parent.removeEventListener('abort', onParentAbort);
  }

  if (failures.length > 0) {
    throw failures[0];
  }
}
