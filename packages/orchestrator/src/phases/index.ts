import { PhaseNameSchema, type PhaseName } from '@trialgrid/core';

import { clientsAttachedPhase, clientsConnectedPhase } from './clients.js';
import type { Phase } from './context.js';
import { namespacesReadyPhase } from './namespaces.js';
import { radioNodeUpPhase } from './radio-node.js';
import { scenarioRunningPhase } from './scenario.js';
import { controlPlaneUpPhase, coreUpPhase } from './services.js';
import { trafficRunningPhase } from './traffic.js';
import { validatedPhase } from './validated.js';

export const PHASE_ORDER: readonly PhaseName[] = PhaseNameSchema.options;

/** The trial phases in execution order. */
export function createPhaseSequence(): Phase[] {
  return [
    controlPlaneUpPhase(),
    coreUpPhase(),
    radioNodeUpPhase(),
    namespacesReadyPhase(),
    clientsAttachedPhase(),
    scenarioRunningPhase(),
    clientsConnectedPhase(),
    trafficRunningPhase(),
    validatedPhase(),
  ];
}

export { clientPorts } from './clients.js';
export {
  clientNamespace,
  emptyAttemptState,
  fanOut,
  trialPaths,
  type AttemptState,
  type Phase,
  type ReadinessGate,
  type TrialContext,
  type TrialPaths,
} from './context.js';
