import type { z } from 'zod';

import type {
  CleanupSchema,
  ClientsSchema,
  FailedCellSchema,
  GridSchema,
  ManagedServiceSchema,
  MetricsSinkSchema,
  NetworkSchema,
  OrchestratorConfigSchema,
  PhaseNameSchema,
  PollingSchema,
  RadioSchema,
  RetryStateSchema,
  RunCheckpointSchema,
  ScenarioSchema,
  ServiceReadinessSchema,
  TempFilesSchema,
  TrafficSchema,
  TrialIdSchema,
  TrialRetrySchema,
  ValidationSchema,
} from './schemas.js';

export type ServiceReadiness = z.infer<typeof ServiceReadinessSchema>;
export type ManagedServiceConfig = z.infer<typeof ManagedServiceSchema>;
export type GridConfig = z.infer<typeof GridSchema>;
export type TrialRetryConfig = z.infer<typeof TrialRetrySchema>;
export type MetricsSinkConfig = z.infer<typeof MetricsSinkSchema>;
export type RadioConfig = z.infer<typeof RadioSchema>;
export type ClientsConfig = z.infer<typeof ClientsSchema>;
export type NetworkConfig = z.infer<typeof NetworkSchema>;
export type ScenarioConfig = z.infer<typeof ScenarioSchema>;
export type TrafficConfig = z.infer<typeof TrafficSchema>;
export type ValidationConfig = z.infer<typeof ValidationSchema>;
export type TempFilesConfig = z.infer<typeof TempFilesSchema>;
export type CleanupConfig = z.infer<typeof CleanupSchema>;
export type PollingConfig = z.infer<typeof PollingSchema>;
export type OrchestratorConfig = z.infer<typeof OrchestratorConfigSchema>;
export type OrchestratorConfigInput = z.input<typeof OrchestratorConfigSchema>;

export type PhaseName = z.infer<typeof PhaseNameSchema>;
export type TrialId = z.infer<typeof TrialIdSchema>;
export type RetryState = z.infer<typeof RetryStateSchema>;
export type FailedCell = z.infer<typeof FailedCellSchema>;
export type RunCheckpointRecord = z.infer<typeof RunCheckpointSchema>;
