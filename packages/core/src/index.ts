// Zod schemas
export {
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

// TypeScript types (inferred from Zod)
export type {
  CleanupConfig,
  ClientsConfig,
  FailedCell,
  GridConfig,
  ManagedServiceConfig,
  MetricsSinkConfig,
  NetworkConfig,
  OrchestratorConfig,
  OrchestratorConfigInput,
  PhaseName,
  PollingConfig,
  RadioConfig,
  RetryState,
  RunCheckpointRecord,
  ScenarioConfig,
  ServiceReadiness,
  TempFilesConfig,
  TrafficConfig,
  TrialId,
  TrialRetryConfig,
  ValidationConfig,
} from './types.js';

// Error model
export {
  CancelledError,
  describeError,
  GridError,
  PhaseFailedError,
  PreflightFailureError,
  ReadinessTimeoutError,
  ResourceBusyError,
  StartFailureError,
  ValidationFailureError,
} from './errors.js';

// Retry
export { computeDelay, executeWithRetry, withRetry } from './retry.js';
export type { Backoff, RetryOptions, RetryOutcome } from './retry.js';

// Cancellable waits
export { sleep, throwIfCancelled } from './sleep.js';

// Configuration
export { loadConfig, renderTemplate } from './config.js';

// Telemetry
export { initTelemetry, shutdownTelemetry, getTracer, getMeter, withSpan } from './telemetry.js';
export type { Tracer, Meter } from '@opentelemetry/api';

// Logger
export { logger, createLogger } from './logger.js';
export type { Logger } from 'pino';
