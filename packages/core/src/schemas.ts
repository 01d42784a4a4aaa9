import { z } from 'zod';

// --- Managed services ---

export const ServiceReadinessSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('log-marker'), container: z.string().min(1), marker: z.string().min(1) }),
  z.object({ type: z.literal('health-status'), container: z.string().min(1) }),
]);

export const ManagedServiceSchema = z.object({
  name: z.string().min(1),
  composeDir: z.string().min(1),
  env: z.record(z.string(), z.string()).default({}),
  readiness: ServiceReadinessSchema,
  readyTimeoutMs: z.number().int().positive(),
  startAttempts: z.number().int().positive().default(3),
  startDelayMs: z.number().int().nonnegative().default(10_000),
  stopTimeoutMs: z.number().int().positive().default(30_000),
  /** Container name filter used by the force-stop fallback. */
  forceStopFilter: z.string().min(1),
});

// --- Grid / retry ---

export const GridSchema = z.object({
  baseDir: z.string().min(1).default('/srv/trialgrid/experiments'),
  trialSetCount: z.number().int().positive().default(100),
  experimentsPerSet: z.number().int().positive().default(1),
  interCellDelayMs: z.number().int().nonnegative().default(10_000),
});

export const TrialRetrySchema = z.object({
  maxRetries: z.number().int().nonnegative().default(3),
  retryDelayMs: z.number().int().nonnegative().default(10_000),
});

// --- Radio node ---

export const MetricsSinkSchema = z.object({
  command: z.string().min(1),
  port: z.number().int().positive(),
  pidFile: z.string().min(1),
  readyTimeoutMs: z.number().int().positive().default(30_000),
});

export const RadioSchema = z.object({
  name: z.string().min(1).default('cu_cp_01'),
  sessionName: z.string().min(1).default('gnb_cu_cp_01'),
  command: z
    .string()
    .min(1)
    .default(
      'sudo gnb -c {radioConfig} --ran_node_name {name} cu_cp amf --bind_addr {bindAddress} ' +
        'log --filename {logDir}/{name}.log metrics --port {metricsPort} ' +
        '< /dev/null > {logDir}/{name}_stdout.log 2>&1',
    ),
  bindAddress: z.string().min(1).default('10.53.1.1'),
  /** Ports that must be free before the node starts. */
  ports: z.array(z.number().int().positive()).default([2000, 2001, 2100, 2101, 2200, 2201]),
  /** Every port the radio layer may hold; force-freed during cleanup. */
  cleanupPorts: z
    .array(z.number().int().positive())
    .default([2000, 2001, 2100, 2101, 2200, 2201, 2300, 2301, 55555]),
  metricsPort: z.number().int().positive().default(55555),
  metricsSink: MetricsSinkSchema.optional(),
  coreMarker: z.string().min(1).default('N2: Connection to AMF on 10.53.1.2:38412 was established'),
  controlMarker: z
    .string()
    .min(1)
    .default('E2AP: E2 connection to Near-RT-RIC on 127.0.0.1:36421 accepted'),
  readyTimeoutMs: z.number().int().positive().default(180_000),
  startAttempts: z.number().int().positive().default(2),
  startDelayMs: z.number().int().nonnegative().default(15_000),
});

// --- Clients ---

export const ClientsSchema = z.object({
  count: z.number().int().positive().default(3),
  namespacePrefix: z.string().min(1).default('ue'),
  command: z
    .string()
    .min(1)
    .default(
      'sudo srsue {clientConfig} --gw.netns {namespace} ' +
        '--rf.device_args tx_port=tcp://127.0.0.1:{txPort},rx_port=tcp://127.0.0.1:{rxPort},base_srate=11.52e6 ' +
        '--usim.imsi {imsi} --usim.k {key} --usim.imei {imei} ' +
        '--log.filename {logDir}/{namespace}.log > {logDir}/{namespace}_stdout.log 2>&1',
    ),
  sessionMarker: z.string().min(1).default('PDU Session Establishment successful. IP:'),
  controlMarker: z.string().min(1).default('RRC NR reconfiguration successful'),
  connectTimeoutMs: z.number().int().positive().default(120_000),
  logWaitMs: z.number().int().positive().default(30_000),
  startAttempts: z.number().int().positive().default(2),
  startDelayMs: z.number().int().nonnegative().default(10_000),
  gateway: z.string().min(1).default('10.45.1.1'),
  tunnelDevice: z.string().min(1).default('tun_srsue'),
});

// --- Host network ---

export const NetworkSchema = z.object({
  route: z
    .object({ destination: z.string().min(1), via: z.string().min(1) })
    .default({ destination: '10.45.0.0/16', via: '10.53.1.2' }),
  bridgeAddress: z.string().min(1).default('10.53.1.1'),
  bridgeTimeoutMs: z.number().int().positive().default(60_000),
});

// --- Scenario / traffic ---

export const ScenarioSchema = z.object({
  script: z.string().min(1).default('run_scenario.sh'),
  pidFile: z.string().min(1).default('/tmp/python_scenario.pid'),
  pidWaitMs: z.number().int().positive().default(10_000),
  stopGraceMs: z.number().int().nonnegative().default(2_000),
});

export const TrafficSchema = z.object({
  durationSec: z.number().positive().default(480),
  basePort: z.number().int().positive().default(5200),
  sinkCommand: z.string().min(1).default('iperf3 -s -p {port}'),
  sinkPorts: z.array(z.number().int().positive()).default([5201, 5202, 5203]),
  pidDir: z.string().min(1).default('/tmp'),
  processPattern: z.string().min(1).default('iperf3'),
});

export const ValidationSchema = z.object({
  metricsPath: z.string().min(1).default('metrics/kpm_style5_metrics.csv'),
  timestampColumn: z.string().min(1).default('Timestamp'),
  toleranceSec: z.number().nonnegative().default(10),
});

// --- Cleanup ---

export const TempFilesSchema = z.object({
  dir: z.string().min(1),
  /** Regular expressions matched against entry names in `dir`. */
  patterns: z.array(z.string().min(1)),
});

export const CleanupSchema = z.object({
  processPatterns: z.array(z.string().min(1)).default(['sudo gnb', 'sudo srsue', 'python.*scenario']),
  sessionPrefixes: z.array(z.string().min(1)).default(['gnb_', 'ue']),
  tempFiles: z
    .array(TempFilesSchema)
    .default([
      {
        dir: '/tmp',
        patterns: ['^ue', '^cu_cp', '^python_scenario\\.pid$', '^traffic_.*\\.pid$', '^metrics_server\\.pid$'],
      },
    ]),
  /** Trial-relative directories whose log files are removed after each attempt. */
  trialLogDirs: z.array(z.string().min(1)).default(['radio_logs']),
  forceExitAfterMs: z.number().int().positive().default(60_000),
});

// --- Health polling ---

export const PollingSchema = z.object({
  serviceIntervalMs: z.number().int().positive().default(5_000),
  logIntervalMs: z.number().int().positive().default(2_000),
});

// --- Top-level configuration ---

export const OrchestratorConfigSchema = z.object({
  stateFile: z.string().min(1).default('/tmp/experiment_state.json'),
  useSudo: z.boolean().default(true),
  inputs: z
    .object({
      subscriberFile: z.string().min(1).default('/srv/trialgrid/ue_data.csv'),
      radioConfig: z.string().min(1).default('/srv/trialgrid/gnb_zmq.yaml'),
      clientConfig: z.string().min(1).default('/srv/trialgrid/ue_zmq.conf'),
    })
    .default({}),
  grid: GridSchema.default({}),
  retry: TrialRetrySchema.default({}),
  services: z
    .object({
      controlPlane: ManagedServiceSchema.default({
        name: 'control-plane',
        composeDir: '/srv/trialgrid/control-plane',
        readiness: { type: 'log-marker', container: 'ric_submgr', marker: 'RMR is ready now ...' },
        readyTimeoutMs: 10_000,
        forceStopFilter: 'ric',
      }),
      core: ManagedServiceSchema.default({
        name: 'core',
        composeDir: '/srv/trialgrid/core',
        readiness: { type: 'health-status', container: 'open5gs_5gc' },
        readyTimeoutMs: 180_000,
        forceStopFilter: 'open5gs',
      }),
    })
    .default({}),
  radio: RadioSchema.default({}),
  clients: ClientsSchema.default({}),
  network: NetworkSchema.default({}),
  scenario: ScenarioSchema.default({}),
  traffic: TrafficSchema.default({}),
  validation: ValidationSchema.default({}),
  cleanup: CleanupSchema.default({}),
  polling: PollingSchema.default({}),
});

// --- Checkpoint / state record ---

export const PhaseNameSchema = z.enum([
  'ControlPlaneUp',
  'CoreUp',
  'RadioNodeUp',
  'NamespacesReady',
  'ClientsAttached',
  'ScenarioRunning',
  'ClientsConnected',
  'TrafficRunning',
  'Validated',
]);

export const TrialIdSchema = z.object({
  trialSet: z.number().int().nonnegative(),
  experiment: z.number().int().nonnegative(),
});

export const RetryStateSchema = z.object({
  attempts: z.number().int().nonnegative(),
  lastFailure: z.string().optional(),
  nextDelayMs: z.number().int().nonnegative().optional(),
});

export const FailedCellSchema = z.object({
  trial: TrialIdSchema,
  attempts: z.number().int().positive(),
  phase: PhaseNameSchema.optional(),
  reason: z.string(),
});

export const RunCheckpointSchema = z.object({
  currentTrialSet: z.number().int().nonnegative().nullable(),
  currentExperiment: z.number().int().nonnegative().nullable(),
  phase: z.union([PhaseNameSchema, z.enum(['starting', 'cleanup', 'idle'])]),
  attempt: z.number().int().nonnegative(),
  retryStates: z.record(z.string(), RetryStateSchema),
  lastCompleted: TrialIdSchema.nullable(),
  failed: z.array(FailedCellSchema),
  updatedAt: z.string().datetime(),
});
