import { z } from 'zod';

// --- Nodes ---

export const NodeLivenessSchema = z.enum(['up', 'down', 'unknown']);

export const NodeHandleSchema = z.object({
  id: z.string().min(1),
  liveness: NodeLivenessSchema,
});

// --- Delete outcomes ---

export const DeleteOutcomeSchema = z.object({
  file: z.string().min(1),
  /** HTTP status code, or -1 when the request never got a response. */
  status: z.number().int(),
  response: z.string().optional(),
  error: z.string().optional(),
  timestamp: z.string().datetime(),
});

// --- Protocol events ---

export const ProtocolEventKindSchema = z.enum([
  'tombstone-created',
  'partial-delete-failure',
  'auto-cleanup',
]);

export const ProtocolEventSchema = z.object({
  node: z.string().min(1),
  line: z.string(),
  kind: ProtocolEventKindSchema,
  timestamp: z.string().datetime(),
});

// --- Checks ---

export const CheckResultSchema = z.object({
  name: z.string().min(1),
  passed: z.boolean(),
  detail: z.string(),
  payload: z.record(z.string(), z.unknown()).optional(),
});

export const OrphanFileSchema = z.object({
  node: z.string().min(1),
  file: z.string().min(1),
});

// --- Cluster stats ---

/**
 * Counters reported by the coordinator's `/stats` endpoint. Only `total_files`
 * and `active_nodes` are required; any other numeric counter is kept as-is.
 */
export const ClusterStatsSchema = z
  .object({
    total_files: z.number().int().nonnegative(),
    active_nodes: z.number().int().nonnegative(),
  })
  .catchall(z.number());

// --- Scenarios ---

export const ScenarioPhaseSchema = z.enum([
  'init',
  'fault-injected',
  'operation-issued',
  'fault-recovered',
  'converging',
  'done',
]);

export const ScenarioStatusSchema = z.enum(['passed', 'failed']);

export const PhaseTransitionSchema = z.object({
  phase: ScenarioPhaseSchema,
  at: z.string().datetime(),
});

export const ScenarioDefinitionSchema = z.object({
  name: z.string().min(1),
  title: z.string().min(1),
  targetFiles: z.array(z.string().min(1)).min(1),
  faultNodes: z.array(z.string().min(1)).min(1),
  expectDeleteFailure: z.boolean(),
  checkPartialFailure: z.boolean(),
  settleAfterStopMs: z.number().int().nonnegative().optional(),
});

export const ScenarioResultSchema = z.object({
  name: z.string().min(1),
  title: z.string(),
  targetFiles: z.array(z.string()),
  faultNodes: z.array(z.string()),
  nodes: z.array(NodeHandleSchema),
  deleteOutcomes: z.array(DeleteOutcomeSchema),
  /** The scenario expected at least one delete to be refused. */
  expectDeleteFailure: z.boolean(),
  tombstoneCreated: z.boolean(),
  partialFailureDetected: z.boolean().nullable(),
  autoCleanup: z.boolean(),
  residueFree: z.boolean(),
  residue: z.array(OrphanFileSchema),
  cleanupEvents: z.array(ProtocolEventSchema),
  baselineStats: ClusterStatsSchema.optional(),
  finalStats: ClusterStatsSchema.optional(),
  phases: z.array(PhaseTransitionSchema),
  status: ScenarioStatusSchema,
  failureReason: z.string().optional(),
  aborted: z.boolean(),
  startedAt: z.string().datetime(),
  endedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
});

// --- Preflight / verification / report ---

export const PreflightResultSchema = z.object({
  passed: z.boolean(),
  checks: z.array(CheckResultSchema),
});

export const VerificationSummarySchema = z.object({
  checks: z.array(CheckResultSchema),
  passedCount: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  passed: z.boolean(),
});

export const ScenarioExpectationSchema = z.object({
  scenario: z.string().min(1),
  name: z.string().min(1),
  expected: z.boolean(),
  observed: z.boolean().nullable(),
  met: z.boolean(),
});

export const ReportSchema = z.object({
  title: z.string(),
  generatedAt: z.string().datetime(),
  startedAt: z.string().datetime(),
  endedAt: z.string().datetime(),
  durationMs: z.number().nonnegative(),
  coordinatorUrl: z.string(),
  preflight: PreflightResultSchema.optional(),
  scenarios: z.array(ScenarioResultSchema),
  expectations: z.array(ScenarioExpectationSchema),
  verification: VerificationSummarySchema.optional(),
  aborted: z.boolean(),
  passed: z.boolean(),
});

// --- Configuration ---

/** Milliseconds, written either as a number or a duration string like "30s". */
export const DurationSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);

export const NodeConfigSchema = z.object({
  id: z.string().min(1),
  /** Directory on the node that holds stored files. */
  dataDir: z.string().min(1),
  /** Compose service name (defaults to `id`). */
  service: z.string().min(1).optional(),
  /** Kubernetes Deployment name (defaults to `id`). */
  deployment: z.string().min(1).optional(),
  /** Kubernetes label selector for the node's pod (defaults to `app=<id>`). */
  labelSelector: z.string().min(1).optional(),
  /** Container within the pod (defaults to the pod's first container). */
  container: z.string().min(1).optional(),
});

export const ComposeBackendSchema = z.object({
  kind: z.literal('compose'),
  command: z.array(z.string().min(1)).min(1),
  projectDir: z.string().min(1),
});

export const KubernetesBackendSchema = z.object({
  kind: z.literal('kubernetes'),
  namespace: z.string().min(1),
  context: z.string().min(1).optional(),
});

export const BackendConfigSchema = z.discriminatedUnion('kind', [
  ComposeBackendSchema,
  KubernetesBackendSchema,
]);

export const MarkerConfigSchema = z.object({
  tombstoneCreated: z.string().min(1),
  partialFailure: z.string().min(1),
  autoCleanup: z.string().min(1),
});

export const TimingConfigSchema = z.object({
  settleAfterStopMs: z.number().int().nonnegative(),
  settleAfterStartMs: z.number().int().nonnegative(),
  deleteSpacingMs: z.number().int().nonnegative(),
  interScenarioDelayMs: z.number().int().nonnegative(),
  convergenceTimeoutMs: z.number().int().positive(),
  pollIntervalMs: z.number().int().positive(),
  controlTimeoutMs: z.number().int().positive(),
  controlRetries: z.number().int().nonnegative(),
  controlRetryDelayMs: z.number().int().positive(),
});

export const HarnessConfigSchema = z
  .object({
    coordinator: z.object({
      url: z.string().url(),
      /** Delete credential; only commands that delete need it. */
      secret: z.string().min(1).optional(),
      requestTimeoutMs: z.number().int().positive(),
      statsTimeoutMs: z.number().int().positive(),
    }),
    /** Node id used to fetch the coordinator's logs. */
    coordinatorNode: z.string().min(1),
    nodes: z.array(NodeConfigSchema).min(1),
    backend: BackendConfigSchema,
    markers: MarkerConfigSchema,
    timing: TimingConfigSchema,
    preflight: z.object({
      minFiles: z.number().int().nonnegative(),
    }),
    /** Per-scenario override of the nodes to stop. */
    faultNodes: z.record(z.string(), z.array(z.string().min(1)).min(1)),
    outputDir: z.string().min(1),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    logFile: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    const ids = new Set<string>();
    for (const node of config.nodes) {
      if (ids.has(node.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes'],
          message: `duplicate node id "${node.id}"`,
        });
      }
      ids.add(node.id);
    }
    for (const [scenario, nodes] of Object.entries(config.faultNodes)) {
      for (const id of nodes) {
        if (!ids.has(id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['faultNodes', scenario],
            message: `unknown node "${id}"`,
          });
        }
      }
    }
  });
