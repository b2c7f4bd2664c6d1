// Zod schemas
export {
  BackendConfigSchema,
  CheckResultSchema,
  ClusterStatsSchema,
  ComposeBackendSchema,
  DeleteOutcomeSchema,
  DurationSchema,
  HarnessConfigSchema,
  KubernetesBackendSchema,
  MarkerConfigSchema,
  NodeConfigSchema,
  NodeHandleSchema,
  NodeLivenessSchema,
  OrphanFileSchema,
  PhaseTransitionSchema,
  PreflightResultSchema,
  ProtocolEventKindSchema,
  ProtocolEventSchema,
  ReportSchema,
  ScenarioDefinitionSchema,
  ScenarioExpectationSchema,
  ScenarioPhaseSchema,
  ScenarioResultSchema,
  ScenarioStatusSchema,
  TimingConfigSchema,
  VerificationSummarySchema,
} from './schemas.js';

// Types
export type {
  BackendConfig,
  CheckResult,
  ClusterStats,
  ComposeBackend,
  DeleteOutcome,
  HarnessConfig,
  KubernetesBackend,
  MarkerConfig,
  NodeConfig,
  NodeHandle,
  NodeLiveness,
  OrphanFile,
  PhaseTransition,
  PreflightResult,
  ProtocolEvent,
  ProtocolEventKind,
  Report,
  RetryStrategy,
  ScenarioDefinition,
  ScenarioExpectation,
  ScenarioPhase,
  ScenarioResult,
  ScenarioStatus,
  TimingConfig,
  VerificationSummary,
} from './types.js';

// Errors
export {
  ClusterAccessError,
  ClusterUnreachableError,
  ConfigError,
  ControlError,
  HarnessError,
  ScenarioAbortedError,
  TransportError,
  errorMessage,
} from './errors.js';

// Config
export {
  HarnessConfigFileSchema,
  configFromEnv,
  loadConfig,
  parseConfigInput,
  readConfigFile,
  resolveConfig,
} from './config.js';
export type { HarnessConfigInput, LoadConfigOptions } from './config.js';
export { DEFAULT_CONFIG, DEFAULT_MARKERS } from './defaults.js';

// Utilities
export { computeDelay, sleep, withRetry } from './retry.js';
export type { RetryOptions } from './retry.js';
export { formatSeconds, parseDuration } from './duration.js';

// Logging
export { createLogger, initLogger, resolveLevel, rootLogger } from './logger.js';
export type { Logger } from './logger.js';

// Telemetry
export { getMeter, getTracer, inSpan, initTelemetry, shutdownTelemetry } from './telemetry.js';
