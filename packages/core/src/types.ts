import type { z } from 'zod';

import type {
  BackendConfigSchema,
  CheckResultSchema,
  ClusterStatsSchema,
  ComposeBackendSchema,
  DeleteOutcomeSchema,
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

export type NodeLiveness = z.infer<typeof NodeLivenessSchema>;
export type NodeHandle = z.infer<typeof NodeHandleSchema>;
export type DeleteOutcome = z.infer<typeof DeleteOutcomeSchema>;
export type ProtocolEventKind = z.infer<typeof ProtocolEventKindSchema>;
export type ProtocolEvent = z.infer<typeof ProtocolEventSchema>;
export type CheckResult = z.infer<typeof CheckResultSchema>;
export type OrphanFile = z.infer<typeof OrphanFileSchema>;
export type ClusterStats = z.infer<typeof ClusterStatsSchema>;
export type ScenarioPhase = z.infer<typeof ScenarioPhaseSchema>;
export type ScenarioStatus = z.infer<typeof ScenarioStatusSchema>;
export type PhaseTransition = z.infer<typeof PhaseTransitionSchema>;
export type ScenarioDefinition = z.infer<typeof ScenarioDefinitionSchema>;
export type ScenarioResult = z.infer<typeof ScenarioResultSchema>;
export type PreflightResult = z.infer<typeof PreflightResultSchema>;
export type VerificationSummary = z.infer<typeof VerificationSummarySchema>;
export type ScenarioExpectation = z.infer<typeof ScenarioExpectationSchema>;
export type Report = z.infer<typeof ReportSchema>;
export type NodeConfig = z.infer<typeof NodeConfigSchema>;
export type ComposeBackend = z.infer<typeof ComposeBackendSchema>;
export type KubernetesBackend = z.infer<typeof KubernetesBackendSchema>;
export type BackendConfig = z.infer<typeof BackendConfigSchema>;
export type MarkerConfig = z.infer<typeof MarkerConfigSchema>;
export type TimingConfig = z.infer<typeof TimingConfigSchema>;
export type HarnessConfig = z.infer<typeof HarnessConfigSchema>;

/** Bounded retry policy used around node-control commands. */
export interface RetryStrategy {
  maxRetries: number;
  backoff: 'exponential' | 'linear' | 'constant';
  baseDelayMs: number;
  maxDelayMs: number;
}
