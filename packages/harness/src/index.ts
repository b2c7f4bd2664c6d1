// Ports
export { systemClock } from './types.js';
export type {
  ClusterControl,
  ClusterQuery,
  Clock,
  CommandExecutor,
  ControlOutcome,
  EventObserver,
  Sleeper,
  StatsResult,
} from './types.js';

// Backends
export { createCommandExecutor } from './command-executor.js';
export { ComposeControl } from './compose-control.js';
export type { ComposeControlOptions } from './compose-control.js';
export { createKubeApi } from './kube-api.js';
export type { ExecResult, KubeApi, PodSummary } from './kube-api.js';
export { KubeControl } from './kube-control.js';
export type { KubeControlOptions } from './kube-control.js';
export { HttpClusterQuery } from './http-query.js';
export type { HttpClusterQueryOptions } from './http-query.js';
export { createCluster } from './cluster.js';
export type { Cluster, CreateClusterOverrides } from './cluster.js';

// Protocol observation
export { LogMarkerObserver, classifyLine, countMarker, markerFor } from './event-observer.js';
export { ConvergencePoller } from './convergence-poller.js';
export type { ConvergencePollerDeps, ConvergenceRequest, ConvergenceResult } from './convergence-poller.js';

// Scenarios
export {
  DEFAULT_TEST_FILES,
  PARTIAL_DELETE_FAILURE,
  SCENARIO_NAMES,
  SINGLE_NODE_RESTART,
  buildScenarios,
  isScenarioName,
  selectScenarios,
  testFileNames,
} from './scenarios.js';
export type { ScenarioName } from './scenarios.js';
export { ScenarioOrchestrator, orchestratorSettings } from './orchestrator.js';
export type { OrchestratorDeps, OrchestratorSettings } from './orchestrator.js';

// Verification and reporting
export { CHECK_NAMES, VerificationAggregator } from './verification.js';
export type { CheckName, VerificationDeps } from './verification.js';
export { runPreflight } from './preflight.js';
export type { PreflightOptions } from './preflight.js';
export {
  REPORT_TITLE,
  RESPONSE_PREVIEW_LENGTH,
  buildReport,
  escapeCell,
  renderJson,
  renderMarkdown,
  scenarioExpectations,
} from './report-builder.js';
export type { ReportInput } from './report-builder.js';
export { runHarness, runVerification } from './runner.js';
export type { HarnessRun, RunHarnessOptions, RunVerificationOptions } from './runner.js';
