import {
  ConfigError,
  ControlError,
  createLogger,
  errorMessage,
  getMeter,
  getTracer,
  inSpan,
  ScenarioAbortedError,
  sleep,
} from '@tombcheck/core';
import type {
  ClusterStats,
  DeleteOutcome,
  HarnessConfig,
  Logger,
  NodeHandle,
  NodeLiveness,
  OrphanFile,
  PhaseTransition,
  ProtocolEvent,
  ScenarioDefinition,
  ScenarioPhase,
  ScenarioResult,
  TimingConfig,
} from '@tombcheck/core';

import type { ConvergencePoller } from './convergence-poller.js';
import { systemClock } from './types.js';
import type { ClusterControl, ClusterQuery, Clock, EventObserver, Sleeper } from './types.js';

const tracer = getTracer('tombcheck-harness');
const meter = getMeter('tombcheck-harness');
const deleteCounter = meter.createCounter('tombcheck.deletes', {
  description: 'Delete requests issued by scenarios, by HTTP status',
});

export interface OrchestratorSettings {
  /** Every storage node; all of them are re-listed after recovery. */
  nodeIds: readonly string[];
  /** Node id whose logs carry the coordinator's tombstone messages. */
  coordinatorNode: string;
  secret: string;
  timing: TimingConfig;
}

/**
 * @throws ConfigError when no delete credential is configured
 */
export function orchestratorSettings(config: HarnessConfig): OrchestratorSettings {
  const secret = config.coordinator.secret;
  if (!secret) {
    throw new ConfigError('coordinator.secret is required to issue deletes (set TOMBCHECK_SECRET or --secret)');
  }
  return {
    nodeIds: config.nodes.map((node) => node.id),
    coordinatorNode: config.coordinatorNode,
    secret,
    timing: config.timing,
  };
}

export interface OrchestratorDeps {
  control: ClusterControl;
  query: ClusterQuery;
  observer: EventObserver;
  poller: ConvergencePoller;
  settings: OrchestratorSettings;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
}

/**
 * Mutable working copy of a scenario's result. Lives only inside one
 * `run()` call and is frozen into a ScenarioResult when the scenario ends.
 */
interface ScenarioDraft {
  definition: ScenarioDefinition;
  liveness: Map<string, NodeLiveness>;
  stopped: string[];
  deleteOutcomes: DeleteOutcome[];
  tombstoneCreated: boolean;
  partialFailureDetected: boolean | null;
  autoCleanup: boolean;
  residueFree: boolean;
  residue: OrphanFile[];
  cleanupEvents: ProtocolEvent[];
  baselineStats?: ClusterStats;
  finalStats?: ClusterStats;
  phases: PhaseTransition[];
  failureReason?: string;
  aborted: boolean;
  startedAt: Date;
}

/**
 * ScenarioOrchestrator drives one fault-injection scenario through its
 * phases: init → fault-injected → operation-issued → fault-recovered →
 * converging → done.
 *
 * The orchestrator:
 *   - stops the scenario's fault nodes and waits for confirmation
 *   - deletes every target file against the degraded cluster
 *   - reads the coordinator's logs for tombstone / partial-failure markers
 *   - restarts the stopped nodes
 *   - waits for convergence, then re-lists every node for residue
 *
 * A stop/start failure ends only this scenario. Whatever happens, nodes this
 * scenario stopped are started again before `run()` returns.
 */
export class ScenarioOrchestrator {
  private readonly control: ClusterControl;
  private readonly query: ClusterQuery;
  private readonly observer: EventObserver;
  private readonly poller: ConvergencePoller;
  private readonly settings: OrchestratorSettings;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly log: Logger;

  constructor(deps: OrchestratorDeps) {
    this.control = deps.control;
    this.query = deps.query;
    this.observer = deps.observer;
    this.poller = deps.poller;
    this.settings = deps.settings;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? sleep;
    this.log = deps.logger ?? createLogger('orchestrator');
  }

  /**
   * Run one scenario to completion. Never rejects: failures, aborts and
   * unexpected errors all end in a `failed` result.
   */
  async run(definition: ScenarioDefinition, signal?: AbortSignal): Promise<ScenarioResult> {
    const log = this.log.child({ scenario: definition.name });
    const draft: ScenarioDraft = {
      definition,
      liveness: new Map(this.settings.nodeIds.map((id) => [id, 'unknown'])),
      stopped: [],
      deleteOutcomes: [],
      tombstoneCreated: false,
      partialFailureDetected: definition.checkPartialFailure ? false : null,
      autoCleanup: false,
      residueFree: false,
      residue: [],
      cleanupEvents: [],
      phases: [],
      aborted: false,
      startedAt: this.clock.now(),
    };

    log.info({ title: definition.title, faultNodes: definition.faultNodes }, 'scenario started');

    try {
      await this.phaseInit(draft, log);
      this.checkAbort(signal);
      await this.phaseInjectFault(draft, log, signal);
      this.checkAbort(signal);
      await this.phaseIssueDeletes(draft, log, signal);
      await this.phaseInspectCoordinator(draft, log);
      this.checkAbort(signal);
      await this.phaseRecover(draft, log, signal);
      this.checkAbort(signal);
      await this.phaseConverge(draft, log, signal);
      await this.phaseCheckResidue(draft, log);
    } catch (err: unknown) {
      if (err instanceof ScenarioAbortedError) {
        draft.aborted = true;
        draft.failureReason = 'aborted by operator';
        log.warn('scenario aborted');
      } else if (err instanceof ControlError) {
        draft.failureReason = err.message;
        log.error({ node: err.node, reason: err.message }, 'scenario failed');
      } else {
        draft.failureReason = `unexpected error: ${errorMessage(err)}`;
        log.error({ err: errorMessage(err) }, 'scenario crashed');
      }
      await this.restoreStoppedNodes(draft, log);
    }

    this.enter(draft, 'done');
    const result = this.freeze(draft);
    log.info(
      {
        status: result.status,
        tombstoneCreated: result.tombstoneCreated,
        autoCleanup: result.autoCleanup,
        residueFree: result.residueFree,
        durationMs: result.durationMs,
      },
      'scenario finished',
    );
    return result;
  }

  // --- Phases ---

  private async phaseInit(draft: ScenarioDraft, log: Logger): Promise<void> {
    await inSpan(tracer, 'scenario.init', { scenario: draft.definition.name }, async () => {
      this.enter(draft, 'init');
      for (const id of this.settings.nodeIds) {
        draft.liveness.set(id, await this.control.status(id));
      }
      const stats = await this.query.getStats();
      if (stats.ok) {
        draft.baselineStats = stats.stats;
        log.info(
          { totalFiles: stats.stats.total_files, activeNodes: stats.stats.active_nodes },
          'baseline stats',
        );
      } else {
        log.warn({ err: stats.error.message }, 'baseline stats unavailable');
      }
    });
  }

  private async phaseInjectFault(draft: ScenarioDraft, log: Logger, signal?: AbortSignal): Promise<void> {
    await inSpan(tracer, 'scenario.inject_fault', { scenario: draft.definition.name }, async () => {
      for (const node of draft.definition.faultNodes) {
        const outcome = await this.control.stop(node);
        if (!outcome.ok) {
          draft.liveness.set(node, 'unknown');
          throw new ControlError(node, `failed to stop ${node}: ${outcome.error}`);
        }
        draft.liveness.set(node, 'down');
        draft.stopped.push(node);
        log.info({ node }, 'node stopped');
      }
      this.enter(draft, 'fault-injected');
      await this.sleep(draft.definition.settleAfterStopMs ?? this.settings.timing.settleAfterStopMs, signal);
    });
  }

  private async phaseIssueDeletes(draft: ScenarioDraft, log: Logger, signal?: AbortSignal): Promise<void> {
    await inSpan(tracer, 'scenario.issue_deletes', { scenario: draft.definition.name }, async () => {
      const files = draft.definition.targetFiles;
      for (const [index, file] of files.entries()) {
        const outcome = await this.query.deleteFile(file, this.settings.secret);
        draft.deleteOutcomes.push(outcome);
        deleteCounter.add(1, { status: String(outcome.status), scenario: draft.definition.name });
        log.info(
          { file, status: outcome.status, response: outcome.response ?? outcome.error ?? '' },
          outcome.status === 200 ? 'delete accepted' : 'delete rejected',
        );
        if (index < files.length - 1) {
          await this.sleep(this.settings.timing.deleteSpacingMs, signal);
        }
      }
      this.enter(draft, 'operation-issued');

      const rejected = draft.deleteOutcomes.filter((outcome) => outcome.status !== 200).length;
      log.info({ rejected, total: files.length }, 'deletes issued');
      if (draft.definition.expectDeleteFailure && rejected === 0) {
        log.warn('every delete was accepted although degraded availability was expected');
      }
    });
  }

  private async phaseInspectCoordinator(draft: ScenarioDraft, log: Logger): Promise<void> {
    await inSpan(tracer, 'scenario.inspect_coordinator', { scenario: draft.definition.name }, async () => {
      const kinds = draft.definition.checkPartialFailure
        ? (['tombstone-created', 'partial-delete-failure'] as const)
        : (['tombstone-created'] as const);
      const events = await this.observer.scan(this.settings.coordinatorNode, [], kinds);
      draft.tombstoneCreated = events.some((event) => event.kind === 'tombstone-created');
      if (draft.definition.checkPartialFailure) {
        draft.partialFailureDetected = events.some((event) => event.kind === 'partial-delete-failure');
      }
      log.info(
        { tombstoneCreated: draft.tombstoneCreated, partialFailureDetected: draft.partialFailureDetected },
        'coordinator markers',
      );
    });
  }

  private async phaseRecover(draft: ScenarioDraft, log: Logger, signal?: AbortSignal): Promise<void> {
    await inSpan(tracer, 'scenario.recover', { scenario: draft.definition.name }, async () => {
      const failure = await this.startNodes(draft, log);
      if (failure) {
        throw failure;
      }
      this.enter(draft, 'fault-recovered');
      await this.sleep(this.settings.timing.settleAfterStartMs, signal);
    });
  }

  private async phaseConverge(draft: ScenarioDraft, log: Logger, signal?: AbortSignal): Promise<void> {
    await inSpan(tracer, 'scenario.converge', { scenario: draft.definition.name }, async () => {
      this.enter(draft, 'converging');
      const result = await this.poller.awaitConvergence({
        nodeIds: this.settings.nodeIds,
        targetFiles: draft.definition.targetFiles,
        timeoutMs: this.settings.timing.convergenceTimeoutMs,
        pollIntervalMs: this.settings.timing.pollIntervalMs,
        logSources: [...this.settings.nodeIds, this.settings.coordinatorNode],
        signal,
      });
      draft.autoCleanup = result.converged;
      draft.cleanupEvents = result.eventsSeen;
      log.info(
        { converged: result.converged, rounds: result.rounds, events: result.eventsSeen.length },
        'convergence wait finished',
      );
      if (result.aborted) {
        throw new ScenarioAbortedError();
      }
    });
  }

  private async phaseCheckResidue(draft: ScenarioDraft, log: Logger): Promise<void> {
    await inSpan(tracer, 'scenario.check_residue', { scenario: draft.definition.name }, async () => {
      const unreadable: string[] = [];
      for (const node of this.settings.nodeIds) {
        let files: ReadonlySet<string>;
        try {
          files = await this.control.listFiles(node);
        } catch (err: unknown) {
          unreadable.push(node);
          log.error({ node, err: errorMessage(err) }, 'cannot list node for residue check');
          continue;
        }
        const found = draft.definition.targetFiles.filter((file) => files.has(file));
        for (const file of found) {
          draft.residue.push({ node, file });
        }
        if (found.length > 0) {
          log.error({ node, files: found }, 'residual files found');
        } else {
          log.info({ node }, 'no residual files');
        }
      }

      draft.residueFree = draft.residue.length === 0 && unreadable.length === 0;
      if (unreadable.length > 0) {
        draft.failureReason = `could not list ${unreadable.join(', ')}`;
      } else if (draft.residue.length > 0) {
        draft.failureReason = `${draft.residue.length} residual file(s) after recovery`;
      }

      const stats = await this.query.getStats();
      if (stats.ok) {
        draft.finalStats = stats.stats;
        log.info({ totalFiles: stats.stats.total_files }, 'final stats');
      }
    });
  }

  // --- Helpers ---

  private checkAbort(signal?: AbortSignal): void {
    if (signal?.aborted) {
      throw new ScenarioAbortedError();
    }
  }

  private enter(draft: ScenarioDraft, phase: ScenarioPhase): void {
    draft.phases.push({ phase, at: this.clock.now().toISOString() });
  }

  /** Start every node this scenario stopped. Returns the first failure, if any. */
  private async startNodes(draft: ScenarioDraft, log: Logger): Promise<ControlError | undefined> {
    let failure: ControlError | undefined;
    for (const node of [...draft.stopped]) {
      const outcome = await this.control.start(node);
      if (outcome.ok) {
        draft.liveness.set(node, 'up');
        draft.stopped = draft.stopped.filter((id) => id !== node);
        log.info({ node }, 'node started');
      } else {
        draft.liveness.set(node, 'unknown');
        failure ??= new ControlError(node, `failed to start ${node}: ${outcome.error}`);
        log.error({ node, err: outcome.error }, 'node failed to start');
      }
    }
    return failure;
  }

  /** Recovery after a failure or abort: start whatever is still stopped. */
  private async restoreStoppedNodes(draft: ScenarioDraft, log: Logger): Promise<void> {
    if (draft.stopped.length === 0) return;
    log.warn({ nodes: draft.stopped }, 'restarting nodes stopped by this scenario');
    const failure = await this.startNodes(draft, log);
    if (failure && failure.message !== draft.failureReason) {
      draft.failureReason = `${draft.failureReason ?? 'scenario failed'}; ${failure.message}`;
    }
  }

  private freeze(draft: ScenarioDraft): ScenarioResult {
    const endedAt = this.clock.now();
    const nodes: NodeHandle[] = this.settings.nodeIds.map((id) => ({
      id,
      liveness: draft.liveness.get(id) ?? 'unknown',
    }));
    const passed = draft.residueFree && !draft.aborted && draft.failureReason === undefined;

    const result: ScenarioResult = {
      name: draft.definition.name,
      title: draft.definition.title,
      targetFiles: [...draft.definition.targetFiles],
      faultNodes: [...draft.definition.faultNodes],
      nodes,
      deleteOutcomes: [...draft.deleteOutcomes],
      expectDeleteFailure: draft.definition.expectDeleteFailure,
      tombstoneCreated: draft.tombstoneCreated,
      partialFailureDetected: draft.partialFailureDetected,
      autoCleanup: draft.autoCleanup,
      residueFree: draft.residueFree,
      residue: [...draft.residue],
      cleanupEvents: [...draft.cleanupEvents],
      phases: [...draft.phases],
      status: passed ? 'passed' : 'failed',
      aborted: draft.aborted,
      startedAt: draft.startedAt.toISOString(),
      endedAt: endedAt.toISOString(),
      durationMs: Math.max(0, endedAt.getTime() - draft.startedAt.getTime()),
    };
    if (draft.baselineStats) result.baselineStats = draft.baselineStats;
    if (draft.finalStats) result.finalStats = draft.finalStats;
    if (draft.failureReason !== undefined) result.failureReason = draft.failureReason;
    return Object.freeze(result);
  }
}
