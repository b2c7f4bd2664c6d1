import { createLogger, getTracer, inSpan, ScenarioAbortedError, sleep } from '@tombcheck/core';
import type {
  HarnessConfig,
  Logger,
  PreflightResult,
  Report,
  ScenarioDefinition,
  ScenarioResult,
  VerificationSummary,
} from '@tombcheck/core';

import { ConvergencePoller } from './convergence-poller.js';
import { orchestratorSettings, ScenarioOrchestrator } from './orchestrator.js';
import { runPreflight } from './preflight.js';
import { buildReport } from './report-builder.js';
import { systemClock } from './types.js';
import type { ClusterControl, ClusterQuery, Clock, EventObserver, Sleeper } from './types.js';
import { VerificationAggregator } from './verification.js';

const tracer = getTracer('tombcheck-harness');

export interface RunHarnessOptions {
  config: HarnessConfig;
  control: ClusterControl;
  query: ClusterQuery;
  observer: EventObserver;
  scenarios: readonly ScenarioDefinition[];
  signal?: AbortSignal;
  clock?: Clock;
  sleep?: Sleeper;
  skipPreflight?: boolean;
  logger?: Logger;
}

export interface HarnessRun {
  report: Report;
  preflight?: PreflightResult;
  scenarios: ScenarioResult[];
  verification?: VerificationSummary;
  aborted: boolean;
}

/**
 * Run the whole harness: preflight, every scenario in order, the
 * verification battery, then the report. Never rejects for cluster
 * problems; they end up in the report.
 *
 * @throws ConfigError when no delete credential is configured
 */
export async function runHarness(opts: RunHarnessOptions): Promise<HarnessRun> {
  const clock = opts.clock ?? systemClock;
  const wait = opts.sleep ?? sleep;
  const log = opts.logger ?? createLogger('runner');
  const { config, control, query, observer, signal } = opts;
  const nodeIds = config.nodes.map((node) => node.id);
  const settings = orchestratorSettings(config);
  const startedAt = clock.now();

  return inSpan(tracer, 'harness.run', { scenarios: opts.scenarios.length }, async (span) => {
    const finish = (run: Omit<HarnessRun, 'report'>): HarnessRun => {
      const report = buildReport({
        coordinatorUrl: config.coordinator.url,
        startedAt,
        endedAt: clock.now(),
        generatedAt: clock.now(),
        preflight: run.preflight,
        scenarios: run.scenarios,
        verification: run.verification,
        aborted: run.aborted,
      });
      span.setAttribute('harness.passed', report.passed);
      log.info({ passed: report.passed, aborted: report.aborted }, 'run finished');
      return { ...run, report };
    };

    let preflight: PreflightResult | undefined;
    if (opts.skipPreflight) {
      log.warn('preflight skipped');
    } else {
      preflight = await runPreflight({
        control,
        query,
        nodeIds,
        minFiles: config.preflight.minFiles,
        logger: log.child({ step: 'preflight' }),
      });
      if (!preflight.passed) {
        log.error('preflight failed, no scenario will run');
        return finish({ preflight, scenarios: [], aborted: false });
      }
    }

    const poller = new ConvergencePoller({ control, observer, clock, sleep: wait });
    const orchestrator = new ScenarioOrchestrator({
      control,
      query,
      observer,
      poller,
      settings,
      clock,
      sleep: wait,
    });

    const results: ScenarioResult[] = [];
    let aborted = false;
    for (const [index, definition] of opts.scenarios.entries()) {
      if (index > 0) {
        log.info({ delayMs: config.timing.interScenarioDelayMs }, 'pausing before next scenario');
        try {
          await wait(config.timing.interScenarioDelayMs, signal);
        } catch (err: unknown) {
          if (!(err instanceof ScenarioAbortedError)) throw err;
        }
      }
      if (signal?.aborted) {
        aborted = true;
        break;
      }
      const result = await orchestrator.run(definition, signal);
      results.push(result);
      if (result.aborted) {
        aborted = true;
        break;
      }
    }

    if (aborted) {
      log.warn({ completed: results.length, total: opts.scenarios.length }, 'run aborted, skipping remaining scenarios');
    }

    let verification: VerificationSummary | undefined;
    if (!aborted || results.length > 0) {
      const targetFiles = [...new Set(results.flatMap((result) => result.targetFiles))];
      const aggregator = new VerificationAggregator({
        control,
        query,
        observer,
        nodeIds,
        coordinatorNode: config.coordinatorNode,
      });
      verification = await aggregator.verify(targetFiles);
    }

    return finish({ preflight, scenarios: results, verification, aborted });
  });
}

export interface RunVerificationOptions {
  config: HarnessConfig;
  control: ClusterControl;
  query: ClusterQuery;
  observer: EventObserver;
  targetFiles: readonly string[];
  clock?: Clock;
}

/** Run only the verification battery against the cluster as it is now. */
export async function runVerification(opts: RunVerificationOptions): Promise<HarnessRun> {
  const clock = opts.clock ?? systemClock;
  const startedAt = clock.now();
  const aggregator = new VerificationAggregator({
    control: opts.control,
    query: opts.query,
    observer: opts.observer,
    nodeIds: opts.config.nodes.map((node) => node.id),
    coordinatorNode: opts.config.coordinatorNode,
  });
  const verification = await aggregator.verify(opts.targetFiles);
  const report = buildReport({
    coordinatorUrl: opts.config.coordinator.url,
    startedAt,
    endedAt: clock.now(),
    generatedAt: clock.now(),
    scenarios: [],
    verification,
    aborted: false,
  });
  return { report, scenarios: [], verification, aborted: false };
}
