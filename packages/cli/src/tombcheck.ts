import { Command } from 'commander';

import {
  ConfigError,
  createLogger,
  errorMessage,
  HarnessError,
  initLogger,
  initTelemetry,
  loadConfig,
  shutdownTelemetry,
} from '@tombcheck/core';
import type { HarnessConfig, HarnessConfigInput, Report } from '@tombcheck/core';
import {
  buildScenarios,
  createCluster,
  DEFAULT_TEST_FILES,
  runHarness,
  runVerification,
  selectScenarios,
  systemClock,
} from '@tombcheck/harness';
import type { Clock, Cluster, Sleeper } from '@tombcheck/harness';

import { writeReport } from './report-writer.js';
import type { WrittenReport } from './report-writer.js';
import { formatRunSummary, formatStats } from './summary-formatter.js';

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_INTERRUPTED = 130;

/** Seams for tests; every field defaults to the real implementation. */
export interface ProgramDeps {
  createCluster?: (config: HarnessConfig) => Cluster;
  writeReport?: (report: Report, outputDir: string) => Promise<WrittenReport>;
  env?: Record<string, string | undefined>;
  clock?: Clock;
  sleep?: Sleeper;
  out?: (text: string) => void;
  err?: (text: string) => void;
}

interface CommonOptions {
  config?: string;
  url?: string;
  secret?: string;
  output?: string;
  logFile?: string;
}

interface RunOptions extends CommonOptions {
  scenario: string;
  timeout?: string;
  pollInterval?: string;
  skipPreflight?: boolean;
}

interface VerifyOptions extends CommonOptions {
  files?: string[];
}

function overridesFrom(opts: RunOptions | CommonOptions): HarnessConfigInput {
  const overrides: HarnessConfigInput = {};
  const coordinator: NonNullable<HarnessConfigInput['coordinator']> = {};
  if (opts.url) coordinator.url = opts.url;
  if (opts.secret) coordinator.secret = opts.secret;
  if (Object.keys(coordinator).length > 0) overrides.coordinator = coordinator;
  if (opts.output) overrides.outputDir = opts.output;
  if (opts.logFile) overrides.logFile = opts.logFile;

  if ('scenario' in opts) {
    const timing: NonNullable<HarnessConfigInput['timing']> = {};
    if (opts.timeout) timing.convergenceTimeoutMs = opts.timeout;
    if (opts.pollInterval) timing.pollIntervalMs = opts.pollInterval;
    if (Object.keys(timing).length > 0) overrides.timing = timing;
  }
  return overrides;
}

function withCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <file>', 'JSON config file (default: $TOMBCHECK_CONFIG)')
    .option('--url <url>', 'coordinator base URL')
    .option('--secret <secret>', 'delete credential')
    .option('-o, --output <dir>', 'report output directory')
    .option('--log-file <file>', 'also append logs to this file');
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const env = deps.env ?? process.env;
  const clock = deps.clock ?? systemClock;
  const out = deps.out ?? ((text: string) => console.log(text));
  const err = deps.err ?? ((text: string) => console.error(text));
  const makeCluster = deps.createCluster ?? ((config: HarnessConfig) => createCluster(config));
  const persist = deps.writeReport ?? writeReport;

  async function prepare(opts: CommonOptions): Promise<HarnessConfig> {
    const config = await loadConfig({ file: opts.config, env, overrides: overridesFrom(opts) });
    initLogger({ level: config.logLevel, file: config.logFile });
    initTelemetry({ serviceName: 'tombcheck' });
    return config;
  }

  async function finish(report: Report, outputDir: string): Promise<void> {
    const written = await persist(report, outputDir);
    out(formatRunSummary(report));
    out('');
    out(`Report:  ${written.markdownPath}`);
    out(`Results: ${written.jsonPath}`);
  }

  /** Run `body` with config errors reported as exit status 1. */
  async function guarded(body: () => Promise<number>): Promise<void> {
    try {
      process.exitCode = await body();
    } catch (error: unknown) {
      if (error instanceof ConfigError) {
        err(`Configuration error: ${error.message}`);
      } else if (error instanceof HarnessError) {
        err(`Error [${error.code}]: ${error.message}`);
      } else {
        err(`Error: ${errorMessage(error)}`);
      }
      process.exitCode = EXIT_FAILED;
    } finally {
      await shutdownTelemetry();
    }
  }

  const program = new Command();
  program
    .name('tombcheck')
    .description('Fault-injection verification of a distributed store\'s tombstone deletion protocol')
    .version('0.1.0');

  withCommonOptions(
    program
      .command('run')
      .description('Run fault-injection scenarios, verify the cluster and write a report')
      .option('-s, --scenario <name>', 'scenario to run: all, single-node-restart, partial-delete-failure', 'all')
      .option('--timeout <duration>', 'convergence timeout per scenario, e.g. 30s')
      .option('--poll-interval <duration>', 'convergence poll interval, e.g. 5s')
      .option('--skip-preflight', 'do not check the environment before running'),
  ).action(async (opts: RunOptions) => {
    await guarded(async () => {
      const config = await prepare(opts);
      const log = createLogger('cli');
      const scenarios = selectScenarios(buildScenarios(config), opts.scenario);
      const cluster = makeCluster(config);

      const controller = new AbortController();
      const onSignal = (signal: NodeJS.Signals): void => {
        log.warn({ signal }, 'interrupt received, stopping after the current step');
        controller.abort();
      };
      process.on('SIGINT', onSignal);
      process.on('SIGTERM', onSignal);

      try {
        log.info({ scenarios: scenarios.map((s) => s.name), url: config.coordinator.url }, 'starting run');
        const run = await runHarness({
          config,
          ...cluster,
          scenarios,
          signal: controller.signal,
          clock,
          sleep: deps.sleep,
          skipPreflight: opts.skipPreflight ?? false,
        });
        await finish(run.report, config.outputDir);
        if (run.aborted) return EXIT_INTERRUPTED;
        return run.report.passed ? EXIT_OK : EXIT_FAILED;
      } finally {
        process.off('SIGINT', onSignal);
        process.off('SIGTERM', onSignal);
      }
    });
  });

  withCommonOptions(
    program
      .command('verify')
      .description('Run only the verification checks against the cluster as it is now')
      .option('-f, --files <names...>', 'target files that must be gone (default: the full test set)'),
  ).action(async (opts: VerifyOptions) => {
    await guarded(async () => {
      const config = await prepare(opts);
      const run = await runVerification({
        config,
        ...makeCluster(config),
        targetFiles: opts.files ?? DEFAULT_TEST_FILES,
        clock,
      });
      await finish(run.report, config.outputDir);
      return run.report.passed ? EXIT_OK : EXIT_FAILED;
    });
  });

  withCommonOptions(program.command('stats').description('Print coordinator statistics')).action(
    async (opts: CommonOptions) => {
      await guarded(async () => {
        const config = await prepare(opts);
        const stats = await makeCluster(config).query.getStats();
        if (!stats.ok) {
          err(`Error: ${stats.error.message}`);
          return EXIT_FAILED;
        }
        out(formatStats(stats.stats));
        return EXIT_OK;
      });
    },
  );

  withCommonOptions(program.command('scenarios').description('List the scenario catalogue')).action(
    async (opts: CommonOptions) => {
      await guarded(async () => {
        const config = await prepare(opts);
        for (const scenario of buildScenarios(config)) {
          out(`${scenario.name}`);
          out(`  ${scenario.title}`);
          out(`  stops:  ${scenario.faultNodes.join(', ')}`);
          out(`  files:  ${scenario.targetFiles[0] ?? ''} .. ${scenario.targetFiles[scenario.targetFiles.length - 1] ?? ''} (${scenario.targetFiles.length})`);
        }
        return EXIT_OK;
      });
    },
  );

  return program;
}
