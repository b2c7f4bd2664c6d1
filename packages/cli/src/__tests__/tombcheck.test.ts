import { afterEach, describe, expect, it, vi } from 'vitest';
import type { HarnessConfig, Report } from '@tombcheck/core';
import { DEFAULT_TEST_FILES, LogMarkerObserver } from '@tombcheck/harness';
import type { Cluster } from '@tombcheck/harness';

import { createTimeline, FakeCluster } from '../../../harness/src/__tests__/fake-cluster.js';
import type { FakeClusterOptions } from '../../../harness/src/__tests__/fake-cluster.js';
import { createProgram, EXIT_FAILED, EXIT_OK } from '../tombcheck.js';

// Helpers

function harness(env: Record<string, string> = {}, opts: FakeClusterOptions = {}) {
  const cluster = new FakeCluster({ files: [...DEFAULT_TEST_FILES, 'keep.mp4'], ...opts });
  const timeline = createTimeline();
  const out: string[] = [];
  const err: string[] = [];
  const configs: HarnessConfig[] = [];
  const reports: Report[] = [];

  const program = createProgram({
    env: { LOG_LEVEL: 'silent', ...env },
    clock: timeline.clock,
    sleep: timeline.sleep,
    out: (text) => out.push(text),
    err: (text) => err.push(text),
    createCluster: (config): Cluster => {
      configs.push(config);
      return {
        control: cluster,
        query: cluster,
        observer: new LogMarkerObserver(cluster, config.markers, timeline.clock),
      };
    },
    writeReport: async (report, outputDir) => {
      reports.push(report);
      return { markdownPath: `${outputDir}/report.md`, jsonPath: `${outputDir}/results.json` };
    },
  });
  program.exitOverride();

  const run = async (...args: string[]): Promise<void> => {
    await program.parseAsync(['node', 'tombcheck', ...args]);
  };
  return { cluster, out, err, configs, reports, run };
}

const WITH_SECRET = { TOMBCHECK_SECRET: 'test-secret' };

// Tests

describe('tombcheck CLI', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('run', () => {
    it('runs every scenario, writes the report and exits 0', async () => {
      const { out, reports, run } = harness(WITH_SECRET);

      await run('run');

      expect(process.exitCode).toBe(EXIT_OK);
      expect(reports).toHaveLength(1);
      expect(reports[0]?.scenarios.map((s) => s.name)).toEqual(['single-node-restart', 'partial-delete-failure']);
      expect(out[0]?.split('\n')[0]).toBe('Result:    ✓ PASSED');
      expect(out.slice(1)).toEqual(['', 'Report:  ./reports/report.md', 'Results: ./reports/results.json']);
    });

    it('runs a single scenario by name', async () => {
      const { reports, cluster, run } = harness(WITH_SECRET);

      await run('run', '--scenario', 'partial-delete-failure');

      expect(reports[0]?.scenarios.map((s) => s.name)).toEqual(['partial-delete-failure']);
      expect(cluster.calls).toEqual(['stop worker1', 'stop worker2', 'start worker1', 'start worker2']);
    });

    it('exits 1 when the cluster leaves residue', async () => {
      const { reports, run } = harness(WITH_SECRET, { cleanup: 'never' });

      await run('run', '-s', 'single-node-restart');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(reports[0]?.passed).toBe(false);
    });

    it('takes the credential from a flag', async () => {
      const { run } = harness();

      await run('run', '--secret', 'test-secret', '-s', 'single-node-restart');

      expect(process.exitCode).toBe(EXIT_OK);
    });

    it('refuses to run without a credential', async () => {
      const { err, reports, run } = harness();

      await run('run');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(err).toEqual([
        'Configuration error: coordinator.secret is required to issue deletes (set TOMBCHECK_SECRET or --secret)',
      ]);
      expect(reports).toEqual([]);
    });

    it('rejects an unknown scenario name', async () => {
      const { err, run } = harness(WITH_SECRET);

      await run('run', '-s', 'split-brain');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(err).toEqual([
        'Configuration error: Unknown scenario "split-brain". Expected one of: all, single-node-restart, partial-delete-failure',
      ]);
    });

    it('passes timing flags into the configuration', async () => {
      const { configs, run } = harness(WITH_SECRET);

      await run('run', '-s', 'single-node-restart', '--timeout', '45s', '--poll-interval', '1500', '-o', '/tmp/out');

      expect(configs[0]?.timing.convergenceTimeoutMs).toBe(45_000);
      expect(configs[0]?.timing.pollIntervalMs).toBe(1_500);
      expect(configs[0]?.outputDir).toBe('/tmp/out');
    });

    it('reports an invalid duration flag as a configuration error', async () => {
      const { err, run } = harness(WITH_SECRET);

      await run('run', '--timeout', 'later');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(err[0]).toMatch(/^Configuration error: overrides timing\.convergenceTimeoutMs: Invalid duration format/);
    });

    it('writes a report without scenarios when preflight fails', async () => {
      const { cluster, reports, run } = harness(WITH_SECRET);
      cluster.healthy = false;

      await run('run');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(reports[0]?.scenarios).toEqual([]);
      expect(reports[0]?.preflight?.passed).toBe(false);
    });

    it('skips preflight on request', async () => {
      const { cluster, reports, run } = harness(WITH_SECRET);
      cluster.healthy = false;

      await run('run', '--skip-preflight', '-s', 'single-node-restart');

      expect(process.exitCode).toBe(EXIT_OK);
      expect(reports[0]?.preflight).toBeUndefined();
    });
  });

  describe('verify', () => {
    it('checks the given files without a credential', async () => {
      const { out, reports, run } = harness();

      await run('verify', '--files', 'gone.mp4');

      expect(reports[0]?.scenarios).toEqual([]);
      expect(reports[0]?.verification?.checks.find((c) => c.name === 'no_orphan_files')?.detail).toBe(
        'None of 1 target file(s) remain',
      );
      // A fresh cluster has no tombstone or cleanup records.
      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(out[0]?.split('\n')).toContain('Verification: 3/5');
    });
  });

  describe('stats', () => {
    it('prints the coordinator counters', async () => {
      const { out, run } = harness();

      await run('stats');

      expect(process.exitCode).toBe(EXIT_OK);
      expect(out).toEqual(['active_nodes: 3\ntotal_files:  21']);
    });

    it('fails when the coordinator is unreachable', async () => {
      const { cluster, err, run } = harness();
      cluster.statsAvailable = false;

      await run('stats');

      expect(process.exitCode).toBe(EXIT_FAILED);
      expect(err).toEqual(['Error: /stats request failed: connection refused']);
    });
  });

  describe('scenarios', () => {
    it('lists the catalogue', async () => {
      const { out, run } = harness();

      await run('scenarios');

      expect(out).toEqual([
        'single-node-restart',
        '  Delete while a node is down, then restart it',
        '  stops:  worker2',
        '  files:  test_movie_0000.mp4 .. test_movie_0009.mp4 (10)',
        'partial-delete-failure',
        '  Partial delete failure with two nodes down',
        '  stops:  worker1, worker2',
        '  files:  test_movie_0010.mp4 .. test_movie_0019.mp4 (10)',
      ]);
    });
  });

  it('reports unexpected errors with their message', async () => {
    const err: string[] = [];
    const timeline = createTimeline();
    const cluster = new FakeCluster({ files: [...DEFAULT_TEST_FILES, 'keep.mp4'] });
    const writeReport = vi.fn(async (): Promise<never> => {
      throw new Error('disk full');
    });
    const program = createProgram({
      env: { LOG_LEVEL: 'silent', ...WITH_SECRET },
      clock: timeline.clock,
      sleep: timeline.sleep,
      out: () => {},
      err: (text) => err.push(text),
      createCluster: (config) => ({
        control: cluster,
        query: cluster,
        observer: new LogMarkerObserver(cluster, config.markers, timeline.clock),
      }),
      writeReport,
    });
    program.exitOverride();

    await program.parseAsync(['node', 'tombcheck', 'run', '-s', 'single-node-restart']);

    expect(writeReport).toHaveBeenCalledTimes(1);
    expect(err).toEqual(['Error: disk full']);
    expect(process.exitCode).toBe(EXIT_FAILED);
  });
});
