import { createLogger } from '@tombcheck/core';
import type { CheckResult, Logger, PreflightResult } from '@tombcheck/core';

import type { ClusterControl, ClusterQuery } from './types.js';

export interface PreflightOptions {
  control: ClusterControl;
  query: ClusterQuery;
  nodeIds: readonly string[];
  /** Minimum `total_files` the coordinator must report; 0 disables the check. */
  minFiles: number;
  logger?: Logger;
}

/**
 * Verify the environment can run scenarios at all: every node up, the
 * coordinator healthy, and enough test files uploaded.
 */
export async function runPreflight(opts: PreflightOptions): Promise<PreflightResult> {
  const log = opts.logger ?? createLogger('preflight');
  const checks: CheckResult[] = [];

  const down: string[] = [];
  for (const node of opts.nodeIds) {
    const liveness = await opts.control.status(node);
    if (liveness !== 'up') down.push(`${node} (${liveness})`);
  }
  checks.push({
    name: 'nodes_running',
    passed: down.length === 0,
    detail: down.length === 0 ? `${opts.nodeIds.length} node(s) up` : `Not running: ${down.join(', ')}`,
  });

  const healthy = await opts.query.health();
  checks.push({
    name: 'coordinator_health',
    passed: healthy,
    detail: healthy ? 'Health endpoint answered 200' : 'Health endpoint did not answer 200',
  });

  const stats = await opts.query.getStats();
  if (!stats.ok) {
    checks.push({ name: 'test_data', passed: false, detail: `Stats unavailable: ${stats.error.message}` });
  } else {
    const total = stats.stats.total_files;
    const enough = opts.minFiles === 0 || total >= opts.minFiles;
    checks.push({
      name: 'test_data',
      passed: enough,
      detail: enough
        ? `${total} file(s) indexed`
        : `Only ${total} file(s) indexed, at least ${opts.minFiles} required; upload the test set first`,
      payload: { totalFiles: total, activeNodes: stats.stats.active_nodes },
    });
  }

  const passed = checks.every((check) => check.passed);
  for (const check of checks) {
    if (check.passed) {
      log.info({ check: check.name, detail: check.detail }, 'preflight check passed');
    } else {
      log.error({ check: check.name, detail: check.detail }, 'preflight check failed');
    }
  }
  return { passed, checks };
}
