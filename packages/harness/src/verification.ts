import { createLogger, errorMessage, getTracer, inSpan } from '@tombcheck/core';
import type { CheckResult, Logger, OrphanFile, VerificationSummary } from '@tombcheck/core';

import type { ClusterControl, ClusterQuery, EventObserver } from './types.js';

const tracer = getTracer('tombcheck-harness');

export const CHECK_NAMES = [
  'tombstone_records',
  'worker_files',
  'no_orphan_files',
  'index_consistency',
  'auto_cleanup',
] as const;

export type CheckName = (typeof CHECK_NAMES)[number];

export interface VerificationDeps {
  control: ClusterControl;
  query: ClusterQuery;
  observer: EventObserver;
  nodeIds: readonly string[];
  coordinatorNode: string;
  logger?: Logger;
}

type CheckBody = Omit<CheckResult, 'name'>;

/**
 * Independent post-run checks over the whole cluster. Every check always
 * runs; a check that throws is recorded as failed with the error text.
 */
export class VerificationAggregator {
  private readonly log: Logger;

  constructor(private readonly deps: VerificationDeps) {
    this.log = deps.logger ?? createLogger('verification');
  }

  async verify(targetFiles: readonly string[]): Promise<VerificationSummary> {
    const battery: Record<CheckName, () => Promise<CheckBody>> = {
      tombstone_records: () => this.tombstoneRecords(),
      worker_files: () => this.workerFiles(),
      no_orphan_files: () => this.noOrphanFiles(targetFiles),
      index_consistency: () => this.indexConsistency(),
      auto_cleanup: () => this.autoCleanup(),
    };

    const checks: CheckResult[] = [];
    for (const name of CHECK_NAMES) {
      checks.push(await this.runCheck(name, battery[name]));
    }

    const passedCount = checks.filter((check) => check.passed).length;
    const summary: VerificationSummary = {
      checks,
      passedCount,
      total: checks.length,
      passed: passedCount === checks.length,
    };
    this.log.info({ passed: summary.passed, passedCount, total: summary.total }, 'verification finished');
    return summary;
  }

  private async runCheck(name: CheckName, body: () => Promise<CheckBody>): Promise<CheckResult> {
    return inSpan(tracer, 'verification.check', { 'check.name': name }, async (span) => {
      let result: CheckResult;
      try {
        result = { name, ...(await body()) };
      } catch (err: unknown) {
        result = { name, passed: false, detail: `Check threw an exception: ${errorMessage(err)}` };
      }
      span.setAttribute('check.passed', result.passed);
      if (result.passed) {
        this.log.info({ check: name, detail: result.detail }, 'check passed');
      } else {
        this.log.warn({ check: name, detail: result.detail }, 'check failed');
      }
      return result;
    });
  }

  private async tombstoneRecords(): Promise<CheckBody> {
    const { observer, coordinatorNode } = this.deps;
    const tombstones = await observer.count(coordinatorNode, 'tombstone-created');
    const cleanups = await observer.count(coordinatorNode, 'auto-cleanup');
    return {
      passed: tombstones > 0,
      detail:
        tombstones > 0
          ? `${tombstones} tombstone record(s), ${cleanups} auto-cleanup record(s)`
          : 'No tombstone records in coordinator logs',
      payload: { tombstones, cleanups },
    };
  }

  private async workerFiles(): Promise<CheckBody> {
    const counts: Record<string, number | null> = {};
    const empty: string[] = [];
    const unreadable: string[] = [];
    for (const node of this.deps.nodeIds) {
      try {
        const files = await this.deps.control.listFiles(node);
        counts[node] = files.size;
        if (files.size === 0) empty.push(node);
      } catch (err: unknown) {
        counts[node] = null;
        unreadable.push(`${node} (${errorMessage(err)})`);
      }
    }

    const problems = [
      ...(empty.length > 0 ? [`empty: ${empty.join(', ')}`] : []),
      ...(unreadable.length > 0 ? [`unreadable: ${unreadable.join(', ')}`] : []),
    ];
    return {
      passed: problems.length === 0,
      detail:
        problems.length === 0
          ? this.deps.nodeIds.map((node) => `${node}=${String(counts[node])}`).join(', ')
          : problems.join('; '),
      payload: { counts },
    };
  }

  private async noOrphanFiles(targetFiles: readonly string[]): Promise<CheckBody> {
    const orphans: OrphanFile[] = [];
    const unreadable: string[] = [];
    for (const node of this.deps.nodeIds) {
      let files: ReadonlySet<string>;
      try {
        files = await this.deps.control.listFiles(node);
      } catch (err: unknown) {
        unreadable.push(`${node} (${errorMessage(err)})`);
        continue;
      }
      for (const file of targetFiles) {
        if (files.has(file)) orphans.push({ node, file });
      }
    }

    let detail: string;
    if (unreadable.length > 0) {
      detail = `Could not list ${unreadable.join(', ')}`;
    } else if (orphans.length > 0) {
      detail = `${orphans.length} orphan file(s) found`;
    } else {
      detail = `None of ${targetFiles.length} target file(s) remain`;
    }
    return {
      passed: orphans.length === 0 && unreadable.length === 0,
      detail,
      payload: { orphans },
    };
  }

  private async indexConsistency(): Promise<CheckBody> {
    const stats = await this.deps.query.getStats();
    if (!stats.ok) {
      return { passed: false, detail: `Stats unavailable: ${stats.error.message}` };
    }
    const coordinatorFiles = stats.stats.total_files;

    let total = 0;
    let complete = true;
    for (const node of this.deps.nodeIds) {
      try {
        total += (await this.deps.control.listFiles(node)).size;
      } catch (err: unknown) {
        this.log.warn({ node, err: errorMessage(err) }, 'listing failed, aggregate node count unknown');
        complete = false;
        break;
      }
    }
    const nodeFiles = complete ? total : null;
    // Replicas make the node total larger than the index; reported, not enforced.
    const replicasCoverIndex = nodeFiles === null ? null : nodeFiles >= coordinatorFiles;

    return {
      passed: coordinatorFiles > 0,
      detail: `coordinator=${coordinatorFiles}, nodes=${nodeFiles === null ? 'unknown' : nodeFiles}`,
      payload: { coordinatorFiles, nodeFiles, replicasCoverIndex },
    };
  }

  private async autoCleanup(): Promise<CheckBody> {
    const sources = [...this.deps.nodeIds, this.deps.coordinatorNode];
    const seenOn: string[] = [];
    const unreadable: string[] = [];
    for (const source of sources) {
      try {
        if ((await this.deps.observer.count(source, 'auto-cleanup')) > 0) {
          seenOn.push(source);
        }
      } catch (err: unknown) {
        unreadable.push(`${source} (${errorMessage(err)})`);
      }
    }

    let detail: string;
    if (seenOn.length > 0) {
      detail = `Auto-cleanup seen on ${seenOn.join(', ')}`;
    } else if (unreadable.length > 0) {
      detail = `No auto-cleanup records; could not read ${unreadable.join(', ')}`;
    } else {
      detail = 'No auto-cleanup records in any log';
    }
    return { passed: seenOn.length > 0, detail, payload: { sources: seenOn } };
  }
}
