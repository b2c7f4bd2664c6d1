/**
 * In-memory stand-in for the storage cluster, implementing both ports.
 *
 * Every file is replicated to every node. Deleting a file while some of its
 * holders are down records a tombstone on the coordinator; starting a node
 * removes the tombstoned files it still holds and logs the cleanup, the way
 * the coordinator does when a node re-registers.
 */
import {
  ClusterAccessError,
  ClusterUnreachableError,
  DEFAULT_CONFIG,
  DEFAULT_MARKERS,
  ScenarioAbortedError,
} from '@tombcheck/core';
import type { DeleteOutcome, HarnessConfig, NodeLiveness } from '@tombcheck/core';

import type { ClusterControl, ClusterQuery, Clock, ControlOutcome, Sleeper, StatsResult } from '../types.js';

export const SECRET = 'test-secret';
export const COORDINATOR = 'master';
export const NODE_IDS = ['worker1', 'worker2', 'worker3'] as const;

interface FakeNode {
  up: boolean;
  files: Set<string>;
  logs: string[];
}

export interface FakeClusterOptions {
  files?: readonly string[];
  /** `never` keeps tombstoned replicas on restarted nodes. */
  cleanup?: 'on-start' | 'never';
}

export class FakeCluster implements ClusterControl, ClusterQuery {
  readonly nodes = new Map<string, FakeNode>();
  readonly coordinatorLogs: string[] = [];
  readonly index = new Set<string>();
  readonly tombstones = new Set<string>();
  readonly calls: string[] = [];

  healthy = true;
  statsAvailable = true;
  cleanup: 'on-start' | 'never';
  readonly stopFailures = new Set<string>();
  readonly startFailures = new Set<string>();
  readonly listFailures = new Set<string>();
  readonly logFailures = new Set<string>();
  /** Called after each stop/start; lets tests abort mid-scenario. */
  onControl?: (action: 'stop' | 'start', nodeId: string) => void;

  constructor(opts: FakeClusterOptions = {}) {
    this.cleanup = opts.cleanup ?? 'on-start';
    for (const id of NODE_IDS) {
      this.nodes.set(id, { up: true, files: new Set(), logs: [] });
    }
    for (const file of opts.files ?? []) {
      this.upload(file);
    }
  }

  upload(file: string): void {
    this.index.add(file);
    for (const node of this.nodes.values()) node.files.add(file);
  }

  // --- ClusterControl ---

  async stop(nodeId: string): Promise<ControlOutcome> {
    this.calls.push(`stop ${nodeId}`);
    const node = this.nodes.get(nodeId);
    if (!node) return { ok: false, error: `no such node ${nodeId}` };
    if (this.stopFailures.has(nodeId)) return { ok: false, error: `cannot stop ${nodeId}` };
    node.up = false;
    this.onControl?.('stop', nodeId);
    return { ok: true };
  }

  async start(nodeId: string): Promise<ControlOutcome> {
    this.calls.push(`start ${nodeId}`);
    const node = this.nodes.get(nodeId);
    if (!node) return { ok: false, error: `no such node ${nodeId}` };
    if (this.startFailures.has(nodeId)) return { ok: false, error: `cannot start ${nodeId}` };
    node.up = true;
    if (this.cleanup === 'on-start') {
      for (const file of [...node.files]) {
        if (!this.tombstones.has(file)) continue;
        node.files.delete(file);
        this.coordinatorLogs.push(`[master] ${DEFAULT_MARKERS.autoCleanup} ${file} @ ${nodeId}`);
        this.releaseTombstone(file);
      }
    }
    this.onControl?.('start', nodeId);
    return { ok: true };
  }

  async status(nodeId: string): Promise<NodeLiveness> {
    const node = this.nodes.get(nodeId);
    if (!node) return 'unknown';
    return node.up ? 'up' : 'down';
  }

  async listFiles(nodeId: string): Promise<ReadonlySet<string>> {
    const node = this.nodes.get(nodeId);
    if (!node || !node.up || this.listFailures.has(nodeId)) {
      throw new ClusterAccessError(nodeId, `cannot list ${nodeId}`);
    }
    return new Set(node.files);
  }

  fetchLogs(nodeId: string): Promise<string>;
  fetchLogs(nodeId: string, pattern: string): Promise<string[]>;
  async fetchLogs(nodeId: string, pattern?: string): Promise<string | string[]> {
    if (this.logFailures.has(nodeId)) {
      throw new ClusterAccessError(nodeId, `cannot read logs of ${nodeId}`);
    }
    const lines = nodeId === COORDINATOR ? this.coordinatorLogs : this.nodes.get(nodeId)?.logs;
    if (!lines) throw new ClusterAccessError(nodeId, `no such node ${nodeId}`);
    if (pattern === undefined) return lines.map((line) => `${line}\n`).join('');
    return lines.filter((line) => line.includes(pattern));
  }

  // --- ClusterQuery ---

  async deleteFile(name: string, credential: string): Promise<DeleteOutcome> {
    const timestamp = '2026-01-01T00:00:00.000Z';
    if (credential !== SECRET) return { file: name, status: 401, response: 'Unauthorized', timestamp };
    if (!this.index.has(name)) return { file: name, status: 404, response: 'Not Found', timestamp };

    let deleted = 0;
    let missed = 0;
    for (const node of this.nodes.values()) {
      if (!node.files.has(name)) continue;
      if (node.up) {
        node.files.delete(name);
        deleted++;
      } else {
        missed++;
      }
    }
    this.index.delete(name);
    if (missed > 0) {
      this.tombstones.add(name);
      this.coordinatorLogs.push(
        `[master] ${name} ${DEFAULT_MARKERS.partialFailure} (${missed}), ${DEFAULT_MARKERS.tombstoneCreated}`,
      );
    }
    if (deleted === 0) {
      return { file: name, status: 500, response: 'delete failed on every replica', timestamp };
    }
    return { file: name, status: 200, response: `OK:${deleted}`, timestamp };
  }

  async getStats(): Promise<StatsResult> {
    if (!this.statsAvailable) {
      return { ok: false, error: new ClusterUnreachableError('/stats request failed: connection refused') };
    }
    const active = [...this.nodes.values()].filter((node) => node.up).length;
    return { ok: true, stats: { total_files: this.index.size, active_nodes: active } };
  }

  async health(): Promise<boolean> {
    return this.healthy;
  }

  private releaseTombstone(file: string): void {
    const stillHeld = [...this.nodes.values()].some((node) => node.files.has(file));
    if (!stillHeld) this.tombstones.delete(file);
  }
}

/** Clock that only moves when the paired sleeper sleeps. */
export function createTimeline(start = '2026-01-01T00:00:00.000Z'): { clock: Clock; sleep: Sleeper; sleeps: number[] } {
  let now = new Date(start).getTime();
  const sleeps: number[] = [];
  return {
    clock: { now: () => new Date(now) },
    sleep: async (ms: number, signal?: AbortSignal) => {
      if (signal?.aborted) throw new ScenarioAbortedError();
      sleeps.push(ms);
      now += ms;
    },
    sleeps,
  };
}

/** Default configuration with the test credential and no real pauses needed. */
export function testConfig(overrides: Partial<HarnessConfig> = {}): HarnessConfig {
  return {
    ...DEFAULT_CONFIG,
    coordinator: { ...DEFAULT_CONFIG.coordinator, secret: SECRET },
    ...overrides,
  };
}
