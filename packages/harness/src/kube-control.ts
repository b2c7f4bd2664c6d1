import { ClusterAccessError, createLogger, errorMessage, sleep } from '@tombcheck/core';
import type { KubernetesBackend, Logger, NodeConfig, NodeLiveness, TimingConfig } from '@tombcheck/core';

import type { ExecResult, KubeApi, PodSummary } from './kube-api.js';
import { systemClock } from './types.js';
import type { ClusterControl, Clock, ControlOutcome, Sleeper } from './types.js';

const CONFIRM_POLL_MS = 1_000;

export interface KubeControlOptions {
  backend: KubernetesBackend;
  nodes: readonly NodeConfig[];
  timing: Pick<TimingConfig, 'controlTimeoutMs'>;
  api: KubeApi;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
}

interface NodeTarget {
  deployment: string;
  labelSelector: string;
  container?: string;
  dataDir?: string;
}

/**
 * ClusterControl for nodes running as single-replica Deployments.
 * Stop scales to zero and waits until no pod is left; start scales to one
 * and waits for a Ready pod.
 */
export class KubeControl implements ClusterControl {
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly log: Logger;

  constructor(private readonly opts: KubeControlOptions) {
    this.clock = opts.clock ?? systemClock;
    this.sleep = opts.sleep ?? sleep;
    this.log = opts.logger ?? createLogger('kube-control');
  }

  stop(nodeId: string): Promise<ControlOutcome> {
    return this.scale(nodeId, 0);
  }

  start(nodeId: string): Promise<ControlOutcome> {
    return this.scale(nodeId, 1);
  }

  async status(nodeId: string): Promise<NodeLiveness> {
    const target = this.target(nodeId);
    try {
      const pods = await this.opts.api.listPods(this.opts.backend.namespace, target.labelSelector);
      return pods.some((pod) => pod.ready && !pod.terminating) ? 'up' : 'down';
    } catch (err: unknown) {
      this.log.warn({ node: nodeId, err: errorMessage(err) }, 'pod listing failed');
      return 'unknown';
    }
  }

  async listFiles(nodeId: string): Promise<ReadonlySet<string>> {
    const target = this.target(nodeId);
    if (!target.dataDir) {
      throw new ClusterAccessError(nodeId, `No data directory configured for node "${nodeId}"`);
    }
    const pod = await this.pickPod(nodeId, target);
    const container = target.container ?? pod.containers[0];
    if (!container) {
      throw new ClusterAccessError(nodeId, `Pod ${pod.name} has no containers`);
    }
    let result: ExecResult;
    try {
      result = await this.opts.api.exec(
        pod.name,
        this.opts.backend.namespace,
        container,
        ['ls', '-1', target.dataDir],
        this.opts.timing.controlTimeoutMs,
      );
    } catch (err: unknown) {
      throw new ClusterAccessError(nodeId, `Exec in ${pod.name} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (result.exitCode !== 0) {
      throw new ClusterAccessError(nodeId, `Listing ${target.dataDir} in ${pod.name} failed: ${result.stderr.trim()}`);
    }
    return new Set(
      result.stdout
        .split('\n')
        .map((line) => line.trim())
        .filter((line) => line.length > 0),
    );
  }

  fetchLogs(nodeId: string): Promise<string>;
  fetchLogs(nodeId: string, pattern: string): Promise<string[]>;
  async fetchLogs(nodeId: string, pattern?: string): Promise<string | string[]> {
    const target = this.target(nodeId);
    const pod = await this.pickPod(nodeId, target);
    let text: string;
    try {
      text = await this.opts.api.readLogs(pod.name, this.opts.backend.namespace, target.container);
    } catch (err: unknown) {
      throw new ClusterAccessError(nodeId, `Reading logs of ${pod.name} failed: ${errorMessage(err)}`, { cause: err });
    }
    if (pattern === undefined) return text;
    return text.split('\n').filter((line) => line.includes(pattern));
  }

  private async scale(nodeId: string, replicas: 0 | 1): Promise<ControlOutcome> {
    const target = this.target(nodeId);
    const namespace = this.opts.backend.namespace;
    try {
      await this.opts.api.scaleDeployment(target.deployment, namespace, replicas);
    } catch (err: unknown) {
      this.log.error({ node: nodeId, replicas, err: errorMessage(err) }, 'scale failed');
      return { ok: false, error: `scaling ${target.deployment} to ${replicas} failed: ${errorMessage(err)}` };
    }

    const done = (pods: PodSummary[]): boolean =>
      replicas === 0 ? pods.length === 0 : pods.some((pod) => pod.ready && !pod.terminating);

    const deadline = this.clock.now().getTime() + this.opts.timing.controlTimeoutMs;
    for (;;) {
      let pods: PodSummary[] | undefined;
      try {
        pods = await this.opts.api.listPods(namespace, target.labelSelector);
      } catch (err: unknown) {
        this.log.warn({ node: nodeId, err: errorMessage(err) }, 'pod listing failed while waiting');
      }
      if (pods && done(pods)) {
        this.log.info({ node: nodeId, replicas }, 'scale confirmed');
        return { ok: true };
      }
      if (this.clock.now().getTime() >= deadline) {
        const state = replicas === 0 ? 'terminate' : 'become ready';
        return {
          ok: false,
          error: `${target.deployment} did not ${state} within ${this.opts.timing.controlTimeoutMs}ms`,
        };
      }
      await this.sleep(CONFIRM_POLL_MS);
    }
  }

  private target(nodeId: string): NodeTarget {
    const node = this.opts.nodes.find((n) => n.id === nodeId);
    return {
      deployment: node?.deployment ?? nodeId,
      labelSelector: node?.labelSelector ?? `app=${nodeId}`,
      container: node?.container,
      dataDir: node?.dataDir,
    };
  }

  private async pickPod(nodeId: string, target: NodeTarget): Promise<PodSummary> {
    let pods: PodSummary[];
    try {
      pods = await this.opts.api.listPods(this.opts.backend.namespace, target.labelSelector);
    } catch (err: unknown) {
      throw new ClusterAccessError(nodeId, `Listing pods for ${nodeId} failed: ${errorMessage(err)}`, { cause: err });
    }
    const pod = pods.find((p) => p.ready && !p.terminating) ?? pods[0];
    if (!pod) {
      throw new ClusterAccessError(nodeId, `No pod matches ${target.labelSelector}`);
    }
    return pod;
  }
}
