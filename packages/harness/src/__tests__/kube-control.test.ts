import { describe, expect, it } from 'vitest';
import { ClusterAccessError } from '@tombcheck/core';
import type { NodeConfig } from '@tombcheck/core';

import type { ExecResult, KubeApi, PodSummary } from '../kube-api.js';
import { KubeControl } from '../kube-control.js';
import { createTimeline } from './fake-cluster.js';

const NAMESPACE = 'storage-test';

class FakeKubeApi implements KubeApi {
  readonly scaled: Array<[string, number]> = [];
  readonly execs: Array<{ pod: string; container: string; command: string[] }> = [];
  /** Successive answers to listPods; the last one repeats. */
  podAnswers: PodSummary[][] = [[]];
  scaleError?: Error;
  listError?: Error;
  logs = '';
  execResult: ExecResult = { stdout: '', stderr: '', exitCode: 0 };
  execError?: Error;
  readonly execTimeouts: number[] = [];
  selectors: string[] = [];

  async scaleDeployment(name: string, namespace: string, replicas: number): Promise<void> {
    if (namespace !== NAMESPACE) throw new Error(`unexpected namespace ${namespace}`);
    if (this.scaleError) throw this.scaleError;
    this.scaled.push([name, replicas]);
  }

  async listPods(_namespace: string, labelSelector: string): Promise<PodSummary[]> {
    this.selectors.push(labelSelector);
    if (this.listError) throw this.listError;
    const answer = this.podAnswers.length > 1 ? this.podAnswers.shift() : this.podAnswers[0];
    return answer ?? [];
  }

  async readLogs(): Promise<string> {
    return this.logs;
  }

  async exec(
    pod: string,
    _namespace: string,
    container: string,
    command: string[],
    timeoutMs: number,
  ): Promise<ExecResult> {
    this.execs.push({ pod, container, command });
    this.execTimeouts.push(timeoutMs);
    if (this.execError) throw this.execError;
    return this.execResult;
  }
}

function pod(name: string, ready: boolean, extra: Partial<PodSummary> = {}): PodSummary {
  return { name, ready, terminating: false, containers: ['storage'], ...extra };
}

const NODES: NodeConfig[] = [
  { id: 'worker1', dataDir: '/data', deployment: 'storage-a', labelSelector: 'tier=storage,node=a', container: 'main' },
  { id: 'worker2', dataDir: '/root/data_8082' },
];

function setup(controlTimeoutMs = 60_000) {
  const api = new FakeKubeApi();
  const timeline = createTimeline();
  const control = new KubeControl({
    backend: { kind: 'kubernetes', namespace: NAMESPACE },
    nodes: NODES,
    timing: { controlTimeoutMs },
    api,
    clock: timeline.clock,
    sleep: timeline.sleep,
  });
  return { api, timeline, control };
}

describe('KubeControl', () => {
  it('scales to zero and returns once no pod is left', async () => {
    const { api, control, timeline } = setup();

    await expect(control.stop('worker2')).resolves.toEqual({ ok: true });

    expect(api.scaled).toEqual([['worker2', 0]]);
    expect(api.selectors).toEqual(['app=worker2']);
    expect(timeline.sleeps).toEqual([]);
  });

  it('scales to one and waits for a ready pod', async () => {
    const { api, control, timeline } = setup();
    api.podAnswers = [[], [pod('worker2-x', false)], [pod('worker2-x', true)]];

    await expect(control.start('worker2')).resolves.toEqual({ ok: true });

    expect(api.scaled).toEqual([['worker2', 1]]);
    expect(timeline.sleeps).toEqual([1_000, 1_000]);
  });

  it('ignores terminating pods when starting', async () => {
    const { api, control } = setup(2_000);
    api.podAnswers = [[pod('old', true, { terminating: true })]];

    await expect(control.start('worker2')).resolves.toEqual({
      ok: false,
      error: 'worker2 did not become ready within 2000ms',
    });
  });

  it('gives up after the control timeout', async () => {
    const { api, control, timeline } = setup(3_000);
    api.podAnswers = [[pod('worker2-x', true)]];

    await expect(control.stop('worker2')).resolves.toEqual({
      ok: false,
      error: 'worker2 did not terminate within 3000ms',
    });
    expect(timeline.sleeps).toEqual([1_000, 1_000, 1_000]);
  });

  it('keeps waiting through pod listing failures', async () => {
    const { api, control } = setup(1_000);
    api.listError = new Error('etcd timeout');

    await expect(control.stop('worker2')).resolves.toEqual({
      ok: false,
      error: 'worker2 did not terminate within 1000ms',
    });
  });

  it('reports a failed scale request', async () => {
    const { api, control } = setup();
    api.scaleError = new Error('deployments.apps "worker2" is forbidden');

    await expect(control.stop('worker2')).resolves.toEqual({
      ok: false,
      error: 'scaling worker2 to 0 failed: deployments.apps "worker2" is forbidden',
    });
  });

  it('uses the configured deployment and selector', async () => {
    const { api, control } = setup();

    await control.stop('worker1');

    expect(api.scaled).toEqual([['storage-a', 0]]);
    expect(api.selectors).toEqual(['tier=storage,node=a']);
  });

  it('derives liveness from pod readiness', async () => {
    const { api, control } = setup();

    api.podAnswers = [[pod('a', true)]];
    expect(await control.status('worker2')).toBe('up');

    api.podAnswers = [[pod('a', false)]];
    expect(await control.status('worker2')).toBe('down');

    api.listError = new Error('unauthorized');
    expect(await control.status('worker2')).toBe('unknown');
  });

  it('lists files in the ready pod', async () => {
    const { api, control } = setup();
    api.podAnswers = [[pod('worker2-old', false), pod('worker2-new', true)]];
    api.execResult = { stdout: 'a.mp4\nb.mp4\n', stderr: '', exitCode: 0 };

    const files = await control.listFiles('worker2');

    expect([...files]).toEqual(['a.mp4', 'b.mp4']);
    expect(api.execs).toEqual([{ pod: 'worker2-new', container: 'storage', command: ['ls', '-1', '/root/data_8082'] }]);
  });

  it('uses the configured container', async () => {
    const { api, control } = setup();
    api.podAnswers = [[pod('storage-a-1', true, { containers: ['sidecar', 'main'] })]];

    await control.listFiles('worker1');

    expect(api.execs[0]?.container).toBe('main');
  });

  it('throws when the listing fails or no pod exists', async () => {
    const { api, control } = setup();
    api.podAnswers = [[pod('worker2-x', true)]];
    api.execResult = { stdout: '', stderr: 'ls: /root/data_8082: No such file or directory\n', exitCode: 1 };

    await expect(control.listFiles('worker2')).rejects.toThrow(
      'Listing /root/data_8082 in worker2-x failed: ls: /root/data_8082: No such file or directory',
    );

    api.podAnswers = [[]];
    await expect(control.listFiles('worker2')).rejects.toThrow('No pod matches app=worker2');
    await expect(control.listFiles('master')).rejects.toThrow(ClusterAccessError);
  });

  it('turns a stalled exec into an access error', async () => {
    const { api, control } = setup(4_000);
    api.podAnswers = [[pod('worker2-x', true)]];
    api.execError = new Error('exec in worker2-x did not finish within 4000ms');

    await expect(control.listFiles('worker2')).rejects.toThrow(
      new ClusterAccessError('worker2', 'Exec in worker2-x failed: exec in worker2-x did not finish within 4000ms'),
    );
    expect(api.execTimeouts).toEqual([4_000]);
  });

  it('filters log lines by pattern', async () => {
    const { api, control } = setup();
    api.podAnswers = [[pod('master-0', true)]];
    api.logs = 'boot\nx 创建墓碑\ny\n';

    expect(await control.fetchLogs('master')).toBe('boot\nx 创建墓碑\ny\n');
    expect(await control.fetchLogs('master', '创建墓碑')).toEqual(['x 创建墓碑']);
  });
});
