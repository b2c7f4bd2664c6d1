import { Writable } from 'node:stream';
import * as k8s from '@kubernetes/client-node';
import { TransportError } from '@tombcheck/core';

/** Minimal view of a pod used by the Kubernetes backend. */
export interface PodSummary {
  name: string;
  ready: boolean;
  /** Set once the pod is being deleted. */
  terminating: boolean;
  containers: string[];
}

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * The slice of the Kubernetes API the harness needs. Keeps the control logic
 * testable without a cluster.
 */
export interface KubeApi {
  scaleDeployment(name: string, namespace: string, replicas: number): Promise<void>;
  listPods(namespace: string, labelSelector: string): Promise<PodSummary[]>;
  readLogs(pod: string, namespace: string, container?: string): Promise<string>;
  /** Rejects with a TransportError when no exit status arrives within `timeoutMs`. */
  exec(pod: string, namespace: string, container: string, command: string[], timeoutMs: number): Promise<ExecResult>;
}

function toSummary(pod: k8s.V1Pod): PodSummary {
  const conditions = pod.status?.conditions ?? [];
  return {
    name: pod.metadata?.name ?? '',
    ready: conditions.some((c) => c.type === 'Ready' && c.status === 'True'),
    terminating: pod.metadata?.deletionTimestamp !== undefined,
    containers: (pod.spec?.containers ?? []).map((c) => c.name),
  };
}

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

/** Starts an exec session; `onStatus` fires once the command has exited. */
export type ExecStarter = (
  stdout: Writable,
  stderr: Writable,
  onStatus: (status: k8s.V1Status) => void,
) => Promise<{ close(): void }>;

/**
 * Run one exec session to completion. The session's socket is closed and the
 * promise rejected if the exit status does not arrive within `timeoutMs`.
 */
export function runExec(start: ExecStarter, timeoutMs: number, label: string): Promise<ExecResult> {
  const stdout = collector();
  const stderr = collector();
  return new Promise((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let socket: { close(): void } | undefined;
    const timer = setTimeout(() => {
      settled = true;
      timedOut = true;
      socket?.close();
      reject(new TransportError(`${label} did not finish within ${timeoutMs}ms`, 'EXEC_TIMEOUT'));
    }, timeoutMs);

    void start(stdout.stream, stderr.stream, (status) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({
        stdout: stdout.text(),
        stderr: stderr.text() || (status.message ?? ''),
        exitCode: status.status === 'Success' ? 0 : 1,
      });
    })
      .then((ws) => {
        socket = ws;
        if (timedOut) ws.close();
      })
      .catch((err: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        reject(err);
      });
  });
}

/**
 * Real KubeApi implementation using @kubernetes/client-node.
 */
export function createKubeApi(opts: { context?: string } = {}): KubeApi {
  const kc = new k8s.KubeConfig();
  kc.loadFromDefault();
  if (opts.context) {
    kc.setCurrentContext(opts.context);
  }
  const coreApi = kc.makeApiClient(k8s.CoreV1Api);
  const appsApi = kc.makeApiClient(k8s.AppsV1Api);
  const execApi = new k8s.Exec(kc);

  return {
    async scaleDeployment(name, namespace, replicas) {
      const scale = await appsApi.readNamespacedDeploymentScale({ name, namespace });
      await appsApi.replaceNamespacedDeploymentScale({
        name,
        namespace,
        body: { ...scale, spec: { ...scale.spec, replicas } },
      });
    },

    async listPods(namespace, labelSelector) {
      const list = await coreApi.listNamespacedPod({ namespace, labelSelector });
      return list.items.map(toSummary);
    },

    async readLogs(pod, namespace, container) {
      return await coreApi.readNamespacedPodLog({ name: pod, namespace, container });
    },

    exec(pod, namespace, container, command, timeoutMs) {
      return runExec(
        (stdout, stderr, onStatus) =>
          execApi.exec(namespace, pod, container, command, stdout, stderr, null, false, onStatus),
        timeoutMs,
        `exec in ${pod}`,
      );
    },
  };
}
