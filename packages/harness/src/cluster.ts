import type { HarnessConfig } from '@tombcheck/core';

import { ComposeControl } from './compose-control.js';
import { LogMarkerObserver } from './event-observer.js';
import { HttpClusterQuery } from './http-query.js';
import { createKubeApi } from './kube-api.js';
import type { KubeApi } from './kube-api.js';
import { KubeControl } from './kube-control.js';
import type { ClusterControl, ClusterQuery, CommandExecutor, EventObserver } from './types.js';

export interface Cluster {
  control: ClusterControl;
  query: ClusterQuery;
  observer: EventObserver;
}

export interface CreateClusterOverrides {
  executor?: CommandExecutor;
  kubeApi?: KubeApi;
  fetch?: typeof fetch;
}

/** Wire the configured backend, the HTTP query client and the log observer. */
export function createCluster(config: HarnessConfig, overrides: CreateClusterOverrides = {}): Cluster {
  const backend = config.backend;
  const control: ClusterControl =
    backend.kind === 'kubernetes'
      ? new KubeControl({
          backend,
          nodes: config.nodes,
          timing: config.timing,
          api: overrides.kubeApi ?? createKubeApi({ context: backend.context }),
        })
      : new ComposeControl({
          backend,
          nodes: config.nodes,
          timing: config.timing,
          executor: overrides.executor,
        });

  const query = new HttpClusterQuery({
    baseUrl: config.coordinator.url,
    requestTimeoutMs: config.coordinator.requestTimeoutMs,
    statsTimeoutMs: config.coordinator.statsTimeoutMs,
    fetch: overrides.fetch,
  });

  return { control, query, observer: new LogMarkerObserver(control, config.markers) };
}
