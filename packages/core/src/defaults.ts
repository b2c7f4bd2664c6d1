import type { HarnessConfig, MarkerConfig } from './types.js';

/**
 * Log texts printed by the storage coordinator. They are the coordinator's
 * own (Chinese) messages and must match its output byte for byte:
 *   tombstoneCreated – "... created tombstone" after a delete
 *   partialFailure   – "... partial delete failure (N nodes remaining)"
 *   autoCleanup      – "tombstone mechanism: auto-deleted leftover file on restarted node"
 */
export const DEFAULT_MARKERS: MarkerConfig = {
  tombstoneCreated: '创建墓碑',
  partialFailure: '部分删除失败',
  autoCleanup: '墓碑机制：自动删除',
};

export const DEFAULT_CONFIG: HarnessConfig = {
  coordinator: {
    url: 'http://localhost:8080',
    requestTimeoutMs: 10_000,
    statsTimeoutMs: 5_000,
  },
  coordinatorNode: 'master',
  nodes: [
    { id: 'worker1', dataDir: '/root/data_8081' },
    { id: 'worker2', dataDir: '/root/data_8082' },
    { id: 'worker3', dataDir: '/root/data_8083' },
  ],
  backend: {
    kind: 'compose',
    command: ['docker-compose'],
    projectDir: '.',
  },
  markers: DEFAULT_MARKERS,
  timing: {
    settleAfterStopMs: 5_000,
    settleAfterStartMs: 10_000,
    deleteSpacingMs: 500,
    interScenarioDelayMs: 5_000,
    convergenceTimeoutMs: 30_000,
    pollIntervalMs: 5_000,
    controlTimeoutMs: 60_000,
    controlRetries: 2,
    controlRetryDelayMs: 2_000,
  },
  preflight: {
    minFiles: 20,
  },
  faultNodes: {
    'single-node-restart': ['worker2'],
    'partial-delete-failure': ['worker1', 'worker2'],
  },
  outputDir: './reports',
  logLevel: 'info',
};
