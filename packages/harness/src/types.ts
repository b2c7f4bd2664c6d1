import type {
  ClusterStats,
  ClusterUnreachableError,
  DeleteOutcome,
  NodeLiveness,
  ProtocolEvent,
  ProtocolEventKind,
} from '@tombcheck/core';

/**
 * Result of a node-control command. Control failures never throw across this
 * boundary; they carry the backend's error text.
 */
export type ControlOutcome = { ok: true } | { ok: false; error: string };

/**
 * Abstraction over the container/process manager that runs the storage
 * nodes. Makes the orchestrator testable against an in-memory cluster.
 */
export interface ClusterControl {
  /**
   * Stop a node. Resolves only once the backend confirms the node is down,
   * or its control timeout expires. Not abortable.
   */
  stop(nodeId: string): Promise<ControlOutcome>;

  /** Start a node. Resolves only once the backend confirms the node is up. */
  start(nodeId: string): Promise<ControlOutcome>;

  /** Current liveness as seen by the backend. Never rejects. */
  status(nodeId: string): Promise<NodeLiveness>;

  /**
   * File names present in the node's storage directory.
   * @throws ClusterAccessError when the listing cannot be read
   */
  listFiles(nodeId: string): Promise<ReadonlySet<string>>;

  /**
   * Full log text of a node, or only the lines containing `pattern`.
   * @throws ClusterAccessError when the logs cannot be read
   */
  fetchLogs(nodeId: string): Promise<string>;
  fetchLogs(nodeId: string, pattern: string): Promise<string[]>;
}

export type StatsResult =
  | { ok: true; stats: ClusterStats }
  | { ok: false; error: ClusterUnreachableError };

/**
 * Abstraction over the coordinator's HTTP API.
 */
export interface ClusterQuery {
  /** Issue a delete. Never rejects: transport failures are recorded in the outcome. */
  deleteFile(name: string, credential: string): Promise<DeleteOutcome>;

  /** Aggregate cluster counters, or a typed error when the coordinator is unreachable. */
  getStats(): Promise<StatsResult>;

  /** True when the coordinator's health endpoint answers 200. Never rejects. */
  health(): Promise<boolean>;
}

/**
 * Source of structured protocol events. The default implementation scrapes
 * log text; another could read a structured event log.
 */
export interface EventObserver {
  /**
   * Return events from `nodeId` that are not already in `sinceEvents`.
   * Repeating a scan over an unchanged log yields nothing new.
   */
  scan(
    nodeId: string,
    sinceEvents: readonly ProtocolEvent[],
    kinds?: readonly ProtocolEventKind[],
  ): Promise<ProtocolEvent[]>;

  /** Occurrences of the kind's marker in the node's full log text. */
  count(nodeId: string, kind: ProtocolEventKind): Promise<number>;
}

/**
 * Abstraction over child-process execution for the compose backend.
 */
export interface CommandExecutor {
  /** Run `file` with `args`. Never rejects on non-zero exit; reports it instead. */
  exec(
    file: string,
    args: readonly string[],
    options: { cwd?: string; timeoutMs: number; signal?: AbortSignal },
  ): Promise<{ stdout: string; stderr: string; exitCode: number }>;
}

/** Wall clock, injectable for deterministic tests. */
export interface Clock {
  now(): Date;
}

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export const systemClock: Clock = {
  now: () => new Date(),
};
