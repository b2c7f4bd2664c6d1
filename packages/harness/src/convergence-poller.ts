import { createLogger, errorMessage, ScenarioAbortedError, sleep } from '@tombcheck/core';
import type { Logger, ProtocolEvent } from '@tombcheck/core';

import { systemClock } from './types.js';
import type { ClusterControl, Clock, EventObserver, Sleeper } from './types.js';

export interface ConvergenceRequest {
  /** Nodes whose file listings must be free of every target file. */
  nodeIds: readonly string[];
  targetFiles: readonly string[];
  timeoutMs: number;
  pollIntervalMs: number;
  /** Where to look for auto-cleanup events (default: `nodeIds`). */
  logSources?: readonly string[];
  /** Events already seen; never re-reported. */
  sinceEvents?: readonly ProtocolEvent[];
  signal?: AbortSignal;
}

export interface ConvergenceResult {
  converged: boolean;
  /** Auto-cleanup events first seen during this wait. */
  eventsSeen: ProtocolEvent[];
  rounds: number;
  elapsedMs: number;
  aborted: boolean;
}

export interface ConvergencePollerDeps {
  control: ClusterControl;
  observer: EventObserver;
  clock?: Clock;
  sleep?: Sleeper;
  logger?: Logger;
}

/**
 * Bounded wait for target files to disappear from every node.
 *
 * Each round sleeps first, then scans logs for auto-cleanup events, then
 * lists every node. Returns as soon as a round finds no target file; gives
 * up with `converged: false` once `timeoutMs` has elapsed. It never retries
 * beyond that bound: callers decide what a timeout means.
 */
export class ConvergencePoller {
  private readonly control: ClusterControl;
  private readonly observer: EventObserver;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly log: Logger;

  constructor(deps: ConvergencePollerDeps) {
    this.control = deps.control;
    this.observer = deps.observer;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? sleep;
    this.log = deps.logger ?? createLogger('convergence-poller');
  }

  async awaitConvergence(request: ConvergenceRequest): Promise<ConvergenceResult> {
    const started = this.clock.now().getTime();
    const elapsed = (): number => this.clock.now().getTime() - started;
    const logSources = request.logSources ?? request.nodeIds;
    const known: ProtocolEvent[] = [...(request.sinceEvents ?? [])];
    const eventsSeen: ProtocolEvent[] = [];
    let rounds = 0;

    this.log.info(
      { nodes: request.nodeIds, files: request.targetFiles.length, timeoutMs: request.timeoutMs },
      'waiting for convergence',
    );

    while (elapsed() < request.timeoutMs) {
      try {
        await this.sleep(request.pollIntervalMs, request.signal);
      } catch (err: unknown) {
        if (err instanceof ScenarioAbortedError) {
          this.log.warn({ rounds }, 'convergence wait aborted');
          return { converged: false, eventsSeen, rounds, elapsedMs: elapsed(), aborted: true };
        }
        throw err;
      }
      rounds++;

      for (const source of logSources) {
        const fresh = await this.observer.scan(source, known, ['auto-cleanup']);
        for (const event of fresh) {
          this.log.info({ node: source, line: event.line.slice(0, 100) }, 'auto-cleanup event');
        }
        known.push(...fresh);
        eventsSeen.push(...fresh);
      }

      if (await this.allClean(request.nodeIds, request.targetFiles)) {
        this.log.info({ rounds, elapsedMs: elapsed() }, 'all target files gone');
        return { converged: true, eventsSeen, rounds, elapsedMs: elapsed(), aborted: false };
      }
    }

    this.log.warn({ rounds, timeoutMs: request.timeoutMs }, 'convergence timed out');
    return { converged: false, eventsSeen, rounds, elapsedMs: elapsed(), aborted: false };
  }

  private async allClean(nodeIds: readonly string[], targetFiles: readonly string[]): Promise<boolean> {
    for (const node of nodeIds) {
      let files: ReadonlySet<string>;
      try {
        files = await this.control.listFiles(node);
      } catch (err: unknown) {
        this.log.warn({ node, err: errorMessage(err) }, 'listing failed, round not converged');
        return false;
      }
      if (targetFiles.some((file) => files.has(file))) {
        return false;
      }
    }
    return true;
  }
}
