import {
  ClusterAccessError,
  createLogger,
  errorMessage,
  TransportError,
  withRetry,
} from '@tombcheck/core';
import type { ComposeBackend, Logger, NodeConfig, NodeLiveness, RetryStrategy, TimingConfig } from '@tombcheck/core';

import { createCommandExecutor } from './command-executor.js';
import type { ClusterControl, CommandExecutor, ControlOutcome, Sleeper } from './types.js';

export interface ComposeControlOptions {
  backend: ComposeBackend;
  nodes: readonly NodeConfig[];
  timing: Pick<TimingConfig, 'controlTimeoutMs' | 'controlRetries' | 'controlRetryDelayMs'>;
  executor?: CommandExecutor;
  sleep?: Sleeper;
  logger?: Logger;
}

type ComposeAction = 'stop' | 'start';

/**
 * ClusterControl backed by a docker compose project. Each node is a compose
 * service; ids without a node entry (such as the coordinator) are used as
 * the service name directly.
 */
export class ComposeControl implements ClusterControl {
  private readonly executor: CommandExecutor;
  private readonly log: Logger;
  private readonly retry: RetryStrategy;

  constructor(private readonly opts: ComposeControlOptions) {
    this.executor = opts.executor ?? createCommandExecutor();
    this.log = opts.logger ?? createLogger('compose-control');
    this.retry = {
      maxRetries: opts.timing.controlRetries,
      backoff: 'constant',
      baseDelayMs: opts.timing.controlRetryDelayMs,
      maxDelayMs: opts.timing.controlRetryDelayMs,
    };
  }

  stop(nodeId: string): Promise<ControlOutcome> {
    return this.transition('stop', nodeId);
  }

  start(nodeId: string): Promise<ControlOutcome> {
    return this.transition('start', nodeId);
  }

  async status(nodeId: string): Promise<NodeLiveness> {
    const service = this.service(nodeId);
    try {
      const result = await this.compose(['ps', '--status', 'running', '--services']);
      if (result.exitCode !== 0) {
        this.log.warn({ node: nodeId, stderr: result.stderr.trim() }, 'compose ps failed');
        return 'unknown';
      }
      return splitLines(result.stdout).includes(service) ? 'up' : 'down';
    } catch (err: unknown) {
      this.log.warn({ node: nodeId, err: errorMessage(err) }, 'compose ps failed');
      return 'unknown';
    }
  }

  async listFiles(nodeId: string): Promise<ReadonlySet<string>> {
    const node = this.opts.nodes.find((n) => n.id === nodeId);
    if (!node) {
      throw new ClusterAccessError(nodeId, `No data directory configured for node "${nodeId}"`);
    }
    const result = await this.compose(['exec', '-T', this.service(nodeId), 'ls', '-1', node.dataDir]);
    if (result.exitCode !== 0) {
      throw new ClusterAccessError(
        nodeId,
        `Listing ${node.dataDir} on ${nodeId} failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
      );
    }
    return new Set(splitLines(result.stdout));
  }

  fetchLogs(nodeId: string): Promise<string>;
  fetchLogs(nodeId: string, pattern: string): Promise<string[]>;
  async fetchLogs(nodeId: string, pattern?: string): Promise<string | string[]> {
    const result = await this.compose(['logs', '--no-color', this.service(nodeId)]);
    if (result.exitCode !== 0) {
      throw new ClusterAccessError(
        nodeId,
        `Reading logs of ${nodeId} failed (exit ${result.exitCode}): ${result.stderr.trim()}`,
      );
    }
    if (pattern === undefined) return result.stdout;
    return splitLines(result.stdout).filter((line) => line.includes(pattern));
  }

  private async transition(action: ComposeAction, nodeId: string): Promise<ControlOutcome> {
    const service = this.service(nodeId);
    try {
      await withRetry(
        async () => {
          const result = await this.compose([action, service]);
          if (result.exitCode !== 0) {
            throw new TransportError(
              `${action} ${service} exited with code ${result.exitCode}: ${result.stderr.trim()}`,
            );
          }
        },
        this.retry,
        {
          sleep: this.opts.sleep,
          onRetry: (error, attempt, delayMs) => {
            this.log.warn({ node: nodeId, action, attempt, delayMs, err: error.message }, 'control command failed, retrying');
          },
        },
      );
    } catch (err: unknown) {
      this.log.error({ node: nodeId, action, err: errorMessage(err) }, 'control command failed');
      return { ok: false, error: errorMessage(err) };
    }

    const expected: NodeLiveness = action === 'stop' ? 'down' : 'up';
    const liveness = await this.status(nodeId);
    if (liveness !== expected) {
      return { ok: false, error: `${service} is ${liveness} after ${action}` };
    }
    this.log.info({ node: nodeId, action }, 'control command confirmed');
    return { ok: true };
  }

  private service(nodeId: string): string {
    return this.opts.nodes.find((n) => n.id === nodeId)?.service ?? nodeId;
  }

  private compose(args: readonly string[]) {
    const [file, ...prefix] = this.opts.backend.command;
    if (file === undefined) {
      throw new TransportError('Compose command is empty');
    }
    return this.executor.exec(file, [...prefix, ...args], {
      cwd: this.opts.backend.projectDir,
      timeoutMs: this.opts.timing.controlTimeoutMs,
    });
  }
}

function splitLines(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
