import { ClusterStatsSchema, ClusterUnreachableError, createLogger, errorMessage } from '@tombcheck/core';
import type { DeleteOutcome, Logger } from '@tombcheck/core';

import { systemClock } from './types.js';
import type { ClusterQuery, Clock, StatsResult } from './types.js';

export interface HttpClusterQueryOptions {
  baseUrl: string;
  requestTimeoutMs: number;
  statsTimeoutMs: number;
  /** Injected for tests (default: global fetch). */
  fetch?: typeof fetch;
  clock?: Clock;
  logger?: Logger;
}

/**
 * ClusterQuery over the coordinator's HTTP API:
 *   GET /delete?name=<file>&secret=<credential>  → "OK:<n>" | 401 | 404
 *   GET /stats                                   → JSON counters
 *   GET /health                                  → 200 "OK"
 */
export class HttpClusterQuery implements ClusterQuery {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly opts: HttpClusterQueryOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.fetchFn = opts.fetch ?? fetch;
    this.clock = opts.clock ?? systemClock;
    this.log = opts.logger ?? createLogger('http-query');
  }

  async deleteFile(name: string, credential: string): Promise<DeleteOutcome> {
    const params = new URLSearchParams({ name, secret: credential });
    try {
      const res = await this.fetchFn(`${this.baseUrl}/delete?${params.toString()}`, {
        signal: AbortSignal.timeout(this.opts.requestTimeoutMs),
      });
      const body = (await res.text()).trim();
      return { file: name, status: res.status, response: body, timestamp: this.clock.now().toISOString() };
    } catch (err: unknown) {
      this.log.warn({ file: name, err: errorMessage(err) }, 'delete request failed');
      return { file: name, status: -1, error: errorMessage(err), timestamp: this.clock.now().toISOString() };
    }
  }

  async getStats(): Promise<StatsResult> {
    let raw: unknown;
    try {
      const res = await this.fetchFn(`${this.baseUrl}/stats`, {
        signal: AbortSignal.timeout(this.opts.statsTimeoutMs),
      });
      if (!res.ok) {
        return { ok: false, error: new ClusterUnreachableError(`/stats answered ${res.status}`, 'STATS_HTTP_ERROR') };
      }
      raw = await res.json();
    } catch (err: unknown) {
      return {
        ok: false,
        error: new ClusterUnreachableError(`/stats request failed: ${errorMessage(err)}`, 'CLUSTER_UNREACHABLE', {
          cause: err,
        }),
      };
    }

    const parsed = ClusterStatsSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      return { ok: false, error: new ClusterUnreachableError(`/stats returned unexpected data: ${issues}`, 'INVALID_STATS') };
    }
    return { ok: true, stats: parsed.data };
  }

  async health(): Promise<boolean> {
    try {
      const res = await this.fetchFn(`${this.baseUrl}/health`, {
        signal: AbortSignal.timeout(this.opts.statsTimeoutMs),
      });
      return res.status === 200;
    } catch (err: unknown) {
      this.log.warn({ err: errorMessage(err) }, 'health request failed');
      return false;
    }
  }
}
