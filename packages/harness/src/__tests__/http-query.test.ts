import { describe, expect, it, vi } from 'vitest';

import { HttpClusterQuery } from '../http-query.js';
import { createTimeline } from './fake-cluster.js';

function setup(handler: (url: string) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, _init?: RequestInit) => handler(String(input)));
  const query = new HttpClusterQuery({
    baseUrl: 'http://coordinator:8080/',
    requestTimeoutMs: 10_000,
    statsTimeoutMs: 5_000,
    fetch: fetchMock,
    clock: createTimeline('2026-02-03T04:05:06.000Z').clock,
  });
  return { query, fetchMock };
}

describe('HttpClusterQuery', () => {
  describe('deleteFile', () => {
    it('sends name and credential as query parameters', async () => {
      const { query, fetchMock } = setup(() => new Response('OK:2\n', { status: 200 }));

      const outcome = await query.deleteFile('test movie&1.mp4', 'test-secret');

      expect(outcome).toEqual({
        file: 'test movie&1.mp4',
        status: 200,
        response: 'OK:2',
        timestamp: '2026-02-03T04:05:06.000Z',
      });
      expect(fetchMock.mock.calls[0]?.[0]).toBe(
        'http://coordinator:8080/delete?name=test+movie%261.mp4&secret=test-secret',
      );
    });

    it('records non-2xx answers without throwing', async () => {
      const { query } = setup(() => new Response('Unauthorized', { status: 401 }));

      const outcome = await query.deleteFile('a.mp4', 'wrong');

      expect(outcome.status).toBe(401);
      expect(outcome.response).toBe('Unauthorized');
    });

    it('records transport failures with status -1', async () => {
      const { query } = setup(() => {
        throw new TypeError('fetch failed');
      });

      const outcome = await query.deleteFile('a.mp4', 'test-secret');

      expect(outcome).toEqual({
        file: 'a.mp4',
        status: -1,
        error: 'fetch failed',
        timestamp: '2026-02-03T04:05:06.000Z',
      });
    });
  });

  describe('getStats', () => {
    it('parses the counters and keeps extra numeric fields', async () => {
      const { query, fetchMock } = setup(() =>
        Response.json({ total_files: 20, active_nodes: 3, tombstones: 0 }),
      );

      const result = await query.getStats();

      expect(result).toEqual({ ok: true, stats: { total_files: 20, active_nodes: 3, tombstones: 0 } });
      expect(fetchMock.mock.calls[0]?.[0]).toBe('http://coordinator:8080/stats');
    });

    it('returns a typed error for a non-OK answer', async () => {
      const { query } = setup(() => new Response('boom', { status: 503 }));

      const result = await query.getStats();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('STATS_HTTP_ERROR');
      expect(result.error.message).toBe('/stats answered 503');
    });

    it('returns a typed error when the coordinator is unreachable', async () => {
      const { query } = setup(() => {
        throw new TypeError('fetch failed');
      });

      const result = await query.getStats();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('CLUSTER_UNREACHABLE');
      expect(result.error.message).toBe('/stats request failed: fetch failed');
    });

    it('rejects a body without the required counters', async () => {
      const { query } = setup(() => Response.json({ active_nodes: 3 }));

      const result = await query.getStats();

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.code).toBe('INVALID_STATS');
      expect(result.error.message).toBe('/stats returned unexpected data: total_files: Required');
    });
  });

  describe('health', () => {
    it('is true only for a 200 answer', async () => {
      expect(await setup(() => new Response('OK', { status: 200 })).query.health()).toBe(true);
      expect(await setup(() => new Response('', { status: 500 })).query.health()).toBe(false);
    });

    it('is false when the request fails', async () => {
      const { query } = setup(() => {
        throw new TypeError('fetch failed');
      });

      expect(await query.health()).toBe(false);
    });
  });
});
