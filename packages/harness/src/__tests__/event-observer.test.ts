import { describe, expect, it } from 'vitest';
import { DEFAULT_MARKERS } from '@tombcheck/core';

import { classifyLine, countMarker, LogMarkerObserver, markerFor } from '../event-observer.js';
import { createTimeline, FakeCluster } from './fake-cluster.js';

const TOMBSTONE_LINE = `[master] test_movie_0001.mp4 ${DEFAULT_MARKERS.tombstoneCreated}`;
const PARTIAL_LINE = `[master] test_movie_0002.mp4 ${DEFAULT_MARKERS.partialFailure} (2), ${DEFAULT_MARKERS.tombstoneCreated}`;
const CLEANUP_LINE = `[master] ${DEFAULT_MARKERS.autoCleanup} test_movie_0001.mp4 @ worker2`;

function observerWith(lines: string[]) {
  const cluster = new FakeCluster();
  cluster.coordinatorLogs.push(...lines);
  const { clock } = createTimeline('2026-03-04T05:06:07.000Z');
  return { cluster, observer: new LogMarkerObserver(cluster, DEFAULT_MARKERS, clock) };
}

describe('classifyLine', () => {
  it('returns every kind a line carries', () => {
    expect(classifyLine(PARTIAL_LINE, DEFAULT_MARKERS)).toEqual(['tombstone-created', 'partial-delete-failure']);
  });

  it('returns nothing for unrelated lines', () => {
    expect(classifyLine('node registered: worker2', DEFAULT_MARKERS)).toEqual([]);
  });

  it('honours the kind filter', () => {
    expect(classifyLine(PARTIAL_LINE, DEFAULT_MARKERS, ['auto-cleanup'])).toEqual([]);
    expect(classifyLine(CLEANUP_LINE, DEFAULT_MARKERS, ['auto-cleanup'])).toEqual(['auto-cleanup']);
  });

  it('uses custom markers', () => {
    const markers = { tombstoneCreated: 'TOMB', partialFailure: 'PARTIAL', autoCleanup: 'CLEANED' };
    expect(classifyLine('file a PARTIAL TOMB', markers)).toEqual(['tombstone-created', 'partial-delete-failure']);
    expect(markerFor('auto-cleanup', markers)).toBe('CLEANED');
  });
});

describe('countMarker', () => {
  it('counts non-overlapping occurrences', () => {
    expect(countMarker('aXa aXa\naXa', 'aXa')).toBe(3);
    expect(countMarker('aaaa', 'aa')).toBe(2);
  });

  it('returns 0 for an empty marker or no match', () => {
    expect(countMarker('anything', '')).toBe(0);
    expect(countMarker('anything', 'missing')).toBe(0);
  });
});

describe('LogMarkerObserver', () => {
  it('emits one event per matching line and kind', async () => {
    const { observer } = observerWith([TOMBSTONE_LINE, 'unrelated', PARTIAL_LINE]);

    const events = await observer.scan('master', []);

    expect(events).toEqual([
      { node: 'master', line: TOMBSTONE_LINE, kind: 'tombstone-created', timestamp: '2026-03-04T05:06:07.000Z' },
      { node: 'master', line: PARTIAL_LINE, kind: 'tombstone-created', timestamp: '2026-03-04T05:06:07.000Z' },
      { node: 'master', line: PARTIAL_LINE, kind: 'partial-delete-failure', timestamp: '2026-03-04T05:06:07.000Z' },
    ]);
  });

  it('is idempotent over an unchanged log', async () => {
    const { observer } = observerWith([TOMBSTONE_LINE, CLEANUP_LINE]);

    const first = await observer.scan('master', []);
    const second = await observer.scan('master', first);

    expect(first).toHaveLength(2);
    expect(second).toEqual([]);
  });

  it('reports only lines appended since the last scan', async () => {
    const { cluster, observer } = observerWith([TOMBSTONE_LINE]);
    const first = await observer.scan('master', []);
    cluster.coordinatorLogs.push(CLEANUP_LINE);

    const second = await observer.scan('master', first);

    expect(second.map((e) => e.line)).toEqual([CLEANUP_LINE]);
  });

  it('collapses repeated identical lines within one scan', async () => {
    const { observer } = observerWith([CLEANUP_LINE, CLEANUP_LINE]);

    const events = await observer.scan('master', [], ['auto-cleanup']);

    expect(events).toHaveLength(1);
  });

  it('ignores trailing whitespace when comparing lines', async () => {
    const { observer } = observerWith([`${TOMBSTONE_LINE}   `, TOMBSTONE_LINE]);

    const events = await observer.scan('master', []);

    expect(events).toHaveLength(1);
    expect(events[0]?.line).toBe(TOMBSTONE_LINE);
  });

  it('yields no events when the logs cannot be read', async () => {
    const { cluster, observer } = observerWith([TOMBSTONE_LINE]);
    cluster.logFailures.add('master');

    await expect(observer.scan('master', [])).resolves.toEqual([]);
  });

  it('counts markers across the full log text', async () => {
    const { observer } = observerWith([TOMBSTONE_LINE, PARTIAL_LINE, CLEANUP_LINE]);

    expect(await observer.count('master', 'tombstone-created')).toBe(2);
    expect(await observer.count('master', 'auto-cleanup')).toBe(1);
    expect(await observer.count('worker1', 'auto-cleanup')).toBe(0);
  });

  it('rejects count when the logs cannot be read', async () => {
    const { cluster, observer } = observerWith([]);
    cluster.logFailures.add('master');

    await expect(observer.count('master', 'tombstone-created')).rejects.toThrow('cannot read logs of master');
  });
});
