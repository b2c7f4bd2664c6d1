import { createLogger, errorMessage } from '@tombcheck/core';
import type { Logger, MarkerConfig, ProtocolEvent, ProtocolEventKind } from '@tombcheck/core';

import { systemClock } from './types.js';
import type { ClusterControl, Clock, EventObserver } from './types.js';

const ALL_KINDS: readonly ProtocolEventKind[] = ['tombstone-created', 'partial-delete-failure', 'auto-cleanup'];

/** Marker text for each event kind. */
export function markerFor(kind: ProtocolEventKind, markers: MarkerConfig): string {
  switch (kind) {
    case 'tombstone-created':
      return markers.tombstoneCreated;
    case 'partial-delete-failure':
      return markers.partialFailure;
    case 'auto-cleanup':
      return markers.autoCleanup;
  }
}

/**
 * Classify one log line. A line can carry more than one marker (the
 * coordinator logs "partial delete failure ... created tombstone" in one
 * line), so every matching kind is returned in declaration order.
 */
export function classifyLine(
  line: string,
  markers: MarkerConfig,
  kinds: readonly ProtocolEventKind[] = ALL_KINDS,
): ProtocolEventKind[] {
  return kinds.filter((kind) => line.includes(markerFor(kind, markers)));
}

/** Count non-overlapping occurrences of `marker` in `text`. */
export function countMarker(text: string, marker: string): number {
  if (marker.length === 0) return 0;
  let count = 0;
  let index = text.indexOf(marker);
  while (index !== -1) {
    count++;
    index = text.indexOf(marker, index + marker.length);
  }
  return count;
}

function dedupKey(kind: ProtocolEventKind, line: string): string {
  return `${kind}\u0000${line}`;
}

/**
 * EventObserver that scrapes node logs for substring markers.
 *
 * Dedup key is the kind plus the line without trailing whitespace, so
 * rescanning a log window that was already seen emits nothing.
 */
export class LogMarkerObserver implements EventObserver {
  private readonly log: Logger;

  constructor(
    private readonly control: ClusterControl,
    private readonly markers: MarkerConfig,
    private readonly clock: Clock = systemClock,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger('event-observer');
  }

  async scan(
    nodeId: string,
    sinceEvents: readonly ProtocolEvent[],
    kinds: readonly ProtocolEventKind[] = ALL_KINDS,
  ): Promise<ProtocolEvent[]> {
    const text = await this.readLogs(nodeId);
    if (text === null) return [];

    const seen = new Set(sinceEvents.map((event) => dedupKey(event.kind, event.line)));
    const events: ProtocolEvent[] = [];
    const timestamp = this.clock.now().toISOString();

    for (const rawLine of text.split('\n')) {
      const line = rawLine.trimEnd();
      if (line.length === 0) continue;
      for (const kind of classifyLine(line, this.markers, kinds)) {
        const key = dedupKey(kind, line);
        if (seen.has(key)) continue;
        seen.add(key);
        events.push({ node: nodeId, line, kind, timestamp });
      }
    }

    if (events.length > 0) {
      this.log.debug({ node: nodeId, count: events.length }, 'new protocol events');
    }
    return events;
  }

  async count(nodeId: string, kind: ProtocolEventKind): Promise<number> {
    const text = await this.control.fetchLogs(nodeId);
    return countMarker(text, markerFor(kind, this.markers));
  }

  private async readLogs(nodeId: string): Promise<string | null> {
    try {
      return await this.control.fetchLogs(nodeId);
    } catch (err: unknown) {
      this.log.warn({ node: nodeId, err: errorMessage(err) }, 'log fetch failed, no events from this node');
      return null;
    }
  }
}
