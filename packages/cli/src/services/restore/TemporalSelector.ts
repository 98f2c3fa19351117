import type { Snapshot } from '../history/SnapshotIndex';

/**
 * Half-open selection window: `afterMs` inclusive, `beforeMs` exclusive.
 * Adjoining windows (`--before X` then `--after X`) never select the same
 * snapshot twice.
 */
export interface TimeWindow {
  readonly afterMs?: number;
  readonly beforeMs?: number;
}

export function isInWindow(timestamp: number, window: TimeWindow): boolean {
  return (
    (window.afterMs === undefined || timestamp >= window.afterMs) &&
    (window.beforeMs === undefined || timestamp < window.beforeMs)
  );
}

/**
 * Stable ascending sort by timestamp; snapshots without one go last.
 */
export function sortSnapshots(entries: readonly Snapshot[]): Snapshot[] {
  return [...entries].sort((a, b) => {
    if (a.timestamp === null && b.timestamp === null) return 0;
    if (a.timestamp === null) return 1;
    if (b.timestamp === null) return -1;
    return a.timestamp - b.timestamp;
  });
}

/**
 * Pick the newest snapshot inside the window. On equal timestamps the entry
 * recorded later wins.
 */
export function selectSnapshot(entries: readonly Snapshot[], window: TimeWindow): Snapshot | null {
  const sorted = sortSnapshots(entries);
  for (let i = sorted.length - 1; i >= 0; i--) {
    const entry = sorted[i];
    if (entry.timestamp === null) {
      continue;
    }
    if (isInWindow(entry.timestamp, window)) {
      return entry;
    }
  }
  return null;
}
