// src/core/chart/counts.ts
import type { RevisionDate } from '../types/index.js';

export interface DailyCount {
  date: RevisionDate;
  count: number;
}

/** Days whose count is above this share of the peak are drawn highlighted */
export const BUSY_DAY_RATIO = 0.6;

const MS_PER_DAY = 86_400_000;

export function countEditsPerDay(dates: readonly RevisionDate[]): DailyCount[] {
  const counts = new Map<RevisionDate, number>();
  for (const date of dates) {
    counts.set(date, (counts.get(date) ?? 0) + 1);
  }

  return [...counts.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, count]) => ({ date, count }));
}

/** Earliest day with the highest count */
export function findPeak(counts: readonly DailyCount[]): DailyCount | undefined {
  let peak: DailyCount | undefined;
  for (const entry of counts) {
    if (!peak || entry.count > peak.count) {
      peak = entry;
    }
  }
  return peak;
}

export function isBusyDay(count: number, peakCount: number): boolean {
  return count > peakCount * BUSY_DAY_RATIO;
}

/** Whole days since 1970-01-01 (UTC) */
export function toDayNumber(date: RevisionDate): number {
  const [year, month, day] = date.split('-').map(Number);
  return Math.round(Date.UTC(year, month - 1, day) / MS_PER_DAY);
}
