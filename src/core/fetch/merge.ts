// src/core/fetch/merge.ts
import type { BoundaryDayAudit, RevisionDate } from '../types/index.js';

export interface MergeResult {
  dates: RevisionDate[];
  newDates: RevisionDate[];
  boundary?: BoundaryDayAudit;
}

function countOf(dates: readonly RevisionDate[], date: RevisionDate): number {
  return dates.filter((d) => d === date).length;
}

/**
 * Append freshly fetched dates to the cached ones. The fetch restarts at
 * the last cached day, so only dates after that day are new; entries for
 * the day itself are dropped even if the remote now reports a different
 * number of them. That difference is returned in `boundary` for the caller
 * to report.
 */
export function mergeRevisionDates(
  cached: readonly RevisionDate[],
  fetched: readonly RevisionDate[]
): MergeResult {
  if (cached.length === 0) {
    const newDates = [...fetched].sort();
    return { dates: newDates, newDates };
  }

  const lastDate = cached[cached.length - 1];
  const newDates = fetched.filter((d) => d > lastDate).sort();

  return {
    dates: [...cached, ...newDates],
    newDates,
    boundary: {
      date: lastDate,
      cachedCount: countOf(cached, lastDate),
      fetchedCount: countOf(fetched, lastDate),
    },
  };
}
