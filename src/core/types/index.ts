// src/core/types/index.ts

/** Calendar day of a revision, `YYYY-MM-DD`. */
export type RevisionDate = string;

export enum ErrorCode {
  CACHE_CORRUPT = 'cache_corrupt',
  REMOTE_UNAVAILABLE = 'remote_unavailable',
  TIMEOUT = 'timeout',
  RATE_LIMITED = 'rate_limited',
  INVALID_RESPONSE = 'invalid_response',
  INVALID_INPUT = 'invalid_input',
  EXPORT_FAILED = 'export_failed',
}

export interface Article {
  /** Normalized title with underscores, e.g. `Alan_Turing` */
  identifier: string;
  /** Title as shown to people, e.g. `Alan Turing` */
  displayTitle: string;
  url: string;
}

export interface BoundaryDayAudit {
  date: RevisionDate;
  cachedCount: number;
  fetchedCount: number;
}

export interface FetchResult {
  identifier: string;
  dates: RevisionDate[];
  newDates: RevisionDate[];
  hadCache: boolean;
  cacheWritten: boolean;
  requests: number;
  warnings: string[];
  boundary?: BoundaryDayAudit;
}

export interface PlotOptions {
  logBase: number;
  /** The raw title or URL the run was started with, shown in the chart footer */
  userInput: string;
  chart: boolean;
  verbose?: boolean;
}

export interface PlotResult {
  status: 'success' | 'failed';
  title?: string;
  url?: string;
  chartPath?: string;
  stats?: {
    totalEdits: number;
    newEdits: number;
    days: number;
    peak?: { date: RevisionDate; count: number };
  };
  diagnostics?: {
    warnings?: string[];
    error?: PlotError;
  };
}

export interface PlotError {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  suggestion?: string;
}
