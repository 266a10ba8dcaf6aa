// src/core/fetch/api.ts
import { REVISION_BATCH_SIZE } from '../config/constants.js';
import type { RevisionDate } from '../types/index.js';

export type QueryParams = Record<string, string>;

/** Opaque resume point, echoed back verbatim on the next request */
export type Continuation = Record<string, string>;

export type RevisionPage =
  | { kind: 'page'; dates: RevisionDate[]; continuation?: Continuation }
  | { kind: 'malformed' };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Query for revision timestamps, oldest first. With `since`, revisions
 * before midnight UTC of that day are skipped.
 */
export function buildRevisionQuery(title: string, since?: RevisionDate): QueryParams {
  const params: QueryParams = {
    action: 'query',
    prop: 'revisions',
    titles: title,
    rvprop: 'timestamp|userid',
    rvlimit: String(REVISION_BATCH_SIZE),
    rvdir: 'newer',
    format: 'json',
    continue: '',
  };

  if (since) {
    params.rvstart = `${since}T00:00:00Z`;
  }

  return params;
}

export function applyContinuation(params: QueryParams, continuation: Continuation): QueryParams {
  return { ...params, ...continuation };
}

export function toRevisionDate(timestamp: string): RevisionDate {
  return timestamp.slice(0, 10);
}

function parseContinuation(value: unknown): Continuation | undefined {
  if (!isRecord(value)) return undefined;

  const continuation: Continuation = {};
  for (const [key, token] of Object.entries(value)) {
    if (typeof token === 'string' || typeof token === 'number') {
      continuation[key] = String(token);
    }
  }

  return Object.keys(continuation).length > 0 ? continuation : undefined;
}

/**
 * Read one response. Only the first entry of `query.pages` is used since a
 * single title is requested. A missing page container means the title was
 * rejected or the API answered with an error block.
 */
export function parseRevisionResponse(body: unknown): RevisionPage {
  if (!isRecord(body) || !isRecord(body.query) || !isRecord(body.query.pages)) {
    return { kind: 'malformed' };
  }

  const [page] = Object.values(body.query.pages);
  const revisions = isRecord(page) && Array.isArray(page.revisions) ? page.revisions : [];

  const dates: RevisionDate[] = [];
  for (const revision of revisions) {
    if (isRecord(revision) && typeof revision.timestamp === 'string') {
      dates.push(toRevisionDate(revision.timestamp));
    }
  }

  return { kind: 'page', dates, continuation: parseContinuation(body.continue) };
}
