// src/core/fetch/fetcher.ts
import { REQUEST_PACE_MS, WIKI_API_ENDPOINT } from '../config/constants.js';
import type { RevisionCache } from '../cache/index.js';
import type { FetchResult, RevisionDate } from '../types/index.js';
import { applyContinuation, buildRevisionQuery, parseRevisionResponse } from './api.js';
import { sleep as defaultSleep } from './http.js';
import type { HttpClient, SleepFn } from './http.js';
import { mergeRevisionDates } from './merge.js';

export const PAGE_NOT_FOUND_WARNING = 'Page not found or invalid response';

export interface RevisionFetcherOptions {
  apiEndpoint?: string;
  paceMs?: number;
  sleep?: SleepFn;
  verbose?: boolean;
}

/**
 * Brings an article's cached revision dates up to date, requesting only
 * history from the last cached day onwards.
 */
export class RevisionFetcher {
  private apiEndpoint: string;
  private paceMs: number;
  private sleep: SleepFn;
  private verbose: boolean;

  constructor(
    private cache: RevisionCache,
    private http: HttpClient,
    options: RevisionFetcherOptions = {}
  ) {
    this.apiEndpoint = options.apiEndpoint ?? WIKI_API_ENDPOINT;
    this.paceMs = options.paceMs ?? REQUEST_PACE_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.verbose = options.verbose ?? false;
  }

  async fetch(identifier: string): Promise<FetchResult> {
    const cached = await this.cache.load(identifier);
    const hadCache = cached.length > 0;
    const lastDate = hadCache ? cached[cached.length - 1] : undefined;
    const warnings: string[] = [];

    console.log(`Fetching revisions for: ${identifier}`);
    if (lastDate) {
      console.log(` (updating from cache, last date: ${lastDate})`);
    }

    const fetched: RevisionDate[] = [];
    let params = buildRevisionQuery(identifier, lastDate);
    let requests = 0;
    let aborted = false;

    while (true) {
      const body = await this.http.getJson(this.apiEndpoint, params);
      requests++;

      const page = parseRevisionResponse(body);
      if (page.kind === 'malformed') {
        console.error(`[WARN] ${PAGE_NOT_FOUND_WARNING}`);
        warnings.push(PAGE_NOT_FOUND_WARNING);
        aborted = true;
        break;
      }

      fetched.push(...page.dates);

      if (this.verbose) {
        console.error(`[Fetch] Fetched ${cached.length + fetched.length} revisions so far...`);
      }

      if (!page.continuation) {
        break;
      }

      params = applyContinuation(params, page.continuation);
      await this.sleep(this.paceMs);
    }

    const { dates, newDates, boundary } = mergeRevisionDates(cached, fetched);

    // An aborted run saw nothing of the boundary day, so there is nothing to compare
    if (!aborted && boundary && boundary.cachedCount !== boundary.fetchedCount) {
      const message =
        `Boundary day ${boundary.date}: cache holds ${boundary.cachedCount} edits, ` +
        `remote reported ${boundary.fetchedCount}; keeping the cached count`;
      console.error(`[WARN] ${message}`);
      warnings.push(message);
    }

    console.log(`Done! Total revisions: ${dates.length} (${newDates.length} new)`);

    // An aborted first fetch is not evidence of an empty history
    let cacheWritten = false;
    if (newDates.length > 0 || (!hadCache && !aborted)) {
      await this.cache.save(identifier, dates);
      cacheWritten = true;
      if (this.verbose) {
        console.error(`[Cache] Wrote ${dates.length} dates to ${this.cache.pathFor(identifier)}`);
      }
    }

    return {
      identifier,
      dates,
      newDates,
      hadCache,
      cacheWritten,
      requests,
      warnings,
      boundary,
    };
  }
}
