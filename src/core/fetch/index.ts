// src/core/fetch/index.ts
export { RevisionFetcher, PAGE_NOT_FOUND_WARNING } from './fetcher.js';
export type { RevisionFetcherOptions } from './fetcher.js';
export { RetryingHttpClient, buildUrl, sleep } from './http.js';
export type { HttpClient, HttpResponse, RetryOptions, FetchFn, SleepFn } from './http.js';
export { mergeRevisionDates } from './merge.js';
export type { MergeResult } from './merge.js';
export { applyContinuation, buildRevisionQuery, parseRevisionResponse, toRevisionDate } from './api.js';
export type { Continuation, QueryParams, RevisionPage } from './api.js';
