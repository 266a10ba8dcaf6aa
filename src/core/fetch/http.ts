// src/core/fetch/http.ts
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from '../config/constants.js';
import { WikiPlotError } from '../errors.js';
import { ErrorCode } from '../types/index.js';
import type { QueryParams } from './api.js';

export interface HttpClient {
  getJson(url: string, params: QueryParams): Promise<unknown>;
}

/** The part of a fetch `Response` the client reads */
export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<HttpResponse>;
export type SleepFn = (ms: number) => Promise<void>;

export interface RetryOptions {
  maxAttempts?: number;
  backoffMs?: number;
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchFn;
  sleep?: SleepFn;
  verbose?: boolean;
}

export const sleep: SleepFn = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function buildUrl(url: string, params: QueryParams): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    target.searchParams.set(key, value);
  }
  return target.toString();
}

/**
 * JSON GET with a per-attempt timeout and exponential backoff
 * (`backoffMs`, `2 * backoffMs`, ...) between attempts. Only transient
 * failures are retried: network errors, timeouts, 429 and 5xx.
 */
export class RetryingHttpClient implements HttpClient {
  private maxAttempts: number;
  private backoffMs: number;
  private timeoutMs: number;
  private userAgent: string;
  private fetchImpl: FetchFn;
  private sleep: SleepFn;
  private verbose: boolean;

  constructor(options: RetryOptions = {}) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.verbose = options.verbose ?? false;
  }

  async getJson(url: string, params: QueryParams): Promise<unknown> {
    const target = buildUrl(url, params);
    let lastError: WikiPlotError | undefined;

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await this.attempt(target);
      } catch (error) {
        const failure = this.classify(error, target);
        if (!failure.retryable) {
          throw failure;
        }
        lastError = failure;
      }

      if (attempt < this.maxAttempts - 1) {
        const delay = this.backoffMs * Math.pow(2, attempt);
        if (this.verbose) {
          console.error(`[Fetch] ${lastError?.message}; retrying in ${delay}ms (attempt ${attempt + 2}/${this.maxAttempts})`);
        }
        await this.sleep(delay);
      }
    }

    throw new WikiPlotError(
      lastError?.code ?? ErrorCode.REMOTE_UNAVAILABLE,
      `Request failed after ${this.maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`,
      true,
      'Check your network connection and try again later',
      { url: target, attempts: this.maxAttempts }
    );
  }

  private async attempt(target: string): Promise<unknown> {
    const response = await this.fetchImpl(target, {
      headers: {
        'User-Agent': this.userAgent,
        Accept: 'application/json',
      },
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      throw this.httpError(response.status, target);
    }

    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new WikiPlotError(
        ErrorCode.INVALID_RESPONSE,
        `Response from ${target} is not valid JSON`,
        false,
        undefined,
        { url: target, bodyPreview: text.slice(0, 200) }
      );
    }
  }

  private httpError(status: number, target: string): WikiPlotError {
    if (status === 429) {
      return new WikiPlotError(ErrorCode.RATE_LIMITED, `HTTP 429 from ${target}`, true, undefined, { status });
    }
    if (status >= 500) {
      return new WikiPlotError(ErrorCode.REMOTE_UNAVAILABLE, `HTTP ${status} from ${target}`, true, undefined, { status });
    }
    return new WikiPlotError(ErrorCode.REMOTE_UNAVAILABLE, `HTTP ${status} from ${target}`, false, undefined, { status });
  }

  private classify(error: unknown, target: string): WikiPlotError {
    if (error instanceof WikiPlotError) {
      return error;
    }

    if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
      return new WikiPlotError(
        ErrorCode.TIMEOUT,
        `Request to ${target} timed out after ${this.timeoutMs}ms`,
        true
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    return new WikiPlotError(
      ErrorCode.REMOTE_UNAVAILABLE,
      `Request to ${target} failed: ${message}`,
      true
    );
  }
}
