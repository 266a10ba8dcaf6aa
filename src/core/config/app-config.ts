// src/core/config/app-config.ts
import path from 'node:path';
import {
  DEFAULT_BACKOFF_MS,
  DEFAULT_CACHE_DIR,
  DEFAULT_MAX_ATTEMPTS,
  DEFAULT_OUTPUT_DIR,
  DEFAULT_TIMEOUT,
  REQUEST_PACE_MS,
  WIKI_API_ENDPOINT,
} from './constants.js';

export interface AppConfig {
  cacheDir: string;
  outputDir: string;
  apiEndpoint: string;
  paceMs: number;
  timeoutMs: number;
  maxAttempts: number;
  backoffMs: number;
}

export type AppConfigOverrides = Partial<AppConfig>;

/**
 * Resolve the run configuration. A value given explicitly wins over the
 * environment, which wins over the built-in default. Relative directories
 * are resolved against `cwd`.
 */
export function resolveAppConfig(
  overrides: AppConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const cacheDir = overrides.cacheDir || env.WIKIPLOT_CACHE_DIR || DEFAULT_CACHE_DIR;
  const outputDir = overrides.outputDir || env.WIKIPLOT_OUTPUT_DIR || DEFAULT_OUTPUT_DIR;

  return {
    cacheDir: path.resolve(cwd, cacheDir),
    outputDir: path.resolve(cwd, outputDir),
    apiEndpoint: overrides.apiEndpoint || env.WIKIPLOT_API_ENDPOINT || WIKI_API_ENDPOINT,
    paceMs: overrides.paceMs ?? REQUEST_PACE_MS,
    timeoutMs: overrides.timeoutMs ?? DEFAULT_TIMEOUT,
    maxAttempts: overrides.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    backoffMs: overrides.backoffMs ?? DEFAULT_BACKOFF_MS,
  };
}
