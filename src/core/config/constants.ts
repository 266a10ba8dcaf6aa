// src/core/config/constants.ts
export const APP_NAME = 'wikiplot';
export const APP_VERSION = '0.1.0';

export const WIKI_API_ENDPOINT = 'https://en.wikipedia.org/w/api.php';
export const WIKI_ARTICLE_BASE_URL = 'https://en.wikipedia.org/wiki/';

// Largest rvlimit the API grants to anonymous clients
export const REVISION_BATCH_SIZE = 500;
// Pause between paginated requests (Wikimedia fair-use)
export const REQUEST_PACE_MS = 200;

export const DEFAULT_TIMEOUT = 30000; // 30 seconds
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 1000;

export const DEFAULT_LOG_BASE = 10;
export const DEFAULT_CACHE_DIR = 'cache';
export const DEFAULT_OUTPUT_DIR = 'plotGraphs';

export const DEFAULT_USER_AGENT = `${APP_NAME}/${APP_VERSION} (Node.js revision history plotter)`;
