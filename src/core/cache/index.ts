// src/core/cache/index.ts
export { RevisionCache, sortDates } from './store.js';
export { CACHE_KEY_SUBSTITUTIONS, getCacheFileName, getCacheKey, toCacheKey } from './key.js';
