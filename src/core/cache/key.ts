// src/core/cache/key.ts
import { WIKI_ARTICLE_BASE_URL } from '../config/constants.js';
import { articleUrl } from '../article/title.js';

/**
 * Ordered substitutions turning an article URL into a filename. The scheme
 * separators come first so `https://` becomes `https-` rather than `https---`.
 *
 * Everything maps to `-`, so titles that differ only in which of these
 * characters (or a literal `-`) sits at a given position share a key:
 * `A.B`, `A/B`, `A:B` and `A-B` all become `https-en-wikipedia-org-wiki-A-B`.
 */
export const CACHE_KEY_SUBSTITUTIONS: ReadonlyArray<readonly [string, string]> = [
  ['https://', 'https-'],
  ['http://', 'http-'],
  ['/', '-'],
  [':', '-'],
  ['.', '-'],
  ['?', '-'],
  ['"', '-'],
  ['<', '-'],
  ['>', '-'],
  ['|', '-'],
];

export function toCacheKey(url: string): string {
  return CACHE_KEY_SUBSTITUTIONS.reduce(
    (key, [from, to]) => key.split(from).join(to),
    url
  );
}

export function getCacheKey(identifier: string, baseUrl: string = WIKI_ARTICLE_BASE_URL): string {
  return toCacheKey(articleUrl(identifier.replace(/ /g, '_'), baseUrl));
}

export function getCacheFileName(identifier: string): string {
  return `${getCacheKey(identifier)}.json`;
}
