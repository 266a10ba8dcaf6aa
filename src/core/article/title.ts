// src/core/article/title.ts
import { WIKI_ARTICLE_BASE_URL } from '../config/constants.js';
import { WikiPlotError } from '../errors.js';
import { ErrorCode } from '../types/index.js';
import type { Article } from '../types/index.js';

const WIKI_PATH_SEGMENT = '/wiki/';

/**
 * Collapse whitespace and underscores into the underscore form used by
 * article URLs: `"  Alan   Turing "` and `"Alan_Turing"` both give `Alan_Turing`.
 */
export function normalizeTitle(title: string): string {
  return title.trim().replace(/[\s_]+/g, '_').replace(/^_+|_+$/g, '');
}

export function toDisplayTitle(identifier: string): string {
  return identifier.replace(/_/g, ' ');
}

export function articleUrl(identifier: string, baseUrl: string = WIKI_ARTICLE_BASE_URL): string {
  return `${baseUrl}${identifier}`;
}

export function isArticleUrl(input: string): boolean {
  return input.includes(WIKI_PATH_SEGMENT);
}

/**
 * Pull the title out of an article URL: everything after the last `/wiki/`,
 * without fragment or query string, percent-decoded.
 */
export function extractTitleFromUrl(input: string): string {
  const afterPath = input.slice(input.lastIndexOf(WIKI_PATH_SEGMENT) + WIKI_PATH_SEGMENT.length);
  const withoutFragment = afterPath.split('#')[0];
  const withoutQuery = withoutFragment.split('?')[0];
  return safeDecode(withoutQuery);
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    // Malformed escapes (a bare `%`) are kept literally
    return value;
  }
}

export function parseArticleInput(rawInput: string): Article {
  const input = rawInput.trim();
  const title = isArticleUrl(input) ? extractTitleFromUrl(input) : input;
  const identifier = normalizeTitle(title);

  if (!identifier) {
    throw new WikiPlotError(
      ErrorCode.INVALID_INPUT,
      `No article title found in input: "${rawInput}"`,
      false,
      'Pass a title such as "Alan Turing" or a URL such as https://en.wikipedia.org/wiki/Alan_Turing'
    );
  }

  return {
    identifier,
    displayTitle: toDisplayTitle(identifier),
    url: articleUrl(identifier),
  };
}
