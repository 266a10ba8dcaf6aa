// src/core/cache/store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { WikiPlotError } from '../errors.js';
import { ErrorCode } from '../types/index.js';
import type { RevisionDate } from '../types/index.js';
import { getCacheFileName } from './key.js';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

export function sortDates(dates: readonly RevisionDate[]): RevisionDate[] {
  return [...dates].sort();
}

/**
 * One JSON file per article holding its revision dates, sorted ascending.
 */
export class RevisionCache {
  private cacheDir: string;

  constructor(cacheDir: string) {
    this.cacheDir = cacheDir;
  }

  pathFor(identifier: string): string {
    return path.join(this.cacheDir, getCacheFileName(identifier));
  }

  async load(identifier: string): Promise<RevisionDate[]> {
    const cachePath = this.pathFor(identifier);

    if (!existsSync(cachePath)) {
      return [];
    }

    const content = await fs.readFile(cachePath, 'utf-8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw this.corrupt(cachePath, error instanceof Error ? error.message : String(error));
    }

    if (!isStringArray(parsed)) {
      throw this.corrupt(cachePath, 'expected a JSON array of date strings');
    }

    return sortDates(parsed);
  }

  async save(identifier: string, dates: readonly RevisionDate[]): Promise<RevisionDate[]> {
    const cachePath = this.pathFor(identifier);
    const sorted = sortDates(dates);

    await fs.mkdir(path.dirname(cachePath), { recursive: true });
    await fs.writeFile(cachePath, JSON.stringify(sorted));

    return sorted;
  }

  private corrupt(cachePath: string, reason: string): WikiPlotError {
    return new WikiPlotError(
      ErrorCode.CACHE_CORRUPT,
      `Cache file is corrupt: ${cachePath} (${reason})`,
      false,
      `Inspect or remove ${cachePath} to fetch the full history again`,
      { cachePath }
    );
  }
}
