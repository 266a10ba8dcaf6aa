import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { RevisionCache, sortDates } from '../store.js';
import { WikiPlotError } from '../../errors.js';
import { ErrorCode } from '../../types/index.js';

describe('RevisionCache', () => {
  let tmpDir: string;
  let cacheDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'wikiplot-cache-'));
    cacheDir = path.join(tmpDir, 'cache');
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('derives the file path from the title', () => {
    const cache = new RevisionCache(cacheDir);

    expect(cache.pathFor('Grace_Hopper')).toBe(
      path.join(cacheDir, 'https-en-wikipedia-org-wiki-Grace_Hopper.json')
    );
  });

  it('returns an empty list when nothing is cached', async () => {
    const cache = new RevisionCache(cacheDir);

    await expect(cache.load('Grace_Hopper')).resolves.toEqual([]);
  });

  it('creates the directory and writes sorted JSON', async () => {
    const cache = new RevisionCache(cacheDir);

    const written = await cache.save('Grace_Hopper', ['2021-03-01', '2020-01-01', '2020-01-01']);

    expect(written).toEqual(['2020-01-01', '2020-01-01', '2021-03-01']);
    const raw = await fs.readFile(cache.pathFor('Grace_Hopper'), 'utf-8');
    expect(raw).toBe('["2020-01-01","2020-01-01","2021-03-01"]');
  });

  it('loads what it saved, sorted', async () => {
    const cache = new RevisionCache(cacheDir);
    const dates = ['2019-12-31', '2019-01-05', '2019-12-31', '2018-07-04'];

    await cache.save('Grace_Hopper', dates);

    await expect(cache.load('Grace_Hopper')).resolves.toEqual(sortDates(dates));
  });

  it('sorts an unsorted file on load', async () => {
    const cache = new RevisionCache(cacheDir);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(cache.pathFor('Grace_Hopper'), '["2020-02-01","2020-01-01"]');

    await expect(cache.load('Grace_Hopper')).resolves.toEqual(['2020-01-01', '2020-02-01']);
  });

  it('overwrites an existing record', async () => {
    const cache = new RevisionCache(cacheDir);

    await cache.save('Grace_Hopper', ['2020-01-01']);
    await cache.save('Grace_Hopper', ['2020-01-02']);

    await expect(cache.load('Grace_Hopper')).resolves.toEqual(['2020-01-02']);
  });

  it('keeps records of different titles apart', async () => {
    const cache = new RevisionCache(cacheDir);

    await cache.save('Grace_Hopper', ['2020-01-01']);
    await cache.save('Ada_Lovelace', ['2021-01-01']);

    await expect(cache.load('Grace_Hopper')).resolves.toEqual(['2020-01-01']);
    await expect(cache.load('Ada_Lovelace')).resolves.toEqual(['2021-01-01']);
  });

  it('fails with CACHE_CORRUPT on invalid JSON and leaves the file in place', async () => {
    const cache = new RevisionCache(cacheDir);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(cache.pathFor('Grace_Hopper'), '["2020-01-01",');

    const error = await cache.load('Grace_Hopper').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WikiPlotError);
    expect(error).toMatchObject({ code: ErrorCode.CACHE_CORRUPT, retryable: false });
    await expect(fs.readFile(cache.pathFor('Grace_Hopper'), 'utf-8')).resolves.toBe('["2020-01-01",');
  });

  it('fails with CACHE_CORRUPT when the JSON is not an array of strings', async () => {
    const cache = new RevisionCache(cacheDir);
    await fs.mkdir(cacheDir, { recursive: true });
    await fs.writeFile(cache.pathFor('Grace_Hopper'), '{"dates":["2020-01-01"]}');
    await fs.writeFile(cache.pathFor('Ada_Lovelace'), '["2020-01-01", 3]');

    await expect(cache.load('Grace_Hopper')).rejects.toMatchObject({ code: ErrorCode.CACHE_CORRUPT });
    await expect(cache.load('Ada_Lovelace')).rejects.toMatchObject({ code: ErrorCode.CACHE_CORRUPT });
  });
});
