import { describe, it, expect } from '@jest/globals';
import { mergeRevisionDates } from '../merge.js';

describe('mergeRevisionDates', () => {
  it('keeps everything when nothing was cached', () => {
    const fetched = ['2020-01-01', '2020-01-01', '2020-01-02'];

    expect(mergeRevisionDates([], fetched)).toEqual({
      dates: ['2020-01-01', '2020-01-01', '2020-01-02'],
      newDates: ['2020-01-01', '2020-01-01', '2020-01-02'],
    });
  });

  it('appends only days after the last cached day', () => {
    const cached = ['2020-01-01', '2020-01-02'];
    const fetched = ['2020-01-02', '2020-01-03', '2020-01-03'];

    const result = mergeRevisionDates(cached, fetched);

    expect(result.newDates).toEqual(['2020-01-03', '2020-01-03']);
    expect(result.dates).toEqual(['2020-01-01', '2020-01-02', '2020-01-03', '2020-01-03']);
  });

  it('equals the cache followed by the strictly newer fetched days', () => {
    const cached = ['2019-05-01', '2019-06-01', '2019-06-01'];
    const fetched = ['2019-06-01', '2019-06-01', '2019-06-01', '2019-06-02', '2019-07-15'];
    const lastDate = cached[cached.length - 1];

    const { dates } = mergeRevisionDates(cached, fetched);

    expect(dates).toEqual([...cached, ...fetched.filter((d) => d > lastDate)]);
    expect(dates).toEqual([...dates].sort());
  });

  it('reports boundary-day counts from both sides', () => {
    const cached = ['2020-01-01', '2020-01-02'];
    const fetched = ['2020-01-02', '2020-01-02', '2020-01-03'];

    expect(mergeRevisionDates(cached, fetched).boundary).toEqual({
      date: '2020-01-02',
      cachedCount: 1,
      fetchedCount: 2,
    });
  });

  it('returns the cache unchanged when nothing is newer', () => {
    const cached = ['2020-01-01', '2020-01-02'];

    const result = mergeRevisionDates(cached, ['2020-01-02']);

    expect(result.newDates).toEqual([]);
    expect(result.dates).toEqual(cached);
    expect(result.boundary).toEqual({ date: '2020-01-02', cachedCount: 1, fetchedCount: 1 });
  });

  it('does not mutate its inputs', () => {
    const cached = ['2020-01-01'];
    const fetched = ['2020-01-03', '2020-01-02'];

    mergeRevisionDates(cached, fetched);

    expect(cached).toEqual(['2020-01-01']);
    expect(fetched).toEqual(['2020-01-03', '2020-01-02']);
  });
});
