import { describe, it, expect } from '@jest/globals';
import { countEditsPerDay, findPeak, isBusyDay, toDayNumber } from '../counts.js';

describe('chart counts', () => {
  it('counts edits per day in date order', () => {
    const counts = countEditsPerDay(['2020-01-02', '2020-01-01', '2020-01-02', '2020-01-02']);

    expect(counts).toEqual([
      { date: '2020-01-01', count: 1 },
      { date: '2020-01-02', count: 3 },
    ]);
  });

  it('returns nothing for no dates', () => {
    expect(countEditsPerDay([])).toEqual([]);
    expect(findPeak([])).toBeUndefined();
  });

  it('picks the earliest day among equal peaks', () => {
    const peak = findPeak([
      { date: '2020-01-01', count: 2 },
      { date: '2020-01-05', count: 4 },
      { date: '2020-02-01', count: 4 },
    ]);

    expect(peak).toEqual({ date: '2020-01-05', count: 4 });
  });

  it('highlights days above 60% of the peak', () => {
    expect(isBusyDay(10, 10)).toBe(true);
    expect(isBusyDay(7, 10)).toBe(true);
    expect(isBusyDay(6, 10)).toBe(false);
    expect(isBusyDay(1, 10)).toBe(false);
  });

  it('numbers days from the Unix epoch', () => {
    expect(toDayNumber('1970-01-01')).toBe(0);
    expect(toDayNumber('1970-01-02')).toBe(1);
    expect(toDayNumber('2020-01-01')).toBe(18262);
    expect(toDayNumber('2020-03-01') - toDayNumber('2020-02-28')).toBe(2);
  });
});
