import { describe, expect, it } from 'vitest';
import { daysBetween, isIsoDate, latestDate } from '../src/utils/dates.js';

describe('dates', () => {
  it('accepts only real calendar dates', () => {
    expect(isIsoDate('2028-02-29')).toBe(true);
    expect(isIsoDate('2026-02-29')).toBe(false);
    expect(isIsoDate('2026-3-1')).toBe(false);
  });

  it('counts whole days between dates', () => {
    expect(daysBetween('2026-02-27', '2026-03-02')).toBe(3);
    expect(daysBetween('2026-03-02', '2026-03-01')).toBe(-1);
    expect(() => daysBetween('2026-03-02', 'soon')).toThrow(RangeError);
  });

  it('picks the latest of several optional dates', () => {
    expect(latestDate(null, '2026-01-02', undefined, '2026-01-01')).toBe('2026-01-02');
    expect(latestDate()).toBeNull();
  });
});
