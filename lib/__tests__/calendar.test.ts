import { describe, it, expect } from 'vitest';
import {
  getHoliday,
  isMarketDay,
  listHolidays,
  nyCalendarDay,
  nyTimeOfDay,
  weekdayOf,
} from '../calendar.js';

describe('market-day calendar', () => {
  describe('isMarketDay', () => {
    it('treats ordinary weekdays as market days', () => {
      expect(isMarketDay('2026-01-14')).toBe(true); // Wednesday
      expect(isMarketDay('2026-02-18')).toBe(true); // Wednesday
    });

    it('closes on weekends', () => {
      expect(isMarketDay('2026-01-17')).toBe(false); // Saturday
      expect(isMarketDay('2026-01-18')).toBe(false); // Sunday
    });

    it('closes on listed holidays', () => {
      expect(isMarketDay('2026-01-19')).toBe(false); // MLK Day
      expect(isMarketDay('2026-02-16')).toBe(false); // Presidents' Day
      expect(isMarketDay('2025-01-09')).toBe(false); // National Day of Mourning
      expect(isMarketDay('2026-12-25')).toBe(false);
    });

    it('keeps the day after MLK Day open', () => {
      expect(isMarketDay('2026-01-20')).toBe(true);
    });

    it('rejects malformed days', () => {
      expect(() => isMarketDay('2026/01/14')).toThrow('Not a YYYY-MM-DD string: 2026/01/14');
    });
  });

  it('numbers weekdays from Sunday', () => {
    expect(weekdayOf('2026-01-18')).toBe(0);
    expect(weekdayOf('2026-01-14')).toBe(3);
    expect(weekdayOf('2026-01-17')).toBe(6);
  });

  it('names holidays', () => {
    expect(getHoliday('2026-04-03')?.name).toBe('Good Friday');
    expect(getHoliday('2026-04-06')).toBeUndefined();
  });

  it('lists ten 2026 holidays', () => {
    const dates = listHolidays(2026).map((h) => h.date);
    expect(dates).toEqual([
      '2026-01-01',
      '2026-01-19',
      '2026-02-16',
      '2026-04-03',
      '2026-05-25',
      '2026-06-19',
      '2026-07-03',
      '2026-09-07',
      '2026-11-26',
      '2026-12-25',
    ]);
  });

  describe('New York time', () => {
    it('uses the New York calendar day, not UTC', () => {
      // 03:00 UTC is still the previous evening in New York (EST, UTC-5)
      expect(nyCalendarDay(new Date('2026-01-15T03:00:00Z'))).toBe('2026-01-14');
      expect(nyCalendarDay(new Date('2026-01-15T05:00:00Z'))).toBe('2026-01-15');
    });

    it('follows daylight saving time', () => {
      expect(nyTimeOfDay(new Date('2026-01-14T14:30:00Z'))).toBe('09:30'); // EST
      expect(nyTimeOfDay(new Date('2026-07-14T13:30:00Z'))).toBe('09:30'); // EDT
    });

    it('renders midnight as 00', () => {
      expect(nyTimeOfDay(new Date('2026-01-14T05:00:00Z'))).toBe('00:00');
    });

    it('rejects invalid dates', () => {
      expect(() => nyCalendarDay(new Date('not a date'))).toThrow('Invalid Date input');
    });
  });
});
