/**
 * Market-day calendar
 *
 * All "which day is it" questions are answered in New York time, since the
 * experiment follows the NYSE session. Holiday data lives in
 * config/market-holidays.json so it can be extended per year without code changes.
 */

import * as fs from 'fs';
import { z } from 'zod';

const NY_TZ = 'America/New_York';
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const HOLIDAYS_FILE = new URL('../config/market-holidays.json', import.meta.url);

const HolidayFileSchema = z.object({
  exchange: z.string(),
  holidays: z.record(z.array(z.object({ date: z.string().regex(DAY_PATTERN), name: z.string() }))),
});

export interface MarketHoliday {
  date: string;
  name: string;
}

function loadHolidays(): Map<string, MarketHoliday> {
  const parsed = HolidayFileSchema.parse(JSON.parse(fs.readFileSync(HOLIDAYS_FILE, 'utf-8')));
  const byDate = new Map<string, MarketHoliday>();
  for (const entries of Object.values(parsed.holidays)) {
    for (const holiday of entries) {
      byDate.set(holiday.date, holiday);
    }
  }
  return byDate;
}

const HOLIDAYS = loadHolidays();

export function assertDay(day: string): void {
  if (!DAY_PATTERN.test(day)) {
    throw new Error(`Not a YYYY-MM-DD string: ${day}`);
  }
}

/**
 * 0 = Sunday ... 6 = Saturday, for a calendar day string.
 */
export function weekdayOf(day: string): number {
  assertDay(day);
  const [y, m, d] = day.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d)).getUTCDay();
}

export function getHoliday(day: string): MarketHoliday | undefined {
  return HOLIDAYS.get(day);
}

export function listHolidays(year: number): MarketHoliday[] {
  return [...HOLIDAYS.values()].filter((h) => h.date.startsWith(`${year}-`));
}

export function isMarketDay(day: string): boolean {
  const weekday = weekdayOf(day);
  if (weekday === 0 || weekday === 6) return false;
  return !HOLIDAYS.has(day);
}

function nyParts(instant: Date): Record<string, string> {
  if (isNaN(instant.getTime())) throw new Error('Invalid Date input');

  const fmt = new Intl.DateTimeFormat('en-CA', {
    timeZone: NY_TZ,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
  });

  const map: Record<string, string> = {};
  for (const part of fmt.formatToParts(instant)) map[part.type] = part.value;
  return map;
}

/**
 * New York calendar day ("YYYY-MM-DD") for an instant.
 */
export function nyCalendarDay(instant: Date = new Date()): string {
  const p = nyParts(instant);
  return `${p.year}-${p.month}-${p.day}`;
}

/**
 * New York wall-clock time as "HH:mm".
 */
export function nyTimeOfDay(instant: Date = new Date()): string {
  const p = nyParts(instant);
  // some ICU builds render midnight as "24"
  const hour = p.hour === '24' ? '00' : p.hour;
  return `${hour}:${p.minute}`;
}
