/**
 * CYCLE — Calendar date helpers
 *
 * All arithmetic goes through UTC midnight so the host timezone never
 * shifts a date by one.
 */

import type { CalendarDate } from './cycle.types.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

// Date.UTC maps years 0-99 onto 1900-1999; setUTCFullYear does not
function utcMidnight(year: number, monthIndex: number, day: number): Date {
  const d = new Date(0);
  d.setUTCFullYear(year, monthIndex, day);
  return d;
}

export function daysInMonth(year: number, month: number): number {
  return utcMidnight(year, month, 0).getUTCDate();
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== 'object' || value === null) return false;
  if (!('year' in value) || !('month' in value) || !('day' in value)) return false;

  const { year, month, day } = value;
  if (typeof year !== 'number' || typeof month !== 'number' || typeof day !== 'number') {
    return false;
  }
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return false;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12) return false;
  return day >= 1 && day <= daysInMonth(year, month);
}

/**
 * Strict YYYY-MM-DD parse. Returns null for anything else,
 * including impossible days such as 2023-02-29.
 */
export function parseIsoDate(text: string): CalendarDate | null {
  const match = ISO_DATE_RE.exec(text);
  if (!match) return null;

  const date = {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
  };
  return isCalendarDate(date) ? date : null;
}

export function formatIsoDate(date: CalendarDate): string {
  const y = String(date.year).padStart(4, '0');
  const m = String(date.month).padStart(2, '0');
  const d = String(date.day).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export function toEpochDay(date: CalendarDate): number {
  return Math.round(utcMidnight(date.year, date.month - 1, date.day).getTime() / MS_PER_DAY);
}

export function fromEpochDay(epochDay: number): CalendarDate {
  const d = new Date(epochDay * MS_PER_DAY);
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  };
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** Whole days from `from` to `to` (negative when `to` is earlier) */
export function diffInDays(to: CalendarDate, from: CalendarDate): number {
  return toEpochDay(to) - toEpochDay(from);
}

export function compareDates(a: CalendarDate, b: CalendarDate): -1 | 0 | 1 {
  const diff = diffInDays(a, b);
  if (diff < 0) return -1;
  if (diff > 0) return 1;
  return 0;
}

export function utcToday(now: Date): CalendarDate {
  return {
    year: now.getUTCFullYear(),
    month: now.getUTCMonth() + 1,
    day: now.getUTCDate(),
  };
}
