import type { DateWindow } from './types.js';
import { ConfigError } from './errors.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Format a date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  return date.toISOString().split('T')[0];
}

export function startOfUtcDay(date: Date): Date {
  const start = new Date(date);
  start.setUTCHours(0, 0, 0, 0);
  return start;
}

export function endOfUtcDay(date: Date): Date {
  return new Date(startOfUtcDay(date).getTime() + DAY_MS - 1);
}

/**
 * Parse a strict YYYY-MM-DD string as midnight UTC.
 * Rejects impossible calendar dates such as 2024-02-30.
 */
export function parseDateArg(value: string, flag: string): Date {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    throw new ConfigError(`${flag} must be in YYYY-MM-DD format, got "${value}"`);
  }

  const [, year, month, day] = match;
  // setUTCFullYear keeps years below 100 as written; Date.UTC would move them into the 1900s
  const date = new Date(0);
  date.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
  if (formatDate(date) !== value) {
    throw new ConfigError(`${flag} is not a valid calendar date: "${value}"`);
  }
  return date;
}

/**
 * Build an inclusive window covering whole UTC days from `start` to `end`
 */
export function createDateWindow(start: Date, end: Date): DateWindow {
  const window = { start: startOfUtcDay(start), end: endOfUtcDay(end) };
  if (Number.isNaN(window.start.getTime()) || Number.isNaN(window.end.getTime())) {
    throw new ConfigError('Date range falls outside the dates this tool can represent');
  }
  if (window.start.getTime() > window.end.getTime()) {
    throw new ConfigError(
      `Start date ${formatDate(window.start)} is after end date ${formatDate(window.end)}`
    );
  }
  return window;
}

/**
 * Window from midnight `days` days ago through the end of today
 */
export function lastDaysWindow(days: number, now: Date = new Date()): DateWindow {
  const start = new Date(startOfUtcDay(now).getTime() - days * DAY_MS);
  return createDateWindow(start, now);
}

/**
 * The whole calendar month before the one `now` falls in
 */
export function previousMonthWindow(now: Date = new Date()): DateWindow {
  const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - 1, 1));
  // Day 0 of the current month is the last day of the previous one
  const end = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 0));
  return createDateWindow(start, end);
}

export function isWithinWindow(date: Date, window: DateWindow): boolean {
  const time = date.getTime();
  return time >= window.start.getTime() && time <= window.end.getTime();
}

export function formatWindow(window: DateWindow): string {
  return `${formatDate(window.start)} to ${formatDate(window.end)}`;
}
