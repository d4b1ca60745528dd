/**
 * Helpers for the canonical DateTimeValue: validation, ordering and the two
 * textual forms (report output and EXIF wire format).
 */

import type { DateTimeValue } from '../types.js';

/** Years outside this range usually come from corrupted EXIF bytes. */
export const MIN_SANE_YEAR = 1800;
export const MAX_SANE_YEAR = 2100;

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Build a value from numeric fields, or undefined when the fields do not
 * form a real calendar date and time of day.
 */
export function makeDateTime(
  year: number,
  month: number,
  day: number,
  hour = 0,
  minute = 0,
  second = 0
): DateTimeValue | undefined {
  const fields = [year, month, day, hour, minute, second];
  if (!fields.every(Number.isInteger)) {
    return undefined;
  }
  if (year < 1 || year > 9999 || month < 1 || month > 12) {
    return undefined;
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    return undefined;
  }
  if (hour < 0 || hour > 23 || minute < 0 || minute > 59 || second < 0 || second > 59) {
    return undefined;
  }
  return { year, month, day, hour, minute, second };
}

export function isSane(value: DateTimeValue): boolean {
  return value.year >= MIN_SANE_YEAR && value.year <= MAX_SANE_YEAR;
}

/**
 * The value itself when sane, undefined otherwise
 */
export function saneOrUndefined(value: DateTimeValue | undefined): DateTimeValue | undefined {
  return value !== undefined && isSane(value) ? value : undefined;
}

/**
 * Negative when `a` is earlier than `b`, positive when later, 0 when equal
 */
export function compareDateTimes(a: DateTimeValue, b: DateTimeValue): number {
  return (
    a.year - b.year ||
    a.month - b.month ||
    a.day - b.day ||
    a.hour - b.hour ||
    a.minute - b.minute ||
    a.second - b.second
  );
}

/**
 * Equality over optional values; two absent values are equal
 */
export function isSameDateTime(
  a: DateTimeValue | undefined,
  b: DateTimeValue | undefined
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return compareDateTimes(a, b) === 0;
}

export function isSameDay(a: DateTimeValue, b: DateTimeValue): boolean {
  return a.year === b.year && a.month === b.month && a.day === b.day;
}

export function isSameTimeOfDay(a: DateTimeValue, b: DateTimeValue): boolean {
  return a.hour === b.hour && a.minute === b.minute && a.second === b.second;
}

/**
 * Chronologically earliest of the present values
 */
export function earliest(values: Iterable<DateTimeValue | undefined>): DateTimeValue | undefined {
  let min: DateTimeValue | undefined;
  for (const value of values) {
    if (value !== undefined && (min === undefined || compareDateTimes(value, min) < 0)) {
      min = value;
    }
  }
  return min;
}

/**
 * Local wall-clock fields of a JS Date, truncated to whole seconds
 */
export function fromDate(date: Date): DateTimeValue | undefined {
  if (Number.isNaN(date.getTime())) {
    return undefined;
  }
  return makeDateTime(
    date.getFullYear(),
    date.getMonth() + 1,
    date.getDate(),
    date.getHours(),
    date.getMinutes(),
    date.getSeconds()
  );
}

/**
 * Report format: `YYYY-MM-DD HH:MM:SS`
 */
export function formatDateTime(value: DateTimeValue): string {
  return (
    `${pad(value.year, 4)}-${pad(value.month)}-${pad(value.day)} ` +
    `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`
  );
}

/**
 * EXIF wire format: `YYYY:MM:DD HH:MM:SS`
 */
export function formatExifDateTime(value: DateTimeValue): string {
  return (
    `${pad(value.year, 4)}:${pad(value.month)}:${pad(value.day)} ` +
    `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`
  );
}
