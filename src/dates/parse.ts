/**
 * Date parsing for the three input contexts: EXIF tag values, photo file
 * names and the hand-edited report CSV.
 *
 * Each context has a fixed, ordered list of accepted formats. The first
 * format that matches wins; when none does, or the year is outside the sane
 * range, the result is `undefined`. Nothing here throws.
 */

import type { DateTimeValue } from '../types.js';
import { makeDateTime, saneOrUndefined } from './datetime.js';

export interface DateFormat {
  /** Human-readable layout, used in log messages */
  label: string;
  /** Named groups: year, month, day and optionally hour, minute, second */
  pattern: RegExp;
}

// Fields followed by a separator take one or two digits. Compact layouts take
// two digits or a single one, tried in this order, so `2015329` is 2015-03-29.
const COMPACT_FIELDS = {
  month: '1[0-2]|0[1-9]|[1-9]',
  day: '3[01]|[12]\\d|0[1-9]|[1-9]',
  hour: '2[0-3]|[01]\\d|\\d',
  minute: '[0-5]\\d|\\d',
  second: '[0-5]\\d|\\d',
} as const;

const Y = '(?<year>\\d{4})';
const compact = (name: keyof typeof COMPACT_FIELDS) => `(?<${name}>${COMPACT_FIELDS[name]})`;
const loose = (name: string) => `(?<${name}>\\d{1,2})`;

const format = (label: string, source: string): DateFormat => ({
  label,
  pattern: new RegExp(`^${source}$`),
});

export const EXIF_FORMATS: readonly DateFormat[] = [
  format(
    'YYYY:MM:DD HH:MM:SS',
    `${Y}:${loose('month')}:${loose('day')} ${loose('hour')}:${loose('minute')}:${loose('second')}`
  ),
];

export const FILENAME_FORMATS: readonly DateFormat[] = [
  format('YYYYMMDD', `${Y}${compact('month')}${compact('day')}`),
  format('YYYY-MM-DD', `${Y}-${loose('month')}-${loose('day')}`),
  format(
    'YYYYMMDD_HHMMSS',
    `${Y}${compact('month')}${compact('day')}_${compact('hour')}${compact('minute')}${compact('second')}`
  ),
  format(
    'YYYY-MM-DD_HH-MM-SS',
    `${Y}-${loose('month')}-${loose('day')}_${loose('hour')}-${loose('minute')}-${loose('second')}`
  ),
];

export const REPORT_FORMATS: readonly DateFormat[] = [
  format(
    'YYYY-MM-DD HH:MM:SS',
    `${Y}-${loose('month')}-${loose('day')} ${loose('hour')}:${loose('minute')}:${loose('second')}`
  ),
  format('YYYY-MM-DD HH:MM', `${Y}-${loose('month')}-${loose('day')} ${loose('hour')}:${loose('minute')}`),
  format(
    'MM/DD/YYYY HH:MM:SS',
    `${loose('month')}/${loose('day')}/${Y} ${loose('hour')}:${loose('minute')}:${loose('second')}`
  ),
  format('MM/DD/YYYY HH:MM', `${loose('month')}/${loose('day')}/${Y} ${loose('hour')}:${loose('minute')}`),
];

function matchFormat(text: string, fmt: DateFormat): DateTimeValue | undefined {
  const groups = fmt.pattern.exec(text)?.groups;
  if (!groups) {
    return undefined;
  }
  const num = (name: string) => Number(groups[name] ?? '0');
  return makeDateTime(
    num('year'),
    num('month'),
    num('day'),
    num('hour'),
    num('minute'),
    num('second')
  );
}

/**
 * Try each format in order; first calendar-valid match wins.
 * Insane years (outside 1800-2100) are rejected.
 */
export function parseWithFormats(
  text: string,
  formats: readonly DateFormat[]
): DateTimeValue | undefined {
  for (const fmt of formats) {
    const value = matchFormat(text, fmt);
    if (value !== undefined) {
      return saneOrUndefined(value);
    }
  }
  return undefined;
}

/**
 * Parse a canonical EXIF date (`YYYY:MM:DD HH:MM:SS`). Raw tag values should
 * go through `normalizeExifDate` first.
 */
export function parseExifDate(text: string): DateTimeValue | undefined {
  return parseWithFormats(text, EXIF_FORMATS);
}

/**
 * Leading token of a file name: spaces read as underscores, text up to the
 * first underscore. The extension stays on a name without underscores, so
 * `20150329.jpg` carries no filename date.
 */
export function filenameDateToken(filename: string): string {
  return filename.replace(/ /g, '_').split('_')[0] ?? '';
}

/**
 * Date embedded at the start of a file name, as written by phone cameras
 * (`20150329_183026659_iOS.jpg`) and many export tools (`2015-03-29 ...`).
 */
export function parseFilenameDate(filename: string): DateTimeValue | undefined {
  return parseWithFormats(filenameDateToken(filename), FILENAME_FORMATS);
}

/**
 * Parse a `Set Date` cell from the report CSV
 */
export function parseReportDate(text: string): DateTimeValue | undefined {
  return parseWithFormats(text.trim(), REPORT_FORMATS);
}
