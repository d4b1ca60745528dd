/**
 * Repair of malformed EXIF date strings.
 *
 * Cameras and editing tools write DateTime tags with slashes or dashes,
 * US month/day/year order, fractional seconds or no seconds at all. The
 * repairs below bring those into `YYYY:MM:DD HH:MM:SS`; anything they cannot
 * fix is returned in a form the EXIF parser then rejects.
 */

const NUMERIC = /^\d+$/;

function replaceFirst(text: string, search: string, replacement: string, times: number): string {
  let result = text;
  for (let i = 0; i < times && result.includes(search); i++) {
    result = result.replace(search, replacement);
  }
  return result;
}

function splitAtSpace(text: string): [string, string | undefined] {
  const space = text.indexOf(' ');
  return space === -1 ? [text, undefined] : [text.slice(0, space), text.slice(space + 1)];
}

/**
 * Normalize a raw EXIF date string towards `YYYY:MM:DD HH:MM:SS`.
 *
 * Month/day/year detection is by magnitude only (first component smaller
 * than the third). With two-digit years, or a day of 12 or less written
 * day-first, the result is wrong or unparseable; that is a known limitation.
 */
export function normalizeExifDate(raw: string): string {
  let value = raw.replace(/\0/g, '').trim();

  // Fractional seconds
  const dot = value.indexOf('.');
  if (dot !== -1) {
    value = value.slice(0, dot);
  }

  // Date separators
  const [datePart, timePart] = splitAtSpace(value);
  let date = replaceFirst(datePart, '/', ':', 2);
  date = replaceFirst(date, '-', ':', 2);
  value = timePart === undefined ? date : `${date} ${timePart}`;

  // M:D:Y -> Y:M:D
  const parts = value.split(/[ :]+/).filter(p => p.length > 0);
  const [first, second, third] = parts;
  if (
    first !== undefined &&
    second !== undefined &&
    third !== undefined &&
    NUMERIC.test(first) &&
    NUMERIC.test(second) &&
    NUMERIC.test(third) &&
    Number(first) < Number(third)
  ) {
    const time = parts.slice(3).join(':');
    value = time.length > 0 ? `${third}:${first}:${second} ${time}` : `${third}:${first}:${second}`;
  }

  // HH:MM -> HH:MM:00
  const [, time] = splitAtSpace(value);
  if (time !== undefined && time.split(':').length === 2) {
    value = `${value}:00`;
  }

  return value;
}
