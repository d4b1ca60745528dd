/**
 * Report CSV: serialization of MetadataRows and parsing of update input.
 *
 * Quoting follows RFC 4180: a field containing a comma, a double quote, CR
 * or LF is wrapped in double quotes with inner quotes doubled. Rows end with
 * CRLF.
 */

import { formatDateTime } from '../dates/datetime.js';
import type { CandidateSource, DateTimeValue, MetadataRow } from '../types.js';

export const REPORT_HEADERS = [
  'Filename',
  'File Extension',
  'Folder',
  'From Filename',
  'File Modified Date',
  'File Created Date',
  'EXIF DateTime',
  'EXIF DateTimeOriginal',
  'EXIF DateTimeDigitized',
  'Set Date',
] as const;

/** Report column of each candidate */
export const CANDIDATE_COLUMNS: Record<CandidateSource, (typeof REPORT_HEADERS)[number]> = {
  FromFilename: 'From Filename',
  FileModified: 'File Modified Date',
  FileCreated: 'File Created Date',
  ExifDateTime: 'EXIF DateTime',
  ExifDateTimeOriginal: 'EXIF DateTimeOriginal',
  ExifDateTimeDigitized: 'EXIF DateTimeDigitized',
};

const ROW_END = '\r\n';
const BOM = '\uFEFF';

export function escapeField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function stringifyRecords(records: readonly (readonly string[])[]): string {
  return records.map(fields => fields.map(escapeField).join(',') + ROW_END).join('');
}

const cell = (value: DateTimeValue | undefined) => (value ? formatDateTime(value) : '');

/**
 * Cells of one row, in header order
 */
export function rowToRecord(row: MetadataRow): string[] {
  const { candidates } = row;
  return [
    row.filename,
    row.extension,
    row.folder,
    cell(candidates.FromFilename),
    cell(candidates.FileModified),
    cell(candidates.FileCreated),
    cell(candidates.ExifDateTime),
    cell(candidates.ExifDateTimeOriginal),
    cell(candidates.ExifDateTimeDigitized),
    cell(row.setDate),
  ];
}

/**
 * Full report text: header plus one line per row
 */
export function stringifyReport(rows: readonly MetadataRow[]): string {
  return stringifyRecords([[...REPORT_HEADERS], ...rows.map(rowToRecord)]);
}

/**
 * Split CSV text into records. Handles quoted fields with embedded commas,
 * quotes and line breaks; accepts CRLF or LF; ignores a leading BOM and
 * blank lines.
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(BOM) ? text.slice(1) : text;
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let quoted = false;
  let i = 0;

  const endRecord = () => {
    record.push(field);
    if (record.length > 1 || record[0] !== '') {
      records.push(record);
    }
    record = [];
    field = '';
  };

  while (i < input.length) {
    const ch = input.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (input.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
          continue;
        }
        quoted = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field.length === 0) {
      quoted = true;
    } else if (ch === ',') {
      record.push(field);
      field = '';
    } else if (ch === '\r' && input.charAt(i + 1) === '\n') {
      endRecord();
      i++;
    } else if (ch === '\n' || ch === '\r') {
      endRecord();
    } else {
      field += ch;
    }
    i++;
  }
  if (field.length > 0 || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV text into objects keyed by the header row
 */
export function parseCsvWithHeader(text: string): {
  headers: string[];
  rows: Array<Record<string, string>>;
} {
  const [header, ...body] = parseCsv(text);
  const headers = (header ?? []).map(h => h.trim());
  const rows = body.map(fields => {
    const row: Record<string, string> = {};
    headers.forEach((name, index) => {
      row[name] = fields[index] ?? '';
    });
    return row;
  });
  return { headers, rows };
}
