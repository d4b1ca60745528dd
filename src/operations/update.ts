/**
 * updateFromReport() — write the Set Date column of a (possibly hand-edited)
 * report back into the photos' EXIF.
 */

import { readFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { parseReportDate } from '../dates/parse.js';
import { InputResourceError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { parseCsvWithHeader } from '../report/csv.js';
import { writeExifDate } from './write.js';
import type { UpdateEntry, UpdateOptions, UpdateSummary, WriteRequest } from '../types.js';

export const REQUIRED_COLUMNS = ['Folder', 'Filename', 'Set Date'] as const;

async function isFile(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Read the write requests of a report CSV.
 *
 * @throws {InputResourceError} when the file is unreadable or lacks a required column
 */
export async function readWriteRequests(csvPath: string): Promise<WriteRequest[]> {
  let text: string;
  try {
    text = await readFile(csvPath, 'utf8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new InputResourceError(csvPath, `Cannot read report (${reason})`);
  }

  const { headers, rows } = parseCsvWithHeader(text);
  const missing = REQUIRED_COLUMNS.filter(column => !headers.includes(column));
  if (missing.length > 0) {
    throw new InputResourceError(csvPath, `Report is missing column(s) ${missing.join(', ')}`);
  }

  return rows.map(row => ({
    folder: row['Folder'] ?? '',
    filename: row['Filename'] ?? '',
    setDate: row['Set Date'] ?? '',
  }));
}

async function processRequest(
  request: WriteRequest,
  row: number,
  options: UpdateOptions
): Promise<UpdateEntry> {
  const logger = options.logger ?? silentLogger;
  const file = join(request.folder, request.filename);

  const text = request.setDate.trim();
  if (text.length === 0) {
    return { row, file, status: 'skipped', reason: 'empty Set Date' };
  }

  if (!(await isFile(file))) {
    logger.warn(`File not found, skipping: ${file}`);
    return { row, file, status: 'skipped', reason: 'file not found' };
  }

  const target = parseReportDate(text);
  if (target === undefined) {
    logger.warn(`Unrecognised Set Date "${text}", skipping: ${file}`);
    return { row, file, status: 'skipped', reason: `unrecognised Set Date "${text}"` };
  }

  const result = await writeExifDate(file, target, options);
  if (!result.success) {
    return { row, file, status: 'failed', reason: result.error };
  }
  const outcome = result.value;
  if (outcome.status === 'unsupported') {
    return { row, file, status: 'skipped', reason: `unsupported format (${outcome.format})` };
  }
  return { row, file, status: outcome.status, exifDate: outcome.exifDate };
}

/**
 * Apply every row of a report CSV, one file at a time.
 *
 * Rows are numbered from 1, header excluded.
 *
 * @throws {InputResourceError} before any file is touched when the report is
 *   missing, unreadable or lacks a required column
 */
export async function updateFromReport(
  csvPath: string,
  options: UpdateOptions = {}
): Promise<UpdateSummary> {
  const timestamp = new Date().toISOString();
  const requests = await readWriteRequests(csvPath);

  const entries: UpdateEntry[] = [];
  for (const [index, request] of requests.entries()) {
    entries.push(await processRequest(request, index + 1, options));
  }

  const count = (predicate: (entry: UpdateEntry) => boolean) => entries.filter(predicate).length;
  return {
    timestamp,
    totalRows: requests.length,
    updated: count(e => e.status === 'updated' || e.status === 'would-update'),
    alreadyCurrent: count(e => e.status === 'already-current'),
    skipped: count(e => e.status === 'skipped'),
    failed: count(e => e.status === 'failed'),
    entries,
  };
}
