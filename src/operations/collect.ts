/**
 * Candidate collection: the six date signals of one photo file.
 */

import { stat } from 'node:fs/promises';
import { basename, dirname, extname } from 'node:path';
import { fromDate } from '../dates/datetime.js';
import { normalizeExifDate } from '../dates/normalize.js';
import { parseExifDate, parseFilenameDate } from '../dates/parse.js';
import { filterSane, reconcile } from '../dates/reconcile.js';
import { silentLogger } from '../logger.js';
import { fileExifReader } from './read.js';
import type {
  CandidateSet,
  DateTimeValue,
  ExifDateReader,
  ExifDateTag,
  FileStatProvider,
  FileTimes,
  Logger,
  MetadataRow,
  RawExifDates,
} from '../types.js';

export interface CollectOptions {
  statProvider?: FileStatProvider;
  exifReader?: ExifDateReader;
  logger?: Logger;
}

/**
 * Default FileStatProvider. Created time is the birth time where the
 * filesystem records one, the inode change time otherwise.
 */
export const nodeStatProvider: FileStatProvider = {
  async stat(filePath: string): Promise<FileTimes> {
    const stats = await stat(filePath);
    return {
      modified: stats.mtime,
      created: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime,
    };
  },
};

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

async function readFileTimes(
  filePath: string,
  provider: FileStatProvider,
  logger: Logger
): Promise<{ modified: DateTimeValue | undefined; created: DateTimeValue | undefined }> {
  try {
    const times = await provider.stat(filePath);
    return { modified: fromDate(times.modified), created: fromDate(times.created) };
  } catch (err) {
    logger.warn(`${filePath}: cannot read file times: ${errorMessage(err)}`);
    return { modified: undefined, created: undefined };
  }
}

async function readRawExif(
  filePath: string,
  reader: ExifDateReader,
  logger: Logger
): Promise<RawExifDates> {
  try {
    return await reader.readDates(filePath);
  } catch (err) {
    logger.warn(`${filePath}: cannot read EXIF: ${errorMessage(err)}`);
    return {};
  }
}

function parseExifTag(
  filePath: string,
  raw: RawExifDates,
  tag: ExifDateTag,
  logger: Logger
): DateTimeValue | undefined {
  const text = raw[tag];
  if (text === undefined || text.trim().length === 0) {
    return undefined;
  }
  const value = parseExifDate(normalizeExifDate(text));
  if (value === undefined) {
    logger.info(`${filePath}: unusable EXIF ${tag} "${text}"`);
  }
  return value;
}

/**
 * Gather the six candidates of one file. Never throws: any failure leaves
 * the affected candidates absent and is logged.
 */
export async function collectCandidates(
  filePath: string,
  options: CollectOptions = {}
): Promise<CandidateSet> {
  const logger = options.logger ?? silentLogger;

  const times = await readFileTimes(filePath, options.statProvider ?? nodeStatProvider, logger);
  const raw = await readRawExif(filePath, options.exifReader ?? fileExifReader, logger);

  return filterSane({
    FromFilename: parseFilenameDate(basename(filePath)),
    FileModified: times.modified,
    FileCreated: times.created,
    ExifDateTime: parseExifTag(filePath, raw, 'DateTime', logger),
    ExifDateTimeOriginal: parseExifTag(filePath, raw, 'DateTimeOriginal', logger),
    ExifDateTimeDigitized: parseExifTag(filePath, raw, 'DateTimeDigitized', logger),
  });
}

/**
 * Frozen report row for a file and its candidates
 */
export function buildMetadataRow(filePath: string, candidates: CandidateSet): MetadataRow {
  return Object.freeze({
    filename: basename(filePath),
    extension: extname(filePath).toLowerCase(),
    folder: dirname(filePath),
    candidates: Object.freeze({ ...candidates }),
    setDate: reconcile(candidates),
  });
}

/**
 * Collect and reconcile in one step
 */
export async function collectMetadataRow(
  filePath: string,
  options: CollectOptions = {}
): Promise<MetadataRow> {
  return buildMetadataRow(filePath, await collectCandidates(filePath, options));
}
