/**
 * photo-dates - photo capture date reconciliation
 *
 * Collects the filename, filesystem and EXIF dates of photos, reconciles
 * them into a single Set Date, reports them as CSV and writes the chosen
 * date back into EXIF.
 *
 * @packageDocumentation
 */

// Main API
export { extractToReport, collectFiles, DEFAULT_REPORT_NAME } from './operations/extract.js';
export { updateFromReport, readWriteRequests } from './operations/update.js';
export { writeExifDate, applyExifDate, isWritableFormat } from './operations/write.js';
export type { ApplyResult, WriteOutcome } from './operations/write.js';
export {
  collectCandidates,
  collectMetadataRow,
  buildMetadataRow,
  nodeStatProvider,
} from './operations/collect.js';
export type { CollectOptions } from './operations/collect.js';
export { readExifBlock, readExifDatesSync, fileExifReader } from './operations/read.js';

// Dates
export {
  makeDateTime,
  compareDateTimes,
  isSameDateTime,
  formatDateTime,
  formatExifDateTime,
  fromDate,
  MIN_SANE_YEAR,
  MAX_SANE_YEAR,
} from './dates/datetime.js';
export { normalizeExifDate } from './dates/normalize.js';
export { parseExifDate, parseFilenameDate, parseReportDate } from './dates/parse.js';
export { reconcile, chooseMorePrecise, filterSane } from './dates/reconcile.js';

// Report CSV
export { stringifyReport, parseCsv, parseCsvWithHeader, REPORT_HEADERS } from './report/csv.js';

// EXIF block level
export { readExifDates } from './exif/reader.js';
export { setExifDates, buildExifBlock } from './exif/writer.js';

// Format detection
export { detectFormat, formatFromExtension, getPhotoExtensions } from './detect.js';

// Logging
export { createConsoleLogger, silentLogger } from './logger.js';

// Types
export type {
  SupportedFormat,
  DateTimeValue,
  CandidateSource,
  DateCandidate,
  CandidateSet,
  MetadataRow,
  ExifDateTag,
  RawExifDates,
  ExifDateReader,
  FileTimes,
  FileStatProvider,
  Logger,
  FileResult,
  ExtractOptions,
  ExtractResult,
  WriteRequest,
  UpdateOptions,
  WriteStatus,
  UpdateEntry,
  UpdateSummary,
} from './types.js';
export { CANDIDATE_SOURCES } from './types.js';

// Error classes
export {
  PhotoDatesError,
  CorruptedFileError,
  BufferOverflowError,
  UnsupportedFormatError,
  HeicProcessingError,
  ExifEncodeError,
  InputResourceError,
} from './errors.js';
