/**
 * Container formats recognised by magic bytes
 */
export type SupportedFormat = 'jpeg' | 'png' | 'webp' | 'tiff' | 'heic' | 'unknown';

/**
 * Wall-clock date and time with second precision. No timezone is attached:
 * EXIF dates carry none and filesystem times are read in local time.
 */
export interface DateTimeValue {
  readonly year: number;
  /** 1-12 */
  readonly month: number;
  /** 1-31 */
  readonly day: number;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

/**
 * Identifiers of the six date signals gathered per photo, in report order.
 */
export const CANDIDATE_SOURCES = [
  'FromFilename',
  'FileModified',
  'FileCreated',
  'ExifDateTime',
  'ExifDateTimeOriginal',
  'ExifDateTimeDigitized',
] as const;

export type CandidateSource = (typeof CANDIDATE_SOURCES)[number];

/**
 * One named date value. A present value is always sane (year 1800-2100).
 */
export interface DateCandidate {
  source: CandidateSource;
  value: DateTimeValue | undefined;
}

export type CandidateSet = Readonly<Record<CandidateSource, DateTimeValue | undefined>>;

/**
 * One report row per photo file.
 */
export interface MetadataRow {
  readonly filename: string;
  /** Lower-case, with the leading dot (e.g. `.jpg`) */
  readonly extension: string;
  readonly folder: string;
  readonly candidates: CandidateSet;
  /** Reconciled capture date; absent when every candidate is absent */
  readonly setDate: DateTimeValue | undefined;
}

/**
 * EXIF tags holding dates
 */
export type ExifDateTag = 'DateTime' | 'DateTimeOriginal' | 'DateTimeDigitized';

/**
 * Raw EXIF date strings by tag name. Missing tags are simply absent.
 */
export type RawExifDates = Partial<Record<ExifDateTag, string>>;

/**
 * Reads the raw EXIF date tags of a file. Unreadable files and corrupted
 * containers throw; a malformed EXIF block gives an empty or partial mapping.
 */
export interface ExifDateReader {
  readDates(filePath: string): Promise<RawExifDates>;
}

export interface FileTimes {
  modified: Date;
  /** Birth time where the platform records one, change time otherwise */
  created: Date;
}

export interface FileStatProvider {
  stat(filePath: string): Promise<FileTimes>;
}

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Per-file outcome. Failures carry the reason instead of throwing across the
 * per-file boundary.
 */
export type FileResult<T> =
  | { success: true; file: string; value: T }
  | { success: false; file: string; error: string };

/**
 * Options for `extractToReport`
 */
export interface ExtractOptions {
  /** Report CSV path (default: `image_metadata.csv`) */
  output?: string;
  /** Recurse into sub-directories (default: true) */
  recursive?: boolean;
  logger?: Logger;
  statProvider?: FileStatProvider;
  exifReader?: ExifDateReader;
}

/**
 * Result of `extractToReport`
 */
export interface ExtractResult {
  /** Absolute path of the written report */
  outputPath: string;
  rows: MetadataRow[];
  failed: Array<{ file: string; error: string }>;
}

/**
 * One row of the update input
 */
export interface WriteRequest {
  folder: string;
  filename: string;
  /** Free-form date text, normalised before use */
  setDate: string;
}

/**
 * Options for `updateFromReport` and `writeExifDate`
 */
export interface UpdateOptions {
  /** Decide and log, write nothing */
  dryRun?: boolean;
  /** Copy the original to `<file><suffix>` before mutating it */
  backupSuffix?: string;
  logger?: Logger;
}

/**
 * What happened to one file on the write-back path
 */
export type WriteStatus = 'updated' | 'already-current' | 'would-update';

export type UpdateEntry =
  | { row: number; file: string; status: WriteStatus; exifDate: string }
  | { row: number; file: string; status: 'skipped' | 'failed'; reason: string };

/**
 * Aggregate result of `updateFromReport`
 */
export interface UpdateSummary {
  /** ISO 8601 timestamp of when the run started */
  timestamp: string;
  totalRows: number;
  updated: number;
  alreadyCurrent: number;
  /** Rows skipped: empty Set Date, missing file, bad date, unsupported format */
  skipped: number;
  failed: number;
  entries: UpdateEntry[];
}
