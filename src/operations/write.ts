/**
 * writeExifDate() — set DateTimeOriginal and DateTimeDigitized of one photo
 * in place.
 */

import { copyFile, readFile, writeFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { detectFormat, formatFromExtension } from '../detect.js';
import { formatExifDateTime } from '../dates/datetime.js';
import { readExifDates } from '../exif/reader.js';
import { buildExifBlock, setExifDates } from '../exif/writer.js';
import { UnsupportedFormatError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type {
  DateTimeValue,
  FileResult,
  SupportedFormat,
  UpdateOptions,
  WriteStatus,
} from '../types.js';

import { jpeg } from '../formats/jpeg.js';
import { png } from '../formats/png.js';
import { webp } from '../formats/webp.js';
import { tiff } from '../formats/tiff.js';

// ─── Format → writer map ──────────────────────────────────────────────────────

type ExifBlockWriter = {
  readExif: (data: Uint8Array) => Uint8Array | null;
  writeExif: (data: Uint8Array, block: Uint8Array) => Uint8Array;
};

const writers: Partial<Record<SupportedFormat, ExifBlockWriter>> = {
  jpeg,
  png,
  webp,
  tiff,
};

export type ApplyResult =
  | { status: 'already-current' }
  | { status: 'updated'; data: Uint8Array };

export type WriteOutcome =
  | { status: WriteStatus; exifDate: string }
  | { status: 'unsupported'; format: SupportedFormat };

/**
 * Whether write-back is possible for a format at all
 */
export function isWritableFormat(format: SupportedFormat): boolean {
  return writers[format] !== undefined;
}

/**
 * Apply `exifDate` (`YYYY:MM:DD HH:MM:SS`) to an image held in memory.
 *
 * An existing DateTimeOriginal on the same calendar day counts as current,
 * whatever its time of day.
 *
 * @throws {UnsupportedFormatError} for HEIC and unrecognised content
 */
export function applyExifDate(data: Uint8Array, exifDate: string): ApplyResult {
  const format = detectFormat(data);
  const writer = writers[format];
  if (!writer) {
    throw new UnsupportedFormatError(format);
  }

  const block = writer.readExif(data);
  if (block) {
    const current = readExifDates(block).DateTimeOriginal;
    if (current !== undefined && current.slice(0, 10) === exifDate.slice(0, 10)) {
      return { status: 'already-current' };
    }
  }

  const updated = block ? setExifDates(block, exifDate) : buildExifBlock(exifDate);
  return { status: 'updated', data: writer.writeExif(data, updated) };
}

/**
 * Write `target` into the EXIF dates of the file at `filePath`.
 *
 * Never throws: unsupported files come back as a successful `unsupported`
 * outcome and every other problem as a failed result.
 */
export async function writeExifDate(
  filePath: string,
  target: DateTimeValue,
  options: UpdateOptions = {}
): Promise<FileResult<WriteOutcome>> {
  const logger = options.logger ?? silentLogger;
  const exifDate = formatExifDateTime(target);

  const byExtension = formatFromExtension(extname(filePath));
  if (!isWritableFormat(byExtension)) {
    logger.warn(`Unsupported format (${byExtension}), skipping: ${filePath}`);
    return { success: true, file: filePath, value: { status: 'unsupported', format: byExtension } };
  }

  try {
    const fileData = await readFile(filePath);
    const data = new Uint8Array(fileData.buffer, fileData.byteOffset, fileData.byteLength);

    const format = detectFormat(data);
    if (!isWritableFormat(format)) {
      logger.warn(`Unsupported format (${format}), skipping: ${filePath}`);
      return { success: true, file: filePath, value: { status: 'unsupported', format } };
    }

    const result = applyExifDate(data, exifDate);
    if (result.status === 'already-current') {
      logger.info(`  = ${filePath} already has ${exifDate.slice(0, 10)}`);
      return { success: true, file: filePath, value: { status: 'already-current', exifDate } };
    }

    if (options.dryRun) {
      logger.info(`  (dry) ${filePath} → ${exifDate}`);
      return { success: true, file: filePath, value: { status: 'would-update', exifDate } };
    }

    if (options.backupSuffix) {
      await copyFile(filePath, `${filePath}${options.backupSuffix}`);
    }
    await writeFile(filePath, result.data);
    logger.info(`  ✓ ${filePath} → ${exifDate}`);
    return { success: true, file: filePath, value: { status: 'updated', exifDate } };
  } catch (err) {
    const error = err instanceof Error ? err.message : String(err);
    logger.error(`  ✗ ${filePath}: ${error}`);
    return { success: false, file: filePath, error };
  }
}
