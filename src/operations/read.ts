/**
 * Reading the raw EXIF date tags of an image, from bytes or from disk.
 */

import { readFile } from 'node:fs/promises';
import { detectFormat } from '../detect.js';
import { readExifDates } from '../exif/reader.js';
import type { ExifDateReader, RawExifDates, SupportedFormat } from '../types.js';

import { jpeg } from '../formats/jpeg.js';
import { png } from '../formats/png.js';
import { webp } from '../formats/webp.js';
import { tiff } from '../formats/tiff.js';
import { heic } from '../formats/heic.js';

// ─── Format → reader map ──────────────────────────────────────────────────────

type ExifBlockReader = {
  readExif: (data: Uint8Array) => Uint8Array | null;
};

const readers: Partial<Record<SupportedFormat, ExifBlockReader>> = {
  jpeg,
  png,
  webp,
  tiff,
  heic,
};

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Raw TIFF-format EXIF block embedded in an image, or null when the format
 * is unknown or carries none.
 *
 * @throws {CorruptedFileError} when the container itself cannot be parsed
 */
export function readExifBlock(data: Uint8Array): Uint8Array | null {
  const reader = readers[detectFormat(data)];
  return reader ? reader.readExif(data) : null;
}

/**
 * Raw DateTime / DateTimeOriginal / DateTimeDigitized strings of an image.
 * Malformed containers yield an empty mapping.
 */
export function readExifDatesSync(data: Uint8Array): RawExifDates {
  let block: Uint8Array | null;
  try {
    block = readExifBlock(data);
  } catch {
    return {};
  }
  return block ? readExifDates(block) : {};
}

/**
 * Default ExifDateReader: reads the file and parses it in process. I/O
 * errors and corrupted containers propagate so the caller can log them; a
 * malformed EXIF block inside a sound container yields what could be read.
 */
export const fileExifReader: ExifDateReader = {
  async readDates(filePath: string): Promise<RawExifDates> {
    const data = await readFile(filePath);
    const block = readExifBlock(new Uint8Array(data.buffer, data.byteOffset, data.byteLength));
    return block ? readExifDates(block) : {};
  },
};
