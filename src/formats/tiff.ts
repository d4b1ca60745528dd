import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * Validate TIFF header
 */
function validateHeader(data: Uint8Array): void {
  if (data.length < 8) {
    throw new CorruptedFileError('File too small to be a valid TIFF');
  }
  if (
    !buffer.startsWith(data, FILE_SIGNATURES.TIFF_LE) &&
    !buffer.startsWith(data, FILE_SIGNATURES.TIFF_BE)
  ) {
    throw new CorruptedFileError('Invalid TIFF: missing TIFF signature');
  }
}

/**
 * A TIFF file is its own EXIF block: IFD0 holds DateTime and the Exif IFD
 * pointer directly.
 */
export function readExif(data: Uint8Array): Uint8Array {
  validateHeader(data);
  return data;
}

/**
 * The updated block is the whole file
 */
export function writeExif(data: Uint8Array, tiff: Uint8Array): Uint8Array {
  validateHeader(data);
  validateHeader(tiff);
  return tiff;
}

export const tiff = {
  readExif,
  writeExif,
};
