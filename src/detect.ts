import type { SupportedFormat } from './types.js';
import * as buffer from './binary/buffer.js';
import { FILE_SIGNATURES } from './signatures.js';

/**
 * HEIC/HEIF brand identifiers
 */
const HEIC_BRANDS = [
  'heic',
  'heix',
  'hevc',
  'hevx',
  'heim',
  'heis',
  'hevm',
  'hevs',
  'mif1',
  'msf1',
];

type KnownFormat = Exclude<SupportedFormat, 'unknown'>;

const KNOWN_FORMATS: readonly KnownFormat[] = ['jpeg', 'png', 'webp', 'tiff', 'heic'];

/**
 * File extensions by format, lower-case with the leading dot
 */
const EXTENSIONS: Record<KnownFormat, string[]> = {
  jpeg: ['.jpg', '.jpeg'],
  png: ['.png'],
  webp: ['.webp'],
  tiff: ['.tif', '.tiff'],
  heic: ['.heic', '.heif'],
};

/**
 * Detect the container format from binary data
 */
export function detectFormat(data: Uint8Array): SupportedFormat {
  if (data.length < 3) {
    return 'unknown';
  }

  if (buffer.startsWith(data, FILE_SIGNATURES.JPEG)) {
    return 'jpeg';
  }

  if (buffer.startsWith(data, FILE_SIGNATURES.PNG)) {
    return 'png';
  }

  if (
    data.length >= 12 &&
    buffer.startsWith(data, FILE_SIGNATURES.RIFF) &&
    buffer.matchesAt(data, 8, FILE_SIGNATURES.WEBP)
  ) {
    return 'webp';
  }

  if (
    buffer.startsWith(data, FILE_SIGNATURES.TIFF_LE) ||
    buffer.startsWith(data, FILE_SIGNATURES.TIFF_BE)
  ) {
    return 'tiff';
  }

  // ISOBMFF: major brand at offset 8, compatible brands follow
  if (data.length >= 12 && buffer.matchesAt(data, 4, FILE_SIGNATURES.FTYP)) {
    const major = buffer.toAscii(data, 8, 4).toLowerCase();
    if (HEIC_BRANDS.includes(major)) {
      return 'heic';
    }
    for (let i = 16; i + 4 <= Math.min(data.length, 128); i += 4) {
      if (HEIC_BRANDS.includes(buffer.toAscii(data, i, 4).toLowerCase())) {
        return 'heic';
      }
    }
  }

  return 'unknown';
}

/**
 * Map a file extension (with or without the dot, any case) to a format
 */
export function formatFromExtension(extension: string): SupportedFormat {
  const ext = (extension.startsWith('.') ? extension : `.${extension}`).toLowerCase();
  for (const format of KNOWN_FORMATS) {
    if (EXTENSIONS[format].includes(ext)) {
      return format;
    }
  }
  return 'unknown';
}

/**
 * All extensions the extractor picks up
 */
export function getPhotoExtensions(): string[] {
  return KNOWN_FORMATS.flatMap(format => EXTENSIONS[format]);
}
