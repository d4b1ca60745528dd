import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { crc32 } from '../binary/crc32.js';
import { FILE_SIGNATURES } from '../signatures.js';

const EXIF_CHUNK = 'eXIf';

/**
 * PNG chunk structure
 */
export interface PngChunk {
  type: string;
  data: Uint8Array;
}

/**
 * Validate PNG header
 */
function validateHeader(data: Uint8Array): void {
  if (data.length < 8) {
    throw new CorruptedFileError('File too small to be a valid PNG');
  }
  if (!buffer.startsWith(data, FILE_SIGNATURES.PNG)) {
    throw new CorruptedFileError('Invalid PNG: missing PNG signature');
  }
}

/**
 * Parse PNG into chunks, up to and including IEND
 */
export function parseChunks(data: Uint8Array): PngChunk[] {
  validateHeader(data);

  const chunks: PngChunk[] = [];
  let offset = 8; // Skip header

  while (offset < data.length) {
    if (offset + 8 > data.length) {
      throw new CorruptedFileError('Invalid PNG: truncated chunk header', offset);
    }

    const length = dataview.readUint32BE(data, offset);
    const type = buffer.toAscii(data, offset + 4, 4);
    offset += 8;

    if (offset + length + 4 > data.length) {
      throw new CorruptedFileError(`Invalid PNG: truncated ${type} chunk`, offset);
    }

    chunks.push({ type, data: data.subarray(offset, offset + length) });
    offset += length + 4; // data + CRC

    if (type === 'IEND') {
      break;
    }
  }

  return chunks;
}

/**
 * Serialize a chunk to bytes, CRC recomputed over type + data
 */
export function serializeChunk(chunk: PngChunk): Uint8Array {
  const typeBytes = buffer.fromAscii(chunk.type);
  const length = chunk.data.length;

  const result = new Uint8Array(12 + length);
  dataview.writeUint32BE(result, 0, length);
  result.set(typeBytes, 4);
  result.set(chunk.data, 8);
  dataview.writeUint32BE(result, 8 + length, crc32(typeBytes, chunk.data));

  return result;
}

/**
 * Build PNG from chunks
 */
export function buildPng(chunks: PngChunk[]): Uint8Array {
  return buffer.concat(FILE_SIGNATURES.PNG, ...chunks.map(serializeChunk));
}

/**
 * TIFF block of the eXIf chunk, or null. A stray `Exif\0\0` prefix, written
 * by some tools, is skipped.
 */
export function readExif(data: Uint8Array): Uint8Array | null {
  const chunk = parseChunks(data).find(c => c.type === EXIF_CHUNK);
  if (!chunk) {
    return null;
  }
  return buffer.startsWith(chunk.data, FILE_SIGNATURES.EXIF_ID)
    ? chunk.data.slice(FILE_SIGNATURES.EXIF_ID.length)
    : chunk.data.slice();
}

/**
 * Replace the eXIf chunk, or insert one right after IHDR
 */
export function writeExif(data: Uint8Array, tiff: Uint8Array): Uint8Array {
  const chunks = parseChunks(data);
  const exifChunk: PngChunk = { type: EXIF_CHUNK, data: tiff };

  const index = chunks.findIndex(c => c.type === EXIF_CHUNK);
  if (index !== -1) {
    chunks[index] = exifChunk;
  } else {
    const ihdr = chunks.findIndex(c => c.type === 'IHDR');
    if (ihdr === -1) {
      throw new CorruptedFileError('Invalid PNG: missing IHDR chunk');
    }
    chunks.splice(ihdr + 1, 0, exifChunk);
  }

  return buildPng(chunks);
}

export const png = {
  readExif,
  writeExif,
  parseChunks,
};
