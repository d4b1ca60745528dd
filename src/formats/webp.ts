import { CorruptedFileError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * Chunk types
 */
const CHUNKS = {
  VP8: 'VP8 ', // Lossy
  VP8L: 'VP8L', // Lossless
  VP8X: 'VP8X', // Extended
  EXIF: 'EXIF',
  XMP: 'XMP ',
  ICCP: 'ICCP',
  ANIM: 'ANIM',
  ALPH: 'ALPH',
} as const;

/** VP8X flags byte: bits 5=ICC, 4=Alpha, 3=EXIF, 2=XMP, 1=Anim */
const FLAGS = {
  ICC: 1 << 5,
  ALPHA: 1 << 4,
  EXIF: 1 << 3,
  XMP: 1 << 2,
  ANIM: 1 << 1,
} as const;

/**
 * WebP chunk structure
 */
export interface WebpChunk {
  fourcc: string;
  data: Uint8Array;
}

/**
 * Validate WebP header, returning the file size from the RIFF header
 */
function validateHeader(data: Uint8Array): number {
  if (data.length < 12) {
    throw new CorruptedFileError('File too small to be a valid WebP');
  }
  if (!buffer.startsWith(data, FILE_SIGNATURES.RIFF)) {
    throw new CorruptedFileError('Invalid WebP: missing RIFF header');
  }
  if (!buffer.matchesAt(data, 8, FILE_SIGNATURES.WEBP)) {
    throw new CorruptedFileError('Invalid WebP: missing WEBP signature');
  }
  return dataview.readUint32LE(data, 4) + 8;
}

/**
 * Parse WebP into chunks
 */
export function parseChunks(data: Uint8Array): WebpChunk[] {
  const fileSize = validateHeader(data);
  const chunks: WebpChunk[] = [];
  let offset = 12; // Skip RIFF header + WEBP

  while (offset + 8 <= data.length && offset < fileSize) {
    const fourcc = buffer.toAscii(data, offset, 4);
    const chunkSize = dataview.readUint32LE(data, offset + 4);
    offset += 8;

    if (offset + chunkSize > data.length) {
      throw new CorruptedFileError(`Invalid WebP: truncated ${fourcc} chunk`, offset);
    }
    chunks.push({ fourcc, data: data.subarray(offset, offset + chunkSize) });

    // Chunks are padded to even bytes
    offset += chunkSize + (chunkSize % 2);
  }

  return chunks;
}

/**
 * Get dimensions from VP8 chunk (lossy)
 */
function getSizeFromVp8(chunk: WebpChunk): [number, number] {
  // VP8 key frame start code: 0x9D 0x01 0x2A
  const signature = buffer.indexOf(chunk.data, [0x9d, 0x01, 0x2a]);
  if (signature === -1 || signature + 7 > chunk.data.length) {
    throw new CorruptedFileError('Invalid VP8 chunk');
  }
  const width = dataview.readUint16LE(chunk.data, signature + 3) & 0x3fff;
  const height = dataview.readUint16LE(chunk.data, signature + 5) & 0x3fff;
  return [width, height];
}

/**
 * Get dimensions from VP8L chunk (lossless)
 */
function getSizeFromVp8L(chunk: WebpChunk): [number, number] {
  if (chunk.data.length < 5) {
    throw new CorruptedFileError('Invalid VP8L chunk');
  }
  // Byte 0 is the 0x2F signature; 14-bit width-1 and height-1 follow
  const b1 = chunk.data[1]!;
  const b2 = chunk.data[2]!;
  const b3 = chunk.data[3]!;
  const b4 = chunk.data[4]!;
  const widthMinusOne = ((b2 & 0x3f) << 8) | b1;
  const heightMinusOne = ((b4 & 0x0f) << 10) | (b3 << 2) | ((b2 & 0xc0) >> 6);
  return [widthMinusOne + 1, heightMinusOne + 1];
}

/**
 * Create a VP8X chunk for a simple-format file, flags derived from the chunks
 */
function createVp8xChunk(chunks: WebpChunk[]): WebpChunk {
  let width = 0;
  let height = 0;
  let flagByte = 0;

  for (const chunk of chunks) {
    switch (chunk.fourcc) {
      case CHUNKS.VP8:
        [width, height] = getSizeFromVp8(chunk);
        break;
      case CHUNKS.VP8L:
        [width, height] = getSizeFromVp8L(chunk);
        if (chunk.data.length >= 5 && ((chunk.data[4]! >> 4) & 1) === 1) {
          flagByte |= FLAGS.ALPHA;
        }
        break;
      case CHUNKS.ICCP:
        flagByte |= FLAGS.ICC;
        break;
      case CHUNKS.ALPH:
        flagByte |= FLAGS.ALPHA;
        break;
      case CHUNKS.EXIF:
        flagByte |= FLAGS.EXIF;
        break;
      case CHUNKS.XMP:
        flagByte |= FLAGS.XMP;
        break;
      case CHUNKS.ANIM:
        flagByte |= FLAGS.ANIM;
        break;
    }
  }
  if (width === 0 || height === 0) {
    throw new CorruptedFileError('Invalid WebP: no image chunk to size VP8X from');
  }

  // Canvas width-1 and height-1 as 24-bit LE
  const data = new Uint8Array(10);
  data[0] = flagByte;
  for (let i = 0; i < 3; i++) {
    data[4 + i] = ((width - 1) >> (8 * i)) & 0xff;
    data[7 + i] = ((height - 1) >> (8 * i)) & 0xff;
  }
  return { fourcc: CHUNKS.VP8X, data };
}

/**
 * Build WebP from chunks
 */
export function buildWebp(chunks: WebpChunk[]): Uint8Array {
  let contentSize = 4; // "WEBP"
  for (const chunk of chunks) {
    contentSize += 8 + chunk.data.length + (chunk.data.length % 2);
  }

  const result = new Uint8Array(8 + contentSize);
  result.set(FILE_SIGNATURES.RIFF, 0);
  dataview.writeUint32LE(result, 4, contentSize);
  result.set(FILE_SIGNATURES.WEBP, 8);

  let offset = 12;
  for (const chunk of chunks) {
    result.set(buffer.fromAscii(chunk.fourcc), offset);
    dataview.writeUint32LE(result, offset + 4, chunk.data.length);
    result.set(chunk.data, offset + 8);
    // Padding byte is already zero
    offset += 8 + chunk.data.length + (chunk.data.length % 2);
  }

  return result;
}

/**
 * TIFF block of the EXIF chunk, or null. The chunk may or may not start
 * with `Exif\0\0`.
 */
export function readExif(data: Uint8Array): Uint8Array | null {
  const chunk = parseChunks(data).find(c => c.fourcc === CHUNKS.EXIF);
  if (!chunk) {
    return null;
  }
  return buffer.startsWith(chunk.data, FILE_SIGNATURES.EXIF_ID)
    ? chunk.data.slice(FILE_SIGNATURES.EXIF_ID.length)
    : chunk.data.slice();
}

/**
 * Replace the EXIF chunk, keeping an existing `Exif\0\0` prefix, or add one
 * after the image data (before XMP). The VP8X EXIF flag is set, and a VP8X
 * chunk is created for simple-format files.
 */
export function writeExif(data: Uint8Array, tiff: Uint8Array): Uint8Array {
  const chunks = parseChunks(data);

  const index = chunks.findIndex(c => c.fourcc === CHUNKS.EXIF);
  if (index !== -1) {
    const prefixed = buffer.startsWith(chunks[index]!.data, FILE_SIGNATURES.EXIF_ID);
    chunks[index] = {
      fourcc: CHUNKS.EXIF,
      data: prefixed ? buffer.concat(FILE_SIGNATURES.EXIF_ID, tiff) : tiff,
    };
  } else {
    const xmp = chunks.findIndex(c => c.fourcc === CHUNKS.XMP);
    chunks.splice(xmp === -1 ? chunks.length : xmp, 0, { fourcc: CHUNKS.EXIF, data: tiff });
  }

  const vp8x = chunks.findIndex(c => c.fourcc === CHUNKS.VP8X);
  if (vp8x === -1) {
    chunks.unshift(createVp8xChunk(chunks));
  } else {
    const flagged = chunks[vp8x]!.data.slice();
    if (flagged.length < 10) {
      throw new CorruptedFileError('Invalid VP8X chunk');
    }
    flagged[0] = flagged[0]! | FLAGS.EXIF;
    chunks[vp8x] = { fourcc: CHUNKS.VP8X, data: flagged };
  }

  return buildWebp(chunks);
}

export const webp = {
  readExif,
  writeExif,
  parseChunks,
};
