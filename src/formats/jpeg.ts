import { CorruptedFileError, ExifEncodeError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * JPEG marker constants
 */
const MARKERS = {
  SOI: 0xffd8, // Start of Image
  EOI: 0xffd9, // End of Image
  SOS: 0xffda, // Start of Scan (image data follows)
  APP0: 0xffe0, // JFIF
  APP1: 0xffe1, // EXIF, XMP
} as const;

/** APP1 payload limit: the 16-bit length field counts itself */
const MAX_SEGMENT_PAYLOAD = 0xffff - 2;

/**
 * JPEG segment structure. `data` spans the marker, the length field and the
 * payload.
 */
export interface JpegSegment {
  marker: number;
  data: Uint8Array;
  offset: number;
}

/**
 * Parse the marker segments in front of the image data. Stops at SOS or EOI;
 * the entropy-coded scan that follows is never touched.
 */
export function parseSegments(data: Uint8Array): JpegSegment[] {
  if (!buffer.startsWith(data, FILE_SIGNATURES.JPEG)) {
    throw new CorruptedFileError('Invalid JPEG: missing SOI marker');
  }

  const segments: JpegSegment[] = [];
  let offset = 2; // Skip SOI

  while (offset < data.length - 1) {
    if (data[offset] !== 0xff) {
      throw new CorruptedFileError('Invalid JPEG: expected marker', offset);
    }

    // Skip padding 0xFF bytes
    while (offset < data.length && data[offset] === 0xff) {
      offset++;
    }
    if (offset >= data.length) {
      break;
    }

    const markerType = data[offset]!;
    const start = offset - 1;
    offset++;

    if (markerType === 0xd9 || markerType === 0xda) {
      segments.push({ marker: 0xff00 | markerType, data: new Uint8Array(0), offset: start });
      break;
    }

    // Standalone markers (RST0-7, TEM) carry no length
    if ((markerType >= 0xd0 && markerType <= 0xd7) || markerType === 0x01) {
      continue;
    }

    if (offset + 2 > data.length) {
      throw new CorruptedFileError('Invalid JPEG: truncated segment', offset);
    }
    const length = dataview.readUint16BE(data, offset);
    if (length < 2) {
      throw new CorruptedFileError('Invalid JPEG: segment length too small', offset);
    }
    const segmentEnd = offset + length;
    if (segmentEnd > data.length) {
      throw new CorruptedFileError('Invalid JPEG: segment extends beyond file', offset);
    }

    segments.push({
      marker: 0xff00 | markerType,
      data: data.subarray(start, segmentEnd),
      offset: start,
    });
    offset = segmentEnd;
  }

  return segments;
}

/**
 * Check if a segment is EXIF APP1
 */
function isExifSegment(segment: JpegSegment): boolean {
  return (
    segment.marker === MARKERS.APP1 && buffer.matchesAt(segment.data, 4, FILE_SIGNATURES.EXIF_ID)
  );
}

/**
 * TIFF block of the first EXIF APP1 segment, or null
 */
export function readExif(data: Uint8Array): Uint8Array | null {
  const segment = parseSegments(data).find(isExifSegment);
  return segment ? segment.data.slice(4 + FILE_SIGNATURES.EXIF_ID.length) : null;
}

/**
 * Wrap a TIFF block as a complete APP1 segment (marker, length, `Exif\0\0`).
 *
 * @throws {ExifEncodeError} when the result exceeds the 64 KiB segment limit
 */
export function buildApp1(tiff: Uint8Array): Uint8Array {
  const payloadLength = FILE_SIGNATURES.EXIF_ID.length + tiff.length;
  if (payloadLength > MAX_SEGMENT_PAYLOAD) {
    throw new ExifEncodeError(
      `APP1 segment would be ${payloadLength + 2} bytes, limit is ${MAX_SEGMENT_PAYLOAD + 2}`
    );
  }
  const header = new Uint8Array(4);
  dataview.writeUint16BE(header, 0, MARKERS.APP1);
  dataview.writeUint16BE(header, 2, payloadLength + 2);
  return buffer.concat(header, FILE_SIGNATURES.EXIF_ID, tiff);
}

/**
 * Replace the EXIF APP1 segment with one holding `tiff`, or insert a new one
 * after SOI (and after a leading JFIF APP0). Every other byte is preserved.
 */
export function writeExif(data: Uint8Array, tiff: Uint8Array): Uint8Array {
  const segments = parseSegments(data);
  const app1 = buildApp1(tiff);

  const existing = segments.find(isExifSegment);
  if (existing) {
    return buffer.concat(
      data.subarray(0, existing.offset),
      app1,
      data.subarray(existing.offset + existing.data.length)
    );
  }

  const first = segments[0];
  const insertAt = first && first.marker === MARKERS.APP0 ? first.offset + first.data.length : 2;
  return buffer.concat(data.subarray(0, insertAt), app1, data.subarray(insertAt));
}

export const jpeg = {
  readExif,
  writeExif,
  parseSegments,
};
