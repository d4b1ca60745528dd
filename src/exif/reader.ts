/**
 * Low-level EXIF / TIFF IFD reader.
 *
 * Reads a raw TIFF-formatted block (starting with the II/MM byte-order mark)
 * and pulls out the three DateTime tags. Every container handler hands its
 * embedded block here: JPEG APP1, PNG eXIf, WebP EXIF, a whole TIFF file, or
 * the HEIC Exif item.
 */

import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import type { RawExifDates } from '../types.js';

// ─── Tags ─────────────────────────────────────────────────────────────────────

export const TAGS = {
  DATE_TIME: 306, // IFD0, 0x0132
  EXIF_IFD_POINTER: 34665, // IFD0, 0x8769
  DATE_TIME_ORIGINAL: 36867, // Exif IFD, 0x9003
  DATE_TIME_DIGITIZED: 36868, // Exif IFD, 0x9004
} as const;

export const TYPE_ASCII = 2;
export const TYPE_LONG = 4;

// ─── Type sizes ──────────────────────────────────────────────────────────────

export const TYPE_SIZES: Record<number, number> = {
  1: 1,  // BYTE
  2: 1,  // ASCII
  3: 2,  // SHORT
  4: 4,  // LONG
  5: 8,  // RATIONAL (pair of LONG)
  6: 1,  // SBYTE
  7: 1,  // UNDEFINED
  8: 2,  // SSHORT
  9: 4,  // SLONG
  10: 8, // SRATIONAL
  11: 4, // FLOAT
  12: 8, // DOUBLE
};

// ─── Raw IFD entry ────────────────────────────────────────────────────────────

export interface IfdEntry {
  tag: number;
  type: number;
  count: number;
  /** Byte offset where the value lives (or the inline 32-bit word if it fits in 4 bytes). */
  valueOffset: number;
  /** Original 4 raw bytes from the entry (used for inline values). */
  rawValueBytes: Uint8Array;
  /** Offset of the 12-byte entry itself */
  position: number;
}

export interface Ifd {
  offset: number;
  entries: IfdEntry[];
  nextIfdOffset: number;
}

export interface TiffHeader {
  littleEndian: boolean;
  ifd0Offset: number;
}

export function valueSize(entry: IfdEntry): number {
  return (TYPE_SIZES[entry.type] ?? 1) * entry.count;
}

export function isInlineValue(entry: IfdEntry): boolean {
  return valueSize(entry) <= 4;
}

// ─── Header / IFD parsing ────────────────────────────────────────────────────

/**
 * Byte order and IFD0 offset, or null when the block is not TIFF.
 */
export function readTiffHeader(data: Uint8Array): TiffHeader | null {
  if (data.length < 8) return null;
  const mark = buffer.toAscii(data, 0, 2);
  if (mark !== 'II' && mark !== 'MM') return null;
  const littleEndian = mark === 'II';
  if (dataview.readUint16(data, 2, littleEndian) !== 42) return null;
  return { littleEndian, ifd0Offset: dataview.readUint32(data, 4, littleEndian) };
}

/**
 * Parse all entries of one IFD. Truncated tables yield the entries that fit.
 */
export function parseIfd(data: Uint8Array, offset: number, le: boolean): Ifd {
  const ifd: Ifd = { offset, entries: [], nextIfdOffset: 0 };
  if (offset < 8 || offset + 2 > data.length) return ifd;

  const numEntries = dataview.readUint16(data, offset, le);
  if (numEntries > 512) return ifd;

  for (let i = 0; i < numEntries; i++) {
    const pos = offset + 2 + i * 12;
    if (pos + 12 > data.length) return ifd;
    ifd.entries.push({
      tag: dataview.readUint16(data, pos, le),
      type: dataview.readUint16(data, pos + 2, le),
      count: dataview.readUint32(data, pos + 4, le),
      valueOffset: dataview.readUint32(data, pos + 8, le),
      rawValueBytes: data.slice(pos + 8, pos + 12),
      position: pos,
    });
  }

  const nextPtr = offset + 2 + numEntries * 12;
  if (nextPtr + 4 <= data.length) {
    ifd.nextIfdOffset = dataview.readUint32(data, nextPtr, le);
  }
  return ifd;
}

function readAscii(data: Uint8Array, offset: number, count: number): string {
  let s = '';
  for (let i = 0; i < count && offset + i < data.length; i++) {
    const ch = data[offset + i]!;
    if (ch === 0) break;
    s += String.fromCharCode(ch);
  }
  return s.trim();
}

/**
 * ASCII value of an entry; undefined for other types
 */
export function readAsciiValue(data: Uint8Array, entry: IfdEntry): string | undefined {
  if (entry.type !== TYPE_ASCII) return undefined;
  return isInlineValue(entry)
    ? readAscii(entry.rawValueBytes, 0, entry.count)
    : readAscii(data, entry.valueOffset, entry.count);
}

/**
 * Offset held by a pointer tag (LONG, or the odd writer's SHORT)
 */
export function readPointerValue(entry: IfdEntry, le: boolean): number | undefined {
  if (entry.count !== 1) return undefined;
  if (entry.type === TYPE_LONG) return entry.valueOffset;
  if (entry.type === 3) return dataview.readUint16(entry.rawValueBytes, 0, le);
  return undefined;
}

/**
 * Locate IFD0 and the Exif sub-IFD of a TIFF block.
 */
export function readExifStructure(
  data: Uint8Array
): { header: TiffHeader; ifd0: Ifd; exifIfd: Ifd | null } | null {
  const header = readTiffHeader(data);
  if (!header) return null;
  const le = header.littleEndian;
  const ifd0 = parseIfd(data, header.ifd0Offset, le);

  const pointer = ifd0.entries.find(e => e.tag === TAGS.EXIF_IFD_POINTER);
  const exifOffset = pointer ? readPointerValue(pointer, le) : undefined;
  const exifIfd =
    exifOffset !== undefined && exifOffset >= 8 && exifOffset < data.length
      ? parseIfd(data, exifOffset, le)
      : null;

  return { header, ifd0, exifIfd };
}

// ─── Main entry point ────────────────────────────────────────────────────────

/**
 * Read the raw DateTime, DateTimeOriginal and DateTimeDigitized strings from
 * a TIFF-format EXIF block. Harmless to call on malformed data: whatever was
 * readable before the damage is returned.
 */
export function readExifDates(exifData: Uint8Array): RawExifDates {
  const out: RawExifDates = {};
  try {
    const structure = readExifStructure(exifData);
    if (!structure) return out;

    const ascii = (entries: IfdEntry[], tag: number) => {
      const entry = entries.find(e => e.tag === tag);
      const value = entry ? readAsciiValue(exifData, entry) : undefined;
      return value !== undefined && value.length > 0 ? value : undefined;
    };

    const dt = ascii(structure.ifd0.entries, TAGS.DATE_TIME);
    if (dt) out.DateTime = dt;

    const exifEntries = structure.exifIfd?.entries ?? [];
    const dto = ascii(exifEntries, TAGS.DATE_TIME_ORIGINAL);
    if (dto) out.DateTimeOriginal = dto;
    const dtd = ascii(exifEntries, TAGS.DATE_TIME_DIGITIZED);
    if (dtd) out.DateTimeDigitized = dtd;
  } catch {
    // Ignore malformed EXIF
  }
  return out;
}
