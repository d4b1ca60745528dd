/**
 * EXIF date writer.
 *
 * Sets DateTimeOriginal and DateTimeDigitized inside a TIFF-format EXIF
 * block. Every other tag, including the IFD0 DateTime, is carried over
 * untouched.
 *
 * Three strategies, cheapest first:
 *
 *   1. Overwrite: both tags already exist with room for a full date string,
 *      so the new text goes over the old bytes and nothing moves.
 *   2. Append: a rebuilt Exif IFD (plus new values) is added at the end of
 *      the block and the IFD0 pointer is redirected to it. Existing offsets
 *      stay valid because no byte before the old end is moved.
 *   3. Build: no EXIF at all, so a minimal block is created from scratch.
 */

import * as dataview from '../binary/dataview.js';
import { CorruptedFileError } from '../errors.js';
import {
  TAGS,
  TYPE_ASCII,
  TYPE_LONG,
  readExifStructure,
  type IfdEntry,
} from './reader.js';

/** `YYYY:MM:DD HH:MM:SS` plus the terminating NUL */
export const EXIF_DATE_COUNT = 20;

const DATE_TAGS = [TAGS.DATE_TIME_ORIGINAL, TAGS.DATE_TIME_DIGITIZED] as const;

interface OutEntry {
  tag: number;
  type: number;
  count: number;
  /** 4-byte value field, already in the block's byte order */
  value: Uint8Array;
}

function asciiField(text: string, size: number): Uint8Array {
  const out = new Uint8Array(size);
  for (let i = 0; i < text.length && i < size - 1; i++) {
    out[i] = text.charCodeAt(i) & 0xff;
  }
  return out;
}

function longField(value: number, le: boolean): Uint8Array {
  const out = new Uint8Array(4);
  dataview.writeUint32(out, 0, value, le);
  return out;
}

function ifdSize(entryCount: number): number {
  return 2 + entryCount * 12 + 4;
}

function writeIfd(
  out: Uint8Array,
  offset: number,
  entries: OutEntry[],
  nextIfdOffset: number,
  le: boolean
): void {
  const sorted = [...entries].sort((a, b) => a.tag - b.tag);
  dataview.writeUint16(out, offset, sorted.length, le);
  let pos = offset + 2;
  for (const entry of sorted) {
    dataview.writeUint16(out, pos, entry.tag, le);
    dataview.writeUint16(out, pos + 2, entry.type, le);
    dataview.writeUint32(out, pos + 4, entry.count, le);
    out.set(entry.value, pos + 8);
    pos += 12;
  }
  dataview.writeUint32(out, pos, nextIfdOffset, le);
}

function toOutEntry(entry: IfdEntry): OutEntry {
  return { tag: entry.tag, type: entry.type, count: entry.count, value: entry.rawValueBytes };
}

/**
 * Build a fresh big-endian TIFF block holding only an Exif IFD with the two
 * date tags.
 *
 * Layout:
 *   offset 0  : 'MM', 0x002A, IFD0 offset = 8
 *   offset 8  : IFD0 with the Exif IFD pointer
 *   offset 26 : Exif IFD with DateTimeOriginal and DateTimeDigitized
 *   offset 56 : the two 20-byte date strings
 */
export function buildExifBlock(exifDate: string): Uint8Array {
  const le = false;
  const ifd0Offset = 8;
  const exifOffset = ifd0Offset + ifdSize(1);
  const valuesOffset = exifOffset + ifdSize(DATE_TAGS.length);
  const out = new Uint8Array(valuesOffset + DATE_TAGS.length * EXIF_DATE_COUNT);

  out.set([0x4d, 0x4d, 0x00, 0x2a], 0);
  dataview.writeUint32BE(out, 4, ifd0Offset);

  writeIfd(
    out,
    ifd0Offset,
    [{ tag: TAGS.EXIF_IFD_POINTER, type: TYPE_LONG, count: 1, value: longField(exifOffset, le) }],
    0,
    le
  );

  const dateEntries = DATE_TAGS.map((tag, i) => {
    const at = valuesOffset + i * EXIF_DATE_COUNT;
    out.set(asciiField(exifDate, EXIF_DATE_COUNT), at);
    return { tag, type: TYPE_ASCII, count: EXIF_DATE_COUNT, value: longField(at, le) };
  });
  writeIfd(out, exifOffset, dateEntries, 0, le);

  return out;
}

/**
 * Return a copy of `tiff` with DateTimeOriginal and DateTimeDigitized set to
 * `exifDate` (`YYYY:MM:DD HH:MM:SS`).
 *
 * @throws {CorruptedFileError} when the block has no usable TIFF header or IFD0
 */
export function setExifDates(tiff: Uint8Array, exifDate: string): Uint8Array {
  const structure = readExifStructure(tiff);
  if (!structure) {
    throw new CorruptedFileError('Invalid TIFF header in EXIF block');
  }
  const { header, ifd0, exifIfd } = structure;
  const le = header.littleEndian;
  if (header.ifd0Offset < 8 || header.ifd0Offset + 2 > tiff.length) {
    throw new CorruptedFileError('IFD0 offset out of range', header.ifd0Offset);
  }

  // 1. Overwrite in place
  const existing: IfdEntry[] = [];
  for (const tag of DATE_TAGS) {
    const entry = exifIfd?.entries.find(e => e.tag === tag);
    if (
      entry &&
      entry.type === TYPE_ASCII &&
      entry.count >= EXIF_DATE_COUNT &&
      entry.valueOffset + entry.count <= tiff.length
    ) {
      existing.push(entry);
    }
  }
  if (existing.length === DATE_TAGS.length) {
    const out = tiff.slice();
    for (const entry of existing) {
      out.set(asciiField(exifDate, entry.count), entry.valueOffset);
    }
    return out;
  }

  // 2. Append a rebuilt Exif IFD
  const base = tiff.length + (tiff.length % 2);
  const kept = (exifIfd?.entries ?? [])
    .filter(e => e.tag !== TAGS.DATE_TIME_ORIGINAL && e.tag !== TAGS.DATE_TIME_DIGITIZED)
    .map(toOutEntry);
  const exifOffset = base;
  const valuesOffset = exifOffset + ifdSize(kept.length + DATE_TAGS.length);
  const dateEntries = DATE_TAGS.map((tag, i) => ({
    tag,
    type: TYPE_ASCII,
    count: EXIF_DATE_COUNT,
    value: longField(valuesOffset + i * EXIF_DATE_COUNT, le),
  }));
  const exifEnd = valuesOffset + DATE_TAGS.length * EXIF_DATE_COUNT;

  const pointer = ifd0.entries.find(e => e.tag === TAGS.EXIF_IFD_POINTER);
  const ifd0Entries = pointer
    ? []
    : [
        ...ifd0.entries.map(toOutEntry),
        { tag: TAGS.EXIF_IFD_POINTER, type: TYPE_LONG, count: 1, value: longField(exifOffset, le) },
      ];
  const total = pointer ? exifEnd : exifEnd + ifdSize(ifd0Entries.length);

  const out = new Uint8Array(total);
  out.set(tiff, 0);
  writeIfd(out, exifOffset, [...kept, ...dateEntries], exifIfd?.nextIfdOffset ?? 0, le);
  for (let i = 0; i < DATE_TAGS.length; i++) {
    out.set(asciiField(exifDate, EXIF_DATE_COUNT), valuesOffset + i * EXIF_DATE_COUNT);
  }

  if (pointer) {
    // Redirect the existing pointer; rewrite as LONG in case it was a SHORT
    dataview.writeUint16(out, pointer.position + 2, TYPE_LONG, le);
    dataview.writeUint32(out, pointer.position + 4, 1, le);
    dataview.writeUint32(out, pointer.position + 8, exifOffset, le);
  } else {
    writeIfd(out, exifEnd, ifd0Entries, ifd0.nextIfdOffset, le);
    dataview.writeUint32(out, 4, exifEnd, le);
  }

  return out;
}
