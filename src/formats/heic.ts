import { HeicProcessingError } from '../errors.js';
import * as buffer from '../binary/buffer.js';
import * as dataview from '../binary/dataview.js';
import { FILE_SIGNATURES } from '../signatures.js';

/**
 * HEIC/HEIF uses ISOBMFF (ISO Base Media File Format). EXIF lives in an item
 * of type `Exif`, declared in meta/iinf and located through meta/iloc. The
 * item payload is a 32-bit offset followed by the TIFF block.
 *
 * Read-only: rewriting the item would mean relocating iloc extents. Only
 * items stored at file offsets are read; `idat` and item-reference
 * construction methods are skipped.
 */

/**
 * ISOBMFF box structure
 */
interface HeicBox {
  type: string;
  offset: number;
  size: number;
  dataOffset: number;
}

interface ItemLocation {
  offset: number;
  length: number;
}

/**
 * Parse box header at offset
 */
function parseBoxHeader(
  data: Uint8Array,
  offset: number
): { type: string; size: number; headerSize: number } | null {
  if (offset + 8 > data.length) {
    return null;
  }

  let size = dataview.readUint32BE(data, offset);
  const type = buffer.toAscii(data, offset + 4, 4);
  let headerSize = 8;

  if (size === 1) {
    // 64-bit largesize (safe up to 2^53)
    if (offset + 16 > data.length) {
      return null;
    }
    size = dataview.readUint32BE(data, offset + 8) * 0x100000000 + dataview.readUint32BE(data, offset + 12);
    headerSize = 16;
  } else if (size === 0) {
    // Box extends to end of file
    size = data.length - offset;
  }

  if (size < headerSize) {
    return null;
  }
  return { type, size, headerSize };
}

/**
 * Parse the boxes between `start` and `end`
 */
function parseBoxes(data: Uint8Array, start: number, end: number): HeicBox[] {
  const boxes: HeicBox[] = [];
  let offset = start;

  while (offset < end) {
    const header = parseBoxHeader(data, offset);
    if (!header || offset + header.size > end) {
      break;
    }
    boxes.push({
      type: header.type,
      offset,
      size: header.size,
      dataOffset: offset + header.headerSize,
    });
    offset += header.size;
  }

  return boxes;
}

/**
 * Read a size value from data at offset, with the given byte size (0, 4, or 8)
 */
function readSizedValue(data: Uint8Array, offset: number, size: number): number {
  if (size === 4) {
    return dataview.readUint32BE(data, offset);
  } else if (size === 8) {
    return dataview.readUint32BE(data, offset) * 0x100000000 + dataview.readUint32BE(data, offset + 4);
  }
  return 0;
}

/**
 * IDs of `Exif` items declared in the iinf box
 */
function findExifItemIds(data: Uint8Array, metaChildren: HeicBox[]): Set<number> {
  const ids = new Set<number>();

  const iinf = metaChildren.find(b => b.type === 'iinf');
  if (!iinf || iinf.dataOffset + 4 > data.length) {
    return ids;
  }

  const version = data[iinf.dataOffset]!;
  // version + flags, then a 16-bit (v0) or 32-bit entry count
  const entriesStart = iinf.dataOffset + 4 + (version === 0 ? 2 : 4);

  for (const infe of parseBoxes(data, entriesStart, iinf.offset + iinf.size)) {
    if (infe.type !== 'infe' || infe.dataOffset + 4 > data.length) {
      continue;
    }
    const infeVersion = data[infe.dataOffset]!;
    const base = infe.dataOffset + 4;
    if (infeVersion < 2) {
      continue;
    }
    // v2: 16-bit item_id; v3: 32-bit item_id. Then protection index and item_type.
    const idSize = infeVersion >= 3 ? 4 : 2;
    if (base + idSize + 6 > data.length) {
      continue;
    }
    const itemId =
      idSize === 4 ? dataview.readUint32BE(data, base) : dataview.readUint16BE(data, base);
    if (buffer.toAscii(data, base + idSize + 2, 4) === 'Exif') {
      ids.add(itemId);
    }
  }

  return ids;
}

/**
 * Byte extents of the given items, from the iloc box
 */
function findItemLocations(
  data: Uint8Array,
  metaChildren: HeicBox[],
  targetIds: Set<number>
): ItemLocation[] {
  const locations: ItemLocation[] = [];
  const iloc = metaChildren.find(b => b.type === 'iloc');
  if (targetIds.size === 0 || !iloc || iloc.dataOffset + 8 > data.length) {
    return locations;
  }

  let offset = iloc.dataOffset;
  const version = data[offset]!;
  offset += 4; // version + flags

  // offset_size, length_size, base_offset_size and (v1/v2) index_size, 4 bits each
  const sizeByte1 = data[offset]!;
  const sizeByte2 = data[offset + 1]!;
  const offsetSize = (sizeByte1 >> 4) & 0x0f;
  const lengthSize = sizeByte1 & 0x0f;
  const baseOffsetSize = (sizeByte2 >> 4) & 0x0f;
  const indexSize = version >= 1 ? sizeByte2 & 0x0f : 0;
  offset += 2;

  const wide = version >= 2;
  const itemCount = wide ? dataview.readUint32BE(data, offset) : dataview.readUint16BE(data, offset);
  offset += wide ? 4 : 2;

  const ilocEnd = iloc.offset + iloc.size;

  for (let i = 0; i < itemCount && offset < ilocEnd; i++) {
    const itemId = wide ? dataview.readUint32BE(data, offset) : dataview.readUint16BE(data, offset);
    offset += wide ? 4 : 2;

    // construction_method (v1/v2): 0 = file offset, 1 = idat, 2 = item reference
    const constructionMethod = version >= 1 ? dataview.readUint16BE(data, offset) & 0x0f : 0;
    if (version >= 1) {
      offset += 2;
    }
    offset += 2; // data_reference_index

    const baseOffset = readSizedValue(data, offset, baseOffsetSize);
    offset += baseOffsetSize;

    const extentCount = dataview.readUint16BE(data, offset);
    offset += 2;

    for (let ext = 0; ext < extentCount; ext++) {
      offset += indexSize;
      const extentOffset = readSizedValue(data, offset, offsetSize);
      offset += offsetSize;
      const extentLength = readSizedValue(data, offset, lengthSize);
      offset += lengthSize;

      const finalOffset = baseOffset + extentOffset;
      if (
        constructionMethod === 0 &&
        targetIds.has(itemId) &&
        extentLength > 0 &&
        finalOffset + extentLength <= data.length
      ) {
        locations.push({ offset: finalOffset, length: extentLength });
      }
    }
  }

  return locations;
}

/**
 * Strip the Exif item header down to the TIFF block. The declared header
 * offset is tried first; a bare TIFF block or an `Exif\0\0` marker are
 * accepted as fallbacks.
 */
export function tiffFromExifItem(item: Uint8Array): Uint8Array | null {
  const isTiffAt = (at: number) =>
    buffer.matchesAt(item, at, FILE_SIGNATURES.TIFF_LE) ||
    buffer.matchesAt(item, at, FILE_SIGNATURES.TIFF_BE);

  if (isTiffAt(0)) {
    return item.slice();
  }
  if (item.length >= 4) {
    const start = 4 + dataview.readUint32BE(item, 0);
    if (isTiffAt(start)) {
      return item.slice(start);
    }
  }
  const marker = buffer.indexOf(item, FILE_SIGNATURES.EXIF_ID);
  if (marker !== -1 && isTiffAt(marker + FILE_SIGNATURES.EXIF_ID.length)) {
    return item.slice(marker + FILE_SIGNATURES.EXIF_ID.length);
  }
  return null;
}

/**
 * TIFF block of the first Exif item, or null
 */
export function readExif(data: Uint8Array): Uint8Array | null {
  try {
    const meta = parseBoxes(data, 0, data.length).find(b => b.type === 'meta');
    if (!meta) {
      return null;
    }
    // meta is a full box: version + flags precede the children
    const children = parseBoxes(data, meta.dataOffset + 4, meta.offset + meta.size);
    const exifIds = findExifItemIds(data, children);

    for (const location of findItemLocations(data, children, exifIds)) {
      const tiff = tiffFromExifItem(data.subarray(location.offset, location.offset + location.length));
      if (tiff) {
        return tiff;
      }
    }
    return null;
  } catch (e) {
    throw new HeicProcessingError(e instanceof Error ? e.message : String(e));
  }
}

export const heic = {
  readExif,
};
