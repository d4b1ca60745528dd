import { describe, it, expect } from 'vitest';
import { heic, tiffFromExifItem } from '../../src/formats/heic.js';
import { applyExifDate, isWritableFormat } from '../../src/operations/write.js';
import { readExifDatesSync } from '../../src/operations/read.js';
import { detectFormat } from '../../src/detect.js';
import { UnsupportedFormatError } from '../../src/errors.js';
import { buildExifWithDates, buildHeic } from '../helpers/images.js';

const EXIF_ID = [0x45, 0x78, 0x69, 0x66, 0x00, 0x00];

describe('HEIC', () => {
  const block = buildExifWithDates({
    dateTime: '2015:03:29 18:30:26',
    original: '2015:03:29 09:10:00',
  });

  it('should be detected from the ftyp brand', () => {
    expect(detectFormat(buildHeic(block))).toBe('heic');
  });

  it('should locate the Exif item through iinf and iloc', () => {
    expect(Array.from(heic.readExif(buildHeic(block)) ?? [])).toEqual(Array.from(block));
    expect(readExifDatesSync(buildHeic(block))).toEqual({
      DateTime: '2015:03:29 18:30:26',
      DateTimeOriginal: '2015:03:29 09:10:00',
    });
  });

  it('should return null when no item is of type Exif', () => {
    expect(heic.readExif(buildHeic())).toBeNull();
  });

  it('should read an item stored at a file offset under iloc version 1', () => {
    const data = buildHeic(block, { constructionMethod: 0 });
    expect(Array.from(heic.readExif(data) ?? [])).toEqual(Array.from(block));
  });

  it('should skip an item stored in idat', () => {
    // Same extent numbers, but relative to idat rather than the file
    expect(heic.readExif(buildHeic(block, { constructionMethod: 1 }))).toBeNull();
  });

  it('should return null without a meta box', () => {
    const ftypOnly = buildHeic(block).slice(0, 20);
    expect(heic.readExif(ftypOnly)).toBeNull();
  });

  it('should not be writable', () => {
    expect(isWritableFormat('heic')).toBe(false);
    expect(() => applyExifDate(buildHeic(block), '2020:01:02 03:04:05')).toThrow(
      UnsupportedFormatError
    );
  });

  describe('tiffFromExifItem', () => {
    it('should accept a bare TIFF block', () => {
      expect(Array.from(tiffFromExifItem(block) ?? [])).toEqual(Array.from(block));
    });

    it('should honour the declared header offset', () => {
      const item = new Uint8Array([0, 0, 0, 2, 0xaa, 0xbb, ...block]);
      expect(Array.from(tiffFromExifItem(item) ?? [])).toEqual(Array.from(block));
    });

    it('should fall back to the Exif identifier', () => {
      const item = new Uint8Array([0, 0, 0, 0x40, ...EXIF_ID, ...block]);
      expect(Array.from(tiffFromExifItem(item) ?? [])).toEqual(Array.from(block));
    });

    it('should return null when no TIFF header can be found', () => {
      expect(tiffFromExifItem(new Uint8Array([0, 0, 0, 0, 1, 2, 3, 4]))).toBeNull();
      expect(tiffFromExifItem(new Uint8Array([1, 2]))).toBeNull();
    });
  });
});
