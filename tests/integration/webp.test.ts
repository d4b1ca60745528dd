import { describe, it, expect } from 'vitest';
import { webp } from '../../src/formats/webp.js';
import { applyExifDate } from '../../src/operations/write.js';
import { readExifDatesSync } from '../../src/operations/read.js';
import { buildExifBlock } from '../../src/exif/writer.js';
import { CorruptedFileError } from '../../src/errors.js';
import { buildExifWithDates, buildWebp, riffChunk } from '../helpers/images.js';

const TARGET = '2020:01:02 03:04:05';
const EXIF_ID = [0x45, 0x78, 0x69, 0x66, 0x00, 0x00];

function updated(data: Uint8Array): Uint8Array {
  const result = applyExifDate(data, TARGET);
  if (result.status !== 'updated') throw new Error('expected an update');
  return result.data;
}

describe('WebP', () => {
  describe('readExif', () => {
    it('should read a bare EXIF chunk', () => {
      const block = buildExifWithDates({ original: '2015:03:29 09:10:00' });
      const data = buildWebp({ tiff: block, extended: true });
      expect(Array.from(webp.readExif(data) ?? [])).toEqual(Array.from(block));
    });

    it('should strip an Exif identifier prefix', () => {
      const block = buildExifWithDates({ original: '2015:03:29 09:10:00' });
      const data = buildWebp({ tiff: block, exifPrefix: true, extended: true });
      expect(Array.from(webp.readExif(data) ?? [])).toEqual(Array.from(block));
    });

    it('should return null without an EXIF chunk', () => {
      expect(webp.readExif(buildWebp())).toBeNull();
    });

    it('should reject a truncated chunk', () => {
      const data = buildWebp().slice(0, 22);
      expect(() => webp.parseChunks(data)).toThrow(CorruptedFileError);
    });
  });

  describe('applyExifDate', () => {
    it('should add VP8X with the EXIF flag to a simple file', () => {
      const result = updated(buildWebp());
      const chunks = webp.parseChunks(result);

      expect(chunks.map(c => c.fourcc)).toEqual(['VP8X', 'VP8 ', 'EXIF']);
      // flags EXIF, canvas 2x3 stored minus one
      expect(Array.from(chunks[0]?.data ?? [])).toEqual([0x08, 0, 0, 0, 1, 0, 0, 2, 0, 0]);
      expect(Array.from(chunks[2]?.data ?? [])).toEqual(Array.from(buildExifBlock(TARGET)));
    });

    it('should keep the RIFF size consistent', () => {
      const result = updated(buildWebp());
      const riffSize = result[4]! | (result[5]! << 8) | (result[6]! << 16) | (result[7]! << 24);
      expect(riffSize + 8).toBe(result.length);
    });

    it('should set the flag on an existing VP8X', () => {
      const chunks = webp.parseChunks(updated(buildWebp({ extended: true })));
      expect(chunks.map(c => c.fourcc)).toEqual(['VP8X', 'VP8 ', 'EXIF']);
      expect(chunks[0]?.data[0]).toBe(0x08);
    });

    it('should place a new EXIF chunk before XMP', () => {
      const chunks = webp.parseChunks(updated(buildWebp({ extended: true, xmp: '<x/>' })));
      expect(chunks.map(c => c.fourcc)).toEqual(['VP8X', 'VP8 ', 'EXIF', 'XMP ']);
    });

    it('should keep an existing Exif identifier prefix', () => {
      const block = buildExifWithDates({
        original: '2015:03:29 09:10:00',
        digitized: '2015:03:29 09:10:00',
      });
      const result = updated(buildWebp({ tiff: block, exifPrefix: true, extended: true }));
      const exif = webp.parseChunks(result).find(c => c.fourcc === 'EXIF');

      expect(Array.from(exif?.data.subarray(0, 6) ?? [])).toEqual(EXIF_ID);
      expect(exif?.data.length).toBe(6 + block.length);
      expect(readExifDatesSync(result)).toEqual({
        DateTimeOriginal: TARGET,
        DateTimeDigitized: TARGET,
      });
    });

    it('should refuse to size a VP8X without an image chunk', () => {
      const chunks = riffChunk('XMP ', [0x3c, 0x78, 0x2f, 0x3e]);
      const data = new Uint8Array([
        0x52, 0x49, 0x46, 0x46, 4 + chunks.length, 0, 0, 0,
        0x57, 0x45, 0x42, 0x50,
        ...chunks,
      ]);
      expect(() => webp.writeExif(data, buildExifBlock(TARGET))).toThrow('no image chunk');
    });
  });
});
