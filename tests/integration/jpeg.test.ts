import { describe, it, expect } from 'vitest';
import { jpeg } from '../../src/formats/jpeg.js';
import { applyExifDate } from '../../src/operations/write.js';
import { readExifDatesSync } from '../../src/operations/read.js';
import { buildExifBlock } from '../../src/exif/writer.js';
import { CorruptedFileError, ExifEncodeError } from '../../src/errors.js';
import {
  buildExifWithDates,
  buildJpeg,
  buildTiff,
  JPEG_APP0,
  JPEG_SCAN,
  JPEG_SOI,
  jpegApp1,
  TAG,
} from '../helpers/images.js';

const TARGET = '2020:01:02 03:04:05';

describe('JPEG', () => {
  describe('parseSegments', () => {
    it('should list the segments before the scan', () => {
      const data = buildJpeg(buildExifWithDates({}));
      expect(jpeg.parseSegments(data).map(s => [s.marker, s.offset])).toEqual([
        [0xffe0, 2],
        [0xffe1, 20],
        [0xffda, data.length - JPEG_SCAN.length],
      ]);
    });

    it('should reject data without SOI', () => {
      expect(() => jpeg.parseSegments(new Uint8Array([0x00, 0x01, 0x02]))).toThrow(CorruptedFileError);
    });

    it('should reject a segment running past the end', () => {
      const data = new Uint8Array([...JPEG_SOI, 0xff, 0xe1, 0x00, 0x40, 0x00]);
      expect(() => jpeg.parseSegments(data)).toThrow('segment extends beyond file');
    });
  });

  describe('readExif', () => {
    it('should return the TIFF block of the EXIF segment', () => {
      const block = buildExifWithDates({ original: '2015:03:29 09:10:00' });
      expect(Array.from(jpeg.readExif(buildJpeg(block)) ?? [])).toEqual(Array.from(block));
    });

    it('should return null without an EXIF segment', () => {
      expect(jpeg.readExif(buildJpeg())).toBeNull();
    });

    it('should skip an APP1 segment that is not EXIF', () => {
      const xmp = [0xff, 0xe1, 0x00, 0x07, 0x68, 0x74, 0x74, 0x70, 0x3a];
      const data = new Uint8Array([...JPEG_SOI, ...xmp, ...JPEG_SCAN]);
      expect(jpeg.readExif(data)).toBeNull();
    });
  });

  describe('applyExifDate', () => {
    it('should insert a new EXIF segment after APP0', () => {
      const original = buildJpeg();
      const result = applyExifDate(original, TARGET);
      if (result.status !== 'updated') throw new Error('expected an update');

      const expected = new Uint8Array([
        ...JPEG_SOI,
        ...JPEG_APP0,
        ...jpegApp1(buildExifBlock(TARGET)),
        ...JPEG_SCAN,
      ]);
      expect(Array.from(result.data)).toEqual(Array.from(expected));
    });

    it('should insert right after SOI when there is no APP0', () => {
      const original = new Uint8Array([...JPEG_SOI, ...JPEG_SCAN]);
      const result = applyExifDate(original, TARGET);
      if (result.status !== 'updated') throw new Error('expected an update');
      expect(Array.from(result.data.subarray(0, 4))).toEqual([0xff, 0xd8, 0xff, 0xe1]);
      expect(readExifDatesSync(result.data)).toEqual({
        DateTimeOriginal: TARGET,
        DateTimeDigitized: TARGET,
      });
    });

    it('should update existing dates and keep the rest of the file', () => {
      const block = buildExifWithDates({
        dateTime: '2015:03:29 18:30:26',
        original: '2015:03:29 09:10:00',
        digitized: '2015:03:29 09:10:00',
      });
      const original = buildJpeg(block);
      const result = applyExifDate(original, TARGET);
      if (result.status !== 'updated') throw new Error('expected an update');

      expect(result.data.length).toBe(original.length);
      expect(Array.from(result.data.subarray(-JPEG_SCAN.length))).toEqual(JPEG_SCAN);
      expect(readExifDatesSync(result.data)).toEqual({
        DateTime: '2015:03:29 18:30:26',
        DateTimeOriginal: TARGET,
        DateTimeDigitized: TARGET,
      });
    });

    it('should report a same-day DateTimeOriginal as already current', () => {
      const data = buildJpeg(buildExifWithDates({ original: '2020:01:02 23:59:59' }));
      expect(applyExifDate(data, TARGET)).toEqual({ status: 'already-current' });
    });

    it('should be idempotent', () => {
      const first = applyExifDate(buildJpeg(), TARGET);
      if (first.status !== 'updated') throw new Error('expected an update');
      expect(applyExifDate(first.data, TARGET)).toEqual({ status: 'already-current' });
    });

    it('should refuse an EXIF block that outgrows the segment limit', () => {
      const block = buildTiff({ ifd0: [{ tag: TAG.MAKE, value: 'M'.repeat(65400) }] });
      expect(() => applyExifDate(buildJpeg(block), TARGET)).toThrow(ExifEncodeError);
    });
  });
});
