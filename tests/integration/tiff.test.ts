import { describe, it, expect } from 'vitest';
import { tiff } from '../../src/formats/tiff.js';
import { applyExifDate } from '../../src/operations/write.js';
import { readExifBlock, readExifDatesSync } from '../../src/operations/read.js';
import { readTiffHeader } from '../../src/exif/reader.js';
import { CorruptedFileError } from '../../src/errors.js';
import { buildExifBlock } from '../../src/exif/writer.js';
import { buildTiffFile } from '../helpers/images.js';

const TARGET = '2020:01:02 03:04:05';

describe('TIFF', () => {
  it('should treat the whole file as the EXIF block', () => {
    const data = buildTiffFile({ dateTime: '2015:03:29 18:30:26', original: '2015:03:29 09:10:00' });
    expect(readExifBlock(data)).toBe(data);
    expect(readExifDatesSync(data)).toEqual({
      DateTime: '2015:03:29 18:30:26',
      DateTimeOriginal: '2015:03:29 09:10:00',
    });
  });

  it('should overwrite existing dates without changing the size', () => {
    const data = buildTiffFile({
      original: '2015:03:29 09:10:00',
      digitized: '2015:03:29 09:10:00',
    });
    const result = applyExifDate(data, TARGET);
    if (result.status !== 'updated') throw new Error('expected an update');

    expect(result.data.length).toBe(data.length);
    expect(readExifDatesSync(result.data)).toEqual({
      DateTimeOriginal: TARGET,
      DateTimeDigitized: TARGET,
    });
  });

  it('should add an Exif IFD to a file that has none', () => {
    const data = buildTiffFile({ dateTime: '2015:03:29 18:30:26' });
    const result = applyExifDate(data, TARGET);
    if (result.status !== 'updated') throw new Error('expected an update');

    expect(readTiffHeader(result.data)?.littleEndian).toBe(true);
    expect(result.data.length).toBeGreaterThan(data.length);
    expect(readExifDatesSync(result.data)).toEqual({
      DateTime: '2015:03:29 18:30:26',
      DateTimeOriginal: TARGET,
      DateTimeDigitized: TARGET,
    });
  });

  it('should report a same-day date as already current', () => {
    const data = buildTiffFile({ original: '2020:01:02 00:00:00' });
    expect(applyExifDate(data, TARGET)).toEqual({ status: 'already-current' });
  });

  it('should reject data without a TIFF signature', () => {
    expect(() => tiff.readExif(new Uint8Array(16))).toThrow(CorruptedFileError);
    expect(() => tiff.writeExif(buildTiffFile({}), new Uint8Array(16))).toThrow(
      'missing TIFF signature'
    );
  });

  it('should replace the file with the updated block', () => {
    const block = buildExifBlock(TARGET);
    expect(tiff.writeExif(buildTiffFile({}), block)).toBe(block);
  });
});
