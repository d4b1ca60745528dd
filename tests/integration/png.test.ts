import { describe, it, expect } from 'vitest';
import { png } from '../../src/formats/png.js';
import { applyExifDate } from '../../src/operations/write.js';
import { readExifDatesSync } from '../../src/operations/read.js';
import { buildExifBlock } from '../../src/exif/writer.js';
import { CorruptedFileError } from '../../src/errors.js';
import { buildExifWithDates, buildPng, PNG_SIGNATURE, pngChunk } from '../helpers/images.js';

const TARGET = '2020:01:02 03:04:05';

describe('PNG', () => {
  it('should parse chunks up to IEND', () => {
    const data = new Uint8Array([...buildPng(), ...pngChunk('tEXt', [0x61])]);
    expect(png.parseChunks(data).map(c => c.type)).toEqual(['IHDR', 'IDAT', 'IEND']);
  });

  it('should reject a truncated chunk', () => {
    const data = buildPng().slice(0, 20);
    expect(() => png.parseChunks(data)).toThrow(CorruptedFileError);
  });

  it('should read the eXIf chunk', () => {
    const block = buildExifWithDates({ original: '2015:03:29 09:10:00' });
    expect(Array.from(png.readExif(buildPng(block)) ?? [])).toEqual(Array.from(block));
    expect(png.readExif(buildPng())).toBeNull();
  });

  it('should skip an Exif identifier inside the eXIf chunk', () => {
    const block = buildExifWithDates({ original: '2015:03:29 09:10:00' });
    const prefixed = new Uint8Array([0x45, 0x78, 0x69, 0x66, 0x00, 0x00, ...block]);
    expect(readExifDatesSync(buildPng(prefixed))).toEqual({ DateTimeOriginal: '2015:03:29 09:10:00' });
  });

  it('should insert eXIf after IHDR with a valid CRC', () => {
    const result = applyExifDate(buildPng(), TARGET);
    if (result.status !== 'updated') throw new Error('expected an update');
    expect(Array.from(result.data)).toEqual(Array.from(buildPng(buildExifBlock(TARGET))));
    expect(png.parseChunks(result.data).map(c => c.type)).toEqual(['IHDR', 'eXIf', 'IDAT', 'IEND']);
  });

  it('should replace an existing eXIf chunk', () => {
    const block = buildExifWithDates({
      original: '2015:03:29 09:10:00',
      digitized: '2015:03:29 09:10:00',
    });
    const result = applyExifDate(buildPng(block), TARGET);
    if (result.status !== 'updated') throw new Error('expected an update');
    expect(png.parseChunks(result.data).filter(c => c.type === 'eXIf')).toHaveLength(1);
    expect(readExifDatesSync(result.data)).toEqual({
      DateTimeOriginal: TARGET,
      DateTimeDigitized: TARGET,
    });
  });

  it('should reject a PNG without IHDR when inserting', () => {
    const data = new Uint8Array([...PNG_SIGNATURE, ...pngChunk('IEND', [])]);
    expect(() => png.writeExif(data, buildExifBlock(TARGET))).toThrow('missing IHDR chunk');
  });
});
