import { describe, it, expect } from 'vitest';
import { chooseMorePrecise, filterSane, reconcile } from '../../src/dates/reconcile.js';
import { makeDateTime } from '../../src/dates/datetime.js';
import type { DateTimeValue } from '../../src/types.js';

const dt = (y: number, mo: number, d: number, h = 0, mi = 0, s = 0): DateTimeValue => {
  const value = makeDateTime(y, mo, d, h, mi, s);
  if (!value) throw new Error(`invalid test date ${y}-${mo}-${d}`);
  return value;
};

describe('chooseMorePrecise', () => {
  it('should return the present side when the other is absent', () => {
    expect(chooseMorePrecise(undefined, dt(2015, 3, 29))).toEqual(dt(2015, 3, 29));
    expect(chooseMorePrecise(dt(2015, 3, 29), undefined)).toEqual(dt(2015, 3, 29));
    expect(chooseMorePrecise(undefined, undefined)).toBeUndefined();
  });

  it('should prefer the challenger on the same day at a different time', () => {
    expect(chooseMorePrecise(dt(2015, 3, 29), dt(2015, 3, 29, 9, 10))).toEqual(
      dt(2015, 3, 29, 9, 10)
    );
  });

  it('should keep the current value across days', () => {
    expect(chooseMorePrecise(dt(2015, 1, 1), dt(2015, 3, 29, 9, 10))).toEqual(dt(2015, 1, 1));
  });

  it('should keep the current value when both are identical', () => {
    const current = dt(2015, 3, 29, 9, 10);
    expect(chooseMorePrecise(current, dt(2015, 3, 29, 9, 10))).toBe(current);
  });
});

describe('filterSane', () => {
  it('should drop insane candidates and fill missing slots', () => {
    const result = filterSane({ FileModified: dt(1601, 1, 1), FromFilename: dt(2015, 3, 29) });
    expect(result).toEqual({
      FromFilename: dt(2015, 3, 29),
      FileModified: undefined,
      FileCreated: undefined,
      ExifDateTime: undefined,
      ExifDateTimeOriginal: undefined,
      ExifDateTimeDigitized: undefined,
    });
  });
});

describe('reconcile', () => {
  it('should return undefined when every candidate is absent', () => {
    expect(reconcile({})).toBeUndefined();
  });

  it('should pick the earliest candidate when no tie-break applies', () => {
    expect(
      reconcile({
        FileModified: dt(2016, 5, 1, 12),
        FileCreated: dt(2016, 4, 1, 8),
        ExifDateTime: dt(2016, 6, 1),
      })
    ).toEqual(dt(2016, 4, 1, 8));
  });

  it('should never choose an insane candidate', () => {
    expect(
      reconcile({
        FileCreated: dt(1601, 1, 1),
        ExifDateTime: dt(2015, 3, 29, 18, 30),
      })
    ).toEqual(dt(2015, 3, 29, 18, 30));
    expect(reconcile({ FileModified: dt(2101, 1, 1) })).toBeUndefined();
  });

  it('should refine a midnight date with the EXIF original time on the same day', () => {
    expect(
      reconcile({
        FromFilename: dt(2015, 3, 29),
        ExifDateTimeOriginal: dt(2015, 3, 29, 9, 10),
      })
    ).toEqual(dt(2015, 3, 29, 9, 10));
  });

  it('should not let the EXIF original cross days', () => {
    expect(
      reconcile({
        FileCreated: dt(2015, 1, 1),
        ExifDateTimeOriginal: dt(2015, 3, 29, 9, 10),
      })
    ).toEqual(dt(2015, 1, 1));
  });

  it('should keep the EXIF original over a same-day modified time', () => {
    expect(
      reconcile({
        FromFilename: dt(2015, 3, 29),
        FileModified: dt(2015, 3, 29, 19, 46),
        FileCreated: dt(2016, 1, 2),
        ExifDateTimeOriginal: dt(2015, 3, 29, 9, 10),
      })
    ).toEqual(dt(2015, 3, 29, 9, 10));
  });

  it('should refine with the modified time when there is no EXIF original', () => {
    expect(
      reconcile({
        FromFilename: dt(2015, 3, 29),
        FileModified: dt(2015, 3, 29, 19, 46),
      })
    ).toEqual(dt(2015, 3, 29, 19, 46));
  });

  it('should refine with the modified time when the EXIF original lost the tie-break', () => {
    // Base is the filename day; the EXIF original is on another day and loses
    expect(
      reconcile({
        FromFilename: dt(2015, 3, 29),
        FileModified: dt(2015, 3, 29, 19, 46),
        ExifDateTimeOriginal: dt(2015, 4, 2, 9, 10),
      })
    ).toEqual(dt(2015, 3, 29, 19, 46));
  });

  it('should ignore an insane modified time', () => {
    expect(
      reconcile({
        FromFilename: dt(2015, 3, 29),
        FileModified: dt(1601, 3, 29, 19, 46),
      })
    ).toEqual(dt(2015, 3, 29));
  });
});
