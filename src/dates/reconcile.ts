/**
 * Set Date reconciliation.
 *
 * The earliest timestamp is the default guess for when a photo was taken:
 * later ones usually record a copy, edit or sync. Two candidates may then
 * refine it, but only within the same calendar day:
 *
 *   1. EXIF DateTimeOriginal
 *   2. file modified time, unless step 1 already settled on the EXIF value
 *
 * A refinement replaces the time of day, never the day itself.
 */

import type { CandidateSet, CandidateSource, DateTimeValue } from '../types.js';
import { CANDIDATE_SOURCES } from '../types.js';
import {
  earliest,
  isSameDateTime,
  isSameDay,
  isSameTimeOfDay,
  saneOrUndefined,
} from './datetime.js';

/**
 * Precision tie-break between the current pick and a challenger.
 *
 * With one side absent the other wins. With both present the challenger
 * wins only when it falls on the same day at a different time.
 */
export function chooseMorePrecise(
  current: DateTimeValue | undefined,
  challenger: DateTimeValue | undefined
): DateTimeValue | undefined {
  if (current === undefined || challenger === undefined) {
    return current ?? challenger;
  }
  if (isSameDay(current, challenger) && !isSameTimeOfDay(current, challenger)) {
    return challenger;
  }
  return current;
}

/**
 * Drop every candidate whose year is outside 1800-2100
 */
export function filterSane(
  candidates: Partial<Record<CandidateSource, DateTimeValue | undefined>>
): CandidateSet {
  return {
    FromFilename: saneOrUndefined(candidates.FromFilename),
    FileModified: saneOrUndefined(candidates.FileModified),
    FileCreated: saneOrUndefined(candidates.FileCreated),
    ExifDateTime: saneOrUndefined(candidates.ExifDateTime),
    ExifDateTimeOriginal: saneOrUndefined(candidates.ExifDateTimeOriginal),
    ExifDateTimeDigitized: saneOrUndefined(candidates.ExifDateTimeDigitized),
  };
}

/**
 * Pick the Set Date from the six candidates
 */
export function reconcile(
  candidates: Partial<Record<CandidateSource, DateTimeValue | undefined>>
): DateTimeValue | undefined {
  const sane = filterSane(candidates);

  let setDate = earliest(CANDIDATE_SOURCES.map(source => sane[source]));

  const exifOriginal = sane.ExifDateTimeOriginal;
  if (exifOriginal !== undefined) {
    setDate = chooseMorePrecise(setDate, exifOriginal);
  }

  const modified = sane.FileModified;
  if (modified !== undefined && !isSameDateTime(setDate, exifOriginal)) {
    setDate = chooseMorePrecise(setDate, modified);
  }

  return setDate;
}
