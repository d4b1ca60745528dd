/**
 * Base error class for photo-dates errors
 */
export class PhotoDatesError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PhotoDatesError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Thrown when an image container is corrupted or malformed
 */
export class CorruptedFileError extends PhotoDatesError {
  public readonly offset: number | undefined;

  constructor(message: string, offset?: number) {
    super(offset !== undefined ? `${message} at offset ${offset}` : message);
    this.name = 'CorruptedFileError';
    this.offset = offset;
  }
}

/**
 * Thrown when attempting to read or write beyond buffer bounds
 */
export class BufferOverflowError extends PhotoDatesError {
  public readonly requested: number;
  public readonly available: number;

  constructor(requested: number, available: number) {
    super(`Buffer overflow: requested ${requested} bytes but only ${available} available`);
    this.name = 'BufferOverflowError';
    this.requested = requested;
    this.available = available;
  }
}

/**
 * Thrown when EXIF write-back is not possible for a format
 */
export class UnsupportedFormatError extends PhotoDatesError {
  public readonly format: string;

  constructor(format: string) {
    super(`Unsupported format: ${format}`);
    this.name = 'UnsupportedFormatError';
    this.format = format;
  }
}

/**
 * Thrown when HEIC box parsing fails
 */
export class HeicProcessingError extends PhotoDatesError {
  constructor(message: string) {
    super(`HEIC processing error: ${message}`);
    this.name = 'HeicProcessingError';
  }
}

/**
 * Thrown when an updated EXIF block cannot be encoded into its container
 */
export class ExifEncodeError extends PhotoDatesError {
  constructor(message: string) {
    super(`EXIF encode error: ${message}`);
    this.name = 'ExifEncodeError';
  }
}

/**
 * Thrown when a run-level input (photo directory, report CSV) is missing or
 * unusable. Fatal: raised before any per-file work starts.
 */
export class InputResourceError extends PhotoDatesError {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(`${message}: ${path}`);
    this.name = 'InputResourceError';
    this.path = path;
  }
}
