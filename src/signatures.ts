/**
 * File format signatures (magic bytes) for detection and validation
 */
export const FILE_SIGNATURES = {
  JPEG: new Uint8Array([0xff, 0xd8, 0xff]),
  PNG: new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),

  // WebP (RIFF container)
  RIFF: new Uint8Array([0x52, 0x49, 0x46, 0x46]),
  WEBP: new Uint8Array([0x57, 0x45, 0x42, 0x50]),

  TIFF_LE: new Uint8Array([0x49, 0x49, 0x2a, 0x00]), // II*\0
  TIFF_BE: new Uint8Array([0x4d, 0x4d, 0x00, 0x2a]), // MM\0*

  // HEIC/HEIF (ISOBMFF): ftyp box type at offset 4
  FTYP: new Uint8Array([0x66, 0x74, 0x79, 0x70]),

  // "Exif\0\0" identifier preceding the TIFF header in JPEG APP1 and some WebP chunks
  EXIF_ID: new Uint8Array([0x45, 0x78, 0x69, 0x66, 0x00, 0x00]),
} as const;
