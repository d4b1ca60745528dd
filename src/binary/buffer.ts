function toArray(pattern: Uint8Array | number[]): Uint8Array {
  return pattern instanceof Uint8Array ? pattern : new Uint8Array(pattern);
}

/**
 * Check if pattern exists at a specific offset
 */
export function matchesAt(
  data: Uint8Array,
  offset: number,
  pattern: Uint8Array | number[]
): boolean {
  const bytes = toArray(pattern);
  if (offset < 0 || offset + bytes.length > data.length) {
    return false;
  }
  for (let i = 0; i < bytes.length; i++) {
    if (data[offset + i] !== bytes[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Check if data starts with a specific pattern
 */
export function startsWith(data: Uint8Array, pattern: Uint8Array | number[]): boolean {
  return matchesAt(data, 0, pattern);
}

/**
 * Find a pattern, returning its offset or -1
 */
export function indexOf(data: Uint8Array, pattern: Uint8Array | number[], startOffset = 0): number {
  const bytes = toArray(pattern);
  for (let i = startOffset; i <= data.length - bytes.length; i++) {
    if (matchesAt(data, i, bytes)) {
      return i;
    }
  }
  return -1;
}

/**
 * Concatenate multiple Uint8Arrays
 */
export function concat(...arrays: Uint8Array[]): Uint8Array {
  const result = new Uint8Array(arrays.reduce((sum, arr) => sum + arr.length, 0));
  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Convert a string to Uint8Array using ASCII encoding
 */
export function fromAscii(str: string): Uint8Array {
  const bytes = new Uint8Array(str.length);
  for (let i = 0; i < str.length; i++) {
    bytes[i] = str.charCodeAt(i) & 0xff;
  }
  return bytes;
}

/**
 * Convert a byte range to an ASCII string
 */
export function toAscii(data: Uint8Array, offset = 0, length?: number): string {
  const end = Math.min(length !== undefined ? offset + length : data.length, data.length);
  let result = '';
  for (let i = offset; i < end; i++) {
    result += String.fromCharCode(data[i] ?? 0);
  }
  return result;
}
