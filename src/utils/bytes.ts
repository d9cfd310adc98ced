/**
 * Endian-aware integer extraction shared by every protocol decoder.
 *
 * All readers are bounds-tolerant: when the requested range does not fit in
 * the buffer they return 0 instead of throwing, so a truncated frame degrades
 * to zeroed fields rather than an exception.
 */

export const KM_TO_MILES = 0.62137119223733;

function fits(data: Uint8Array, offset: number, size: number): boolean {
  return offset >= 0 && offset + size <= data.length;
}

function view(data: Uint8Array): DataView {
  return new DataView(data.buffer, data.byteOffset, data.byteLength);
}

/** Unsigned byte at `offset`, 0 when out of range. */
export function byteAt(data: Uint8Array, offset: number): number {
  return fits(data, offset, 1) ? data[offset] : 0;
}

/** Signed byte at `offset`. */
export function signedByteAt(data: Uint8Array, offset: number): number {
  return fits(data, offset, 1) ? view(data).getInt8(offset) : 0;
}

/** Big-endian signed 16-bit. */
export function getInt2(data: Uint8Array, offset: number): number {
  return fits(data, offset, 2) ? view(data).getInt16(offset, false) : 0;
}

/** Little-endian signed 16-bit. */
export function getInt2R(data: Uint8Array, offset: number): number {
  return fits(data, offset, 2) ? view(data).getInt16(offset, true) : 0;
}

/** Big-endian signed 32-bit. */
export function getInt4(data: Uint8Array, offset: number): number {
  return fits(data, offset, 4) ? view(data).getInt32(offset, false) : 0;
}

/**
 * Word-swapped 32-bit: each 16-bit half is little-endian, high half first.
 * Bytes `b0 b1 b2 b3` decode as `b1 b0 b3 b2`.
 */
export function getInt4R(data: Uint8Array, offset: number): number {
  if (!fits(data, offset, 4)) return 0;
  return (
    (data[offset + 1] << 24) |
    (data[offset] << 16) |
    (data[offset + 3] << 8) |
    data[offset + 2]
  );
}

/**
 * Big-endian halves, low half first. Bytes `b0 b1 b2 b3` decode as `b2 b3 b0 b1`.
 */
export function intFromBytesRevBE(data: Uint8Array, offset: number): number {
  if (!fits(data, offset, 4)) return 0;
  return (
    ((data[offset + 2] << 24) |
      (data[offset + 3] << 16) |
      (data[offset] << 8) |
      data[offset + 1]) >>>
    0
  );
}

/**
 * Little-endian halves, high half first. Bytes `b0 b1 b2 b3` decode as `b1 b0 b3 b2`.
 */
export function intFromBytesRevLE(data: Uint8Array, offset: number): number {
  if (!fits(data, offset, 4)) return 0;
  return (
    ((data[offset + 1] << 24) |
      (data[offset] << 16) |
      (data[offset + 3] << 8) |
      data[offset + 2]) >>>
    0
  );
}

/** Little-endian unsigned 32-bit. */
export function intFromBytesLE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 4) ? view(data).getUint32(offset, true) : 0;
}

/** Big-endian unsigned 32-bit. */
export function intFromBytesBE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 4) ? view(data).getUint32(offset, false) : 0;
}

/** Little-endian signed 32-bit. */
export function signedIntFromBytesLE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 4) ? view(data).getInt32(offset, true) : 0;
}

/** Little-endian signed 64-bit, as a JS number. */
export function longFromBytesLE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 8) ? Number(view(data).getBigInt64(offset, true)) : 0;
}

/** Little-endian unsigned 16-bit. */
export function shortFromBytesLE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 2) ? view(data).getUint16(offset, true) : 0;
}

/** Big-endian unsigned 16-bit. */
export function shortFromBytesBE(data: Uint8Array, offset: number): number {
  return fits(data, offset, 2) ? view(data).getUint16(offset, false) : 0;
}

/** Little-endian signed 16-bit. */
export function signedShortFromBytesLE(data: Uint8Array, offset: number): number {
  return getInt2R(data, offset);
}

/** Big-endian signed 16-bit. */
export function signedShortFromBytesBE(data: Uint8Array, offset: number): number {
  return getInt2(data, offset);
}

/**
 * Decode a printable ASCII run, stopping at the first NUL.
 */
export function asciiFrom(data: Uint8Array, offset: number, length: number): string {
  let result = '';
  const end = Math.min(data.length, offset + length);
  for (let i = Math.max(0, offset); i < end; i++) {
    if (data[i] === 0) break;
    result += String.fromCharCode(data[i]);
  }
  return result;
}

/** Decode every byte as a single-byte character, NULs included. */
export function latin1From(data: Uint8Array): string {
  let result = '';
  for (const byte of data) {
    result += String.fromCharCode(byte);
  }
  return result;
}

/** Encode a string as single-byte ASCII. */
export function asciiBytes(text: string): Uint8Array {
  const result = new Uint8Array(text.length);
  for (let i = 0; i < text.length; i++) {
    result[i] = text.charCodeAt(i) & 0xff;
  }
  return result;
}

/** Build a byte array from a list of numbers (each masked to 8 bits). */
export function bytesOf(...values: number[]): Uint8Array {
  return Uint8Array.from(values, (v) => v & 0xff);
}

/** Parse a hex string such as "AA 55 01" or "aa5501". */
export function hexToBytes(hex: string): Uint8Array {
  const clean = hex.replace(/[^0-9a-fA-F]/g, '');
  const result = new Uint8Array(Math.floor(clean.length / 2));
  for (let i = 0; i < result.length; i++) {
    result[i] = parseInt(clean.substring(i * 2, i * 2 + 2), 16);
  }
  return result;
}

/** Format bytes as upper-case, space separated hex. */
export function toHex(data: Uint8Array): string {
  return Array.from(data, (b) => b.toString(16).padStart(2, '0').toUpperCase()).join(' ');
}

/** Concatenate byte arrays. */
export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, p) => sum + p.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/** Byte-wise equality. */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Reflected CRC-32 (poly 0xEDB88320) as used by zip/ethernet.
 */
export function crc32(data: Uint8Array, offset = 0, length = data.length - offset): number {
  let crc = 0xffffffff;
  const end = Math.min(data.length, offset + length);
  for (let i = offset; i < end; i++) {
    crc ^= data[i];
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 1 ? (crc >>> 1) ^ 0xedb88320 : crc >>> 1;
    }
  }
  return (crc ^ 0xffffffff) >>> 0;
}
