/**
 * CAN-style message codec shared by the Ninebot decoders.
 *
 * After the two header bytes every message is
 *
 *   len src dst [cmd] param data... crc_lo crc_hi
 *
 * where the checksum is the byte sum XOR 0xFFFF and every byte after `len`
 * is XORed with a 16-byte key (all zeros until one is negotiated).
 */

import { concatBytes } from '../utils/bytes';

export const GAMMA_SIZE = 16;

export function emptyGamma(): Uint8Array {
  return new Uint8Array(GAMMA_SIZE);
}

/** Additive checksum over the decrypted message body. */
export function ninebotChecksum(data: Uint8Array): number {
  let check = 0;
  for (const byte of data) {
    check += byte;
  }
  return (check ^ 0xffff) & 0xffff;
}

/** XOR every byte but the first with a 16-byte key. Symmetric. */
export function ninebotCrypto(data: Uint8Array, gamma: Uint8Array): Uint8Array {
  const result = data.slice();
  for (let j = 1; j < result.length; j++) {
    result[j] ^= gamma[(j - 1) % GAMMA_SIZE];
  }
  return result;
}

/**
 * Strip the header, decrypt and verify the checksum.
 *
 * @returns the decrypted body without header, checksum bytes included, or
 *   null when the frame is too short or the checksum does not match
 */
export function openNinebotFrame(frame: Uint8Array, gamma: Uint8Array, minLength: number): Uint8Array | null {
  if (frame.length < minLength) {
    return null;
  }
  const body = ninebotCrypto(frame.subarray(2), gamma);
  const provided = (body[body.length - 1] << 8) | body[body.length - 2];
  if (provided !== ninebotChecksum(body.subarray(0, body.length - 2))) {
    return null;
  }
  return body;
}

/**
 * Append the checksum, encrypt and prefix the header.
 */
export function sealNinebotFrame(header: readonly [number, number], body: Uint8Array, gamma: Uint8Array): Uint8Array {
  const crc = ninebotChecksum(body);
  const plain = concatBytes(body, Uint8Array.of(crc & 0xff, (crc >> 8) & 0xff));
  return concatBytes(Uint8Array.from(header), ninebotCrypto(plain, gamma));
}
