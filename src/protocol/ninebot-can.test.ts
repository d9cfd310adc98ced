import { describe, expect, it } from 'vitest';
import { bytesOf } from '../utils/bytes';
import { emptyGamma, ninebotChecksum, ninebotCrypto, openNinebotFrame, sealNinebotFrame } from './ninebot-can';

const KEY = Uint8Array.from({ length: 16 }, (_, i) => i + 1);

describe('ninebotChecksum', () => {
  it('inverts the byte sum', () => {
    // 3 + 0x3E + 0x14 + 0x01 + 0xB0 + 0x20 = 0x126
    expect(ninebotChecksum(bytesOf(0x03, 0x3e, 0x14, 0x01, 0xb0, 0x20))).toBe(0xfed9);
  });
});

describe('ninebotCrypto', () => {
  it('leaves the first byte alone and is its own inverse', () => {
    const plain = bytesOf(0x10, 0x20, 0x30, 0x40);
    const encrypted = ninebotCrypto(plain, KEY);
    expect(Array.from(encrypted)).toEqual([0x10, 0x21, 0x32, 0x43]);
    expect(Array.from(ninebotCrypto(encrypted, KEY))).toEqual([0x10, 0x20, 0x30, 0x40]);
  });

  it('wraps the key after 16 bytes', () => {
    const plain = new Uint8Array(18);
    const encrypted = ninebotCrypto(plain, KEY);
    expect(encrypted[16]).toBe(16);
    expect(encrypted[17]).toBe(1);
  });
});

describe('frames', () => {
  const body = bytesOf(0x03, 0x3e, 0x14, 0x01, 0xb0, 0x20);

  it('seals with a plain key', () => {
    const frame = sealNinebotFrame([0x5a, 0xa5], body, emptyGamma());
    expect(Array.from(frame)).toEqual([0x5a, 0xa5, 0x03, 0x3e, 0x14, 0x01, 0xb0, 0x20, 0xd9, 0xfe]);
  });

  it('opens what it sealed under a negotiated key', () => {
    const frame = sealNinebotFrame([0x5a, 0xa5], body, KEY);
    const opened = openNinebotFrame(frame, KEY, 8);
    expect(opened && Array.from(opened)).toEqual([0x03, 0x3e, 0x14, 0x01, 0xb0, 0x20, 0xd9, 0xfe]);
  });

  it('rejects a corrupted checksum', () => {
    const frame = sealNinebotFrame([0x5a, 0xa5], body, emptyGamma());
    frame[frame.length - 1] ^= 0x01;
    expect(openNinebotFrame(frame, emptyGamma(), 8)).toBeNull();
  });

  it('rejects frames below the minimum length', () => {
    expect(openNinebotFrame(bytesOf(0x5a, 0xa5, 0x01), emptyGamma(), 8)).toBeNull();
  });
});
