import { describe, expect, it } from 'vitest';
import { bytesOf } from '../../utils/bytes';
import { encodeInmotionV2Message } from '../decoders/inmotion-v2';
import { InmotionV2Unpacker } from './inmotion-v2-unpacker';

function feed(unpacker: InmotionV2Unpacker, bytes: Uint8Array): number[] {
  const done: number[] = [];
  bytes.forEach((b, i) => {
    if (unpacker.addChar(b)) done.push(i);
  });
  return done;
}

describe('InmotionV2Unpacker', () => {
  it('completes after len + 5 unescaped bytes', () => {
    const frame = encodeInmotionV2Message(0x14, 0x04, new Uint8Array(0));
    const unpacker = new InmotionV2Unpacker();

    expect(feed(unpacker, frame)).toEqual([frame.length - 1]);
    // 0x14 ^ 0x01 ^ 0x04 = 0x11
    expect(Array.from(unpacker.getBuffer())).toEqual([0xaa, 0xaa, 0x14, 0x01, 0x04, 0x11]);
  });

  it('drops the escape in front of AA', () => {
    const frame = encodeInmotionV2Message(0x14, 0x60, bytesOf(0xaa));
    expect(Array.from(frame)).toEqual([0xaa, 0xaa, 0x14, 0x02, 0x60, 0xa5, 0xaa, 0xdc]);

    const unpacker = new InmotionV2Unpacker();
    expect(feed(unpacker, frame)).toEqual([7]);
    expect(Array.from(unpacker.getBuffer())).toEqual([0xaa, 0xaa, 0x14, 0x02, 0x60, 0xaa, 0xdc]);
  });

  it('keeps a literal A5 without escaping the next byte', () => {
    const frame = encodeInmotionV2Message(0x14, 0x60, bytesOf(0xa5, 0x01));
    const unpacker = new InmotionV2Unpacker();

    expect(feed(unpacker, frame)).toEqual([frame.length - 1]);
    expect(Array.from(unpacker.getBuffer().subarray(5, 7))).toEqual([0xa5, 0x01]);
  });

  it('skips noise before the header', () => {
    const noisy = Uint8Array.from([0x01, 0xaa, 0x02, ...encodeInmotionV2Message(0x14, 0x04, new Uint8Array(0))]);
    const unpacker = new InmotionV2Unpacker();
    expect(feed(unpacker, noisy)).toEqual([noisy.length - 1]);
  });
});
