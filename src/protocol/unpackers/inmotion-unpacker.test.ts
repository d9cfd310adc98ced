import { describe, expect, it } from 'vitest';
import { bytesOf } from '../../utils/bytes';
import { encodeInmotionMessage, InmotionId } from '../decoders/inmotion';
import { InmotionUnpacker } from './inmotion-unpacker';

function feed(unpacker: InmotionUnpacker, bytes: Uint8Array): number[] {
  const done: number[] = [];
  bytes.forEach((b, i) => {
    if (unpacker.addChar(b)) done.push(i);
  });
  return done;
}

describe('InmotionUnpacker', () => {
  it('collects a basic frame and drops escape bytes', () => {
    // ID 0x0F550114 carries a 55 that goes out as A5 55.
    const frame = encodeInmotionMessage({
      id: InmotionId.GET_SLOW_INFO,
      data: bytesOf(1, 2, 3, 4, 5, 6, 7, 8),
      len: 8,
      ch: 5,
      format: 0,
      type: 1,
    });
    const unpacker = new InmotionUnpacker();

    expect(feed(unpacker, frame)).toEqual([frame.length - 1]);
    // 0x14 + 0x01 + 0x55 + 0x0F + 36 + 8 + 5 + 1 = 0xAB
    expect(Array.from(unpacker.getBuffer())).toEqual([
      0xaa, 0xaa, 0x14, 0x01, 0x55, 0x0f, 1, 2, 3, 4, 5, 6, 7, 8, 8, 5, 0, 1, 0xab, 0x55, 0x55,
    ]);
  });

  it('waits for the full extended payload', () => {
    const ex = bytesOf(0x55, 0x55, 0x00, 0x01);
    const frame = encodeInmotionMessage({
      id: InmotionId.GET_FAST_INFO,
      data: bytesOf(4, 0, 0, 0, 0, 0, 0, 0),
      len: 0xfe,
      ch: 0,
      format: 0,
      type: 0,
      exData: ex,
    });
    const unpacker = new InmotionUnpacker();

    expect(feed(unpacker, frame)).toEqual([frame.length - 1]);
    expect(unpacker.getBuffer().length).toBe(4 + 21);
  });

  it('ignores bytes before the header', () => {
    const unpacker = new InmotionUnpacker();
    expect(feed(unpacker, bytesOf(0x00, 0x55, 0x55, 0xaa))).toEqual([]);
    expect(Array.from(unpacker.getBuffer())).toEqual([]);
  });

  it('starts over after reset', () => {
    const unpacker = new InmotionUnpacker();
    feed(unpacker, bytesOf(0xaa, 0xaa, 0x01));
    unpacker.reset();
    expect(Array.from(unpacker.getBuffer())).toEqual([]);
  });
});
