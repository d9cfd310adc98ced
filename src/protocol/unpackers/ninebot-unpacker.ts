/**
 * Frame reassembler for Ninebot wheels.
 *
 * Both Ninebot families use `header len ...` frames and only differ in the
 * header bytes and how many bytes surround the payload:
 *
 * - legacy: `55 AA len src dst param data crc16`, total len + 6
 * - Z series: `5A A5 len src dst cmd param data crc16`, total len + 9
 */

import type { FrameUnpacker } from '../decoder';

enum UnpackerState {
  UNKNOWN,
  STARTED,
  COLLECTING,
  DONE,
}

export interface NinebotFraming {
  readonly header: readonly [number, number];
  /** Bytes in a frame besides the `len` payload bytes. */
  readonly overhead: number;
}

export const NINEBOT_FRAMING: NinebotFraming = { header: [0x55, 0xaa], overhead: 6 };
export const NINEBOT_Z_FRAMING: NinebotFraming = { header: [0x5a, 0xa5], overhead: 9 };

export class NinebotUnpacker implements FrameUnpacker {
  private buffer: number[] = [];
  private oldC = 0;
  private len = 0;
  private state = UnpackerState.UNKNOWN;

  constructor(private readonly framing: NinebotFraming = NINEBOT_FRAMING) {}

  addChar(byte: number): boolean {
    const c = byte & 0xff;

    switch (this.state) {
      case UnpackerState.COLLECTING:
        this.buffer.push(c);
        if (this.buffer.length === this.len + this.framing.overhead) {
          this.state = UnpackerState.DONE;
          return true;
        }
        return false;

      case UnpackerState.STARTED:
        this.buffer.push(c);
        this.len = c;
        this.state = UnpackerState.COLLECTING;
        return false;

      default: {
        const [first, second] = this.framing.header;
        if (c === second && this.oldC === first) {
          this.buffer = [first, second];
          this.state = UnpackerState.STARTED;
        }
        this.oldC = c;
        return false;
      }
    }
  }

  getBuffer(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  reset(): void {
    this.buffer = [];
    this.oldC = 0;
    this.len = 0;
    this.state = UnpackerState.UNKNOWN;
  }
}
