/**
 * Frame reassembler for Inmotion V1 wheels.
 *
 *   AA AA [id:4] [data:8] len ch format type [ext...] check 55 55
 *
 * `A5` escapes a following `AA`, `55` or `A5` inside the body; the buffer
 * holds unescaped bytes. When `len` is `FE` the first data word gives the
 * extended payload size, and the frame must end exactly after it.
 */

import type { FrameUnpacker } from '../decoder';

enum UnpackerState {
  UNKNOWN,
  COLLECTING,
  DONE,
}

const ESCAPE = 0xa5;

/** Header, CAN header fields, checksum and footer around the extended data. */
const EXTENDED_OVERHEAD = 21;

export class InmotionUnpacker implements FrameUnpacker {
  private buffer: number[] = [];
  private state = UnpackerState.UNKNOWN;
  private oldC = 0;
  private lenBasic = 0;
  private lenExtended = 0;

  addChar(byte: number): boolean {
    const c = byte & 0xff;

    if (c !== ESCAPE || this.oldC === ESCAPE) {
      if (this.state === UnpackerState.COLLECTING) {
        this.buffer.push(c);
        const size = this.buffer.length;

        if (size === 7) {
          this.lenExtended = c;
        } else if (size === 15) {
          this.lenBasic = c;
        }

        const extended = this.lenBasic === 0xfe;
        if (extended && size > this.lenExtended + EXTENDED_OVERHEAD) {
          this.reset();
          return false;
        }

        if (c === 0x55 && this.oldC === 0x55 && (!extended || size === this.lenExtended + EXTENDED_OVERHEAD)) {
          this.state = UnpackerState.DONE;
          this.oldC = 0;
          return true;
        }
      } else if (c === 0xaa && this.oldC === 0xaa) {
        this.buffer = [0xaa, 0xaa];
        this.state = UnpackerState.COLLECTING;
        this.lenBasic = 0;
        this.lenExtended = 0;
      }
    }

    this.oldC = c;
    return false;
  }

  getBuffer(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  reset(): void {
    this.buffer = [];
    this.state = UnpackerState.UNKNOWN;
    this.oldC = 0;
    this.lenBasic = 0;
    this.lenExtended = 0;
  }
}
