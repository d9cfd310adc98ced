/**
 * Frame reassembler for Gotway/Begode wheels.
 *
 * Frames are 24 bytes: `55 AA`, 16 payload bytes, type at 18, a sub byte at
 * 19, then the footer `5A 5A 5A 5A`. A wrong footer byte drops the frame.
 */

import type { FrameUnpacker } from '../decoder';

export const GOTWAY_FRAME_SIZE = 24;

enum UnpackerState {
  UNKNOWN,
  COLLECTING,
  DONE,
}

const GARBAGE_SHORT = [0x55, 0xaa, 0x5a, 0x55, 0xaa];
const GARBAGE_LONG = [0x55, 0xaa, 0x5a, 0x5a, 0x55, 0xaa];

function matches(buffer: number[], pattern: number[]): boolean {
  return buffer.length === pattern.length && pattern.every((b, i) => buffer[i] === b);
}

export class GotwayUnpacker implements FrameUnpacker {
  private buffer: number[] = [];
  private state = UnpackerState.UNKNOWN;
  private oldC = -1;

  addChar(byte: number): boolean {
    const c = byte & 0xff;

    if (this.state === UnpackerState.COLLECTING) {
      this.buffer.push(c);
      const size = this.buffer.length;

      if (size > 20 && size <= GOTWAY_FRAME_SIZE && c !== 0x5a) {
        this.state = UnpackerState.UNKNOWN;
        return false;
      }
      if (size === GOTWAY_FRAME_SIZE) {
        this.state = UnpackerState.DONE;
        return true;
      }

      // A header repeated inside a short burst: restart from the second header
      if ((size === 5 && matches(this.buffer, GARBAGE_SHORT)) ||
          (size === 6 && matches(this.buffer, GARBAGE_LONG))) {
        this.buffer = [0x55, 0xaa];
      }
      return false;
    }

    if (c === 0xaa && this.oldC === 0x55) {
      this.buffer = [0x55, 0xaa];
      this.state = UnpackerState.COLLECTING;
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
    this.oldC = -1;
  }
}
