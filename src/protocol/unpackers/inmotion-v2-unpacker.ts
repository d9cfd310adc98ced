/**
 * Frame reassembler for Inmotion V2 wheels (V9, V11, V12, V13, V14).
 *
 *   AA AA flags len cmd [data:len-1] xor
 *
 * `A5` escapes the byte that follows it; the buffer holds unescaped bytes.
 */

import type { FrameUnpacker } from '../decoder';

enum UnpackerState {
  UNKNOWN,
  FLAG_SEARCH,
  LEN_SEARCH,
  COLLECTING,
  DONE,
}

const ESCAPE = 0xa5;

export class InmotionV2Unpacker implements FrameUnpacker {
  private buffer: number[] = [];
  private state = UnpackerState.UNKNOWN;
  private oldC = 0;
  private len = 0;

  addChar(byte: number): boolean {
    const c = byte & 0xff;

    if (c === ESCAPE && this.oldC !== ESCAPE) {
      this.oldC = c;
      return false;
    }

    switch (this.state) {
      case UnpackerState.COLLECTING:
        this.buffer.push(c);
        if (this.buffer.length === this.len + 5) {
          this.state = UnpackerState.DONE;
          this.oldC = 0;
          return true;
        }
        this.remember(c);
        return false;

      case UnpackerState.LEN_SEARCH:
        this.buffer.push(c);
        this.len = c;
        this.state = UnpackerState.COLLECTING;
        this.remember(c);
        return false;

      case UnpackerState.FLAG_SEARCH:
        this.buffer.push(c);
        this.state = UnpackerState.LEN_SEARCH;
        this.remember(c);
        return false;

      default:
        if (c === 0xaa && this.oldC === 0xaa) {
          this.buffer = [0xaa, 0xaa];
          this.state = UnpackerState.FLAG_SEARCH;
        }
        this.oldC = c;
        return false;
    }
  }

  /** A literal A5 must not escape the byte after it. */
  private remember(c: number): void {
    this.oldC = c === ESCAPE ? 0 : c;
  }

  getBuffer(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  reset(): void {
    this.buffer = [];
    this.state = UnpackerState.UNKNOWN;
    this.oldC = 0;
    this.len = 0;
  }
}
