/**
 * Frame reassembler for Veteran / Leaperkim wheels.
 *
 * Frames start with `DC 5A 5C` and a length byte `len`; the frame is
 * `len + 4` bytes long. Frames with `len > 38` carry a big-endian CRC32 of
 * the first `len` bytes in their last four bytes. Once one CRC frame has
 * been seen, every later frame is checked too.
 */

import { crc32, intFromBytesBE } from '../../utils/bytes';
import type { FrameUnpacker } from '../decoder';

enum UnpackerState {
  UNKNOWN,
  COLLECTING,
  LEN_SEARCH,
  DONE,
}

export class VeteranUnpacker implements FrameUnpacker {
  private buffer: number[] = [];
  private old1 = 0;
  private old2 = 0;
  private len = 0;
  private state = UnpackerState.UNKNOWN;
  private usingCrc = false;

  /** True once a CRC-protected frame has been accepted. */
  get crcMode(): boolean {
    return this.usingCrc;
  }

  addChar(byte: number): boolean {
    const c = byte & 0xff;

    switch (this.state) {
      case UnpackerState.COLLECTING: {
        const bsize = this.buffer.length;

        // Fixed-value bytes in the payload; anything else means we lost sync
        if (
          (bsize === 22 && c !== 0x00) ||
          (bsize === 30 && c !== 0x00 && c !== 0x07) ||
          (bsize === 23 && (c & 0xfe) !== 0x00)
        ) {
          this.state = UnpackerState.DONE;
          this.reset();
          return false;
        }

        this.buffer.push(c);

        if (bsize === this.len + 3) {
          this.state = UnpackerState.DONE;
          this.reset();

          if (this.len > 38 || this.usingCrc) {
            const frame = this.getBuffer();
            if (crc32(frame, 0, this.len) !== intFromBytesBE(frame, this.len)) {
              return false;
            }
            this.usingCrc = true;
          }
          return true;
        }
        return false;
      }

      case UnpackerState.LEN_SEARCH:
        this.buffer.push(c);
        this.len = c;
        this.state = UnpackerState.COLLECTING;
        this.old2 = this.old1;
        this.old1 = c;
        return false;

      default:
        if (c === 0x5c && this.old1 === 0x5a && this.old2 === 0xdc) {
          this.buffer = [0xdc, 0x5a, 0x5c];
          this.state = UnpackerState.LEN_SEARCH;
        } else if (c === 0x5a && this.old1 === 0xdc) {
          this.old2 = this.old1;
        } else {
          this.old2 = 0;
        }
        this.old1 = c;
        return false;
    }
  }

  getBuffer(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  /**
   * Return to header search. The last frame stays readable and the CRC
   * mode is sticky for the life of the connection.
   */
  reset(): void {
    this.old1 = 0;
    this.old2 = 0;
    this.state = UnpackerState.UNKNOWN;
  }

  /** Forget everything, CRC mode included. */
  clear(): void {
    this.reset();
    this.buffer = [];
    this.len = 0;
    this.usingCrc = false;
  }
}
