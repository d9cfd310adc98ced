/**
 * Shared decoder contract.
 *
 * Every wheel family implements WheelDecoder. Decoders are synchronous and
 * own a private cache (partial frames, model, handshake stage); a call runs to
 * completion before the next one starts, so no extra locking is needed.
 */

import { errorMessage } from '../exceptions';
import type { WheelCommand } from '../models/commands';
import type { DecoderConfig } from '../models/config';
import type { WheelType } from '../models/enums';
import type { WheelState } from '../models/wheel-state';

/**
 * Result of one decode call.
 */
export interface DecodedData {
  /** Candidate replacement for the current state. */
  newState: WheelState;
  /** Commands to dispatch, in order. */
  commands: WheelCommand[];
  /** True when meaningful telemetry changed. */
  hasNewData: boolean;
}

export interface WheelDecoder {
  readonly wheelType: WheelType;

  /** Keep-alive cadence; 0 or less means the wheel pushes data unprompted. */
  readonly keepAliveIntervalMs: number;

  /**
   * Decode one transport notification.
   *
   * @returns null when the bytes did not complete a frame. Never throws.
   */
  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null;

  /** True once identifying telemetry has arrived. */
  isReady(): boolean;

  /** Clear all cached state. Idempotent. */
  reset(): void;

  /** Commands to send right after the decoder is selected. */
  getInitCommands(): WheelCommand[];

  /** Next keep-alive write, or null when none is due. */
  getKeepAliveCommand(): WheelCommand | null;

  /**
   * Translate a semantic command into raw writes.
   *
   * @returns SendBytes/SendDelayed commands, empty when unsupported
   */
  buildCommand(command: WheelCommand): WheelCommand[];
}

/**
 * Byte-at-a-time frame reassembler.
 */
export interface FrameUnpacker {
  /** Feed one byte; true when a complete frame is available. */
  addChar(byte: number): boolean;
  /** Completed frame bytes. */
  getBuffer(): Uint8Array;
  reset(): void;
}

/**
 * What a decoder produced for one complete frame.
 */
export interface FrameOutcome {
  state: WheelState;
  commands?: WheelCommand[];
  hasNewData?: boolean;
}

/**
 * Feed bytes through an unpacker and hand each complete frame to `onFrame`.
 *
 * The unpacker is reset after every frame. Errors thrown by `onFrame` are
 * logged and turn the whole call into null.
 *
 * @returns null when no frame was processed
 */
export function decodeFrames(
  tag: string,
  data: Uint8Array,
  unpacker: FrameUnpacker,
  state: WheelState,
  onFrame: (frame: Uint8Array, state: WheelState) => FrameOutcome | null
): DecodedData | null {
  let current = state;
  const commands: WheelCommand[] = [];
  let hasNewData = false;
  let processed = false;

  try {
    for (const byte of data) {
      if (!unpacker.addChar(byte)) {
        continue;
      }
      const frame = unpacker.getBuffer();
      unpacker.reset();

      const outcome = onFrame(frame, current);
      if (!outcome) {
        continue;
      }
      processed = true;
      current = outcome.state;
      if (outcome.commands) {
        commands.push(...outcome.commands);
      }
      if (outcome.hasNewData) {
        hasNewData = true;
      }
    }
  } catch (error) {
    console.warn(`[${tag}] Failed to decode frame: ${errorMessage(error)}`);
    unpacker.reset();
    return null;
  }

  if (!processed) {
    return null;
  }
  return { newState: current, commands, hasNewData };
}

/**
 * Run a whole-buffer decode step, logging and swallowing unexpected errors.
 */
export function guardDecode(tag: string, decode: () => DecodedData | null): DecodedData | null {
  try {
    return decode();
  } catch (error) {
    console.warn(`[${tag}] Failed to decode packet: ${errorMessage(error)}`);
    return null;
  }
}
