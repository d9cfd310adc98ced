/**
 * Decoder for wheels whose transport cannot tell Gotway from Veteran.
 *
 * Both families share the same BLE service, so the first packet header picks
 * the real decoder: `DC 5A 5C` is Veteran, `55 AA` is Gotway. Every later
 * call is delegated to the chosen decoder until reset.
 */

import type { WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import type { DecodedData, WheelDecoder } from '../decoder';
import { GotwayDecoder } from './gotway';
import { VeteranDecoder } from './veteran';

const TAG = 'AutoDetectDecoder';

export class AutoDetectDecoder implements WheelDecoder {
  readonly wheelType = WheelType.GOTWAY_VIRTUAL;

  private readonly gotway = new GotwayDecoder();
  private readonly veteran = new VeteranDecoder();
  private detected: WheelDecoder | null = null;

  /** Cadence of the detected decoder; neither family needs polling. */
  get keepAliveIntervalMs(): number {
    return this.detected?.keepAliveIntervalMs ?? 0;
  }

  /** Resolved family, or null before the first recognised header. */
  get detectedType(): WheelType | null {
    return this.detected?.wheelType ?? null;
  }

  get detectedDecoder(): WheelDecoder | null {
    return this.detected;
  }

  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    if (data.length === 0) return null;
    if (this.detected) {
      return this.detected.decode(data, state, config);
    }

    const decoder = this.detectFromHeader(data);
    if (!decoder) return null;

    console.log(`[${TAG}] Detected ${decoder.wheelType} from packet header`);
    this.detected = decoder;
    const result = decoder.decode(data, state, config);
    if (!result) return null;
    return { ...result, newState: updateWheelState(result.newState, { wheelType: decoder.wheelType }) };
  }

  private detectFromHeader(data: Uint8Array): WheelDecoder | null {
    if (data.length < 3) return null;
    if (data[0] === 0xdc && data[1] === 0x5a && data[2] === 0x5c) {
      return this.veteran;
    }
    if (data[0] === 0x55 && data[1] === 0xaa) {
      return this.gotway;
    }
    return null;
  }

  isReady(): boolean {
    return this.detected?.isReady() ?? false;
  }

  reset(): void {
    this.detected?.reset();
    this.detected = null;
  }

  /** Gotway's init requests are harmless to a Veteran. */
  getInitCommands(): WheelCommand[] {
    return this.gotway.getInitCommands();
  }

  getKeepAliveCommand(): WheelCommand | null {
    return this.detected?.getKeepAliveCommand() ?? null;
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    return this.detected?.buildCommand(command) ?? [];
  }
}
