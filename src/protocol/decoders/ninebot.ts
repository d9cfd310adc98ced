/**
 * Legacy Ninebot (One, S2, Mini) protocol decoder.
 *
 * The app polls: keep-alive writes cycle serial -> firmware -> live data
 * requests as answers arrive. Messages are `55 AA len src dst param data crc`
 * with the shared Ninebot checksum; these wheels never negotiate a key.
 */

import { sendBytes, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  bytesOf,
  concatBytes,
  intFromBytesLE,
  latin1From,
  shortFromBytesLE,
  signedShortFromBytesLE,
} from '../../utils/bytes';
import { decodeFrames, guardDecode, type DecodedData, type FrameOutcome, type WheelDecoder } from '../decoder';
import { emptyGamma, openNinebotFrame, sealNinebotFrame } from '../ninebot-can';
import { NINEBOT_FRAMING, NinebotUnpacker } from '../unpackers/ninebot-unpacker';

const TAG = 'NinebotDecoder';

/** Header, len, src, dst, param and checksum. */
const MIN_FRAME_SIZE = 9;

export const NINEBOT_CELLS = 15;

export enum NinebotProtocol {
  DEFAULT = 'DEFAULT',
  S2 = 'S2',
  MINI = 'MINI',
}

enum Stage {
  WAITING_SERIAL,
  WAITING_VERSION,
  READY,
}

const ADDR_CONTROLLER = 0x01;

/** App address differs per protocol variant. */
const APP_ADDRESS: Readonly<Record<NinebotProtocol, number>> = {
  [NinebotProtocol.DEFAULT]: 0x09,
  [NinebotProtocol.S2]: 0x11,
  [NinebotProtocol.MINI]: 0x0a,
};

const MODEL_NAMES: Readonly<Record<NinebotProtocol, string>> = {
  [NinebotProtocol.DEFAULT]: 'Ninebot',
  [NinebotProtocol.S2]: 'Ninebot S2',
  [NinebotProtocol.MINI]: 'Ninebot Mini',
};

export enum NinebotParam {
  SERIAL_NUMBER = 0x10,
  SERIAL_NUMBER2 = 0x13,
  SERIAL_NUMBER3 = 0x16,
  FIRMWARE = 0x1a,
  BATTERY_LEVEL = 0x22,
  ANGLES = 0x61,
  ACTIVATION_DATE = 0x69,
  LIVE_DATA = 0xb0,
  LIVE_DATA2 = 0xb3,
  LIVE_DATA3 = 0xb6,
  LIVE_DATA4 = 0xb9,
  LIVE_DATA5 = 0xbc,
  LIVE_DATA6 = 0xbf,
}

interface NinebotMessage {
  len: number;
  source: number;
  destination: number;
  parameter: number;
  data: Uint8Array;
}

export class NinebotDecoder implements WheelDecoder {
  readonly wheelType = WheelType.NINEBOT;
  /** Five 25 ms polling steps. */
  readonly keepAliveIntervalMs = 125;

  private readonly unpacker = new NinebotUnpacker(NINEBOT_FRAMING);
  private readonly gamma = emptyGamma();
  private stage = Stage.WAITING_SERIAL;
  private serialNumber = '';
  private version = '';
  private voltage = 0;
  private liveSeen = false;

  constructor(private readonly protocol: NinebotProtocol = NinebotProtocol.DEFAULT) {}

  get modelName(): string {
    return MODEL_NAMES[this.protocol];
  }

  decode(data: Uint8Array, state: WheelState, _config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () =>
      decodeFrames(TAG, data, this.unpacker, state, (frame, s) => {
        const message = this.parse(frame);
        return message ? this.processMessage(message, s) : null;
      })
    );
  }

  private parse(frame: Uint8Array): NinebotMessage | null {
    const body = openNinebotFrame(frame, this.gamma, MIN_FRAME_SIZE);
    if (!body || body.length < 7) {
      return null;
    }
    return {
      len: body[0],
      source: body[1],
      destination: body[2],
      parameter: body[3],
      data: body.slice(4, body.length - 2),
    };
  }

  private processMessage(message: NinebotMessage, state: WheelState): FrameOutcome | null {
    const { data } = message;

    switch (message.parameter) {
      case NinebotParam.SERIAL_NUMBER:
        this.serialNumber = latin1From(data);
        this.stage = Stage.WAITING_VERSION;
        // A full serial fits one message; otherwise wait for the other parts
        if (message.len - 2 !== 14) {
          return null;
        }
        return { state: updateWheelState(state, { serialNumber: this.serialNumber, model: this.modelName }) };

      case NinebotParam.SERIAL_NUMBER2:
        this.serialNumber += latin1From(data);
        return null;

      case NinebotParam.SERIAL_NUMBER3:
        this.serialNumber += latin1From(data);
        return { state: updateWheelState(state, { serialNumber: this.serialNumber, model: this.modelName }) };

      case NinebotParam.FIRMWARE:
        this.version = this.parseVersion(data);
        this.stage = Stage.READY;
        return { state: updateWheelState(state, { version: this.version }) };

      case NinebotParam.LIVE_DATA:
        return message.len - 2 === 32 ? this.parseLiveData(data, state) : null;

      case NinebotParam.LIVE_DATA2:
        return {
          state: updateWheelState(state, {
            batteryLevel: shortFromBytesLE(data, 2),
            speed: Math.trunc(shortFromBytesLE(data, 4) / 10),
          }),
        };

      case NinebotParam.LIVE_DATA3:
        return { state: updateWheelState(state, { totalDistance: intFromBytesLE(data, 2) }) };

      case NinebotParam.LIVE_DATA4:
        return { state: updateWheelState(state, { temperature: shortFromBytesLE(data, 4) * 10 }) };

      case NinebotParam.LIVE_DATA5: {
        const voltage = shortFromBytesLE(data, 0);
        const current = signedShortFromBytesLE(data, 2);
        this.voltage = voltage;
        return {
          state: updateWheelState(state, { voltage, current, power: Math.round((current / 100) * voltage) }),
          hasNewData: true,
        };
      }

      default:
        return null;
    }
  }

  private parseVersion(data: Uint8Array): string {
    if (data.length < 2) return '';
    const major = this.protocol === NinebotProtocol.MINI ? data[1] & 0x0f : data[1] >> 4;
    return `${major}.${data[0] >> 4}.${data[0] & 0x0f}`;
  }

  private parseLiveData(data: Uint8Array, state: WheelState): FrameOutcome {
    const speed =
      this.protocol === NinebotProtocol.S2
        ? shortFromBytesLE(data, 28)
        : Math.abs(Math.trunc(signedShortFromBytesLE(data, 10) / 10));
    // Mini has no voltage sensor
    const voltage = this.protocol === NinebotProtocol.MINI ? 0 : shortFromBytesLE(data, 24);
    const current = signedShortFromBytesLE(data, 26);

    this.voltage = voltage;
    this.liveSeen = true;

    return {
      state: updateWheelState(state, {
        speed,
        voltage,
        current,
        power: Math.round((current / 100) * voltage),
        totalDistance: intFromBytesLE(data, 14),
        temperature: shortFromBytesLE(data, 22) * 10,
        batteryLevel: shortFromBytesLE(data, 8),
        wheelType: WheelType.NINEBOT,
        model: this.modelName,
      }),
      hasNewData: true,
    };
  }

  isReady(): boolean {
    if (this.serialNumber === '' || this.version === '') {
      return false;
    }
    return this.protocol === NinebotProtocol.MINI ? this.liveSeen : this.voltage !== 0;
  }

  reset(): void {
    this.unpacker.reset();
    this.stage = Stage.WAITING_SERIAL;
    this.serialNumber = '';
    this.version = '';
    this.voltage = 0;
    this.liveSeen = false;
  }

  getInitCommands(): WheelCommand[] {
    return [sendBytes(this.request(NinebotParam.SERIAL_NUMBER, 0x0e))];
  }

  getKeepAliveCommand(): WheelCommand | null {
    switch (this.stage) {
      case Stage.WAITING_SERIAL:
        return sendBytes(this.request(NinebotParam.SERIAL_NUMBER, 0x0e));
      case Stage.WAITING_VERSION:
        return sendBytes(this.request(NinebotParam.FIRMWARE, 0x02));
      case Stage.READY:
        return sendBytes(this.request(NinebotParam.LIVE_DATA, 0x20));
    }
  }

  /** Legacy Ninebots expose no settings over this protocol. */
  buildCommand(_command: WheelCommand): WheelCommand[] {
    return [];
  }

  private request(parameter: NinebotParam, length: number): Uint8Array {
    const data = bytesOf(length);
    const body = concatBytes(
      bytesOf(data.length + 2, APP_ADDRESS[this.protocol], ADDR_CONTROLLER, parameter),
      data
    );
    return sealNinebotFrame(NINEBOT_FRAMING.header, body, this.gamma);
  }
}
