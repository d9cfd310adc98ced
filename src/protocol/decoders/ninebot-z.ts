/**
 * Ninebot Z-series protocol decoder.
 *
 * Z wheels speak a CAN-like protocol over `5A A5` frames and only answer once
 * the app has walked a fixed handshake:
 *
 *   INIT -> WAIT_KEY -> SERIAL_NUMBER -> VERSION -> PARAMS1..3 -> READY
 *
 * with an optional BMS1/BMS2 detour (serial, life, cells) before READY when
 * BMS reading mode is on. Each keep-alive tick sends the request for the
 * current stage; a stage only advances when its own answer arrives. After the
 * key exchange every byte past `len` is XORed with the wheel's 16-byte key.
 */

import {
  cloneSmartBms,
  createSmartBms,
  setCell,
  updateCellStats,
  type SmartBms,
} from '../../models/bms';
import { sendBytes, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  asciiFrom,
  bytesOf,
  concatBytes,
  intFromBytesLE,
  shortFromBytesLE,
  signedShortFromBytesLE,
} from '../../utils/bytes';
import { decodeFrames, guardDecode, type DecodedData, type FrameOutcome, type WheelDecoder } from '../decoder';
import { GAMMA_SIZE, emptyGamma, openNinebotFrame, sealNinebotFrame } from '../ninebot-can';
import { NINEBOT_Z_FRAMING, NinebotUnpacker } from '../unpackers/ninebot-unpacker';

const TAG = 'NinebotZDecoder';

const MIN_FRAME_SIZE = 9;
const MODEL_NAME = 'Ninebot Z';

/** Cells per pack unless the 15th/16th slot reports a voltage. */
export const NINEBOT_Z_CELLS = 14;

export enum NinebotZAddr {
  BMS1 = 0x11,
  BMS2 = 0x12,
  CONTROLLER = 0x14,
  KEY_GENERATOR = 0x16,
  APP = 0x3e,
}

export enum NinebotZComm {
  READ = 0x01,
  WRITE = 0x03,
  GET = 0x04,
  GET_KEY = 0x5b,
}

export enum NinebotZParam {
  GET_KEY = 0x00,
  SERIAL_NUMBER = 0x10,
  FIRMWARE = 0x1a,
  BATTERY_LEVEL = 0x22,
  ANGLES = 0x61,
  BAT1_FW = 0x66,
  BAT2_FW = 0x67,
  BLE_VERSION = 0x68,
  ACTIVATION_DATE = 0x69,
  LOCK_MODE = 0x70,
  LIMITED_MODE = 0x72,
  LIMIT_MODE_SPEED_1KM = 0x73,
  LIMIT_MODE_SPEED = 0x74,
  CALIBRATION = 0x75,
  ALARMS = 0x7c,
  ALARM1_SPEED = 0x7d,
  ALARM2_SPEED = 0x7e,
  ALARM3_SPEED = 0x7f,
  LIVE_DATA = 0xb0,
  LED_MODE = 0xc6,
  LED_COLOR1 = 0xc8,
  LED_COLOR2 = 0xca,
  LED_COLOR3 = 0xcc,
  LED_COLOR4 = 0xce,
  PEDAL_SENSITIVITY = 0xd2,
  DRIVE_FLAGS = 0xd3,
  SPEAKER_VOLUME = 0xf5,
}

/** Parameters addressed to a BMS. */
export enum NinebotZBmsParam {
  SERIAL = 0x10,
  LIFE = 0x30,
  CELLS = 0x40,
}

/** Bits of the drive flags word. */
export const DRIVE_FLAG = {
  DRL: 1 << 0,
  TAIL_LIGHT: 1 << 1,
  HANDLE_BUTTON: 1 << 2,
  BRAKE_ASSIST: 1 << 3,
} as const;

export enum NinebotZStage {
  INIT = 'INIT',
  WAIT_KEY = 'WAIT_KEY',
  SERIAL_NUMBER = 'SERIAL_NUMBER',
  VERSION = 'VERSION',
  PARAMS1 = 'PARAMS1',
  PARAMS2 = 'PARAMS2',
  PARAMS3 = 'PARAMS3',
  BMS1_SN = 'BMS1_SN',
  BMS1_LIFE = 'BMS1_LIFE',
  BMS1_CELLS = 'BMS1_CELLS',
  BMS2_SN = 'BMS2_SN',
  BMS2_LIFE = 'BMS2_LIFE',
  BMS2_CELLS = 'BMS2_CELLS',
  READY = 'READY',
}

const BMS_STAGES: readonly NinebotZStage[] = [
  NinebotZStage.BMS1_SN,
  NinebotZStage.BMS1_LIFE,
  NinebotZStage.BMS1_CELLS,
  NinebotZStage.BMS2_SN,
  NinebotZStage.BMS2_LIFE,
  NinebotZStage.BMS2_CELLS,
];

interface Request {
  destination: number;
  command: number;
  parameter: number;
  data: Uint8Array;
}

/** Request sent for each handshake stage. */
const STAGE_REQUESTS: Readonly<Record<NinebotZStage, Request>> = {
  [NinebotZStage.INIT]: read(NinebotZAddr.CONTROLLER, NinebotZParam.BLE_VERSION, 0x02),
  [NinebotZStage.WAIT_KEY]: {
    destination: NinebotZAddr.KEY_GENERATOR,
    command: NinebotZComm.GET_KEY,
    parameter: NinebotZParam.GET_KEY,
    data: new Uint8Array(0),
  },
  [NinebotZStage.SERIAL_NUMBER]: read(NinebotZAddr.CONTROLLER, NinebotZParam.SERIAL_NUMBER, 0x0e),
  [NinebotZStage.VERSION]: read(NinebotZAddr.CONTROLLER, NinebotZParam.FIRMWARE, 0x06),
  [NinebotZStage.PARAMS1]: read(NinebotZAddr.CONTROLLER, NinebotZParam.LOCK_MODE, 0x20),
  [NinebotZStage.PARAMS2]: read(NinebotZAddr.CONTROLLER, NinebotZParam.LED_MODE, 0x1c),
  [NinebotZStage.PARAMS3]: read(NinebotZAddr.CONTROLLER, NinebotZParam.SPEAKER_VOLUME, 0x02),
  [NinebotZStage.BMS1_SN]: read(NinebotZAddr.BMS1, NinebotZBmsParam.SERIAL, 0x22),
  [NinebotZStage.BMS1_LIFE]: read(NinebotZAddr.BMS1, NinebotZBmsParam.LIFE, 0x18),
  [NinebotZStage.BMS1_CELLS]: read(NinebotZAddr.BMS1, NinebotZBmsParam.CELLS, 0x20),
  [NinebotZStage.BMS2_SN]: read(NinebotZAddr.BMS2, NinebotZBmsParam.SERIAL, 0x22),
  [NinebotZStage.BMS2_LIFE]: read(NinebotZAddr.BMS2, NinebotZBmsParam.LIFE, 0x18),
  [NinebotZStage.BMS2_CELLS]: read(NinebotZAddr.BMS2, NinebotZBmsParam.CELLS, 0x20),
  [NinebotZStage.READY]: read(NinebotZAddr.CONTROLLER, NinebotZParam.LIVE_DATA, 0x20),
};

function read(destination: number, parameter: number, length: number): Request {
  return { destination, command: NinebotZComm.READ, parameter, data: bytesOf(length) };
}

function write(parameter: number, data: Uint8Array): Request {
  return { destination: NinebotZAddr.CONTROLLER, command: NinebotZComm.WRITE, parameter, data };
}

function shortLE(value: number): Uint8Array {
  return bytesOf(value & 0xff, (value >> 8) & 0xff);
}

const ERROR_TEXT: Readonly<Record<number, string>> = {
  0: '',
  1: 'Motor hall sensor error',
  6: 'Initial S/N',
  8: 'Error Bat input 1',
  9: 'Error Bat input 2',
  10: 'Abnormal communication Bat#1',
  11: 'Abnormal communication Bat#2',
  12: 'Failure of Gyroscope initialization',
  24: 'General voltage > 65V or < 40V',
  25: 'VGM - Voltage < 10V',
  28: 'Abnormal power supply Bat#1',
  29: 'Abnormal power supply Bat#2',
  34: 'Battery cell of Bat#1 in big differential voltage',
  35: 'Battery cell of Bat#2 in big differential voltage',
  36: 'Bat#1 input error 0x800',
  37: 'Bat#2 input error 0x800',
  38: '3c1e8 != 0x5A',
  46: 'Unknown error',
};

export function ninebotZErrorText(code: number): string {
  return `Err:${code} ${ERROR_TEXT[code] ?? 'Error'}`;
}

/** Packed date: 7 bits year since 2000, 4 bits month, 5 bits day. */
export function formatBmsDate(packed: number): string {
  const year = packed >> 9;
  const month = (packed >> 5) & 0x0f;
  const day = packed & 0x1f;
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(day)}.${pad(month)}.20${pad(year)}`;
}

interface CanMessage {
  len: number;
  source: number;
  destination: number;
  command: number;
  parameter: number;
  data: Uint8Array;
}

export class NinebotZDecoder implements WheelDecoder {
  readonly wheelType = WheelType.NINEBOT_Z;
  readonly keepAliveIntervalMs = 25;

  private readonly unpacker = new NinebotUnpacker(NINEBOT_Z_FRAMING);
  private gamma = emptyGamma();
  private stage = NinebotZStage.INIT;
  private handshakeDone = false;
  private bmsReadingMode = false;
  private liveVoltage = 0;
  private model = '';
  private bms1: SmartBms = createSmartBms();
  private bms2: SmartBms = createSmartBms();

  private alarms = 0;
  private driveFlags = 0;

  get currentStage(): NinebotZStage {
    return this.stage;
  }

  /** Copy of the negotiated key. */
  get gammaKey(): Uint8Array {
    return this.gamma.slice();
  }

  /** Restore a key from a previous session; ignored unless 16 bytes. */
  setGamma(gamma: Uint8Array): void {
    if (gamma.length === GAMMA_SIZE) {
      this.gamma = gamma.slice();
    }
  }

  /**
   * When enabled, a READY wheel re-enters the BMS stages so keep-alive
   * requests walk both packs once before returning to live data.
   */
  setBmsReadingMode(enabled: boolean): void {
    this.bmsReadingMode = enabled;
    if (enabled && this.stage === NinebotZStage.READY) {
      this.stage = NinebotZStage.BMS1_SN;
    } else if (!enabled && BMS_STAGES.includes(this.stage)) {
      this.stage = NinebotZStage.READY;
    }
  }

  decode(data: Uint8Array, state: WheelState, _config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () => {
      const result = decodeFrames(TAG, data, this.unpacker, state, (frame, s) => {
        const message = this.parse(frame);
        return message ? this.processMessage(message, s) : null;
      });
      if (!result) {
        return null;
      }
      return {
        ...result,
        newState: updateWheelState(result.newState, {
          bms1: cloneSmartBms(this.bms1),
          bms2: cloneSmartBms(this.bms2),
        }),
      };
    });
  }

  private parse(frame: Uint8Array): CanMessage | null {
    const body = openNinebotFrame(frame, this.gamma, MIN_FRAME_SIZE);
    if (!body || body.length < 7) {
      return null;
    }
    return {
      len: body[0],
      source: body[1],
      destination: body[2],
      command: body[3],
      parameter: body[4],
      data: body.length > 7 ? body.slice(5, body.length - 2) : new Uint8Array(0),
    };
  }

  /** Move to `to` only when the handshake is waiting at `from`. */
  private advance(from: NinebotZStage, to: NinebotZStage): void {
    if (this.stage !== from) {
      return;
    }
    this.stage = to;
    if (to === NinebotZStage.READY && !this.handshakeDone) {
      this.handshakeDone = true;
      console.log(`[${TAG}] Handshake complete`);
    }
  }

  private processMessage(message: CanMessage, state: WheelState): FrameOutcome | null {
    const { data } = message;

    if (message.source === NinebotZAddr.BMS1 || message.source === NinebotZAddr.BMS2) {
      this.processBms(message);
      return { state };
    }

    if (message.source === NinebotZAddr.KEY_GENERATOR) {
      if (message.parameter !== NinebotZParam.GET_KEY) return null;
      const key = emptyGamma();
      key.set(data.subarray(0, GAMMA_SIZE));
      this.gamma = key;
      this.advance(NinebotZStage.WAIT_KEY, NinebotZStage.SERIAL_NUMBER);
      return null;
    }

    if (message.source !== NinebotZAddr.CONTROLLER) {
      return null;
    }

    switch (message.parameter) {
      case NinebotZParam.BLE_VERSION:
        this.advance(NinebotZStage.INIT, NinebotZStage.WAIT_KEY);
        return null;

      case NinebotZParam.SERIAL_NUMBER: {
        this.model = MODEL_NAME;
        this.advance(NinebotZStage.SERIAL_NUMBER, NinebotZStage.VERSION);
        return {
          state: updateWheelState(state, { serialNumber: asciiFrom(data, 0, data.length), model: MODEL_NAME }),
        };
      }

      case NinebotZParam.FIRMWARE: {
        this.advance(NinebotZStage.VERSION, NinebotZStage.PARAMS1);
        if (data.length < 6) {
          return { state: updateWheelState(state, { version: '', error: '' }) };
        }
        const version = [data[1] & 0x0f, (data[0] >> 4) & 0x0f, data[0] & 0x0f]
          .map((n) => n.toString(16))
          .join('.');
        const error1 = data[2];
        const error2 = data[3];
        let error = 'No';
        if (error1 !== 0) {
          error = ninebotZErrorText(error1);
          if (error2 !== 0) error += `\n${ninebotZErrorText(error2)}`;
        }
        return { state: updateWheelState(state, { version, error }) };
      }

      case NinebotZParam.LOCK_MODE:
        this.advance(NinebotZStage.PARAMS1, NinebotZStage.PARAMS2);
        if (data.length < 32) return null;
        this.alarms = shortFromBytesLE(data, 24);
        return { state: updateWheelState(state, { speedAlarms: this.alarms }) };

      case NinebotZParam.LED_MODE:
        this.advance(NinebotZStage.PARAMS2, NinebotZStage.PARAMS3);
        if (data.length < 28) return null;
        this.driveFlags = shortFromBytesLE(data, 26);
        return {
          state: updateWheelState(state, {
            ledMode: shortFromBytesLE(data, 0),
            pedalSensitivity: shortFromBytesLE(data, 24),
            drl: (this.driveFlags & DRIVE_FLAG.DRL) !== 0,
            handleButton: (this.driveFlags & DRIVE_FLAG.HANDLE_BUTTON) !== 0,
          }),
        };

      case NinebotZParam.SPEAKER_VOLUME:
        this.advance(NinebotZStage.PARAMS3, this.bmsReadingMode ? NinebotZStage.BMS1_SN : NinebotZStage.READY);
        if (data.length < 2) return null;
        return { state: updateWheelState(state, { speakerVolume: shortFromBytesLE(data, 0) >> 3 }) };

      case NinebotZParam.LIVE_DATA:
        return this.parseLiveData(data, state);

      default:
        return null;
    }
  }

  private parseLiveData(data: Uint8Array, state: WheelState): FrameOutcome | null {
    if (data.length < 28) {
      return null;
    }
    const voltage = shortFromBytesLE(data, 24);
    const current = signedShortFromBytesLE(data, 26);
    this.liveVoltage = voltage;
    this.model = MODEL_NAME;

    return {
      state: updateWheelState(state, {
        speed: shortFromBytesLE(data, 10),
        voltage,
        current,
        power: Math.trunc((current / 100) * voltage),
        temperature: signedShortFromBytesLE(data, 22) * 10,
        totalDistance: intFromBytesLE(data, 14),
        wheelDistance: shortFromBytesLE(data, 18) * 10,
        batteryLevel: shortFromBytesLE(data, 8),
        wheelType: WheelType.NINEBOT_Z,
        model: MODEL_NAME,
      }),
      hasNewData: true,
    };
  }

  private processBms(message: CanMessage): void {
    const first = message.source === NinebotZAddr.BMS1;
    const bms = first ? this.bms1 : this.bms2;
    const { data } = message;

    switch (message.parameter) {
      case NinebotZBmsParam.SERIAL:
        this.parseBmsSerial(bms, data);
        this.advance(first ? NinebotZStage.BMS1_SN : NinebotZStage.BMS2_SN, first ? NinebotZStage.BMS1_LIFE : NinebotZStage.BMS2_LIFE);
        break;
      case NinebotZBmsParam.LIFE:
        this.parseBmsLife(bms, data);
        this.advance(first ? NinebotZStage.BMS1_LIFE : NinebotZStage.BMS2_LIFE, first ? NinebotZStage.BMS1_CELLS : NinebotZStage.BMS2_CELLS);
        break;
      case NinebotZBmsParam.CELLS:
        this.parseBmsCells(bms, data);
        this.advance(first ? NinebotZStage.BMS1_CELLS : NinebotZStage.BMS2_CELLS, first ? NinebotZStage.BMS2_SN : NinebotZStage.READY);
        break;
      default:
        break;
    }
  }

  private parseBmsSerial(bms: SmartBms, data: Uint8Array): void {
    if (data.length < 34) return;
    bms.serialNumber = asciiFrom(data, 0, 14);
    bms.versionNumber = [data[15], (data[14] >> 4) & 0x0f, data[14] & 0x0f]
      .map((n) => n.toString(16).toUpperCase())
      .join('.');
    bms.factoryCap = shortFromBytesLE(data, 16);
    bms.actualCap = shortFromBytesLE(data, 18);
    bms.fullCycles = shortFromBytesLE(data, 22);
    bms.chargeCount = shortFromBytesLE(data, 24);
    bms.mfgDateStr = formatBmsDate(shortFromBytesLE(data, 32));
  }

  private parseBmsLife(bms: SmartBms, data: Uint8Array): void {
    if (data.length < 24) return;
    bms.status = shortFromBytesLE(data, 0);
    bms.remCap = shortFromBytesLE(data, 2);
    bms.remPerc = shortFromBytesLE(data, 4);
    bms.current = signedShortFromBytesLE(data, 6) / 100;
    bms.voltage = shortFromBytesLE(data, 8) / 100;
    bms.temp1 = data[10] - 20;
    bms.temp2 = data[11] - 20;
    bms.balanceMap = shortFromBytesLE(data, 12);
    bms.health = shortFromBytesLE(data, 22);
  }

  private parseBmsCells(bms: SmartBms, data: Uint8Array): void {
    if (data.length < 32) return;
    for (let i = 0; i < 16; i++) {
      setCell(bms, i, shortFromBytesLE(data, i * 2) / 1000);
    }
    let cellCount = NINEBOT_Z_CELLS;
    if (bms.cells[14] > 0) cellCount = 15;
    if (bms.cells[15] > 0) cellCount = 16;
    updateCellStats(bms, cellCount);
  }

  isReady(): boolean {
    return this.handshakeDone && this.liveVoltage > 0 && this.model !== '';
  }

  reset(): void {
    this.unpacker.reset();
    this.gamma = emptyGamma();
    this.stage = NinebotZStage.INIT;
    this.handshakeDone = false;
    this.bmsReadingMode = false;
    this.liveVoltage = 0;
    this.model = '';
    this.bms1 = createSmartBms();
    this.bms2 = createSmartBms();
    this.alarms = 0;
    this.driveFlags = 0;
  }

  getInitCommands(): WheelCommand[] {
    return [sendBytes(this.encode(STAGE_REQUESTS[NinebotZStage.INIT]))];
  }

  getKeepAliveCommand(): WheelCommand | null {
    if (BMS_STAGES.includes(this.stage) && !this.bmsReadingMode) {
      return null;
    }
    return sendBytes(this.encode(STAGE_REQUESTS[this.stage]));
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    const request = this.commandRequest(command);
    return request ? [sendBytes(this.encode(request))] : [];
  }

  private commandRequest(command: WheelCommand): Request | null {
    switch (command.type) {
      case 'SetLock':
        return write(NinebotZParam.LOCK_MODE, shortLE(command.locked ? 1 : 0));
      case 'SetLimitedMode':
        return write(NinebotZParam.LIMITED_MODE, shortLE(command.enabled ? 1 : 0));
      case 'SetLimitedSpeed':
        return write(NinebotZParam.LIMIT_MODE_SPEED, shortLE(command.speed * 100));
      case 'SetAlarmEnabled': {
        if (command.num < 1 || command.num > 3) return null;
        const bit = 1 << (command.num - 1);
        this.alarms = command.enabled ? this.alarms | bit : this.alarms & ~bit;
        return write(NinebotZParam.ALARMS, shortLE(this.alarms));
      }
      case 'SetAlarmSpeed':
        if (command.num < 1 || command.num > 3) return null;
        return write(NinebotZParam.ALARM1_SPEED + command.num - 1, shortLE(command.speed * 100));
      case 'SetLedMode':
        return write(NinebotZParam.LED_MODE, shortLE(command.mode));
      case 'SetLedColor':
        if (command.ledNum < 1 || command.ledNum > 4) return null;
        return write(NinebotZParam.LED_COLOR1 + (command.ledNum - 1) * 2, bytesOf(0, 0, command.value, 0));
      case 'SetPedalSensitivity':
        return write(NinebotZParam.PEDAL_SENSITIVITY, shortLE(command.sensitivity));
      case 'SetDrl':
        return this.driveFlagWrite(DRIVE_FLAG.DRL, command.enabled);
      case 'SetTailLight':
        return this.driveFlagWrite(DRIVE_FLAG.TAIL_LIGHT, command.enabled);
      case 'SetHandleButton':
        return this.driveFlagWrite(DRIVE_FLAG.HANDLE_BUTTON, command.enabled);
      case 'SetBrakeAssist':
        return this.driveFlagWrite(DRIVE_FLAG.BRAKE_ASSIST, command.enabled);
      case 'SetSpeakerVolume':
        return write(NinebotZParam.SPEAKER_VOLUME, shortLE(command.volume << 3));
      case 'Calibrate':
        return write(NinebotZParam.CALIBRATION, shortLE(1));
      default:
        return null;
    }
  }

  private driveFlagWrite(bit: number, enabled: boolean): Request {
    this.driveFlags = enabled ? this.driveFlags | bit : this.driveFlags & ~bit;
    return write(NinebotZParam.DRIVE_FLAGS, shortLE(this.driveFlags));
  }

  private encode(request: Request): Uint8Array {
    const body = concatBytes(
      bytesOf(request.data.length, NinebotZAddr.APP, request.destination, request.command, request.parameter),
      request.data
    );
    return sealNinebotFrame(NINEBOT_Z_FRAMING.header, body, this.gamma);
  }
}
