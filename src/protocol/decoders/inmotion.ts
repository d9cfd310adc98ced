/**
 * Inmotion V1 protocol decoder (V5, V8, V10, Glide 3, R-series, L6).
 *
 * Messages are CAN frames tunnelled over BLE. The app polls with a fast-info
 * request; the slow-info reply identifies the model, serial and firmware and
 * carries the ride settings. Telemetry layouts differ by model family, which
 * the model table in `inmotion-models.json` describes.
 */

import { sendBytes, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  asciiBytes,
  bytesOf,
  intFromBytesLE,
  longFromBytesLE,
  shortFromBytesLE,
  signedByteAt,
  signedIntFromBytesLE,
} from '../../utils/bytes';
import { inmotionBatteryPercent, type InmotionBatteryGroup } from '../battery';
import modelTable from '../data/inmotion-models.json';
import { decodeFrames, guardDecode, type DecodedData, type FrameOutcome, type WheelDecoder } from '../decoder';
import { InmotionUnpacker } from '../unpackers/inmotion-unpacker';

const TAG = 'InmotionDecoder';

/** How the total distance counter is encoded. */
export type InmotionDistanceEncoding = 'int' | 'long' | 'long100' | 'scaled';

export interface InmotionModel {
  key: string;
  /** Model code reported in slow info. */
  id: string;
  name: string;
  speedFactor: number;
  battery: InmotionBatteryGroup;
  distance: InmotionDistanceEncoding;
  /** Newer firmware reports an upper-nibble work mode and no roll. */
  modernWorkMode: boolean;
  maxSpeed: number;
  led: boolean;
}

const BATTERY_GROUPS: readonly InmotionBatteryGroup[] = ['r1', 'v8', 'v10', 'l6', 'standard'];
const DISTANCE_ENCODINGS: readonly InmotionDistanceEncoding[] = ['int', 'long', 'long100', 'scaled'];

function isBatteryGroup(value: string): value is InmotionBatteryGroup {
  return BATTERY_GROUPS.some((g) => g === value);
}

function isDistanceEncoding(value: string): value is InmotionDistanceEncoding {
  return DISTANCE_ENCODINGS.some((d) => d === value);
}

const MODELS: readonly InmotionModel[] = modelTable.models.map((row) => ({
  ...row,
  battery: isBatteryGroup(row.battery) ? row.battery : 'standard',
  distance: isDistanceEncoding(row.distance) ? row.distance : 'scaled',
}));

const FALLBACK_MODEL = MODELS.find((m) => m.key === modelTable.fallback);

/** Scale of the raw odometer on older R-series firmware. */
const DISTANCE_SCALE = 5.711016379455429e7;

export function findInmotionModel(id: string): InmotionModel | undefined {
  return MODELS.find((m) => m.id === id);
}

/**
 * Message IDs (little-endian on the wire).
 */
export enum InmotionId {
  NO_OP = 0,
  GET_FAST_INFO = 0x0f550113,
  GET_SLOW_INFO = 0x0f550114,
  RIDE_MODE = 0x0f550115,
  REMOTE_CONTROL = 0x0f550116,
  CALIBRATION = 0x0f550119,
  PIN_CODE = 0x0f550307,
  LIGHT = 0x0f55010d,
  HANDLE_BUTTON = 0x0f55012e,
  SPEAKER_VOLUME = 0x0f55060a,
  PLAY_SOUND = 0x0f550609,
  ALERT = 0x0f780101,
}

/** Decoded CAN message. */
export interface InmotionMessage {
  id: number;
  data: Uint8Array;
  len: number;
  ch: number;
  format: number;
  type: number;
  exData?: Uint8Array;
}

function checksum(data: Uint8Array): number {
  let check = 0;
  for (const byte of data) {
    check = (check + byte) & 0xff;
  }
  return check;
}

/**
 * Validate header, footer and checksum, then split the CAN fields.
 */
export function parseInmotionFrame(frame: Uint8Array): InmotionMessage | null {
  const size = frame.length;
  if (size < 5) return null;
  if (frame[0] !== 0xaa || frame[1] !== 0xaa || frame[size - 1] !== 0x55 || frame[size - 2] !== 0x55) {
    return null;
  }
  const dataEnd = size - 3;
  const body = frame.subarray(2, dataEnd);
  if (checksum(body) !== frame[dataEnd] || body.length < 16) {
    return null;
  }

  const data = body.slice(4, 12);
  const message: InmotionMessage = {
    id: intFromBytesLE(body, 0),
    data,
    len: body[12],
    ch: body[13],
    format: body[14] === 0 ? 0 : 1,
    type: body[15] === 0 ? 0 : 1,
  };
  if (message.len === 0xfe) {
    const extLen = intFromBytesLE(data, 0);
    if (extLen === body.length - 16) {
      message.exData = body.slice(16, 16 + extLen);
    }
  }
  return message;
}

/**
 * Serialise a CAN message with escaping, checksum and footer.
 */
export function encodeInmotionMessage(message: InmotionMessage): Uint8Array {
  const id = message.id >>> 0;
  const body = [id & 0xff, (id >>> 8) & 0xff, (id >>> 16) & 0xff, (id >>> 24) & 0xff, ...message.data];
  body.push(message.len, message.ch, message.format === 0 ? 0 : 1, message.type === 0 ? 0 : 1);
  if (message.len === 0xfe && message.exData) {
    body.push(...message.exData);
  }

  const out = [0xaa, 0xaa];
  for (const byte of body) {
    if (byte === 0xaa || byte === 0x55 || byte === 0xa5) {
      out.push(0xa5);
    }
    out.push(byte);
  }
  out.push(checksum(Uint8Array.from(body)), 0x55, 0x55);
  return Uint8Array.from(out);
}

function message(id: InmotionId, data: Uint8Array, type = 0): Uint8Array {
  return encodeInmotionMessage({ id, data, len: 8, ch: 5, format: 0, type });
}

const ALL_FF = bytesOf(0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff);

function remoteControl(code: number): Uint8Array {
  return message(InmotionId.REMOTE_CONTROL, bytesOf(0xb2, 0, 0, 0, code, 0, 0, 0));
}

/** Ride-mode sub-command with a 16-bit little-endian value. */
function rideModeWrite(sub: number, value: number): Uint8Array {
  return message(InmotionId.RIDE_MODE, bytesOf(sub, 0, 0, 0, value & 0xff, (value >> 8) & 0xff, 0, 0));
}

const LEGACY_WORK_MODES: Readonly<Record<number, string>> = {
  0: 'Idle',
  1: 'Drive',
  2: 'Zero',
  3: 'LargeAngle',
  4: 'Check',
  5: 'Lock',
  6: 'Error',
  7: 'Carry',
  8: 'RemoteControl',
  9: 'Shutdown',
  10: 'PomStop',
  12: 'Unlock',
};

function legacyWorkMode(value: number): string {
  return LEGACY_WORK_MODES[value & 0x0f] ?? 'Unknown';
}

function modernWorkMode(value: number): string {
  const high = value >> 4;
  let result = high === 1 ? 'Shutdown' : high === 2 ? 'Drive' : high === 3 ? 'Charging' : `Unknown code ${high}`;
  if ((value & 0x0f) === 1) {
    result += ' - Engine off';
  }
  return result;
}

/** Human-readable text for an alert message payload. */
export function inmotionAlertText(data: Uint8Array): string {
  const alertId = data[0];
  const value = (data[3] << 8) | data[2];
  const value2 = signedIntFromBytesLE(data, 4);
  const speed = Math.abs((value2 / 3812) * 3.6);
  const fmt = (n: number): string => n.toFixed(2);

  switch (alertId) {
    case 0x05:
      return `Start from tilt angle ${fmt(value / 100)} at speed ${fmt(speed)}`;
    case 0x06:
      return `Tiltback at speed ${fmt(speed)} at limit ${fmt(value / 1000)}`;
    case 0x19:
      return 'Fall Down';
    case 0x20:
      return `Low battery at voltage ${fmt(value2 / 100)}`;
    case 0x21:
      return `Speed cut-off at speed ${fmt(speed)} and something ${fmt(value / 10)}`;
    case 0x26:
      return `High load at speed ${fmt(speed)} and current ${fmt(value / 1000)}`;
    case 0x1d:
      return `Please repair: bad battery cell found. At voltage ${fmt(value2 / 100)}`;
    default:
      return `Unknown Alert: ID=${alertId} value=${value} value2=${value2}`;
  }
}

/** Replies to settings writes: byte 0 is 1 on success. */
const ACK_TEXT = new Map<number, readonly [string, string]>([
  [InmotionId.CALIBRATION, ['Calibration success', 'Calibration failed']],
  [InmotionId.RIDE_MODE, ['Ride mode changed', 'Ride mode change failed']],
  [InmotionId.LIGHT, ['Light toggled', 'Light toggle failed']],
  [InmotionId.HANDLE_BUTTON, ['Handle button setting changed', 'Handle button setting failed']],
  [InmotionId.SPEAKER_VOLUME, ['Speaker volume changed', 'Speaker volume change failed']],
]);

export class InmotionDecoder implements WheelDecoder {
  readonly wheelType = WheelType.INMOTION;
  readonly keepAliveIntervalMs = 250;

  private readonly unpacker = new InmotionUnpacker();
  private model: InmotionModel | undefined;
  private needSlowData = true;
  private password = '';
  private passwordSent = false;
  private liveVoltage = 0;

  /** Detected model, if slow info has arrived. */
  get currentModel(): InmotionModel | undefined {
    return this.model;
  }

  /** Top speed (km/h) the detected model accepts. */
  get maxSpeed(): number {
    return this.model?.maxSpeed ?? 70;
  }

  get hasLedSupport(): boolean {
    return this.model?.led ?? false;
  }

  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () => {
      if (config.wheelPassword !== this.password) {
        this.password = config.wheelPassword;
        this.passwordSent = false;
      }
      return decodeFrames(TAG, data, this.unpacker, state, (frame, s) => {
        const msg = parseInmotionFrame(frame);
        return msg ? this.processMessage(msg, s, config) : null;
      });
    });
  }

  private processMessage(msg: InmotionMessage, state: WheelState, config: DecoderConfig): FrameOutcome | null {
    switch (msg.id) {
      case InmotionId.GET_FAST_INFO:
        return this.parseFastInfo(msg, state, config);

      case InmotionId.ALERT: {
        const alert = inmotionAlertText(msg.data);
        console.log(`[${TAG}] ${alert}`);
        return { state: updateWheelState(state, { alert }) };
      }

      case InmotionId.GET_SLOW_INFO:
        return this.parseSlowInfo(msg, state);

      case InmotionId.PIN_CODE:
        console.log(`[${TAG}] PIN code accepted`);
        return null;

      default: {
        const texts = ACK_TEXT.get(msg.id);
        if (texts) {
          console.log(`[${TAG}] ${msg.data[0] === 1 ? texts[0] : texts[1]}`);
        }
        return null;
      }
    }
  }

  private parseFastInfo(msg: InmotionMessage, state: WheelState, config: DecoderConfig): FrameOutcome | null {
    const ex = msg.exData;
    if (!ex) return null;
    const model = this.model ?? FALLBACK_MODEL;
    if (!model) return null;

    const angle = signedIntFromBytesLE(ex, 0) / 65536;
    let roll = signedIntFromBytesLE(ex, 72) / 90;
    const motor1 = signedIntFromBytesLE(ex, 12);
    const motor2 = signedIntFromBytesLE(ex, 16);
    const speed = Math.abs((motor1 + motor2) / (model.speedFactor * 2));
    const voltage = intFromBytesLE(ex, 24);
    const current = signedIntFromBytesLE(ex, 20);

    let totalDistance: number;
    switch (model.distance) {
      case 'int':
        totalDistance = intFromBytesLE(ex, 44);
        break;
      case 'long':
        totalDistance = longFromBytesLE(ex, 44);
        break;
      case 'long100':
        totalDistance = longFromBytesLE(ex, 44) * 100;
        break;
      default:
        totalDistance = Math.trunc(longFromBytesLE(ex, 44) / DISTANCE_SCALE);
        break;
    }

    const workModeValue = signedIntFromBytesLE(ex, 60);
    let modeStr: string;
    if (model.modernWorkMode) {
      roll = 0;
      modeStr = modernWorkMode(workModeValue);
    } else {
      modeStr = legacyWorkMode(workModeValue);
    }

    this.liveVoltage = voltage;

    return {
      state: updateWheelState(state, {
        angle,
        roll,
        speed: Math.round(speed * 360),
        voltage,
        batteryLevel: inmotionBatteryPercent(voltage, model.battery, config.useCustomPercents),
        current,
        power: Math.round((current / 100) * voltage),
        totalDistance,
        wheelDistance: intFromBytesLE(ex, 48),
        temperature: signedByteAt(ex, 32) * 100,
        imuTemp: signedByteAt(ex, 34),
        modeStr,
        wheelType: WheelType.INMOTION,
      }),
      hasNewData: true,
    };
  }

  private parseSlowInfo(msg: InmotionMessage, state: WheelState): FrameOutcome | null {
    const ex = msg.exData;
    if (!ex) return null;
    this.needSlowData = false;

    let detected: InmotionModel | undefined;
    if (ex.length >= 108) {
      const prefix = signedByteAt(ex, 107) > 0 ? String(signedByteAt(ex, 107)) : '';
      detected = findInmotionModel(prefix + String(signedByteAt(ex, 104)));
    }
    const model = detected ?? FALLBACK_MODEL;
    if (!model) return null;
    if (this.model?.key !== model.key) {
      console.log(`[${TAG}] Detected model ${model.name}`);
    }
    this.model = model;

    const version = `${ex[27]}.${ex[26]}.${shortFromBytesLE(ex, 24)}`;
    let serialNumber = '';
    for (let j = 7; j >= 0; j--) {
      serialNumber += ex[j].toString(16).padStart(2, '0').toUpperCase();
    }

    const changes: { -readonly [K in keyof WheelState]?: WheelState[K] } = {
      serialNumber,
      model: model.name,
      version,
      wheelType: WheelType.INMOTION,
      lightMode: ex[80] === 1 ? 1 : 0,
      maxSpeed: Math.trunc(shortFromBytesLE(ex, 60) / 1000),
      pedalTilt: Math.round(signedIntFromBytesLE(ex, 56) / 6553.6),
    };
    if (ex.length > 124) changes.pedalSensitivity = (ex[124] - 28) & 0xff;
    if (ex.length > 126) changes.speakerVolume = Math.trunc(shortFromBytesLE(ex, 125) / 100);
    if (ex.length > 129) changes.handleButton = ex[129] !== 1;
    if (ex.length > 130) changes.ledMode = ex[130] === 1 ? 1 : 0;
    if (ex.length > 132) changes.rideMode = ex[132] === 1;

    return { state: updateWheelState(state, changes) };
  }

  isReady(): boolean {
    return this.model !== undefined && this.liveVoltage > 0;
  }

  reset(): void {
    this.unpacker.reset();
    this.model = undefined;
    this.needSlowData = true;
    this.passwordSent = false;
    this.liveVoltage = 0;
  }

  getInitCommands(): WheelCommand[] {
    return [];
  }

  /**
   * PIN code once (when configured), then slow info until it arrives, then
   * fast info.
   */
  getKeepAliveCommand(): WheelCommand | null {
    if (this.password !== '' && !this.passwordSent) {
      this.passwordSent = true;
      return sendBytes(this.pinCodeMessage(this.password));
    }
    if (this.needSlowData) {
      return sendBytes(message(InmotionId.GET_SLOW_INFO, ALL_FF, 1));
    }
    return sendBytes(message(InmotionId.GET_FAST_INFO, ALL_FF));
  }

  private pinCodeMessage(password: string): Uint8Array {
    const data = new Uint8Array(8);
    data.set(asciiBytes(password).subarray(0, 6));
    return message(InmotionId.PIN_CODE, data);
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    const bytes = this.commandBytes(command);
    return bytes ? [sendBytes(bytes)] : [];
  }

  private commandBytes(command: WheelCommand): Uint8Array | null {
    switch (command.type) {
      case 'SetLight':
        return message(InmotionId.LIGHT, bytesOf(command.enabled ? 1 : 0, 0, 0, 0, 0, 0, 0, 0));
      case 'SetLed':
        return remoteControl(command.enabled ? 0x0f : 0x10);
      case 'Beep':
        return remoteControl(0x11);
      case 'PowerOff':
        return remoteControl(0x05);
      case 'Calibrate':
        return message(InmotionId.CALIBRATION, bytesOf(0x32, 0x54, 0x76, 0x98, 0, 0, 0, 0));
      case 'SetMaxSpeed':
        return rideModeWrite(0x01, command.speed * 1000);
      case 'SetHandleButton':
        return message(InmotionId.HANDLE_BUTTON, bytesOf(command.enabled ? 0 : 1, 0, 0, 0, 0, 0, 0, 0));
      case 'SetSpeakerVolume': {
        const value = command.volume * 100;
        return message(InmotionId.SPEAKER_VOLUME, bytesOf(value & 0xff, (value >> 8) & 0xff, 0, 0, 0, 0, 0, 0));
      }
      case 'SetRideMode':
        return message(InmotionId.RIDE_MODE, bytesOf(0x0a, 0, 0, 0, command.enabled ? 1 : 0, 0, 0, 0));
      case 'SetPedalSensitivity':
        return rideModeWrite(0x06, (command.sensitivity + 28) << 5);
      case 'SetPedalTilt': {
        const tilt = Math.trunc((command.angle * 65536) / 10);
        return message(
          InmotionId.RIDE_MODE,
          bytesOf(0, 0, 0, 0, tilt & 0xff, (tilt >> 8) & 0xff, (tilt >> 16) & 0xff, (tilt >> 24) & 0xff)
        );
      }
      default:
        return null;
    }
  }
}
