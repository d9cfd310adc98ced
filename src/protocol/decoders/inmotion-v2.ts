/**
 * Inmotion V2 protocol decoder (V9, V11, V11y, V12, V13, V14).
 *
 * The app requests car type, serial and versions with "initial" messages,
 * then polls real-time info. The real-time layout depends on the model, and
 * for the V11 also on the main board firmware.
 */

import { sendBytes, sendDelayed, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  asciiFrom,
  bytesOf,
  intFromBytesLE,
  intFromBytesRevLE,
  shortFromBytesLE,
  signedShortFromBytesLE,
  toHex,
} from '../../utils/bytes';
import modelTable from '../data/inmotion-v2-models.json';
import { decodeFrames, guardDecode, type DecodedData, type FrameOutcome, type WheelDecoder } from '../decoder';
import { InmotionV2Unpacker } from '../unpackers/inmotion-v2-unpacker';

const TAG = 'InmotionV2Decoder';

/** Real-time field layout a model reports. */
export type InmotionV2Layout = 'v11' | 'v11y' | 'v12' | 'v13' | 'v14' | 'none';

export interface InmotionV2Model {
  key: string;
  /** series * 10 + type, as reported in the car-type reply */
  id: number;
  name: string;
  maxSpeed: number;
  cells: number;
  layout: InmotionV2Layout;
}

const LAYOUTS: readonly InmotionV2Layout[] = ['v11', 'v11y', 'v12', 'v13', 'v14', 'none'];

function isLayout(value: string): value is InmotionV2Layout {
  return LAYOUTS.some((l) => l === value);
}

const MODELS: readonly InmotionV2Model[] = modelTable.models.map((row) => ({
  ...row,
  layout: isLayout(row.layout) ? row.layout : 'none',
}));

const UNKNOWN_MODEL: InmotionV2Model = MODELS.find((m) => m.key === modelTable.fallback) ?? {
  key: 'UNKNOWN',
  id: 0,
  name: 'Inmotion Unknown',
  maxSpeed: 100,
  cells: 20,
  layout: 'none',
};

export function findInmotionV2Model(series: number, type: number): InmotionV2Model {
  const id = series * 10 + type;
  return MODELS.find((m) => m.id === id) ?? UNKNOWN_MODEL;
}

export enum InmotionV2Flag {
  INITIAL = 0x11,
  DEFAULT = 0x14,
}

export enum InmotionV2Command {
  MAIN_VERSION = 0x01,
  MAIN_INFO = 0x02,
  DIAGNOSTIC = 0x03,
  REAL_TIME_INFO = 0x04,
  BATTERY_REAL_TIME_INFO = 0x05,
  SOMETHING1 = 0x10,
  TOTAL_STATS = 0x11,
  SETTINGS = 0x20,
  CONTROL = 0x60,
}

/** Setting keys carried in the first byte of a control message. */
export const CONTROL_KEY = {
  MAX_SPEED: 0x21,
  PEDAL_TILT: 0x22,
  RIDE_MODE: 0x23,
  FANCIER_MODE: 0x24,
  PEDAL_SENSITIVITY: 0x25,
  VOLUME: 0x26,
  LIGHT_BRIGHTNESS: 0x2b,
  MUTE: 0x2c,
  DRL: 0x2d,
  HANDLE_BUTTON: 0x2e,
  LOCK: 0x31,
  TRANSPORT_MODE: 0x32,
  GO_HOME_MODE: 0x37,
  FAN_QUIET: 0x38,
  CALIBRATION: 0x42,
  FAN: 0x43,
  LIGHT: 0x50,
  PLAY_BEEP: 0x51,
  POWER_OFF: 0x81,
} as const;

export interface InmotionV2Message {
  flags: number;
  len: number;
  command: number;
  data: Uint8Array;
}

/**
 * Verify the XOR check byte and split a reassembled frame.
 */
export function parseInmotionV2Frame(frame: Uint8Array): InmotionV2Message | null {
  const size = frame.length;
  if (size < 5) return null;

  let check = 0;
  for (let i = 2; i < size - 1; i++) {
    check ^= frame[i];
  }
  if (check !== frame[size - 1]) return null;

  const len = frame[3];
  const data = len > 1 && size > 5 ? frame.slice(5, Math.min(5 + len - 1, size)) : new Uint8Array(0);
  return { flags: frame[2], len, command: frame[4] & 0x7f, data };
}

/**
 * Frame a message: header, escaped body, unescaped XOR check.
 */
export function encodeInmotionV2Message(flags: number, command: number, data: Uint8Array): Uint8Array {
  const body = [flags, data.length + 1, command, ...data];
  let check = 0;
  const out = [0xaa, 0xaa];
  for (const byte of body) {
    check ^= byte;
    if (byte === 0xaa || byte === 0xa5) {
      out.push(0xa5);
    }
    out.push(byte);
  }
  out.push(check & 0xff);
  return Uint8Array.from(out);
}

function control(...data: number[]): Uint8Array {
  return encodeInmotionV2Message(InmotionV2Flag.DEFAULT, InmotionV2Command.CONTROL, bytesOf(...data));
}

function flag(enabled: boolean): number {
  return enabled ? 1 : 0;
}

/** Temperatures are offset by 80 and stored in one unsigned byte. */
function temperatureAt(data: Uint8Array, offset: number): number {
  return data[offset] + 80 - 256;
}

function modeText(motor: number, charging: number, lifted: number): string {
  const parts: string[] = [];
  if ((motor >> 6) & 1) parts.push('Active');
  if ((charging >> 7) & 1) parts.push('Charging');
  if ((lifted >> 2) & 1) parts.push('Lifted');
  return parts.join(' ');
}

/** Motor state from the byte at `index` and lift state from `index + liftOffset`. */
function modeStringAt(data: Uint8Array, index: number, liftOffset: number, minExtra: number): string {
  if (data.length <= index + minExtra) return '';
  const state = data[index];
  return modeText(state, state, data[index + liftOffset]);
}

const ERROR_BITS: readonly (readonly (string | null)[])[] = [
  [
    'err_iPhaseSensorState',
    'err_iBusSensorState',
    'err_motorHallState',
    'err_batteryState',
    'err_imuSensorState',
    'err_controllerCom1State',
    'err_controllerCom2State',
    'err_bleCom1State',
  ],
  [
    'err_bleCom2State',
    'err_mosTempSensorState',
    'err_motorTempSensorState',
    'err_batteryTempSensorState',
    'err_boardTempSensorState',
    'err_fanState',
    'err_rtcState',
    'err_externalRomState',
  ],
  ['err_vBusSensorState', 'err_vBatterySensorState', 'err_canNotPowerOffState', 'err_notKnown1'],
  // byte 3 is decoded separately: it carries two 2-bit levels
  [],
  [
    'err_batteryTempState',
    'err_overBoardTempState',
    'err_overSpeedState',
    'err_outputSaturationState',
    'err_motorSpinState',
    'err_motorBlockState',
    'err_postureState',
    'err_riskBehaviourState',
  ],
  [
    'err_motorNoLoadState',
    'err_noSelfTestState',
    'err_compatibilityState',
    'err_powerKeyLongPressState',
    'err_forceDfuState',
    'err_deviceLockState',
    'err_cpuOverTempState',
    'err_imuOverTempState',
  ],
  [null, 'err_hwCompatibilityState', 'err_fanLowSpeedState', 'err_notKnown2'],
];

/**
 * Space-separated names of the error flags set in the seven bytes at `index`.
 */
export function inmotionV2ErrorText(data: Uint8Array, index: number): string {
  if (data.length < index + 7) return '';
  const names: string[] = [];

  ERROR_BITS.forEach((bits, byteIndex) => {
    const value = data[index + byteIndex];
    if (byteIndex === 3) {
      if (value & 0x01) names.push('err_underVoltageState');
      if ((value >> 1) & 0x01) names.push('err_overVoltageState');
      const overBusCurrent = (value >> 2) & 0x03;
      if (overBusCurrent) names.push(`err_overBusCurrentState-${overBusCurrent}`);
      const lowBattery = (value >> 4) & 0x03;
      if (lowBattery) names.push(`err_lowBatteryState-${lowBattery}`);
      if ((value >> 6) & 0x01) names.push('err_mosTempState');
      if ((value >> 7) & 0x01) names.push('err_motorTempState');
      return;
    }
    bits.forEach((name, bit) => {
      if (name && (value >> bit) & 0x01) names.push(name);
    });
  });

  return names.join(' ');
}

/** Offsets of one real-time layout. */
interface RealTimeLayout {
  minSize: number;
  speed: number;
  torque: number;
  pwm: number;
  batPower: number;
  motPower: number;
  pitch: number;
  roll: number;
  speedLimit: number;
  currentLimit: number;
  mosTemp: number;
  temp2: number;
  cpuTemp: number;
  imuTemp: number;
  mileage: (data: Uint8Array) => number;
  battery: (data: Uint8Array) => number;
  mode: (data: Uint8Array) => string;
  /** Start of the seven error bytes. */
  error: number | ((data: Uint8Array) => number);
  unsignedPwm?: boolean;
}

const dualPackBattery = (data: Uint8Array): number =>
  Math.round((shortFromBytesLE(data, 34) + shortFromBytesLE(data, 36)) / 200);

/** The legacy V11 frame grew two bytes in later firmware. */
const legacyStateIndex = (data: Uint8Array): number => (data.length < 49 ? 36 : 38);

const V11_LEGACY: RealTimeLayout = {
  minSize: 38,
  speed: 4,
  torque: 6,
  pwm: 36,
  batPower: 8,
  motPower: 10,
  pitch: 22,
  roll: 26,
  speedLimit: 28,
  currentLimit: 30,
  mosTemp: 17,
  temp2: 20,
  cpuTemp: 34,
  imuTemp: 35,
  mileage: (d) => shortFromBytesLE(d, 12) * 10,
  battery: (d) => d[16] & 0x7f,
  mode: (d) => modeStringAt(d, legacyStateIndex(d), 1, 1),
  error: (d) => legacyStateIndex(d) + 5,
  unsignedPwm: true,
};

const V11: RealTimeLayout = {
  minSize: 57,
  speed: 4,
  torque: 6,
  pwm: 8,
  batPower: 10,
  motPower: 12,
  pitch: 16,
  roll: 20,
  speedLimit: 34,
  currentLimit: 36,
  mosTemp: 42,
  temp2: 45,
  cpuTemp: 46,
  imuTemp: 47,
  mileage: (d) => shortFromBytesLE(d, 26) * 10,
  battery: (d) => Math.round(shortFromBytesLE(d, 28) / 100),
  mode: (d) => modeStringAt(d, 56, 1, 1),
  error: 61,
};

const V12: RealTimeLayout = {
  minSize: 60,
  speed: 4,
  torque: 6,
  pwm: 8,
  batPower: 10,
  motPower: 12,
  pitch: 16,
  roll: 20,
  speedLimit: 30,
  currentLimit: 32,
  mosTemp: 40,
  temp2: 41,
  cpuTemp: 44,
  imuTemp: 45,
  mileage: (d) => shortFromBytesLE(d, 22) * 10,
  battery: (d) => Math.round(shortFromBytesLE(d, 24) / 100),
  mode: (d) => modeStringAt(d, 54, 1, 1),
  error: 59,
};

const V13: RealTimeLayout = {
  minSize: 77,
  speed: 8,
  torque: 18,
  pwm: 14,
  batPower: 16,
  motPower: 22,
  pitch: 6,
  roll: 24,
  speedLimit: 40,
  currentLimit: 50,
  mosTemp: 58,
  temp2: 59,
  cpuTemp: 62,
  imuTemp: 63,
  mileage: (d) => intFromBytesRevLE(d, 10),
  battery: dualPackBattery,
  mode: (d) => modeStringAt(d, 74, 1, 1),
  error: 76,
};

const V14: RealTimeLayout = {
  minSize: 78,
  speed: 8,
  torque: 12,
  pwm: 14,
  batPower: 16,
  motPower: 18,
  pitch: 20,
  roll: 22,
  speedLimit: 40,
  currentLimit: 50,
  mosTemp: 58,
  temp2: 59,
  cpuTemp: 62,
  imuTemp: 63,
  mileage: (d) => shortFromBytesLE(d, 28) * 10,
  battery: dualPackBattery,
  mode: (d) => modeStringAt(d, 74, 2, 2),
  error: 77,
};

const V11Y: RealTimeLayout = {
  ...V14,
  mode: (d) => modeStringAt(d, 74, 1, 2),
};

export class InmotionV2Decoder implements WheelDecoder {
  readonly wheelType = WheelType.INMOTION_V2;
  readonly keepAliveIntervalMs = 25;

  private readonly unpacker = new InmotionV2Unpacker();
  private model = UNKNOWN_MODEL;
  private modelDetected = false;
  private protoVer = 0;
  private version = '';

  get currentModel(): InmotionV2Model {
    return this.model;
  }

  /** Real-time format revision; only meaningful for the V11. */
  get protocolVersion(): number {
    return this.protoVer;
  }

  decode(data: Uint8Array, state: WheelState, _config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () =>
      decodeFrames(TAG, data, this.unpacker, state, (frame, s) => {
        const msg = parseInmotionV2Frame(frame);
        if (!msg) {
          console.debug(`[${TAG}] Dropped frame with bad check byte`);
          return null;
        }
        return this.processMessage(msg, s);
      })
    );
  }

  private processMessage(msg: InmotionV2Message, state: WheelState): FrameOutcome | null {
    if (msg.flags === InmotionV2Flag.INITIAL) {
      return msg.command === InmotionV2Command.MAIN_INFO ? this.processMainInfo(msg, state) : null;
    }
    if (msg.flags !== InmotionV2Flag.DEFAULT) {
      return null;
    }

    switch (msg.command) {
      case InmotionV2Command.TOTAL_STATS:
        if (msg.data.length < 20) return null;
        return { state: updateWheelState(state, { totalDistance: intFromBytesLE(msg.data, 0) * 10 }) };
      case InmotionV2Command.REAL_TIME_INFO:
        return this.processRealTime(msg.data, state);
      case InmotionV2Command.CONTROL:
        console.debug(`[${TAG}] Control reply ${toHex(msg.data)}`);
        return null;
      default:
        // settings, diagnostics and battery pages carry nothing the state holds
        return null;
    }
  }

  private processMainInfo(msg: InmotionV2Message, state: WheelState): FrameOutcome | null {
    const data = msg.data;
    if (data.length === 0) return null;

    switch (data[0]) {
      case 0x01: {
        if (msg.len < 6 || data.length < 4) break;
        this.model = findInmotionV2Model(data[2], data[3]);
        this.modelDetected = true;
        console.log(`[${TAG}] Detected model ${this.model.name}`);
        return { state: updateWheelState(state, { model: this.model.name, wheelType: WheelType.INMOTION_V2 }) };
      }
      case 0x02: {
        if (msg.len < 17 || data.length < 17) break;
        return { state: updateWheelState(state, { serialNumber: asciiFrom(data, 1, 16) }) };
      }
      case 0x06: {
        if (msg.len < 24 || data.length < 24) break;
        const driver = `${data[5]}.${data[4]}.${shortFromBytesLE(data, 2)}`;
        const main = `${data[14]}.${data[13]}.${shortFromBytesLE(data, 11)}`;
        const ble = `${data[23]}.${data[22]}.${shortFromBytesLE(data, 20)}`;
        this.version = `Main:${main} Drv:${driver} BLE:${ble}`;
        this.protoVer = 0;
        if (this.model.key === 'V11') {
          this.protoVer = data[14] < 2 && data[13] < 4 ? 1 : 2;
        }
        return { state: updateWheelState(state, { version: this.version }) };
      }
      default:
        break;
    }
    return null;
  }

  private layoutFor(): RealTimeLayout | null {
    switch (this.model.layout) {
      case 'v11':
        return this.protoVer < 2 ? V11_LEGACY : V11;
      case 'v11y':
        return V11Y;
      case 'v12':
        return V12;
      case 'v13':
        return V13;
      case 'v14':
        return V14;
      default:
        return null;
    }
  }

  private processRealTime(data: Uint8Array, state: WheelState): FrameOutcome | null {
    const layout = this.layoutFor();
    if (!layout || data.length < layout.minSize) return null;

    const voltage = shortFromBytesLE(data, 0);
    const modeStr = layout.mode(data);
    const errorIndex = typeof layout.error === 'number' ? layout.error : layout.error(data);
    const alert = inmotionV2ErrorText(data, errorIndex);

    return {
      state: updateWheelState(state, {
        voltage,
        current: signedShortFromBytesLE(data, 2),
        speed: signedShortFromBytesLE(data, layout.speed),
        torque: signedShortFromBytesLE(data, layout.torque) / 100,
        motorPower: signedShortFromBytesLE(data, layout.motPower),
        power: signedShortFromBytesLE(data, layout.batPower) * 100,
        wheelDistance: layout.mileage(data),
        batteryLevel: layout.battery(data),
        temperature: temperatureAt(data, layout.mosTemp) * 100,
        temperature2: temperatureAt(data, layout.temp2) * 100,
        angle: signedShortFromBytesLE(data, layout.pitch) / 100,
        roll: signedShortFromBytesLE(data, layout.roll) / 100,
        speedLimit: shortFromBytesLE(data, layout.speedLimit) / 100,
        currentLimit: shortFromBytesLE(data, layout.currentLimit) / 100,
        cpuTemp: temperatureAt(data, layout.cpuTemp),
        imuTemp: temperatureAt(data, layout.imuTemp),
        output: layout.unsignedPwm ? shortFromBytesLE(data, layout.pwm) : signedShortFromBytesLE(data, layout.pwm),
        modeStr,
        alert,
        model: this.model.name,
        wheelType: WheelType.INMOTION_V2,
      }),
      hasNewData: true,
    };
  }

  isReady(): boolean {
    return this.modelDetected && this.version !== '';
  }

  reset(): void {
    this.unpacker.reset();
    this.model = UNKNOWN_MODEL;
    this.modelDetected = false;
    this.protoVer = 0;
    this.version = '';
  }

  /** Car type, serial, versions, settings and totals, 100 ms apart. */
  getInitCommands(): WheelCommand[] {
    const { INITIAL, DEFAULT } = InmotionV2Flag;
    return [
      sendBytes(encodeInmotionV2Message(INITIAL, InmotionV2Command.MAIN_INFO, bytesOf(0x01))),
      sendDelayed(encodeInmotionV2Message(INITIAL, InmotionV2Command.MAIN_INFO, bytesOf(0x02)), 100),
      sendDelayed(encodeInmotionV2Message(INITIAL, InmotionV2Command.MAIN_INFO, bytesOf(0x06)), 100),
      sendDelayed(encodeInmotionV2Message(DEFAULT, InmotionV2Command.SETTINGS, bytesOf(0x20)), 100),
      sendDelayed(encodeInmotionV2Message(DEFAULT, InmotionV2Command.TOTAL_STATS, new Uint8Array(0)), 100),
    ];
  }

  getKeepAliveCommand(): WheelCommand {
    return sendBytes(
      encodeInmotionV2Message(InmotionV2Flag.DEFAULT, InmotionV2Command.REAL_TIME_INFO, new Uint8Array(0))
    );
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    const bytes = this.commandBytes(command);
    return bytes ? [sendBytes(bytes)] : [];
  }

  private commandBytes(command: WheelCommand): Uint8Array | null {
    const key = CONTROL_KEY;
    switch (command.type) {
      case 'SetLight':
        return control(key.LIGHT, flag(command.enabled));
      case 'SetLock':
        return control(key.LOCK, flag(command.locked));
      case 'Beep':
        return control(key.PLAY_BEEP, 0x18, 0x01);
      case 'SetFan':
        return control(key.FAN, flag(command.enabled));
      case 'SetFanQuiet':
        return control(key.FAN_QUIET, flag(command.enabled));
      case 'SetMute':
        // the wheel stores "sound on"
        return control(key.MUTE, flag(!command.enabled));
      case 'SetDrl':
        return control(key.DRL, flag(command.enabled));
      case 'SetHandleButton':
        // the wheel stores "button disabled"
        return control(key.HANDLE_BUTTON, flag(!command.enabled));
      case 'SetRideMode':
        return control(key.RIDE_MODE, flag(command.enabled));
      case 'SetGoHomeMode':
        return control(key.GO_HOME_MODE, flag(command.enabled));
      case 'SetFancierMode':
        return control(key.FANCIER_MODE, flag(command.enabled));
      case 'SetTransportMode':
        return control(key.TRANSPORT_MODE, flag(command.enabled));
      case 'SetMaxSpeed': {
        const value = command.speed * 100;
        return control(key.MAX_SPEED, value & 0xff, (value >> 8) & 0xff);
      }
      case 'SetPedalTilt': {
        const value = command.angle * 10;
        return control(key.PEDAL_TILT, value & 0xff, (value >> 8) & 0xff);
      }
      case 'SetPedalSensitivity':
        return control(key.PEDAL_SENSITIVITY, command.sensitivity & 0xff, 0x64);
      case 'SetSpeakerVolume':
        return control(key.VOLUME, command.volume & 0xff);
      case 'SetLightBrightness':
        return control(key.LIGHT_BRIGHTNESS, command.brightness & 0xff);
      case 'PowerOff':
        return control(key.POWER_OFF, 0x00);
      case 'Calibrate':
        return control(key.CALIBRATION, 0x01, 0x00, 0x01);
      default:
        return null;
    }
  }
}
