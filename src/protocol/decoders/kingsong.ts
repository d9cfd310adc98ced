/**
 * Kingsong protocol decoder.
 *
 * Kingsong wheels push fixed 20-byte frames:
 *
 *   AA 55 [payload:14] [type] [sub] 5A 5A
 *
 * The frame type at byte 16 selects the payload layout. Multi-byte fields are
 * little-endian per 16-bit word, and 32-bit counters are word-swapped.
 * Extended BMS frames (page D0) run past 20 bytes in a single notification.
 */

import {
  cloneSmartBms,
  createSmartBms,
  setCell,
  updateCellStats,
  type SmartBms,
} from '../../models/bms';
import { sendBytes, sendDelayed, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import { asciiFrom, byteAt, getInt2R, getInt4R, signedByteAt } from '../../utils/bytes';
import { batteryPercentForClass, type VoltageClass } from '../battery';
import modelTable from '../data/kingsong-models.json';
import { guardDecode, type DecodedData, type WheelDecoder } from '../decoder';

const TAG = 'KingsongDecoder';

export const KINGSONG_FRAME_SIZE = 20;

/** Distance correction for early KS-18L firmware. */
const KS18L_SCALER = 0.83;

/** Kelvin x 10 offset used by BMS temperature sensors. */
const KELVIN_OFFSET = 2730;

/**
 * Frame types (byte 16).
 */
export enum KingsongFrame {
  LIVE = 0xa9,
  DISTANCE = 0xb9,
  NAME = 0xbb,
  SERIAL = 0xb3,
  CPU_PWM = 0xf5,
  SPEED_LIMIT = 0xf6,
  ALARMS = 0xa4,
  ALARMS_ALT = 0xb5,
  BMS1 = 0xf1,
  BMS2 = 0xf2,
  BMS1_SERIAL = 0xe1,
  BMS2_SERIAL = 0xe2,
  BMS1_FIRMWARE = 0xe5,
  BMS2_FIRMWARE = 0xe6,
}

/**
 * Request types written by the app.
 */
export enum KingsongRequest {
  NAME = 0x9b,
  SERIAL = 0x63,
  ALARM_SETTINGS = 0x98,
  BEEP = 0x88,
  LIGHT = 0x73,
  PEDALS = 0x87,
  CALIBRATE = 0x89,
  POWER_OFF = 0x40,
  LED_MODE = 0x6c,
  STROBE_MODE = 0x53,
  SET_ALARMS = 0x85,
  BMS1_SERIAL = 0xe1,
  BMS2_SERIAL = 0xe2,
  BMS1_MORE_DATA = 0xe3,
  BMS2_MORE_DATA = 0xe4,
  BMS1_FIRMWARE = 0xe5,
  BMS2_FIRMWARE = 0xe6,
}

interface ModelClass {
  voltageClass: VoltageClass;
  cells: number;
}

interface ModelClassEntry extends ModelClass {
  models: string[];
  namePrefixes: string[];
}

const VOLTAGE_CLASSES: readonly VoltageClass[] = ['v67', 'v84', 'v100', 'v126', 'v151', 'v176'];

function toVoltageClass(value: string): VoltageClass {
  return VOLTAGE_CLASSES.find((c) => c === value) ?? 'v67';
}

const MODEL_CLASSES: ModelClassEntry[] = modelTable.classes.map((entry) => ({
  voltageClass: toVoltageClass(entry.voltageClass),
  cells: entry.cells,
  models: entry.models,
  namePrefixes: entry.namePrefixes,
}));

const DEFAULT_CLASS: ModelClass = {
  voltageClass: toVoltageClass(modelTable.default.voltageClass),
  cells: modelTable.default.cells,
};

/**
 * Resolve the pack class from model and advertised name.
 */
export function kingsongModelClass(model: string, name: string): ModelClass {
  const entry = MODEL_CLASSES.find(
    (c) => c.models.includes(model) || c.namePrefixes.some((p) => name.startsWith(p))
  );
  return entry ?? DEFAULT_CLASS;
}

/**
 * Empty 20-byte request with the given type.
 */
export function createKingsongRequest(type: number): Uint8Array {
  const frame = new Uint8Array(KINGSONG_FRAME_SIZE);
  frame[0] = 0xaa;
  frame[1] = 0x55;
  frame[16] = type;
  frame[17] = 0x14;
  frame[18] = 0x5a;
  frame[19] = 0x5a;
  return frame;
}

/** Bytes 2..15 and 17..19 concatenated, as used by serial-style frames. */
function splitFieldText(data: Uint8Array): string {
  const chars: number[] = [];
  for (let i = 2; i < 16; i++) chars.push(byteAt(data, i));
  for (let i = 17; i < 20; i++) chars.push(byteAt(data, i));
  return String.fromCharCode(...chars).replace(/^[\x00-\x20]+|[\x00-\x20]+$/g, '');
}

function bmsTemperature(data: Uint8Array, offset: number): number {
  return (getInt2R(data, offset) - KELVIN_OFFSET) / 10;
}

export class KingsongDecoder implements WheelDecoder {
  readonly wheelType = WheelType.KINGSONG;
  readonly keepAliveIntervalMs = 0;

  private model = '';
  private name = '';
  private serialNumber = '';
  private version = '';
  private mode = 0;
  private liveVoltage = 0;
  private alarm1Speed = 0;
  private alarm2Speed = 0;
  private alarm3Speed = 0;
  private wheelMaxSpeed = 0;
  private bms1: SmartBms = createSmartBms();
  private bms2: SmartBms = createSmartBms();

  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    if (data.length < KINGSONG_FRAME_SIZE || data[0] !== 0xaa || data[1] !== 0x55) {
      return null;
    }
    return guardDecode(TAG, () => this.decodeFrame(data, state, config));
  }

  private decodeFrame(
    data: Uint8Array,
    state: WheelState,
    config: DecoderConfig
  ): DecodedData | null {
    const frameType = data[16];
    const commands: WheelCommand[] = [];
    let next: WheelState | null;

    switch (frameType) {
      case KingsongFrame.LIVE:
        next = this.processLive(data, state, config);
        break;
      case KingsongFrame.DISTANCE:
        next = this.processDistance(data, state);
        break;
      case KingsongFrame.NAME:
        next = this.processName(data, state);
        break;
      case KingsongFrame.SERIAL:
        next = this.processSerial(data, state, commands);
        break;
      case KingsongFrame.CPU_PWM:
        next = this.processCpuPwm(data, state);
        break;
      case KingsongFrame.SPEED_LIMIT:
        next = updateWheelState(state, { speedLimit: getInt2R(data, 2) / 100 });
        break;
      case KingsongFrame.ALARMS:
      case KingsongFrame.ALARMS_ALT:
        next = this.processAlarms(data, state, commands);
        break;
      case KingsongFrame.BMS1:
      case KingsongFrame.BMS2:
        next = this.processBms(data, state, frameType - 0xf0);
        break;
      case KingsongFrame.BMS1_SERIAL:
      case KingsongFrame.BMS2_SERIAL:
        this.bmsFor(frameType - 0xe0).serialNumber = splitFieldText(data);
        next = state;
        break;
      case KingsongFrame.BMS1_FIRMWARE:
      case KingsongFrame.BMS2_FIRMWARE:
        this.bmsFor(frameType - 0xe4).versionNumber = splitFieldText(data);
        next = state;
        break;
      default:
        console.debug(`[${TAG}] Ignoring frame type 0x${frameType.toString(16)}`);
        return null;
    }

    return {
      newState: updateWheelState(next, {
        bms1: cloneSmartBms(this.bms1),
        bms2: cloneSmartBms(this.bms2),
      }),
      commands,
      hasNewData:
        frameType === KingsongFrame.LIVE ||
        frameType === KingsongFrame.ALARMS ||
        frameType === KingsongFrame.ALARMS_ALT,
    };
  }

  private bmsFor(num: number): SmartBms {
    return num === 1 ? this.bms1 : this.bms2;
  }

  private processLive(data: Uint8Array, state: WheelState, config: DecoderConfig): WheelState {
    const voltage = getInt2R(data, 2);
    const speed = getInt2R(data, 4);
    let totalDistance = getInt4R(data, 6);
    if (this.model === 'KS-18L' && config.ks18lScaler) {
      totalDistance = Math.round(totalDistance * KS18L_SCALER);
    }
    const current = data[10] + (signedByteAt(data, 11) << 8);
    const temperature = getInt2R(data, 12);

    if (data[15] === 224) {
      this.mode = signedByteAt(data, 14);
    }
    this.liveVoltage = voltage;

    const { voltageClass } = kingsongModelClass(this.model, this.name);

    return updateWheelState(state, {
      speed,
      voltage,
      current,
      power: Math.round((current / 100) * voltage),
      temperature,
      totalDistance,
      batteryLevel: batteryPercentForClass(voltage, voltageClass, config.useCustomPercents),
      modeStr: String(this.mode),
      model: this.model,
      name: this.name,
      serialNumber: this.serialNumber,
      version: this.version,
      wheelType: WheelType.KINGSONG,
    });
  }

  private processDistance(data: Uint8Array, state: WheelState): WheelState {
    return updateWheelState(state, {
      wheelDistance: getInt4R(data, 2),
      fanStatus: signedByteAt(data, 12),
      chargingStatus: signedByteAt(data, 13),
      temperature2: getInt2R(data, 14),
    });
  }

  /**
   * Name frame, e.g. "KS-16X-1234": model "KS-16X", firmware 12.34.
   */
  private processName(data: Uint8Array, state: WheelState): WheelState {
    this.name = asciiFrom(data, 2, 14).trim();

    const parts = this.name.split('-');
    this.model = parts.length > 1 ? parts.slice(0, -1).join('-') : this.name;

    const last = parts[parts.length - 1];
    if (parts.length > 1 && /^[+-]?\d+$/.test(last)) {
      const verNum = parseInt(last, 10);
      const major = Math.trunc(verNum / 100);
      const minor = verNum % 100;
      this.version = `${major}.${String(minor).padStart(2, '0')}`;
    }

    return updateWheelState(state, {
      name: this.name,
      model: this.model,
      version: this.version,
    });
  }

  private processSerial(data: Uint8Array, state: WheelState, commands: WheelCommand[]): WheelState {
    this.serialNumber = splitFieldText(data);
    commands.push(sendBytes(createKingsongRequest(KingsongRequest.ALARM_SETTINGS)));
    return updateWheelState(state, { serialNumber: this.serialNumber });
  }

  private processCpuPwm(data: Uint8Array, state: WheelState): WheelState {
    const output = data[15] * 100;
    return updateWheelState(state, {
      cpuLoad: signedByteAt(data, 14),
      output,
      calculatedPwm: output / 10000,
    });
  }

  private processAlarms(data: Uint8Array, state: WheelState, commands: WheelCommand[]): WheelState {
    this.wheelMaxSpeed = data[10];
    this.alarm3Speed = data[8];
    this.alarm2Speed = data[6];
    this.alarm1Speed = data[4];

    if (data[16] === KingsongFrame.ALARMS) {
      const response = data.slice();
      response[16] = KingsongRequest.ALARM_SETTINGS;
      commands.push(sendBytes(response));
    }

    return updateWheelState(state, { maxSpeed: this.wheelMaxSpeed });
  }

  private processBms(data: Uint8Array, state: WheelState, bmsNum: number): WheelState {
    const bms = this.bmsFor(bmsNum);
    const page = data[17];

    switch (page) {
      case 0x00:
        bms.voltage = getInt2R(data, 2) / 100;
        bms.current = getInt2R(data, 4) / 100;
        bms.remCap = getInt2R(data, 6) * 10;
        bms.factoryCap = getInt2R(data, 8) * 10;
        bms.fullCycles = getInt2R(data, 10);
        bms.remPerc = bms.factoryCap > 0 ? Math.round(bms.remCap / (bms.factoryCap / 100)) : 0;
        break;
      case 0x01:
        bms.temp1 = bmsTemperature(data, 2);
        bms.temp2 = bmsTemperature(data, 4);
        bms.temp3 = bmsTemperature(data, 6);
        bms.temp4 = bmsTemperature(data, 8);
        bms.temp5 = bmsTemperature(data, 10);
        bms.temp6 = bmsTemperature(data, 12);
        bms.tempMos = bmsTemperature(data, 14);
        break;
      case 0x02:
      case 0x03:
      case 0x04:
      case 0x05: {
        const start = (page - 2) * 7;
        for (let i = 0; i < 7; i++) {
          setCell(bms, start + i, getInt2R(data, 2 + i * 2) / 1000);
        }
        break;
      }
      case 0x06:
        setCell(bms, 28, getInt2R(data, 2) / 1000);
        setCell(bms, 29, getInt2R(data, 4) / 1000);
        bms.tempMosEnv = bmsTemperature(data, 10);
        updateCellStats(bms, kingsongModelClass(this.model, this.name).cells);
        break;
      case 0xd0:
        this.processExtendedBms(data, bms);
        break;
      default:
        break;
    }

    return state;
  }

  /**
   * Extended BMS page used by F-series packs: a variable-length frame
   * carrying the cell count, every cell, then temperatures and totals.
   */
  private processExtendedBms(data: Uint8Array, bms: SmartBms): void {
    const cellCount = byteAt(data, 21);
    for (let i = 0; i < cellCount; i++) {
      const offset = 22 + i * 2;
      if (offset + 2 > data.length) break;
      setCell(bms, i, getInt2R(data, offset) / 1000);
    }

    const offset = 23 + cellCount * 2;
    if (offset > data.length) {
      return;
    }
    const tempCount = byteAt(data, offset - 1);

    bms.temp1 = bmsTemperature(data, offset);
    bms.temp2 = bmsTemperature(data, offset + 2);
    bms.temp3 = bmsTemperature(data, offset + 4);
    bms.temp4 = bmsTemperature(data, offset + 6);
    bms.temp5 = bmsTemperature(data, offset + 8);
    bms.temp6 = bmsTemperature(data, offset + 10);
    bms.tempMos = bmsTemperature(data, offset + 12);
    bms.tempMosEnv = bmsTemperature(data, offset + 14);

    const offset2 = offset + tempCount * 2;
    bms.current = getInt2R(data, offset2) / 100;
    bms.voltage = getInt2R(data, offset2 + 2) / 100;
    bms.remPerc = Math.trunc(getInt2R(data, offset2 + 4) / 10);
    bms.fullCycles = getInt2R(data, offset2 + 9);
    bms.factoryCap = getInt2R(data, offset2 + 11) * 10;
    bms.remCap = Math.trunc((bms.remPerc * bms.factoryCap) / 100);
    bms.temp1Env = getInt2R(data, offset2 + 14) / 10;
    bms.temp2Env = getInt2R(data, offset2 + 16) / 10;
    bms.humidity1Env = getInt2R(data, offset2 + 18) / 10;
    bms.humidity2Env = getInt2R(data, offset2 + 20) / 10;

    updateCellStats(bms, cellCount);
  }

  /** Alarm speeds (km/h) last reported by the wheel. */
  get alarmSpeeds(): { alarm1: number; alarm2: number; alarm3: number; maxSpeed: number } {
    return {
      alarm1: this.alarm1Speed,
      alarm2: this.alarm2Speed,
      alarm3: this.alarm3Speed,
      maxSpeed: this.wheelMaxSpeed,
    };
  }

  isReady(): boolean {
    return this.model !== '' && this.liveVoltage > 0;
  }

  reset(): void {
    this.model = '';
    this.name = '';
    this.serialNumber = '';
    this.version = '';
    this.mode = 0;
    this.liveVoltage = 0;
    this.alarm1Speed = 0;
    this.alarm2Speed = 0;
    this.alarm3Speed = 0;
    this.wheelMaxSpeed = 0;
    this.bms1 = createSmartBms();
    this.bms2 = createSmartBms();
  }

  getInitCommands(): WheelCommand[] {
    return [
      sendBytes(createKingsongRequest(KingsongRequest.NAME)),
      sendDelayed(createKingsongRequest(KingsongRequest.SERIAL), 100),
      sendDelayed(createKingsongRequest(KingsongRequest.ALARM_SETTINGS), 100),
    ];
  }

  getKeepAliveCommand(): WheelCommand | null {
    return null;
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    switch (command.type) {
      case 'Beep':
        return [sendBytes(createKingsongRequest(KingsongRequest.BEEP))];
      case 'SetLight':
        return [sendBytes(this.lightFrame(command.enabled ? 0 : 1))];
      case 'SetLightMode':
        return [sendBytes(this.lightFrame(command.mode))];
      case 'SetPedalsMode': {
        const frame = createKingsongRequest(KingsongRequest.PEDALS);
        frame[2] = command.mode;
        frame[3] = 0xe0;
        frame[17] = 0x15;
        return [sendBytes(frame)];
      }
      case 'Calibrate':
        return [sendBytes(createKingsongRequest(KingsongRequest.CALIBRATE))];
      case 'PowerOff':
        return [sendBytes(createKingsongRequest(KingsongRequest.POWER_OFF))];
      case 'SetLedMode': {
        const frame = createKingsongRequest(KingsongRequest.LED_MODE);
        frame[2] = command.mode;
        return [sendBytes(frame)];
      }
      case 'SetStrobeMode': {
        const frame = createKingsongRequest(KingsongRequest.STROBE_MODE);
        frame[2] = command.mode;
        return [sendBytes(frame)];
      }
      case 'RequestAlarmSettings':
        return [sendBytes(createKingsongRequest(KingsongRequest.ALARM_SETTINGS))];
      case 'SetKingsongAlarms': {
        const frame = createKingsongRequest(KingsongRequest.SET_ALARMS);
        frame[2] = command.alarm1;
        frame[4] = command.alarm2;
        frame[6] = command.alarm3;
        frame[8] = command.maxSpeed;
        return [sendBytes(frame)];
      }
      case 'RequestBmsData':
        return this.bmsRequest(command.bmsNum, command.dataType);
      default:
        return [];
    }
  }

  /** Light frame; SetLight maps on to mode 0 and off to mode 1. */
  private lightFrame(mode: number): Uint8Array {
    const frame = createKingsongRequest(KingsongRequest.LIGHT);
    frame[2] = 0x12 + mode;
    frame[3] = 0x01;
    return frame;
  }

  /**
   * BMS request; dataType 0 = serial, 1 = more data, 2 = firmware.
   */
  private bmsRequest(bmsNum: number, dataType: number): WheelCommand[] {
    if (bmsNum !== 1 && bmsNum !== 2) {
      return [];
    }
    const base = [KingsongRequest.BMS1_SERIAL, KingsongRequest.BMS1_MORE_DATA, KingsongRequest.BMS1_FIRMWARE][
      dataType
    ];
    if (base === undefined) {
      return [];
    }
    const frame = createKingsongRequest(base + (bmsNum - 1));
    frame[17] = 0x00;
    frame[18] = 0x00;
    frame[19] = 0x00;
    return [sendBytes(frame)];
  }
}
