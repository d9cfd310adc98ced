/**
 * Gotway / Begode protocol decoder.
 *
 * Handles the stock Begode firmware and the ExtremeBull, Freestyl3r and
 * SmirnoV ("SV") custom firmwares. Frames are reassembled by GotwayUnpacker;
 * the wheel also answers "V"/"N" requests with plain-text lines.
 *
 * Frame types (byte 18):
 *   0x00 live telemetry
 *   0x01 smart BMS voltage, currents and temperatures
 *   0x02/0x03 BMS cell voltages, 8 cells per page (page at byte 19)
 *   0x04 total distance, settings and alerts
 *   0x07 battery current, motor temperature, hardware PWM
 *   0xFF custom firmware settings
 */

import {
  cloneSmartBms,
  createSmartBms,
  setCell,
  type SmartBms,
} from '../../models/bms';
import { sendBytes, sendDelayed, type WheelCommand } from '../../models/commands';
import { gotwayVoltageScaler, type DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  asciiBytes,
  bytesOf,
  getInt4,
  KM_TO_MILES,
  latin1From,
  shortFromBytesBE,
  signedShortFromBytesBE,
} from '../../utils/bytes';
import { gotwayBatteryPercent } from '../battery';
import {
  decodeFrames,
  guardDecode,
  type DecodedData,
  type FrameOutcome,
  type WheelDecoder,
} from '../decoder';
import { GotwayUnpacker } from '../unpackers/gotway-unpacker';

const TAG = 'GotwayDecoder';

const MAX_INFO_ATTEMPTS = 50;
const RATIO_GW = 0.875;

export enum GotwayFrame {
  LIVE = 0x00,
  SMART_BMS = 0x01,
  BMS_CELLS_1 = 0x02,
  BMS_CELLS_2 = 0x03,
  TOTAL_DISTANCE = 0x04,
  CURRENT_TEMP = 0x07,
  SETTINGS = 0xff,
}

/**
 * Firmware families, identified by the prefix of the version reply.
 */
export const GOTWAY_FIRMWARE_PREFIXES: Readonly<Record<string, string>> = {
  GW: 'Begode',
  JN: 'ExtremeBull',
  CF: 'Freestyl3r',
  BF: 'SV',
};

const ALERT_NAMES: ReadonlyArray<[number, string]> = [
  [1, 'Speed2'],
  [2, 'Speed1'],
  [3, 'LowVoltage'],
  [4, 'OverVoltage'],
  [5, 'OverTemperature'],
  [6, 'errHallSensors'],
  [7, 'TransportMode'],
];

function text(value: string): WheelCommand {
  return sendBytes(asciiBytes(value));
}

function delayedText(value: string, delayMs: number): WheelCommand {
  return sendDelayed(asciiBytes(value), delayMs);
}

function digit(value: number): Uint8Array {
  return bytesOf((value % 10) + 0x30);
}

export class GotwayDecoder implements WheelDecoder {
  readonly wheelType = WheelType.GOTWAY;
  readonly keepAliveIntervalMs = 0;

  private readonly unpacker = new GotwayUnpacker();
  private model = '';
  private imu = '';
  private fw = '';
  private fwProt = '';
  private smartBmsCells = 0;
  private trueVoltage = false;
  private trueCurrent = false;
  private bmsCurrent = false;
  private truePwm = false;
  private firmwareKnown = false;
  private hasReceivedData = false;
  private infoAttempt = 0;
  private bms1: SmartBms = createSmartBms();
  private bms2: SmartBms = createSmartBms();

  /** Firmware family, empty until the version reply arrives. */
  get firmwareProtocol(): string {
    return this.fwProt;
  }

  /** IMU chip name reported by the "MPU" reply. */
  get imuName(): string {
    return this.imu;
  }

  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () => this.decodePacket(data, state, config));
  }

  private decodePacket(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    let current = state;
    if (this.model === '' || this.fw === '') {
      current = this.parseTextReply(data, current);
    }

    const framed = decodeFrames(TAG, data, this.unpacker, current, (frame, s) =>
      this.processFrame(frame, s, config)
    );
    if (framed) {
      current = framed.newState;
    }
    const commands = framed ? [...framed.commands] : [];
    const hasNewData = framed?.hasNewData ?? false;

    if (hasNewData && (this.fw === '' || this.model === '')) {
      if (this.infoAttempt < MAX_INFO_ATTEMPTS) {
        this.infoAttempt++;
        commands.push(text(this.fw === '' ? 'V' : 'N'));
      } else {
        if (this.model === '') {
          this.model = this.fwProt || 'Begode';
          current = updateWheelState(current, { model: this.model });
        }
        if (this.fw === '') {
          this.fw = '-';
          this.firmwareKnown = true;
          current = updateWheelState(current, { version: this.fw });
        }
      }
    }

    if (!framed && current === state) {
      return null;
    }
    return {
      newState: updateWheelState(current, {
        bms1: cloneSmartBms(this.bms1),
        bms2: cloneSmartBms(this.bms2),
      }),
      commands,
      hasNewData,
    };
  }

  /**
   * Text replies: "NAME <model>", "<prefix><version>" and "MPU<chip>".
   */
  private parseTextReply(data: Uint8Array, state: WheelState): WheelState {
    const reply = latin1From(data).trim();

    if (reply.startsWith('NAME')) {
      this.model = reply.substring(5).trim();
      return updateWheelState(state, { model: this.model });
    }

    const prefix = reply.substring(0, 2);
    const protocol = GOTWAY_FIRMWARE_PREFIXES[prefix];
    if (protocol !== undefined) {
      this.fw = reply.substring(2).trim();
      this.fwProt = protocol;
      this.firmwareKnown = true;
      return updateWheelState(state, { version: this.fw });
    }

    if (reply.startsWith('MPU')) {
      this.imu = reply.substring(1, Math.min(7, reply.length)).trim();
    }
    return state;
  }

  private processFrame(frame: Uint8Array, state: WheelState, config: DecoderConfig): FrameOutcome | null {
    if (frame.length < 20) return null;

    const isSv = this.fwProt === 'SV';
    switch (frame[18]) {
      case GotwayFrame.LIVE:
        return this.processLive(frame, state, config, isSv);
      case GotwayFrame.SMART_BMS:
        return isSv ? null : this.processSmartBms(frame, state);
      case GotwayFrame.BMS_CELLS_1:
      case GotwayFrame.BMS_CELLS_2:
        return this.processBmsCells(frame, state, frame[18] - 1);
      case GotwayFrame.TOTAL_DISTANCE:
        return this.processTotalDistance(frame, state, config, isSv);
      case GotwayFrame.CURRENT_TEMP:
        return isSv ? null : this.processCurrentTemp(frame, state, config.gotwayNegative);
      case GotwayFrame.SETTINGS:
        return { state: updateWheelState(state, { cutoutAngle: frame[5] + 260 }) };
      default:
        return null;
    }
  }

  private processLive(
    frame: Uint8Array,
    state: WheelState,
    config: DecoderConfig,
    isSv: boolean
  ): FrameOutcome {
    const rawVoltage = shortFromBytesBE(frame, 2);
    let speed = Math.round(signedShortFromBytesBE(frame, 4) * 3.6);
    let distance = 0;

    if (!isSv) {
      distance = shortFromBytesBE(frame, 8);
    } else if ((frame[7] & 0x01) === 1) {
      this.trueCurrent = true;
    }

    let phaseCurrent = signedShortFromBytesBE(frame, 10);
    const rawTemp = signedShortFromBytesBE(frame, 12);
    // MPU6050 on stock boards, MPU6500 on SV
    const temperature = Math.round(isSv ? (rawTemp / 333.87 + 21) * 100 : (rawTemp / 340 + 36.53) * 100);
    let hwPwm = signedShortFromBytesBE(frame, 14) * 10;

    const negative = config.gotwayNegative;
    if (negative === 0) {
      speed = Math.abs(speed);
      phaseCurrent = Math.abs(phaseCurrent);
      hwPwm = Math.abs(hwPwm);
    } else {
      phaseCurrent *= negative;
      if (!isSv) {
        speed *= negative;
        hwPwm *= negative;
      }
    }

    const batteryLevel = gotwayBatteryPercent(rawVoltage, config.useCustomPercents);

    if (config.useRatio) {
      speed = Math.round(speed * RATIO_GW);
      distance = Math.round(distance * RATIO_GW);
    }
    if (state.inMiles) {
      speed = Math.round(speed / KM_TO_MILES);
      distance = Math.round(distance / KM_TO_MILES);
    }

    const voltage = Math.round(rawVoltage * gotwayVoltageScaler(config));
    if (voltage > 0) {
      this.hasReceivedData = true;
    }

    const calculatedPwm = hwPwm / 10000;
    const current =
      !this.trueCurrent || !this.bmsCurrent ? Math.round(calculatedPwm * phaseCurrent) : state.current;

    return {
      state: updateWheelState(state, {
        speed,
        voltage: this.trueVoltage ? state.voltage : voltage,
        phaseCurrent,
        current,
        power: Math.round((current / 100) * voltage),
        temperature,
        wheelDistance: distance,
        batteryLevel,
        output: this.truePwm ? state.output : hwPwm,
        calculatedPwm: this.truePwm ? state.calculatedPwm : calculatedPwm,
        wheelType: WheelType.GOTWAY,
        model: this.model || state.model,
      }),
      hasNewData: !(this.trueVoltage || this.trueCurrent || this.bmsCurrent) || isSv,
    };
  }

  private processSmartBms(frame: Uint8Array, state: WheelState): FrameOutcome {
    this.trueVoltage = true;
    const batVoltage = shortFromBytesBE(frame, 6);
    const bmsNum = frame[19];
    const bms = bmsNum < 2 ? this.bms1 : this.bms2;

    const bmsCurrentRaw = signedShortFromBytesBE(frame, 8);
    bms.current = bmsCurrentRaw / 10;
    if (bmsCurrentRaw > 0) this.bmsCurrent = false;

    if (bmsNum % 2 === 0) {
      bms.temp1 = signedShortFromBytesBE(frame, 10);
      bms.temp2 = signedShortFromBytesBE(frame, 12);
      bms.semiVoltage1 = signedShortFromBytesBE(frame, 14) / 10;
    } else {
      bms.temp3 = signedShortFromBytesBE(frame, 10);
      bms.temp4 = signedShortFromBytesBE(frame, 12);
      bms.semiVoltage2 = signedShortFromBytesBE(frame, 14) / 10;
    }

    return {
      state: updateWheelState(state, { voltage: batVoltage * 10 }),
      hasNewData: this.bmsCurrent || (!this.trueCurrent && this.trueVoltage),
    };
  }

  private processBmsCells(frame: Uint8Array, state: WheelState, bmsNum: number): FrameOutcome {
    const bms = bmsNum === 1 ? this.bms1 : this.bms2;
    const page = frame[19];

    for (let i = 0; i < 8; i++) {
      const cellNum = i + page * 8;
      const cellVal = shortFromBytesBE(frame, (i + 1) * 2) / 1000;
      setCell(bms, cellNum, cellVal);
      if (this.smartBmsCells <= cellNum && cellVal !== 0) {
        this.smartBmsCells = Math.min(cellNum + 1, bms.cells.length);
      } else if (this.smartBmsCells === cellNum + 1 && bms.cellNum !== this.smartBmsCells) {
        bms.cellNum = this.smartBmsCells;
      }
    }

    this.updateCellStats(bms);
    return { state };
  }

  /** Like updateCellStats, but over the detected cell count and also summing pack voltage. */
  private updateCellStats(bms: SmartBms): void {
    const count = this.smartBmsCells;
    if (count === 0) return;

    let min = bms.cells[0];
    let max = bms.cells[0];
    let minNum = 1;
    let maxNum = 1;
    let total = 0;
    for (let i = 0; i < count; i++) {
      const cell = bms.cells[i];
      if (cell > 0) {
        total += cell;
        if (max < cell) {
          max = cell;
          maxNum = i + 1;
        }
        if (min > cell) {
          min = cell;
          minNum = i + 1;
        }
      }
    }
    bms.minCell = min;
    bms.maxCell = max;
    bms.minCellNum = minNum;
    bms.maxCellNum = maxNum;
    bms.cellDiff = max - min;
    bms.avgCell = total / count;
    bms.voltage = total;
  }

  private processTotalDistance(
    frame: Uint8Array,
    state: WheelState,
    config: DecoderConfig,
    isSv: boolean
  ): FrameOutcome {
    let totalDistance = getInt4(frame, 2);
    if (config.useRatio) {
      totalDistance = Math.round(totalDistance * RATIO_GW);
    }
    if (isSv) {
      return { state: updateWheelState(state, { totalDistance }) };
    }

    const settings = shortFromBytesBE(frame, 6);
    const pedalsMode = (settings >> 13) & 0x03;
    const speedAlarms = (settings >> 10) & 0x03;
    const rollAngle = (settings >> 7) & 0x03;
    const inMiles = (settings & 0x01) === 1;
    let tiltBackSpeed = shortFromBytesBE(frame, 10);
    if (tiltBackSpeed >= 100) tiltBackSpeed = 0;
    const ledMode = frame[13];
    const alert = frame[14];
    const lightMode = frame[15] & 0x03;

    const alertLine = ALERT_NAMES.filter(([bit]) => ((alert >> bit) & 0x01) === 1)
      .map(([, name]) => name)
      .join(' ');

    if (inMiles) {
      totalDistance = Math.round(totalDistance / KM_TO_MILES);
    }

    return {
      state: updateWheelState(state, {
        totalDistance,
        pedalsMode: 2 - pedalsMode,
        speedAlarms,
        rollAngle,
        tiltBackSpeed,
        lightMode,
        ledMode,
        wheelAlarm: (alert & 0x01) === 1,
        alert: alertLine,
        inMiles,
      }),
    };
  }

  private processCurrentTemp(frame: Uint8Array, state: WheelState, negative: number): FrameOutcome {
    this.trueCurrent = true;
    const batteryCurrent = signedShortFromBytesBE(frame, 2);
    const motorTemp = signedShortFromBytesBE(frame, 6);
    let hwPwm = signedShortFromBytesBE(frame, 8);

    if (hwPwm > 0) {
      this.truePwm = true;
    }
    if (this.truePwm) {
      hwPwm = negative === 0 ? Math.abs(hwPwm) : hwPwm * negative * -1;
    }

    const output = this.truePwm ? hwPwm * 100 : state.output;
    return {
      state: updateWheelState(state, {
        current: this.bmsCurrent ? state.current : -batteryCurrent,
        temperature2: motorTemp * 100,
        output,
        calculatedPwm: this.truePwm ? output / 10000 : state.calculatedPwm,
      }),
      hasNewData: this.trueCurrent && !this.bmsCurrent,
    };
  }

  isReady(): boolean {
    return this.firmwareKnown && this.hasReceivedData && this.model !== '';
  }

  reset(): void {
    this.unpacker.reset();
    this.model = '';
    this.imu = '';
    this.fw = '';
    this.fwProt = '';
    this.smartBmsCells = 0;
    this.trueVoltage = false;
    this.trueCurrent = false;
    this.bmsCurrent = false;
    this.truePwm = false;
    this.firmwareKnown = false;
    this.hasReceivedData = false;
    this.infoAttempt = 0;
    this.bms1 = createSmartBms();
    this.bms2 = createSmartBms();
  }

  getInitCommands(): WheelCommand[] {
    return [text('V'), delayedText('b', 100), delayedText('N', 100), delayedText('b', 100)];
  }

  getKeepAliveCommand(): WheelCommand | null {
    return null;
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    switch (command.type) {
      case 'Beep':
        return [text('b')];
      case 'SetLight':
        return this.buildCommand({ type: 'SetLightMode', mode: command.enabled ? 1 : 0 });
      case 'SetLightMode':
        // 0 off, 1 on, 2 strobe
        return [text(command.mode === 1 ? 'Q' : command.mode === 2 ? 'T' : 'E')];
      case 'SetPedalsMode': {
        const code = ['h', 'f', 's', 'i'][command.mode];
        return code === undefined ? [] : [text(code)];
      }
      case 'SetMilesMode':
        return [text(command.enabled ? 'm' : 'g')];
      case 'SetRollAngleMode': {
        const code = ['>', '=', '<'][command.mode];
        return code === undefined ? [] : [text(code)];
      }
      case 'SetLedMode':
        return [
          text('W'),
          delayedText('M', 100),
          sendDelayed(digit(command.mode), 300),
          delayedText('b', 100),
        ];
      case 'SetBeeperVolume':
        return [
          text('W'),
          delayedText('B', 100),
          sendDelayed(digit(command.volume), 300),
          delayedText('b', 100),
        ];
      case 'SetCutoutAngle':
        return [sendBytes(bytesOf(0x72, 0x73, command.angle - 260))];
      case 'SetAlarmMode': {
        // 0 two alarms, 1 one alarm, 2 off, 3 tiltback only (CF firmware)
        const code = ['o', 'u', 'i', 'I'][command.mode];
        return code === undefined ? [] : [text(code)];
      }
      case 'Calibrate':
        return [text('c'), delayedText('y', 300)];
      case 'SetMaxSpeed':
        if (command.speed !== 0) {
          return [
            text('b'),
            delayedText('W', 100),
            delayedText('Y', 100),
            sendDelayed(bytesOf(Math.trunc(command.speed / 10) + 0x30), 200),
            sendDelayed(digit(command.speed), 100),
            delayedText('b', 200),
            delayedText('b', 100),
          ];
        }
        return [text('b'), delayedText('"', 100), delayedText('b', 200), delayedText('b', 100)];
      default:
        return [];
    }
  }
}
