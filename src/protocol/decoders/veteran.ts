/**
 * Veteran / Leaperkim protocol decoder.
 *
 * Veteran wheels stream telemetry unprompted, so there are no init commands
 * and no keep-alive. The firmware major version (`ver / 1000`) identifies the
 * model, pack size and cell count.
 *
 * Frame layout (offsets from the `DC 5A 5C` header, big-endian):
 *   4 voltage, 6 speed, 8 trip (word-swapped), 12 total (word-swapped),
 *   16 phase current, 18 temperature, 22 charge mode, 28 firmware,
 *   32 pitch, 34 hardware PWM, 46 BMS page (firmware 5 and later)
 */

import {
  cloneSmartBms,
  createSmartBms,
  setCell,
  sumCells,
  updateCellStats,
  type SmartBms,
} from '../../models/bms';
import { sendBytes, type WheelCommand } from '../../models/commands';
import type { DecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { updateWheelState, type WheelState } from '../../models/wheel-state';
import {
  asciiBytes,
  bytesOf,
  intFromBytesRevBE,
  shortFromBytesBE,
  signedShortFromBytesBE,
} from '../../utils/bytes';
import { veteranBatteryPercent } from '../battery';
import { decodeFrames, guardDecode, type DecodedData, type WheelDecoder } from '../decoder';
import { VeteranUnpacker } from '../unpackers/veteran-unpacker';

const TAG = 'VeteranDecoder';

/** Minimum frame size carrying every live field. */
export const VETERAN_MIN_FRAME_SIZE = 36;

/** A gap longer than this between notifications discards a partial frame. */
const WAITING_TIME_MS = 100;

const MODEL_NAMES: Readonly<Record<number, string>> = {
  0: 'Sherman',
  1: 'Sherman',
  2: 'Abrams',
  3: 'Sherman S',
  4: 'Patton',
  5: 'Lynx',
  6: 'Sherman L',
  7: 'Patton S',
  8: 'Oryx',
  42: 'Nosfet Apex',
  43: 'Nosfet Aero',
};

/** Beep frame understood by firmware 3 and later. */
const BEEP_FRAME = bytesOf(0x4c, 0x6b, 0x41, 0x70, 0x0e, 0x00, 0x80, 0x80, 0x80, 0x01, 0xca, 0x87, 0xe6, 0x6f);

export function veteranModelName(firmwareMajor: number): string {
  return MODEL_NAMES[firmwareMajor] ?? 'Unknown Veteran';
}

export function veteranCellCount(firmwareMajor: number): number {
  if (firmwareMajor === 4 || firmwareMajor === 7 || firmwareMajor === 43) return 30;
  if (firmwareMajor === 8) return 42;
  if (firmwareMajor >= 5) return 36;
  return 24;
}

/**
 * Firmware number as shown by the official app, e.g. 3027 -> "0003.0.27".
 */
export function formatVeteranVersion(ver: number): string {
  const major = Math.trunc(ver / 1000);
  const minor = Math.trunc((ver % 1000) / 100);
  return `${major}.${minor}.${ver % 100}`.padStart(9, '0');
}

export class VeteranDecoder implements WheelDecoder {
  readonly wheelType = WheelType.VETERAN;
  readonly keepAliveIntervalMs = 0;

  private readonly unpacker = new VeteranUnpacker();
  private lastPacketTime = 0;
  private mVer = 0;
  private frameDecoded = false;
  private liveVoltage = 0;
  private bms1: SmartBms = createSmartBms();
  private bms2: SmartBms = createSmartBms();

  /** Firmware major version of the last frame. */
  get firmwareMajor(): number {
    return this.mVer;
  }

  decode(data: Uint8Array, state: WheelState, config: DecoderConfig): DecodedData | null {
    return guardDecode(TAG, () => {
      const now = Date.now();
      if (now - this.lastPacketTime > WAITING_TIME_MS) {
        this.unpacker.reset();
      }
      this.lastPacketTime = now;

      const result = decodeFrames(TAG, data, this.unpacker, state, (frame, s) => {
        const next = this.processFrame(frame, s, config);
        return next ? { state: next, hasNewData: true } : null;
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

  private processFrame(frame: Uint8Array, state: WheelState, config: DecoderConfig): WheelState | null {
    if (frame.length < VETERAN_MIN_FRAME_SIZE) return null;

    const voltage = shortFromBytesBE(frame, 4);
    let speed = signedShortFromBytesBE(frame, 6) * 10;
    const distance = intFromBytesRevBE(frame, 8);
    const totalDistance = intFromBytesRevBE(frame, 12);
    let phaseCurrent = signedShortFromBytesBE(frame, 16) * 10;
    const temperature = signedShortFromBytesBE(frame, 18);
    const chargeMode = shortFromBytesBE(frame, 22);
    const ver = shortFromBytesBE(frame, 28);
    this.mVer = Math.trunc(ver / 1000);
    const pitchAngle = signedShortFromBytesBE(frame, 32);
    const hwPwm = shortFromBytesBE(frame, 34);

    if (this.mVer >= 5 && frame.length > 46) {
      this.processBms(frame);
    }

    const negative = config.gotwayNegative;
    if (negative === 0) {
      speed = Math.abs(speed);
      phaseCurrent = Math.abs(phaseCurrent);
    } else {
      speed *= negative;
      phaseCurrent *= negative;
    }

    let calculatedPwm: number;
    let output: number;
    if (config.hwPwmEnabled) {
      output = hwPwm;
      calculatedPwm = hwPwm / 10000;
    } else {
      const divisor = (config.rotationSpeed / config.rotationVoltage) * voltage * config.powerFactor;
      calculatedPwm = divisor !== 0 && Number.isFinite(divisor) ? speed / divisor : 0;
      output = Math.round(calculatedPwm * 10000);
    }
    const current = Math.round(calculatedPwm * phaseCurrent);

    this.frameDecoded = true;
    this.liveVoltage = voltage;

    return updateWheelState(state, {
      speed,
      voltage,
      phaseCurrent,
      current,
      power: Math.round((current / 100) * voltage),
      temperature,
      wheelDistance: distance,
      totalDistance,
      batteryLevel: veteranBatteryPercent(voltage, this.mVer, config.useCustomPercents),
      chargingStatus: chargeMode,
      output,
      calculatedPwm,
      angle: pitchAngle / 100,
      version: formatVeteranVersion(ver),
      model: veteranModelName(this.mVer),
      wheelType: WheelType.VETERAN,
    });
  }

  /**
   * Smart BMS pages 0-3 belong to pack 1, 4-7 to pack 2.
   */
  private processBms(frame: Uint8Array): void {
    const page = frame[46];
    const bms = page < 4 ? this.bms1 : this.bms2;

    switch (page) {
      case 0:
      case 4:
        if (frame.length > 72) {
          this.bms1.current = signedShortFromBytesBE(frame, 69) / 100;
          this.bms2.current = signedShortFromBytesBE(frame, 71) / 100;
        }
        break;
      case 1:
      case 5:
        for (let i = 0; i < 15; i++) {
          setCell(bms, i, signedShortFromBytesBE(frame, 53 + i * 2) / 1000);
        }
        break;
      case 2:
      case 6:
        for (let i = 0; i < 15; i++) {
          setCell(bms, i + 15, shortFromBytesBE(frame, 53 + i * 2) / 1000);
        }
        break;
      case 3:
      case 7: {
        for (let i = 0; i < 12; i++) {
          const offset = 59 + i * 2;
          if (offset + 2 <= frame.length) {
            setCell(bms, i + 30, shortFromBytesBE(frame, offset) / 1000);
          }
        }
        bms.temp1 = signedShortFromBytesBE(frame, 47) / 100;
        bms.temp2 = signedShortFromBytesBE(frame, 49) / 100;
        bms.temp3 = signedShortFromBytesBE(frame, 51) / 100;
        bms.temp4 = signedShortFromBytesBE(frame, 53) / 100;
        bms.temp5 = signedShortFromBytesBE(frame, 55) / 100;
        bms.temp6 = signedShortFromBytesBE(frame, 57) / 100;

        const cells = veteranCellCount(this.mVer);
        updateCellStats(bms, cells);
        bms.voltage = sumCells(bms, cells);
        break;
      }
      default:
        break;
    }
  }

  isReady(): boolean {
    return this.frameDecoded && this.liveVoltage > 0;
  }

  reset(): void {
    this.unpacker.clear();
    this.lastPacketTime = 0;
    this.mVer = 0;
    this.frameDecoded = false;
    this.liveVoltage = 0;
    this.bms1 = createSmartBms();
    this.bms2 = createSmartBms();
  }

  getInitCommands(): WheelCommand[] {
    return [];
  }

  getKeepAliveCommand(): WheelCommand | null {
    return null;
  }

  buildCommand(command: WheelCommand): WheelCommand[] {
    switch (command.type) {
      case 'Beep':
        return [sendBytes(this.mVer < 3 ? asciiBytes('b') : BEEP_FRAME.slice())];
      case 'SetLight':
        return [sendBytes(asciiBytes(command.enabled ? 'SetLightON' : 'SetLightOFF'))];
      case 'SetPedalsMode': {
        // 0 hard, 1 medium, 2 soft
        const code = ['SETh', 'SETm', 'SETs'][command.mode];
        return code === undefined ? [] : [sendBytes(asciiBytes(code))];
      }
      case 'ResetTrip':
        return [sendBytes(asciiBytes('CLEARMETER'))];
      default:
        return [];
    }
  }
}
