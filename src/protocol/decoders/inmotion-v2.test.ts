import { describe, expect, it } from 'vitest';
import { createDecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { createWheelState, type WheelState } from '../../models/wheel-state';
import { asciiBytes, bytesOf } from '../../utils/bytes';
import {
  CONTROL_KEY,
  encodeInmotionV2Message,
  findInmotionV2Model,
  InmotionV2Command,
  InmotionV2Decoder,
  inmotionV2ErrorText,
  InmotionV2Flag,
  parseInmotionV2Frame,
} from './inmotion-v2';

const config = createDecoderConfig();

function initial(...data: number[]): Uint8Array {
  return encodeInmotionV2Message(InmotionV2Flag.INITIAL, InmotionV2Command.MAIN_INFO, bytesOf(...data));
}

function carType(series: number, type: number): Uint8Array {
  return initial(0x01, 0x00, series, type, 0x00);
}

function versions(mainMinor: number, mainMajor: number): Uint8Array {
  const data = new Uint8Array(24);
  data[0] = 0x06;
  data.set([0x03, 0x00, 2, 1], 2); // driver 1.2.3
  data.set([0x05, 0x00, mainMinor, mainMajor], 11);
  data.set([0x07, 0x00, 6, 1], 20); // BLE 1.6.7
  return encodeInmotionV2Message(InmotionV2Flag.INITIAL, InmotionV2Command.MAIN_INFO, data);
}

function v12RealTime(): Uint8Array {
  const data = new Uint8Array(66);
  const view = new DataView(data.buffer);
  view.setUint16(0, 8400, true);
  view.setInt16(2, 1000, true);
  view.setInt16(4, 2500, true);
  view.setInt16(6, 500, true);
  view.setInt16(8, 1500, true);
  view.setInt16(10, 120, true);
  view.setInt16(12, 1100, true);
  view.setInt16(16, 250, true);
  view.setInt16(20, -100, true);
  view.setUint16(22, 150, true);
  view.setUint16(24, 8000, true);
  view.setUint16(30, 5000, true);
  view.setUint16(32, 6000, true);
  data[40] = 216; // 40 C
  data[41] = 211; // 35 C
  data[44] = 221; // 45 C
  data[45] = 206; // 30 C
  data[54] = 0x40;
  data[55] = 0x04;
  data[59] = 0x04;
  return encodeInmotionV2Message(InmotionV2Flag.DEFAULT, InmotionV2Command.REAL_TIME_INFO, data);
}

function decodeAll(decoder: InmotionV2Decoder, frames: Uint8Array[]): WheelState {
  let state = createWheelState();
  for (const f of frames) {
    const result = decoder.decode(f, state, config);
    if (result) state = result.newState;
  }
  return state;
}

describe('parseInmotionV2Frame', () => {
  it('masks the reply bit of the command', () => {
    // 0x14 ^ 0x02 ^ 0x84 ^ 0x01 = 0x93
    const message = parseInmotionV2Frame(bytesOf(0xaa, 0xaa, 0x14, 0x02, 0x84, 0x01, 0x93));
    expect(message).toEqual({ flags: 0x14, len: 2, command: 0x04, data: bytesOf(0x01) });
  });

  it('rejects a wrong check byte', () => {
    expect(parseInmotionV2Frame(bytesOf(0xaa, 0xaa, 0x14, 0x02, 0x84, 0x01, 0x00))).toBeNull();
  });
});

describe('InmotionV2Decoder', () => {
  it('detects the model from the car type reply', () => {
    const decoder = new InmotionV2Decoder();
    const state = decodeAll(decoder, [carType(7, 1)]);

    expect(state.model).toBe('Inmotion V12 HS');
    expect(state.wheelType).toBe(WheelType.INMOTION_V2);
    expect(decoder.currentModel.key).toBe('V12HS');
  });

  it('reads serial and versions', () => {
    const decoder = new InmotionV2Decoder();
    const state = decodeAll(decoder, [initial(0x02, ...asciiBytes('IMV12TEST0000001')), versions(4, 2)]);

    expect(state.serialNumber).toBe('IMV12TEST0000001');
    expect(state.version).toBe('Main:2.4.5 Drv:1.2.3 BLE:1.6.7');
  });

  it('picks the V11 real-time revision from the main board firmware', () => {
    const old = new InmotionV2Decoder();
    decodeAll(old, [carType(6, 1), versions(3, 1)]);
    expect(old.protocolVersion).toBe(1);

    const current = new InmotionV2Decoder();
    decodeAll(current, [carType(6, 1), versions(4, 2)]);
    expect(current.protocolVersion).toBe(2);
  });

  it('decodes V12 real-time info', () => {
    const decoder = new InmotionV2Decoder();
    const state = decodeAll(decoder, [carType(7, 1), v12RealTime()]);

    expect(state.voltage).toBe(8400);
    expect(state.current).toBe(1000);
    expect(state.speed).toBe(2500);
    expect(state.torque).toBe(5);
    expect(state.output).toBe(1500);
    expect(state.power).toBe(12000);
    expect(state.motorPower).toBe(1100);
    expect(state.angle).toBe(2.5);
    expect(state.roll).toBe(-1);
    expect(state.wheelDistance).toBe(1500);
    expect(state.batteryLevel).toBe(80);
    expect(state.speedLimit).toBe(50);
    expect(state.currentLimit).toBe(60);
    expect(state.temperature).toBe(4000);
    expect(state.temperature2).toBe(3500);
    expect(state.cpuTemp).toBe(45);
    expect(state.imuTemp).toBe(30);
    expect(state.modeStr).toBe('Active Lifted');
    expect(state.alert).toBe('err_motorHallState');
  });

  it('ignores real-time info until the model is known', () => {
    expect(new InmotionV2Decoder().decode(v12RealTime(), createWheelState(), config)).toBeNull();
  });

  it('reads the odometer from total stats', () => {
    const data = new Uint8Array(20);
    data.set([0x39, 0x30], 0); // 12345
    const frame = encodeInmotionV2Message(InmotionV2Flag.DEFAULT, InmotionV2Command.TOTAL_STATS, data);
    expect(decodeAll(new InmotionV2Decoder(), [frame]).totalDistance).toBe(123450);
  });

  it('is ready once model and versions are known', () => {
    const decoder = new InmotionV2Decoder();
    decodeAll(decoder, [carType(7, 1)]);
    expect(decoder.isReady()).toBe(false);
    decodeAll(decoder, [versions(4, 2)]);
    expect(decoder.isReady()).toBe(true);

    decoder.reset();
    expect(decoder.isReady()).toBe(false);
    expect(decoder.currentModel.key).toBe('UNKNOWN');
  });

  it('queues the initial requests 100 ms apart', () => {
    const commands = new InmotionV2Decoder().getInitCommands();
    expect(commands.map((c) => c.type)).toEqual(['SendBytes', 'SendDelayed', 'SendDelayed', 'SendDelayed', 'SendDelayed']);
    expect(commands[0]).toEqual({ type: 'SendBytes', data: initial(0x01) });
  });

  it('polls real-time info', () => {
    expect(new InmotionV2Decoder().getKeepAliveCommand()).toEqual({
      type: 'SendBytes',
      data: bytesOf(0xaa, 0xaa, 0x14, 0x01, 0x04, 0x11),
    });
  });

  describe('buildCommand', () => {
    const decoder = new InmotionV2Decoder();

    it('inverts mute', () => {
      // 0x14 ^ 0x03 ^ 0x60 ^ 0x2C ^ 0x00 = 0x5B
      expect(decoder.buildCommand({ type: 'SetMute', enabled: true })).toEqual([
        { type: 'SendBytes', data: bytesOf(0xaa, 0xaa, 0x14, 0x03, 0x60, 0x2c, 0x00, 0x5b) },
      ]);
    });

    it('writes the max speed in hundredths', () => {
      const expected = encodeInmotionV2Message(
        InmotionV2Flag.DEFAULT,
        InmotionV2Command.CONTROL,
        bytesOf(CONTROL_KEY.MAX_SPEED, 0x88, 0x13)
      );
      expect(decoder.buildCommand({ type: 'SetMaxSpeed', speed: 50 })).toEqual([{ type: 'SendBytes', data: expected }]);
    });

    it('powers off', () => {
      const expected = encodeInmotionV2Message(
        InmotionV2Flag.DEFAULT,
        InmotionV2Command.CONTROL,
        bytesOf(CONTROL_KEY.POWER_OFF, 0x00)
      );
      expect(decoder.buildCommand({ type: 'PowerOff' })).toEqual([{ type: 'SendBytes', data: expected }]);
    });

    it('drops commands it cannot encode', () => {
      expect(decoder.buildCommand({ type: 'SetLedMode', mode: 1 })).toEqual([]);
    });
  });
});

describe('Inmotion V2 helpers', () => {
  it('falls back to the unknown model', () => {
    expect(findInmotionV2Model(9, 1).name).toBe('Inmotion V14 50GB');
    expect(findInmotionV2Model(4, 4).key).toBe('UNKNOWN');
  });

  it('names the error bits', () => {
    expect(inmotionV2ErrorText(bytesOf(0x04, 0, 0, 0x35, 0, 0, 0x02), 0)).toBe(
      'err_motorHallState err_underVoltageState err_overBusCurrentState-1 err_lowBatteryState-3 err_hwCompatibilityState'
    );
    expect(inmotionV2ErrorText(bytesOf(0x04), 0)).toBe('');
  });
});
