import { describe, expect, it } from 'vitest';
import type { WheelCommand } from '../../models/commands';
import { createDecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { createWheelState, type WheelState } from '../../models/wheel-state';
import { asciiBytes, bytesOf, concatBytes } from '../../utils/bytes';
import { emptyGamma, openNinebotFrame, sealNinebotFrame } from '../ninebot-can';
import {
  formatBmsDate,
  NinebotZAddr,
  NinebotZDecoder,
  ninebotZErrorText,
  NinebotZParam,
  NinebotZStage,
} from './ninebot-z';

const config = createDecoderConfig();
const KEY = Uint8Array.from({ length: 16 }, (_, i) => 0x10 + i);

function reply(source: number, parameter: number, data: Uint8Array, gamma: Uint8Array = KEY): Uint8Array {
  const body = concatBytes(bytesOf(data.length, source, NinebotZAddr.APP, 0x04, parameter), data);
  return sealNinebotFrame([0x5a, 0xa5], body, gamma);
}

function controller(parameter: number, data: Uint8Array): Uint8Array {
  return reply(NinebotZAddr.CONTROLLER, parameter, data);
}

function lockParams(): Uint8Array {
  const data = new Uint8Array(32);
  data.set([0x05, 0x00], 24);
  return controller(NinebotZParam.LOCK_MODE, data);
}

function ledParams(): Uint8Array {
  const data = new Uint8Array(28);
  data.set([0x02, 0x00], 0); // LED mode 2
  data.set([0x46, 0x00], 24); // sensitivity 70
  data.set([0x04, 0x00], 26); // handle button flag only
  return controller(NinebotZParam.LED_MODE, data);
}

function liveData(): Uint8Array {
  const data = new Uint8Array(28);
  data.set([0x5a, 0x00], 8); // 90 %
  data.set([0xc4, 0x09], 10); // 2500
  data.set([0x40, 0xe2, 0x01, 0x00], 14); // 123456 m
  data.set([0x64, 0x00], 18); // trip 100 -> 1000 m
  data.set([0x1e, 0x00], 22); // 30 C
  data.set([0x70, 0x17], 24); // 60.00 V
  data.set([0xf4, 0x01], 26); // 5.00 A
  return controller(NinebotZParam.LIVE_DATA, data);
}

const BLE_VERSION = reply(NinebotZAddr.CONTROLLER, NinebotZParam.BLE_VERSION, bytesOf(0x01, 0x02), emptyGamma());
const KEY_REPLY = reply(NinebotZAddr.KEY_GENERATOR, NinebotZParam.GET_KEY, KEY, emptyGamma());
const SERIAL = controller(NinebotZParam.SERIAL_NUMBER, asciiBytes('N3TEST00000001'));
const FIRMWARE = controller(NinebotZParam.FIRMWARE, bytesOf(0x34, 0x12, 0x00, 0x00, 0x00, 0x00));
const VOLUME = controller(NinebotZParam.SPEAKER_VOLUME, bytesOf(0x28, 0x00));

function decodeAll(decoder: NinebotZDecoder, packets: Uint8Array[]): WheelState {
  let state = createWheelState();
  for (const packet of packets) {
    const result = decoder.decode(packet, state, config);
    if (result) state = result.newState;
  }
  return state;
}

function opened(command: WheelCommand | null | undefined, gamma: Uint8Array): number[] {
  if (command?.type !== 'SendBytes') throw new Error('expected SendBytes');
  const body = openNinebotFrame(command.data, gamma, 9);
  if (!body) throw new Error('checksum mismatch');
  return Array.from(body.subarray(0, body.length - 2));
}

function handshake(decoder: NinebotZDecoder): WheelState {
  return decodeAll(decoder, [BLE_VERSION, KEY_REPLY, SERIAL, FIRMWARE, lockParams(), ledParams(), VOLUME]);
}

describe('NinebotZDecoder', () => {
  it('starts by asking for the BLE version', () => {
    const [init] = new NinebotZDecoder().getInitCommands();
    // 1 + 0x3E + 0x14 + 0x01 + 0x68 + 0x02 = 0xBE -> 0xFF41
    expect(init).toEqual({
      type: 'SendBytes',
      data: Uint8Array.of(0x5a, 0xa5, 0x01, 0x3e, 0x14, 0x01, 0x68, 0x02, 0x41, 0xff),
    });
  });

  it('requests the key after the BLE version reply', () => {
    const decoder = new NinebotZDecoder();
    decodeAll(decoder, [BLE_VERSION]);

    expect(decoder.currentStage).toBe(NinebotZStage.WAIT_KEY);
    // 0 + 0x3E + 0x16 + 0x5B + 0x00 = 0xAF -> 0xFF50
    expect(decoder.getKeepAliveCommand()).toEqual({
      type: 'SendBytes',
      data: Uint8Array.of(0x5a, 0xa5, 0x00, 0x3e, 0x16, 0x5b, 0x00, 0x50, 0xff),
    });
  });

  it('stores the key and encrypts later requests with it', () => {
    const decoder = new NinebotZDecoder();
    decodeAll(decoder, [BLE_VERSION, KEY_REPLY]);

    expect(decoder.currentStage).toBe(NinebotZStage.SERIAL_NUMBER);
    expect(Array.from(decoder.gammaKey)).toEqual(Array.from(KEY));
    expect(opened(decoder.getKeepAliveCommand(), KEY)).toEqual([0x01, 0x3e, 0x14, 0x01, 0x10, 0x0e]);
  });

  it('walks every stage to READY', () => {
    const decoder = new NinebotZDecoder();
    const state = handshake(decoder);

    expect(decoder.currentStage).toBe(NinebotZStage.READY);
    expect(state.serialNumber).toBe('N3TEST00000001');
    expect(state.model).toBe('Ninebot Z');
    expect(state.version).toBe('2.3.4');
    expect(state.error).toBe('No');
    expect(state.speedAlarms).toBe(5);
    expect(state.ledMode).toBe(2);
    expect(state.pedalSensitivity).toBe(70);
    expect(state.handleButton).toBe(true);
    expect(state.drl).toBe(false);
    expect(state.speakerVolume).toBe(5);
    expect(opened(decoder.getKeepAliveCommand(), KEY)).toEqual([0x01, 0x3e, 0x14, 0x01, 0xb0, 0x20]);
  });

  it('ignores answers for a later stage', () => {
    const decoder = new NinebotZDecoder();
    decodeAll(decoder, [BLE_VERSION, KEY_REPLY, FIRMWARE]);
    expect(decoder.currentStage).toBe(NinebotZStage.SERIAL_NUMBER);
  });

  it('decodes live data', () => {
    const decoder = new NinebotZDecoder();
    handshake(decoder);
    const result = decoder.decode(liveData(), createWheelState(), config);
    const state = result?.newState;

    expect(state?.speed).toBe(2500);
    expect(state?.voltage).toBe(6000);
    expect(state?.current).toBe(500);
    expect(state?.power).toBe(30000);
    expect(state?.temperature).toBe(300);
    expect(state?.totalDistance).toBe(123456);
    expect(state?.wheelDistance).toBe(1000);
    expect(state?.batteryLevel).toBe(90);
    expect(state?.wheelType).toBe(WheelType.NINEBOT_Z);
    expect(result?.hasNewData).toBe(true);
  });

  it('is ready only after the handshake and live voltage', () => {
    const decoder = new NinebotZDecoder();
    decodeAll(decoder, [BLE_VERSION, KEY_REPLY, liveData()]);
    expect(decoder.isReady()).toBe(false);

    decodeAll(decoder, [SERIAL, FIRMWARE, lockParams(), ledParams(), VOLUME]);
    expect(decoder.isReady()).toBe(true);
  });

  it('reports firmware error codes', () => {
    const decoder = new NinebotZDecoder();
    decodeAll(decoder, [BLE_VERSION, KEY_REPLY, SERIAL]);
    const withError = controller(NinebotZParam.FIRMWARE, bytesOf(0x34, 0x12, 0x01, 0x00, 0x00, 0x00));
    expect(decodeAll(decoder, [withError]).error).toBe('Err:1 Motor hall sensor error');
  });

  it('detours through the BMS stages when asked', () => {
    const decoder = new NinebotZDecoder();
    handshake(decoder);
    decoder.setBmsReadingMode(true);

    expect(decoder.currentStage).toBe(NinebotZStage.BMS1_SN);
    expect(opened(decoder.getKeepAliveCommand(), KEY)).toEqual([0x01, 0x3e, 0x11, 0x01, 0x10, 0x22]);

    decoder.setBmsReadingMode(false);
    expect(decoder.currentStage).toBe(NinebotZStage.READY);
  });

  it('reads BMS life data', () => {
    const decoder = new NinebotZDecoder();
    handshake(decoder);
    const data = new Uint8Array(24);
    data.set([0xe8, 0x03], 2); // 1000 mAh
    data.set([0x50, 0x00], 4); // 80 %
    data.set([0x2c, 0x01], 6); // 3.00 A
    data.set([0x70, 0x17], 8); // 60.00 V
    data[10] = 45;
    const bms = decodeAll(decoder, [reply(NinebotZAddr.BMS1, 0x30, data)]).bms1;

    expect(bms?.remCap).toBe(1000);
    expect(bms?.remPerc).toBe(80);
    expect(bms?.current).toBe(3);
    expect(bms?.voltage).toBe(60);
    expect(bms?.temp1).toBe(25);
  });

  describe('buildCommand', () => {
    it('keeps the other drive flags when toggling DRL', () => {
      const decoder = new NinebotZDecoder();
      handshake(decoder);
      const [command] = decoder.buildCommand({ type: 'SetDrl', enabled: true });
      expect(opened(command, KEY)).toEqual([0x02, 0x3e, 0x14, 0x03, 0xd3, 0x05, 0x00]);
    });

    it('writes an LED colour', () => {
      const [command] = new NinebotZDecoder().buildCommand({ type: 'SetLedColor', value: 0x80, ledNum: 2 });
      expect(opened(command, emptyGamma())).toEqual([0x04, 0x3e, 0x14, 0x03, 0xca, 0x00, 0x00, 0x80, 0x00]);
    });

    it('scales the speaker volume', () => {
      const [command] = new NinebotZDecoder().buildCommand({ type: 'SetSpeakerVolume', volume: 5 });
      expect(opened(command, emptyGamma())).toEqual([0x02, 0x3e, 0x14, 0x03, 0xf5, 0x28, 0x00]);
    });

    it('drops unsupported commands', () => {
      const decoder = new NinebotZDecoder();
      expect(decoder.buildCommand({ type: 'PowerOff' })).toEqual([]);
      expect(decoder.buildCommand({ type: 'SetAlarmSpeed', speed: 20, num: 4 })).toEqual([]);
    });
  });

  it('forgets the key and stage on reset', () => {
    const decoder = new NinebotZDecoder();
    handshake(decoder);
    decoder.reset();
    decoder.reset();

    expect(decoder.currentStage).toBe(NinebotZStage.INIT);
    expect(Array.from(decoder.gammaKey)).toEqual(new Array<number>(16).fill(0));
    expect(decoder.isReady()).toBe(false);
    expect(decoder.getKeepAliveCommand()).toEqual(decoder.getInitCommands()[0]);
  });

  it('restores a saved key of the right size only', () => {
    const decoder = new NinebotZDecoder();
    decoder.setGamma(bytesOf(1, 2, 3));
    expect(decoder.gammaKey[0]).toBe(0);
    decoder.setGamma(KEY);
    expect(decoder.gammaKey[0]).toBe(0x10);
  });
});

describe('Ninebot Z helpers', () => {
  it('formats error codes', () => {
    expect(ninebotZErrorText(12)).toBe('Err:12 Failure of Gyroscope initialization');
    expect(ninebotZErrorText(99)).toBe('Err:99 Error');
  });

  it('unpacks BMS dates', () => {
    // 2021-03-15: (21 << 9) | (3 << 5) | 15
    expect(formatBmsDate((21 << 9) | (3 << 5) | 15)).toBe('15.03.2021');
  });
});
