import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createDecoderConfig } from '../../models/config';
import { WheelType } from '../../models/enums';
import { createWheelState } from '../../models/wheel-state';
import { asciiBytes } from '../../utils/bytes';
import { formatVeteranVersion, VeteranDecoder, veteranCellCount, veteranModelName } from './veteran';

const config = createDecoderConfig();

function liveFrame(): Uint8Array {
  const frame = new Uint8Array(36);
  frame.set([0xdc, 0x5a, 0x5c, 32], 0);
  frame.set([0x27, 0x10], 4); // 100.00 V
  frame.set([0x00, 0xfa], 6); // 250 -> 25.00 km/h
  frame.set([0x03, 0xe8, 0x00, 0x00], 8); // trip 1000 m
  frame.set([0xe2, 0x40, 0x00, 0x01], 12); // total 123456 m
  frame.set([0x00, 0x96], 16); // phase 150 -> 15.00 A
  frame.set([0x0d, 0xac], 18); // 35.00 C
  frame.set([0x0b, 0xd3], 28); // firmware 3027
  frame.set([0x01, 0xf4], 32); // pitch 5.00
  frame.set([0x04, 0xd2], 34); // hardware PWM 1234
  return frame;
}

describe('VeteranDecoder', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(10_000);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns null until a frame completes', () => {
    expect(new VeteranDecoder().decode(liveFrame().subarray(0, 20), createWheelState(), config)).toBeNull();
  });

  it('decodes a live frame', () => {
    const result = new VeteranDecoder().decode(liveFrame(), createWheelState(), config);
    const state = result?.newState;

    expect(state?.voltage).toBe(10000);
    expect(state?.speed).toBe(2500);
    expect(state?.wheelDistance).toBe(1000);
    expect(state?.totalDistance).toBe(123456);
    expect(state?.phaseCurrent).toBe(1500);
    expect(state?.temperature).toBe(3500);
    expect(state?.angle).toBe(5);
    expect(state?.version).toBe('0003.0.27');
    expect(state?.model).toBe('Sherman S');
    expect(state?.wheelType).toBe(WheelType.VETERAN);
    // Estimated PWM: 2500 / (500 / 840 * 10000 * 100)
    expect(state?.calculatedPwm).toBeCloseTo(0.0042, 10);
    expect(state?.output).toBe(42);
    expect(state?.current).toBe(6);
    expect(state?.batteryLevel).toBe(100);
    expect(result?.hasNewData).toBe(true);
  });

  it('uses the hardware PWM when enabled', () => {
    const hw = createDecoderConfig({ hwPwmEnabled: true });
    const state = new VeteranDecoder().decode(liveFrame(), createWheelState(), hw)?.newState;
    expect(state?.output).toBe(1234);
    expect(state?.calculatedPwm).toBe(0.1234);
    // round(0.1234 * 1500)
    expect(state?.current).toBe(185);
  });

  it('joins a frame split across quick notifications', () => {
    const decoder = new VeteranDecoder();
    const frame = liveFrame();
    expect(decoder.decode(frame.subarray(0, 20), createWheelState(), config)).toBeNull();
    vi.advanceTimersByTime(50);
    expect(decoder.decode(frame.subarray(20), createWheelState(), config)?.newState.voltage).toBe(10000);
  });

  it('drops a partial frame after a long gap', () => {
    const decoder = new VeteranDecoder();
    const frame = liveFrame();
    decoder.decode(frame.subarray(0, 20), createWheelState(), config);
    vi.advanceTimersByTime(150);
    expect(decoder.decode(frame.subarray(20), createWheelState(), config)).toBeNull();
  });

  it('is ready after one frame with voltage', () => {
    const decoder = new VeteranDecoder();
    expect(decoder.isReady()).toBe(false);
    decoder.decode(liveFrame(), createWheelState(), config);
    expect(decoder.isReady()).toBe(true);
    expect(decoder.firmwareMajor).toBe(3);
  });

  it('resets to a fresh decoder', () => {
    const decoder = new VeteranDecoder();
    decoder.decode(liveFrame(), createWheelState(), config);
    decoder.reset();
    decoder.reset();
    expect(decoder.isReady()).toBe(false);
    expect(decoder.firmwareMajor).toBe(0);
    expect(decoder.buildCommand({ type: 'Beep' })).toEqual([{ type: 'SendBytes', data: asciiBytes('b') }]);
  });

  it('has no init or keep-alive traffic', () => {
    const decoder = new VeteranDecoder();
    expect(decoder.getInitCommands()).toEqual([]);
    expect(decoder.getKeepAliveCommand()).toBeNull();
    expect(decoder.keepAliveIntervalMs).toBe(0);
  });

  it('builds text commands', () => {
    const decoder = new VeteranDecoder();
    expect(decoder.buildCommand({ type: 'SetLight', enabled: false })).toEqual([
      { type: 'SendBytes', data: asciiBytes('SetLightOFF') },
    ]);
    expect(decoder.buildCommand({ type: 'SetPedalsMode', mode: 1 })).toEqual([
      { type: 'SendBytes', data: asciiBytes('SETm') },
    ]);
    expect(decoder.buildCommand({ type: 'ResetTrip' })).toEqual([
      { type: 'SendBytes', data: asciiBytes('CLEARMETER') },
    ]);
    expect(decoder.buildCommand({ type: 'Calibrate' })).toEqual([]);
  });

  it('sends the binary beep to newer firmware', () => {
    const decoder = new VeteranDecoder();
    decoder.decode(liveFrame(), createWheelState(), config);
    const [beep] = decoder.buildCommand({ type: 'Beep' });
    expect(beep.type === 'SendBytes' && beep.data[0]).toBe(0x4c);
  });
});

describe('Veteran model helpers', () => {
  it('names models and counts cells by firmware major', () => {
    expect(veteranModelName(4)).toBe('Patton');
    expect(veteranModelName(99)).toBe('Unknown Veteran');
    expect(veteranCellCount(4)).toBe(30);
    expect(veteranCellCount(5)).toBe(36);
    expect(veteranCellCount(8)).toBe(42);
    expect(veteranCellCount(2)).toBe(24);
  });

  it('formats versions like the official app', () => {
    expect(formatVeteranVersion(42105)).toBe('00042.1.5');
    expect(formatVeteranVersion(3027)).toBe('0003.0.27');
  });
});
