import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { EMPTY_WHEEL_STATE } from '../models/wheel-state';
import { DemoDataProvider } from './demo-data-provider';

describe('DemoDataProvider', () => {
  let demo: DemoDataProvider;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    demo = new DemoDataProvider();
  });

  afterEach(() => {
    demo.stop();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('publishes the first tick right away', () => {
    demo.start();
    const state = demo.wheelState.getState();

    expect(demo.isRunning).toBe(true);
    expect(state.speed).toBe(50);
    expect(state.voltage).toBe(8397);
    expect(state.current).toBe(49);
    expect(state.power).toBe(4198);
    expect(state.temperature).toBe(2521);
    expect(state.batteryLevel).toBe(85);
    expect(state.wheelDistance).toBe(0);
    expect(state.totalDistance).toBe(1_523_500);
    expect(state.calculatedPwm).toBe(0.01);
    expect(state.name).toBe('Demo');
    expect(state.model).toBe('Demo Wheel');
  });

  it('attaches a 16-cell BMS snapshot', () => {
    demo.start();
    const bms = demo.wheelState.getState().bms1;

    expect(bms?.serialNumber).toBe('DEMO-BMS-001');
    expect(bms?.remCap).toBe(8160);
    expect(bms?.remPerc).toBe(85);
    expect(bms?.cellNum).toBe(16);
    expect(bms?.cells[16]).toBe(0);
  });

  it('reuses the BMS snapshot between refreshes', () => {
    demo.start();
    const first = demo.wheelState.getState().bms1;
    vi.advanceTimersByTime(100);
    expect(demo.wheelState.getState().bms1).toBe(first);
  });

  it('accelerates at 10 Hz', () => {
    demo.start();
    vi.advanceTimersByTime(100);
    expect(demo.wheelState.getState().speed).toBe(100);
  });

  it('drains a percent of battery every hundred ticks', () => {
    demo.start();
    vi.advanceTimersByTime(9_900);
    expect(demo.wheelState.getState().batteryLevel).toBe(84);
    expect(demo.wheelState.getState().bms1?.remCap).toBe(8064);
  });

  it('clears the state on stop and ignores a second start', () => {
    demo.start();
    demo.start();
    expect(demo.wheelState.getState().speed).toBe(50);

    demo.stop();
    expect(demo.isRunning).toBe(false);
    expect(demo.wheelState.getState()).toEqual(EMPTY_WHEEL_STATE);
    vi.advanceTimersByTime(500);
    expect(demo.wheelState.getState()).toEqual(EMPTY_WHEEL_STATE);
  });
});
