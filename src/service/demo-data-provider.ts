/**
 * Synthetic ride for trying the UI without a wheel.
 *
 * Publishes a new {@link WheelState} at 10 Hz through a zustand store, looping
 * a one-minute ride: accelerate, cruise, slow down, stop. A 16-cell BMS
 * snapshot is refreshed once a second.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { createSmartBms, setCell, updateCellStats, type SmartBms } from '../models/bms';
import { WheelType } from '../models/enums';
import { createWheelState, EMPTY_WHEEL_STATE, type WheelState } from '../models/wheel-state';

const TAG = 'DemoDataProvider';

const TICK_MS = 100;
const RIDE_TICKS = 600;
const CELL_COUNT = 16;
const PACK_CAPACITY = 9600;
const ODOMETER_START_M = 1_523_500;

export class DemoDataProvider {
  readonly wheelState: StoreApi<WheelState> = createStore<WheelState>()(() => EMPTY_WHEEL_STATE);

  private handle: ReturnType<typeof setInterval> | null = null;
  private tick = 0;
  private speed = 0;
  private battery = 85;
  private tripM = 0;

  get isRunning(): boolean {
    return this.handle !== null;
  }

  /** Begin a fresh ride; the first state is published immediately. */
  start(): void {
    if (this.handle) return;
    console.log(`[${TAG}] Starting demo ride`);
    this.tick = 0;
    this.speed = 0;
    this.battery = 85;
    this.tripM = 0;

    this.handle = setInterval(() => this.generate(), TICK_MS);
    this.generate();
  }

  /** Stop and publish an empty state. */
  stop(): void {
    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
      console.log(`[${TAG}] Demo ride stopped`);
    }
    this.wheelState.setState(EMPTY_WHEEL_STATE, true);
  }

  private generate(): void {
    const tick = ++this.tick;
    const phase = (tick % RIDE_TICKS) / RIDE_TICKS;

    if (phase < 0.2) {
      this.speed = Math.min(this.speed + 0.5, 25);
    } else if (phase < 0.7) {
      this.speed = 22 + Math.sin(tick * 0.1) * 3;
    } else if (phase < 0.9) {
      this.speed = Math.max(this.speed - 0.3, 5);
    } else {
      this.speed = Math.max(this.speed - 1, 0);
    }
    const speed = this.speed;

    const current = speed > 0 ? speed * 0.8 + Math.sin(tick * 0.05) * 2 : 0;
    const temperature = 25 + (speed / 25) * 10 + Math.sin(tick * 0.01) * 2;
    // Sag under load
    const voltage = 84 - current * 0.05;
    const power = voltage * current;

    // About 1% every 10 s
    if (tick % 100 === 0 && this.battery > 10) {
      this.battery--;
    }
    this.tripM += (speed / 3.6) * (TICK_MS / 1000);

    const bms1 =
      tick === 1 || tick % 10 === 0 ? this.buildBms(voltage, current) : this.wheelState.getState().bms1;

    this.wheelState.setState(
      createWheelState({
        speed: Math.trunc(speed * 100),
        voltage: Math.trunc(voltage * 100),
        current: Math.trunc(current * 100),
        power: Math.trunc(power * 100),
        temperature: Math.trunc(temperature * 100),
        batteryLevel: this.battery,
        totalDistance: Math.trunc(ODOMETER_START_M + this.tripM),
        wheelDistance: Math.trunc(this.tripM),
        calculatedPwm: speed / 50,
        wheelType: WheelType.UNKNOWN,
        name: 'Demo',
        model: 'Demo Wheel',
        bms1,
        timestamp: Date.now(),
      }),
      true
    );
  }

  private buildBms(packVoltage: number, packCurrent: number): SmartBms {
    const bms = createSmartBms();
    bms.serialNumber = 'DEMO-BMS-001';
    bms.versionNumber = '1.0.0';
    bms.factoryCap = PACK_CAPACITY;
    bms.actualCap = PACK_CAPACITY;
    bms.fullCycles = 42;
    bms.chargeCount = 100;
    bms.mfgDateStr = '01.01.2024';
    bms.status = 1;
    bms.remCap = Math.trunc((PACK_CAPACITY * this.battery) / 100);
    bms.remPerc = this.battery;
    bms.current = packCurrent;
    bms.voltage = packVoltage;
    bms.temp1 = 25 + Math.sin(this.tick * 0.01) * 3;
    bms.temp2 = 24 + Math.sin(this.tick * 0.012) * 2;
    bms.health = 98;

    const nominal = packVoltage / CELL_COUNT;
    for (let i = 0; i < CELL_COUNT; i++) {
      setCell(bms, i, nominal + Math.sin((this.tick + i * 37) * 0.02) * 0.015);
    }
    updateCellStats(bms, CELL_COUNT);
    return bms;
  }
}
