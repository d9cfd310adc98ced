/**
 * Telemetry snapshot decoded from a wheel.
 *
 * Numeric telemetry is stored as fixed-point integers:
 * - speed: km/h x 100
 * - voltage: V x 100
 * - current / phaseCurrent: A x 100
 * - power: W x 100
 * - temperature / temperature2: degrees C x 100
 * - totalDistance / wheelDistance: meters
 * - output: PWM x 100 (percent x 100)
 *
 * Display-unit conversions are derived by the helpers below and never stored.
 */

import { KM_TO_MILES } from '../utils/bytes';
import type { SmartBms } from './bms';
import { WheelType } from './enums';

export interface WheelState {
  readonly speed: number;
  readonly voltage: number;
  readonly current: number;
  readonly phaseCurrent: number;
  readonly power: number;
  readonly temperature: number;
  readonly temperature2: number;
  readonly batteryLevel: number;
  readonly totalDistance: number;
  readonly wheelDistance: number;
  readonly output: number;
  /** PWM duty ratio 0..1 */
  readonly calculatedPwm: number;
  readonly angle: number;
  readonly roll: number;
  readonly torque: number;
  readonly motorPower: number;
  readonly cpuTemp: number;
  readonly imuTemp: number;
  readonly cpuLoad: number;
  readonly speedLimit: number;
  readonly currentLimit: number;
  readonly fanStatus: number;
  readonly chargingStatus: number;

  readonly wheelAlarm: boolean;
  readonly wheelType: WheelType;
  readonly name: string;
  readonly model: string;
  readonly modeStr: string;
  readonly version: string;
  readonly serialNumber: string;
  readonly btName: string;
  readonly bms1?: SmartBms;
  readonly bms2?: SmartBms;
  readonly inMiles: boolean;

  // Wheel-reported settings; -1 means not reported yet
  readonly pedalsMode: number;
  readonly speedAlarms: number;
  readonly rollAngle: number;
  readonly lightMode: number;
  readonly ledMode: number;
  readonly cutoutAngle: number;
  readonly maxSpeed: number;
  readonly pedalTilt: number;
  readonly pedalSensitivity: number;
  readonly speakerVolume: number;
  readonly lightBrightness: number;
  readonly tiltBackSpeed: number;

  readonly rideMode: boolean;
  readonly fancierMode: boolean;
  readonly mute: boolean;
  readonly handleButton: boolean;
  readonly drl: boolean;
  readonly transportMode: boolean;
  readonly goHomeMode: boolean;
  readonly fanQuiet: boolean;

  readonly error: string;
  readonly alert: string;
  /** Epoch milliseconds of the decode that produced this snapshot. */
  readonly timestamp: number;
}

export const EMPTY_WHEEL_STATE: WheelState = Object.freeze({
  speed: 0,
  voltage: 0,
  current: 0,
  phaseCurrent: 0,
  power: 0,
  temperature: 0,
  temperature2: 0,
  batteryLevel: 0,
  totalDistance: 0,
  wheelDistance: 0,
  output: 0,
  calculatedPwm: 0,
  angle: 0,
  roll: 0,
  torque: 0,
  motorPower: 0,
  cpuTemp: 0,
  imuTemp: 0,
  cpuLoad: 0,
  speedLimit: 0,
  currentLimit: 0,
  fanStatus: 0,
  chargingStatus: 0,
  wheelAlarm: false,
  wheelType: WheelType.UNKNOWN,
  name: '',
  model: '',
  modeStr: '',
  version: '',
  serialNumber: '',
  btName: '',
  inMiles: false,
  pedalsMode: -1,
  speedAlarms: -1,
  rollAngle: -1,
  lightMode: -1,
  ledMode: -1,
  cutoutAngle: -1,
  maxSpeed: -1,
  pedalTilt: -1,
  pedalSensitivity: -1,
  speakerVolume: -1,
  lightBrightness: -1,
  tiltBackSpeed: 0,
  rideMode: false,
  fancierMode: false,
  mute: false,
  handleButton: false,
  drl: false,
  transportMode: false,
  goHomeMode: false,
  fanQuiet: false,
  error: '',
  alert: '',
  timestamp: 0,
});

/** Fresh state, optionally seeded with a few fields. */
export function createWheelState(overrides: Partial<WheelState> = {}): WheelState {
  return { ...EMPTY_WHEEL_STATE, ...overrides };
}

/** Copy with changes, stamping the decode time. */
export function updateWheelState(
  state: WheelState,
  changes: Partial<WheelState>,
  timestamp: number = Date.now()
): WheelState {
  return { ...state, ...changes, timestamp };
}

// Derived display values

export function speedKmh(state: WheelState): number {
  return state.speed / 100;
}

export function speedMph(state: WheelState): number {
  return (state.speed / 100) * KM_TO_MILES;
}

export function voltageV(state: WheelState): number {
  return state.voltage / 100;
}

export function currentA(state: WheelState): number {
  return state.current / 100;
}

export function phaseCurrentA(state: WheelState): number {
  return state.phaseCurrent / 100;
}

export function powerW(state: WheelState): number {
  return state.power / 100;
}

export function temperatureC(state: WheelState): number {
  return state.temperature / 100;
}

/** Motor temperature where the wheel reports one. */
export function temperature2C(state: WheelState): number {
  return state.temperature2 / 100;
}

export function temperatureF(state: WheelState): number {
  return (state.temperature / 100) * 1.8 + 32;
}

export function totalDistanceKm(state: WheelState): number {
  return state.totalDistance / 1000;
}

export function wheelDistanceKm(state: WheelState): number {
  return state.wheelDistance / 1000;
}

export function pwmPercent(state: WheelState): number {
  return state.calculatedPwm * 100;
}

export function displaySpeed(state: WheelState, useMph: boolean): number {
  return useMph ? speedMph(state) : speedKmh(state);
}

export function displayTemperature(state: WheelState, useFahrenheit: boolean): number {
  return useFahrenheit ? temperatureF(state) : temperatureC(state);
}

/** Name shown for a connected wheel: advertised name, then model. */
export function displayName(state: WheelState): string {
  return state.name || state.model;
}
