/**
 * Telemetry samples and the gauge metrics drawn from them.
 */

import { currentA, powerW, pwmPercent, speedKmh, temperatureC, voltageV, type WheelState } from './wheel-state';

/** One snapshot in display units. */
export interface TelemetrySample {
  readonly timestampMs: number;
  readonly speedKmh: number;
  readonly voltageV: number;
  readonly currentA: number;
  readonly powerW: number;
  readonly temperatureC: number;
  readonly batteryPercent: number;
  readonly pwmPercent: number;
  readonly gpsSpeedKmh: number;
}

export function telemetrySampleFromState(
  state: WheelState,
  gpsSpeedKmh = 0,
  timestampMs: number = state.timestamp
): TelemetrySample {
  return {
    timestampMs,
    speedKmh: speedKmh(state),
    voltageV: voltageV(state),
    currentA: currentA(state),
    powerW: powerW(state),
    temperatureC: temperatureC(state),
    batteryPercent: state.batteryLevel,
    pwmPercent: pwmPercent(state),
    gpsSpeedKmh,
  };
}

export enum MetricType {
  SPEED = 'SPEED',
  BATTERY = 'BATTERY',
  POWER = 'POWER',
  PWM = 'PWM',
  TEMPERATURE = 'TEMPERATURE',
  GPS_SPEED = 'GPS_SPEED',
}

export interface MetricInfo {
  readonly label: string;
  readonly unit: string;
  /** Gauge maximum; 0 means track the largest value seen. */
  readonly maxValue: number;
  /** Gauge fraction where green ends. */
  readonly greenBelow: number;
  /** Gauge fraction where red starts. */
  readonly redAbove: number;
  readonly value: (sample: TelemetrySample) => number;
}

export const METRIC_INFO: Readonly<Record<MetricType, MetricInfo>> = {
  [MetricType.SPEED]: {
    label: 'Speed',
    unit: 'km/h',
    maxValue: 50,
    greenBelow: 0.5,
    redAbove: 0.75,
    value: (s) => s.speedKmh,
  },
  [MetricType.BATTERY]: {
    label: 'Battery',
    unit: '%',
    maxValue: 100,
    greenBelow: 0.5,
    redAbove: 0.75,
    value: (s) => s.batteryPercent,
  },
  [MetricType.POWER]: {
    label: 'Power',
    unit: 'W',
    maxValue: 0,
    greenBelow: 0.5,
    redAbove: 0.75,
    value: (s) => s.powerW,
  },
  [MetricType.PWM]: {
    label: 'PWM',
    unit: '%',
    maxValue: 100,
    greenBelow: 0.5,
    redAbove: 0.75,
    value: (s) => s.pwmPercent,
  },
  // 40 and 55 degrees of 80
  [MetricType.TEMPERATURE]: {
    label: 'Temp',
    unit: '°C',
    maxValue: 80,
    greenBelow: 0.5,
    redAbove: 0.6875,
    value: (s) => s.temperatureC,
  },
  [MetricType.GPS_SPEED]: {
    label: 'GPS Speed',
    unit: 'km/h',
    maxValue: 50,
    greenBelow: 0.5,
    redAbove: 0.75,
    value: (s) => s.gpsSpeedKmh,
  },
};

export const ALL_METRICS: readonly MetricType[] = Object.values(MetricType);

export function metricValue(metric: MetricType, sample: TelemetrySample): number {
  return METRIC_INFO[metric].value(sample);
}

export type ColorZone = 'GREEN' | 'ORANGE' | 'RED';

/**
 * Gauge colour for a fill fraction. Battery runs the other way: a full
 * gauge is green.
 */
export function colorZone(metric: MetricType, progress: number): ColorZone {
  const { greenBelow, redAbove } = METRIC_INFO[metric];
  if (metric === MetricType.BATTERY) {
    if (progress > greenBelow) return 'GREEN';
    if (progress > 1 - redAbove) return 'ORANGE';
    return 'RED';
  }
  if (progress < greenBelow) return 'GREEN';
  if (progress < redAbove) return 'ORANGE';
  return 'RED';
}
