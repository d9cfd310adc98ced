/**
 * Battery percentage from pack voltage.
 *
 * Two curve variants exist per voltage class: a legacy linear ramp and a
 * "better" piecewise curve that tracks the flat middle of a Li-ion discharge
 * more closely. Voltages are V x 100; results are clamped to 0..100.
 */

import curveData from './data/battery-curves.json';

export interface LinearCurve {
  min: number;
  max: number;
  divisor: number;
  rounding: string;
}

export interface CurveSegment {
  above: number;
  offset: number;
  divisor: number;
  /** Percent already reached at `offset`. */
  base?: number;
  rounding: string;
}

export interface PiecewiseCurve {
  full: number;
  segments: CurveSegment[];
}

export interface CurveSet {
  legacy: LinearCurve;
  better?: PiecewiseCurve;
}

/**
 * Voltage classes named by nominal full-charge voltage.
 */
export type VoltageClass = 'v67' | 'v84' | 'v100' | 'v126' | 'v151' | 'v176';

const kingsongCurves: Record<VoltageClass, CurveSet> = curveData.kingsong;
const veteranCurves: Record<string, CurveSet> = curveData.veteran;
const gotwayLegacy: LinearCurve = curveData.gotway.legacy;
const inmotionCurves: Record<'r1' | 'v8' | 'v10', CurveSet> = curveData.inmotion;
const inmotionStandard: PiecewiseCurve = curveData.inmotion.standard;

/**
 * Inmotion V1 pack groups: R1/R0, V5/V8/Glide 3, V10, L6 (no estimate),
 * and the stepped curve used by everything else.
 */
export type InmotionBatteryGroup = 'r1' | 'v8' | 'v10' | 'l6' | 'standard';

function applyRounding(value: number, rounding: string): number {
  return rounding === 'round' ? Math.round(value) : Math.trunc(value);
}

function clampPercent(value: number): number {
  return Math.max(0, Math.min(100, value));
}

/** Linear ramp: 0 below min, 100 at or above max. */
export function evaluateLinear(voltage: number, curve: LinearCurve): number {
  if (voltage <= curve.min) return 0;
  if (voltage >= curve.max) return 100;
  return clampPercent(applyRounding((voltage - curve.min) / curve.divisor, curve.rounding));
}

/** Piecewise curve: 100 above `full`, first matching segment, else 0. */
export function evaluatePiecewise(voltage: number, curve: PiecewiseCurve): number {
  if (voltage > curve.full) return 100;
  for (const segment of curve.segments) {
    if (voltage > segment.above) {
      return clampPercent(
        applyRounding((voltage - segment.offset) / segment.divisor + (segment.base ?? 0), segment.rounding)
      );
    }
  }
  return 0;
}

function evaluateSet(voltage: number, set: CurveSet, useBetter: boolean): number {
  if (useBetter && set.better) {
    return evaluatePiecewise(voltage, set.better);
  }
  return evaluateLinear(voltage, set.legacy);
}

/**
 * Kingsong-style curve for a voltage class. Gotway and Veteran reuse some
 * of these "better" curves for matching pack sizes.
 */
export function batteryPercentForClass(
  voltage: number,
  voltageClass: VoltageClass,
  useBetter: boolean
): number {
  return evaluateSet(voltage, kingsongCurves[voltageClass], useBetter);
}

/** Gotway 16s pack (voltage already normalised to 67.2 V). */
export function gotwayBatteryPercent(voltage: number, useBetter: boolean): number {
  if (useBetter) {
    return batteryPercentForClass(voltage, 'v67', true);
  }
  return evaluateLinear(voltage, gotwayLegacy);
}

/**
 * Veteran pack by firmware major version.
 *
 * 4/7/43 are 126 V packs, 5/6/42 are 151 V, 8 is 176 V, older firmware 100 V.
 * Unrecognised firmware reports 1%.
 */
export function veteranBatteryPercent(
  voltage: number,
  firmwareMajor: number,
  useBetter: boolean
): number {
  if (firmwareMajor < 4) {
    return evaluateSet(voltage, veteranCurves['v100'], useBetter);
  }
  if (firmwareMajor === 4 || firmwareMajor === 7 || firmwareMajor === 43) {
    return useBetter
      ? batteryPercentForClass(voltage, 'v126', true)
      : evaluateLinear(voltage, veteranCurves['v126'].legacy);
  }
  if (firmwareMajor === 5 || firmwareMajor === 6 || firmwareMajor === 42) {
    return useBetter
      ? batteryPercentForClass(voltage, 'v151', true)
      : evaluateLinear(voltage, veteranCurves['v151'].legacy);
  }
  if (firmwareMajor === 8) {
    return evaluateSet(voltage, veteranCurves['v176'], useBetter);
  }
  return 1;
}

/** Inmotion V1 pack by model group. */
export function inmotionBatteryPercent(
  voltage: number,
  group: InmotionBatteryGroup,
  useBetter: boolean
): number {
  switch (group) {
    case 'l6':
      return 0;
    case 'standard':
      return evaluatePiecewise(voltage, inmotionStandard);
    case 'r1':
      return evaluateLinear(voltage, inmotionCurves.r1.legacy);
    default:
      return evaluateSet(voltage, inmotionCurves[group], useBetter);
  }
}
