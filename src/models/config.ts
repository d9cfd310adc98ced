/**
 * Decoder configuration.
 *
 * These are user preferences that change how raw values are interpreted,
 * not transport settings.
 */

import { ConfigurationError } from '../exceptions';

export interface DecoderConfig {
  readonly useMph: boolean;
  readonly useFahrenheit: boolean;
  /** Select the "better" battery curves over the legacy linear ones. */
  readonly useCustomPercents: boolean;
  /** Cell voltage x 100 at which tilt-back kicks in. */
  readonly cellVoltageTiltback: number;
  /** Rated speed (km/h x 10) at rotationVoltage, used for PWM estimation. */
  readonly rotationSpeed: number;
  /** Voltage (V x 10) the rotation speed is rated at. */
  readonly rotationVoltage: number;
  readonly powerFactor: number;
  readonly batteryCapacity: number;
  readonly wheelPassword: string;
  /** 0 = take absolute values, otherwise a sign multiplier (1 or -1). */
  readonly gotwayNegative: number;
  /** Apply the 0.875 wheel-size ratio to Gotway speed and distance. */
  readonly useRatio: boolean;
  /** Index into GOTWAY_VOLTAGE_SCALERS. */
  readonly gotwayVoltage: number;
  /** Report Veteran PWM from the hardware field instead of estimating it. */
  readonly hwPwmEnabled: boolean;
  /** Early KS-18L firmware reports distance in its own unit; scale it to km. */
  readonly ks18lScaler: boolean;
}

/** Pack voltage multipliers relative to a 67.2 V (16s) pack. */
export const GOTWAY_VOLTAGE_SCALERS: readonly number[] = [
  1, 1.25, 1.5, 1.7380952380952381, 2, 2.5, 2.25,
];

export const DEFAULT_DECODER_CONFIG: DecoderConfig = Object.freeze({
  useMph: false,
  useFahrenheit: false,
  useCustomPercents: false,
  cellVoltageTiltback: 330,
  rotationSpeed: 500,
  rotationVoltage: 840,
  powerFactor: 100,
  batteryCapacity: 0,
  wheelPassword: '',
  gotwayNegative: 0,
  useRatio: false,
  gotwayVoltage: 0,
  hwPwmEnabled: false,
  ks18lScaler: false,
});

/**
 * Build a config from defaults plus overrides.
 *
 * @throws {ConfigurationError} If a value is out of range
 */
export function createDecoderConfig(overrides: Partial<DecoderConfig> = {}): DecoderConfig {
  const config: DecoderConfig = { ...DEFAULT_DECODER_CONFIG, ...overrides };

  if (
    !Number.isInteger(config.gotwayVoltage) ||
    config.gotwayVoltage < 0 ||
    config.gotwayVoltage >= GOTWAY_VOLTAGE_SCALERS.length
  ) {
    throw new ConfigurationError(
      `gotwayVoltage must be an integer 0..${GOTWAY_VOLTAGE_SCALERS.length - 1}, got ${config.gotwayVoltage}`
    );
  }
  if (![-1, 0, 1].includes(config.gotwayNegative)) {
    throw new ConfigurationError(
      `gotwayNegative must be -1, 0 or 1, got ${config.gotwayNegative}`
    );
  }
  if (config.rotationSpeed < 0 || config.rotationVoltage < 0 || config.powerFactor < 0) {
    throw new ConfigurationError('Rotation speed, rotation voltage and power factor must not be negative');
  }
  if (config.batteryCapacity < 0) {
    throw new ConfigurationError(`batteryCapacity must not be negative, got ${config.batteryCapacity}`);
  }

  return config;
}

/** Scaler for the configured Gotway pack voltage. */
export function gotwayVoltageScaler(config: DecoderConfig): number {
  return GOTWAY_VOLTAGE_SCALERS[config.gotwayVoltage] ?? 1;
}
