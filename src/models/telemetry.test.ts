import { describe, expect, it } from 'vitest';
import { colorZone, METRIC_INFO, metricValue, MetricType, telemetrySampleFromState } from './telemetry';
import { createWheelState } from './wheel-state';

describe('telemetry', () => {
  it('converts a state snapshot to display units', () => {
    const state = createWheelState({
      speed: 2534,
      voltage: 8400,
      current: 1250,
      power: 105000,
      temperature: 3550,
      batteryLevel: 80,
      calculatedPwm: 0.25,
      timestamp: 1234,
    });
    expect(telemetrySampleFromState(state, 24)).toEqual({
      timestampMs: 1234,
      speedKmh: 25.34,
      voltageV: 84,
      currentA: 12.5,
      powerW: 1050,
      temperatureC: 35.5,
      batteryPercent: 80,
      pwmPercent: 25,
      gpsSpeedKmh: 24,
    });
  });

  it('reads each metric from its own field', () => {
    const sample = telemetrySampleFromState(createWheelState({ batteryLevel: 61 }), 17, 0);
    expect(metricValue(MetricType.BATTERY, sample)).toBe(61);
    expect(metricValue(MetricType.GPS_SPEED, sample)).toBe(17);
    expect(METRIC_INFO[MetricType.TEMPERATURE].unit).toBe('°C');
  });

  it('colours gauges green, then orange, then red', () => {
    expect(colorZone(MetricType.SPEED, 0.4)).toBe('GREEN');
    expect(colorZone(MetricType.SPEED, 0.6)).toBe('ORANGE');
    expect(colorZone(MetricType.SPEED, 0.75)).toBe('RED');
    expect(colorZone(MetricType.TEMPERATURE, 0.68)).toBe('ORANGE');
    expect(colorZone(MetricType.TEMPERATURE, 0.6875)).toBe('RED');
  });

  it('colours the battery gauge the other way round', () => {
    expect(colorZone(MetricType.BATTERY, 0.6)).toBe('GREEN');
    expect(colorZone(MetricType.BATTERY, 0.3)).toBe('ORANGE');
    expect(colorZone(MetricType.BATTERY, 0.25)).toBe('RED');
  });
});
