import { describe, expect, it } from 'vitest';
import { MetricType, type TelemetrySample } from '../models/telemetry';
import { TelemetryBuffer } from './telemetry-buffer';

function sample(timestampMs: number, speedKmh = 0, powerW = 0): TelemetrySample {
  return {
    timestampMs,
    speedKmh,
    voltageV: 84,
    currentA: 0,
    powerW,
    temperatureC: 30,
    batteryPercent: 80,
    pwmPercent: 0,
    gpsSpeedKmh: 0,
  };
}

describe('TelemetryBuffer', () => {
  it('keeps one sample per interval', () => {
    const buffer = new TelemetryBuffer();
    expect(buffer.addSampleIfNeeded(sample(0))).toBe(true);
    expect(buffer.addSampleIfNeeded(sample(200))).toBe(false);
    expect(buffer.addSampleIfNeeded(sample(500))).toBe(true);
    expect(buffer.samples.map((s) => s.timestampMs)).toEqual([0, 500]);
  });

  it('drops samples older than the window', () => {
    const buffer = new TelemetryBuffer(500, 1000);
    for (const t of [0, 500, 1000, 1600]) buffer.addSampleIfNeeded(sample(t));
    expect(buffer.samples.map((s) => s.timestampMs)).toEqual([1000, 1600]);
  });

  it('summarises a metric', () => {
    const buffer = new TelemetryBuffer();
    buffer.addSampleIfNeeded(sample(0, 10));
    buffer.addSampleIfNeeded(sample(500, 30));
    buffer.addSampleIfNeeded(sample(1000, 20));
    expect(buffer.valuesFor(MetricType.SPEED)).toEqual([10, 30, 20]);
    expect(buffer.statsFor(MetricType.SPEED)).toEqual({ min: 10, max: 30, avg: 20 });
    expect(new TelemetryBuffer().statsFor(MetricType.SPEED)).toEqual({ min: 0, max: 0, avg: 0 });
  });

  it('tracks the largest power seen for the gauge', () => {
    const buffer = new TelemetryBuffer();
    expect(buffer.effectiveMax(MetricType.POWER)).toBe(1000);
    buffer.addSampleIfNeeded(sample(0, 0, -500));
    buffer.addSampleIfNeeded(sample(500, 0, 300));
    expect(buffer.effectiveMax(MetricType.POWER)).toBe(600);
    expect(buffer.effectiveMax(MetricType.SPEED)).toBe(50);
  });

  it('forgets everything on clear', () => {
    const buffer = new TelemetryBuffer();
    buffer.addSampleIfNeeded(sample(1000, 0, 2000));
    buffer.clear();
    expect(buffer.samples).toEqual([]);
    expect(buffer.effectiveMax(MetricType.POWER)).toBe(1000);
    expect(buffer.addSampleIfNeeded(sample(1100))).toBe(true);
  });
});
