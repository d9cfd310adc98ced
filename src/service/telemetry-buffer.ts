/**
 * Short rolling telemetry history for live charts.
 *
 * Keeps at most one sample per `sampleIntervalMs` and drops anything older
 * than `maxAgeMs` relative to the newest sample.
 */

import { ALL_METRICS, METRIC_INFO, metricValue, type MetricType, type TelemetrySample } from '../models/telemetry';

export interface MetricStats {
  min: number;
  max: number;
  avg: number;
}

// Gauge maximum for a dynamic metric before anything has been seen.
const DEFAULT_DYNAMIC_MAX = 1000;
// Headroom above the largest value seen.
const DYNAMIC_HEADROOM = 1.2;

export class TelemetryBuffer {
  private readonly buffer: TelemetrySample[] = [];
  private lastSampleAt: number | null = null;
  private readonly dynamicMax = new Map<MetricType, number>();

  constructor(
    private readonly sampleIntervalMs = 500,
    private readonly maxAgeMs = 60_000
  ) {}

  /** Oldest first. */
  get samples(): readonly TelemetrySample[] {
    return [...this.buffer];
  }

  /**
   * Append a sample unless one was taken less than the interval ago.
   *
   * @returns Whether the sample was kept
   */
  addSampleIfNeeded(sample: TelemetrySample): boolean {
    if (this.lastSampleAt !== null && sample.timestampMs - this.lastSampleAt < this.sampleIntervalMs) {
      return false;
    }
    this.lastSampleAt = sample.timestampMs;
    this.buffer.push(sample);

    const cutoff = sample.timestampMs - this.maxAgeMs;
    while (this.buffer.length > 0 && (this.buffer[0]?.timestampMs ?? cutoff) < cutoff) {
      this.buffer.shift();
    }

    for (const metric of ALL_METRICS) {
      if (METRIC_INFO[metric].maxValue !== 0) continue;
      const value = Math.abs(metricValue(metric, sample));
      if (value > (this.dynamicMax.get(metric) ?? 0)) {
        this.dynamicMax.set(metric, value);
      }
    }

    return true;
  }

  clear(): void {
    this.buffer.length = 0;
    this.lastSampleAt = null;
    this.dynamicMax.clear();
  }

  valuesFor(metric: MetricType): number[] {
    return this.buffer.map((sample) => metricValue(metric, sample));
  }

  /** Zeros when empty. */
  statsFor(metric: MetricType): MetricStats {
    const values = this.valuesFor(metric);
    if (values.length === 0) return { min: 0, max: 0, avg: 0 };
    return {
      min: Math.min(...values),
      max: Math.max(...values),
      avg: values.reduce((sum, v) => sum + v, 0) / values.length,
    };
  }

  /** Gauge maximum: the fixed one, or the largest value seen plus headroom. */
  effectiveMax(metric: MetricType): number {
    const fixed = METRIC_INFO[metric].maxValue;
    if (fixed > 0) return fixed;
    const tracked = this.dynamicMax.get(metric) ?? 0;
    return tracked > 0 ? tracked * DYNAMIC_HEADROOM : DEFAULT_DYNAMIC_MAX;
  }
}
