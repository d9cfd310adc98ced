/**
 * Rolling energy figures over the last few seconds of riding.
 *
 * Feed it one sample per state update; it keeps a 10 s window and reports
 * watt-hours used across that window plus the matching Wh/km. Results are
 * cached for a second, and a window whose newest sample is older than 2 s
 * keeps returning the last figure instead of decaying to zero.
 */

interface PowerSample {
  timeMs: number;
  distanceM: number;
  powerW: number;
}

export class EnergyCalculator {
  static readonly MAX_SAMPLE_AGE_MS = 10_000;
  static readonly STALE_AFTER_MS = 2_000;
  static readonly CACHE_MS = 1_000;

  private samples: PowerSample[] = [];
  private cachedPowerHour = 0;
  private cachedPowerHourAt = 0;
  private cachedWhPerKm = 0;
  private cachedWhPerKmAt = 0;

  get sampleCount(): number {
    return this.samples.length;
  }

  /**
   * @param powerW - Instantaneous power in watts
   * @param distanceM - Odometer reading in metres
   */
  pushSample(powerW: number, distanceM: number, nowMs: number = Date.now()): void {
    this.samples.push({ timeMs: nowMs, distanceM, powerW });
    this.prune(nowMs);
  }

  /** Watt-hours spent across the sample window. */
  getPowerHour(nowMs: number = Date.now()): number {
    if (nowMs - this.cachedPowerHourAt < EnergyCalculator.CACHE_MS) return this.cachedPowerHour;
    if (!this.isFresh(nowMs)) return this.cachedPowerHour;

    this.prune(nowMs);
    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (this.samples.length < 2 || !first || !last) return 0;

    const elapsedMs = last.timeMs - first.timeMs;
    if (elapsedMs <= 0) return 0;

    const avgPower = this.samples.reduce((sum, s) => sum + s.powerW, 0) / this.samples.length;
    this.cachedPowerHour = (avgPower * elapsedMs) / 3_600_000;
    this.cachedPowerHourAt = nowMs;
    return this.cachedPowerHour;
  }

  /** Consumption across the window, 0 while standing still. */
  getWhPerKm(nowMs: number = Date.now()): number {
    if (nowMs - this.cachedWhPerKmAt < EnergyCalculator.CACHE_MS) return this.cachedWhPerKm;
    if (!this.isFresh(nowMs)) return this.cachedWhPerKm;

    const first = this.samples[0];
    const last = this.samples[this.samples.length - 1];
    if (this.samples.length < 2 || !first || !last) return 0;

    const distanceM = last.distanceM - first.distanceM;
    if (distanceM <= 0) return 0;

    this.cachedWhPerKm = (this.getPowerHour(nowMs) * 1000) / distanceM;
    this.cachedWhPerKmAt = nowMs;
    return this.cachedWhPerKm;
  }

  reset(): void {
    this.samples = [];
    this.cachedPowerHour = 0;
    this.cachedPowerHourAt = 0;
    this.cachedWhPerKm = 0;
    this.cachedWhPerKmAt = 0;
  }

  private isFresh(nowMs: number): boolean {
    const last = this.samples[this.samples.length - 1];
    return last !== undefined && nowMs - last.timeMs < EnergyCalculator.STALE_AFTER_MS;
  }

  private prune(nowMs: number): void {
    const expiry = nowMs - EnergyCalculator.MAX_SAMPLE_AGE_MS;
    this.samples = this.samples.filter((s) => s.timeMs >= expiry);
  }
}
