/**
 * Periodic keep-alive ticker.
 *
 * Some families only send telemetry when polled (Inmotion, Ninebot); others
 * push on their own and never start the timer. Ticks are chained: the next
 * one is scheduled after the previous callback settles, so a slow write never
 * overlaps the next tick.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { errorMessage } from '../exceptions';

const TAG = 'KeepAliveTimer';

export interface KeepAliveStatus {
  isRunning: boolean;
  tickCount: number;
}

export type TickCallback = () => Promise<void> | void;

export class KeepAliveTimer {
  /** Observable running flag and tick counter. */
  readonly status: StoreApi<KeepAliveStatus> = createStore<KeepAliveStatus>()(() => ({
    isRunning: false,
    tickCount: 0,
  }));

  private handle: ReturnType<typeof setTimeout> | null = null;
  private intervalMs = 0;
  private onTick: TickCallback | null = null;
  // Bumped on every start/stop so a tick that was mid-flight cannot reschedule.
  private generation = 0;

  get isRunning(): boolean {
    return this.status.getState().isRunning;
  }

  get tickCount(): number {
    return this.status.getState().tickCount;
  }

  get interval(): number {
    return this.intervalMs;
  }

  /**
   * Start ticking every `intervalMs`. The first tick comes after
   * `initialDelayMs`, which defaults to one interval. An interval of 0 or
   * less leaves the timer stopped.
   */
  start(intervalMs: number, onTick: TickCallback, initialDelayMs: number = intervalMs): void {
    this.stop();
    if (intervalMs <= 0) return;

    this.intervalMs = intervalMs;
    this.onTick = onTick;
    this.status.setState({ isRunning: true, tickCount: 0 });
    this.schedule(this.generation, Math.max(0, initialDelayMs));
  }

  stop(): void {
    this.generation++;
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
    if (this.status.getState().isRunning) {
      this.status.setState({ isRunning: false });
    }
  }

  /** Start again with the last interval and callback, if any. */
  restart(): void {
    const callback = this.onTick;
    if (callback && this.intervalMs > 0) {
      this.start(this.intervalMs, callback);
    }
  }

  private schedule(generation: number, delayMs: number): void {
    this.handle = setTimeout(() => {
      this.handle = null;
      void this.tick(generation);
    }, delayMs);
  }

  private async tick(generation: number): Promise<void> {
    const callback = this.onTick;
    if (generation !== this.generation || !callback) return;

    try {
      await callback();
    } catch (error) {
      console.error(`[${TAG}] Tick callback failed: ${errorMessage(error)}`);
    }

    if (generation !== this.generation) return;
    this.status.setState((s) => ({ tickCount: s.tickCount + 1 }));
    this.schedule(generation, this.intervalMs);
  }
}
