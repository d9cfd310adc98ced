/**
 * Detects a silent link: fires once when no data has arrived for longer than
 * the threshold, then stops until started again.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';
import { errorMessage } from '../exceptions';

const TAG = 'DataTimeoutTracker';

export type TimeoutCallback = () => Promise<void> | void;

export class DataTimeoutTracker {
  static readonly DEFAULT_TIMEOUT_MS = 15_000;
  static readonly DEFAULT_CHECK_INTERVAL_MS = 1_000;

  readonly isTimedOut: StoreApi<boolean> = createStore<boolean>()(() => false);

  private handle: ReturnType<typeof setInterval> | null = null;
  private lastDataTime = 0;
  private timeoutMs = DataTimeoutTracker.DEFAULT_TIMEOUT_MS;

  constructor(private readonly checkIntervalMs: number = DataTimeoutTracker.DEFAULT_CHECK_INTERVAL_MS) {}

  get isActive(): boolean {
    return this.handle !== null;
  }

  start(onTimeout: TimeoutCallback, timeoutMs: number = DataTimeoutTracker.DEFAULT_TIMEOUT_MS): void {
    this.stop();
    this.timeoutMs = timeoutMs;
    this.lastDataTime = Date.now();
    this.isTimedOut.setState(false);

    this.handle = setInterval(() => {
      if (Date.now() - this.lastDataTime <= this.timeoutMs) return;
      this.stop();
      this.isTimedOut.setState(true);
      void this.fire(onTimeout);
    }, this.checkIntervalMs);
  }

  stop(): void {
    if (this.handle !== null) {
      clearInterval(this.handle);
      this.handle = null;
    }
    this.isTimedOut.setState(false);
  }

  /** Push the deadline forward. */
  onDataReceived(): void {
    this.lastDataTime = Date.now();
    if (this.isTimedOut.getState()) {
      this.isTimedOut.setState(false);
    }
  }

  timeSinceLastDataMs(): number {
    return Date.now() - this.lastDataTime;
  }

  private async fire(onTimeout: TimeoutCallback): Promise<void> {
    try {
      await onTimeout();
    } catch (error) {
      console.error(`[${TAG}] Timeout callback failed: ${errorMessage(error)}`);
    }
  }
}
