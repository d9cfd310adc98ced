import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { KeepAliveTimer } from './keep-alive-timer';

describe('KeepAliveTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('ticks once per interval, starting after one interval', async () => {
    const timer = new KeepAliveTimer();
    const onTick = vi.fn();
    timer.start(100, onTick);

    await vi.advanceTimersByTimeAsync(99);
    expect(onTick).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(onTick).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(200);
    expect(onTick).toHaveBeenCalledTimes(3);
    expect(timer.tickCount).toBe(3);
    timer.stop();
  });

  it('honours an initial delay', async () => {
    const timer = new KeepAliveTimer();
    const onTick = vi.fn();
    timer.start(100, onTick, 0);

    await vi.advanceTimersByTimeAsync(0);
    expect(onTick).toHaveBeenCalledTimes(1);
    timer.stop();
  });

  it('waits for a slow tick before scheduling the next', async () => {
    const timer = new KeepAliveTimer();
    const onTick = vi.fn(() => new Promise<void>((resolve) => setTimeout(resolve, 250)));
    timer.start(100, onTick);

    // tick at 100 settles at 350, next tick at 450
    await vi.advanceTimersByTimeAsync(449);
    expect(onTick).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(onTick).toHaveBeenCalledTimes(2);
    timer.stop();
  });

  it('stops ticking and publishes the running flag', async () => {
    const timer = new KeepAliveTimer();
    const seen: boolean[] = [];
    timer.status.subscribe((s) => seen.push(s.isRunning));
    const onTick = vi.fn();

    timer.start(50, onTick);
    expect(timer.isRunning).toBe(true);
    timer.stop();
    await vi.advanceTimersByTimeAsync(500);

    expect(onTick).not.toHaveBeenCalled();
    expect(timer.isRunning).toBe(false);
    expect(seen).toEqual([true, false]);
  });

  it('stays stopped for a non-positive interval', () => {
    const timer = new KeepAliveTimer();
    timer.start(0, vi.fn());
    expect(timer.isRunning).toBe(false);
  });

  it('keeps ticking after a callback throws', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const timer = new KeepAliveTimer();
    const onTick = vi.fn(() => {
      throw new Error('write failed');
    });
    timer.start(100, onTick);

    await vi.advanceTimersByTimeAsync(200);
    expect(onTick).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledWith('[KeepAliveTimer] Tick callback failed: write failed');
    timer.stop();
  });

  it('restarts with the previous interval and callback', async () => {
    const timer = new KeepAliveTimer();
    const onTick = vi.fn();
    timer.start(100, onTick);
    timer.stop();
    timer.restart();

    expect(timer.interval).toBe(100);
    await vi.advanceTimersByTimeAsync(100);
    expect(onTick).toHaveBeenCalledTimes(1);
    timer.stop();
  });
});
