import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { LoadWatchdog } from './load-watchdog';

describe('LoadWatchdog', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('fires once after the timeout', () => {
    const watchdog = new LoadWatchdog();
    const onTimeout = vi.fn();

    watchdog.start(100, onTimeout);
    expect(watchdog.armed).toBe(true);

    vi.advanceTimersByTime(99);
    expect(onTimeout).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(onTimeout).toHaveBeenCalledTimes(1);
    expect(watchdog.armed).toBe(false);

    vi.advanceTimersByTime(1000);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });

  it('never fires after cancel', () => {
    const watchdog = new LoadWatchdog();
    const onTimeout = vi.fn();

    watchdog.start(100, onTimeout);
    watchdog.cancel();
    vi.advanceTimersByTime(500);

    expect(onTimeout).not.toHaveBeenCalled();
    expect(watchdog.armed).toBe(false);
  });

  it('replaces the previous arming on restart', () => {
    const watchdog = new LoadWatchdog();
    const first = vi.fn();
    const second = vi.fn();

    watchdog.start(100, first);
    vi.advanceTimersByTime(50);
    watchdog.start(100, second);

    vi.advanceTimersByTime(60);
    expect(first).not.toHaveBeenCalled();
    expect(second).not.toHaveBeenCalled();

    vi.advanceTimersByTime(40);
    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('tolerates cancel when nothing is armed', () => {
    const watchdog = new LoadWatchdog();
    expect(() => {
      watchdog.cancel();
      watchdog.cancel();
    }).not.toThrow();
  });

  it('can be re-armed from inside its own callback', () => {
    const watchdog = new LoadWatchdog();
    const second = vi.fn();

    watchdog.start(10, () => watchdog.start(10, second));
    vi.advanceTimersByTime(10);
    expect(watchdog.armed).toBe(true);

    vi.advanceTimersByTime(10);
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('caps timeouts beyond the timer limit instead of firing at once', () => {
    const watchdog = new LoadWatchdog();
    const onTimeout = vi.fn();

    watchdog.start(3_000_000_000, onTimeout);
    vi.advanceTimersByTime(60_000);

    expect(onTimeout).not.toHaveBeenCalled();
    expect(watchdog.armed).toBe(true);

    vi.advanceTimersByTime(2_147_483_647);
    expect(onTimeout).toHaveBeenCalledTimes(1);
  });
});
