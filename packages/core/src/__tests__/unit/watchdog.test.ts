/**
 * Tests for SlowConnectionWatchdog
 */

import { describe, it, expect, vi } from 'vitest';
import { SlowConnectionWatchdog } from '../../watchdog/index.js';
import { setupTimers } from './test-utils.js';

describe('SlowConnectionWatchdog', () => {
  setupTimers();

  it('fires once the threshold elapses', () => {
    const onSlow = vi.fn();
    const watchdog = new SlowConnectionWatchdog(1000, onSlow);
    watchdog.arm();

    vi.advanceTimersByTime(999);
    expect(watchdog.fired).toBe(false);
    expect(onSlow).not.toHaveBeenCalled();

    vi.advanceTimersByTime(1);
    expect(watchdog.fired).toBe(true);
    expect(onSlow).toHaveBeenCalledTimes(1);
  });

  it('sets the flag before running the callback', () => {
    let seenInCallback: boolean | undefined;
    const watchdog: SlowConnectionWatchdog = new SlowConnectionWatchdog(1000, () => {
      seenInCallback = watchdog.fired;
    });
    watchdog.arm();

    vi.advanceTimersByTime(1000);

    expect(seenInCallback).toBe(true);
  });

  it('does not fire after cancel', () => {
    const onSlow = vi.fn();
    const watchdog = new SlowConnectionWatchdog(1000, onSlow);
    watchdog.arm();

    vi.advanceTimersByTime(500);
    watchdog.cancel();
    vi.advanceTimersByTime(5000);

    expect(watchdog.fired).toBe(false);
    expect(onSlow).not.toHaveBeenCalled();
  });

  it('ignores a second arm', () => {
    const onSlow = vi.fn();
    const watchdog = new SlowConnectionWatchdog(1000, onSlow);
    watchdog.arm();
    vi.advanceTimersByTime(600);
    watchdog.arm();

    vi.advanceTimersByTime(400);
    expect(onSlow).toHaveBeenCalledTimes(1);

    vi.advanceTimersByTime(5000);
    expect(onSlow).toHaveBeenCalledTimes(1);
  });

  it('cannot be re-armed after cancel', () => {
    const onSlow = vi.fn();
    const watchdog = new SlowConnectionWatchdog(1000, onSlow);
    watchdog.cancel();
    watchdog.arm();

    vi.advanceTimersByTime(5000);

    expect(onSlow).not.toHaveBeenCalled();
  });

  it('keeps the flag when cancelled after firing', () => {
    const watchdog = new SlowConnectionWatchdog(1000, vi.fn());
    watchdog.arm();
    vi.advanceTimersByTime(1000);

    watchdog.cancel();

    expect(watchdog.fired).toBe(true);
  });

  it('survives a throwing callback', () => {
    const watchdog = new SlowConnectionWatchdog(1000, () => {
      throw new Error('notify-send missing');
    });
    watchdog.arm();

    expect(() => vi.advanceTimersByTime(1000)).not.toThrow();
    expect(watchdog.fired).toBe(true);
  });
});
