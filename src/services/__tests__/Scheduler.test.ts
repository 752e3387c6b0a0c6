import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TimerScheduler } from '../Scheduler';
import { VirtualScheduler } from '../../test/VirtualScheduler';

describe('TimerScheduler', () => {
  let scheduler: TimerScheduler;

  beforeEach(() => {
    vi.useFakeTimers();
    scheduler = new TimerScheduler();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    const done = vi.fn();
    scheduler.sleep(1000).then(done);

    await vi.advanceTimersByTimeAsync(999);
    expect(done).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(done).toHaveBeenCalledOnce();
  });

  it('should resolve early when aborted', async () => {
    const controller = new AbortController();
    const done = vi.fn();
    scheduler.sleep(60_000, controller.signal).then(done);

    controller.abort();
    await vi.advanceTimersByTimeAsync(0);

    expect(done).toHaveBeenCalledOnce();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should resolve immediately for an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(scheduler.sleep(60_000, controller.signal)).resolves.toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });

  it('should read the system clock', () => {
    vi.setSystemTime(new Date('2025-01-01T12:00:00Z'));
    expect(scheduler.now()).toBe(Date.parse('2025-01-01T12:00:00Z'));
  });
});

describe('VirtualScheduler', () => {
  it('should advance its clock instead of waiting', async () => {
    const scheduler = new VirtualScheduler(0);

    await scheduler.sleep(5000);
    scheduler.advance(250);

    expect(scheduler.now()).toBe(5250);
    expect(scheduler.sleeps).toEqual([5000]);
  });
});
