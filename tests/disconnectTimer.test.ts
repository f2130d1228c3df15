import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { createDisconnectTimer } from '@/services/ble/disconnectTimer';
import { createDefaultScheduler } from '@/services/ble/scheduler';
import { SchedulingPort } from '@/services/ble/types';

describe('createDisconnectTimer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const setup = (defaultTimeoutMs = 1000) => {
    const onExpire = vi.fn(async () => undefined);
    const timer = createDisconnectTimer({
      scheduler: createDefaultScheduler(),
      defaultTimeoutMs,
      onExpire,
    });
    return { timer, onExpire };
  };

  it('expires once after the default timeout', async () => {
    const { timer, onExpire } = setup();

    timer.refresh();
    await vi.advanceTimersByTimeAsync(999);
    expect(onExpire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(timer.isArmed()).toBe(false);
    expect(timer.getDeadline()).toBeNull();

    await vi.advanceTimersByTimeAsync(5000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it('never pulls an armed deadline closer', async () => {
    const { timer, onExpire } = setup();

    timer.refresh(5000);
    timer.refresh(1000);
    expect(timer.getDeadline()).toBe(Date.now() + 5000);

    await vi.advanceTimersByTimeAsync(1000);
    expect(onExpire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(4000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it('pushes the deadline out when refreshed later', async () => {
    const { timer, onExpire } = setup();

    timer.refresh();
    await vi.advanceTimersByTimeAsync(500);
    timer.refresh();

    await vi.advanceTimersByTimeAsync(600);
    expect(onExpire).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(400);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it('replaces a later deadline when forced', async () => {
    const { timer, onExpire } = setup();

    timer.refresh(5000);
    timer.refresh(1000, true);

    await vi.advanceTimersByTimeAsync(1000);
    expect(onExpire).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(4000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it('cancels idempotently', async () => {
    const { timer, onExpire } = setup();

    timer.cancel();
    timer.refresh();
    timer.cancel();
    timer.cancel();

    await vi.advanceTimersByTimeAsync(5000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(timer.isArmed()).toBe(false);
  });

  it('arms on a swapped-in scheduler', () => {
    const cancel = vi.fn();
    const scheduleAfter = vi.fn((delayMs: number) => ({ cancel, delayMs }));
    const host: SchedulingPort = { ...createDefaultScheduler(), scheduleAfter };
    const { timer } = setup();

    timer.setScheduler(host);
    timer.refresh(2000);
    timer.refresh(3000, true);

    expect(scheduleAfter).toHaveBeenCalledTimes(2);
    expect(scheduleAfter.mock.calls.map(([delayMs]) => delayMs)).toEqual([2000, 3000]);
    expect(cancel).toHaveBeenCalledTimes(1);
  });
});
