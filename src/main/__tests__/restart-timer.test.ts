import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OptimisticState } from '../providers/optimistic-state';
import { RestartTimer } from '../providers/restart-timer';

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('RestartTimer', () => {
  it('collapses a burst of restarts into one callback', () => {
    const callback = vi.fn();
    const timer = new RestartTimer(250, callback, 'reload');

    timer.restart();
    vi.advanceTimersByTime(200);
    timer.restart();
    vi.advanceTimersByTime(200);
    timer.restart();
    vi.advanceTimersByTime(249);

    expect(callback).not.toHaveBeenCalled();
    expect(timer.pending).toBe(true);

    vi.advanceTimersByTime(1);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(timer.pending).toBe(false);
  });

  it('does nothing once cancelled', () => {
    const callback = vi.fn();
    const timer = new RestartTimer(100, callback);

    timer.restart();
    timer.cancel();
    vi.advanceTimersByTime(500);

    expect(callback).not.toHaveBeenCalled();
  });

  it('logs callback failures', async () => {
    const timer = new RestartTimer(10, async () => {
      throw new Error('disk gone');
    }, 'reload');

    timer.restart();
    await vi.advanceTimersByTimeAsync(10);

    expect(console.error).toHaveBeenCalledWith('Failed to run debounced reload:', expect.any(Error));
  });
});

describe('OptimisticState', () => {
  it('expires the asserted value after the TTL', () => {
    let now = 1_000;
    const state = new OptimisticState<boolean>(2_000, () => now);

    state.set(true);
    now = 2_999;
    expect(state.get()).toBe(true);

    now = 3_000;
    expect(state.get()).toBe(true);

    now = 3_001;
    expect(state.get()).toBeUndefined();
  });

  it('is cleared by an authoritative update', () => {
    const state = new OptimisticState<boolean>(2_000, () => 0);
    state.set(false);

    state.clear();

    expect(state.get()).toBeUndefined();
  });
});
