import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { PollLoop } from '../src/sync/poll-loop';
import type { RefreshOutcome } from '../src/types';
import { deferred } from './helpers';

describe('PollLoop', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('should poll immediately and then every second while healthy', async () => {
    const tick = vi.fn(async (): Promise<RefreshOutcome> => 'ok');
    const loop = new PollLoop({ tick });

    loop.start();
    expect(tick).toHaveBeenCalledTimes(1);

    await vi.advanceTimersByTimeAsync(999);
    expect(tick).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toHaveBeenCalledTimes(2);

    loop.stop();
  });

  test('should back off to 15 seconds after a failure and recover', async () => {
    const tick = vi.fn(async (): Promise<RefreshOutcome> => 'ok');
    tick.mockResolvedValueOnce('failed');
    const loop = new PollLoop({ tick });

    loop.start();
    await vi.advanceTimersByTimeAsync(0);
    expect(loop.currentIntervalMs).toBe(15000);

    await vi.advanceTimersByTimeAsync(14999);
    expect(tick).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(tick).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(0);
    expect(loop.currentIntervalMs).toBe(1000);

    await vi.advanceTimersByTimeAsync(1000);
    expect(tick).toHaveBeenCalledTimes(3);

    loop.stop();
  });

  test('should count a throwing tick as a failure', async () => {
    const loop = new PollLoop({
      tick: async () => {
        throw new Error('boom');
      },
    });

    await expect(loop.refresh()).resolves.toBe('failed');
    expect(loop.currentIntervalMs).toBe(15000);
  });

  test('should drop a refresh while another is in flight', async () => {
    const gate = deferred<RefreshOutcome>();
    const tick = vi.fn(() => gate.promise);
    const loop = new PollLoop({ tick });

    const first = loop.refresh();
    await expect(loop.refresh()).resolves.toBe('skipped');

    gate.resolve('ok');
    await expect(first).resolves.toBe('ok');
    expect(tick).toHaveBeenCalledTimes(1);
  });

  test('should not schedule another tick after stop', async () => {
    const gate = deferred<RefreshOutcome>();
    const tick = vi.fn(() => gate.promise);
    const loop = new PollLoop({ tick });

    loop.start();
    loop.stop();
    gate.resolve('ok');
    await vi.advanceTimersByTimeAsync(5000);

    expect(tick).toHaveBeenCalledTimes(1);
    expect(loop.isRunning()).toBe(false);
  });

  test('should honour custom intervals', async () => {
    const tick = vi.fn(async (): Promise<RefreshOutcome> => 'ok');
    const loop = new PollLoop({ tick, minIntervalMs: 250, maxIntervalMs: 500 });

    loop.start();
    await vi.advanceTimersByTimeAsync(250);
    expect(tick).toHaveBeenCalledTimes(2);

    loop.stop();
  });
});
