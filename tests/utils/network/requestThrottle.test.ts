/**
 * @fileoverview Unit tests for the fixed-delay request throttle.
 * @module tests/utils/network/requestThrottle.test
 */
import { describe, expect, it, vi } from 'vitest';

import {
  RequestThrottle,
  type SleepFn,
} from '@/utils/network/requestThrottle.js';

/** Sleep that advances a virtual clock instead of waiting. */
const virtualClock = () => {
  const clock = { now: 0 };
  const sleep = vi.fn<SleepFn>(async (ms) => {
    clock.now += ms;
  });
  return { clock, sleep };
};

describe('RequestThrottle', () => {
  it('sleeps the delay before every task', async () => {
    const { clock, sleep } = virtualClock();
    const throttle = new RequestThrottle(250, sleep);
    const starts: number[] = [];

    for (let i = 0; i < 3; i++) {
      await throttle.schedule(async () => {
        starts.push(clock.now);
      });
    }

    expect(starts).toEqual([250, 500, 750]);
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it('serializes concurrent tasks in submission order', async () => {
    const { clock, sleep } = virtualClock();
    const throttle = new RequestThrottle(100, sleep);
    const events: string[] = [];

    const results = await Promise.all(
      ['a', 'b', 'c'].map((name) =>
        throttle.schedule(async () => {
          events.push(`${name}@${clock.now}`);
          return name.toUpperCase();
        }),
      ),
    );

    expect(results).toEqual(['A', 'B', 'C']);
    expect(events).toEqual(['a@100', 'b@200', 'c@300']);
  });

  it('keeps going after a failed task', async () => {
    const { sleep } = virtualClock();
    const throttle = new RequestThrottle(10, sleep);

    const failing = throttle.schedule(async () => {
      throw new Error('boom');
    });
    const next = throttle.schedule(async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('does not sleep when the delay is zero', async () => {
    const { sleep } = virtualClock();
    const throttle = new RequestThrottle(0, sleep);

    await throttle.schedule(async () => undefined);

    expect(sleep).not.toHaveBeenCalled();
  });
});
