import { describe, it, expect } from 'vitest';
import { abortable, backoffDelay, interpolateValue, runPool, sleep, withTimeout } from '../src/utils';
import { DeadlineExceededError } from '../src/types';

// ---------- backoffDelay ----------

describe('backoffDelay', () => {
  it('doubles from the base and stops at the cap', () => {
    expect([0, 1, 2, 3, 4, 5].map((i) => backoffDelay(i, 250, 4000))).toEqual([250, 500, 1000, 2000, 4000, 4000]);
  });
});

// ---------- sleep / abortable / withTimeout ----------

describe('sleep', () => {
  it('resolves after the delay', async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const reason = new DeadlineExceededError('Test case "cart" exceeded its 10ms deadline', 10);
    setTimeout(() => controller.abort(reason), 10);

    const started = Date.now();
    await expect(sleep(5000, controller.signal)).rejects.toBe(reason);
    expect(Date.now() - started).toBeLessThan(1000);
  });

  it('rejects immediately on an already aborted signal without a reason error', async () => {
    const controller = new AbortController();
    controller.abort('stop');
    await expect(sleep(5000, controller.signal)).rejects.toBeInstanceOf(DeadlineExceededError);
  });
});

describe('abortable', () => {
  it('passes the value through', async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it('stops waiting when the signal aborts', async () => {
    const controller = new AbortController();
    const slow = new Promise<number>((resolve) => setTimeout(() => resolve(1), 1000));
    setTimeout(() => controller.abort(new DeadlineExceededError()), 10);

    await expect(abortable(slow, controller.signal)).rejects.toBeInstanceOf(DeadlineExceededError);
  });

  it('keeps the operation error', async () => {
    const controller = new AbortController();
    await expect(abortable(Promise.reject(new Error('detached')), controller.signal)).rejects.toThrow('detached');
  });
});

describe('withTimeout', () => {
  it('returns the value when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve('ok'), 100, 'too slow')).resolves.toBe('ok');
  });

  it('rejects with the message on timeout', async () => {
    const slow = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 500));
    await expect(withTimeout(slow, 10, 'too slow')).rejects.toThrow('too slow');
  });
});

// ---------- runPool ----------

describe('runPool', () => {
  it('keeps input order and respects the limit', async () => {
    let active = 0;
    let peak = 0;
    const results = await runPool([30, 5, 20, 1, 10], 2, async (ms, index) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(ms);
      active--;
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1', '4:10']);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    await expect(runPool([], 3, async () => 1)).resolves.toEqual([]);
  });
});

// ---------- interpolateValue ----------

describe('interpolateValue', () => {
  it('replaces placeholders and reports unset names', () => {
    expect(interpolateValue('{{env.TEST_USERNAME}}:{{ env.TEST_PASSWORD }}:{{env.NOPE}}', {
      TEST_USERNAME: 'demo-user',
      TEST_PASSWORD: 'test-secret',
    })).toEqual({ value: 'demo-user:test-secret:', missing: ['NOPE'] });
  });

  it('leaves other braces alone', () => {
    expect(interpolateValue('{{user}} {env.X}', { X: 'x' })).toEqual({ value: '{{user}} {env.X}', missing: [] });
  });
});
