/**
 * Unit Tests: Semaphore
 */

import { Semaphore } from '../../../src/lib/concurrency';

function tick(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('Semaphore', () => {
  test('never runs more operations than its capacity', async () => {
    const semaphore = new Semaphore(2);
    let active = 0;
    let peak = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map(value =>
        semaphore.use(async () => {
          active++;
          peak = Math.max(peak, active);
          await tick();
          active--;
          return value * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(semaphore.inUse).toBe(0);
  });

  test('waiters get slots in arrival order and double release is harmless', async () => {
    const semaphore = new Semaphore(1);
    const release = await semaphore.acquire();
    const order: string[] = [];

    const second = semaphore.acquire().then(next => {
      order.push('second');
      return next;
    });
    await tick();
    expect(semaphore.waiting).toBe(1);

    release();
    release();
    const releaseSecond = await second;

    expect(order).toEqual(['second']);
    expect(semaphore.inUse).toBe(1);
    releaseSecond();
    expect(semaphore.inUse).toBe(0);
  });

  test('releases the slot when the operation throws', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.use(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(semaphore.inUse).toBe(0);
  });

  test('rejects non-positive capacities', () => {
    expect(() => new Semaphore(0)).toThrow('Semaphore capacity must be a positive integer, got 0');
  });
});
