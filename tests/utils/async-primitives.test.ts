import { describe, it, expect } from 'vitest';
import { AsyncEvent, Mutex, Semaphore } from '../../src/utils/async-primitives.js';

const tick = () => new Promise((resolve) => setImmediate(resolve));

describe('Semaphore', () => {
  it('should reject sizes that are not positive integers', () => {
    expect(() => new Semaphore(0)).toThrow(RangeError);
    expect(() => new Semaphore(1.5)).toThrow('Semaphore size must be a positive integer, got 1.5');
  });

  it('should grant slots up to its size', async () => {
    const semaphore = new Semaphore(2);
    await semaphore.acquire();
    await semaphore.acquire();
    expect(semaphore.getActiveCount()).toBe(2);
    expect(semaphore.getQueueLength()).toBe(0);
  });

  it('should queue waiters and hand released slots over in order', async () => {
    const semaphore = new Semaphore(1);
    await semaphore.acquire();

    const order: string[] = [];
    const first = semaphore.acquire().then(() => order.push('first'));
    const second = semaphore.acquire().then(() => order.push('second'));
    await tick();
    expect(order).toEqual([]);
    expect(semaphore.getQueueLength()).toBe(2);

    semaphore.release();
    await first;
    expect(order).toEqual(['first']);
    expect(semaphore.getActiveCount()).toBe(1);

    semaphore.release();
    await second;
    expect(order).toEqual(['first', 'second']);

    semaphore.release();
    expect(semaphore.getActiveCount()).toBe(0);
  });

  it('should not go below zero on extra releases', () => {
    const semaphore = new Semaphore(1);
    semaphore.release();
    expect(semaphore.getActiveCount()).toBe(0);
  });
});

describe('Mutex', () => {
  it('should run callers one at a time', async () => {
    const mutex = new Mutex();
    let running = 0;
    let maxRunning = 0;

    const work = () =>
      mutex.runExclusive(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await tick();
        running--;
        return running;
      });

    await Promise.all([work(), work(), work()]);
    expect(maxRunning).toBe(1);
    expect(mutex.isLocked()).toBe(false);
  });

  it('should release the lock when the callback throws', async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(mutex.isLocked()).toBe(false);
    await expect(mutex.runExclusive(async () => 'next')).resolves.toBe('next');
  });
});

describe('AsyncEvent', () => {
  it('should release every waiter once set', async () => {
    const event = new AsyncEvent();
    const waiters = [event.wait(), event.wait()];
    expect(event.isSet()).toBe(false);

    event.set();
    await Promise.all(waiters);
    expect(event.isSet()).toBe(true);
  });

  it('should resolve immediately after being set', async () => {
    const event = new AsyncEvent();
    event.set();
    event.set();
    await expect(event.wait()).resolves.toBeUndefined();
    await expect(event.waitFor(1)).resolves.toBe(true);
  });

  it('should report a timeout from waitFor', async () => {
    const event = new AsyncEvent();
    await expect(event.waitFor(5)).resolves.toBe(false);
  });

  it('should report true when set before the timeout', async () => {
    const event = new AsyncEvent();
    const waiting = event.waitFor(1000);
    event.set();
    await expect(waiting).resolves.toBe(true);
  });
});
