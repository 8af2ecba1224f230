import { describe, it, expect } from '@jest/globals';
import { KeyedLock } from './keyed-lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('KeyedLock', () => {
  it('serializes work on the same key', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('first:start');
        await delay(20);
        events.push('first:end');
      }),
      lock.run('a', async () => {
        events.push('second:start');
        events.push('second:end');
      }),
    ]);

    expect(events).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
  });

  it('lets different keys overlap', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    await Promise.all([
      lock.run('a', async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      lock.run('b', async () => {
        events.push('b:start');
        events.push('b:end');
      }),
    ]);

    expect(events.indexOf('b:end')).toBeLessThan(events.indexOf('a:end'));
  });

  it('releases the key when the holder throws', async () => {
    const lock = new KeyedLock();

    await expect(
      lock.run('a', async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(lock.run('a', async () => 'next')).resolves.toBe('next');
    expect(lock.size).toBe(0);
  });

  it('holds several keys at once', async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const both = lock.runAll(['b', 'a'], async () => {
      events.push('both:start');
      await delay(20);
      events.push('both:end');
    });
    await delay(5);
    const single = lock.run('b', async () => {
      events.push('b');
    });
    await Promise.all([both, single]);

    expect(events).toEqual(['both:start', 'both:end', 'b']);
  });
});
