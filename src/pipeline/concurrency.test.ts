import { describe, it, expect } from '@jest/globals';
import { ConcurrencyLimiter } from './concurrency.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('ConcurrencyLimiter', () => {
  it('rejects limits that are not positive integers', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('Concurrency must be a positive integer, got 0');
    expect(() => new ConcurrencyLimiter(1.5)).toThrow('Concurrency must be a positive integer, got 1.5');
  });

  it('starts waiting tasks in call order as slots free up', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      limiter.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );

    await Promise.resolve();
    expect(started).toEqual([0, 1]);

    gates[1]?.resolve();
    await runs[1];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates.forEach((gate) => gate.resolve());
    expect(await Promise.all(runs)).toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
  });

  it('hands the slot on when a task throws', async () => {
    const limiter = new ConcurrencyLimiter(1);

    const failing = limiter.run(async () => {
      throw new Error('boom');
    });
    const next = limiter.run(async () => 'ran');

    await expect(failing).rejects.toThrow('boom');
    expect(await next).toBe('ran');
  });
});
