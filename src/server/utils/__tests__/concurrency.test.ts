import { ConcurrencyLimiter, settleWithLimit } from '../concurrency.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('ConcurrencyLimiter', () => {
  it('rejects invalid concurrency values', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(TypeError);
    expect(() => new ConcurrencyLimiter(1.5)).toThrow(TypeError);
    expect(() => new ConcurrencyLimiter(Infinity)).not.toThrow();
  });

  it('never runs more than the limit at once and starts queued work in order', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const gates = [deferred<void>(), deferred<void>(), deferred<void>()];
    const started: number[] = [];

    const runs = gates.map((gate, index) =>
      limiter.run(async () => {
        started.push(index);
        await gate.promise;
        return index;
      })
    );

    expect(started).toEqual([0, 1]);
    expect(limiter.activeCount).toBe(2);
    expect(limiter.pendingCount).toBe(1);

    gates[0].resolve();
    await runs[0];
    await Promise.resolve();
    expect(started).toEqual([0, 1, 2]);

    gates[1].resolve();
    gates[2].resolve();
    await expect(Promise.all(runs)).resolves.toEqual([0, 1, 2]);
    expect(limiter.activeCount).toBe(0);
  });

  it('frees the slot when a task rejects', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(() => Promise.resolve('next'))).resolves.toBe('next');
  });
});

describe('settleWithLimit', () => {
  it('keeps outcomes in input order and does not short-circuit on failure', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const outcomes = await settleWithLimit([1, 2, 3], limiter, async (n) => {
      if (n === 2) {
        throw new Error('two');
      }
      return n * 10;
    });

    expect(outcomes[0]).toEqual({ status: 'fulfilled', value: 10 });
    expect(outcomes[1].status).toBe('rejected');
    expect(outcomes[2]).toEqual({ status: 'fulfilled', value: 30 });
  });
});
