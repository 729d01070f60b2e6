import { Semaphore } from './Semaphore';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => { };
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('Semaphore', () => {
  test('limits concurrency and releases in FIFO order', async () => {
    const semaphore = new Semaphore(2);
    const gates = [deferred(), deferred(), deferred(), deferred()];
    const started: number[] = [];
    let running = 0;
    let maxRunning = 0;

    const tasks = gates.map((gate, i) => semaphore.run(async () => {
      started.push(i);
      running++;
      maxRunning = Math.max(maxRunning, running);
      await gate.promise;
      running--;
      return i;
    }));

    await Promise.resolve();
    expect(started).toEqual([0, 1]);
    expect(semaphore.available).toBe(0);

    gates[1].resolve();
    gates[0].resolve();
    gates[2].resolve();
    gates[3].resolve();

    expect(await Promise.all(tasks)).toEqual([0, 1, 2, 3]);
    expect(started).toEqual([0, 1, 2, 3]);
    expect(maxRunning).toBe(2);
    expect(semaphore.available).toBe(2);
  });

  test('releases on failure', async () => {
    const semaphore = new Semaphore(1);
    await expect(semaphore.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(await semaphore.run(async () => 'ok')).toBe('ok');
    expect(semaphore.available).toBe(1);
  });

  test.each([0, -1, 1.5])('rejects capacity %p', (capacity: number) => {
    expect(() => new Semaphore(capacity)).toThrow('Semaphore capacity must be a positive integer');
  });
});
