import { describe, it, expect } from 'vitest';
import { SeriesLock } from '../reconcile/series.lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SeriesLock', () => {
  it('should run holders of one key one at a time in arrival order', async () => {
    const lock = new SeriesLock();
    const events: string[] = [];
    const gate = deferred();

    const first = lock.withLock('CPIAUCSL', async () => {
      events.push('first:start');
      await gate.promise;
      events.push('first:end');
    });
    const second = lock.withLock('CPIAUCSL', async () => {
      events.push('second:start');
    });

    await new Promise((r) => setTimeout(r, 0));
    expect(events).toEqual(['first:start']);
    expect(lock.isHeld('CPIAUCSL')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second:start']);
    expect(lock.isHeld('CPIAUCSL')).toBe(false);
  });

  it('should not make different keys wait on each other', async () => {
    const lock = new SeriesLock();
    const gate = deferred();
    let otherRan = false;

    const held = lock.withLock('GDP', () => gate.promise);
    await lock.withLock('CPIAUCSL', async () => {
      otherRan = true;
    });

    expect(otherRan).toBe(true);
    gate.resolve();
    await held;
  });

  it('should release the key when the holder throws', async () => {
    const lock = new SeriesLock();
    await expect(
      lock.withLock('GDP', async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    expect(lock.isHeld('GDP')).toBe(false);
    await expect(lock.withLock('GDP', async () => 42)).resolves.toBe(42);
  });
});
