import { describe, it, expect } from 'vitest';
import { KeyedLock } from '../src/services/keyed-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => { resolve = r; });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('runs holders of the same key one at a time', async () => {
    const lock = new KeyedLock(), events: string[] = [], gate = deferred();
    const first = lock.run(['stock:a'], async () => { events.push('first:start'); await gate.promise; events.push('first:end'); });
    const second = lock.run(['stock:a'], async () => { events.push('second'); });
    await Promise.resolve();
    expect(lock.isLocked('stock:a')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
    expect(lock.isLocked('stock:a')).toBe(false);
  });

  it('lets different keys proceed independently', async () => {
    const lock = new KeyedLock(), events: string[] = [], gate = deferred();
    const first = lock.run(['stock:a'], async () => { await gate.promise; events.push('a'); });
    await lock.run(['stock:b'], async () => { events.push('b'); });
    gate.resolve();
    await first;
    expect(events).toEqual(['b', 'a']);
  });

  it('releases the key when the holder throws', async () => {
    const lock = new KeyedLock();
    await expect(lock.run(['k'], () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(lock.isLocked('k')).toBe(false);
    await expect(lock.run(['k'], () => Promise.resolve(42))).resolves.toBe(42);
  });

  it('does not deadlock on overlapping key sets taken in opposite order', async () => {
    const lock = new KeyedLock();
    const results = await Promise.all([
      lock.run(['a', 'b'], () => Promise.resolve('ab')),
      lock.run(['b', 'a'], () => Promise.resolve('ba')),
      lock.run(['a', 'a'], () => Promise.resolve('aa')),
    ]);
    expect(results).toEqual(['ab', 'ba', 'aa']);
  });
});
