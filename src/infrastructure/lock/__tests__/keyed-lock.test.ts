// ═══════════════════════════════════════════════════════════════════════════════
// KEYED LOCK TESTS
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect } from 'vitest';

import { KeyedLock } from '../keyed-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(done => {
    resolve = done;
  });
  return { promise, resolve };
}

describe('KeyedLock', () => {
  it('should run work on the same key one at a time, in arrival order', async () => {
    const lock = new KeyedLock({ waitTimeoutMs: 1000 });
    const events: string[] = [];

    const task = (name: string) =>
      lock.withLock('k', async () => {
        events.push(`${name}:start`);
        await new Promise(resolve => setTimeout(resolve, 5));
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([task('a'), task('b'), task('c')]);

    expect(results.map(result => result.value)).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end', 'c:start', 'c:end']);
  });

  it('should let different keys proceed independently', async () => {
    const lock = new KeyedLock({ waitTimeoutMs: 1000 });
    const gate = deferred();

    const held = lock.withLock('alice', () => gate.promise);
    const other = await lock.withLock('bob', async () => 'done');

    expect(other.value).toBe('done');
    expect(lock.isLocked('alice')).toBe(true);

    gate.resolve();
    await held;
    expect(lock.isLocked('alice')).toBe(false);
  });

  it('should time out a waiter and hand the key on afterwards', async () => {
    const lock = new KeyedLock({ waitTimeoutMs: 30 });
    const first = await lock.acquire('k');
    expect(first.ok).toBe(true);

    const second = await lock.acquire('k');
    expect(second).toEqual({
      ok: false,
      error: { code: 'LOCK_TIMEOUT', key: 'k', message: 'Timed out after 30ms waiting for lock on "k"' },
    });

    const third = lock.acquire('k');
    first.value?.();

    const acquired = await third;
    expect(acquired.ok).toBe(true);
    acquired.value?.();
    await new Promise(resolve => setImmediate(resolve));
    expect(lock.activeKeys).toBe(0);
  });

  it('should treat a repeated release as a no-op', async () => {
    const lock = new KeyedLock({ waitTimeoutMs: 1000 });
    const first = await lock.acquire('k');
    first.value?.();
    first.value?.();

    const second = await lock.acquire('k');
    const pending = lock.acquire('k');
    first.value?.();

    const raced = await Promise.race([
      pending.then(() => 'acquired'),
      new Promise(resolve => setTimeout(() => resolve('waiting'), 20)),
    ]);
    expect(raced).toBe('waiting');

    second.value?.();
    (await pending).value?.();
  });

  it('should release the key when the work throws', async () => {
    const lock = new KeyedLock({ waitTimeoutMs: 1000 });

    await expect(
      lock.withLock('k', async () => {
        throw new Error('work failed');
      })
    ).rejects.toThrow('work failed');

    expect(lock.isLocked('k')).toBe(false);
    expect((await lock.withLock('k', async () => 1)).value).toBe(1);
  });

  it('should refuse an unbounded wait', () => {
    expect(() => new KeyedLock({ waitTimeoutMs: 0 })).toThrow(RangeError);
    expect(() => new KeyedLock({ waitTimeoutMs: -5 })).toThrow(
      'Lock wait timeout must be a positive number of ms, got -5'
    );
  });
});
