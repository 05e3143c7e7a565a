// pattern: Imperative Shell

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createKeyedMutex, LockTimeoutError } from './lock.ts';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('createKeyedMutex', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('runs work on the same key one at a time, in arrival order', async () => {
    const mutex = createKeyedMutex();
    const order: Array<string> = [];
    const gate = deferred();

    const first = mutex.runExclusive('agent-1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('agent-1', async () => {
      order.push('second');
    });

    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(order).toEqual(['first:start']);
    expect(mutex.isLocked('agent-1')).toBe(true);

    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.isLocked('agent-1')).toBe(false);
  });

  it('does not block other keys', async () => {
    const mutex = createKeyedMutex();
    const gate = deferred();
    const held = mutex.runExclusive('agent-1', () => gate.promise);

    await expect(mutex.runExclusive('agent-2', async () => 'done')).resolves.toBe('done');

    gate.resolve();
    await held;
  });

  it('releases the key when the work throws', async () => {
    const mutex = createKeyedMutex();

    await expect(
      mutex.runExclusive('agent-1', async () => {
        throw new Error('step failed');
      }),
    ).rejects.toThrow('step failed');

    expect(mutex.isLocked('agent-1')).toBe(false);
  });

  it('gives up waiting after the timeout', async () => {
    vi.useFakeTimers();
    const mutex = createKeyedMutex();
    const release = await mutex.acquire('agent-1');

    const waiting = mutex.acquire('agent-1', 50);
    const assertion = expect(waiting).rejects.toBeInstanceOf(LockTimeoutError);
    await vi.advanceTimersByTimeAsync(50);
    await assertion;

    release();
    expect(mutex.isLocked('agent-1')).toBe(false);
  });

  it('ignores a second release', async () => {
    const mutex = createKeyedMutex();
    const release = await mutex.acquire('agent-1');
    const next = mutex.acquire('agent-1');

    release();
    release();
    const releaseNext = await next;

    expect(mutex.isLocked('agent-1')).toBe(true);
    releaseNext();
    expect(mutex.isLocked('agent-1')).toBe(false);
  });
});
