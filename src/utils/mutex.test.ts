import { describe, it, expect } from 'vitest';
import { Mutex } from './mutex.js';

describe('Mutex', () => {
  it('runs critical sections one at a time in call order', async () => {
    const mutex = new Mutex();
    const events: string[] = [];

    const first = mutex.runExclusive(async () => {
      events.push('first:start');
      await new Promise((resolve) => setTimeout(resolve, 5));
      events.push('first:end');
    });
    const second = mutex.runExclusive(() => {
      events.push('second');
    });

    await Promise.all([first, second]);
    expect(events).toEqual(['first:start', 'first:end', 'second']);
  });

  it('keeps serving callers after a section throws', async () => {
    const mutex = new Mutex();

    await expect(
      mutex.runExclusive(() => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
  });

  it('reports whether it is held', async () => {
    const mutex = new Mutex();
    let seen = false;

    await mutex.runExclusive(() => {
      seen = mutex.isLocked;
    });

    expect(seen).toBe(true);
    expect(mutex.isLocked).toBe(false);
  });
});
