// Tests for WriteLock

import { describe, it, expect } from 'vitest';
import { WriteLock } from './write-lock.js';

describe('WriteLock', () => {
  it('should run tasks one at a time in arrival order', async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    const task = (name: string, delayMs: number) => lock.runExclusive(async () => {
      events.push(`start ${name}`);
      await new Promise(resolve => setTimeout(resolve, delayMs));
      events.push(`end ${name}`);
      return name;
    });

    const results = await Promise.all([task('a', 20), task('b', 0), task('c', 5)]);

    expect(results).toEqual(['a', 'b', 'c']);
    expect(events).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('should release the lock when a task fails', async () => {
    const lock = new WriteLock();

    await expect(lock.runExclusive(async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');

    expect(lock.isLocked).toBe(false);
    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
  });

  it('should report whether it is held', async () => {
    const lock = new WriteLock();
    await lock.acquire();
    expect(lock.isLocked).toBe(true);
    lock.release();
    expect(lock.isLocked).toBe(false);
  });
});
