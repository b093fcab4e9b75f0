/**
 * Write Lock Tests
 */

import { describe, it, expect } from 'vitest';
import { WriteLock } from '../write-lock.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('WriteLock', () => {
  it('should run sections one at a time in call order', async () => {
    const lock = new WriteLock();
    const events: string[] = [];

    await Promise.all([
      lock.runExclusive(async () => {
        events.push('a:start');
        await delay(20);
        events.push('a:end');
      }),
      lock.runExclusive(async () => {
        events.push('b:start');
        await delay(1);
        events.push('b:end');
      }),
    ]);

    expect(events).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
  });

  it('should release the lock after a failing section', async () => {
    const lock = new WriteLock();

    await expect(
      lock.runExclusive(async () => {
        throw new Error('write failed');
      })
    ).rejects.toThrow('write failed');

    await expect(lock.runExclusive(async () => 'next')).resolves.toBe('next');
    expect(lock.isLocked()).toBe(false);
  });
});
