/**
 * Keyed Lock Manager Tests
 */

import { KeyedLockManager } from '../KeyedLockManager';
import { LockTimeoutError } from '../../errors';

describe('KeyedLockManager', () => {
  let manager: KeyedLockManager;

  beforeEach(() => {
    manager = new KeyedLockManager({ acquireTimeoutMs: 200 });
  });

  describe('Lock Acquisition', () => {
    it('should acquire lock immediately if available', async () => {
      const lock = await manager.acquire('intro', 'owner-1');

      expect(lock.key).toBe('intro');
      expect(lock.ownerId).toBe('owner-1');
      expect(manager.isLocked('intro')).toBe(true);
      expect(manager.getHolder('intro')).toBe('owner-1');
    });

    it('should generate an owner id when none is given', async () => {
      const lock = await manager.acquire('intro');
      expect(lock.ownerId).toMatch(/^lock_\d+_[0-9a-z]{8}$/);
    });

    it('should queue waiters in FIFO order', async () => {
      const first = await manager.acquire('intro', 'owner-1');
      const second = manager.acquire('intro', 'owner-2');
      const third = manager.acquire('intro', 'owner-3');

      expect(manager.getWaiters('intro')).toEqual(['owner-2', 'owner-3']);

      first.release();
      const lock2 = await second;
      expect(manager.getHolder('intro')).toBe('owner-2');
      expect(manager.getWaiters('intro')).toEqual(['owner-3']);

      lock2.release();
      await third;
      expect(manager.getHolder('intro')).toBe('owner-3');
    });

    it('should time out with LockTimeoutError', async () => {
      await manager.acquire('intro', 'owner-1');

      const error = await manager.acquire('intro', 'owner-2').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(LockTimeoutError);
      expect(manager.getWaiters('intro')).toEqual([]);
    });

    it('should not block different keys', async () => {
      await manager.acquire('intro', 'owner-1');
      const other = await manager.acquire('methods', 'owner-2');
      expect(other.ownerId).toBe('owner-2');
    });
  });

  describe('Lock Release', () => {
    it('should release lock', async () => {
      const lock = await manager.acquire('intro', 'owner-1');
      lock.release();

      expect(manager.isLocked('intro')).toBe(false);
      expect(manager.getHolder('intro')).toBeNull();
    });

    it('should only release if holder', async () => {
      await manager.acquire('intro', 'owner-1');
      manager.release('intro', 'owner-2');
      expect(manager.getHolder('intro')).toBe('owner-1');
    });
  });

  describe('withLock', () => {
    it('should serialize work on one key', async () => {
      const order: string[] = [];
      const task = (name: string, delayMs: number) =>
        manager.withLock('intro', async () => {
          order.push(`${name}:start`);
          await new Promise(resolve => setTimeout(resolve, delayMs));
          order.push(`${name}:end`);
        });

      await Promise.all([task('a', 20), task('b', 1)]);

      expect(order).toEqual(['a:start', 'a:end', 'b:start', 'b:end']);
    });

    it('should release the lock when the task throws', async () => {
      await expect(
        manager.withLock('intro', async () => {
          throw new Error('boom');
        })
      ).rejects.toThrow('boom');
      expect(manager.isLocked('intro')).toBe(false);
    });
  });
});
