/**
 * Keyed Lock Manager
 *
 * At most one holder per key. Later callers wait in FIFO order and give up
 * with LockTimeoutError after the acquisition timeout. Different keys never
 * block each other.
 */

import { LockTimeoutError } from '../errors';
import { generateId } from '../shared/ids';

export interface KeyedLock {
  key: string;
  ownerId: string;
  acquiredAt: number;
  release: () => void;
}

interface Waiter {
  ownerId: string;
  grant: () => void;
}

export interface KeyedLockManagerConfig {
  /** How long a waiter may wait before failing, in ms */
  acquireTimeoutMs: number;
}

const DEFAULT_CONFIG: KeyedLockManagerConfig = {
  acquireTimeoutMs: 30_000,
};

export class KeyedLockManager {
  private holders = new Map<string, string>(); // key -> ownerId
  private waiters = new Map<string, Waiter[]>();
  private config: KeyedLockManagerConfig;

  constructor(config: Partial<KeyedLockManagerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Acquire the lock for a key, waiting if another owner holds it
   */
  async acquire(key: string, ownerId: string = generateId('lock')): Promise<KeyedLock> {
    if (!this.holders.has(key)) {
      this.holders.set(key, ownerId);
      return this.createLock(key, ownerId);
    }

    return new Promise<KeyedLock>((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.removeWaiter(key, waiter);
        reject(new LockTimeoutError(key, this.config.acquireTimeoutMs));
      }, this.config.acquireTimeoutMs);

      const waiter: Waiter = {
        ownerId,
        grant: () => {
          clearTimeout(timeoutId);
          this.holders.set(key, ownerId);
          resolve(this.createLock(key, ownerId));
        },
      };

      const queue = this.waiters.get(key);
      if (queue) {
        queue.push(waiter);
      } else {
        this.waiters.set(key, [waiter]);
      }
    });
  }

  /**
   * Release the lock and hand it to the next waiter. No-op for non-holders.
   */
  release(key: string, ownerId: string): void {
    if (this.holders.get(key) !== ownerId) {
      return;
    }

    this.holders.delete(key);

    const queue = this.waiters.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) {
      this.waiters.delete(key);
    }
    next?.grant();
  }

  /**
   * Run fn while holding the lock for key
   */
  async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const lock = await this.acquire(key);
    try {
      return await fn();
    } finally {
      lock.release();
    }
  }

  isLocked(key: string): boolean {
    return this.holders.has(key);
  }

  getHolder(key: string): string | null {
    return this.holders.get(key) ?? null;
  }

  getWaiters(key: string): string[] {
    return (this.waiters.get(key) ?? []).map(w => w.ownerId);
  }

  private createLock(key: string, ownerId: string): KeyedLock {
    return {
      key,
      ownerId,
      acquiredAt: Date.now(),
      release: () => this.release(key, ownerId),
    };
  }

  private removeWaiter(key: string, waiter: Waiter): void {
    const queue = this.waiters.get(key);
    if (!queue) return;

    const index = queue.indexOf(waiter);
    if (index !== -1) {
      queue.splice(index, 1);
    }
    if (queue.length === 0) {
      this.waiters.delete(key);
    }
  }
}
