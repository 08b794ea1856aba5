export { KeyedLockManager, type KeyedLock, type KeyedLockManagerConfig } from './KeyedLockManager';
