import { LockMode } from '../locking.constants';

/**
 * Handle for a granted read/write lock
 */
export interface LockHandle {
  /** The resource name the lock protects */
  resource: string;

  /** Shared (reader) or exclusive (writer) */
  mode: LockMode;

  /** Unique handle value format: "{uuid}:{timestamp}" */
  value: string;

  /** Time the lock was granted in milliseconds (Unix timestamp) */
  acquiredAt: number;
}

/**
 * Point-in-time view of a lock, used in logs and tests
 */
export interface LockState {
  resource: string;
  activeReaders: number;
  writerActive: boolean;
  queued: number;
}
