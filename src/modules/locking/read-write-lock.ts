import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { LockMode } from './locking.constants';
import { LockHandle, LockState } from './interfaces';

interface PendingRequest {
  handle: LockHandle;
  grant: (handle: LockHandle) => void;
}

/**
 * ReadWriteLock is an in-process, asynchronous reader/writer lock
 *
 * - Any number of SHARED holders, or exactly one EXCLUSIVE holder
 * - Requests are granted in arrival order: a shared request that arrives while
 *   an exclusive request is queued waits behind it
 * - Consecutive shared requests at the head of the queue are granted together
 *
 * Handle value format: "{uuid}:{timestamp}"
 *
 * @example
 * ```typescript
 * const lock = new ReadWriteLock('lock:catalog');
 * const handle = await lock.acquire(LockMode.EXCLUSIVE);
 * try {
 *   // Critical section
 * } finally {
 *   lock.release(handle);
 * }
 * ```
 */
export class ReadWriteLock {
  private static readonly logger = new Logger(ReadWriteLock.name);

  private activeReaders = 0;
  private writerActive = false;
  private readonly queue: PendingRequest[] = [];

  /** Values of the handles currently holding the lock */
  private readonly holders = new Set<string>();

  constructor(readonly resource: string) {}

  /**
   * Generate a unique handle value
   * Format: "{uuid}:{timestamp}"
   */
  private generateHandleValue(): string {
    return `${uuidv4()}:${Date.now()}`;
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writerActive) {
      return false;
    }
    return mode === LockMode.SHARED || this.activeReaders === 0;
  }

  private grant(handle: LockHandle): LockHandle {
    if (handle.mode === LockMode.EXCLUSIVE) {
      this.writerActive = true;
    } else {
      this.activeReaders++;
    }
    handle.acquiredAt = Date.now();
    this.holders.add(handle.value);
    return handle;
  }

  /**
   * Grant queued requests from the head while they are compatible
   */
  private drain(): void {
    while (this.queue.length > 0 && this.canGrant(this.queue[0].handle.mode)) {
      const next = this.queue.shift();
      if (next === undefined) {
        return;
      }
      next.grant(this.grant(next.handle));
    }
  }

  /**
   * Acquire the lock in the given mode
   *
   * Resolves once the lock is held. There is no timeout: the request waits
   * until every earlier incompatible holder or request is done.
   */
  acquire(mode: LockMode): Promise<LockHandle> {
    const handle: LockHandle = {
      resource: this.resource,
      mode,
      value: this.generateHandleValue(),
      acquiredAt: 0,
    };

    if (this.queue.length === 0 && this.canGrant(mode)) {
      return Promise.resolve(this.grant(handle));
    }

    ReadWriteLock.logger.debug(
      `Waiting for ${mode} lock on "${this.resource}" ` +
        `(readers: ${this.activeReaders}, writer: ${this.writerActive}, ` +
        `queued: ${this.queue.length})`,
    );

    return new Promise<LockHandle>((resolve) => {
      this.queue.push({ handle, grant: resolve });
    });
  }

  /**
   * Release a lock
   *
   * @returns true if released, false if the handle does not hold this lock
   */
  release(handle: LockHandle): boolean {
    if (
      handle.resource !== this.resource ||
      !this.holders.delete(handle.value)
    ) {
      ReadWriteLock.logger.warn(
        `Failed to release ${handle.mode} lock on "${this.resource}" - ` +
          `handle "${handle.value}" is not a holder`,
      );
      return false;
    }

    if (handle.mode === LockMode.EXCLUSIVE) {
      this.writerActive = false;
    } else {
      this.activeReaders--;
    }

    this.drain();
    return true;
  }

  /**
   * Execute a function while holding the lock in shared mode
   */
  withReadLock<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.withLock(LockMode.SHARED, fn);
  }

  /**
   * Execute a function while holding the lock in exclusive mode
   */
  withWriteLock<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.withLock(LockMode.EXCLUSIVE, fn);
  }

  /**
   * Execute a function while holding the lock
   * Automatically acquires and releases the lock, also when fn throws
   */
  async withLock<T>(mode: LockMode, fn: () => T | Promise<T>): Promise<T> {
    const handle = await this.acquire(mode);

    try {
      return await fn();
    } finally {
      this.release(handle);
    }
  }

  getState(): LockState {
    return {
      resource: this.resource,
      activeReaders: this.activeReaders,
      writerActive: this.writerActive,
      queued: this.queue.length,
    };
  }
}
