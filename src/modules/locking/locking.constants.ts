/**
 * Lock modes and resource names for the in-process read/write locks
 */
export enum LockMode {
  SHARED = 'shared',
  EXCLUSIVE = 'exclusive',
}

// Resource name patterns
export const CATALOG_LOCK_RESOURCE = 'lock:catalog';
export const INVENTORY_LOCK_RESOURCE = (movieId: number, theaterId: number) =>
  `lock:inventory:${movieId}:${theaterId}`;
