export * from './locking.constants';
export * from './interfaces';
export * from './read-write-lock';
