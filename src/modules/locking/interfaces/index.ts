export * from './lock.interface';
