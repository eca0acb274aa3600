export * from './catalog.constants';
export * from './catalog.errors';
export * from './interfaces';
export * from './identifier-catalog';
export * from './seat-inventory';
export * from './booking-catalog.service';
export * from './catalog.module';
