export * from './snapshot.interface';
export * from './catalog-result.interface';
export * from './booking.interface';
