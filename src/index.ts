import 'reflect-metadata';

export * from './modules/locking';
export * from './modules/catalog';
export {
  default as catalogConfig,
  CatalogConfig,
} from './config/catalog.config';
export { AppModule, AppModuleOptions } from './app.module';
export {
  createBookingContext,
  BookingContext,
  BookingContextOptions,
} from './bootstrap';
