import 'reflect-metadata';
import { INestApplicationContext, Logger, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { parseLogLevels } from './config/env.validation';
import { BookingCatalogService } from './modules/catalog/booking-catalog.service';

export interface BookingContextOptions {
  /** Nest log levels; defaults to LOG_LEVEL or error,warn,log */
  logLevels?: LogLevel[];

  /** Env files to read; defaults to .env.local then .env */
  envFilePath?: string[];
}

export interface BookingContext {
  app: INestApplicationContext;
  catalog: BookingCatalogService;
}

/**
 * Create a standalone application context holding one catalog
 *
 * LOG_LEVEL may come from the process environment or from an env file.
 * Env files are only read while the context is created, so the levels are
 * applied again once ConfigService has them.
 *
 * @example
 * const { app, catalog } = await createBookingContext();
 * await catalog.addMovies(new Set(['Metropolis']));
 * await app.close();
 */
export async function createBookingContext(
  options: BookingContextOptions = {},
): Promise<BookingContext> {
  const logger = new Logger('Bootstrap');

  const app = await NestFactory.createApplicationContext(
    AppModule.forRoot({ envFilePath: options.envFilePath }),
    {
      logger: options.logLevels ?? parseLogLevels(process.env.LOG_LEVEL),
    },
  );

  if (!options.logLevels) {
    const configService = app.get(ConfigService);
    app.useLogger(parseLogLevels(configService.get<string>('LOG_LEVEL')));
  }

  const catalog = app.get(BookingCatalogService);

  logger.log('Booking catalog ready');
  return { app, catalog };
}
