import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { validate } from './config/env.validation';
import { CatalogModule } from './modules/catalog/catalog.module';

export const DEFAULT_ENV_FILES = ['.env.local', '.env'];

export interface AppModuleOptions {
  /** Env files to read, first match wins per variable */
  envFilePath?: string[];
}

/**
 * AppModule - Root module of the booking store
 *
 * Configuration:
 * - ConfigModule: Global configuration with .env support and validation
 *
 * Feature Modules:
 * - CatalogModule: Movies, theaters and seat inventories; registers the
 *   `catalog` config namespace itself
 */
@Module({})
export class AppModule {
  static forRoot(options: AppModuleOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          envFilePath: options.envFilePath ?? DEFAULT_ENV_FILES,
          validate,
        }),
        CatalogModule,
      ],
    };
  }
}
