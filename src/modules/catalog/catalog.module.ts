import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import catalogConfig from '../../config/catalog.config';
import { BookingCatalogService } from './booking-catalog.service';

/**
 * CatalogModule provides the in-memory movie/theater/seat store
 *
 * Features:
 * - Movie and theater registries with sequential ids
 * - Per-showing seat inventories with atomic, first-come-first-served booking
 * - Cached text listings for movies, theaters per movie and free seats
 *
 * Consumers inject BookingCatalogService; each application context gets its
 * own instance.
 *
 * Configuration:
 * - catalog.seatsPerRoom (SEATS_PER_ROOM): seats per showing
 */
@Module({
  imports: [ConfigModule.forFeature(catalogConfig)],
  providers: [BookingCatalogService],
  exports: [BookingCatalogService],
})
export class CatalogModule {}
