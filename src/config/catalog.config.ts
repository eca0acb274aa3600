import { registerAs } from '@nestjs/config';
import {
  CATALOG_CONFIG_NAMESPACE,
  DEFAULT_SEATS_PER_ROOM,
} from '../modules/catalog/catalog.constants';

export interface CatalogConfig {
  /** Seats created for every (movie, theater) showing */
  seatsPerRoom: number;
}

/**
 * Catalog configuration, read through ConfigService as "catalog.*"
 *
 * Environment:
 * - SEATS_PER_ROOM: seats per showing (default 20)
 */
export default registerAs(
  CATALOG_CONFIG_NAMESPACE,
  (): CatalogConfig => ({
    seatsPerRoom: parseInt(
      process.env.SEATS_PER_ROOM ?? String(DEFAULT_SEATS_PER_ROOM),
      10,
    ),
  }),
);
