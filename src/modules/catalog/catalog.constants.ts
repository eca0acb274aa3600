/**
 * Catalog constants for snapshot formats and defaults
 */

// Terminates every line of every listing, including an empty seat listing
export const LINE_TERMINATOR = '\r\n';

export const FIELD_SEPARATOR = ',';

// Seats per (movie, theater) inventory unless configured otherwise
export const DEFAULT_SEATS_PER_ROOM = 20;

// Config namespace registered with @nestjs/config
export const CATALOG_CONFIG_NAMESPACE = 'catalog';
