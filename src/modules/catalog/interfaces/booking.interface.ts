/**
 * Outcome of a seat booking request against an existing inventory
 * - accepted: every requested seat is now booked
 * - not_available: at least one requested seat was already booked
 * - invalid: at least one requested seat index is outside the inventory
 */
export enum BookingOutcome {
  ACCEPTED = 'accepted',
  NOT_AVAILABLE = 'not_available',
  INVALID = 'invalid',
}

export type MovieId = number;
export type TheaterId = number;
export type SeatIndex = number;

/**
 * Counts reported by BookingCatalogService.stats()
 */
export interface CatalogStats {
  movies: number;
  theaters: number;
  inventories: number;
}
