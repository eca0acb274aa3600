import { Logger } from '@nestjs/common';
import { ReadWriteLock } from '../locking';
import {
  DEFAULT_SEATS_PER_ROOM,
  FIELD_SEPARATOR,
  LINE_TERMINATOR,
} from './catalog.constants';
import {
  BookingOutcome,
  SeatIndex,
  Snapshot,
  createSnapshot,
} from './interfaces';

/**
 * SeatInventory tracks the seats of one (movie, theater) showing
 *
 * Seat States:
 * - available: seat can be booked
 * - booked: seat is taken for good (there is no cancellation)
 *
 * Locking:
 * - snapshot() holds the inventory lock in shared mode
 * - book() holds it in exclusive mode, so bookings on the same inventory are
 *   serialized while bookings on different inventories run side by side
 */
export class SeatInventory {
  private static readonly logger = new Logger(SeatInventory.name);

  private readonly available: boolean[];
  private readonly lock: ReadWriteLock;
  private cached: Snapshot;
  private freeSeats: number;

  /**
   * @param capacity Number of seats, indexed 0..capacity-1
   * @param resource Lock resource name, used in logs
   */
  constructor(
    readonly capacity: number = DEFAULT_SEATS_PER_ROOM,
    resource = 'lock:inventory',
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(
        `Seat capacity must be a positive integer, got ${capacity}`,
      );
    }

    this.available = new Array<boolean>(capacity).fill(true);
    this.freeSeats = capacity;
    this.lock = new ReadWriteLock(resource);
    this.cached = createSnapshot(0, '');
    this.rebuildSnapshot();
  }

  get availableCount(): number {
    return this.freeSeats;
  }

  /**
   * Comma separated ascending list of available seats, ending with the line
   * terminator. When no seat is free the text is just the terminator.
   */
  snapshot(): Promise<Snapshot> {
    return this.lock.withReadLock(() => this.cached);
  }

  /**
   * Book a set of seats atomically
   *
   * Flow (under the exclusive inventory lock):
   * 1. Every index must be an integer in [0, capacity) - otherwise INVALID
   * 2. Every index must still be available - otherwise NOT_AVAILABLE
   * 3. Book all of them and rebuild the snapshot - ACCEPTED
   *
   * Range is checked for the whole request before availability, so a request
   * with both an out-of-range and a booked seat is INVALID. Nothing is booked
   * unless the result is ACCEPTED. An empty request is ACCEPTED and changes
   * nothing.
   */
  book(requested: ReadonlySet<SeatIndex>): Promise<BookingOutcome> {
    return this.lock.withWriteLock(() => this.commit([...requested]));
  }

  private commit(seats: SeatIndex[]): BookingOutcome {
    const outOfRange = seats.filter(
      (seat) => !Number.isInteger(seat) || seat < 0 || seat >= this.capacity,
    );
    if (outOfRange.length > 0) {
      SeatInventory.logger.debug(
        `Rejected booking on "${this.lock.resource}": ` +
          `seats out of range ${outOfRange.join(', ')}`,
      );
      return BookingOutcome.INVALID;
    }

    const taken = seats.filter((seat) => !this.available[seat]);
    if (taken.length > 0) {
      SeatInventory.logger.debug(
        `Rejected booking on "${this.lock.resource}": ` +
          `seats already booked ${taken.join(', ')}`,
      );
      return BookingOutcome.NOT_AVAILABLE;
    }

    if (seats.length === 0) {
      return BookingOutcome.ACCEPTED;
    }

    for (const seat of seats) {
      this.available[seat] = false;
    }
    this.freeSeats -= seats.length;

    this.rebuildSnapshot();
    return BookingOutcome.ACCEPTED;
  }

  /**
   * Must be called while holding the exclusive lock (or from the constructor)
   */
  private rebuildSnapshot(): void {
    const free: SeatIndex[] = [];
    this.available.forEach((isFree, seat) => {
      if (isFree) {
        free.push(seat);
      }
    });

    this.cached = createSnapshot(
      this.cached.version + 1,
      `${free.join(FIELD_SEPARATOR)}${LINE_TERMINATOR}`,
    );
  }
}
