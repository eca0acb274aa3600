import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import {
  CATALOG_LOCK_RESOURCE,
  INVENTORY_LOCK_RESOURCE,
  ReadWriteLock,
} from '../locking';
import { CatalogErrors } from './catalog.errors';
import {
  CATALOG_CONFIG_NAMESPACE,
  DEFAULT_SEATS_PER_ROOM,
  FIELD_SEPARATOR,
  LINE_TERMINATOR,
} from './catalog.constants';
import { IdentifierCatalog } from './identifier-catalog';
import { SeatInventory } from './seat-inventory';
import {
  BookingOutcome,
  CatalogResult,
  CatalogStats,
  MovieId,
  SeatIndex,
  Snapshot,
  TheaterId,
  createSnapshot,
  fail,
  ok,
} from './interfaces';

/**
 * BookingCatalogService owns movies, theaters and the seat inventory of every
 * (movie, theater) showing
 *
 * Locking (always catalog lock first, inventory lock second):
 * - Reads and book() hold the catalog lock in SHARED mode. Booking does not
 *   change the catalog structure, so bookings on different showings run side
 *   by side and never wait for readers
 * - addMovies, addTheaters, addTheatersToMovie and clear hold the catalog
 *   lock in EXCLUSIVE mode and wait for in-flight reads and bookings
 * - Each SeatInventory serializes bookings on itself with its own lock
 *
 * Every domain failure comes back as a CatalogResult error; nothing throws
 * for an unknown id or a duplicate.
 *
 * @example
 * ```typescript
 * const [movieId] = (await catalog.addMovies(new Set(['Metropolis']))).data;
 * ```
 */
@Injectable()
export class BookingCatalogService {
  private readonly logger = new Logger(BookingCatalogService.name);

  private readonly catalogLock = new ReadWriteLock(CATALOG_LOCK_RESOURCE);
  private readonly movies = new IdentifierCatalog('movie');
  private readonly theaters = new IdentifierCatalog('theater');

  /** movieId -> (theaterId -> inventory), theaters kept in association order */
  private readonly showings = new Map<MovieId, Map<TheaterId, SeatInventory>>();

  /** movieId -> "theaterId,name" listing */
  private readonly theaterListings = new Map<MovieId, Snapshot>();

  private readonly seatsPerRoom: number;

  constructor(private readonly configService: ConfigService) {
    this.seatsPerRoom = this.configService.get<number>(
      `${CATALOG_CONFIG_NAMESPACE}.seatsPerRoom`,
      DEFAULT_SEATS_PER_ROOM,
    );

    if (!Number.isInteger(this.seatsPerRoom) || this.seatsPerRoom < 1) {
      throw new Error(
        'catalog.seatsPerRoom must be a positive integer, ' +
          `got ${this.seatsPerRoom}`,
      );
    }
  }

  /**
   * "movieId,title" line per movie
   */
  moviesSnapshot(): Promise<Snapshot> {
    return this.catalogLock.withReadLock(() => this.movies.snapshot());
  }

  sortedMovieIds(): Promise<MovieId[]> {
    return this.catalogLock.withReadLock(() => this.movies.sortedIds());
  }

  sortedTheaterIds(): Promise<TheaterId[]> {
    return this.catalogLock.withReadLock(() => this.theaters.sortedIds());
  }

  getMovieTitle(movieId: MovieId): Promise<CatalogResult<string>> {
    return this.catalogLock.withReadLock(() => this.movies.getLabel(movieId));
  }

  getTheaterName(theaterId: TheaterId): Promise<CatalogResult<string>> {
    return this.catalogLock.withReadLock(() =>
      this.theaters.getLabel(theaterId),
    );
  }

  /**
   * "theaterId,name" line per theater showing the movie
   */
  theatersForMovie(movieId: MovieId): Promise<CatalogResult<Snapshot>> {
    return this.catalogLock.withReadLock(() => {
      const listing = this.theaterListings.get(movieId);
      if (listing === undefined) {
        return fail<Snapshot>(
          CatalogErrors.notFound(this.movies.entity, movieId),
        );
      }
      return ok(listing);
    });
  }

  /**
   * Available seats of a showing, see SeatInventory.snapshot()
   */
  availableSeats(
    movieId: MovieId,
    theaterId: TheaterId,
  ): Promise<CatalogResult<Snapshot>> {
    return this.catalogLock.withReadLock(async () => {
      const inventory = this.findInventory(movieId, theaterId);
      if (inventory === undefined) {
        return fail<Snapshot>(
          CatalogErrors.showingNotFound(movieId, theaterId),
        );
      }
      return ok(await inventory.snapshot());
    });
  }

  /**
   * Book seats of a showing, see SeatInventory.book()
   */
  book(
    movieId: MovieId,
    theaterId: TheaterId,
    seats: ReadonlySet<SeatIndex>,
  ): Promise<CatalogResult<BookingOutcome>> {
    return this.catalogLock.withReadLock(async () => {
      const inventory = this.findInventory(movieId, theaterId);
      if (inventory === undefined) {
        return fail<BookingOutcome>(
          CatalogErrors.showingNotFound(movieId, theaterId),
        );
      }

      const outcome = await inventory.book(seats);
      this.logger.debug(
        `Booking of ${seats.size} seats for movie ${movieId} ` +
          `in theater ${theaterId}: ${outcome}`,
      );
      return ok(outcome);
    });
  }

  /**
   * Add movies; all-or-nothing
   *
   * Every new movie starts with no theaters and an empty theater listing.
   *
   * @returns The ids assigned to the new movies
   */
  addMovies(titles: ReadonlySet<string>): Promise<CatalogResult<MovieId[]>> {
    return this.catalogLock.withWriteLock(() => {
      const result = this.movies.add(titles);
      if (!result.success) {
        this.logger.warn(`Rejected movie batch: ${result.error.message}`);
        return result;
      }

      for (const movieId of result.data) {
        this.showings.set(movieId, new Map());
        this.rebuildTheaterListing(movieId);
      }

      this.logger.log(`Added ${result.data.length} movies`);
      return result;
    });
  }

  /**
   * Add theaters; all-or-nothing
   *
   * @returns The ids assigned to the new theaters
   */
  addTheaters(names: ReadonlySet<string>): Promise<CatalogResult<TheaterId[]>> {
    return this.catalogLock.withWriteLock(() => {
      const result = this.theaters.add(names);
      if (!result.success) {
        this.logger.warn(`Rejected theater batch: ${result.error.message}`);
        return result;
      }

      this.logger.log(`Added ${result.data.length} theaters`);
      return result;
    });
  }

  /**
   * Start showing a movie in a set of theaters; all-or-nothing
   *
   * Flow:
   * 1. The movie and every theater must exist - otherwise NOT_FOUND
   * 2. No theater may already show the movie - otherwise ALREADY_ASSOCIATED
   * 3. Create one fully available inventory per theater and rebuild the
   *    movie's theater listing
   *
   * @returns The linked theater ids in ascending order
   */
  addTheatersToMovie(
    movieId: MovieId,
    theaterIds: ReadonlySet<TheaterId>,
  ): Promise<CatalogResult<TheaterId[]>> {
    return this.catalogLock.withWriteLock(() => {
      const showingsForMovie = this.showings.get(movieId);
      if (showingsForMovie === undefined) {
        return fail<TheaterId[]>(
          CatalogErrors.notFound(this.movies.entity, movieId),
        );
      }

      const requested = [...theaterIds].sort((a, b) => a - b);

      const unknown = requested.find(
        (theaterId) => !this.theaters.has(theaterId),
      );
      if (unknown !== undefined) {
        return fail<TheaterId[]>(
          CatalogErrors.notFound(this.theaters.entity, unknown),
        );
      }

      const linked = requested.filter((theaterId) =>
        showingsForMovie.has(theaterId),
      );
      if (linked.length > 0) {
        this.logger.warn(
          `Theaters ${linked.join(', ')} already show movie ${movieId}`,
        );
        return fail<TheaterId[]>(
          CatalogErrors.alreadyAssociated(movieId, linked),
        );
      }

      for (const theaterId of requested) {
        showingsForMovie.set(
          theaterId,
          new SeatInventory(
            this.seatsPerRoom,
            INVENTORY_LOCK_RESOURCE(movieId, theaterId),
          ),
        );
      }
      this.rebuildTheaterListing(movieId);

      this.logger.log(
        `Movie ${movieId} now showing in ${requested.length} more theaters`,
      );
      return ok(requested);
    });
  }

  /**
   * Remove every movie, theater and inventory; ids restart at 1
   */
  clear(): Promise<void> {
    return this.catalogLock.withWriteLock(() => {
      this.movies.clear();
      this.theaters.clear();
      this.showings.clear();
      this.theaterListings.clear();

      this.logger.log('Catalog cleared');
    });
  }

  stats(): Promise<CatalogStats> {
    return this.catalogLock.withReadLock(() => {
      let inventories = 0;
      for (const showingsForMovie of this.showings.values()) {
        inventories += showingsForMovie.size;
      }

      return {
        movies: this.movies.size,
        theaters: this.theaters.size,
        inventories,
      };
    });
  }

  private findInventory(
    movieId: MovieId,
    theaterId: TheaterId,
  ): SeatInventory | undefined {
    return this.showings.get(movieId)?.get(theaterId);
  }

  /**
   * Must be called while holding the exclusive catalog lock
   */
  private rebuildTheaterListing(movieId: MovieId): void {
    const showingsForMovie =
      this.showings.get(movieId) ?? new Map<TheaterId, SeatInventory>();

    let text = '';
    for (const theaterId of showingsForMovie.keys()) {
      const name = this.theaters.getLabel(theaterId);
      // Theaters are checked before they are linked and are never removed
      if (name.success) {
        text += `${theaterId}${FIELD_SEPARATOR}${name.data}${LINE_TERMINATOR}`;
      }
    }

    const previous = this.theaterListings.get(movieId);
    this.theaterListings.set(
      movieId,
      createSnapshot((previous?.version ?? 0) + 1, text),
    );
  }
}
