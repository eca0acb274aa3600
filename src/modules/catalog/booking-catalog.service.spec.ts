import { ConfigService } from '@nestjs/config';
import { BookingCatalogService } from './booking-catalog.service';
import { BookingOutcome, CatalogErrorKind, CatalogResult } from './interfaces';

const ALL_SEATS = '0,1,2,3,4,5,6,7,8,9,10,11,12,13,14,15,16,17,18,19\r\n';

function createCatalog(seatsPerRoom = 20): BookingCatalogService {
  return new BookingCatalogService(
    new ConfigService({ catalog: { seatsPerRoom } }),
  );
}

function unwrap<T>(result: CatalogResult<T>): T {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.errorCode}`);
  }
  return result.data;
}

describe('BookingCatalogService', () => {
  let catalog: BookingCatalogService;

  beforeEach(() => {
    catalog = createCatalog();
  });

  describe('movies and theaters', () => {
    it('registers movies and lists them', async () => {
      const ids = unwrap(
        await catalog.addMovies(new Set(['Metropolis', 'Nosferatu'])),
      );

      expect(ids).toEqual([1, 2]);
      expect((await catalog.moviesSnapshot()).text).toBe(
        '1,Metropolis\r\n2,Nosferatu\r\n',
      );
      expect(await catalog.sortedMovieIds()).toEqual([1, 2]);
      expect(await catalog.getMovieTitle(2)).toEqual({
        success: true,
        data: 'Nosferatu',
      });
    });

    it('keeps the catalog unchanged when a movie title repeats', async () => {
      await catalog.addMovies(new Set(['Metropolis']));

      const result = await catalog.addMovies(
        new Set(['Sunrise', 'Metropolis']),
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.kind).toBe(CatalogErrorKind.ALREADY_EXISTS);
        expect(result.error.errorCode).toBe('MOVIE_ALREADY_EXISTS');
      }
      expect(await catalog.sortedMovieIds()).toEqual([1]);
      expect(await catalog.theatersForMovie(2)).toMatchObject({
        success: false,
      });
    });

    it('registers theaters independently of movies', async () => {
      await catalog.addMovies(new Set(['Metropolis']));

      expect(await catalog.addTheaters(new Set(['Odeon', 'Rialto']))).toEqual({
        success: true,
        data: [1, 2],
      });
      expect(await catalog.sortedTheaterIds()).toEqual([1, 2]);
      expect(await catalog.getTheaterName(1)).toEqual({
        success: true,
        data: 'Odeon',
      });
    });

    it('rejects repeated theater names', async () => {
      await catalog.addTheaters(new Set(['Odeon']));

      const result = await catalog.addTheaters(new Set(['Odeon']));

      expect(result).toMatchObject({
        success: false,
        error: {
          kind: CatalogErrorKind.ALREADY_EXISTS,
          errorCode: 'THEATER_ALREADY_EXISTS',
        },
      });
      expect(await catalog.sortedTheaterIds()).toEqual([1]);
    });

    it('reports unknown titles and names as NOT_FOUND', async () => {
      expect(await catalog.getMovieTitle(3)).toMatchObject({
        success: false,
        error: { errorCode: 'MOVIE_NOT_FOUND' },
      });
      expect(await catalog.getTheaterName(3)).toMatchObject({
        success: false,
        error: { errorCode: 'THEATER_NOT_FOUND' },
      });
    });
  });

  describe('theaters for a movie', () => {
    let movieId: number;
    let odeon: number;
    let rialto: number;
    let plaza: number;

    beforeEach(async () => {
      [movieId] = unwrap(await catalog.addMovies(new Set(['Metropolis'])));
      [odeon, rialto, plaza] = unwrap(
        await catalog.addTheaters(new Set(['Odeon', 'Rialto', 'Plaza'])),
      );
    });

    it('starts a new movie with an empty listing', async () => {
      expect(await catalog.theatersForMovie(movieId)).toEqual({
        success: true,
        data: { version: 1, text: '' },
      });
    });

    it('fails for an unknown movie instead of an empty listing', async () => {
      expect(await catalog.theatersForMovie(99)).toEqual({
        success: false,
        error: {
          kind: CatalogErrorKind.NOT_FOUND,
          errorCode: 'MOVIE_NOT_FOUND',
          message: 'Movie 99 not found',
          details: { id: 99 },
        },
      });
    });

    it('lists theaters in the order they were linked', async () => {
      expect(
        await catalog.addTheatersToMovie(movieId, new Set([plaza, odeon])),
      ).toEqual({
        success: true,
        data: [odeon, plaza],
      });
      await catalog.addTheatersToMovie(movieId, new Set([rialto]));

      expect(await catalog.theatersForMovie(movieId)).toEqual({
        success: true,
        data: { version: 3, text: '1,Odeon\r\n3,Plaza\r\n2,Rialto\r\n' },
      });
    });

    it('creates a fully available inventory per linked theater', async () => {
      await catalog.addTheatersToMovie(movieId, new Set([odeon]));

      expect(await catalog.availableSeats(movieId, odeon)).toEqual({
        success: true,
        data: { version: 1, text: ALL_SEATS },
      });
      expect(await catalog.stats()).toEqual({
        movies: 1,
        theaters: 3,
        inventories: 1,
      });
    });

    it('fails for an unknown movie', async () => {
      const result = await catalog.addTheatersToMovie(42, new Set([odeon]));

      expect(result).toMatchObject({
        success: false,
        error: {
          kind: CatalogErrorKind.NOT_FOUND,
          errorCode: 'MOVIE_NOT_FOUND',
        },
      });
    });

    it('fails for an unknown theater without linking the others', async () => {
      const result = await catalog.addTheatersToMovie(
        movieId,
        new Set([odeon, 17]),
      );

      expect(result).toMatchObject({
        success: false,
        error: {
          kind: CatalogErrorKind.NOT_FOUND,
          errorCode: 'THEATER_NOT_FOUND',
          details: { id: 17 },
        },
      });
      expect(await catalog.stats()).toMatchObject({ inventories: 0 });
      expect((await catalog.availableSeats(movieId, odeon)).success).toBe(
        false,
      );
    });

    it('rejects the batch when a theater already shows the movie', async () => {
      await catalog.addTheatersToMovie(movieId, new Set([odeon]));
      await catalog.book(movieId, odeon, new Set([0]));

      const result = await catalog.addTheatersToMovie(
        movieId,
        new Set([rialto, odeon]),
      );

      expect(result).toEqual({
        success: false,
        error: {
          kind: CatalogErrorKind.ALREADY_ASSOCIATED,
          errorCode: 'THEATER_ALREADY_ASSOCIATED',
          message: `Theaters already showing movie ${movieId}: ${odeon}`,
          details: { movieId, theaterIds: [odeon] },
        },
      });
      expect(await catalog.availableSeats(movieId, rialto)).toMatchObject({
        success: false,
        error: { errorCode: 'SHOWING_NOT_FOUND' },
      });
      expect(unwrap(await catalog.availableSeats(movieId, odeon)).text).toBe(
        '1,2,3,4,5,6,7,8,9,10,11,12,13,14,15,16,17,18,19\r\n',
      );
      expect(unwrap(await catalog.theatersForMovie(movieId)).text).toBe(
        '1,Odeon\r\n',
      );
    });

    it('gives another movie in the same theater its own seats', async () => {
      const [otherMovie] = unwrap(
        await catalog.addMovies(new Set(['Sunrise'])),
      );
      await catalog.addTheatersToMovie(movieId, new Set([odeon]));
      await catalog.addTheatersToMovie(otherMovie, new Set([odeon]));

      await catalog.book(movieId, odeon, new Set([0, 1, 2]));

      expect(unwrap(await catalog.availableSeats(otherMovie, odeon)).text).toBe(
        ALL_SEATS,
      );
    });
  });

  describe('booking', () => {
    let movieId: number;
    let theaterId: number;

    beforeEach(async () => {
      [movieId] = unwrap(await catalog.addMovies(new Set(['Metropolis'])));
      [theaterId] = unwrap(await catalog.addTheaters(new Set(['Odeon'])));
      await catalog.addTheatersToMovie(movieId, new Set([theaterId]));
    });

    it('accepts free seats and shows them as taken', async () => {
      expect(
        await catalog.book(movieId, theaterId, new Set([0, 1, 2])),
      ).toEqual({
        success: true,
        data: BookingOutcome.ACCEPTED,
      });
      expect(await catalog.availableSeats(movieId, theaterId)).toEqual({
        success: true,
        data: {
          version: 2,
          text: '3,4,5,6,7,8,9,10,11,12,13,14,15,16,17,18,19\r\n',
        },
      });
    });

    it('answers NOT_AVAILABLE for a seat booked earlier', async () => {
      await catalog.book(movieId, theaterId, new Set([0, 1, 2]));

      expect(await catalog.book(movieId, theaterId, new Set([2, 3]))).toEqual({
        success: true,
        data: BookingOutcome.NOT_AVAILABLE,
      });
      expect(
        unwrap(await catalog.availableSeats(movieId, theaterId)).version,
      ).toBe(2);
    });

    it('answers INVALID for a seat beyond the room', async () => {
      expect(await catalog.book(movieId, theaterId, new Set([25]))).toEqual({
        success: true,
        data: BookingOutcome.INVALID,
      });
      expect(
        unwrap(await catalog.availableSeats(movieId, theaterId)).text,
      ).toBe(ALL_SEATS);
    });

    it.each([
      [99, 1],
      [1, 99],
    ])(
      'fails with SHOWING_NOT_FOUND for movie %i / theater %i',
      async (movie, theater) => {
        expect(await catalog.book(movie, theater, new Set([0]))).toEqual({
          success: false,
          error: {
            kind: CatalogErrorKind.NOT_FOUND,
            errorCode: 'SHOWING_NOT_FOUND',
            message: `Theater ${theater} is not showing movie ${movie}`,
            details: { movieId: movie, theaterId: theater },
          },
        });
      },
    );

    it('fails for a known theater that does not show the movie', async () => {
      const [rialto] = unwrap(await catalog.addTheaters(new Set(['Rialto'])));

      expect((await catalog.book(movieId, rialto, new Set([0]))).success).toBe(
        false,
      );
      expect((await catalog.availableSeats(movieId, rialto)).success).toBe(
        false,
      );
    });
  });

  describe('clear', () => {
    it('drops everything and restarts ids at 1', async () => {
      await catalog.addMovies(new Set(['Metropolis', 'Nosferatu']));
      await catalog.addTheaters(new Set(['Odeon']));
      await catalog.addTheatersToMovie(1, new Set([1]));

      await catalog.clear();

      expect(await catalog.sortedMovieIds()).toEqual([]);
      expect(await catalog.sortedTheaterIds()).toEqual([]);
      expect((await catalog.moviesSnapshot()).text).toBe('');
      expect(await catalog.stats()).toEqual({
        movies: 0,
        theaters: 0,
        inventories: 0,
      });
      expect((await catalog.theatersForMovie(1)).success).toBe(false);
      expect((await catalog.availableSeats(1, 1)).success).toBe(false);

      expect(await catalog.addMovies(new Set(['Sunrise']))).toEqual({
        success: true,
        data: [1],
      });
      expect(unwrap(await catalog.theatersForMovie(1)).text).toBe('');
    });
  });

  describe('configuration', () => {
    it('sizes inventories from catalog.seatsPerRoom', async () => {
      const small = createCatalog(5);
      await small.addMovies(new Set(['Metropolis']));
      await small.addTheaters(new Set(['Odeon']));
      await small.addTheatersToMovie(1, new Set([1]));

      expect(unwrap(await small.availableSeats(1, 1)).text).toBe(
        '0,1,2,3,4\r\n',
      );
      expect(unwrap(await small.book(1, 1, new Set([5])))).toBe(
        BookingOutcome.INVALID,
      );
    });

    it('falls back to 20 seats when nothing is configured', async () => {
      const defaults = new BookingCatalogService(new ConfigService({}));
      await defaults.addMovies(new Set(['Metropolis']));
      await defaults.addTheaters(new Set(['Odeon']));
      await defaults.addTheatersToMovie(1, new Set([1]));

      expect(unwrap(await defaults.availableSeats(1, 1)).text).toBe(ALL_SEATS);
    });

    it('refuses a non-positive seat count', () => {
      expect(() => createCatalog(0)).toThrow(
        'catalog.seatsPerRoom must be a positive integer, got 0',
      );
    });
  });
});
