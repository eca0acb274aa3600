import { CatalogError, CatalogErrorKind } from './interfaces';

const toCode = (entity: string) =>
  entity.toUpperCase().replace(/[^A-Z0-9]+/g, '_');

/**
 * Builders for the structured errors returned by the catalog
 *
 * errorCode is derived from the entity name, e.g. "movie" -> MOVIE_NOT_FOUND
 */
export const CatalogErrors = {
  notFound(entity: string, id: number): CatalogError {
    return {
      kind: CatalogErrorKind.NOT_FOUND,
      errorCode: `${toCode(entity)}_NOT_FOUND`,
      message: `${capitalize(entity)} ${id} not found`,
      details: { id },
    };
  },

  alreadyExists(entity: string, labels: string[]): CatalogError {
    return {
      kind: CatalogErrorKind.ALREADY_EXISTS,
      errorCode: `${toCode(entity)}_ALREADY_EXISTS`,
      message: `${capitalize(entity)} already exists: ${labels.join(', ')}`,
      details: { labels },
    };
  },

  invalidLabel(entity: string, labels: string[]): CatalogError {
    return {
      kind: CatalogErrorKind.INVALID_LABEL,
      errorCode: 'INVALID_LABEL',
      message: `${capitalize(entity)} labels must not contain line breaks`,
      details: { labels },
    };
  },

  showingNotFound(movieId: number, theaterId: number): CatalogError {
    return {
      kind: CatalogErrorKind.NOT_FOUND,
      errorCode: 'SHOWING_NOT_FOUND',
      message: `Theater ${theaterId} is not showing movie ${movieId}`,
      details: { movieId, theaterId },
    };
  },

  alreadyAssociated(movieId: number, theaterIds: number[]): CatalogError {
    return {
      kind: CatalogErrorKind.ALREADY_ASSOCIATED,
      errorCode: 'THEATER_ALREADY_ASSOCIATED',
      message: `Theaters already showing movie ${movieId}: ${theaterIds.join(
        ', ',
      )}`,
      details: { movieId, theaterIds },
    };
  },
};

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
