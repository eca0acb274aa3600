/**
 * Kinds of failure the catalog reports instead of throwing
 */
export enum CatalogErrorKind {
  NOT_FOUND = 'not_found',
  ALREADY_EXISTS = 'already_exists',
  ALREADY_ASSOCIATED = 'already_associated',
  INVALID_LABEL = 'invalid_label',
}

/**
 * Structured error payload
 * - kind: what went wrong, for the caller to branch on
 * - errorCode: UPPER_SNAKE code naming the entity involved
 */
export interface CatalogError {
  kind: CatalogErrorKind;
  errorCode: string;
  message: string;
  details?: Record<string, unknown>;
}

export type CatalogResult<T> =
  | { success: true; data: T }
  | { success: false; error: CatalogError };

export function ok<T>(data: T): CatalogResult<T> {
  return { success: true, data };
}

export function fail<T>(error: CatalogError): CatalogResult<T> {
  return { success: false, error };
}
