export type PantryFinderErrorCode =
  | 'INVALID_COORDINATE'
  | 'DATASET_LOAD'
  | 'GEOCODE_NOT_FOUND'
  | 'GEOCODE_SERVICE'
  | 'AUTOLOCATE'
  | 'INVALID_QUERY';

export abstract class PantryFinderError extends Error {
  abstract readonly code: PantryFinderErrorCode;
  /** True when the shell may fall back to manual coordinate entry. */
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidCoordinateError extends PantryFinderError {
  readonly code = 'INVALID_COORDINATE';
  readonly recoverable = false;
}

export class DatasetLoadError extends PantryFinderError {
  readonly code = 'DATASET_LOAD';
  readonly recoverable = false;
}

export class GeocodeNotFoundError extends PantryFinderError {
  readonly code = 'GEOCODE_NOT_FOUND';
  readonly recoverable = true;
}

export class GeocodeServiceError extends PantryFinderError {
  readonly code = 'GEOCODE_SERVICE';
  readonly recoverable = true;
}

export class AutolocateError extends PantryFinderError {
  readonly code = 'AUTOLOCATE';
  readonly recoverable = true;
}

export class InvalidQueryError extends PantryFinderError {
  readonly code = 'INVALID_QUERY';
  readonly recoverable = false;
}

export function isPantryFinderError(error: unknown): error is PantryFinderError {
  return error instanceof PantryFinderError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
