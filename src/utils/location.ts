import { Coordinate } from '../types';
import { InvalidCoordinateError } from './errors';

const EARTH_RADIUS_KM = 6371.0;
const MAX_LATITUDE = 90;
const MAX_LONGITUDE = 180;
const MAX_POSTAL_CODE_LENGTH = 10;

const DECIMAL = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)`;
const DECIMAL_PATTERN = new RegExp(`^${DECIMAL}(?:[eE][+-]?\\d+)?$`);
const LITERAL_COORDINATE_PATTERN = new RegExp(`^\\s*(${DECIMAL})\\s*,\\s*(${DECIMAL})\\s*$`);

/** Base-10 only: hex, binary and `Infinity` spellings that `Number()` accepts yield null. */
export function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

export function isValidCoordinate(location?: Partial<Coordinate>): location is Coordinate {
  if (!location) {
    return false;
  }

  const { latitude, longitude } = location;
  return (
    typeof latitude === 'number' &&
    typeof longitude === 'number' &&
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    Math.abs(latitude) <= MAX_LATITUDE &&
    Math.abs(longitude) <= MAX_LONGITUDE
  );
}

function outOfRange(latitude: number, longitude: number): InvalidCoordinateError {
  return new InvalidCoordinateError(
    `Invalid coordinate (${latitude}, ${longitude}): latitude must be within [-90, 90] and longitude within [-180, 180]`
  );
}

export function assertCoordinate(latitude: number, longitude: number): Coordinate {
  const candidate = { latitude, longitude };
  if (!isValidCoordinate(candidate)) {
    throw outOfRange(latitude, longitude);
  }
  return Object.freeze(candidate);
}

/**
 * Parses `lat,lon` input. Returns null when the text is not shaped like a
 * coordinate pair at all, and throws when it is but the values are out of range.
 */
export function parseLiteralCoordinate(text: string): Coordinate | null {
  const match = LITERAL_COORDINATE_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  return assertCoordinate(Number(match[1]), Number(match[2]));
}

export function haversineDistanceKm(
  latitudeA: number,
  longitudeA: number,
  latitudeB: number,
  longitudeB: number
): number {
  const toRad = (value: number) => (value * Math.PI) / 180;
  const dLat = toRad(latitudeB - latitudeA);
  const dLon = toRad(longitudeB - longitudeA);
  const latARad = toRad(latitudeA);
  const latBRad = toRad(latitudeB);

  const hav =
    Math.sin(dLat / 2) * Math.sin(dLat / 2) +
    Math.cos(latARad) * Math.cos(latBRad) * Math.sin(dLon / 2) * Math.sin(dLon / 2);
  // Rounding can push hav a hair past 1 for antipodal points.
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.sqrt(Math.min(1, hav)));
}

export function distanceKm(a: Coordinate, b: Coordinate): number {
  for (const { latitude, longitude } of [a, b]) {
    if (!isValidCoordinate({ latitude, longitude })) {
      throw outOfRange(latitude, longitude);
    }
  }
  return haversineDistanceKm(a.latitude, a.longitude, b.latitude, b.longitude);
}

export function formatCoordinate(location: Coordinate): string {
  return `${location.latitude.toFixed(6)},${location.longitude.toFixed(6)}`;
}

export function looksLikePostalCode(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_POSTAL_CODE_LENGTH && /\d/.test(trimmed);
}
