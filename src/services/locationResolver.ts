import { LocationRequest, ResolvedLocation } from '../types';
import { GeocodeNotFoundError } from '../utils/errors';
import { looksLikePostalCode, parseLiteralCoordinate } from '../utils/location';
import { createLogger } from '../utils/logger';
import { Geocoder } from './nominatimGeocoder';
import { IpLocator } from './ipInfoLocator';

const logger = createLogger('LocationResolver');

export interface LocationInput {
  address?: string;
  autolocate?: boolean;
}

/**
 * Chooses exactly one strategy: literal coordinates, then free-text address,
 * then IP autolocation. Returns null when the user gave nothing to go on.
 * Throws InvalidCoordinateError for a `lat,lon` literal that is out of range.
 */
export function planLocationRequest(input: LocationInput): LocationRequest | null {
  const text = input.address?.trim();
  if (text) {
    const coordinate = parseLiteralCoordinate(text);
    if (coordinate) {
      return { kind: 'literal', coordinate, raw: text };
    }
    return { kind: 'address', query: text };
  }

  if (input.autolocate) {
    return { kind: 'autolocate' };
  }

  return null;
}

export class LocationResolver {
  constructor(
    private readonly geocoder: Geocoder,
    private readonly ipLocator: IpLocator
  ) {}

  async resolve(request: LocationRequest): Promise<ResolvedLocation> {
    switch (request.kind) {
      case 'literal':
        return {
          coordinate: request.coordinate,
          strategy: 'literal',
          approximate: false,
          alternatives: [],
        };
      case 'address':
        return this.resolveAddress(request.query);
      case 'autolocate':
        return this.resolveFromIp();
    }
  }

  private async resolveAddress(query: string): Promise<ResolvedLocation> {
    if (looksLikePostalCode(query)) {
      logger.info('Input looks like a postal code; geocoding it as an address', { query });
    }

    const matches = await this.geocoder.geocode(query);
    const [first] = matches;
    if (!first) {
      throw new GeocodeNotFoundError(`Address not found by geocoder: "${query}"`);
    }

    logger.info('Geocoded address', { query, label: first.label, matches: matches.length });
    return {
      coordinate: first.location,
      strategy: 'address',
      approximate: true,
      label: first.label,
      alternatives: matches,
    };
  }

  private async resolveFromIp(): Promise<ResolvedLocation> {
    const { location, label } = await this.ipLocator.locate();
    return {
      coordinate: location,
      strategy: 'autolocate',
      approximate: true,
      label,
      alternatives: [],
    };
  }
}
