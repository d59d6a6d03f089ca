import { z } from 'zod';

import { GeocodeCandidate } from '../types';
import { GeocodeServiceError, InvalidCoordinateError } from '../utils/errors';
import { defaultHttpFetch, describeFetchFailure, HTTP_TOO_MANY_REQUESTS, HttpFetch } from '../utils/http';
import { assertCoordinate, parseDecimal } from '../utils/location';
import { createLogger } from '../utils/logger';

const logger = createLogger('NominatimGeocoder');

export interface Geocoder {
  geocode(query: string): Promise<GeocodeCandidate[]>;
}

export interface NominatimGeocoderOptions {
  baseUrl: string;
  userAgent: string;
  timeoutMs: number;
  resultLimit: number;
}

// Nominatim returns coordinates as decimal strings.
const coordinateField = z.union([
  z.number(),
  z
    .string()
    .trim()
    .refine((value) => parseDecimal(value) !== null)
    .transform(Number),
]);

const searchResponseSchema = z.array(
  z.object({
    lat: coordinateField,
    lon: coordinateField,
    display_name: z.string().optional(),
  })
);

/**
 * Free-text geocoding against an OpenStreetMap Nominatim search endpoint.
 * Sends one request per call with the configured User-Agent; never retries.
 */
export class NominatimGeocoder implements Geocoder {
  constructor(
    private readonly options: NominatimGeocoderOptions,
    private readonly httpFetch: HttpFetch = defaultHttpFetch
  ) {}

  async geocode(query: string): Promise<GeocodeCandidate[]> {
    const params = new URLSearchParams({
      q: query,
      format: 'json',
      limit: String(this.options.resultLimit),
    });
    const url = `${this.options.baseUrl}/search?${params.toString()}`;

    let body: unknown;
    try {
      const response = await this.httpFetch(url, {
        headers: { 'User-Agent': this.options.userAgent, Accept: 'application/json' },
        timeout: this.options.timeoutMs,
      });

      if (response.status === HTTP_TOO_MANY_REQUESTS) {
        throw new GeocodeServiceError('Geocoding service is rate limiting requests; wait a moment and try again');
      }
      if (!response.ok) {
        throw new GeocodeServiceError(`Geocoding service responded with HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof GeocodeServiceError) {
        logger.warn('Geocoding request rejected', { query, reason: error.message });
        throw error;
      }
      const reason = describeFetchFailure(error, this.options.timeoutMs);
      logger.warn('Geocoding request failed', { query, reason });
      throw new GeocodeServiceError(`Geocoding failed: ${reason}`, { cause: error });
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn('Unexpected geocoding response', { query, issues: parsed.error.issues.length });
      throw new GeocodeServiceError('Geocoding failed: unexpected response from geocoding service');
    }

    try {
      return parsed.data.map((match) => ({
        location: assertCoordinate(match.lat, match.lon),
        label: match.display_name ?? query,
      }));
    } catch (error) {
      if (error instanceof InvalidCoordinateError) {
        throw new GeocodeServiceError(`Geocoding failed: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
