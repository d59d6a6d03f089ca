import { z } from 'zod';

import { Coordinate, IpLocation } from '../types';
import { AutolocateError, errorMessage } from '../utils/errors';
import { defaultHttpFetch, describeFetchFailure, HttpFetch } from '../utils/http';
import { parseLiteralCoordinate } from '../utils/location';
import { createLogger } from '../utils/logger';

const logger = createLogger('IpInfoLocator');

export interface IpLocator {
  locate(): Promise<IpLocation>;
}

export interface IpInfoLocatorOptions {
  url: string;
  timeoutMs: number;
}

const ipInfoResponseSchema = z.object({
  loc: z.string().optional(),
  city: z.string().optional(),
  region: z.string().optional(),
  country: z.string().optional(),
});

// Best effort: the position is that of the caller's network egress, not the caller.
export class IpInfoLocator implements IpLocator {
  constructor(
    private readonly options: IpInfoLocatorOptions,
    private readonly httpFetch: HttpFetch = defaultHttpFetch
  ) {}

  async locate(): Promise<IpLocation> {
    let body: unknown;
    try {
      const response = await this.httpFetch(this.options.url, {
        headers: { Accept: 'application/json' },
        timeout: this.options.timeoutMs,
      });
      if (!response.ok) {
        throw new AutolocateError(`IP location service responded with HTTP ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof AutolocateError) {
        logger.warn('IP location request rejected', { reason: error.message });
        throw error;
      }
      const reason = describeFetchFailure(error, this.options.timeoutMs);
      logger.warn('IP location request failed', { reason });
      throw new AutolocateError(`Autolocation failed: ${reason}`, { cause: error });
    }

    const parsed = ipInfoResponseSchema.safeParse(body);
    if (!parsed.success || !parsed.data.loc) {
      throw new AutolocateError('Autolocation failed: response did not include a location');
    }

    let location: Coordinate | null;
    try {
      location = parseLiteralCoordinate(parsed.data.loc);
    } catch (error) {
      throw new AutolocateError(`Autolocation failed: ${errorMessage(error)}`, { cause: error });
    }
    if (!location) {
      throw new AutolocateError(`Autolocation failed: unreadable location "${parsed.data.loc}"`);
    }

    const { city, region, country } = parsed.data;
    const label = [city, region, country].filter(Boolean).join(', ');
    logger.info('Autolocated from IP', { label });
    return label ? { location, label } : { location };
  }
}
