import { Coordinate, PantryRecord, SearchQuery, SearchResult } from '../types';
import { InvalidQueryError } from '../utils/errors';
import { assertCoordinate, distanceKm } from '../utils/location';
import { createLogger } from '../utils/logger';

const logger = createLogger('PantrySearchService');

export function validateSearchQuery({ topN, radiusKm }: SearchQuery): void {
  if (!Number.isInteger(topN) || topN <= 0) {
    throw new InvalidQueryError(`Result count must be a positive integer (got ${topN})`);
  }
  if (radiusKm !== undefined && (!Number.isFinite(radiusKm) || radiusKm < 0)) {
    throw new InvalidQueryError(`Search radius must be a non-negative number of kilometers (got ${radiusKm})`);
  }
}

/**
 * Ranks every pantry by great-circle distance from `origin`, drops those beyond
 * `radiusKm` and keeps the closest `topN`. Equal distances keep dataset order.
 * An empty result means nothing matched; it is not an error.
 */
export function searchPantries(
  origin: Coordinate,
  dataset: readonly PantryRecord[],
  topN: number,
  radiusKm?: number
): SearchResult[] {
  validateSearchQuery({ topN, radiusKm });
  assertCoordinate(origin.latitude, origin.longitude);
  const effectiveRadius = radiusKm ?? Infinity;

  return dataset
    .map((pantry, index) => ({ pantry, distanceKm: distanceKm(origin, pantry.location), index }))
    .filter((candidate) => candidate.distanceKm <= effectiveRadius)
    .sort((a, b) => a.distanceKm - b.distanceKm || a.index - b.index)
    .slice(0, topN)
    .map(({ pantry, distanceKm: km }) => ({ pantry, distanceKm: km }));
}

export class PantrySearchService {
  constructor(private readonly pantries: readonly PantryRecord[]) {}

  get size(): number {
    return this.pantries.length;
  }

  findNearest(origin: Coordinate, query: SearchQuery): SearchResult[] {
    logger.info('Ranking pantries by distance', {
      candidates: this.pantries.length,
      topN: query.topN,
      radiusKm: query.radiusKm ?? null,
    });
    const results = searchPantries(origin, this.pantries, query.topN, query.radiusKm);
    if (!results.length) {
      logger.info('No pantry within search constraints', { radiusKm: query.radiusKm ?? null });
    }
    return results;
  }
}
