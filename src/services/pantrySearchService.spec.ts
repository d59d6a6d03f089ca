import { Coordinate, PantryRecord } from '../types';
import { InvalidCoordinateError, InvalidQueryError } from '../utils/errors';
import { PantrySearchService, searchPantries, validateSearchQuery } from './pantrySearchService';

const pantry = (name: string, latitude: number, longitude: number): PantryRecord => ({
  name,
  address: `${name} address`,
  location: { latitude, longitude },
});

const akron = pantry('A', 41.0813, -81.519);
const columbus = pantry('B', 39.9149, -82.9932);
const dataset = [columbus, akron];
const timesSquare: Coordinate = { latitude: 40.758, longitude: -73.9855 };

describe('searchPantries', () => {
  it('returns the closest pantry first', () => {
    const results = searchPantries(timesSquare, dataset, 1);

    expect(results).toHaveLength(1);
    expect(results[0].pantry).toBe(akron);
    expect(results[0].distanceKm).toBeCloseTo(633.8, 1);
  });

  it('sorts by distance and never returns more than requested or available', () => {
    const everything = searchPantries(timesSquare, dataset, 10);

    expect(everything.map((result) => result.pantry.name)).toEqual(['A', 'B']);
    expect(everything[0].distanceKm).toBeLessThanOrEqual(everything[1].distanceKm);
    expect(searchPantries(timesSquare, dataset, 1)).toHaveLength(1);
  });

  it('returns an empty list when nothing is within the radius', () => {
    expect(searchPantries(timesSquare, dataset, 1, 1)).toEqual([]);
  });

  it('narrows the unrestricted result with a radius', () => {
    const unrestricted = searchPantries(timesSquare, dataset, dataset.length);
    const within = searchPantries(timesSquare, dataset, dataset.length, 700);

    expect(within.map((result) => result.pantry)).toEqual([akron]);
    expect(within.length).toBeLessThan(unrestricted.length);
    for (const result of within) {
      expect(unrestricted).toContainEqual(result);
    }
  });

  it('includes a pantry exactly at the radius boundary', () => {
    const here = pantry('Here', 10, 10);
    expect(searchPantries({ latitude: 10, longitude: 10 }, [here], 1, 0)).toEqual([{ pantry: here, distanceKm: 0 }]);
  });

  it('breaks distance ties by dataset order', () => {
    const first = pantry('First', 41, -81);
    const second = pantry('Second', 41, -81);
    const origin = { latitude: 40, longitude: -80 };

    expect(searchPantries(origin, [first, second], 2).map((result) => result.pantry.name)).toEqual(['First', 'Second']);
    expect(searchPantries(origin, [second, first], 2).map((result) => result.pantry.name)).toEqual(['Second', 'First']);
  });

  it.each([0, -1, 1.5, Number.NaN])('rejects topN = %p', (topN) => {
    expect(() => searchPantries(timesSquare, dataset, topN)).toThrow(InvalidQueryError);
  });

  it.each([-5, Number.NaN, Number.POSITIVE_INFINITY])('rejects radiusKm = %p', (radiusKm) => {
    expect(() => searchPantries(timesSquare, dataset, 1, radiusKm)).toThrow(InvalidQueryError);
  });

  it('rejects an invalid origin even for an empty dataset', () => {
    expect(() => searchPantries({ latitude: 100, longitude: 0 }, [], 1)).toThrow(InvalidCoordinateError);
  });
});

describe('validateSearchQuery', () => {
  it('describes the rejected value', () => {
    expect(() => validateSearchQuery({ topN: 0 })).toThrow('Result count must be a positive integer (got 0)');
    expect(() => validateSearchQuery({ topN: 1, radiusKm: -5 })).toThrow(
      'Search radius must be a non-negative number of kilometers (got -5)'
    );
  });

  it('accepts a query without a radius', () => {
    expect(() => validateSearchQuery({ topN: 3 })).not.toThrow();
  });
});

describe('PantrySearchService', () => {
  it('searches the dataset it was built with', () => {
    const service = new PantrySearchService(dataset);

    expect(service.size).toBe(2);
    expect(service.findNearest(timesSquare, { topN: 2, radiusKm: 700 }).map((result) => result.pantry.name)).toEqual([
      'A',
    ]);
    expect(service.findNearest(timesSquare, { topN: 1, radiusKm: 1 })).toEqual([]);
  });
});
