export interface Coordinate {
  readonly latitude: number;
  readonly longitude: number;
}

export interface PantryRecord {
  readonly name: string;
  readonly address: string;
  readonly location: Coordinate;
}

export interface SearchResult {
  readonly pantry: PantryRecord;
  readonly distanceKm: number;
}

export interface SearchQuery {
  topN: number;
  radiusKm?: number;
}

export interface GeocodeCandidate {
  location: Coordinate;
  label: string;
}

export type LocationStrategy = 'literal' | 'address' | 'autolocate';

export type LocationRequest =
  | { kind: 'literal'; coordinate: Coordinate; raw: string }
  | { kind: 'address'; query: string }
  | { kind: 'autolocate' };

export interface ResolvedLocation {
  coordinate: Coordinate;
  strategy: LocationStrategy;
  approximate: boolean;
  label?: string;
  alternatives: GeocodeCandidate[];
}

export interface IpLocation {
  location: Coordinate;
  label?: string;
}
