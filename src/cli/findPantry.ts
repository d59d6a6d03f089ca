import { AppConfig } from '../config';
import { LocationRequest, PantryRecord, ResolvedLocation, SearchResult } from '../types';
import { errorMessage, isPantryFinderError } from '../utils/errors';
import { formatCoordinate, parseLiteralCoordinate } from '../utils/location';
import { createLogger } from '../utils/logger';
import { LocationResolver, planLocationRequest } from '../services/locationResolver';
import { PantrySearchService, validateSearchQuery } from '../services/pantrySearchService';
import { CliOptions, parseCliArgs, USAGE } from './args';
import { Output, Prompter } from './prompter';
import { selectFromMenu } from './selector';

const logger = createLogger('FindPantry');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

const ADDRESS_PROMPT = "Enter your address (or 'lat,lon'): ";
const COORDINATE_PROMPT = "Enter coordinates as 'lat,lon': ";

export interface FindPantryDependencies {
  config: AppConfig;
  resolver: Pick<LocationResolver, 'resolve'>;
  loadDataset: (filePath: string) => readonly PantryRecord[];
  prompter: Prompter;
  output: Output;
}

/**
 * Runs one lookup end to end and returns the process exit code. Finding no
 * pantry within the radius is a successful run.
 */
export async function runFindPantry(argv: readonly string[], deps: FindPantryDependencies): Promise<number> {
  const { output } = deps;
  try {
    const options = parseCliArgs(argv);
    if (options.help) {
      output.write(USAGE);
      return EXIT_OK;
    }

    const query = { topN: options.topN, radiusKm: options.radiusKm };
    validateSearchQuery(query);

    const searchService = new PantrySearchService(deps.loadDataset(options.dataFile ?? deps.config.dataFile));

    const resolved = await resolveOrigin(options, deps);
    if (!resolved) {
      return EXIT_FAILURE;
    }
    const origin = options.chooseLocation ? await chooseGeocodeMatch(resolved, deps) : resolved;
    output.write(`Using location: ${formatCoordinate(origin.coordinate)} (${describeSource(origin)})`);

    const results = searchService.findNearest(origin.coordinate, query);
    if (!results.length) {
      output.write('No pantries found within the given radius or dataset.');
      return EXIT_OK;
    }

    const chosen = await selectFromMenu(results, describeResult, deps.prompter, output);
    if (chosen === null) {
      output.write('No selection made.');
      return EXIT_OK;
    }

    if (options.topN > 1) {
      renderSummary(results, output);
    }
    renderSelection(results[chosen], output);
    return EXIT_OK;
  } catch (error) {
    if (isPantryFinderError(error)) {
      logger.debug('Lookup aborted', { code: error.code });
    } else {
      logger.error('Unexpected failure during lookup', { error: errorMessage(error) });
    }
    output.write(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
}

async function resolveOrigin(options: CliOptions, deps: FindPantryDependencies): Promise<ResolvedLocation | null> {
  const request = planLocationRequest(options) ?? (await promptForRequest(deps));
  return request ? resolveWithFallback(request, deps) : null;
}

async function promptForRequest(deps: FindPantryDependencies): Promise<LocationRequest | null> {
  const answer = await deps.prompter.ask(ADDRESS_PROMPT);
  const request = answer === null ? null : planLocationRequest({ address: answer });
  if (!request) {
    deps.output.write('No location provided.');
  }
  return request;
}

// Geocoding and autolocation failures are expected; the user gets one chance to type a location instead.
async function resolveWithFallback(
  request: LocationRequest,
  deps: FindPantryDependencies
): Promise<ResolvedLocation | null> {
  try {
    return await deps.resolver.resolve(request);
  } catch (error) {
    if (!isPantryFinderError(error) || !error.recoverable) {
      throw error;
    }
    deps.output.write(error.message);
  }

  if (request.kind === 'autolocate') {
    deps.output.write('Autolocate failed; please enter an address or coordinates.');
    const next = await promptForRequest(deps);
    return next ? resolveWithFallback(next, deps) : null;
  }

  const answer = await deps.prompter.ask(COORDINATE_PROMPT);
  const raw = answer?.trim() ?? '';
  const coordinate = raw ? parseLiteralCoordinate(raw) : null;
  if (!coordinate) {
    deps.output.write("Please enter coordinates directly as 'lat,lon', or check your network.");
    return null;
  }
  return deps.resolver.resolve({ kind: 'literal', coordinate, raw });
}

async function chooseGeocodeMatch(resolved: ResolvedLocation, deps: FindPantryDependencies): Promise<ResolvedLocation> {
  const { alternatives } = resolved;
  if (resolved.strategy !== 'address' || alternatives.length < 2) {
    return resolved;
  }

  const index = await selectFromMenu(
    alternatives,
    (match) => `${match.label} (${formatCoordinate(match.location)})`,
    deps.prompter,
    deps.output,
    'Several places match that address:'
  );
  if (index === null) {
    logger.info('No geocoder match chosen; keeping the first');
    return resolved;
  }

  const match = alternatives[index];
  return { ...resolved, coordinate: match.location, label: match.label };
}

function describeSource(location: ResolvedLocation): string {
  switch (location.strategy) {
    case 'literal':
      return 'coordinates';
    case 'address':
      return `geocoded: ${location.label ?? 'address'}`;
    case 'autolocate':
      return location.label ? `approximate, from IP: ${location.label}` : 'approximate, from IP';
  }
}

function describeResult({ pantry, distanceKm }: SearchResult): string {
  return `${pantry.name} — ${pantry.address} (${distanceKm.toFixed(2)} km)`;
}

function renderSummary(results: readonly SearchResult[], output: Output): void {
  output.write('Top results:');
  results.forEach((result, i) => {
    const { latitude, longitude } = result.pantry.location;
    output.write(`${i + 1}. ${describeResult(result)} @ ${latitude},${longitude}`);
  });
  output.write('');
}

function renderSelection({ pantry, distanceKm }: SearchResult, output: Output): void {
  output.write(`Selected pantry: ${pantry.name}`);
  output.write(`Address: ${pantry.address}`);
  output.write(`Distance: ${distanceKm.toFixed(2)} km`);
  output.write(`Location: ${pantry.location.latitude},${pantry.location.longitude}`);
}
