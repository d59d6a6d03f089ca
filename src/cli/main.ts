import { AppConfig, loadConfig } from '../config';
import { loadPantriesFromCsv } from '../data/csvPantryLoader';
import { IpInfoLocator } from '../services/ipInfoLocator';
import { LocationResolver } from '../services/locationResolver';
import { NominatimGeocoder } from '../services/nominatimGeocoder';
import { errorMessage } from '../utils/errors';
import { createLogger, setLogLevel } from '../utils/logger';
import { EXIT_FAILURE, runFindPantry } from './findPantry';
import { Output, ReadlinePrompter, stdoutOutput } from './prompter';

const logger = createLogger('Main');

/** Wires configuration, services and the terminal, then runs one lookup. */
export async function main(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  output: Output = stdoutOutput
): Promise<number> {
  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    logger.error('Failed to load configuration', { error: errorMessage(error) });
    output.write(`Error: ${errorMessage(error)}`);
    return EXIT_FAILURE;
  }
  setLogLevel(config.logLevel);

  const resolver = new LocationResolver(new NominatimGeocoder(config.geocoder), new IpInfoLocator(config.ipLocator));
  const prompter = new ReadlinePrompter();
  try {
    return await runFindPantry(argv, {
      config,
      resolver,
      loadDataset: loadPantriesFromCsv,
      prompter,
      output,
    });
  } finally {
    prompter.close();
  }
}
