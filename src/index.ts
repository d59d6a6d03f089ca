#!/usr/bin/env node
import dotenv from 'dotenv';

import { EXIT_FAILURE } from './cli/findPantry';
import { main } from './cli/main';
import { stdoutOutput } from './cli/prompter';
import { errorMessage } from './utils/errors';
import { createLogger } from './utils/logger';

dotenv.config();

const logger = createLogger('Main');

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Failed to run pantry lookup', { error: errorMessage(error) });
    stdoutOutput.write(`Error: ${errorMessage(error)}`);
    process.exitCode = EXIT_FAILURE;
  });
