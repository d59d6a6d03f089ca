import path from 'path';
import { z } from 'zod';

import { LOG_LEVELS, LogLevel } from '../utils/logger';

const DEFAULT_USER_AGENT = 'PantryFinder/1.0 (contact: example@example.com)';

const envSchema = z.object({
  PANTRY_DATA_FILE: z.string().trim().min(1).optional(),
  GEOCODER_BASE_URL: z.string().url().default('https://nominatim.openstreetmap.org'),
  GEOCODER_USER_AGENT: z.string().trim().min(1).default(DEFAULT_USER_AGENT),
  GEOCODER_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  GEOCODER_RESULT_LIMIT: z.coerce.number().int().min(1).max(50).default(5),
  IP_LOCATOR_URL: z.string().url().default('https://ipinfo.io/json'),
  IP_LOCATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface AppConfig {
  dataFile: string;
  geocoder: {
    baseUrl: string;
    userAgent: string;
    timeoutMs: number;
    resultLimit: number;
  };
  ipLocator: {
    url: string;
    timeoutMs: number;
  };
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    dataFile: path.resolve(cwd, values.PANTRY_DATA_FILE ?? path.join('data', 'pantries.csv')),
    geocoder: {
      baseUrl: values.GEOCODER_BASE_URL.replace(/\/$/, ''),
      userAgent: values.GEOCODER_USER_AGENT,
      timeoutMs: values.GEOCODER_TIMEOUT_MS,
      resultLimit: values.GEOCODER_RESULT_LIMIT,
    },
    ipLocator: {
      url: values.IP_LOCATOR_URL,
      timeoutMs: values.IP_LOCATOR_TIMEOUT_MS,
    },
    logLevel: values.LOG_LEVEL,
  };
}
