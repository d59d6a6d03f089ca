import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';

import { PantryRecord } from '../types';
import { DatasetLoadError, errorMessage } from '../utils/errors';
import { isValidCoordinate, parseDecimal } from '../utils/location';
import { createLogger } from '../utils/logger';

const logger = createLogger('CsvPantryLoader');

const rawRowSchema = z.object({
  record: z.record(z.string(), z.string()),
  info: z.object({ lines: z.number() }),
});

const decimalField = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .refine((value) => parseDecimal(value) !== null, `${label} must be a decimal number`)
    .transform(Number);

const pantryRowSchema = z.object({
  name: z.string({ required_error: 'name is required' }).trim().min(1, 'name is required'),
  address: z.string({ required_error: 'address is required' }),
  latitude: decimalField('lat'),
  longitude: decimalField('lon'),
});

export function loadPantriesFromCsv(filePath: string): readonly PantryRecord[] {
  const absolutePath = path.resolve(filePath);
  let csv: string;
  try {
    csv = fs.readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    logger.error('Failed to read pantry dataset', { path: absolutePath, error: errorMessage(error) });
    throw new DatasetLoadError(`Pantry data file not found or unreadable: ${absolutePath}`, { cause: error });
  }

  const pantries = parsePantryCsv(csv, absolutePath);
  logger.info('Loaded pantry dataset from CSV', { path: absolutePath, count: pantries.length });
  return pantries;
}

export function parsePantryCsv(csv: string, source = '<inline>'): readonly PantryRecord[] {
  let rows: unknown;
  try {
    rows = parse(csv, {
      bom: true,
      columns: true,
      skip_empty_lines: true,
      trim: true,
      info: true,
    });
  } catch (error) {
    throw new DatasetLoadError(`Malformed CSV in ${source}: ${errorMessage(error)}`, { cause: error });
  }

  const parsedRows = z.array(rawRowSchema).safeParse(rows);
  if (!parsedRows.success) {
    throw new DatasetLoadError(`Malformed CSV in ${source}: unexpected row shape`);
  }

  const pantries = parsedRows.data.map(({ record, info }) => toPantryRecord(record, info.lines, source));
  if (!pantries.length) {
    logger.warn('Pantry dataset is empty', { source });
  }
  return Object.freeze(pantries);
}

function toPantryRecord(row: Record<string, string>, line: number, source: string): PantryRecord {
  const result = pantryRowSchema.safeParse({
    name: row.name,
    address: row.address,
    latitude: row.lat ?? row.latitude,
    longitude: row.lon ?? row.longitude,
  });

  if (!result.success) {
    const reason = result.error.issues.map((issue) => issue.message).join(', ');
    throw new DatasetLoadError(`Invalid pantry row at ${source}:${line}: ${reason}`);
  }

  const { name, address, latitude, longitude } = result.data;
  const location = { latitude, longitude };
  if (!isValidCoordinate(location)) {
    throw new DatasetLoadError(
      `Invalid pantry row at ${source}:${line}: coordinate (${latitude}, ${longitude}) is out of range`
    );
  }

  return Object.freeze({ name, address, location: Object.freeze(location) });
}
