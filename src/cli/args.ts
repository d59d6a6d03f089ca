import { z } from 'zod';

import { InvalidQueryError } from '../utils/errors';
import { parseDecimal } from '../utils/location';

export interface CliOptions {
  address?: string;
  topN: number;
  radiusKm?: number;
  autolocate: boolean;
  chooseLocation: boolean;
  dataFile?: string;
  help: boolean;
}

type ValueFlag = 'address' | 'top' | 'radius' | 'data';
type SwitchFlag = 'autolocate' | 'chooseLocation' | 'help';

const VALUE_FLAGS = new Map<string, ValueFlag>([
  ['--address', 'address'],
  ['-a', 'address'],
  ['--top', 'top'],
  ['-n', 'top'],
  ['--radius', 'radius'],
  ['-r', 'radius'],
  ['--data', 'data'],
]);

const SWITCH_FLAGS = new Map<string, SwitchFlag>([
  ['--autolocate', 'autolocate'],
  ['--choose-location', 'chooseLocation'],
  ['--help', 'help'],
  ['-h', 'help'],
]);

const numberArg = (flag: string) =>
  z
    .string()
    .trim()
    .min(1, `${flag} needs a value`)
    .refine((value) => parseDecimal(value) !== null, `${flag} must be a number`)
    .transform(Number);

const rawArgsSchema = z.object({
  address: z.string().optional(),
  top: numberArg('--top').optional(),
  radius: numberArg('--radius').optional(),
  data: z.string().trim().min(1, '--data needs a path').optional(),
  autolocate: z.boolean().default(false),
  chooseLocation: z.boolean().default(false),
  help: z.boolean().default(false),
});

export const USAGE = [
  'Usage: find-pantry [options]',
  '',
  'Find the nearest food pantry to an address, a "lat,lon" pair or your approximate location.',
  '',
  'Options:',
  '  -a, --address <text>   Address, postal code or "lat,lon" to search from',
  '  -n, --top <N>          Number of nearest pantries to list (default 1)',
  '  -r, --radius <km>      Maximum search radius in kilometers',
  '      --autolocate       Approximate your location from your IP address',
  '      --choose-location  Pick among several geocoder matches for the address',
  '      --data <csv>       Pantry dataset (default data/pantries.csv)',
  '  -h, --help             Show this help',
].join('\n');

export function parseCliArgs(argv: readonly string[]): CliOptions {
  const raw: Partial<Record<ValueFlag, string>> & Partial<Record<SwitchFlag, boolean>> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);

    const switchFlag = SWITCH_FLAGS.get(flag);
    if (switchFlag && eq === -1) {
      raw[switchFlag] = true;
      continue;
    }

    const valueFlag = VALUE_FLAGS.get(flag);
    if (!valueFlag) {
      throw new InvalidQueryError(`Unknown option: ${arg}`);
    }
    if (eq !== -1) {
      raw[valueFlag] = arg.slice(eq + 1);
      continue;
    }
    const value = argv[i + 1];
    if (value === undefined) {
      throw new InvalidQueryError(`${flag} needs a value`);
    }
    raw[valueFlag] = value;
    i++;
  }

  const parsed = rawArgsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidQueryError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }

  const { address, top, radius, data, autolocate, chooseLocation, help } = parsed.data;
  return {
    address,
    topN: top ?? 1,
    radiusKm: radius,
    autolocate,
    chooseLocation,
    dataFile: data,
    help,
  };
}
