/**
 * @file CliOptions.ts
 * @description Command-line flags, parsed by hand and validated with zod.
 *
 *   firesync [--data <path>] [--seed <int>] [--auto] [--fast] [--sim <count>] [--help]
 */

import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CATALOGUE } from '@shared/constants/GameConstants';
import { ValidationError } from '@shared/errors/GameErrors';

/** Catalogue shipped with the project, resolved from this file's location */
export const DEFAULT_DATA_FILE = fileURLToPath(new URL(`../../../${CATALOGUE.defaultDataFile}`, import.meta.url));

/** Seeds outside this range would be truncated by the 32-bit generator */
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

const CliOptionsSchema = z.object({
  /** Catalogue file to load */
  dataFile: z.string().min(1, '--data needs a file path'),
  /** Seed for every random draw of the run */
  seed: z.coerce
    .number({ invalid_type_error: '--seed must be a number' })
    .int('--seed must be a whole number')
    .min(INT32_MIN, `--seed must be between ${INT32_MIN} and ${INT32_MAX}`)
    .max(INT32_MAX, `--seed must be between ${INT32_MIN} and ${INT32_MAX}`),
  /** Play one game automatically and exit */
  auto: z.boolean(),
  /** Skip the reveal delay */
  fast: z.boolean(),
  /** Run the matchup simulator with this many draws per weapon, then exit */
  simulate: z.coerce
    .number({ invalid_type_error: '--sim must be a number' })
    .int('--sim must be a whole number')
    .positive('--sim must be at least 1')
    .optional(),
  /** Print usage and exit */
  help: z.boolean(),
});

export type CliOptions = z.infer<typeof CliOptionsSchema>;

/** Flags that take a value, mapped to the option they set */
const VALUE_FLAGS = new Map<string, 'dataFile' | 'seed' | 'simulate'>([
  ['--data', 'dataFile'],
  ['--seed', 'seed'],
  ['--sim', 'simulate'],
]);

/** Flags that switch a boolean on */
const SWITCH_FLAGS = new Map<string, 'auto' | 'fast' | 'help'>([
  ['--auto', 'auto'],
  ['--fast', 'fast'],
  ['--help', 'help'],
  ['-h', 'help'],
]);

export function usage(): string {
  return [
    'Usage: firesync [options]',
    '',
    'Options:',
    '  --data <path>   Weapon catalogue file (default: data/case.txt)',
    '  --seed <int>    Random seed, for reproducible games',
    '  --auto          Play one game automatically, without delays',
    '  --fast          Reveal round outcomes without the pause',
    '  --sim <count>   Simulate <count> opponent draws per weapon and print win rates',
    '  -h, --help      Show this help message',
  ].join('\n');
}

/**
 * Parse command-line arguments (without the node and script entries).
 * Both `--flag value` and `--flag=value` are accepted.
 *
 * @param argv - Arguments to parse
 * @param defaults - Values used when a flag is absent
 * @throws ValidationError on an unknown flag, a missing value or an invalid value
 */
export function parseCliOptions(
  argv: readonly string[],
  defaults: { seed: number; dataFile: string }
): CliOptions {
  const raw: Record<string, unknown> = {
    dataFile: defaults.dataFile,
    seed: defaults.seed,
    auto: false,
    fast: false,
    help: false,
  };

  for (let i = 0; i < argv.length; i++) {
    const [flag, inlineValue] = splitFlag(argv[i]);

    const switchKey = SWITCH_FLAGS.get(flag);
    if (switchKey !== undefined && inlineValue === undefined) {
      raw[switchKey] = true;
      continue;
    }

    const valueKey = VALUE_FLAGS.get(flag);
    if (valueKey === undefined) {
      throw new ValidationError(`Unknown option: ${argv[i]}`);
    }

    const value = inlineValue ?? argv[++i];
    if (value === undefined || value === '') {
      throw new ValidationError(`${flag} needs a value`);
    }
    raw[valueKey] = value;
  }

  const result = CliOptionsSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0].message, { cause: result.error });
  }
  return result.data;
}

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}
