/**
 * Shared CLI argument parsing utilities
 */

import { parseArgs, type ParseArgsConfig } from 'util';

type OptionValue = string | boolean | undefined;

export interface CliConfig {
  options: NonNullable<ParseArgsConfig['options']>;
  help: string;
  required?: readonly string[];
}

export type CliValues = Record<string, OptionValue>;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse CLI arguments with shared configuration. Returns undefined when help
 * was requested (after printing it).
 */
export function parseCliArgs(
  config: CliConfig,
  args: string[] = process.argv.slice(2)
): CliValues | undefined {
  let values: CliValues;
  try {
    ({ values } = parseArgs({ args, options: config.options, strict: true }) as { values: CliValues });
  } catch (error) {
    throw new CliUsageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help) {
    console.log(config.help);
    return undefined;
  }

  for (const req of config.required ?? []) {
    if (!values[req]) {
      throw new CliUsageError(`--${req} is required`);
    }
  }

  return values;
}

export function stringOption(values: CliValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === 'string' ? value : undefined;
}

export function booleanOption(values: CliValues, key: string): boolean | undefined {
  const value = values[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * Common CLI argument configurations
 */
export const CLI_CONFIGS = {
  discover: {
    options: {
      city: { type: 'string', short: 'c' },
      months: { type: 'string', short: 'm' },
      out: { type: 'string', short: 'o' },
      format: { type: 'string', short: 'f' },
      'use-newer-proxy': { type: 'boolean' },
      'reverse-geocode': { type: 'boolean' },
      places: { type: 'boolean' },
      registry: { type: 'boolean' },
      'strict-restaurants': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
    required: ['city'],
    help: `
Usage: npm run discover -- --city <city> [options]

Options:
  -c, --city <city>         City name; loads configs/<city>.yaml (required)
  -m, --months <n>          Look-back period in months (default: from config)
  -o, --out <path>          Output file (default: data/<city>_openings.<format>)
  -f, --format <format>     Output format: csv, jsonl (default: csv)
      --use-newer-proxy     Include venues recently edited within the window (medium confidence)
      --reverse-geocode     Fill missing addresses via reverse geocoding (rate-limited)
      --places              Include place-search candidates (needs GOOGLE_PLACES_API_KEY)
      --registry            Include recent trade register entries
      --strict-restaurants  Restaurants only (no cafes or fast food) across all sources
  -h, --help                Show this help message

Examples:
  npm run discover -- --city helsinki
  npm run discover -- --city helsinki --months 3 --places --registry --format jsonl
    `,
  },
} as const satisfies Record<string, CliConfig>;
