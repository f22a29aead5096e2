#!/usr/bin/env node

/**
 * New-openings discovery runner
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { buildQueryContext, loadCityConfig } from '../config/index.js';
import { createSources, discoverOpenings } from './discover.js';
import { writeOutput, type OutputFormat } from '../export/rows.js';
import { logger } from '../util/logger.js';
import {
  CLI_CONFIGS,
  CliUsageError,
  booleanOption,
  parseCliArgs,
  stringOption,
  type CliValues,
} from '../util/cli.js';
import { ConfigError, SourceUnavailableError, errorMessage } from '../types.js';

// Load environment variables
config();

export interface DiscoverArgs {
  city: string;
  months?: number;
  out: string;
  format: OutputFormat;
  useNewerProxy?: boolean;
  reverseGeocode?: boolean;
  places?: boolean;
  registry?: boolean;
  strictRestaurants?: boolean;
}

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'csv') {
    return 'csv';
  }
  if (value === 'jsonl') {
    return 'jsonl';
  }
  throw new CliUsageError(`--format must be csv or jsonl, got '${value}'`);
}

function parseMonths(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const months = parseInt(value, 10);
  if (!Number.isInteger(months) || months <= 0) {
    throw new CliUsageError(`--months must be a positive integer, got '${value}'`);
  }
  return months;
}

export function toDiscoverArgs(values: CliValues): DiscoverArgs {
  const city = stringOption(values, 'city');
  if (!city) {
    throw new CliUsageError('--city is required');
  }
  const format = parseFormat(stringOption(values, 'format'));

  return {
    city,
    months: parseMonths(stringOption(values, 'months')),
    out: stringOption(values, 'out') ?? `data/${city.toLowerCase()}_openings.${format}`,
    format,
    useNewerProxy: booleanOption(values, 'use-newer-proxy'),
    reverseGeocode: booleanOption(values, 'reverse-geocode'),
    places: booleanOption(values, 'places'),
    registry: booleanOption(values, 'registry'),
    strictRestaurants: booleanOption(values, 'strict-restaurants'),
  };
}

/**
 * Main discovery function
 */
async function main(): Promise<number> {
  let args: DiscoverArgs;
  try {
    const values = parseCliArgs(CLI_CONFIGS.discover);
    if (!values) {
      return 0;
    }
    args = toDiscoverArgs(values);
  } catch (error) {
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  }

  try {
    logger.info('Starting new-openings discovery', { ...args });

    const cityConfig = loadCityConfig(args.city);
    const ctx = buildQueryContext(cityConfig, process.env, undefined, {
      lookbackMonths: args.months,
      useNewerProxy: args.useNewerProxy,
      strictRestaurants: args.strictRestaurants,
      reverseGeocode: args.reverseGeocode,
      placeSearch: args.places,
      registry: args.registry,
    });

    const result = await discoverOpenings(ctx, createSources(ctx));

    const outPath = resolve(process.cwd(), args.out);
    await writeOutput(outPath, result.records, args.format);

    logger.info(`Wrote ${result.records.length} rows to ${outPath}`, {
      skippedSources: result.skippedSources,
    });
    return 0;
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Configuration error', { error: error.message });
    } else if (error instanceof SourceUnavailableError) {
      logger.error('Primary source unavailable, aborting run', {
        error: error.message,
        lastError: error.lastError?.message,
      });
    } else {
      logger.error('Discovery failed', {
        error: error instanceof Error ? { message: error.message, stack: error.stack, name: error.name } : error,
      });
    }
    return 1;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  // Handle unhandled promise rejections
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason: errorMessage(reason) });
    process.exit(1);
  });

  main().then(code => process.exit(code), (error: unknown) => {
    logger.error('Main process error', { error: errorMessage(error) });
    process.exit(1);
  });
}
