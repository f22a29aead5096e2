/**
 * Configuration loader and query context builder
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { validateCityConfig, type CityConfig } from './schema.js';
import { ConfigError, errorMessage, type QueryContext } from '../types.js';
import { subtractMonths, todayISO } from '../util/dates.js';
import { logger } from '../util/logger.js';

const DEFAULT_USER_AGENT = 'openings-radar/1.0 (new venue discovery)';

/**
 * Cache for loaded configurations
 */
const configCache = new Map<string, CityConfig>();

function defaultConfigDir(): string {
  return resolve(process.cwd(), 'configs');
}

/**
 * Load and validate a city configuration from YAML file
 */
export function loadCityConfig(cityName: string, configDir: string = defaultConfigDir()): CityConfig {
  const fileName = `${cityName.toLowerCase()}.yaml`;
  const configPath = resolve(configDir, fileName);

  const cached = configCache.get(configPath);
  if (cached) {
    return cached;
  }

  let yamlContent: string;
  try {
    logger.debug(`Loading config from ${configPath}`);
    yamlContent = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`);
    }
    throw new ConfigError(`Failed to read configuration for '${cityName}': ${errorMessage(error)}`);
  }

  let rawConfig: unknown;
  try {
    rawConfig = parseYaml(yamlContent);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(error)}`);
  }

  const validation = validateCityConfig(substituteEnvVars(rawConfig));

  if (!validation.success || !validation.data) {
    throw new ConfigError(
      `Invalid configuration for city '${cityName}':\n${validation.errors.join('\n')}`
    );
  }

  for (const warning of validation.warnings) {
    logger.warn(`Configuration warning for '${cityName}'`, { warning });
  }

  const config = validation.data;
  configCache.set(configPath, config);

  logger.info(`Loaded configuration for city: ${config.city}`, {
    sources: config.sources,
    lookbackMonths: config.lookback_months,
  });

  return config;
}

export function clearConfigCache(): void {
  configCache.clear();
  logger.debug('Configuration cache cleared');
}

/**
 * Replace ${VAR_NAME} patterns with environment variables. A string that is
 * only an unresolved placeholder becomes undefined so optional fields stay unset.
 */
export function substituteEnvVars(
  value: unknown,
  env: NodeJS.ProcessEnv = process.env
): unknown {
  if (typeof value === 'string') {
    let unresolved = false;
    const substituted = value.replace(/\$\{([^}]+)\}/g, (match, varName: string) => {
      const replacement = env[varName];
      if (replacement === undefined || replacement === '') {
        logger.debug(`Environment variable not set: ${varName}`);
        unresolved = true;
        return match;
      }
      return replacement;
    });
    return unresolved && /^\$\{[^}]+\}$/.test(value) ? undefined : substituted;
  }

  if (Array.isArray(value)) {
    return value.map(item => substituteEnvVars(item, env));
  }

  if (value && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteEnvVars(entry, env);
    }
    return result;
  }

  return value;
}

export interface QueryContextOverrides {
  lookbackMonths?: number;
  useNewerProxy?: boolean;
  strictRestaurants?: boolean;
  reverseGeocode?: boolean;
  placeSearch?: boolean;
  registry?: boolean;
}

/**
 * Build the immutable per-run query context from config, environment and
 * command-line overrides
 */
export function buildQueryContext(
  config: CityConfig,
  env: NodeJS.ProcessEnv = process.env,
  today: string = todayISO(),
  overrides: QueryContextOverrides = {}
): QueryContext {
  const lookbackMonths = overrides.lookbackMonths ?? config.lookback_months;
  const strictRestaurants = overrides.strictRestaurants ?? config.strict_restaurants;
  const amenities = strictRestaurants ? ['restaurant'] : [...config.amenities];

  const placesApiKey = env.GOOGLE_PLACES_API_KEY?.trim() || undefined;
  const registryBaseUrl = env.REGISTRY_BASE_URL?.trim() || config.registry.base_url || undefined;

  const context: QueryContext = {
    city: config.city,
    today,
    cutoff: subtractMonths(today, lookbackMonths),
    amenities: Object.freeze(amenities),
    strictRestaurants,
    useNewerProxy: overrides.useNewerProxy ?? config.use_newer_proxy,
    registeredOffice: config.registry.registered_office ?? config.city,
    businessLineCodes: Object.freeze([...config.registry.business_line_codes]),
    pageSize: config.registry.page_size,
    maxResults: config.registry.max_results,
    sources: Object.freeze({
      reverseGeocode: overrides.reverseGeocode ?? config.sources.reverse_geocode,
      placeSearch: overrides.placeSearch ?? config.sources.place_search,
      registry: overrides.registry ?? config.sources.registry,
    }),
    cityCenter: config.center
      ? Object.freeze({
          lat: config.center.lat,
          lon: config.center.lon,
          radiusKm: config.center.radius_km,
        })
      : undefined,
    credentials: Object.freeze({
      placesApiKey,
      nominatimUserAgent: env.NOMINATIM_USER_AGENT?.trim() || DEFAULT_USER_AGENT,
      registryBaseUrl,
    }),
  };

  return Object.freeze(context);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export type { CityConfig } from './schema.js';
