/**
 * Place-search adapter backed by Google Places (New) Text Search
 */

import { z } from 'zod';
import { HttpClient } from '../http/client.js';
import { isWithinRadius } from '../util/address.js';
import { logger } from '../util/logger.js';
import { errorMessage, type CityCenter, type PlaceResult, type QueryContext, type RawPayload } from '../types.js';

export const PLACES_TEXT_SEARCH_URL = 'https://places.googleapis.com/v1/places:searchText';

const PLACES_TIMEOUT_MS = 60_000;

const PAGE_SIZE = 20;

const FIELD_MASK = [
  'places.displayName',
  'places.formattedAddress',
  'places.primaryType',
  'places.types',
  'places.businessStatus',
  'places.location',
].join(',');

const QUERY_TEMPLATES = [
  'restaurant in {city}',
  'cafe in {city}',
  'street food in {city}',
  'new restaurant in {city}',
  'bistro in {city}',
  'food stall in {city}',
  'food court in {city}',
] as const;

const PlaceSchema = z.object({
  displayName: z.object({ text: z.string().optional(), languageCode: z.string().optional() }).optional(),
  formattedAddress: z.string().optional(),
  primaryType: z.string().optional(),
  types: z.array(z.string()).optional(),
  businessStatus: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
});

const TextSearchResponseSchema = z.object({
  places: z.array(z.unknown()).default([]),
});

export interface PlaceTypeFilter {
  allowed: ReadonlySet<string>;
  excluded: ReadonlySet<string>;
}

export function placeTypeFilter(strictRestaurants: boolean): PlaceTypeFilter {
  const allowed = new Set(['restaurant', 'cafe', 'fast_food']);
  const excluded = new Set(['bar', 'pub', 'night_club', 'casino', 'lodging', 'gas_station']);
  if (strictRestaurants) {
    allowed.delete('cafe');
    allowed.delete('fast_food');
    excluded.add('cafe');
    excluded.add('fast_food');
  }
  return { allowed, excluded };
}

export function buildQueries(city: string): string[] {
  return QUERY_TEMPLATES.map(template => template.replace('{city}', city));
}

/**
 * Exclusion wins over the allow-list
 */
export function matchesTypeFilter(place: PlaceResult, filter: PlaceTypeFilter): boolean {
  const types = new Set(place.types ?? []);
  if (place.primaryType) {
    types.add(place.primaryType);
  }

  for (const type of types) {
    if (filter.excluded.has(type)) {
      return false;
    }
  }
  for (const type of types) {
    if (filter.allowed.has(type)) {
      return true;
    }
  }
  return false;
}

/**
 * Accept when the formatted address names the city, or the location falls
 * within the configured radius of the city center
 */
export function isInCity(place: PlaceResult, city: string, center?: CityCenter): boolean {
  const address = place.formattedAddress;
  if (address && address.toLowerCase().includes(city.toLowerCase())) {
    return true;
  }

  const location = place.location;
  if (center && location) {
    return isWithinRadius(location.latitude, location.longitude, center);
  }

  return false;
}

/**
 * Keep well-formed places from a text search response, dropping malformed
 * candidates
 */
export function parsePlaces(body: unknown): PlaceResult[] {
  const { places } = TextSearchResponseSchema.parse(body);
  const results: PlaceResult[] = [];
  for (const entry of places) {
    const place = PlaceSchema.safeParse(entry);
    if (place.success) {
      results.push(place.data);
    } else {
      logger.debug('Skipping malformed place result', { place: entry });
    }
  }
  return results;
}

export class PlacesAdapter {
  constructor(
    private http: HttpClient,
    private endpoint: string = PLACES_TEXT_SEARCH_URL
  ) {}

  /**
   * Run the canned queries and return the candidates that pass the type and
   * location filters. A failing query is logged and skipped.
   */
  async fetch(ctx: QueryContext): Promise<RawPayload[]> {
    const apiKey = ctx.credentials.placesApiKey;
    if (!apiKey) {
      logger.warn('GOOGLE_PLACES_API_KEY not set; skipping place search');
      return [];
    }

    const filter = placeTypeFilter(ctx.strictRestaurants);
    const payloads: RawPayload[] = [];

    for (const query of buildQueries(ctx.city)) {
      let places: PlaceResult[];
      try {
        places = await this.search(query, apiKey, ctx.cityCenter);
      } catch (error) {
        logger.warn('Place search query failed', { query, error: errorMessage(error) });
        continue;
      }

      let accepted = 0;
      for (const place of places) {
        if (!matchesTypeFilter(place, filter)) {
          continue;
        }
        if (!isInCity(place, ctx.city, ctx.cityCenter)) {
          continue;
        }
        payloads.push({ source: 'google_places', place });
        accepted++;
      }

      logger.debug('Place search query completed', { query, returned: places.length, accepted });
    }

    logger.info('Place search completed', { city: ctx.city, candidates: payloads.length });
    return payloads;
  }

  private async search(query: string, apiKey: string, center?: CityCenter): Promise<PlaceResult[]> {
    const body: Record<string, unknown> = {
      textQuery: query,
      languageCode: 'en',
      pageSize: PAGE_SIZE,
    };
    if (center) {
      body.locationBias = {
        circle: {
          center: { latitude: center.lat, longitude: center.lon },
          radius: center.radiusKm * 1000,
        },
      };
    }

    const response = await this.http.requestJson(this.endpoint, {
      method: 'POST',
      json: body,
      headers: {
        'X-Goog-Api-Key': apiKey,
        'X-Goog-FieldMask': FIELD_MASK,
      },
      timeoutMs: PLACES_TIMEOUT_MS,
    });

    return parsePlaces(response);
  }
}
