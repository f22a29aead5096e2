/**
 * Geo-tag source adapter backed by the Overpass API
 */

import { z } from 'zod';
import { HttpClient } from '../http/client.js';
import { firstSuccess, AttemptsExhaustedError } from '../util/strategy.js';
import { logger } from '../util/logger.js';
import { SourceUnavailableError, type OverpassElement, type QueryContext, type RawPayload } from '../types.js';

export const OVERPASS_MIRRORS = [
  'https://overpass-api.de/api/interpreter',
  'https://overpass.kumi.systems/api/interpreter',
  'https://overpass.nchc.org.tw/api/interpreter',
] as const;

// Server-side query timeout plus headroom for transfer
const OVERPASS_TIMEOUT_MS = 190_000;

const OverpassElementSchema = z.object({
  type: z.string().optional(),
  id: z.number().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
  center: z.object({ lat: z.number(), lon: z.number() }).optional(),
  tags: z.record(z.string(), z.string()).optional(),
});

const OverpassResponseSchema = z.object({
  elements: z.array(OverpassElementSchema).default([]),
});

function escapeRegex(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Alternation of escaped amenity values; falls back to "restaurant"
 */
export function amenityRegex(amenities: readonly string[]): string {
  const safe = amenities.map(a => a.trim()).filter(a => a.length > 0).map(escapeRegex);
  return safe.length > 0 ? safe.join('|') : 'restaurant';
}

/**
 * Build the Overpass QL query for dated (and optionally recently edited)
 * venues inside the city's administrative boundary
 */
export function buildOverpassQuery(
  ctx: Pick<QueryContext, 'city' | 'cutoff' | 'useNewerProxy' | 'amenities'>
): string {
  const amenityRe = amenityRegex(ctx.amenities);
  const selector = `nwr["amenity"~"^(${amenityRe})$"]`;
  const parts = [
    `${selector}["opening_date"](area.searchArea);`,
    `${selector}["start_date"](area.searchArea);`,
  ];
  if (ctx.useNewerProxy) {
    parts.push(`${selector}(newer:"${ctx.cutoff}T00:00:00Z")(area.searchArea);`);
  }

  const city = ctx.city.replace(/"/g, '\\"');

  return [
    '[out:json][timeout:180];',
    `area["name"="${city}"]["boundary"="administrative"]["admin_level"="8"]->.searchArea;`,
    '(',
    ...parts.map(part => `  ${part}`),
    ');',
    'out center tags;',
  ].join('\n');
}

/**
 * Keep tagged elements whose amenity matches the configured filter
 */
export function extractElements(
  elements: readonly z.infer<typeof OverpassElementSchema>[],
  amenities: readonly string[]
): OverpassElement[] {
  const pattern = new RegExp(`^(${amenityRegex(amenities)})$`, 'i');
  const result: OverpassElement[] = [];

  for (const element of elements) {
    const tags = element.tags;
    if (!tags || Object.keys(tags).length === 0) {
      continue;
    }
    if (!pattern.test(tags.amenity ?? '')) {
      continue;
    }
    result.push({ ...element, tags });
  }

  return result;
}

/**
 * Coordinates of a node, or the center of a way/relation
 */
export function elementCoordinates(element: OverpassElement): { lat: number; lon: number } | undefined {
  const lat = element.lat ?? element.center?.lat;
  const lon = element.lon ?? element.center?.lon;
  if (lat === undefined || lon === undefined) {
    return undefined;
  }
  return { lat, lon };
}

export class OverpassAdapter {
  constructor(
    private http: HttpClient,
    private mirrors: readonly string[] = OVERPASS_MIRRORS
  ) {}

  /**
   * Query mirrors in order and return the first successful response. Throws
   * SourceUnavailableError when every mirror fails.
   */
  async fetch(ctx: QueryContext): Promise<RawPayload[]> {
    const query = buildOverpassQuery(ctx);

    logger.info('Querying geo-tag source', {
      city: ctx.city,
      cutoff: ctx.cutoff,
      amenities: ctx.amenities,
      useNewerProxy: ctx.useNewerProxy,
    });

    try {
      const { value, label } = await firstSuccess(
        this.mirrors.map(url => ({
          label: url,
          run: async () => {
            const body = await this.http.requestJson(url, {
              method: 'POST',
              form: { data: query },
              timeoutMs: OVERPASS_TIMEOUT_MS,
            });
            return OverpassResponseSchema.parse(body);
          },
        })),
        'Overpass mirrors'
      );

      const elements = extractElements(value.elements, ctx.amenities);
      logger.info('Geo-tag query completed', {
        mirror: label,
        returned: value.elements.length,
        matched: elements.length,
      });

      return elements.map((element): RawPayload => ({ source: 'openstreetmap', element }));
    } catch (error) {
      if (error instanceof AttemptsExhaustedError) {
        throw new SourceUnavailableError(error.message, 'openstreetmap', error.lastError);
      }
      throw error;
    }
  }
}
