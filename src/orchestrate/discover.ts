/**
 * Discovery orchestration: run sources in fixed order, normalize, dedupe
 */

import { HttpClient, type HttpClientOptions } from '../http/client.js';
import { OverpassAdapter, elementCoordinates } from '../adapters/overpass.js';
import { NominatimAdapter } from '../adapters/nominatim.js';
import { PlacesAdapter } from '../adapters/places.js';
import { RegistryAdapter } from '../adapters/registry.js';
import { EndpointResolver } from '../registry/resolver.js';
import { normalizePayload, withAddress } from '../normalize/records.js';
import { DedupContext, admit } from '../fuse/dedupe.js';
import { logger } from '../util/logger.js';
import {
  ResolutionError,
  errorMessage,
  type CanonicalRecord,
  type QueryContext,
  type RawPayload,
  type SourceLabel,
} from '../types.js';

interface PayloadSource {
  fetch(ctx: QueryContext): Promise<RawPayload[]>;
}

interface ReverseGeocoder {
  reverse(lat: number, lon: number): Promise<string | undefined>;
}

export interface DiscoverySources {
  geoTag: PayloadSource;
  reverseGeocoder?: ReverseGeocoder;
  placeSearch?: PayloadSource;
  registry?: PayloadSource;
}

export interface SkippedSource {
  source: SourceLabel;
  reason: string;
}

export interface DiscoveryResult {
  records: CanonicalRecord[];
  skippedSources: SkippedSource[];
  counts: Record<SourceLabel, { fetched: number; kept: number }>;
}

/**
 * Wire the production adapters for a query context
 */
export function createSources(ctx: QueryContext, http: HttpClientOptions = {}): DiscoverySources {
  const client = new HttpClient(http);
  // Single-attempt client for endpoint checks and specification discovery
  const checkClient = new HttpClient({ ...http, timeoutMs: 20_000, retry: { maxRetries: 0 } });
  const userAgent = ctx.credentials.nominatimUserAgent;

  return {
    geoTag: new OverpassAdapter(client),
    reverseGeocoder: ctx.sources.reverseGeocode
      ? new NominatimAdapter(
          userAgent,
          undefined,
          new HttpClient({ ...http, userAgent, timeoutMs: 20_000, retry: { maxRetries: 0 } })
        )
      : undefined,
    placeSearch: ctx.sources.placeSearch ? new PlacesAdapter(client) : undefined,
    registry: ctx.sources.registry
      ? new RegistryAdapter(
          client,
          new EndpointResolver(checkClient, { overrideBaseUrl: ctx.credentials.registryBaseUrl })
        )
      : undefined,
  };
}

/**
 * Run one discovery pass. Sources run sequentially: geo-tag (with inline
 * reverse-geocode backfill), then place search, then registry. Only a total
 * geo-tag failure aborts the run.
 */
export async function discoverOpenings(
  ctx: QueryContext,
  sources: DiscoverySources,
  dedup: DedupContext = new DedupContext()
): Promise<DiscoveryResult> {
  const records: CanonicalRecord[] = [];
  const skippedSources: SkippedSource[] = [];
  const counts: DiscoveryResult['counts'] = {
    openstreetmap: { fetched: 0, kept: 0 },
    google_places: { fetched: 0, kept: 0 },
    registry: { fetched: 0, kept: 0 },
  };

  const keep = (record: CanonicalRecord): void => {
    if (admit(record, dedup)) {
      records.push(record);
      counts[record.source].kept++;
    }
  };

  const skip = (source: SourceLabel, reason: string): void => {
    logger.warn(`Skipping source ${source}`, { reason });
    skippedSources.push({ source, reason });
  };

  const collect = async (source: SourceLabel, adapter: PayloadSource): Promise<void> => {
    let payloads: RawPayload[];
    try {
      payloads = await adapter.fetch(ctx);
    } catch (error) {
      const reason = error instanceof ResolutionError
        ? `endpoint resolution failed: ${error.message}`
        : errorMessage(error);
      skip(source, reason);
      return;
    }

    counts[source].fetched = payloads.length;
    for (const payload of payloads) {
      const record = normalizePayload(payload, ctx);
      if (record) {
        keep(record);
      }
    }
  };

  const done = logger.timer('Discovery');

  // Geo-tag is mandatory; SourceUnavailableError propagates
  const geoPayloads = await sources.geoTag.fetch(ctx);
  counts.openstreetmap.fetched = geoPayloads.length;

  for (const payload of geoPayloads) {
    const record = normalizePayload(payload, ctx);
    if (!record) {
      continue;
    }
    keep(await backfillAddress(record, payload, ctx, sources.reverseGeocoder));
  }

  if (ctx.sources.placeSearch) {
    if (!sources.placeSearch) {
      skip('google_places', 'place search adapter not configured');
    } else {
      await collect('google_places', sources.placeSearch);
    }
  }

  if (ctx.sources.registry) {
    if (!sources.registry) {
      skip('registry', 'registry adapter not configured');
    } else {
      await collect('registry', sources.registry);
    }
  }

  done();
  logger.info('Discovery completed', {
    city: ctx.city,
    records: records.length,
    counts,
    dedupKeys: dedup.size,
    skipped: skippedSources.map(s => s.source),
  });

  return { records, skippedSources, counts };
}

async function backfillAddress(
  record: CanonicalRecord,
  payload: RawPayload,
  ctx: QueryContext,
  geocoder: ReverseGeocoder | undefined
): Promise<CanonicalRecord> {
  if (record.address || !ctx.sources.reverseGeocode || !geocoder || payload.source !== 'openstreetmap') {
    return record;
  }

  const coordinates = elementCoordinates(payload.element);
  if (!coordinates) {
    return record;
  }

  const address = await geocoder.reverse(coordinates.lat, coordinates.lon);
  return address ? withAddress(record, address) : record;
}
