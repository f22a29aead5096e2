import { describe, it, expect, vi } from 'vitest';
import { createSources, discoverOpenings, type DiscoverySources } from '../../src/orchestrate/discover.js';
import { OverpassAdapter } from '../../src/adapters/overpass.js';
import { NominatimAdapter } from '../../src/adapters/nominatim.js';
import { PlacesAdapter } from '../../src/adapters/places.js';
import { RegistryAdapter } from '../../src/adapters/registry.js';
import { DedupContext } from '../../src/fuse/dedupe.js';
import {
  ResolutionError,
  SourceUnavailableError,
  type OverpassElement,
  type QueryContext,
  type RawPayload,
} from '../../src/types.js';
import { makeContext } from '../helpers/fixtures.js';

function osm(element: OverpassElement): RawPayload {
  return { source: 'openstreetmap', element };
}

function source(payloads: RawPayload[]) {
  return { fetch: vi.fn(async (_ctx: QueryContext) => payloads) };
}

function failingSource(error: Error) {
  return { fetch: vi.fn(async (_ctx: QueryContext): Promise<RawPayload[]> => { throw error; }) };
}

const CAFE_X = osm({
  type: 'node',
  id: 1,
  lat: 60.17,
  lon: 24.94,
  tags: { amenity: 'cafe', name: 'Cafe X', opening_date: '2025-06-01' },
});

const NOODLE_HOUSE = osm({
  type: 'way',
  id: 2,
  center: { lat: 60.16, lon: 24.93 },
  tags: {
    amenity: 'restaurant',
    name: 'Noodle House',
    start_date: '2025-05',
    'addr:street': 'Kalevankatu',
    'addr:housenumber': '3',
  },
});

const FOO_OY: RawPayload = {
  source: 'registry',
  company: { businessId: '1234567-8', name: 'Foo Oy', registrationDate: '2025-03-10' },
};

const allSourcesOn = { reverseGeocode: false, placeSearch: true, registry: true };

describe('discoverOpenings', () => {
  it('should normalize geo-tag records and keep the dated ones', async () => {
    const sources: DiscoverySources = {
      geoTag: source([CAFE_X, osm({ tags: { amenity: 'cafe', name: 'Old Cafe', opening_date: '2019-01-01' } })]),
    };

    const result = await discoverOpenings(makeContext(), sources);

    expect(result.records.map(r => r.name)).toEqual(['Cafe X']);
    expect(result.records[0]?.address).toBe('');
    expect(result.records[0]?.confidence).toBe('high');
    expect(result.counts.openstreetmap).toEqual({ fetched: 2, kept: 1 });
    expect(result.skippedSources).toEqual([]);
  });

  it('should backfill missing addresses from coordinates when enabled', async () => {
    const reverse = vi.fn(async (_lat: number, _lon: number): Promise<string | undefined> => 'Mannerheimintie 1, Helsinki');
    const sources: DiscoverySources = {
      geoTag: source([CAFE_X, NOODLE_HOUSE]),
      reverseGeocoder: { reverse },
    };
    const ctx = makeContext({ sources: { reverseGeocode: true, placeSearch: false, registry: false } });

    const result = await discoverOpenings(ctx, sources);

    expect(result.records.map(r => r.address)).toEqual(['Mannerheimintie 1, Helsinki', 'Kalevankatu 3']);
    expect(reverse).toHaveBeenCalledTimes(1);
    expect(reverse).toHaveBeenCalledWith(60.17, 24.94);
  });

  it('should not reverse geocode when the toggle is off', async () => {
    const reverse = vi.fn(async (): Promise<string | undefined> => 'Somewhere');
    const sources: DiscoverySources = { geoTag: source([CAFE_X]), reverseGeocoder: { reverse } };

    const result = await discoverOpenings(makeContext(), sources);

    expect(result.records[0]?.address).toBe('');
    expect(reverse).not.toHaveBeenCalled();
  });

  it('should run sources in order and drop later duplicates', async () => {
    const sources: DiscoverySources = {
      geoTag: source([NOODLE_HOUSE]),
      placeSearch: source([
        { source: 'google_places', place: { displayName: { text: 'NOODLE  HOUSE' }, formattedAddress: 'kalevankatu 3' } },
        { source: 'google_places', place: { displayName: { text: 'Pho 99' }, formattedAddress: 'Fredrikinkatu 9, Helsinki' } },
      ]),
      registry: source([FOO_OY]),
    };

    const result = await discoverOpenings(makeContext({ sources: allSourcesOn }), sources);

    expect(result.records.map(r => [r.name, r.source])).toEqual([
      ['Noodle House', 'openstreetmap'],
      ['Pho 99', 'google_places'],
      ['Foo Oy', 'registry'],
    ]);
    expect(result.counts.google_places).toEqual({ fetched: 2, kept: 1 });
    expect(result.counts.registry).toEqual({ fetched: 1, kept: 1 });
  });

  it('should skip a failing optional source and continue', async () => {
    const registry = source([FOO_OY]);
    const sources: DiscoverySources = {
      geoTag: source([CAFE_X]),
      placeSearch: failingSource(new Error('quota exceeded')),
      registry,
    };

    const result = await discoverOpenings(makeContext({ sources: allSourcesOn }), sources);

    expect(result.skippedSources).toEqual([{ source: 'google_places', reason: 'quota exceeded' }]);
    expect(result.records.map(r => r.name)).toEqual(['Cafe X', 'Foo Oy']);
    expect(registry.fetch).toHaveBeenCalledTimes(1);
  });

  it('should report registry resolution failures as a skipped source', async () => {
    const sources: DiscoverySources = {
      geoTag: source([CAFE_X]),
      registry: failingSource(new ResolutionError('no endpoint', ['https://reg.test/v1'])),
    };
    const ctx = makeContext({ sources: { reverseGeocode: false, placeSearch: false, registry: true } });

    const result = await discoverOpenings(ctx, sources);

    expect(result.skippedSources).toEqual([{ source: 'registry', reason: 'endpoint resolution failed: no endpoint' }]);
    expect(result.records).toHaveLength(1);
  });

  it('should skip an enabled source that has no adapter', async () => {
    const result = await discoverOpenings(makeContext({ sources: allSourcesOn }), { geoTag: source([]) });

    expect(result.skippedSources).toEqual([
      { source: 'google_places', reason: 'place search adapter not configured' },
      { source: 'registry', reason: 'registry adapter not configured' },
    ]);
  });

  it('should not call disabled sources', async () => {
    const placeSearch = source([]);
    const registry = source([]);

    await discoverOpenings(makeContext(), { geoTag: source([]), placeSearch, registry });

    expect(placeSearch.fetch).not.toHaveBeenCalled();
    expect(registry.fetch).not.toHaveBeenCalled();
  });

  it('should abort when the geo-tag source is unavailable', async () => {
    const placeSearch = source([]);
    const sources: DiscoverySources = {
      geoTag: failingSource(new SourceUnavailableError('All Overpass mirrors failed', 'openstreetmap')),
      placeSearch,
    };

    await expect(discoverOpenings(makeContext({ sources: allSourcesOn }), sources))
      .rejects.toBeInstanceOf(SourceUnavailableError);
    expect(placeSearch.fetch).not.toHaveBeenCalled();
  });

  it('should honour a pre-seeded dedup context', async () => {
    const dedup = new DedupContext(['cafe x|']);

    const result = await discoverOpenings(makeContext(), { geoTag: source([CAFE_X]) }, dedup);

    expect(result.records).toEqual([]);
    expect(result.counts.openstreetmap).toEqual({ fetched: 1, kept: 0 });
  });
});

describe('createSources', () => {
  it('should wire only the geo-tag adapter by default', () => {
    const sources = createSources(makeContext());

    expect(sources.geoTag).toBeInstanceOf(OverpassAdapter);
    expect(sources.reverseGeocoder).toBeUndefined();
    expect(sources.placeSearch).toBeUndefined();
    expect(sources.registry).toBeUndefined();
  });

  it('should wire every enabled adapter', () => {
    const sources = createSources(makeContext({
      sources: { reverseGeocode: true, placeSearch: true, registry: true },
    }));

    expect(sources.reverseGeocoder).toBeInstanceOf(NominatimAdapter);
    expect(sources.placeSearch).toBeInstanceOf(PlacesAdapter);
    expect(sources.registry).toBeInstanceOf(RegistryAdapter);
  });
});
