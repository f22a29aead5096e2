import type { CanonicalRecord, QueryContext } from '../../src/types.js';

export function makeContext(overrides: Partial<QueryContext> = {}): QueryContext {
  return {
    city: 'Helsinki',
    today: '2025-08-31',
    cutoff: '2025-02-28',
    amenities: ['restaurant', 'cafe', 'fast_food'],
    strictRestaurants: false,
    useNewerProxy: false,
    registeredOffice: 'Helsinki',
    businessLineCodes: ['56101'],
    pageSize: 100,
    maxResults: 1000,
    sources: { reverseGeocode: false, placeSearch: false, registry: false },
    cityCenter: { lat: 60.1699, lon: 24.9384, radiusKm: 30 },
    credentials: { nominatimUserAgent: 'test-agent/1.0' },
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<CanonicalRecord> = {}): CanonicalRecord {
  return {
    name: 'Cafe X',
    address: 'Main St 1, Helsinki',
    description: '',
    tags: new Set(['cafe']),
    openingDate: '2025-06-01',
    source: 'openstreetmap',
    confidence: 'high',
    ...overrides,
  };
}
