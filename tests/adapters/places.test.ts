import { describe, it, expect } from 'vitest';
import {
  PlacesAdapter,
  buildQueries,
  isInCity,
  matchesTypeFilter,
  parsePlaces,
  placeTypeFilter,
} from '../../src/adapters/places.js';
import { jsonResponse, mockHttp, textResponse } from '../helpers/http.js';
import { makeContext } from '../helpers/fixtures.js';

const ENDPOINT = 'https://places.test/v1/places:searchText';
const CENTER = { lat: 60.1699, lon: 24.9384, radiusKm: 30 };

describe('Place-search adapter', () => {
  describe('buildQueries', () => {
    it('should produce the canned queries for a city', () => {
      const queries = buildQueries('Helsinki');
      expect(queries).toHaveLength(7);
      expect(queries[0]).toBe('restaurant in Helsinki');
      expect(queries).toContain('new restaurant in Helsinki');
    });
  });

  describe('matchesTypeFilter', () => {
    it('should accept allowed types', () => {
      expect(matchesTypeFilter({ primaryType: 'cafe' }, placeTypeFilter(false))).toBe(true);
      expect(matchesTypeFilter({ types: ['food', 'restaurant'] }, placeTypeFilter(false))).toBe(true);
    });

    it('should let exclusions win', () => {
      expect(matchesTypeFilter({ types: ['restaurant', 'bar'] }, placeTypeFilter(false))).toBe(false);
    });

    it('should reject places without an allowed type', () => {
      expect(matchesTypeFilter({ types: ['store'] }, placeTypeFilter(false))).toBe(false);
      expect(matchesTypeFilter({}, placeTypeFilter(false))).toBe(false);
    });

    it('should narrow to restaurants in strict mode', () => {
      expect(matchesTypeFilter({ primaryType: 'cafe' }, placeTypeFilter(true))).toBe(false);
      expect(matchesTypeFilter({ types: ['restaurant', 'fast_food'] }, placeTypeFilter(true))).toBe(false);
      expect(matchesTypeFilter({ types: ['restaurant'] }, placeTypeFilter(true))).toBe(true);
    });
  });

  describe('isInCity', () => {
    it('should accept addresses naming the city', () => {
      expect(isInCity({ formattedAddress: 'Kalevankatu 3, 00100 HELSINKI, Finland' }, 'Helsinki')).toBe(true);
    });

    it('should accept locations within the radius', () => {
      const place = { formattedAddress: 'Tekniikantie 1, Espoo', location: { latitude: 60.18, longitude: 24.83 } };
      expect(isInCity(place, 'Helsinki', CENTER)).toBe(true);
      expect(isInCity(place, 'Helsinki')).toBe(false);
    });

    it('should reject distant locations', () => {
      const place = { formattedAddress: 'Hämeenkatu 1, Tampere', location: { latitude: 61.4978, longitude: 23.761 } };
      expect(isInCity(place, 'Helsinki', CENTER)).toBe(false);
    });
  });

  describe('parsePlaces', () => {
    it('should drop malformed places and keep the rest', () => {
      expect(parsePlaces({
        places: [
          { displayName: { text: 'Half Pinned' }, location: { latitude: 60.17 } },
          { displayName: { text: 'Soup Bar' }, types: ['restaurant'] },
          'junk',
        ],
      })).toEqual([{ displayName: { text: 'Soup Bar' }, types: ['restaurant'] }]);
      expect(parsePlaces({})).toEqual([]);
    });
  });

  describe('fetch', () => {
    it('should skip the source without an API key', async () => {
      const { http, fetchImpl } = mockHttp(() => jsonResponse({}));

      await expect(new PlacesAdapter(http, ENDPOINT).fetch(makeContext())).resolves.toEqual([]);
      expect(fetchImpl).not.toHaveBeenCalled();
    });

    it('should run every query, filter candidates and survive failing queries', async () => {
      const { http, fetchImpl } = mockHttp((_url, init) => {
        const body = String(init?.body);
        if (body.includes('"restaurant in Helsinki"')) {
          return jsonResponse({
            places: [
              { displayName: { text: 'Noodle House' }, formattedAddress: 'Kalevankatu 3, Helsinki', types: ['restaurant'] },
              { displayName: { text: 'Pub Y' }, formattedAddress: 'Iso Roobertinkatu 1, Helsinki', types: ['bar', 'restaurant'] },
              {
                displayName: { text: 'Far Grill' },
                formattedAddress: 'Hämeenkatu 1, Tampere',
                types: ['restaurant'],
                location: { latitude: 61.4978, longitude: 23.761 },
              },
            ],
          });
        }
        if (body.includes('"cafe in Helsinki"')) {
          return textResponse('quota exceeded', 403);
        }
        return jsonResponse({});
      });
      const ctx = makeContext({
        credentials: { nominatimUserAgent: 'test-agent/1.0', placesApiKey: 'test-secret' },
      });

      const payloads = await new PlacesAdapter(http, ENDPOINT).fetch(ctx);

      expect(fetchImpl).toHaveBeenCalledTimes(7);
      expect(payloads).toEqual([
        {
          source: 'google_places',
          place: { displayName: { text: 'Noodle House' }, formattedAddress: 'Kalevankatu 3, Helsinki', types: ['restaurant'] },
        },
      ]);
    });

    it('should keep valid candidates beside a malformed one', async () => {
      const { http } = mockHttp((_url, init) => {
        if (String(init?.body).includes('"restaurant in Helsinki"')) {
          return jsonResponse({
            places: [
              {
                displayName: { text: 'Broken Pin' },
                formattedAddress: 'Aleksanterinkatu 5, Helsinki',
                types: ['restaurant'],
                location: { latitude: 60.17 },
              },
              { displayName: { text: 'Dumpling Spot' }, formattedAddress: 'Fredrikinkatu 20, Helsinki', types: ['restaurant'] },
            ],
          });
        }
        return jsonResponse({});
      });
      const ctx = makeContext({
        credentials: { nominatimUserAgent: 'test-agent/1.0', placesApiKey: 'test-secret' },
      });

      const payloads = await new PlacesAdapter(http, ENDPOINT).fetch(ctx);

      expect(payloads).toEqual([
        {
          source: 'google_places',
          place: { displayName: { text: 'Dumpling Spot' }, formattedAddress: 'Fredrikinkatu 20, Helsinki', types: ['restaurant'] },
        },
      ]);
    });

    it('should send the key, field mask and location bias', async () => {
      const { http, fetchImpl } = mockHttp(() => jsonResponse({}));
      const ctx = makeContext({
        credentials: { nominatimUserAgent: 'test-agent/1.0', placesApiKey: 'test-secret' },
      });

      await new PlacesAdapter(http, ENDPOINT).fetch(ctx);

      const init = fetchImpl.mock.calls[0]?.[1];
      expect(init?.headers).toMatchObject({
        'X-Goog-Api-Key': 'test-secret',
        'X-Goog-FieldMask': 'places.displayName,places.formattedAddress,places.primaryType,places.types,places.businessStatus,places.location',
      });
      expect(JSON.parse(String(init?.body))).toEqual({
        textQuery: 'restaurant in Helsinki',
        languageCode: 'en',
        pageSize: 20,
        locationBias: {
          circle: {
            center: { latitude: 60.1699, longitude: 24.9384 },
            radius: 30000,
          },
        },
      });
    });
  });
});
