import { describe, it, expect } from 'vitest';
import {
  PLACE_SEARCH_DESCRIPTION,
  normalizeOsmElement,
  normalizePayload,
  normalizePlace,
  normalizeRegistryCompany,
  withAddress,
} from '../../src/normalize/records.js';

const policy = { cutoff: '2025-01-01', useNewerProxy: false };

describe('Record normalization', () => {
  describe('normalizeOsmElement', () => {
    it('should normalize a dated venue without an address', () => {
      const record = normalizeOsmElement(
        { type: 'node', id: 1, lat: 60.17, lon: 24.94, tags: { amenity: 'restaurant', name: 'Cafe X', opening_date: '2025-03-01' } },
        policy
      );

      expect(record).not.toBeNull();
      expect(record?.name).toBe('Cafe X');
      expect(record?.address).toBe('');
      expect(record?.openingDate).toBe('2025-03-01');
      expect(record?.tags.has('restaurant')).toBe(true);
      expect(record?.source).toBe('openstreetmap');
      expect(record?.confidence).toBe('high');
    });

    it('should fall back to start_date', () => {
      const record = normalizeOsmElement({ tags: { amenity: 'cafe', start_date: '2025-06' } }, policy);
      expect(record?.openingDate).toBe('2025-06-01');
    });

    it('should drop venues that opened before the cutoff', () => {
      expect(normalizeOsmElement({ tags: { amenity: 'cafe', opening_date: '2024-12-31' } }, policy)).toBeNull();
    });

    it('should keep venues that opened on the cutoff', () => {
      expect(normalizeOsmElement({ tags: { amenity: 'cafe', opening_date: '2025-01-01' } }, policy)).not.toBeNull();
    });

    it('should drop undated venues unless the recency proxy is on', () => {
      const element = { tags: { amenity: 'cafe', name: 'Edited Cafe', opening_date: 'soon' } };

      expect(normalizeOsmElement(element, policy)).toBeNull();

      const record = normalizeOsmElement(element, { ...policy, useNewerProxy: true });
      expect(record?.openingDate).toBeUndefined();
      expect(record?.confidence).toBe('medium');
    });

    it('should produce a frozen record', () => {
      const record = normalizeOsmElement({ tags: { amenity: 'cafe', opening_date: '2025-02-01' } }, policy);
      expect(Object.isFrozen(record)).toBe(true);
    });
  });

  describe('normalizePlace', () => {
    it('should map a place-search candidate with low confidence', () => {
      const record = normalizePlace({
        displayName: { text: 'Noodle House' },
        formattedAddress: 'Kalevankatu 3, 00100 Helsinki, Finland',
        primaryType: 'restaurant',
        types: ['restaurant', 'food'],
      });

      expect(record.name).toBe('Noodle House');
      expect(record.address).toBe('Kalevankatu 3, 00100 Helsinki, Finland');
      expect(record.description).toBe(PLACE_SEARCH_DESCRIPTION);
      expect([...record.tags].sort()).toEqual(['source:google_places', 'type:food', 'type:restaurant']);
      expect(record.openingDate).toBeUndefined();
      expect(record.confidence).toBe('low');
    });

    it('should tolerate missing fields', () => {
      const record = normalizePlace({});
      expect(record.name).toBe('');
      expect(record.address).toBe('');
    });
  });

  describe('normalizeRegistryCompany', () => {
    it('should emit a hit whose detail lookup failed', () => {
      const record = normalizeRegistryCompany({
        businessId: '1234567-8',
        name: 'Foo Oy',
        registrationDate: '2025-03-10',
      });

      expect(record.name).toBe('Foo Oy');
      expect(record.address).toBe('');
      expect(record.description).toBe('');
      expect([...record.tags].sort()).toEqual(['business_id:1234567-8', 'source:registry']);
      expect(record.openingDate).toBe('2025-03-10');
      expect(record.confidence).toBe('medium');
      expect(record.lastModified).toBeUndefined();
    });

    it('should carry business line, address and last-modified from the detail', () => {
      const record = normalizeRegistryCompany({
        businessId: '7654321-0',
        name: 'Bar Oy',
        registrationDate: '2025-04-02',
        address: 'Mannerheimintie 10, 00100 Helsinki',
        businessLine: 'Restaurants',
        lastModified: '2025-04-05T08:00:00',
      });

      expect(record.address).toBe('Mannerheimintie 10, 00100 Helsinki');
      expect(record.description).toBe('Restaurants');
      expect(record.tags.has('business_line:Restaurants')).toBe(true);
      expect(record.lastModified).toBe('2025-04-05T08:00:00');
    });
  });

  describe('normalizePayload', () => {
    it('should dispatch on the payload source', () => {
      const record = normalizePayload(
        { source: 'registry', company: { businessId: '1', name: 'Baz Oy' } },
        policy
      );
      expect(record?.source).toBe('registry');
      expect(record?.openingDate).toBeUndefined();
    });
  });

  describe('withAddress', () => {
    it('should return a new record with the address filled in', () => {
      const original = normalizePlace({ displayName: { text: 'Noodle House' } });
      const updated = withAddress(original, 'Kalevankatu 3, Helsinki');

      expect(updated.address).toBe('Kalevankatu 3, Helsinki');
      expect(updated.name).toBe('Noodle House');
      expect(original.address).toBe('');
      expect(Object.isFrozen(updated)).toBe(true);
    });
  });
});
