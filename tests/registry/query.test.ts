import { describe, it, expect } from 'vitest';
import { buildCheckParams, buildSearchFilters, buildSearchParams } from '../../src/registry/query.js';
import { makeContext } from '../helpers/fixtures.js';

describe('Registry query builders', () => {
  describe('buildSearchFilters', () => {
    it('should build one filter per business line code', () => {
      const filters = buildSearchFilters(makeContext({ businessLineCodes: ['56101', '56102'] }));

      expect(filters).toEqual([
        { registeredOffice: 'Helsinki', businessLineCode: '56101', from: '2025-02-28', to: '2025-08-31' },
        { registeredOffice: 'Helsinki', businessLineCode: '56102', from: '2025-02-28', to: '2025-08-31' },
      ]);
    });

    it('should build a single unfiltered query without codes', () => {
      const filters = buildSearchFilters(makeContext({ businessLineCodes: [] }));
      expect(filters.map(f => f.businessLineCode)).toEqual(['']);
    });
  });

  describe('buildSearchParams', () => {
    it('should map the filter and page window to query parameters', () => {
      const params = buildSearchParams(
        { registeredOffice: 'Helsinki', businessLineCode: '56101', from: '2025-02-28', to: '2025-08-31' },
        { offset: 200, limit: 100 }
      );

      expect(params).toEqual({
        totalResults: 'false',
        maxResults: 100,
        resultsFrom: 200,
        registeredOffice: 'Helsinki',
        businessLineCode: '56101',
        companyRegistrationFrom: '2025-02-28',
        companyRegistrationTo: '2025-08-31',
      });
    });

    it('should omit an empty business line code', () => {
      const params = buildSearchParams(
        { registeredOffice: 'Helsinki', businessLineCode: '', from: '2025-02-28', to: '2025-08-31' },
        { offset: 0, limit: 100 }
      );
      expect(params.businessLineCode).toBeUndefined();
    });
  });

  describe('buildCheckParams', () => {
    it('should ask for a single registration from today', () => {
      expect(buildCheckParams(makeContext())).toEqual({
        totalResults: 'false',
        maxResults: 1,
        resultsFrom: 0,
        registeredOffice: 'Helsinki',
        companyRegistrationFrom: '2025-08-31',
        companyRegistrationTo: '2025-08-31',
      });
    });
  });
});
