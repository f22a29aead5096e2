/**
 * Registry search query builders
 */

import type { QueryParams } from '../http/client.js';
import type { QueryContext } from '../types.js';

/**
 * Registration-date range filter names the search operation must accept
 */
export const REGISTRATION_FROM_PARAM = 'companyRegistrationFrom';
export const REGISTRATION_TO_PARAM = 'companyRegistrationTo';

export const REGISTRATION_FILTER_NAMES = [REGISTRATION_FROM_PARAM, REGISTRATION_TO_PARAM] as const;

export interface RegistrySearchFilter {
  registeredOffice: string;
  businessLineCode: string;
  from: string;
  to: string;
}

export interface PageWindow {
  offset: number;
  limit: number;
}

/**
 * One filter per configured business-line code, or a single unfiltered one
 */
export function buildSearchFilters(
  ctx: Pick<QueryContext, 'registeredOffice' | 'businessLineCodes' | 'cutoff' | 'today'>
): RegistrySearchFilter[] {
  const codes = ctx.businessLineCodes.length > 0 ? ctx.businessLineCodes : [''];
  return codes.map(code => ({
    registeredOffice: ctx.registeredOffice,
    businessLineCode: code,
    from: ctx.cutoff,
    to: ctx.today,
  }));
}

export function buildSearchParams(filter: RegistrySearchFilter, page: PageWindow): QueryParams {
  return {
    totalResults: 'false',
    maxResults: page.limit,
    resultsFrom: page.offset,
    registeredOffice: filter.registeredOffice || undefined,
    businessLineCode: filter.businessLineCode || undefined,
    [REGISTRATION_FROM_PARAM]: filter.from,
    [REGISTRATION_TO_PARAM]: filter.to,
  };
}

/**
 * Cheapest meaningful query: one result from today's registrations
 */
export function buildCheckParams(ctx: Pick<QueryContext, 'registeredOffice' | 'today'>): QueryParams {
  return buildSearchParams(
    {
      registeredOffice: ctx.registeredOffice,
      businessLineCode: '',
      from: ctx.today,
      to: ctx.today,
    },
    { offset: 0, limit: 1 }
  );
}
