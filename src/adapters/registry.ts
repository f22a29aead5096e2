/**
 * Business registry adapter (Finnish Trade Register open data)
 */

import { z } from 'zod';
import { HttpClient, joinUrl } from '../http/client.js';
import { EndpointResolver } from '../registry/resolver.js';
import { paginateOffsets } from '../registry/paginate.js';
import { buildCheckParams, buildSearchFilters, buildSearchParams, type RegistrySearchFilter } from '../registry/query.js';
import { assembleAddress } from '../util/address.js';
import { logger } from '../util/logger.js';
import {
  BUSINESS_ID_PLACEHOLDER,
  errorMessage,
  type EndpointDescriptor,
  type QueryContext,
  type RawPayload,
  type RegistryCompany,
} from '../types.js';

// English first, then Finnish, then whatever is available
export const LANGUAGE_PREFERENCE = ['EN', 'FI'] as const;

const CompanyStubSchema = z.object({
  businessId: z.string().min(1),
  name: z.string().default(''),
  registrationDate: z.string().nullish(),
});

const SearchResponseSchema = z.object({
  results: z.array(z.unknown()).default([]),
});

const LocalizedEntry = {
  language: z.string().nullish(),
  endDate: z.string().nullish(),
};

const AddressSchema = z.object({
  ...LocalizedEntry,
  street: z.string().nullish(),
  postCode: z.string().nullish(),
  city: z.string().nullish(),
  country: z.string().nullish(),
});

const BusinessLineSchema = z.object({
  ...LocalizedEntry,
  code: z.string().nullish(),
  name: z.string().nullish(),
});

const CompanyDetailSchema = z.object({
  addresses: z.array(AddressSchema).default([]),
  businessLines: z.array(BusinessLineSchema).default([]),
  lastModified: z.string().nullish(),
});

const DetailResponseSchema = z.union([
  z.object({ results: z.array(CompanyDetailSchema).min(1) }).transform(body => body.results[0]),
  CompanyDetailSchema,
]);

export type CompanyStub = z.infer<typeof CompanyStubSchema>;

export interface CompanyDetail {
  address?: string;
  businessLine?: string;
  lastModified?: string;
}

/**
 * Pick the entry in the preferred language, ignoring ended entries when
 * current ones exist
 */
export function pickLocalized<T extends { language?: string | null; endDate?: string | null }>(
  entries: readonly T[]
): T | undefined {
  const current = entries.filter(entry => !entry.endDate);
  const pool = current.length > 0 ? current : entries;

  for (const language of LANGUAGE_PREFERENCE) {
    const match = pool.find(entry => entry.language?.toUpperCase() === language);
    if (match) {
      return match;
    }
  }
  return pool[0];
}

export function detailUrl(descriptor: EndpointDescriptor, businessId: string): string {
  const path = descriptor.detailPathTemplate.replace(BUSINESS_ID_PLACEHOLDER, encodeURIComponent(businessId));
  return joinUrl(descriptor.baseUrl, path);
}

/**
 * Extract address and business-line text from a detail payload; a malformed
 * payload yields empty fields
 */
export function parseCompanyDetail(body: unknown): CompanyDetail {
  const parsed = DetailResponseSchema.safeParse(body);
  if (!parsed.success || !parsed.data) {
    return {};
  }

  const detail = parsed.data;
  const address = pickLocalized(detail.addresses);
  const businessLine = pickLocalized(detail.businessLines);

  const addressText = address
    ? assembleAddress({
        street: address.street ?? undefined,
        postCode: address.postCode ?? undefined,
        city: address.city ?? undefined,
        country: address.country ?? undefined,
      })
    : '';

  return {
    address: addressText || undefined,
    businessLine: businessLine?.name?.trim() || undefined,
    lastModified: detail.lastModified ?? undefined,
  };
}

/**
 * Keep well-formed company stubs, dropping malformed entries
 */
export function parseCompanyStubs(results: readonly unknown[]): CompanyStub[] {
  const stubs: CompanyStub[] = [];
  for (const result of results) {
    const stub = CompanyStubSchema.safeParse(result);
    if (stub.success) {
      stubs.push(stub.data);
    } else {
      logger.debug('Skipping malformed registry result', { result });
    }
  }
  return stubs;
}

export class RegistryAdapter {
  constructor(
    private http: HttpClient,
    private resolver: EndpointResolver
  ) {}

  /**
   * Page through recent registrations for every configured business-line
   * code and enrich each hit with one detail lookup. Throws ResolutionError
   * when the endpoint cannot be resolved; page failures end paging for that
   * filter with a warning.
   */
  async fetch(ctx: QueryContext): Promise<RawPayload[]> {
    const descriptor = await this.resolver.resolve(buildCheckParams(ctx));
    const payloads: RawPayload[] = [];

    for (const filter of buildSearchFilters(ctx)) {
      const remaining = ctx.maxResults - payloads.length;
      if (remaining <= 0) {
        logger.info('Registry result cap reached', { maxResults: ctx.maxResults });
        break;
      }

      const stubs = await this.searchAll(descriptor, filter, ctx.pageSize, remaining);
      for (const stub of stubs) {
        const detail = await this.lookupDetail(descriptor, stub.businessId);
        const company: RegistryCompany = {
          businessId: stub.businessId,
          name: stub.name,
          registrationDate: stub.registrationDate ?? undefined,
          ...detail,
        };
        payloads.push({ source: 'registry', company });
      }
    }

    logger.info('Registry search completed', {
      registeredOffice: ctx.registeredOffice,
      businessLineCodes: ctx.businessLineCodes,
      companies: payloads.length,
    });

    return payloads;
  }

  private async searchAll(
    descriptor: EndpointDescriptor,
    filter: RegistrySearchFilter,
    pageSize: number,
    maxResults: number
  ): Promise<CompanyStub[]> {
    const url = joinUrl(descriptor.baseUrl, descriptor.searchPath);
    const stubs: CompanyStub[] = [];

    try {
      // Pages hold raw results so offsets follow what the server returned
      for await (const batch of paginateOffsets(
        async page => SearchResponseSchema.parse(await this.http.getJson(url, buildSearchParams(filter, page))).results,
        { pageSize, maxResults }
      )) {
        stubs.push(...parseCompanyStubs(batch));
      }
    } catch (error) {
      logger.warn('Registry search page failed, keeping results so far', {
        businessLineCode: filter.businessLineCode || undefined,
        fetched: stubs.length,
        error: errorMessage(error),
      });
    }

    return stubs;
  }

  private async lookupDetail(descriptor: EndpointDescriptor, businessId: string): Promise<CompanyDetail> {
    try {
      return parseCompanyDetail(await this.http.getJson(detailUrl(descriptor, businessId)));
    } catch (error) {
      logger.warn('Registry detail lookup failed', { businessId, error: errorMessage(error) });
      return {};
    }
  }
}
