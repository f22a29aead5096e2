/**
 * Map raw per-source payloads into the canonical record schema
 */

import { parseOpeningDate, isBeforeDate } from '../util/dates.js';
import { scoreConfidence } from '../score/confidence.js';
import { buildAddress, buildDescription, buildTags, rawOpeningValue } from './fields.js';
import type {
  CanonicalRecord,
  OverpassElement,
  PlaceResult,
  QueryContext,
  RawPayload,
  RegistryCompany,
} from '../types.js';

export const PLACE_SEARCH_DESCRIPTION = 'Place-search candidate (no opening date provided)';

type DatePolicy = Pick<QueryContext, 'cutoff' | 'useNewerProxy'>;

function freezeRecord(record: CanonicalRecord): CanonicalRecord {
  return Object.freeze({ ...record, tags: new Set(record.tags) });
}

/**
 * Normalize a geo-tag element. Returns null when the element has no usable
 * date (and the recency proxy is off) or opened before the cutoff.
 */
export function normalizeOsmElement(
  element: OverpassElement,
  policy: DatePolicy
): CanonicalRecord | null {
  const tags = element.tags;
  const openingRaw = rawOpeningValue(tags);
  const openingDate = openingRaw ? parseOpeningDate(openingRaw) : undefined;

  if (!openingDate && !policy.useNewerProxy) {
    return null;
  }
  if (openingDate && isBeforeDate(openingDate, policy.cutoff)) {
    return null;
  }

  return freezeRecord({
    name: tags.name ?? '',
    address: buildAddress(tags),
    description: buildDescription(tags),
    tags: buildTags(tags),
    openingDate,
    source: 'openstreetmap',
    confidence: scoreConfidence('openstreetmap', { hasExplicitDate: openingDate !== undefined }),
  });
}

export function normalizePlace(place: PlaceResult): CanonicalRecord {
  const tags = new Set<string>(['source:google_places']);
  if (place.primaryType) {
    tags.add(`type:${place.primaryType}`);
  }
  for (const type of place.types ?? []) {
    tags.add(`type:${type}`);
  }

  return freezeRecord({
    name: place.displayName?.text ?? '',
    address: place.formattedAddress ?? '',
    description: PLACE_SEARCH_DESCRIPTION,
    tags,
    source: 'google_places',
    confidence: scoreConfidence('google_places', { hasExplicitDate: false }),
  });
}

/**
 * Registration date stands in for the opening date
 */
export function normalizeRegistryCompany(company: RegistryCompany): CanonicalRecord {
  const tags = new Set<string>(['source:registry']);
  if (company.businessId) {
    tags.add(`business_id:${company.businessId}`);
  }
  if (company.businessLine) {
    tags.add(`business_line:${company.businessLine}`);
  }

  const openingDate = parseOpeningDate(company.registrationDate);

  return freezeRecord({
    name: company.name,
    address: company.address ?? '',
    description: company.businessLine ?? '',
    tags,
    openingDate,
    source: 'registry',
    confidence: scoreConfidence('registry', { hasExplicitDate: openingDate !== undefined }),
    lastModified: company.lastModified,
  });
}

/**
 * Normalize any raw payload according to its owning source
 */
export function normalizePayload(payload: RawPayload, policy: DatePolicy): CanonicalRecord | null {
  switch (payload.source) {
    case 'openstreetmap':
      return normalizeOsmElement(payload.element, policy);
    case 'google_places':
      return normalizePlace(payload.place);
    case 'registry':
      return normalizeRegistryCompany(payload.company);
  }
}

/**
 * Copy of a record with a backfilled address
 */
export function withAddress(record: CanonicalRecord, address: string): CanonicalRecord {
  return freezeRecord({ ...record, address });
}
