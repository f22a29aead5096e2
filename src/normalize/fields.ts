/**
 * Field derivation from OpenStreetMap-style key/value tags
 */

import { assembleAddress } from '../util/address.js';

type Tags = Readonly<Record<string, string>>;

const BOOLEAN_AMENITIES = ['outdoor_seating', 'delivery', 'takeaway', 'vegetarian', 'vegan'] as const;

const DESCRIPTION_KEYS = ['description', 'description:en', 'short_description', 'note'] as const;

/**
 * Prefer addr:full, otherwise assemble from the addr:* fragments
 */
export function buildAddress(tags: Tags): string {
  const full = tags['addr:full'];
  if (full !== undefined) {
    return full.trim();
  }

  return assembleAddress({
    street: tags['addr:street'],
    houseNumber: tags['addr:housenumber'],
    postCode: tags['addr:postcode'],
    city: tags['addr:city'],
    country: tags['addr:country'],
  });
}

export function splitCuisine(cuisine: string): string[] {
  return cuisine
    .split(/[;,_]/)
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function buildTags(tags: Tags): Set<string> {
  const result = new Set<string>();

  const amenity = tags.amenity;
  if (amenity) {
    result.add(amenity);
  }

  const cuisine = tags.cuisine;
  if (cuisine) {
    for (const item of splitCuisine(cuisine)) {
      result.add(`cuisine:${item}`);
    }
  }

  for (const key of BOOLEAN_AMENITIES) {
    const value = tags[key];
    if (value === 'yes' || value === 'no') {
      result.add(`${key}:${value}`);
    }
  }

  for (const [key, value] of Object.entries(tags)) {
    if (key.startsWith('diet:') && value) {
      result.add(`${key}:${value}`);
    }
  }

  return result;
}

/**
 * Explicit description-like tag first, then a one-liner from the cuisine
 */
export function buildDescription(tags: Tags): string {
  for (const key of DESCRIPTION_KEYS) {
    const value = tags[key]?.trim();
    if (value) {
      return value;
    }
  }

  const cuisine = tags.cuisine;
  if (cuisine) {
    return `${cuisine.replace(/;/g, ', ')} cuisine`;
  }

  return '';
}

/**
 * Raw opening value: opening_date, falling back to start_date
 */
export function rawOpeningValue(tags: Tags): string | undefined {
  return tags.opening_date || tags.start_date || undefined;
}
