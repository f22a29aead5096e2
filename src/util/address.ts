/**
 * Address and coordinate utilities
 */

export interface AddressFragments {
  street?: string;
  houseNumber?: string;
  postCode?: string;
  city?: string;
  country?: string;
}

function clean(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Assemble "street number, postcode city, country", skipping absent parts
 */
export function assembleAddress(fragments: AddressFragments): string {
  const street = clean(fragments.street);
  const houseNumber = clean(fragments.houseNumber);
  const postCode = clean(fragments.postCode);
  const city = clean(fragments.city);
  const country = clean(fragments.country);

  const parts: string[] = [];

  if (street && houseNumber) {
    parts.push(`${street} ${houseNumber}`);
  } else if (street) {
    parts.push(street);
  }

  if (postCode && city) {
    parts.push(`${postCode} ${city}`);
  } else if (city) {
    parts.push(city);
  }

  if (country) {
    parts.push(country);
  }

  return parts.join(', ');
}

/**
 * Collapse runs of whitespace into single spaces
 */
export function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ');
}

export const EARTH_RADIUS_KM = 6371;

/**
 * Great-circle distance between two points using the Haversine formula, in km
 */
export function haversineKm(
  lat1: number,
  lon1: number,
  lat2: number,
  lon2: number
): number {
  const φ1 = (lat1 * Math.PI) / 180;
  const φ2 = (lat2 * Math.PI) / 180;
  const Δφ = ((lat2 - lat1) * Math.PI) / 180;
  const Δλ = ((lon2 - lon1) * Math.PI) / 180;

  const a =
    Math.sin(Δφ / 2) * Math.sin(Δφ / 2) +
    Math.cos(φ1) * Math.cos(φ2) * Math.sin(Δλ / 2) * Math.sin(Δλ / 2);
  const c = 2 * Math.atan2(Math.sqrt(a), Math.sqrt(1 - a));

  return EARTH_RADIUS_KM * c;
}

/**
 * Inclusive radius check around a center point
 */
export function isWithinRadius(
  lat: number,
  lon: number,
  center: { lat: number; lon: number; radiusKm: number }
): boolean {
  return haversineKm(lat, lon, center.lat, center.lon) <= center.radiusKm;
}
