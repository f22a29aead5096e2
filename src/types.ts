/**
 * Core type definitions for the openings-radar pipeline
 */

// Source labels for record-producing adapters
export type SourceLabel = 'openstreetmap' | 'google_places' | 'registry';

export const SOURCE_DISPLAY_NAMES: Record<SourceLabel, string> = {
  openstreetmap: 'OpenStreetMap',
  google_places: 'Google Places (Text Search)',
  registry: 'Trade Register (PRH)',
};

export type Confidence = 'high' | 'medium' | 'low';

export interface CityCenter {
  lat: number;
  lon: number;
  radiusKm: number;
}

export interface SourceToggles {
  reverseGeocode: boolean;
  placeSearch: boolean;
  registry: boolean;
}

export interface Credentials {
  placesApiKey?: string;
  nominatimUserAgent: string;
  registryBaseUrl?: string;
}

// Immutable per-run query settings, read-only to adapters
export interface QueryContext {
  readonly city: string;
  readonly today: string;
  readonly cutoff: string;
  readonly amenities: readonly string[];
  readonly strictRestaurants: boolean;
  readonly useNewerProxy: boolean;
  readonly registeredOffice: string;
  readonly businessLineCodes: readonly string[];
  readonly pageSize: number;
  readonly maxResults: number;
  readonly sources: Readonly<SourceToggles>;
  readonly cityCenter?: Readonly<CityCenter>;
  readonly credentials: Readonly<Credentials>;
}

// Resolved registry API location
export interface EndpointDescriptor {
  baseUrl: string;
  searchPath: string;
  detailPathTemplate: string;
}

export const BUSINESS_ID_PLACEHOLDER = '{businessId}';

// Overpass element as returned by `out center tags`
export interface OverpassElement {
  type?: string;
  id?: number;
  lat?: number;
  lon?: number;
  center?: { lat: number; lon: number };
  tags: Record<string, string>;
}

// Google Places (New) text search result, restricted to the field mask
export interface PlaceResult {
  displayName?: { text?: string; languageCode?: string };
  formattedAddress?: string;
  primaryType?: string;
  types?: string[];
  businessStatus?: string;
  location?: { latitude: number; longitude: number };
}

// Registry hit joined with its detail lookup
export interface RegistryCompany {
  businessId: string;
  name: string;
  registrationDate?: string;
  address?: string;
  businessLine?: string;
  lastModified?: string;
}

export type RawPayload =
  | { source: 'openstreetmap'; element: OverpassElement }
  | { source: 'google_places'; place: PlaceResult }
  | { source: 'registry'; company: RegistryCompany };

// Shared post-normalization schema
export interface CanonicalRecord {
  readonly name: string;
  readonly address: string;
  readonly description: string;
  readonly tags: ReadonlySet<string>;
  readonly openingDate?: string;
  readonly source: SourceLabel;
  readonly confidence: Confidence;
  readonly lastModified?: string;
}

// Flat output row
export interface OutputRow {
  name: string;
  full_address: string;
  description: string;
  tags: string;
  opening_date: string;
  source: string;
  last_modified: string;
}

// Utility types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

// Error types
export class HttpError extends Error {
  constructor(
    message: string,
    public url: string,
    public statusCode?: number,
    public retryAfter?: number
  ) {
    super(message);
    this.name = 'HttpError';
  }

  isNotFound(): boolean {
    return this.statusCode === 404;
  }

  /**
   * Network failures, timeouts, 429 and 5xx are worth another attempt
   */
  isRetryable(): boolean {
    if (this.statusCode === undefined) {
      return true;
    }
    return this.statusCode === 429 || this.statusCode >= 500;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ResolutionError extends Error {
  constructor(message: string, public attempts: string[]) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export class SourceUnavailableError extends Error {
  constructor(message: string, public source: SourceLabel, public lastError?: Error) {
    super(message);
    this.name = 'SourceUnavailableError';
  }
}

/**
 * Render an unknown thrown value for log metadata
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
