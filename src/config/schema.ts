/**
 * Zod schemas for validating city configuration files
 */

import { z } from 'zod';

/**
 * Schema for the place-search center point
 */
export const CityCenterSchema = z.object({
  lat: z.number().min(-90).max(90).describe('Center latitude'),
  lon: z.number().min(-180).max(180).describe('Center longitude'),
  radius_km: z.number().positive().default(30).describe('Acceptance radius around the center'),
}).strict();

/**
 * Schema for per-source feature toggles
 */
export const SourcesSchema = z.object({
  reverse_geocode: z.boolean().default(false),
  place_search: z.boolean().default(false),
  registry: z.boolean().default(false),
}).strict();

/**
 * Schema for business registry settings
 */
export const RegistryConfigSchema = z.object({
  registered_office: z.string().min(1).optional().describe('Registered office filter (defaults to the city)'),
  business_line_codes: z.array(z.string().regex(/^\d{1,5}$/)).default([]).describe('TOL 2008 business line codes'),
  page_size: z.number().int().positive().max(1000).default(100),
  max_results: z.number().int().positive().default(1000),
  base_url: z.string().optional().describe('Bypass endpoint discovery with a fixed base URL'),
}).strict();

/**
 * Schema for city configuration
 */
export const CityConfigSchema = z.object({
  city: z.string().min(1).describe('City name as used by the data sources'),
  lookback_months: z.number().int().positive().default(6),
  amenities: z.array(z.string().min(1)).default(['restaurant', 'cafe', 'fast_food']),
  strict_restaurants: z.boolean().default(false),
  use_newer_proxy: z.boolean().default(false),
  sources: SourcesSchema.default({}),
  center: CityCenterSchema.optional(),
  registry: RegistryConfigSchema.default({}),
}).strict();

/**
 * Comprehensive validation of city configuration
 */
export function validateCityConfig(config: unknown): {
  success: boolean;
  data?: CityConfig;
  errors: string[];
  warnings: string[];
} {
  const result = CityConfigSchema.safeParse(config);

  if (!result.success) {
    return {
      success: false,
      errors: result.error.errors.map(e => `${e.path.join('.')}: ${e.message}`),
      warnings: [],
    };
  }

  // Configurations that load but limit what a source can do
  const warnings: string[] = [];
  if (result.data.sources.place_search && !result.data.center) {
    warnings.push('center: place_search without a center point only accepts address matches');
  }

  return {
    success: true,
    data: result.data,
    errors: [],
    warnings,
  };
}

/**
 * Type exports for use in other modules
 */
export type CityConfig = z.infer<typeof CityConfigSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
