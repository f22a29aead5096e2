/**
 * Best-effort discovery of the registry API from its documentation portal.
 *
 * Documentation pages embed a Swagger UI that loads a machine-readable API
 * specification, either as `url: "..."` or as `"urls": [{"url": "..."}]`.
 * The specification declares the service base URL and the operations; the
 * search operation is the one taking the registration-date range filters.
 */

import { z } from 'zod';
import { HttpClient } from '../http/client.js';
import { logger } from '../util/logger.js';
import { REGISTRATION_FILTER_NAMES } from './query.js';
import { BUSINESS_ID_PLACEHOLDER, errorMessage, type EndpointDescriptor } from '../types.js';

export const DOCUMENTATION_PORTALS = [
  'https://avoindata.prh.fi/ytj_en.html',
  'https://avoindata.prh.fi/ytj.html',
  'https://avoindata.prh.fi/en/',
] as const;

const SPEC_URL_PATTERNS: readonly RegExp[] = [
  /\burl\s*:\s*["']([^"']+)["']/,
  /"urls"\s*:\s*\[\s*\{[^}]*?"url"\s*:\s*"([^"]+)"/,
];

const HTTP_METHODS = ['get', 'post', 'put', 'patch', 'delete', 'head', 'options'] as const;

const PLACEHOLDER_RE = /\{[^}]+\}/;

const ApiSpecSchema = z.object({
  servers: z.array(z.object({ url: z.string() })).optional(),
  host: z.string().optional(),
  basePath: z.string().optional(),
  schemes: z.array(z.string()).optional(),
  paths: z.record(z.string(), z.record(z.string(), z.unknown())),
});

type ApiSpec = z.infer<typeof ApiSpecSchema>;

/**
 * Find an embedded specification URL, resolved against the page URL
 */
export function findSpecUrl(html: string, pageUrl: string): string | undefined {
  for (const pattern of SPEC_URL_PATTERNS) {
    const match = pattern.exec(html);
    const found = match?.[1]?.trim();
    if (found) {
      try {
        return new URL(found, pageUrl).toString();
      } catch {
        logger.debug('Ignoring unparseable specification URL', { found, pageUrl });
      }
    }
  }
  return undefined;
}

function parameterNames(value: unknown): string[] {
  if (!value || typeof value !== 'object' || !('parameters' in value)) {
    return [];
  }
  const { parameters } = value;
  if (!Array.isArray(parameters)) {
    return [];
  }
  const names: string[] = [];
  for (const parameter of parameters) {
    if (parameter && typeof parameter === 'object' && 'name' in parameter && typeof parameter.name === 'string') {
      names.push(parameter.name);
    }
  }
  return names;
}

function declaredBaseUrl(spec: ApiSpec, specUrl: string): string {
  const server = spec.servers?.[0]?.url;
  if (server) {
    return stripTrailingSlash(new URL(server, specUrl).toString());
  }
  if (spec.host) {
    const scheme = spec.schemes?.[0] ?? 'https';
    return stripTrailingSlash(`${scheme}://${spec.host}${spec.basePath ?? ''}`);
  }
  return stripTrailingSlash(new URL(spec.basePath || '/', specUrl).toString());
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}

/**
 * Path whose operations accept every expected filter name
 */
export function findSearchPath(
  paths: ApiSpec['paths'],
  filterNames: readonly string[] = REGISTRATION_FILTER_NAMES
): string | undefined {
  for (const [path, item] of Object.entries(paths)) {
    const shared = parameterNames(item);
    for (const method of HTTP_METHODS) {
      const operation = item[method];
      if (operation === undefined) {
        continue;
      }
      const names = new Set([...shared, ...parameterNames(operation)]);
      if (filterNames.every(name => names.has(name))) {
        return path;
      }
    }
  }
  return undefined;
}

/**
 * Declared detail path (rewritten to the business id placeholder), or a guess
 * built from the search path
 */
export function findDetailPath(paths: ApiSpec['paths'], searchPath: string): string {
  const withPlaceholder = Object.keys(paths).filter(path => PLACEHOLDER_RE.test(path));
  const preferred =
    withPlaceholder.find(path => path.startsWith(searchPath)) ?? withPlaceholder[0];

  if (preferred) {
    return preferred.replace(PLACEHOLDER_RE, BUSINESS_ID_PLACEHOLDER);
  }

  return `${searchPath.replace(/\/+$/, '')}/${BUSINESS_ID_PLACEHOLDER}`;
}

/**
 * Derive an endpoint descriptor from a parsed API specification
 */
export function descriptorFromSpec(
  document: unknown,
  specUrl: string,
  filterNames: readonly string[] = REGISTRATION_FILTER_NAMES
): EndpointDescriptor | undefined {
  const parsed = ApiSpecSchema.safeParse(document);
  if (!parsed.success) {
    return undefined;
  }

  const searchPath = findSearchPath(parsed.data.paths, filterNames);
  if (searchPath === undefined) {
    return undefined;
  }

  return {
    baseUrl: declaredBaseUrl(parsed.data, specUrl),
    searchPath,
    detailPathTemplate: findDetailPath(parsed.data.paths, searchPath),
  };
}

export class SpecDiscoveryStrategy {
  constructor(
    private http: HttpClient,
    private portals: readonly string[] = DOCUMENTATION_PORTALS,
    private filterNames: readonly string[] = REGISTRATION_FILTER_NAMES
  ) {}

  /**
   * Returns undefined when no portal leads to a usable specification
   */
  async discover(): Promise<EndpointDescriptor | undefined> {
    for (const portal of this.portals) {
      try {
        const html = await this.http.getText(portal);
        const specUrl = findSpecUrl(html, portal);
        if (!specUrl) {
          logger.debug('No specification URL on documentation page', { portal });
          continue;
        }

        const document = await this.http.getJson(specUrl);
        const descriptor = descriptorFromSpec(document, specUrl, this.filterNames);
        if (descriptor) {
          logger.info('Registry endpoint discovered from API specification', { portal, specUrl, ...descriptor });
          return descriptor;
        }
        logger.debug('Specification has no matching search operation', { specUrl });
      } catch (error) {
        logger.debug('Specification discovery failed for portal', { portal, error: errorMessage(error) });
      }
    }
    return undefined;
  }
}
