/**
 * Registry endpoint resolution: specification discovery first, then
 * brute-force probing of known base URL and path combinations
 */

import { HttpClient, joinUrl, type QueryParams } from '../http/client.js';
import { firstSuccess, AttemptsExhaustedError, type Attempt } from '../util/strategy.js';
import { logger } from '../util/logger.js';
import { SpecDiscoveryStrategy } from './spec-discovery.js';
import {
  BUSINESS_ID_PLACEHOLDER,
  HttpError,
  ResolutionError,
  errorMessage,
  type EndpointDescriptor,
} from '../types.js';

export const BASE_URL_CANDIDATES = [
  'https://avoindata.prh.fi/bis/v1',
  'https://avoindata.prh.fi/opendata-bis-api/v1',
  'https://avoindata.prh.fi',
] as const;

export const PATH_SUFFIX_CANDIDATES = ['', '/companies', '/bis/v1', '/tr/v1'] as const;

export interface EndpointResolverOptions {
  baseUrls?: readonly string[];
  pathSuffixes?: readonly string[];
  overrideBaseUrl?: string;
  discovery?: Pick<SpecDiscoveryStrategy, 'discover'>;
}

function descriptorFor(baseUrl: string, suffix: string): EndpointDescriptor {
  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    searchPath: suffix,
    detailPathTemplate: `${suffix}/${BUSINESS_ID_PLACEHOLDER}`,
  };
}

export class EndpointResolver {
  private cached: EndpointDescriptor | undefined;
  private discovery: Pick<SpecDiscoveryStrategy, 'discover'>;
  private baseUrls: readonly string[];
  private pathSuffixes: readonly string[];
  private overrideBaseUrl: string | undefined;

  constructor(private http: HttpClient, options: EndpointResolverOptions = {}) {
    this.discovery = options.discovery ?? new SpecDiscoveryStrategy(http);
    this.baseUrls = options.baseUrls ?? BASE_URL_CANDIDATES;
    this.pathSuffixes = options.pathSuffixes ?? PATH_SUFFIX_CANDIDATES;
    this.overrideBaseUrl = options.overrideBaseUrl;
  }

  /**
   * Resolve once per run; later calls return the cached descriptor
   */
  async resolve(checkParams: QueryParams): Promise<EndpointDescriptor> {
    if (this.cached) {
      return this.cached;
    }

    let descriptor: EndpointDescriptor | undefined;

    if (this.overrideBaseUrl) {
      logger.info('Registry base URL override set, skipping specification discovery', {
        baseUrl: this.overrideBaseUrl,
      });
      descriptor = await this.bruteForce([this.overrideBaseUrl], checkParams);
    } else {
      descriptor = await this.discovery.discover();
      if (!descriptor) {
        logger.info('Specification discovery found nothing, probing candidate endpoints');
        descriptor = await this.bruteForce(this.baseUrls, checkParams);
      }
    }

    this.cached = descriptor;
    return descriptor;
  }

  get descriptor(): EndpointDescriptor | undefined {
    return this.cached;
  }

  /**
   * Try base × suffix in order. "Not found" moves on; success or any other
   * error accepts the combination, since an existing path may still reject
   * this particular query.
   */
  private async bruteForce(
    baseUrls: readonly string[],
    checkParams: QueryParams
  ): Promise<EndpointDescriptor> {
    const attempts: Attempt<EndpointDescriptor>[] = [];

    for (const baseUrl of baseUrls) {
      for (const suffix of this.pathSuffixes) {
        const url = joinUrl(baseUrl, suffix);
        attempts.push({
          label: url,
          run: async () => {
            try {
              await this.http.getJson(url, checkParams);
              logger.debug('Registry endpoint check succeeded', { url });
            } catch (error) {
              if (error instanceof HttpError && error.isNotFound()) {
                throw error;
              }
              logger.warn('Registry endpoint check failed with a non-404 error, accepting endpoint', {
                url,
                error: errorMessage(error),
              });
            }
            return descriptorFor(baseUrl, suffix);
          },
        });
      }
    }

    try {
      const { value, label } = await firstSuccess(attempts, 'registry endpoint candidates');
      logger.info('Registry endpoint resolved by probing', { url: label, ...value });
      return value;
    } catch (error) {
      if (error instanceof AttemptsExhaustedError) {
        throw new ResolutionError(
          `Registry endpoint could not be resolved: ${error.message}`,
          error.failures.map(failure => failure.label)
        );
      }
      throw error;
    }
  }
}
