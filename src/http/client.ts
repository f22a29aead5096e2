/**
 * JSON-over-HTTP client with per-request timeout and retry logic
 */

import { withBackoff, parseRetryAfter, rateLimitDelayMs, type BackoffOptions } from '../util/backoff.js';
import { logger } from '../util/logger.js';
import { HttpError, errorMessage } from '../types.js';

/**
 * Default request timeout in milliseconds
 */
const DEFAULT_TIMEOUT = 30000;

const DEFAULT_USER_AGENT = 'openings-radar/1.0';

const SENSITIVE_HEADERS = ['x-goog-api-key', 'authorization'];

export type QueryParams = Record<string, string | number | boolean | null | undefined>;

export interface RequestOptions {
  method?: 'GET' | 'POST';
  params?: QueryParams;
  headers?: Record<string, string>;
  json?: unknown;
  form?: Record<string, string>;
  timeoutMs?: number;
}

export interface HttpClientOptions {
  timeoutMs?: number;
  userAgent?: string;
  retry?: BackoffOptions;
  fetchImpl?: typeof fetch;
}

export class HttpClient {
  private timeout: number;
  private userAgent: string;
  private retry: BackoffOptions;
  private fetchImpl: typeof fetch;

  constructor(options: HttpClientOptions = {}) {
    this.timeout = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.retry = {
      maxRetries: 2,
      initialDelayMs: 1000,
      maxDelayMs: 30000,
      ...options.retry,
    };
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Request a URL and parse the body as JSON
   */
  async requestJson(url: string, options: RequestOptions = {}): Promise<unknown> {
    const body = await this.request(url, options, 'application/json');
    try {
      return JSON.parse(body);
    } catch (error) {
      throw new HttpError(`Malformed JSON response: ${errorMessage(error)}`, url);
    }
  }

  async getJson(url: string, params?: QueryParams, headers?: Record<string, string>): Promise<unknown> {
    return this.requestJson(url, { method: 'GET', params, headers });
  }

  async postJson(url: string, json: unknown, headers?: Record<string, string>): Promise<unknown> {
    return this.requestJson(url, { method: 'POST', json, headers });
  }

  async getText(url: string, params?: QueryParams): Promise<string> {
    return this.request(url, { method: 'GET', params }, 'text/html, */*');
  }

  private async request(url: string, options: RequestOptions, accept: string): Promise<string> {
    const fullUrl = buildUrl(url, options.params);
    const method = options.method ?? 'GET';
    const headers: Record<string, string> = {
      Accept: accept,
      'User-Agent': this.userAgent,
      ...options.headers,
    };

    let body: string | undefined;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    } else if (options.form) {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(options.form).toString();
    }

    const timeout = options.timeoutMs ?? this.timeout;

    logger.debug('Making HTTP request', { method, url: fullUrl, headers: sanitizeHeaders(headers) });

    return withBackoff(async () => {
      const controller = new AbortController();
      const timeoutId = setTimeout(() => controller.abort(), timeout);

      try {
        const response = await this.fetchImpl(fullUrl, {
          method,
          headers,
          body,
          signal: controller.signal,
        });

        if (response.status === 429) {
          const retryAfter = response.headers.get('Retry-After');
          const retrySeconds = retryAfter ? parseRetryAfter(retryAfter) : undefined;

          throw new HttpError('Rate limited', fullUrl, 429, retrySeconds);
        }

        if (!response.ok) {
          const errorText = await response.text().catch(() => 'Unknown error');
          throw new HttpError(
            `HTTP ${response.status}: ${errorText.slice(0, 200)}`,
            fullUrl,
            response.status
          );
        }

        const text = await response.text();

        logger.debug('HTTP request successful', {
          url: fullUrl,
          status: response.status,
          bytes: text.length,
        });

        return text;
      } catch (error) {
        if (error instanceof HttpError) {
          throw error;
        }

        if (error instanceof Error) {
          if (error.name === 'AbortError') {
            throw new HttpError(`Request timeout after ${timeout}ms`, fullUrl);
          }

          throw new HttpError(`Network error: ${error.message}`, fullUrl);
        }

        throw new HttpError(`Unknown error: ${String(error)}`, fullUrl);
      } finally {
        clearTimeout(timeoutId);
      }
    }, {
      ...this.retry,
      shouldRetry: (error) => error instanceof HttpError && error.isRetryable(),
      retryDelayMs: (error) =>
        error instanceof HttpError && error.statusCode === 429
          ? rateLimitDelayMs(error.retryAfter, this.retry)
          : undefined,
    });
  }
}

/**
 * Build full URL with query parameters
 */
export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) {
    return url;
  }

  const searchParams = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      searchParams.append(key, String(value));
    }
  }

  const query = searchParams.toString();
  if (!query) {
    return url;
  }

  return `${url}${url.includes('?') ? '&' : '?'}${query}`;
}

/**
 * Join a base URL and a path without doubling or dropping slashes
 */
export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, '');
  if (!path) {
    return base;
  }
  return `${base}${path.startsWith('/') ? path : `/${path}`}`;
}

/**
 * Sanitize headers for logging (remove credentials)
 */
function sanitizeHeaders(headers: Record<string, string>): Record<string, string> {
  const sanitized = { ...headers };
  for (const key of Object.keys(sanitized)) {
    if (SENSITIVE_HEADERS.includes(key.toLowerCase())) {
      sanitized[key] = '***';
    }
  }
  return sanitized;
}
