/**
 * Reverse-geocode adapter backed by Nominatim
 */

import { z } from 'zod';
import { HttpClient } from '../http/client.js';
import { sleep } from '../util/backoff.js';
import { logger } from '../util/logger.js';
import { errorMessage } from '../types.js';

export const NOMINATIM_REVERSE_URL = 'https://nominatim.openstreetmap.org/reverse';

// Nominatim usage policy allows one request per second
export const NOMINATIM_MIN_INTERVAL_MS = 1000;

const NOMINATIM_TIMEOUT_MS = 20_000;

const ReverseResponseSchema = z.object({
  display_name: z.string().optional(),
});

/**
 * Enforces a minimum interval between consecutive calls
 */
export class Throttle {
  private lastCall: number | undefined;

  constructor(
    private intervalMs: number,
    private wait: (ms: number) => Promise<void> = sleep,
    private now: () => number = Date.now
  ) {}

  async acquire(): Promise<void> {
    if (this.lastCall !== undefined) {
      const elapsed = this.now() - this.lastCall;
      if (elapsed < this.intervalMs) {
        await this.wait(this.intervalMs - elapsed);
      }
    }
    this.lastCall = this.now();
  }
}

export class NominatimAdapter {
  private http: HttpClient;

  constructor(
    private userAgent: string,
    private throttle: Throttle = new Throttle(NOMINATIM_MIN_INTERVAL_MS),
    http?: HttpClient,
    private endpoint: string = NOMINATIM_REVERSE_URL
  ) {
    // One attempt per call, paced by the throttle
    this.http = http ?? new HttpClient({ userAgent, timeoutMs: NOMINATIM_TIMEOUT_MS, retry: { maxRetries: 0 } });
  }

  /**
   * Resolve coordinates to a free-text address. Best-effort: any failure
   * yields undefined.
   */
  async reverse(lat: number, lon: number): Promise<string | undefined> {
    await this.throttle.acquire();

    try {
      const body = await this.http.getJson(
        this.endpoint,
        { lat, lon, format: 'jsonv2' },
        { 'User-Agent': this.userAgent }
      );
      const parsed = ReverseResponseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn('Malformed reverse-geocode response', { lat, lon });
        return undefined;
      }
      return parsed.data.display_name?.trim() || undefined;
    } catch (error) {
      logger.warn('Reverse geocoding failed', { lat, lon, error: errorMessage(error) });
      return undefined;
    }
  }
}
