/**
 * Nominatim Geocoder
 *
 * Free-text search against an OpenStreetMap Nominatim instance.
 *
 * API Documentation: https://nominatim.org/release-docs/latest/api/Search/
 * Usage policy: https://operations.osmfoundation.org/policies/nominatim/
 *
 * REQUIREMENTS (public instance):
 * - A descriptive User-Agent identifying the application and a contact
 * - At most 1 request per second (enforced by RateGate, not here)
 */

import { z } from 'zod';
import type { Coordinates } from '../core/types.js';
import { ProviderResponseError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import type { GeocodeProvider } from './types.js';

export const NOMINATIM_PUBLIC_URL = 'https://nominatim.openstreetmap.org';

export interface NominatimConfig {
  readonly baseUrl: string;
  readonly userAgent: string;
  readonly timeoutMs: number;
  /** Restrict results to ISO 3166-1 alpha-2 codes, e.g. ['ke'] */
  readonly countryCodes?: readonly string[];
}

/**
 * One entry of a jsonv2 search response. Coordinates arrive as strings.
 */
const NominatimPlaceSchema = z
  .object({
    lat: z.string(),
    lon: z.string(),
    display_name: z.string().optional(),
  })
  .passthrough();

const NominatimSearchResponseSchema = z.array(NominatimPlaceSchema);

export class NominatimGeocoder implements GeocodeProvider {
  readonly name = 'nominatim';
  private readonly config: NominatimConfig;
  private readonly http: HTTPClient;

  constructor(config: Partial<NominatimConfig> & Pick<NominatimConfig, 'userAgent'>, http?: HTTPClient) {
    this.config = {
      baseUrl: NOMINATIM_PUBLIC_URL,
      timeoutMs: 10000,
      ...config,
    };
    this.http =
      http ??
      new HTTPClient({
        timeoutMs: this.config.timeoutMs,
        userAgent: this.config.userAgent,
      });
  }

  /**
   * Geocode a free-text query
   *
   * @returns First match, or null when the search is empty
   * @throws {ProviderResponseError} If the body is not a jsonv2 search result
   */
  async geocode(query: string): Promise<Coordinates | null> {
    const body = await this.http.fetchJSON(this.buildSearchUrl(query));
    const parsed = NominatimSearchResponseSchema.safeParse(body);

    if (!parsed.success) {
      throw new ProviderResponseError(
        query,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      );
    }

    const first = parsed.data[0];
    if (first === undefined) {
      return null;
    }

    const latitude = Number.parseFloat(first.lat);
    const longitude = Number.parseFloat(first.lon);

    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new ProviderResponseError(query, [`non-numeric coordinates: ${first.lat}, ${first.lon}`]);
    }

    return { latitude, longitude };
  }

  buildSearchUrl(query: string): string {
    const url = new URL(`${this.config.baseUrl.replace(/\/+$/, '')}/search`);
    url.searchParams.set('q', query);
    url.searchParams.set('format', 'jsonv2');
    url.searchParams.set('limit', '1');

    if (this.config.countryCodes && this.config.countryCodes.length > 0) {
      url.searchParams.set('countrycodes', this.config.countryCodes.join(','));
    }

    return url.toString();
  }
}
