/**
 * Geocoding provider contracts.
 */

import type { Coordinates } from '../core/types.js';

/**
 * External geocoding service: free-text query in, optional coordinates out.
 *
 * Returns null when the provider answered but found nothing; throws for
 * transport and provider errors.
 */
export interface GeocodeProvider {
  readonly name: string;
  geocode(query: string): Promise<Coordinates | null>;
}

/**
 * Lookup entry point used by the fallback resolver
 */
export interface GeocodeClient {
  lookup(query: string): Promise<Coordinates | null>;
}
