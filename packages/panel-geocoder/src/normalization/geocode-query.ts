/**
 * Geocode query builders.
 *
 * The canonical query doubles as the resolution cache key, so it must stay
 * a pure function of the normalized address, town, county and country.
 */

export const DEFAULT_COUNTRY = 'Kenya';

export interface QueryParts {
  /** Already-normalized physical address */
  readonly address: string;
  readonly town: string;
  readonly county: string;
}

/**
 * Full-address query: "{address}, {town}, {county}, {country}"
 */
export function buildGeocodeQuery(parts: QueryParts, country: string = DEFAULT_COUNTRY): string {
  return `${parts.address}, ${parts.town.trim()}, ${parts.county.trim()}, ${country}`;
}

/**
 * Town-level query: "{town}, {county}, {country}"
 */
export function buildTownQuery(
  parts: Pick<QueryParts, 'town' | 'county'>,
  country: string = DEFAULT_COUNTRY
): string {
  return `${parts.town.trim()}, ${parts.county.trim()}, ${country}`;
}
