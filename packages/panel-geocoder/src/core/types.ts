/**
 * Panel Geocoder Core Types
 *
 * Shared types for address records, geocoding results and resolution
 * outcomes. Outcomes are a discriminated union on `source` so that a
 * record carries exactly one variant.
 *
 * @module core/types
 */

// ============================================================================
// Geographic Primitives
// ============================================================================

/**
 * WGS84 coordinate pair returned by a geocoding provider
 */
export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

// ============================================================================
// Address Records
// ============================================================================

/**
 * Column names of the provider panel source
 */
export const RECORD_COLUMNS = {
  physicalAddress: 'Physical Address',
  town: 'Town',
  county: 'County',
  status: 'Status',
  name: 'Name',
  specialty: 'Specialty',
  phone: 'Phone',
  email: 'Email',
} as const;

export type RecordField = keyof typeof RECORD_COLUMNS;

/**
 * Columns the geocoder appends. On input they are ignored, so a previous
 * run's output can be geocoded again.
 */
export const GEO_COLUMNS = ['Latitude', 'Longitude', 'GeoSource', 'GeoConfidence'] as const;

/**
 * Address record as read from the record source.
 *
 * Only physicalAddress, town and county feed resolution; the rest pass
 * through to the sink untouched.
 */
export interface AddressRecord {
  readonly physicalAddress: string | null;
  readonly town: string;
  readonly county: string;
  readonly status: string;
  readonly name: string;
  readonly specialty: string;
  readonly phone: string;
  readonly email: string;
  /** Source columns outside RECORD_COLUMNS, keyed by header */
  readonly extra: Readonly<Record<string, string>>;
}

// ============================================================================
// Resolution Outcomes
// ============================================================================

export type GeoSource = 'PHYSICAL' | 'TOWN_CENTROID' | 'VIRTUAL' | 'FAILED';

export type GeoConfidence = 'STREET' | 'TOWN_CENTROID' | 'N/A' | 'FAILED';

export interface PhysicalOutcome {
  readonly source: 'PHYSICAL';
  readonly confidence: 'STREET';
  readonly latitude: number;
  readonly longitude: number;
}

export interface TownCentroidOutcome {
  readonly source: 'TOWN_CENTROID';
  readonly confidence: 'TOWN_CENTROID';
  readonly latitude: number;
  readonly longitude: number;
}

export interface VirtualOutcome {
  readonly source: 'VIRTUAL';
  readonly confidence: 'N/A';
  readonly latitude: null;
  readonly longitude: null;
}

export interface FailedOutcome {
  readonly source: 'FAILED';
  readonly confidence: 'FAILED';
  readonly latitude: null;
  readonly longitude: null;
}

/**
 * Final result of geocoding one record
 */
export type ResolutionOutcome =
  | PhysicalOutcome
  | TownCentroidOutcome
  | VirtualOutcome
  | FailedOutcome;

/**
 * Outcomes that may be written to the resolution cache.
 * Virtual records never reach the cache.
 */
export type CacheableOutcome = Exclude<ResolutionOutcome, VirtualOutcome>;

export function physicalOutcome(coords: Coordinates): PhysicalOutcome {
  return {
    source: 'PHYSICAL',
    confidence: 'STREET',
    latitude: coords.latitude,
    longitude: coords.longitude,
  };
}

export function townCentroidOutcome(coords: Coordinates): TownCentroidOutcome {
  return {
    source: 'TOWN_CENTROID',
    confidence: 'TOWN_CENTROID',
    latitude: coords.latitude,
    longitude: coords.longitude,
  };
}

export const VIRTUAL_OUTCOME: VirtualOutcome = {
  source: 'VIRTUAL',
  confidence: 'N/A',
  latitude: null,
  longitude: null,
};

export const FAILED_OUTCOME: FailedOutcome = {
  source: 'FAILED',
  confidence: 'FAILED',
  latitude: null,
  longitude: null,
};

// ============================================================================
// Enriched Records (sink input)
// ============================================================================

/**
 * Address record with resolution fields appended
 */
export interface EnrichedRecord extends AddressRecord {
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly geoSource: GeoSource;
  readonly geoConfidence: GeoConfidence;
}

export function enrichRecord(
  record: AddressRecord,
  outcome: ResolutionOutcome
): EnrichedRecord {
  return {
    ...record,
    latitude: outcome.latitude,
    longitude: outcome.longitude,
    geoSource: outcome.source,
    geoConfidence: outcome.confidence,
  };
}
