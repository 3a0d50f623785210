/**
 * Run Summary
 *
 * End-of-run metrics over enriched records: how many were mapped, how they
 * were resolved, and the active/inactive split per county.
 */

import type { EnrichedRecord, GeoSource } from '../core/types.js';

export interface CountySummary {
  readonly county: string;
  readonly total: number;
  readonly active: number;
  readonly inactive: number;
}

export interface RunSummary {
  readonly total: number;
  /** Records with coordinates */
  readonly mapped: number;
  readonly physicalActive: number;
  readonly centroidActive: number;
  readonly inactive: number;
  readonly bySource: Readonly<Record<GeoSource, number>>;
  /** Sorted by county name */
  readonly byCounty: readonly CountySummary[];
}

export function isActiveStatus(status: string): boolean {
  return status.trim().toLowerCase() === 'active';
}

export function summarizeRun(records: readonly EnrichedRecord[]): RunSummary {
  const bySource: Record<GeoSource, number> = {
    PHYSICAL: 0,
    TOWN_CENTROID: 0,
    VIRTUAL: 0,
    FAILED: 0,
  };
  const counties = new Map<string, { total: number; active: number; inactive: number }>();

  let mapped = 0;
  let physicalActive = 0;
  let centroidActive = 0;
  let inactive = 0;

  for (const record of records) {
    const active = isActiveStatus(record.status);
    bySource[record.geoSource]++;

    if (record.latitude !== null && record.longitude !== null) {
      mapped++;
    }

    if (!active) {
      inactive++;
    } else if (record.geoSource === 'PHYSICAL') {
      physicalActive++;
    } else if (record.geoSource === 'TOWN_CENTROID') {
      centroidActive++;
    }

    const county = counties.get(record.county) ?? { total: 0, active: 0, inactive: 0 };
    county.total++;
    if (active) {
      county.active++;
    } else {
      county.inactive++;
    }
    counties.set(record.county, county);
  }

  const byCounty = [...counties.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([county, counts]) => ({ county, ...counts }));

  return {
    total: records.length,
    mapped,
    physicalActive,
    centroidActive,
    inactive,
    bySource,
    byCounty,
  };
}
