/**
 * Pipeline Driver
 *
 * Runs each record through normalize -> classify -> build query -> resolve
 * -> enrich -> sink, strictly in input order. Records are independent: a
 * record that cannot be geocoded still gets a FAILED outcome and the run
 * continues.
 *
 * @module services/pipeline-driver
 */

import type { AddressRecord, EnrichedRecord } from '../core/types.js';
import { enrichRecord } from '../core/types.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import { normalizeAddress } from '../normalization/address-normalizer.js';
import { isVirtualProvider } from '../normalization/virtual-classifier.js';
import { DEFAULT_COUNTRY, buildGeocodeQuery, buildTownQuery } from '../normalization/geocode-query.js';
import type { ResolutionCache } from '../persistence/resolution-cache.js';
import type { ResultSink } from '../io/result-sink.js';
import type { Resolution, ResolutionRequest, ResolutionState } from './fallback-resolver.js';
import { summarizeRun, type RunSummary } from './run-summary.js';

// ============================================================================
// Types
// ============================================================================

export interface Resolver {
  resolve(request: ResolutionRequest): Promise<Resolution>;
}

/**
 * Record after normalization, with its resolution request
 */
export interface PreparedRecord {
  /** Address normalized; town and county trimmed */
  readonly record: AddressRecord;
  readonly request: ResolutionRequest;
}

export interface PipelineProgress {
  readonly current: number;
  readonly total: number;
  readonly state: ResolutionState;
  readonly query: string;
}

export interface PipelineOptions {
  readonly resolver: Resolver;
  readonly sink?: ResultSink;
  /** Country appended to every query (default: Kenya) */
  readonly country?: string;
  readonly onProgress?: (progress: PipelineProgress) => void;
  readonly logger?: Logger;
}

export interface PipelineResult {
  readonly records: readonly EnrichedRecord[];
  readonly summary: RunSummary;
  readonly states: Readonly<Record<ResolutionState, number>>;
  /** Total network lookups made during the run */
  readonly networkAttempts: number;
}

/**
 * What a run would do, computed without network access
 */
export interface PipelinePlan {
  readonly total: number;
  readonly virtual: number;
  readonly cached: number;
  /** Distinct canonical queries that would go to the provider */
  readonly pendingQueries: readonly string[];
}

// ============================================================================
// Record Preparation
// ============================================================================

export function prepareRecord(
  record: AddressRecord,
  country: string = DEFAULT_COUNTRY
): PreparedRecord {
  const address = normalizeAddress(record.physicalAddress);
  const town = record.town.trim();
  const county = record.county.trim();

  return {
    record: { ...record, physicalAddress: address, town, county },
    request: {
      isVirtual: isVirtualProvider(address),
      query: buildGeocodeQuery({ address, town, county }, country),
      townQuery: buildTownQuery({ town, county }, country),
    },
  };
}

function emptyStateCounts(): Record<ResolutionState, number> {
  return {
    VIRTUAL_SHORT_CIRCUIT: 0,
    CACHE_HIT: 0,
    ATTEMPT_FULL: 0,
    ATTEMPT_TOWN: 0,
    FAILED: 0,
  };
}

// ============================================================================
// Pipeline
// ============================================================================

export async function runPipeline(
  records: readonly AddressRecord[],
  options: PipelineOptions
): Promise<PipelineResult> {
  const log = options.logger ?? createLogger({ module: 'pipeline' });
  const country = options.country ?? DEFAULT_COUNTRY;
  const states = emptyStateCounts();
  const enriched: EnrichedRecord[] = [];
  let networkAttempts = 0;

  log.info('Pipeline started', { records: records.length, country });

  for (const [index, raw] of records.entries()) {
    const prepared = prepareRecord(raw, country);
    const resolution = await options.resolver.resolve(prepared.request);

    states[resolution.state]++;
    networkAttempts += resolution.attempts;

    const record = enrichRecord(prepared.record, resolution.outcome);
    enriched.push(record);

    if (options.sink) {
      await options.sink.write(record);
    }

    options.onProgress?.({
      current: index + 1,
      total: records.length,
      state: resolution.state,
      query: prepared.request.query,
    });
  }

  const summary = summarizeRun(enriched);

  log.info('Pipeline finished', {
    input: summary.total,
    mapped: summary.mapped,
    physicalActive: summary.physicalActive,
    centroidActive: summary.centroidActive,
    inactive: summary.inactive,
    networkAttempts,
  });

  return { records: enriched, summary, states, networkAttempts };
}

/**
 * Classify records and probe the cache without touching the network
 */
export async function planPipeline(
  records: readonly AddressRecord[],
  cache: ResolutionCache,
  country: string = DEFAULT_COUNTRY
): Promise<PipelinePlan> {
  let virtual = 0;
  let cached = 0;
  const pending = new Set<string>();

  for (const raw of records) {
    const { request } = prepareRecord(raw, country);

    if (request.isVirtual) {
      virtual++;
    } else if ((await cache.get(request.query)) !== null) {
      cached++;
    } else {
      pending.add(request.query);
    }
  }

  return {
    total: records.length,
    virtual,
    cached,
    pendingQueries: [...pending],
  };
}
