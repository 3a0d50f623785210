import { describe, it, expect, vi } from 'vitest';
import type { AddressRecord, Coordinates, EnrichedRecord } from '../../../core/types.js';
import { Logger } from '../../../core/utils/logger.js';
import type { ResultSink } from '../../../io/result-sink.js';
import { MemoryResolutionCache } from '../../../persistence/resolution-cache.js';
import { createFixedBackoffRetry } from '../../../resilience/retry.js';
import { FallbackResolver } from '../../../services/fallback-resolver.js';
import {
  planPipeline,
  prepareRecord,
  runPipeline,
  type PipelineProgress,
} from '../../../services/pipeline-driver.js';

const silentLogger = new Logger({ level: 'error', service: 'test', pretty: true });

function record(overrides: Partial<AddressRecord>): AddressRecord {
  return {
    physicalAddress: '12 Moi Avenue',
    town: 'Nairobi',
    county: 'Nairobi',
    status: 'Active',
    name: 'Test Clinic',
    specialty: 'General Practice',
    phone: '0700000000',
    email: 'clinic@example.com',
    extra: {},
    ...overrides,
  };
}

class CollectingSink implements ResultSink {
  readonly written: EnrichedRecord[] = [];
  closed = false;

  async write(enriched: EnrichedRecord): Promise<void> {
    this.written.push(enriched);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

const CBD: Coordinates = { latitude: -1.2833, longitude: 36.8167 };
const NAKURU: Coordinates = { latitude: -0.3031, longitude: 36.08 };

describe('prepareRecord', () => {
  it('normalizes the address and builds both queries', () => {
    const prepared = prepareRecord(
      record({ physicalAddress: '3rd Floor, Near City Mall, Moi Avenue', town: ' Nairobi ' })
    );

    expect(prepared.record.physicalAddress).toBe(', nr city mall, moi ave');
    expect(prepared.record.town).toBe('Nairobi');
    expect(prepared.request).toEqual({
      isVirtual: false,
      query: ', nr city mall, moi ave, Nairobi, Nairobi, Kenya',
      townQuery: 'Nairobi, Nairobi, Kenya',
    });
  });

  it('classifies virtual providers', () => {
    const prepared = prepareRecord(record({ physicalAddress: 'Telehealth Services' }));
    expect(prepared.request.isVirtual).toBe(true);
  });

  it('treats a missing address as an empty string', () => {
    const prepared = prepareRecord(record({ physicalAddress: null, town: 'Thika', county: 'Kiambu' }));
    expect(prepared.request.query).toBe(', Thika, Kiambu, Kenya');
  });
});

describe('runPipeline', () => {
  function createResolver(cache = new MemoryResolutionCache()) {
    const lookup = vi.fn(async (query: string): Promise<Coordinates | null> => {
      if (query.startsWith('12 moi ave')) return CBD;
      if (query === 'Nakuru, Nakuru, Kenya') return NAKURU;
      return null;
    });

    const resolver = new FallbackResolver({
      client: { lookup },
      cache,
      retry: createFixedBackoffRetry({ sleep: async () => undefined }),
      logger: silentLogger,
    });

    return { resolver, lookup, cache };
  }

  const records: AddressRecord[] = [
    record({ name: 'A' }),
    record({ name: 'B', physicalAddress: 'Online consultations only' }),
    record({ name: 'C', status: 'Inactive' }),
    record({ name: 'D', physicalAddress: 'Unknown Lane', town: 'Nakuru', county: 'Nakuru' }),
  ];

  it('enriches every record in input order', async () => {
    const { resolver } = createResolver();
    const sink = new CollectingSink();

    const result = await runPipeline(records, { resolver, sink, logger: silentLogger });

    expect(sink.written.map((r) => r.name)).toEqual(['A', 'B', 'C', 'D']);
    expect(result.records).toEqual(sink.written);
    expect(result.records.map((r) => r.geoSource)).toEqual([
      'PHYSICAL',
      'VIRTUAL',
      'PHYSICAL',
      'TOWN_CENTROID',
    ]);
    expect(result.records[3]).toMatchObject({
      physicalAddress: 'unknown lane',
      latitude: -0.3031,
      longitude: 36.08,
      geoConfidence: 'TOWN_CENTROID',
    });
    // The pipeline writes; closing is the caller's job
    expect(sink.closed).toBe(false);
  });

  it('resolves a telehealth provider without calling the client', async () => {
    const { resolver, lookup } = createResolver();

    const result = await runPipeline(
      [record({ name: 'E', physicalAddress: 'Telehealth - Online Consultation' })],
      { resolver, logger: silentLogger }
    );

    expect(lookup).not.toHaveBeenCalled();
    expect(result.networkAttempts).toBe(0);
    expect(result.records[0]).toMatchObject({
      physicalAddress: 'telehealth - online consultation',
      latitude: null,
      longitude: null,
      geoSource: 'VIRTUAL',
      geoConfidence: 'N/A',
    });
  });

  it('counts states and network attempts', async () => {
    const { resolver, lookup } = createResolver();

    const result = await runPipeline(records, { resolver, logger: silentLogger });

    expect(result.states).toEqual({
      VIRTUAL_SHORT_CIRCUIT: 1,
      CACHE_HIT: 1,
      ATTEMPT_FULL: 1,
      ATTEMPT_TOWN: 1,
      FAILED: 0,
    });
    // A: 1, C: cache hit, D: 3 full + 1 town
    expect(result.networkAttempts).toBe(5);
    expect(lookup).toHaveBeenCalledTimes(5);
  });

  it('summarizes the run', async () => {
    const { resolver } = createResolver();

    const { summary } = await runPipeline(records, { resolver, logger: silentLogger });

    expect(summary).toEqual({
      total: 4,
      mapped: 3,
      physicalActive: 1,
      centroidActive: 1,
      inactive: 1,
      bySource: { PHYSICAL: 2, TOWN_CENTROID: 1, VIRTUAL: 1, FAILED: 0 },
      byCounty: [
        { county: 'Nairobi', total: 3, active: 2, inactive: 1 },
        { county: 'Nakuru', total: 1, active: 1, inactive: 0 },
      ],
    });
  });

  it('reports progress after each record', async () => {
    const { resolver } = createResolver();
    const progress: PipelineProgress[] = [];

    await runPipeline(records.slice(0, 2), {
      resolver,
      logger: silentLogger,
      onProgress: (p) => progress.push(p),
    });

    expect(progress).toEqual([
      {
        current: 1,
        total: 2,
        state: 'ATTEMPT_FULL',
        query: '12 moi ave, Nairobi, Nairobi, Kenya',
      },
      {
        current: 2,
        total: 2,
        state: 'VIRTUAL_SHORT_CIRCUIT',
        query: 'online consultations only, Nairobi, Nairobi, Kenya',
      },
    ]);
  });

  it('keeps going when a record fails', async () => {
    const { resolver } = createResolver();

    const result = await runPipeline(
      [record({ name: 'X', physicalAddress: 'Nowhere', town: 'Atlantis' }), record({ name: 'Y' })],
      { resolver, logger: silentLogger }
    );

    expect(result.records.map((r) => r.geoSource)).toEqual(['FAILED', 'PHYSICAL']);
    expect(result.records[0]).toMatchObject({ latitude: null, longitude: null, geoConfidence: 'FAILED' });
  });
});

describe('planPipeline', () => {
  it('counts virtual and cached records and lists distinct pending queries', async () => {
    const cache = new MemoryResolutionCache();
    await cache.put('12 moi ave, Nairobi, Nairobi, Kenya', {
      source: 'PHYSICAL',
      confidence: 'STREET',
      latitude: CBD.latitude,
      longitude: CBD.longitude,
    });

    const plan = await planPipeline(
      [
        record({ name: 'A' }),
        record({ name: 'B', physicalAddress: 'Virtual clinic' }),
        record({ name: 'C', physicalAddress: 'Biashara Street', town: 'Nakuru', county: 'Nakuru' }),
        record({ name: 'D', physicalAddress: 'Biashara Street', town: 'Nakuru', county: 'Nakuru' }),
      ],
      cache
    );

    expect(plan).toEqual({
      total: 4,
      virtual: 1,
      cached: 1,
      pendingQueries: ['biashara st, Nakuru, Nakuru, Kenya'],
    });
  });
});
