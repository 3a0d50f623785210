/**
 * Resolution Cache
 *
 * Persistent mapping from canonical query to a previously computed outcome.
 * Negative results (FAILED) are cached too, so a later run never re-asks
 * the provider about an address known to be unresolvable.
 *
 * ARCHITECTURE:
 * - One interface, several backends (SQLite, JSON file, memory, no-op)
 * - "No cache" is the no-op backend, not a separate pipeline
 * - Stored values are validated on read; a bad entry reads as a miss
 * - withResolutionCache() closes the cache on every exit path
 */

import { z } from 'zod';
import type { CacheableOutcome } from '../core/types.js';

// ============================================================================
// Contracts
// ============================================================================

export type CacheBackend = 'sqlite' | 'json' | 'memory' | 'none';

export const CACHE_BACKENDS: readonly CacheBackend[] = ['sqlite', 'json', 'memory', 'none'];

export interface ResolutionCache {
  readonly backend: CacheBackend;
  get(key: string): Promise<CacheableOutcome | null>;
  put(key: string, outcome: CacheableOutcome): Promise<void>;
  /** Flush pending writes and release storage. Idempotent. */
  close(): Promise<void>;
}

export interface CacheStats {
  readonly entries: number;
  readonly bySource: Readonly<Record<CacheableOutcome['source'], number>>;
}

export interface CacheClearFilter {
  /** Only remove entries with this source, e.g. FAILED */
  readonly source?: CacheableOutcome['source'];
}

/**
 * Administrative operations for the `cache` CLI commands
 */
export interface InspectableResolutionCache extends ResolutionCache {
  stats(): Promise<CacheStats>;
  /** @returns number of entries removed */
  clear(filter?: CacheClearFilter): Promise<number>;
}

// ============================================================================
// Stored Value Schema
// ============================================================================

const CoordinateSchema = z.number().finite();

export const CachedOutcomeSchema = z.discriminatedUnion('source', [
  z.object({
    source: z.literal('PHYSICAL'),
    confidence: z.literal('STREET'),
    latitude: CoordinateSchema,
    longitude: CoordinateSchema,
  }),
  z.object({
    source: z.literal('TOWN_CENTROID'),
    confidence: z.literal('TOWN_CENTROID'),
    latitude: CoordinateSchema,
    longitude: CoordinateSchema,
  }),
  z.object({
    source: z.literal('FAILED'),
    confidence: z.literal('FAILED'),
    latitude: z.null(),
    longitude: z.null(),
  }),
]);

export const CACHEABLE_SOURCES: readonly CacheableOutcome['source'][] = [
  'PHYSICAL',
  'TOWN_CENTROID',
  'FAILED',
];

export function isCacheableSource(value: string): value is CacheableOutcome['source'] {
  return CACHEABLE_SOURCES.some((source) => source === value);
}

/**
 * Validate a stored value
 *
 * @returns The outcome, or null if the value is not a cacheable outcome
 */
export function parseCachedOutcome(value: unknown): CacheableOutcome | null {
  const parsed = CachedOutcomeSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function emptySourceCounts(): Record<CacheableOutcome['source'], number> {
  return { PHYSICAL: 0, TOWN_CENTROID: 0, FAILED: 0 };
}

// ============================================================================
// In-process Backends
// ============================================================================

/**
 * Never stores anything: every lookup is a miss
 */
export class NoopResolutionCache implements ResolutionCache {
  readonly backend = 'none' as const;

  async get(): Promise<CacheableOutcome | null> {
    return null;
  }

  async put(): Promise<void> {
    // Nothing to store
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

/**
 * Process-local map. Lives for the lifetime of the instance only.
 */
export class MemoryResolutionCache implements InspectableResolutionCache {
  readonly backend: CacheBackend = 'memory';
  protected readonly entries = new Map<string, CacheableOutcome>();

  async get(key: string): Promise<CacheableOutcome | null> {
    return this.entries.get(key) ?? null;
  }

  async put(key: string, outcome: CacheableOutcome): Promise<void> {
    this.entries.set(key, outcome);
  }

  async close(): Promise<void> {
    // Nothing to release
  }

  async stats(): Promise<CacheStats> {
    const bySource = emptySourceCounts();
    for (const outcome of this.entries.values()) {
      bySource[outcome.source]++;
    }
    return { entries: this.entries.size, bySource };
  }

  async clear(filter: CacheClearFilter = {}): Promise<number> {
    let removed = 0;
    for (const [key, outcome] of this.entries) {
      if (filter.source === undefined || outcome.source === filter.source) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }
}

// ============================================================================
// Scoped Acquisition
// ============================================================================

/**
 * Open a cache, run `fn`, and close the cache however `fn` exits
 */
export async function withResolutionCache<C extends ResolutionCache, T>(
  open: () => Promise<C> | C,
  fn: (cache: C) => Promise<T>
): Promise<T> {
  const cache = await open();
  try {
    return await fn(cache);
  } finally {
    await cache.close();
  }
}

