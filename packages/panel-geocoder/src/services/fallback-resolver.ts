/**
 * Fallback Resolver
 *
 * Per-record resolution state machine. Orchestrates the cache, the
 * full-address tier and the town tier, and records every outcome it
 * computes (FAILED included) in the cache.
 *
 * STATES (all terminal, each yields an outcome):
 * - VIRTUAL_SHORT_CIRCUIT: virtual record, no cache or network access
 * - CACHE_HIT: outcome served verbatim from the cache
 * - ATTEMPT_FULL: full-address tier succeeded (PHYSICAL)
 * - ATTEMPT_TOWN: town tier succeeded (TOWN_CENTROID)
 * - FAILED: both tiers exhausted
 *
 * A tier attempt fails when the client throws or returns no result. Success
 * is the presence of a result, so (0, 0) is a legitimate coordinate.
 */

import type { CacheableOutcome, Coordinates, ResolutionOutcome } from '../core/types.js';
import {
  FAILED_OUTCOME,
  VIRTUAL_OUTCOME,
  physicalOutcome,
  townCentroidOutcome,
} from '../core/types.js';
import { NoResultError } from '../core/errors.js';
import { createLogger, type Logger } from '../core/utils/logger.js';
import type { GeocodeClient } from '../providers/types.js';
import { NoopResolutionCache, type ResolutionCache } from '../persistence/resolution-cache.js';
import { RetryExecutor, RetryExhaustedError, createFixedBackoffRetry } from '../resilience/retry.js';

// ============================================================================
// Types
// ============================================================================

export type ResolutionState =
  | 'VIRTUAL_SHORT_CIRCUIT'
  | 'CACHE_HIT'
  | 'ATTEMPT_FULL'
  | 'ATTEMPT_TOWN'
  | 'FAILED';

export type ResolutionTier = 'full' | 'town';

/**
 * Prepared input for one record
 */
export interface ResolutionRequest {
  readonly isVirtual: boolean;
  /** Canonical query: cache key and full-address tier input */
  readonly query: string;
  /** Coarser town + county query for the town tier */
  readonly townQuery: string;
}

export interface Resolution {
  readonly outcome: ResolutionOutcome;
  /** Terminal state that produced the outcome */
  readonly state: ResolutionState;
  /** Network lookups made for this record */
  readonly attempts: number;
}

export interface FallbackResolverOptions {
  readonly client: GeocodeClient;
  /** Defaults to the no-op cache */
  readonly cache?: ResolutionCache;
  /** Per-tier retry policy (default: 3 attempts, fixed 2 s) */
  readonly retry?: RetryExecutor;
  readonly logger?: Logger;
}

interface TierResult {
  readonly coordinates: Coordinates | null;
  readonly attempts: number;
}

// ============================================================================
// Fallback Resolver
// ============================================================================

export class FallbackResolver {
  private readonly client: GeocodeClient;
  private readonly cache: ResolutionCache;
  private readonly retry: RetryExecutor;
  private readonly log: Logger;

  constructor(options: FallbackResolverOptions) {
    this.client = options.client;
    this.cache = options.cache ?? new NoopResolutionCache();
    this.retry = options.retry ?? createFixedBackoffRetry();
    this.log = options.logger ?? createLogger({ module: 'fallback-resolver' });
  }

  async resolve(request: ResolutionRequest): Promise<Resolution> {
    if (request.isVirtual) {
      return { outcome: VIRTUAL_OUTCOME, state: 'VIRTUAL_SHORT_CIRCUIT', attempts: 0 };
    }

    const cached = await this.readCache(request.query);
    if (cached !== null) {
      return { outcome: cached, state: 'CACHE_HIT', attempts: 0 };
    }

    const full = await this.attemptTier('full', request.query);
    if (full.coordinates !== null) {
      const outcome = physicalOutcome(full.coordinates);
      await this.writeCache(request.query, outcome);
      return { outcome, state: 'ATTEMPT_FULL', attempts: full.attempts };
    }

    const town = await this.attemptTier('town', request.townQuery);
    const attempts = full.attempts + town.attempts;
    if (town.coordinates !== null) {
      const outcome = townCentroidOutcome(town.coordinates);
      await this.writeCache(request.query, outcome);
      return { outcome, state: 'ATTEMPT_TOWN', attempts };
    }

    this.log.warn('Geocoding failed for both tiers', { query: request.query, attempts });
    await this.writeCache(request.query, FAILED_OUTCOME);
    return { outcome: FAILED_OUTCOME, state: 'FAILED', attempts };
  }

  private async attemptTier(tier: ResolutionTier, query: string): Promise<TierResult> {
    let attempts = 0;

    try {
      const coordinates = await this.retry.execute(async () => {
        attempts++;
        const result = await this.client.lookup(query);
        if (result === null) {
          throw new NoResultError(query);
        }
        return result;
      });

      return { coordinates, attempts };
    } catch (error) {
      if (!(error instanceof RetryExhaustedError)) {
        throw error;
      }

      this.log.debug('Tier exhausted', {
        tier,
        query,
        attempts,
        lastError: error.lastError.message,
      });
      return { coordinates: null, attempts };
    }
  }

  /**
   * A failed read is a miss: the record is resolved from the network instead
   */
  private async readCache(key: string): Promise<CacheableOutcome | null> {
    try {
      return await this.cache.get(key);
    } catch (error) {
      this.log.warn('Cache read failed, treating as miss', {
        query: key,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * A failed write leaves the outcome uncached; the record still resolves
   */
  private async writeCache(key: string, outcome: CacheableOutcome): Promise<void> {
    try {
      await this.cache.put(key, outcome);
    } catch (error) {
      this.log.warn('Cache write failed', {
        query: key,
        source: outcome.source,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
