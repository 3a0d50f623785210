/**
 * Rate-Limited Geocode Client
 *
 * Single entry point for outbound lookups. Every call goes through one
 * shared RateGate, so the provider sees at most one request in flight and
 * a minimum delay between request starts, however many callers share the
 * client. Errors are passed through unchanged; retrying is the resolver's
 * job.
 */

import type { Coordinates } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import { RateGate, createRateGate } from '../resilience/rate-limiter.js';
import type { GeocodeClient, GeocodeProvider } from './types.js';

const log = createLogger({ module: 'geocode-client' });

export interface GeocodeClientStats {
  readonly calls: number;
  readonly hits: number;
  readonly misses: number;
  readonly errors: number;
}

export class RateLimitedGeocodeClient implements GeocodeClient {
  private readonly provider: GeocodeProvider;
  private readonly gate: RateGate;
  private hits = 0;
  private misses = 0;
  private errors = 0;

  constructor(provider: GeocodeProvider, gate: RateGate = createRateGate()) {
    this.provider = provider;
    this.gate = gate;
  }

  async lookup(query: string): Promise<Coordinates | null> {
    try {
      const result = await this.gate.schedule(() => this.provider.geocode(query));

      if (result === null) {
        this.misses++;
        log.debug('No result', { provider: this.provider.name, query });
      } else {
        this.hits++;
      }

      return result;
    } catch (error) {
      this.errors++;
      log.debug('Lookup failed', {
        provider: this.provider.name,
        query,
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  getStats(): GeocodeClientStats {
    return {
      calls: this.gate.getStats().calls,
      hits: this.hits,
      misses: this.misses,
      errors: this.errors,
    };
  }
}
