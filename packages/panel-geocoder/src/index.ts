/**
 * Panel Geocoder
 *
 * Resilient, cache-backed geocoding for healthcare provider panels.
 *
 * @example
 * ```typescript
 * import {
 *   FallbackResolver,
 *   NominatimGeocoder,
 *   RateLimitedGeocodeClient,
 *   SqliteResolutionCache,
 *   runPipeline,
 *   readRecords,
 *   withResolutionCache,
 * } from 'panel-geocoder';
 *
 * const records = await readRecords('providers.csv');
 * const client = new RateLimitedGeocodeClient(
 *   new NominatimGeocoder({ userAgent: 'clinic-map/1.0 (ops@example.org)' })
 * );
 *
 * const result = await withResolutionCache(
 *   () => new SqliteResolutionCache('cache.db'),
 *   (cache) => runPipeline(records, { resolver: new FallbackResolver({ client, cache }) })
 * );
 * ```
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  HTTPClient,
  HTTPRequestError,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  HTTPJSONParseError,
} from './core/http-client.js';
export type { HTTPClientConfig, FetchOptions } from './core/http-client.js';
export { Logger, logger, createLogger } from './core/utils/logger.js';

// Normalization
export { normalizeAddress, SUFFIX_COMPRESSIONS } from './normalization/address-normalizer.js';
export { isVirtualProvider, VIRTUAL_KEYWORDS } from './normalization/virtual-classifier.js';
export {
  buildGeocodeQuery,
  buildTownQuery,
  DEFAULT_COUNTRY,
  type QueryParts,
} from './normalization/geocode-query.js';

// Resilience
export { RateGate, createRateGate } from './resilience/rate-limiter.js';
export { RetryExecutor, RetryExhaustedError, createFixedBackoffRetry, fixedBackoff } from './resilience/retry.js';
export type * from './resilience/types.js';
export { defaultSleep, defaultClock } from './resilience/types.js';

// Providers
export type { GeocodeProvider, GeocodeClient } from './providers/types.js';
export { NominatimGeocoder, NOMINATIM_PUBLIC_URL, type NominatimConfig } from './providers/nominatim-geocoder.js';
export { RateLimitedGeocodeClient, type GeocodeClientStats } from './providers/rate-limited-client.js';

// Persistence
export * from './persistence/resolution-cache.js';
export { SqliteResolutionCache } from './persistence/sqlite-resolution-cache.js';
export { JsonFileResolutionCache } from './persistence/json-file-resolution-cache.js';
export { openResolutionCache, openInspectableCache, type OpenCacheOptions } from './persistence/open-cache.js';

// Services
export * from './services/fallback-resolver.js';
export * from './services/pipeline-driver.js';
export * from './services/run-summary.js';

// IO
export * from './io/record-source.js';
export * from './io/result-sink.js';
