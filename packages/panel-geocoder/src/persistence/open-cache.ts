/**
 * Resolution cache factory.
 */

import { CacheUnavailableError } from '../core/errors.js';
import type { CacheBackend, InspectableResolutionCache, ResolutionCache } from './resolution-cache.js';
import { MemoryResolutionCache, NoopResolutionCache } from './resolution-cache.js';
import { JsonFileResolutionCache } from './json-file-resolution-cache.js';
import { SqliteResolutionCache } from './sqlite-resolution-cache.js';

export interface OpenCacheOptions {
  readonly backend: CacheBackend;
  /** Storage path for the sqlite and json backends */
  readonly path: string;
}

/**
 * Open the configured cache backend
 *
 * @throws {CacheUnavailableError} If the storage cannot be opened
 */
export async function openResolutionCache(options: OpenCacheOptions): Promise<ResolutionCache> {
  switch (options.backend) {
    case 'sqlite':
      return new SqliteResolutionCache(options.path);
    case 'json':
      return JsonFileResolutionCache.open(options.path);
    case 'memory':
      return new MemoryResolutionCache();
    case 'none':
      return new NoopResolutionCache();
  }
}

/**
 * Open a backend that supports stats and clearing
 *
 * @throws {CacheUnavailableError} For the 'none' backend, which stores nothing
 */
export async function openInspectableCache(
  options: OpenCacheOptions
): Promise<InspectableResolutionCache> {
  switch (options.backend) {
    case 'sqlite':
      return new SqliteResolutionCache(options.path);
    case 'json':
      return JsonFileResolutionCache.open(options.path);
    case 'memory':
      return new MemoryResolutionCache();
    case 'none':
      throw new CacheUnavailableError('none', new Error('the none backend has no stored entries'));
  }
}
