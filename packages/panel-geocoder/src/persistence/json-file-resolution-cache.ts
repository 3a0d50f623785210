/**
 * JSON File Resolution Cache
 *
 * Whole cache in one JSON document, loaded on open and written back
 * atomically on close and after every `flushEvery` puts, so a killed run
 * loses at most that many outcomes. Suits small panels and environments
 * where a native SQLite build is not available.
 *
 * File format:
 * ```json
 * { "version": 1, "entries": { "<canonical query>": { "source": "PHYSICAL", ... } } }
 * ```
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { CacheableOutcome } from '../core/types.js';
import { CacheUnavailableError } from '../core/errors.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import { MemoryResolutionCache, parseCachedOutcome } from './resolution-cache.js';
import type { CacheBackend, CacheClearFilter } from './resolution-cache.js';

const log = createLogger({ module: 'json-cache' });

const CacheFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.unknown()),
});

export interface JsonFileCacheOptions {
  /** Puts between automatic flushes (default 25) */
  readonly flushEvery?: number;
}

const DEFAULT_FLUSH_EVERY = 25;

function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class JsonFileResolutionCache extends MemoryResolutionCache {
  override readonly backend: CacheBackend = 'json';
  readonly path: string;
  private readonly flushEvery: number;
  private dirty = false;
  private unflushedPuts = 0;
  private closed = false;

  private constructor(path: string, options: JsonFileCacheOptions) {
    super();
    this.path = path;
    this.flushEvery = Math.max(1, options.flushEvery ?? DEFAULT_FLUSH_EVERY);
  }

  /**
   * Load the cache file; a missing file starts an empty cache
   *
   * @throws {CacheUnavailableError} If the file exists but cannot be read or parsed
   */
  static async open(
    path: string,
    options: JsonFileCacheOptions = {}
  ): Promise<JsonFileResolutionCache> {
    const cache = new JsonFileResolutionCache(path, options);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFoundError(error)) {
        return cache;
      }
      throw new CacheUnavailableError(path, error);
    }

    let document: z.infer<typeof CacheFileSchema>;
    try {
      document = CacheFileSchema.parse(JSON.parse(text));
    } catch (error) {
      throw new CacheUnavailableError(path, error);
    }

    let skipped = 0;
    for (const [key, value] of Object.entries(document.entries)) {
      const outcome = parseCachedOutcome(value);
      if (outcome === null) {
        skipped++;
        continue;
      }
      cache.entries.set(key, outcome);
    }

    if (skipped > 0) {
      log.warn('Skipped malformed cache entries', { path, skipped });
    }

    return cache;
  }

  override async put(key: string, outcome: CacheableOutcome): Promise<void> {
    if (this.closed) {
      throw new Error(`JSON cache ${this.path} is closed`);
    }
    await super.put(key, outcome);
    this.dirty = true;
    this.unflushedPuts++;
    if (this.unflushedPuts >= this.flushEvery) {
      await this.flush();
    }
  }

  override async clear(filter?: CacheClearFilter): Promise<number> {
    const removed = await super.clear(filter);
    if (removed > 0) {
      this.dirty = true;
    }
    return removed;
  }

  /**
   * Write pending changes to disk
   */
  async flush(): Promise<void> {
    if (!this.dirty) {
      return;
    }

    await atomicWriteJSON(this.path, {
      version: 1,
      entries: Object.fromEntries(this.entries),
    });
    this.dirty = false;
    this.unflushedPuts = 0;
  }

  override async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    await this.flush();
    this.closed = true;
  }
}
