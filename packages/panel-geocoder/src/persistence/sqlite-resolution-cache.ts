/**
 * SQLite Resolution Cache
 *
 * Default durable backend: one table keyed by canonical query.
 *
 * ARCHITECTURE:
 * - Synchronous better-sqlite3, wrapped in the async cache interface
 * - WAL mode; every put is an upsert and is durable once it returns
 * - close() checkpoints and closes the handle; safe to call twice
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { CacheableOutcome } from '../core/types.js';
import { CacheUnavailableError } from '../core/errors.js';
import { createLogger } from '../core/utils/logger.js';
import type {
  CacheClearFilter,
  CacheStats,
  InspectableResolutionCache,
} from './resolution-cache.js';
import { emptySourceCounts, isCacheableSource, parseCachedOutcome } from './resolution-cache.js';

const log = createLogger({ module: 'sqlite-cache' });

// ============================================================================
// Database Row Types (internal)
// ============================================================================

interface CacheRow {
  readonly query: string;
  readonly source: string;
  readonly confidence: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly resolved_at: string;
}

interface SourceCountRow {
  readonly source: string;
  readonly count: number;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS geocode_cache (
    query TEXT PRIMARY KEY,
    source TEXT NOT NULL,
    confidence TEXT NOT NULL,
    latitude REAL,
    longitude REAL,
    resolved_at TEXT NOT NULL
  );
`;

// ============================================================================
// SQLite Resolution Cache
// ============================================================================

export class SqliteResolutionCache implements InspectableResolutionCache {
  readonly backend = 'sqlite' as const;
  readonly path: string;
  private readonly db: Database.Database;
  private readonly selectStmt: Database.Statement<[string], CacheRow>;
  private readonly upsertStmt: Database.Statement<
    [string, string, string, number | null, number | null, string]
  >;
  private closed = false;

  /**
   * Open (and create if needed) the cache database
   *
   * @param dbPath - File path, or ':memory:' for a throwaway cache
   * @throws {CacheUnavailableError} If the database cannot be opened
   */
  constructor(dbPath: string) {
    this.path = dbPath;

    try {
      if (dbPath !== ':memory:') {
        mkdirSync(dirname(dbPath), { recursive: true });
      }

      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.db.exec(SCHEMA_SQL);

      this.selectStmt = this.db.prepare<[string], CacheRow>(
        `SELECT query, source, confidence, latitude, longitude, resolved_at
           FROM geocode_cache WHERE query = ?`
      );
      this.upsertStmt = this.db.prepare<
        [string, string, string, number | null, number | null, string]
      >(
        `INSERT INTO geocode_cache (query, source, confidence, latitude, longitude, resolved_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(query) DO UPDATE SET
           source = excluded.source,
           confidence = excluded.confidence,
           latitude = excluded.latitude,
           longitude = excluded.longitude,
           resolved_at = excluded.resolved_at`
      );
    } catch (error) {
      throw new CacheUnavailableError(dbPath, error);
    }
  }

  async get(key: string): Promise<CacheableOutcome | null> {
    this.assertOpen();
    const row = this.selectStmt.get(key);
    if (row === undefined) {
      return null;
    }

    const outcome = parseCachedOutcome({
      source: row.source,
      confidence: row.confidence,
      latitude: row.latitude,
      longitude: row.longitude,
    });

    if (outcome === null) {
      log.warn('Ignoring malformed cache row', { query: key, source: row.source });
    }

    return outcome;
  }

  async put(key: string, outcome: CacheableOutcome): Promise<void> {
    this.assertOpen();
    this.upsertStmt.run(
      key,
      outcome.source,
      outcome.confidence,
      outcome.latitude,
      outcome.longitude,
      new Date().toISOString()
    );
  }

  async stats(): Promise<CacheStats> {
    this.assertOpen();
    const rows = this.db
      .prepare<[], SourceCountRow>(
        'SELECT source, COUNT(*) AS count FROM geocode_cache GROUP BY source'
      )
      .all();

    const bySource = emptySourceCounts();
    let entries = 0;
    for (const row of rows) {
      entries += row.count;
      if (isCacheableSource(row.source)) {
        bySource[row.source] += row.count;
      }
    }

    return { entries, bySource };
  }

  async clear(filter: CacheClearFilter = {}): Promise<number> {
    this.assertOpen();
    const result =
      filter.source === undefined
        ? this.db.prepare('DELETE FROM geocode_cache').run()
        : this.db.prepare<[string]>('DELETE FROM geocode_cache WHERE source = ?').run(filter.source);

    return result.changes;
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error(`Resolution cache at ${this.path} is closed`);
    }
  }
}
