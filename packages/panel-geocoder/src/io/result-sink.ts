/**
 * Result Sinks
 *
 * Receive enriched records in input order and write them out on close().
 * The file is written atomically, so an aborted run never leaves a
 * half-written output behind.
 *
 * Output columns: the source columns (normalized address), any pass-through
 * columns in first-seen order, then Latitude, Longitude, GeoSource,
 * GeoConfidence.
 *
 * @module io/result-sink
 */

import { extname } from 'node:path';
import type { EnrichedRecord } from '../core/types.js';
import { GEO_COLUMNS, RECORD_COLUMNS } from '../core/types.js';
import { atomicWriteFile } from '../core/utils/atomic-write.js';

export interface ResultSink {
  write(record: EnrichedRecord): Promise<void>;
  close(): Promise<void>;
}

type OutputCell = string | number | null;

/**
 * Flatten an enriched record into output columns
 */
export function toOutputRow(record: EnrichedRecord): Record<string, OutputCell> {
  return {
    [RECORD_COLUMNS.physicalAddress]: record.physicalAddress ?? '',
    [RECORD_COLUMNS.town]: record.town,
    [RECORD_COLUMNS.county]: record.county,
    [RECORD_COLUMNS.status]: record.status,
    [RECORD_COLUMNS.name]: record.name,
    [RECORD_COLUMNS.specialty]: record.specialty,
    [RECORD_COLUMNS.phone]: record.phone,
    [RECORD_COLUMNS.email]: record.email,
    ...record.extra,
    Latitude: record.latitude,
    Longitude: record.longitude,
    GeoSource: record.geoSource,
    GeoConfidence: record.geoConfidence,
  };
}

/**
 * Quote a CSV field, doubling embedded quotes (RFC 4180). Null is an empty field.
 */
export function escapeCsvField(value: OutputCell): string {
  if (value === null) {
    return '';
  }
  return `"${String(value).replace(/"/g, '""')}"`;
}

abstract class BufferedFileSink implements ResultSink {
  protected readonly records: EnrichedRecord[] = [];
  private closed = false;

  constructor(readonly path: string) {}

  async write(record: EnrichedRecord): Promise<void> {
    if (this.closed) {
      throw new Error(`Result sink ${this.path} is closed`);
    }
    this.records.push(record);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await atomicWriteFile(this.path, this.serialize());
  }

  protected abstract serialize(): string;
}

export class CsvResultSink extends BufferedFileSink {
  protected serialize(): string {
    const rows = this.records.map(toOutputRow);
    const columns = collectColumns(this.records);

    const lines = [
      columns.map(escapeCsvField).join(','),
      ...rows.map((row) => columns.map((column) => escapeCsvField(row[column] ?? null)).join(',')),
    ];

    return `${lines.join('\n')}\n`;
  }
}

export class NdjsonResultSink extends BufferedFileSink {
  protected serialize(): string {
    return this.records.map((record) => `${JSON.stringify(toOutputRow(record))}\n`).join('');
  }
}

/**
 * Create a sink for the output path's extension (.csv, otherwise NDJSON)
 */
export function createResultSink(path: string): ResultSink {
  return extname(path).toLowerCase() === '.csv'
    ? new CsvResultSink(path)
    : new NdjsonResultSink(path);
}

function collectColumns(records: readonly EnrichedRecord[]): string[] {
  const extras: string[] = [];
  const seen = new Set<string>([...Object.values(RECORD_COLUMNS), ...GEO_COLUMNS]);

  for (const record of records) {
    for (const key of Object.keys(record.extra)) {
      if (!seen.has(key)) {
        seen.add(key);
        extras.push(key);
      }
    }
  }

  return [...Object.values(RECORD_COLUMNS), ...extras, ...GEO_COLUMNS];
}
