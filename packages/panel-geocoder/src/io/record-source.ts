/**
 * Record Source
 *
 * Loads the provider panel from a CSV or NDJSON file into AddressRecords.
 * Input problems are fatal and surface before any geocoding starts.
 *
 * CSV: header row, one record per line, cells trimmed, blank lines skipped.
 * NDJSON/JSONL: one JSON object per line keyed by column name.
 *
 * @module io/record-source
 */

import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { AddressRecord } from '../core/types.js';
import { GEO_COLUMNS, RECORD_COLUMNS } from '../core/types.js';
import { PermanentInputError } from '../core/errors.js';

export type RecordFormat = 'csv' | 'ndjson';

const REQUIRED_COLUMNS: readonly string[] = Object.values(RECORD_COLUMNS);
const KNOWN_COLUMNS = new Set<string>([...REQUIRED_COLUMNS, ...GEO_COLUMNS]);

const CsvRowsSchema = z.array(z.array(z.string()));

const NdjsonCellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const NdjsonRowSchema = z.record(NdjsonCellSchema);

/**
 * Infer the record format from the file extension
 *
 * @throws {PermanentInputError} For unsupported extensions
 */
export function detectRecordFormat(path: string): RecordFormat {
  const ext = extname(path).toLowerCase();
  if (ext === '.csv') return 'csv';
  if (ext === '.ndjson' || ext === '.jsonl') return 'ndjson';
  throw new PermanentInputError(
    `Unsupported input format "${ext || '(none)'}": expected .csv, .ndjson or .jsonl`,
    path
  );
}

/**
 * Read and validate all records from a file
 *
 * @throws {PermanentInputError} If the file is missing, malformed, or lacks required columns
 */
export async function readRecords(path: string): Promise<AddressRecord[]> {
  const format = detectRecordFormat(path);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new PermanentInputError(
      `Cannot read input file: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  return format === 'csv' ? parseCsvRecords(text, path) : parseNdjsonRecords(text, path);
}

/**
 * Parse CSV text (header row first)
 */
export function parseCsvRecords(text: string, path = '<csv>'): AddressRecord[] {
  let rows: string[][];
  try {
    const parsed: unknown = parse(text, {
      bom: true,
      skip_empty_lines: true,
      trim: true,
    });
    rows = CsvRowsSchema.parse(parsed);
  } catch (error) {
    throw new PermanentInputError(
      `Malformed CSV: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  const [header, ...body] = rows;
  if (header === undefined) {
    throw new PermanentInputError('Input file has no header row', path, REQUIRED_COLUMNS);
  }

  assertColumns(header, path);

  return body.map((cells) => {
    const row: Record<string, string> = {};
    header.forEach((column, index) => {
      row[column] = cells[index] ?? '';
    });
    return toAddressRecord(row);
  });
}

/**
 * Parse NDJSON text (one object per line)
 */
export function parseNdjsonRecords(text: string, path = '<ndjson>'): AddressRecord[] {
  const records: AddressRecord[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      return;
    }

    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (error) {
      throw new PermanentInputError(
        `Invalid JSON on line ${index + 1}: ${error instanceof Error ? error.message : String(error)}`,
        path
      );
    }

    const parsed = NdjsonRowSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentInputError(
        `Line ${index + 1} is not a flat object of scalar values`,
        path
      );
    }

    const row: Record<string, string> = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      row[key] = value === null ? '' : String(value).trim();
    }

    assertColumns(Object.keys(row), path, index + 1);
    records.push(toAddressRecord(row));
  });

  return records;
}

function assertColumns(columns: readonly string[], path: string, line?: number): void {
  const present = new Set(columns);
  const missing = REQUIRED_COLUMNS.filter((column) => !present.has(column));

  if (missing.length > 0) {
    const where = line === undefined ? '' : ` on line ${line}`;
    throw new PermanentInputError(
      `Missing required columns${where}: ${missing.join(', ')}`,
      path,
      missing
    );
  }
}

function toAddressRecord(row: Readonly<Record<string, string>>): AddressRecord {
  const extra: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!KNOWN_COLUMNS.has(key)) {
      extra[key] = value;
    }
  }

  const address = row[RECORD_COLUMNS.physicalAddress] ?? '';

  return {
    physicalAddress: address === '' ? null : address,
    town: row[RECORD_COLUMNS.town] ?? '',
    county: row[RECORD_COLUMNS.county] ?? '',
    status: row[RECORD_COLUMNS.status] ?? '',
    name: row[RECORD_COLUMNS.name] ?? '',
    specialty: row[RECORD_COLUMNS.specialty] ?? '',
    phone: row[RECORD_COLUMNS.phone] ?? '',
    email: row[RECORD_COLUMNS.email] ?? '',
    extra,
  };
}
