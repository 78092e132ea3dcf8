import fs from 'fs';
import path from 'path';
import zlib from 'zlib';
import { pipeline, type Readable } from 'stream';
import csv from 'csv-parser';
import { SnapshotIntegrityError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { makeRecord, REGISTRATION_COLUMNS, type RegistrationRecord } from '../matching/types.js';
import type { MemoryDatasetStore, SnapshotMetadata } from './store.js';

export type CsvRow = {
  rowId: number;
  values: Record<string, string>;
};

/** Lowercase snake_case safe for use as a Postgres identifier. */
export function sanitizeColumnName(name: string): string {
  const safe = name
    .trim()
    .replace(/[^a-zA-Z0-9_]/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  return safe || 'col_unknown';
}

/** Sanitizes a header and suffixes repeats: a, a -> a, a_1. */
export function columnNamer(): (header: string) => string {
  const seen = new Map<string, number>();
  return (header: string) => {
    const safe = sanitizeColumnName(header);
    const count = seen.get(safe);
    if (count === undefined) {
      seen.set(safe, 0);
      return safe;
    }
    seen.set(safe, count + 1);
    return `${safe}_${count + 1}`;
  };
}

/** Destroying the returned stream also closes the underlying file. */
export function openCsv(filePath: string): Readable {
  const stream = fs.createReadStream(path.resolve(filePath));
  if (!filePath.endsWith('.gz')) return stream;
  return pipeline(stream, zlib.createGunzip(), (err) => {
    if (err) logger.debug({ err, filePath }, 'CSV stream closed early');
  });
}

function toStringRecord(row: unknown): Record<string, string> {
  const values: Record<string, string> = {};
  if (row && typeof row === 'object') {
    for (const [key, value] of Object.entries(row)) {
      values[key] = typeof value === 'string' ? value : String(value ?? '');
    }
  }
  return values;
}

/**
 * Streams rows with sanitized column names. Values are passed through as text
 * untouched. A row whose width differs from the header fails the stream.
 */
export async function* readUnitsCsv(input: Readable, columns: string[] = []): AsyncGenerator<CsvRow> {
  const name = columnNamer();
  const parser = input.pipe(
    csv({
      strict: true,
      mapHeaders: ({ header }) => {
        const column = name(header);
        columns.push(column);
        return column;
      },
    }),
  );

  const rows: AsyncIterable<unknown> = parser;
  let rowId = 0;
  for await (const row of rows) {
    rowId += 1;
    yield { rowId, values: toStringRecord(row) };
  }
}

export type IntegrityCounts = {
  columns: readonly string[];
  rowsRead: number;
  rowsStored: number;
};

/** Every register column must be present and every row read must have been stored. */
export function verifySnapshot(counts: IntegrityCounts): void {
  const present = REGISTRATION_COLUMNS.filter((col) => counts.columns.includes(col)).length;
  if (present !== REGISTRATION_COLUMNS.length) {
    throw new SnapshotIntegrityError('columns', REGISTRATION_COLUMNS.length, present);
  }
  if (counts.rowsStored !== counts.rowsRead) {
    throw new SnapshotIntegrityError('rows', counts.rowsRead, counts.rowsStored);
  }
}

/** Reads a whole CSV into a memory store. Meant for fixtures and small extracts. */
export async function loadIntoMemory(
  store: MemoryDatasetStore,
  input: Readable,
  source: string,
): Promise<SnapshotMetadata> {
  const columns: string[] = [];
  const records: RegistrationRecord[] = [];
  for await (const row of readUnitsCsv(input, columns)) {
    records.push(makeRecord(row.rowId, row.values));
  }
  verifySnapshot({ columns, rowsRead: records.length, rowsStored: records.length });
  const meta = store.load(records, { source, columns });
  logger.info({ source, rows: meta.rowCount, columns: meta.columnCount }, 'Loaded CSV snapshot into memory');
  return meta;
}
