import type { Pool } from 'pg';
import type { Readable } from 'stream';
import { z } from 'zod';
import { logger } from '../lib/logger.js';
import type { AliasTable } from '../matching/aliases.js';
import { makeRecord } from '../matching/types.js';
import { readUnitsCsv, verifySnapshot, type CsvRow } from './csv.js';
import { recordKeys } from './keys.js';
import { ensureSnapshotCatalog, quoteIdent, SNAPSHOTS_TABLE } from './pgStore.js';
import type { SnapshotMetadata } from './store.js';

const log = logger.child({ module: 'snapshot-import' });

const MAX_PARAMS = 60000;
const COLUMN_RE = /^[a-z0-9_]+$/;

export type ImportOptions = {
  source: string;
  aliases: AliasTable;
  retention: number;
  now?: Date;
};

/** Rows as the driver returns them; shapes are checked where they are read. */
export type SqlRunner = (text: string, params?: unknown[]) => Promise<{ rows: Record<string, unknown>[] }>;

/** One checked-out connection. Every statement of an import runs on it. */
export type ImportSession = {
  run: SqlRunner;
  release(): void;
};

export type SessionSource = () => Promise<ImportSession>;

export function pgSessions(pool: Pool): SessionSource {
  return async () => {
    const client = await pool.connect();
    return {
      run: (text, params) => client.query(text, params),
      release: () => client.release(),
    };
  };
}

const countRow = z.object({ n: z.coerce.number().int().min(0) });
const activatedRow = z.object({ activated_at: z.coerce.date() });
const staleRow = z.object({ snapshot_id: z.string(), table_name: z.string() });

function quoteColumn(name: string): string {
  if (!COLUMN_RE.test(name)) throw new Error(`Unsafe column name: ${name}`);
  return `"${name}"`;
}

export function snapshotIdFor(date: Date): string {
  return date.toISOString().replace(/[^0-9]/g, '').slice(0, 14);
}

export function snapshotTableName(snapshotId: string): string {
  return `registration_units_${snapshotId}`;
}

export function createTableSql(tableName: string, columns: readonly string[]): string {
  const defs = [
    '_row_id bigint PRIMARY KEY',
    '_project_tokens text[] NOT NULL',
    '_area_tokens text[] NOT NULL',
    '_rooms integer',
    ...columns.map((c) => `${quoteColumn(c)} text`),
  ];
  return `CREATE TABLE ${quoteIdent(tableName)} (\n  ${defs.join(',\n  ')}\n)`;
}

export function batchSizeFor(columnCount: number): number {
  return Math.max(1, Math.floor(MAX_PARAMS / (columnCount + 4)));
}

async function insertBatch(
  run: SqlRunner,
  tableName: string,
  columns: readonly string[],
  batch: CsvRow[],
  aliases: AliasTable,
): Promise<void> {
  if (!batch.length) return;
  const width = columns.length + 4;
  const values: string[] = [];
  const params: unknown[] = [];

  batch.forEach((row, index) => {
    const keys = recordKeys(makeRecord(row.rowId, row.values), aliases);
    const base = index * width;
    values.push(`(${Array.from({ length: width }, (_, i) => `$${base + i + 1}`).join(', ')})`);
    params.push(row.rowId, [...keys.projectTokens], [...keys.areaTokens], keys.rooms);
    for (const col of columns) params.push(row.values[col] ?? '');
  });

  const target = ['_row_id', '_project_tokens', '_area_tokens', '_rooms', ...columns].map(quoteColumn).join(', ');
  await run(`INSERT INTO ${quoteIdent(tableName)} (${target}) VALUES ${values.join(',')}`, params);
}

/**
 * Loads a units CSV into a fresh snapshot table, checks it against what was
 * read, indexes it, and only then marks it active. A failure before the
 * activation commits drops the new table and leaves the active snapshot as it
 * was; once committed, the new snapshot stays active whatever pruning does.
 * The input stream is destroyed when the import ends.
 */
export async function importSnapshot(connect: SessionSource, input: Readable, opts: ImportOptions): Promise<SnapshotMetadata> {
  const started = opts.now ?? new Date();
  const snapshotId = snapshotIdFor(started);
  const tableName = snapshotTableName(snapshotId);
  const columns: string[] = [];
  let created = false;
  let activated = false;

  const session = await connect().catch((err: unknown) => {
    input.destroy();
    throw err;
  });
  const { run } = session;

  try {
    await ensureSnapshotCatalog(run);
    log.info({ snapshotId, source: opts.source }, 'Starting snapshot import');

    const batch: CsvRow[] = [];
    let batchSize = 0;
    let rowsRead = 0;

    for await (const row of readUnitsCsv(input, columns)) {
      if (!created) {
        await run(createTableSql(tableName, columns));
        created = true;
        batchSize = batchSizeFor(columns.length);
      }
      batch.push(row);
      rowsRead += 1;
      if (batch.length >= batchSize) {
        await insertBatch(run, tableName, columns, batch, opts.aliases);
        batch.length = 0;
        if (rowsRead % 100000 < batchSize) log.info({ rowsRead }, 'Import progress');
      }
    }
    if (!created) {
      await run(createTableSql(tableName, columns));
      created = true;
    }
    await insertBatch(run, tableName, columns, batch, opts.aliases);

    const counted = await run(`SELECT count(*) AS n FROM ${quoteIdent(tableName)}`);
    verifySnapshot({ columns, rowsRead, rowsStored: countRow.parse(counted.rows[0]).n });

    const table = quoteIdent(tableName);
    await run(`CREATE INDEX ON ${table} USING gin (_project_tokens)`);
    await run(`CREATE INDEX ON ${table} USING gin (_area_tokens)`);
    await run(`CREATE INDEX ON ${table} (_rooms)`);
    await run(`ANALYZE ${table}`);

    await run('BEGIN');
    await run(`UPDATE ${SNAPSHOTS_TABLE} SET is_active = false WHERE is_active`);
    const inserted = await run(
      `INSERT INTO ${SNAPSHOTS_TABLE} (snapshot_id, table_name, source, row_count, columns, activated_at, is_active)
       VALUES ($1, $2, $3, $4, $5, now(), true)
       RETURNING activated_at`,
      [snapshotId, tableName, opts.source, rowsRead, JSON.stringify(columns)],
    );
    await run('COMMIT');
    activated = true;

    const elapsed = ((Date.now() - started.getTime()) / 1000).toFixed(1);
    log.info({ snapshotId, rows: rowsRead, columns: columns.length, elapsed }, 'Snapshot activated');

    try {
      await pruneSnapshots(run, opts.retention);
    } catch (err) {
      log.error({ err, snapshotId }, 'Failed to prune old snapshots; they will be retried on the next import');
    }

    return Object.freeze({
      snapshotId,
      rowCount: rowsRead,
      columnCount: columns.length,
      columns: Object.freeze([...columns]),
      source: opts.source,
      activatedAt: activatedRow.parse(inserted.rows[0]).activated_at,
    });
  } catch (err) {
    log.error({ err, snapshotId }, 'Snapshot import failed');
    if (!activated) {
      await run('ROLLBACK');
      if (created) await run(`DROP TABLE IF EXISTS ${quoteIdent(tableName)}`);
    }
    throw err;
  } finally {
    input.destroy();
    session.release();
  }
}

/** Drops snapshot tables beyond the newest `retention`; the active one is always kept. */
export async function pruneSnapshots(run: SqlRunner, retention: number): Promise<string[]> {
  const { rows } = await run(
    `SELECT snapshot_id, table_name FROM ${SNAPSHOTS_TABLE}
      WHERE NOT is_active
      ORDER BY created_at DESC
      OFFSET $1`,
    [Math.max(0, retention - 1)],
  );
  const stale = rows.map((row) => staleRow.parse(row));
  for (const row of stale) {
    await run(`DROP TABLE IF EXISTS ${quoteIdent(row.table_name)}`);
    await run(`DELETE FROM ${SNAPSHOTS_TABLE} WHERE snapshot_id = $1`, [row.snapshot_id]);
    log.info({ snapshotId: row.snapshot_id }, 'Pruned old snapshot');
  }
  return stale.map((r) => r.snapshot_id);
}
