import type { QueryResultRow } from 'pg';
import { DatasetUnavailable } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { makeRecord, type RegistrationRecord } from '../matching/types.js';
import { isQueryable, type CandidateFilter, type DatasetStore, type SnapshotHandle, type SnapshotMetadata } from './store.js';

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => Promise<{ rows: T[] }>;

export const SNAPSHOTS_TABLE = 'registration_snapshots';

const TABLE_NAME_RE = /^[a-z][a-z0-9_]*$/;

export function quoteIdent(name: string): string {
  if (!TABLE_NAME_RE.test(name)) throw new Error(`Unsafe identifier: ${name}`);
  return `"${name}"`;
}

export async function ensureSnapshotCatalog(query: (text: string) => Promise<unknown>): Promise<void> {
  await query(`CREATE TABLE IF NOT EXISTS ${SNAPSHOTS_TABLE} (
    snapshot_id text PRIMARY KEY,
    table_name text NOT NULL,
    source text NOT NULL,
    row_count bigint NOT NULL,
    columns jsonb NOT NULL,
    created_at timestamptz NOT NULL DEFAULT now(),
    activated_at timestamptz,
    is_active boolean NOT NULL DEFAULT false
  )`);
  await query(`CREATE UNIQUE INDEX IF NOT EXISTS ${SNAPSHOTS_TABLE}_active_idx ON ${SNAPSHOTS_TABLE} (is_active) WHERE is_active`);
}

/**
 * SQL for one candidate lookup. Token filters use array overlap so the GIN
 * indexes built at import apply; rank is the number of shared rank tokens.
 */
export function buildCandidateQuery(tableName: string, filter: CandidateFilter): { text: string; params: unknown[] } {
  const params: unknown[] = [];
  const where: string[] = [];
  const rank: string[] = [];

  const tokenClause = (column: string, tokens: readonly string[], rankTokens: readonly string[]) => {
    if (tokens.length) {
      params.push([...tokens]);
      where.push(`${column} && $${params.length}::text[]`);
    }
    if (rankTokens.length) {
      const same = tokens.length > 0 && tokens.join(' ') === rankTokens.join(' ');
      if (!same) params.push([...rankTokens]);
      rank.push(`cardinality(ARRAY(SELECT unnest(${column}) INTERSECT SELECT unnest($${params.length}::text[])))`);
    }
  };

  tokenClause('_project_tokens', filter.projectTokens, filter.rankProjectTokens ?? filter.projectTokens);
  tokenClause('_area_tokens', filter.areaTokens, filter.rankAreaTokens ?? filter.areaTokens);
  if (filter.rooms !== null) {
    params.push(filter.rooms);
    where.push(`_rooms = $${params.length}`);
  }
  params.push(filter.limit);

  const text = [
    `SELECT *, ${rank.length ? rank.join(' + ') : '0'} AS _rank`,
    `FROM ${quoteIdent(tableName)}`,
    `WHERE ${where.join(' AND ')}`,
    `ORDER BY _rank DESC, _row_id ASC`,
    `LIMIT $${params.length}`,
  ].join('\n');

  return { text, params };
}

function toText(value: unknown): string {
  if (value == null) return '';
  return typeof value === 'string' ? value : String(value);
}

export function rowToRecord(row: Record<string, unknown>): RegistrationRecord {
  const values: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) values[key] = toText(value);
  return makeRecord(Number(row._row_id), values);
}

type SnapshotRow = {
  snapshot_id: string;
  table_name: string;
  source: string;
  row_count: string;
  columns: string[];
  activated_at: Date;
};

class PgSnapshot implements SnapshotHandle {
  constructor(
    private readonly run: QueryFn,
    private readonly tableName: string,
    private readonly meta: SnapshotMetadata,
  ) {}

  metadata(): SnapshotMetadata {
    return this.meta;
  }

  async query(filter: CandidateFilter): Promise<RegistrationRecord[]> {
    if (!isQueryable(filter)) return [];
    const { text, params } = buildCandidateQuery(this.tableName, filter);
    const { rows } = await this.run<Record<string, unknown>>(text, params);
    return rows.map(rowToRecord);
  }
}

/**
 * Reads the active snapshot from Postgres. The snapshot's table is resolved
 * once per `acquire`, so every query of one lookup hits the same table even if
 * an import activates a newer one meanwhile.
 */
export class PgDatasetStore implements DatasetStore {
  constructor(private readonly run: QueryFn) {}

  async acquire(): Promise<SnapshotHandle> {
    let rows: SnapshotRow[];
    try {
      ({ rows } = await this.run<SnapshotRow>(
        `SELECT snapshot_id, table_name, source, row_count, columns, activated_at
           FROM ${SNAPSHOTS_TABLE}
          WHERE is_active
          LIMIT 1`,
      ));
    } catch (err) {
      logger.error({ err }, 'Failed to read active snapshot');
      throw new DatasetUnavailable('Registration store is unreachable', { cause: err });
    }
    const active = rows[0];
    if (!active) throw new DatasetUnavailable();

    const meta: SnapshotMetadata = Object.freeze({
      snapshotId: active.snapshot_id,
      rowCount: Number(active.row_count),
      columnCount: active.columns.length,
      columns: Object.freeze([...active.columns]),
      source: active.source,
      activatedAt: active.activated_at,
    });
    return new PgSnapshot(this.run, active.table_name, meta);
  }
}
