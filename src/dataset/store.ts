import { DatasetUnavailable } from '../lib/errors.js';
import type { AliasTable } from '../matching/aliases.js';
import type { RegistrationRecord } from '../matching/types.js';
import { recordKeys, type RecordKeys } from './keys.js';

export type SnapshotMetadata = {
  readonly snapshotId: string;
  readonly rowCount: number;
  readonly columnCount: number;
  readonly columns: readonly string[];
  readonly source: string;
  readonly activatedAt: Date;
};

/**
 * Coarse candidate filter. Empty token lists and a null room count are
 * inactive; active parts are combined with AND.
 *
 * Candidates are ranked by how many of the rank tokens they share, which may
 * include words too common to filter on. Without rank tokens the filter
 * tokens are used.
 */
export type CandidateFilter = {
  readonly projectTokens: readonly string[];
  readonly areaTokens: readonly string[];
  readonly rankProjectTokens?: readonly string[];
  readonly rankAreaTokens?: readonly string[];
  readonly rooms: number | null;
  readonly limit: number;
};

/** A read-only view of one snapshot. It keeps answering after a newer snapshot is activated. */
export interface SnapshotHandle {
  metadata(): SnapshotMetadata;
  query(filter: CandidateFilter): Promise<RegistrationRecord[]>;
}

export interface DatasetStore {
  /** Resolves the active snapshot, or throws DatasetUnavailable. */
  acquire(): Promise<SnapshotHandle>;
}

export function isQueryable(filter: CandidateFilter): boolean {
  return filter.projectTokens.length > 0 || filter.areaTokens.length > 0;
}

function overlap(have: readonly string[], want: ReadonlySet<string>): number {
  let n = 0;
  for (const token of have) if (want.has(token)) n += 1;
  return n;
}

type Entry = { readonly record: RegistrationRecord; readonly keys: RecordKeys };

class MemorySnapshot implements SnapshotHandle {
  constructor(
    private readonly entries: readonly Entry[],
    private readonly meta: SnapshotMetadata,
  ) {}

  metadata(): SnapshotMetadata {
    return this.meta;
  }

  async query(filter: CandidateFilter): Promise<RegistrationRecord[]> {
    if (!isQueryable(filter)) return [];
    const project = new Set(filter.projectTokens);
    const area = new Set(filter.areaTokens);
    const rankProject = new Set(filter.rankProjectTokens ?? filter.projectTokens);
    const rankArea = new Set(filter.rankAreaTokens ?? filter.areaTokens);
    const hits: Array<{ record: RegistrationRecord; rank: number }> = [];

    for (const { record, keys } of this.entries) {
      if (project.size && !overlap(keys.projectTokens, project)) continue;
      if (area.size && !overlap(keys.areaTokens, area)) continue;
      if (filter.rooms !== null && keys.rooms !== filter.rooms) continue;
      hits.push({ record, rank: overlap(keys.projectTokens, rankProject) + overlap(keys.areaTokens, rankArea) });
    }

    hits.sort((a, b) => b.rank - a.rank || a.record.rowId - b.record.rowId);
    return hits.slice(0, filter.limit).map((h) => h.record);
  }
}

/**
 * Holds snapshots in process. `load` builds the next snapshot completely and
 * then replaces the reference, so `acquire` sees either the old or the new one.
 */
export class MemoryDatasetStore implements DatasetStore {
  private current: MemorySnapshot | null = null;
  private loads = 0;

  constructor(private readonly aliases: AliasTable) {}

  load(
    records: readonly RegistrationRecord[],
    opts: { source: string; columns: readonly string[]; snapshotId?: string },
  ): SnapshotMetadata {
    this.loads += 1;
    const entries = Object.freeze(
      records.map((record) => Object.freeze({ record, keys: recordKeys(record, this.aliases) })),
    );
    const meta: SnapshotMetadata = Object.freeze({
      snapshotId: opts.snapshotId ?? `memory-${this.loads}`,
      rowCount: entries.length,
      columnCount: opts.columns.length,
      columns: Object.freeze([...opts.columns]),
      source: opts.source,
      activatedAt: new Date(),
    });
    this.current = new MemorySnapshot(entries, meta);
    return meta;
  }

  async acquire(): Promise<SnapshotHandle> {
    if (!this.current) throw new DatasetUnavailable();
    return this.current;
  }
}
