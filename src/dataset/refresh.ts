import fs from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { fetch } from 'undici';
import { DatasetUnavailable } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { openCsv } from './csv.js';
import type { DatasetStore, SnapshotMetadata } from './store.js';

const log = logger.child({ module: 'dataset-refresh' });

export type SnapshotImporter = (input: Readable, source: string) => Promise<SnapshotMetadata>;

export type RefreshOptions = {
  store: DatasetStore;
  importSnapshot: SnapshotImporter;
  url: string;
  maxAgeHours: number;
  force?: boolean;
  tmpDir?: string;
  download?: (url: string, dir: string) => Promise<string>;
  now?: Date;
};

export type RefreshOutcome =
  | { skipped: true; reason: 'fresh'; snapshot: SnapshotMetadata }
  | { skipped: false; snapshot: SnapshotMetadata };

export function isSnapshotFresh(activatedAt: Date, maxAgeHours: number, now: Date = new Date()): boolean {
  return now.getTime() - activatedAt.getTime() < maxAgeHours * 60 * 60 * 1000;
}

export async function downloadCsv(url: string, dir: string): Promise<string> {
  await fs.promises.mkdir(dir, { recursive: true });
  const res = await fetch(url);
  if (!res.ok || !res.body) {
    throw new Error(`Failed to download units CSV: ${res.status} ${res.statusText}`);
  }
  const ext = new URL(url).pathname.toLowerCase().endsWith('.gz') ? '.csv.gz' : '.csv';
  const targetPath = path.join(dir, `units-${Date.now()}${ext}`);
  try {
    await pipeline(res.body, fs.createWriteStream(targetPath));
  } catch (err) {
    await fs.promises.rm(targetPath, { force: true });
    throw err;
  }
  return targetPath;
}

async function currentSnapshot(store: DatasetStore): Promise<SnapshotMetadata | null> {
  try {
    return (await store.acquire()).metadata();
  } catch (err) {
    if (err instanceof DatasetUnavailable) return null;
    throw err;
  }
}

/**
 * Replaces the active snapshot with a fresh download unless the current one
 * is younger than `maxAgeHours`. The downloaded file is closed and removed
 * afterwards, whether or not the import succeeds.
 */
export async function refreshDataset(opts: RefreshOptions): Promise<RefreshOutcome> {
  const active = await currentSnapshot(opts.store);
  if (active && !opts.force && isSnapshotFresh(active.activatedAt, opts.maxAgeHours, opts.now)) {
    log.info({ snapshotId: active.snapshotId, activatedAt: active.activatedAt }, 'Snapshot is fresh; skipping refresh');
    return { skipped: true, reason: 'fresh', snapshot: active };
  }

  const dir = opts.tmpDir ?? path.join(process.cwd(), 'tmp', 'dataset');
  const download = opts.download ?? downloadCsv;
  log.info({ url: opts.url }, 'Downloading units CSV');
  const filePath = await download(opts.url, dir);
  const input = openCsv(filePath);
  try {
    const snapshot = await opts.importSnapshot(input, opts.url);
    return { skipped: false, snapshot };
  } finally {
    input.destroy();
    await fs.promises.rm(filePath, { force: true });
  }
}
