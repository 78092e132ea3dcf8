import { describe, it, expect } from '@jest/globals';
import { MemoryDatasetStore } from '../dataset/store.js';
import { DatasetUnavailable } from '../lib/errors.js';
import { makeRecord, REGISTRATION_COLUMNS } from '../matching/types.js';
import { TEST_ALIASES, marinaHeightsUnit, unrelatedUnits } from './helpers.js';

const filter = (overrides: Partial<{ projectTokens: string[]; areaTokens: string[]; rooms: number | null; limit: number }> = {}) => ({
  projectTokens: [],
  areaTokens: [],
  rooms: null,
  limit: 10,
  ...overrides,
});

describe('MemoryDatasetStore', () => {
  it('should be unavailable before the first load', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    await expect(store.acquire()).rejects.toBeInstanceOf(DatasetUnavailable);
  });

  it('should describe the loaded snapshot', () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    const meta = store.load(unrelatedUnits(1), { source: 'units.csv', columns: REGISTRATION_COLUMNS });
    expect(meta.snapshotId).toBe('memory-1');
    expect(meta.rowCount).toBe(3);
    expect(meta.columnCount).toBe(46);
    expect(meta.source).toBe('units.csv');
  });

  it('should rank candidates by shared tokens then row', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    store.load(
      [
        makeRecord(1, { project_name_en: 'Marina Gate', area_name_en: 'Dubai Marina' }),
        makeRecord(2, { project_name_en: 'Marina Heights', area_name_en: 'Dubai Marina' }),
        makeRecord(3, { project_name_en: 'Marina Promenade', area_name_en: 'Dubai Marina' }),
      ],
      { source: 'test', columns: REGISTRATION_COLUMNS },
    );
    const snapshot = await store.acquire();

    const all = await snapshot.query(filter({ projectTokens: ['marina', 'heights'] }));
    expect(all.map((r) => r.rowId)).toEqual([2, 1, 3]);

    const limited = await snapshot.query(filter({ projectTokens: ['marina', 'heights'], limit: 1 }));
    expect(limited.map((r) => r.rowId)).toEqual([2]);
  });

  it('should combine project, area and room filters', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    store.load([marinaHeightsUnit(1)], { source: 'test', columns: REGISTRATION_COLUMNS });
    const snapshot = await store.acquire();

    expect(await snapshot.query(filter({ projectTokens: ['marina'], areaTokens: ['jumeirah'] }))).toEqual([]);
    expect(await snapshot.query(filter({ projectTokens: ['marina'], rooms: 3 }))).toEqual([]);
    expect((await snapshot.query(filter({ areaTokens: ['marina'], rooms: 2 }))).map((r) => r.rowId)).toEqual([1]);
  });

  it('should return nothing for a filter without tokens', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    store.load([marinaHeightsUnit(1)], { source: 'test', columns: REGISTRATION_COLUMNS });
    expect(await (await store.acquire()).query(filter({ rooms: 2 }))).toEqual([]);
  });

  it('should keep serving an acquired snapshot after a reload', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    store.load([marinaHeightsUnit(1)], { source: 'first', columns: REGISTRATION_COLUMNS });
    const before = await store.acquire();

    store.load(unrelatedUnits(1), { source: 'second', columns: REGISTRATION_COLUMNS, snapshotId: 'next' });
    const after = await store.acquire();

    expect((await before.query(filter({ projectTokens: ['heights'] }))).map((r) => r.rowId)).toEqual([1]);
    expect(await after.query(filter({ projectTokens: ['heights'] }))).toEqual([]);
    expect(before.metadata().source).toBe('first');
    expect(after.metadata().snapshotId).toBe('next');
  });

  it('should freeze loaded records', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    store.load([marinaHeightsUnit(1)], { source: 'test', columns: REGISTRATION_COLUMNS });
    const [record] = await (await store.acquire()).query(filter({ projectTokens: ['heights'] }));
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.fields)).toBe(true);
  });
});
