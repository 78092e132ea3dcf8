import fs from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { describe, it, expect } from '@jest/globals';
import { columnNamer, loadIntoMemory, type CsvRow, readUnitsCsv, sanitizeColumnName, verifySnapshot } from '../dataset/csv.js';
import { MemoryDatasetStore } from '../dataset/store.js';
import { SnapshotIntegrityError } from '../lib/errors.js';
import { REGISTRATION_COLUMNS } from '../matching/types.js';
import { TEST_ALIASES } from './helpers.js';

const FIXTURE = path.join(__dirname, 'fixtures', 'units.csv');

function csvStream(text: string): Readable {
  return Readable.from([Buffer.from(text, 'utf-8')]);
}

async function readAll(input: Readable) {
  const columns: string[] = [];
  const rows: CsvRow[] = [];
  for await (const row of readUnitsCsv(input, columns)) rows.push(row);
  return { columns, rows };
}

describe('sanitizeColumnName', () => {
  it('should produce lowercase snake_case identifiers', () => {
    expect(sanitizeColumnName(' Area Name (EN) ')).toBe('area_name_en');
    expect(sanitizeColumnName('\uFEFFproperty_id')).toBe('property_id');
    expect(sanitizeColumnName('***')).toBe('col_unknown');
  });
});

describe('columnNamer', () => {
  it('should suffix repeated headers', () => {
    const name = columnNamer();
    expect(['rooms', 'Rooms', 'floor', 'rooms'].map(name)).toEqual(['rooms', 'rooms_1', 'floor', 'rooms_2']);
  });
});

describe('readUnitsCsv', () => {
  it('should keep values as text and number rows from 1', async () => {
    const { columns, rows } = await readAll(csvStream('a,B c,a\n007,"x, y",\n1.50,2,3\n'));
    expect(columns).toEqual(['a', 'b_c', 'a_1']);
    expect(rows).toEqual([
      { rowId: 1, values: { a: '007', b_c: 'x, y', a_1: '' } },
      { rowId: 2, values: { a: '1.50', b_c: '2', a_1: '3' } },
    ]);
  });

  it('should fail on a row wider than the header', async () => {
    await expect(readAll(csvStream('a,b\n1,2,3\n'))).rejects.toThrow(/Row length does not match headers/);
  });
});

describe('verifySnapshot', () => {
  it('should accept a complete snapshot', () => {
    expect(() => verifySnapshot({ columns: [...REGISTRATION_COLUMNS, 'extra'], rowsRead: 3, rowsStored: 3 })).not.toThrow();
  });

  it('should reject a snapshot missing a register column', () => {
    const columns = REGISTRATION_COLUMNS.filter((c) => c !== 'rooms');
    expect(() => verifySnapshot({ columns, rowsRead: 3, rowsStored: 3 })).toThrow('Snapshot columns mismatch: expected 46, found 45');
  });

  it('should reject a snapshot that lost rows', () => {
    expect(() => verifySnapshot({ columns: REGISTRATION_COLUMNS, rowsRead: 3, rowsStored: 2 })).toThrow(
      'Snapshot rows mismatch: expected 3, found 2',
    );
  });
});

describe('loadIntoMemory', () => {
  it('should load the fixture with every column and value intact', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    const meta = await loadIntoMemory(store, fs.createReadStream(FIXTURE), 'fixture');
    expect(meta.rowCount).toBe(3);
    expect(meta.columnCount).toBe(46);
    expect(meta.columns).toEqual([...REGISTRATION_COLUMNS]);

    const [record] = await (await store.acquire()).query({ projectTokens: ['vista'], areaTokens: [], rooms: null, limit: 5 });
    expect(record.rowId).toBe(3);
    expect(record.fields.rooms_en).toBe('Studio');
    expect(record.fields.actual_area).toBe('45.2');
    expect(record.fields.land_type_en).toBe('Residential');
  });

  it('should keep quoted commas and arabic text', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    await loadIntoMemory(store, fs.createReadStream(FIXTURE), 'fixture');
    const [record] = await (await store.acquire()).query({ projectTokens: ['heights'], areaTokens: [], rooms: null, limit: 1 });
    expect(record.fields.land_type_en).toBe('Residential, Mixed Use');
    expect(record.fields.project_name_ar).toBe('مارينا هايتس');
  });

  it('should refuse a file without the register columns', async () => {
    const store = new MemoryDatasetStore(TEST_ALIASES);
    await expect(loadIntoMemory(store, csvStream('a,b\n1,2\n'), 'bad')).rejects.toBeInstanceOf(SnapshotIntegrityError);
    await expect(store.acquire()).rejects.toThrow('No registration snapshot is loaded');
  });
});
