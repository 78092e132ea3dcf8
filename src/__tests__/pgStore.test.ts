import { describe, it, expect } from '@jest/globals';
import { buildCandidateQuery, PgDatasetStore, quoteIdent, rowToRecord, type QueryFn } from '../dataset/pgStore.js';
import { DatasetUnavailable } from '../lib/errors.js';

const TABLE = 'registration_units_20240101000000';

describe('buildCandidateQuery', () => {
  it('should filter on every active part and rank by shared tokens', () => {
    const { text, params } = buildCandidateQuery(TABLE, {
      projectTokens: ['marina', 'heights'],
      areaTokens: ['marina'],
      rooms: 2,
      limit: 500,
    });

    expect(text).toBe([
      'SELECT *, cardinality(ARRAY(SELECT unnest(_project_tokens) INTERSECT SELECT unnest($1::text[])))'
        + ' + cardinality(ARRAY(SELECT unnest(_area_tokens) INTERSECT SELECT unnest($2::text[]))) AS _rank',
      `FROM "${TABLE}"`,
      'WHERE _project_tokens && $1::text[] AND _area_tokens && $2::text[] AND _rooms = $3',
      'ORDER BY _rank DESC, _row_id ASC',
      'LIMIT $4',
    ].join('\n'));
    expect(params).toEqual([['marina', 'heights'], ['marina'], 2, 500]);
  });

  it('should number parameters for the parts that are present', () => {
    const { text, params } = buildCandidateQuery(TABLE, { projectTokens: [], areaTokens: ['marina'], rooms: null, limit: 10 });
    expect(text.split('\n')[2]).toBe('WHERE _area_tokens && $1::text[]');
    expect(text.split('\n')[4]).toBe('LIMIT $2');
    expect(params).toEqual([['marina'], 10]);
  });

  it('should rank on its own tokens when they differ from the filter tokens', () => {
    const { text, params } = buildCandidateQuery(TABLE, {
      projectTokens: ['marina'],
      areaTokens: ['marina'],
      rankProjectTokens: ['marina', 'tower'],
      rankAreaTokens: ['marina'],
      rooms: null,
      limit: 5,
    });

    expect(text.split('\n')[0]).toBe(
      'SELECT *, cardinality(ARRAY(SELECT unnest(_project_tokens) INTERSECT SELECT unnest($2::text[])))'
        + ' + cardinality(ARRAY(SELECT unnest(_area_tokens) INTERSECT SELECT unnest($3::text[]))) AS _rank',
    );
    expect(text.split('\n')[2]).toBe('WHERE _project_tokens && $1::text[] AND _area_tokens && $3::text[]');
    expect(params).toEqual([['marina'], ['marina', 'tower'], ['marina'], 5]);
  });

  it('should refuse an unsafe table name', () => {
    expect(() => quoteIdent('units"; DROP TABLE x; --')).toThrow('Unsafe identifier');
  });
});

describe('rowToRecord', () => {
  it('should keep register columns as text and drop helper columns', () => {
    const record = rowToRecord({
      _row_id: '7',
      _rank: 2,
      _project_tokens: ['marina', 'heights'],
      project_name_en: 'Marina Heights',
      rooms: null,
      actual_area: '111.48',
    });

    expect(record.rowId).toBe(7);
    expect(record.fields.project_name_en).toBe('Marina Heights');
    expect(record.fields.rooms).toBe('');
    expect(record.fields.actual_area).toBe('111.48');
    expect(Object.keys(record.fields)).toHaveLength(46);
    expect('_rank' in record.fields).toBe(false);
  });
});

describe('PgDatasetStore', () => {
  it('should be unavailable when no snapshot is active', async () => {
    const run: QueryFn = async () => ({ rows: [] });
    await expect(new PgDatasetStore(run).acquire()).rejects.toThrow('No registration snapshot is loaded');
  });

  it('should be unavailable when the database cannot be reached', async () => {
    const run: QueryFn = async () => {
      throw new Error('connect ECONNREFUSED');
    };
    const attempt = new PgDatasetStore(run).acquire();
    await expect(attempt).rejects.toBeInstanceOf(DatasetUnavailable);
    await expect(attempt).rejects.toThrow('Registration store is unreachable');
  });
});
