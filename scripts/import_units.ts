import { importSnapshot, pgSessions } from '../src/dataset/import.js';
import { openCsv } from '../src/dataset/csv.js';
import { config } from '../src/lib/config.js';
import { pool } from '../src/lib/db.js';
import { logger } from '../src/lib/logger.js';
import { defaultAliasTable } from '../src/matching/aliases.js';

const FILE_PATH = process.argv[2];
if (!FILE_PATH) {
  console.error('Usage: node dist/scripts/import_units.js ./data/units.csv[.gz]');
  process.exit(1);
}

async function run() {
  try {
    const meta = await importSnapshot(pgSessions(pool), openCsv(FILE_PATH), {
      source: FILE_PATH,
      aliases: defaultAliasTable(),
      retention: config.snapshotRetention,
    });
    logger.info({ snapshotId: meta.snapshotId, rows: meta.rowCount, columns: meta.columnCount }, 'Import complete');
  } finally {
    await pool.end();
  }
}

run().catch((err) => {
  logger.error({ err }, 'Import failed');
  process.exit(1);
});
