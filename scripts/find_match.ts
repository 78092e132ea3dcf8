import { loadIntoMemory, openCsv } from '../src/dataset/csv.js';
import { PgDatasetStore } from '../src/dataset/pgStore.js';
import { MemoryDatasetStore, type DatasetStore } from '../src/dataset/store.js';
import { pool, query } from '../src/lib/db.js';
import { logger } from '../src/lib/logger.js';
import { defaultAliasTable } from '../src/matching/aliases.js';
import { createMatcher } from '../src/matching/engine.js';
import { serializeReport } from '../src/api/routes/match.js';
import { fetchListing } from '../src/scraper/propertyFinder.js';

// Usage: node dist/scripts/find_match.js [--csv units.csv] <url> [url...]
function parseArgs(argv: string[]) {
  const urls: string[] = [];
  let csvPath: string | undefined;
  let concurrency = 4;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === '--csv') csvPath = argv[++i];
    else if (argv[i] === '--concurrency') concurrency = Number(argv[++i]) || concurrency;
    else urls.push(argv[i]);
  }
  return { urls, csvPath, concurrency };
}

async function run() {
  const { urls, csvPath, concurrency } = parseArgs(process.argv.slice(2));
  if (!urls.length) {
    console.error('Usage: node dist/scripts/find_match.js [--csv units.csv] [--concurrency 4] <url> [url...]');
    process.exit(1);
  }

  const aliases = defaultAliasTable();
  let store: DatasetStore;
  if (csvPath) {
    const memory = new MemoryDatasetStore(aliases);
    await loadIntoMemory(memory, openCsv(csvPath), csvPath);
    store = memory;
  } else {
    store = new PgDatasetStore(query);
  }

  try {
    const matcher = createMatcher({ store, fetchListing, aliases });
    const outcomes = await matcher.matchMany(urls, concurrency);
    const output = outcomes.map((o) =>
      o.ok ? { url: o.url, ...serializeReport(o.report) } : { url: o.url, error: o.error.name, message: o.error.message },
    );
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
    if (outcomes.some((o) => !o.ok)) process.exitCode = 2;
  } finally {
    await pool.end();
  }
}

run().catch((err) => {
  logger.error({ err }, 'Lookup failed');
  process.exit(1);
});
