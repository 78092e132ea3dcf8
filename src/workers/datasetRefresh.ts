import "dotenv/config";
import { Worker } from "bullmq";
import { importSnapshot, pgSessions } from "../dataset/import.js";
import { PgDatasetStore } from "../dataset/pgStore.js";
import { refreshDataset } from "../dataset/refresh.js";
import { config } from "../lib/config.js";
import { ensureConnection, pool, query } from "../lib/db.js";
import { logger } from "../lib/logger.js";
import { defaultAliasTable } from "../matching/aliases.js";
import { connection, REFRESH_QUEUE, type RefreshJob } from "../queues/index.js";

const log = logger.child({ worker: REFRESH_QUEUE });

async function main() {
  await ensureConnection();
  const store = new PgDatasetStore(query);
  const aliases = defaultAliasTable();

  const worker = new Worker<RefreshJob>(
    REFRESH_QUEUE,
    async (job) => {
      const url = job.data.url || config.dataset.csvUrl;
      if (!url) throw new Error("No dataset URL: set DATASET_CSV_URL or pass url in the job");
      const outcome = await refreshDataset({
        store,
        url,
        force: job.data.force,
        maxAgeHours: config.dataset.maxAgeHours,
        importSnapshot: (input, source) =>
          importSnapshot(pgSessions(pool), input, { source, aliases, retention: config.snapshotRetention }),
      });
      return {
        skipped: outcome.skipped,
        snapshotId: outcome.snapshot.snapshotId,
        rowCount: outcome.snapshot.rowCount,
      };
    },
    // One import at a time; each builds its own table.
    { connection, concurrency: 1 },
  );

  worker.on("completed", (job, result) => log.info({ jobId: job.id, result }, "Refresh completed"));
  worker.on("failed", (job, err) => log.error({ jobId: job?.id, err }, "Refresh failed"));
  log.info("Dataset refresh worker started");
}

main().catch((err) => {
  log.fatal({ err }, "Worker failed to start");
  process.exit(1);
});
