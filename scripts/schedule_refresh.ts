import { config } from '../src/lib/config.js';
import { logger } from '../src/lib/logger.js';
import { connection, refreshQ } from '../src/queues/index.js';

// Usage: node dist/scripts/schedule_refresh.js [--now]
async function run() {
  const now = process.argv.includes('--now');
  if (now) {
    const job = await refreshQ.add('refresh', { force: true }, { attempts: 3, backoff: { type: 'exponential', delay: 60000 } });
    logger.info({ jobId: job.id }, 'Queued immediate dataset refresh');
  } else {
    await refreshQ.add(
      'refresh',
      {},
      {
        jobId: 'dataset-refresh-scheduled',
        repeat: { pattern: config.dataset.refreshCron },
        attempts: 3,
        backoff: { type: 'exponential', delay: 60000 },
      },
    );
    logger.info({ cron: config.dataset.refreshCron }, 'Scheduled recurring dataset refresh');
  }
  await refreshQ.close();
  await connection.quit();
}

run().catch((err) => {
  logger.error({ err }, 'Scheduling failed');
  process.exit(1);
});
