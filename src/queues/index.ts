import { Queue } from "bullmq";
import IORedis from "ioredis";
import { config } from "../lib/config.js";

export const connection = new IORedis(config.redisUrl, {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
});

export const REFRESH_QUEUE = "dataset-refresh";

export type RefreshJob = {
  url?: string;
  force?: boolean;
};

export const refreshQ = new Queue<RefreshJob>(REFRESH_QUEUE, { connection });
