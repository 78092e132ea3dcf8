import "dotenv/config";
import path from "path";
import { z } from "zod";

const num = (d: number) => z.coerce.number().finite().default(d);
const ratio = (d: number) => z.coerce.number().min(0).max(1).default(d);
const weight = (d: number) => z.coerce.number().min(0).default(d);
const positiveInt = (d: number) => z.coerce.number().int().positive().default(d);

const envSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: positiveInt(3000),

  DATABASE_URL: z.string().optional(),
  POSTGRES_HOST: z.string().default("postgres"),
  POSTGRES_PORT: z.string().default("5432"),
  POSTGRES_USER: z.string().default("app"),
  POSTGRES_PASSWORD: z.string().default("app"),
  POSTGRES_DB: z.string().default("app"),
  REDIS_URL: z.string().default("redis://redis:6379"),

  MATCH_MIN_SCORE: ratio(0.5),
  MATCH_SEPARATION_MARGIN: ratio(0.15),
  MATCH_MAX_RESULTS: positiveInt(20),
  CANDIDATE_LIMIT: positiveInt(500),
  WEIGHT_PROJECT: weight(0.35),
  WEIGHT_AREA: weight(0.25),
  WEIGHT_BEDROOMS: weight(0.15),
  WEIGHT_SIZE: weight(0.15),
  WEIGHT_PROPERTY_TYPE: weight(0.1),
  MASTER_PROJECT_FACTOR: ratio(0.6),
  SIZE_TOLERANCE: ratio(0.15),
  SIZE_DECAY: z.coerce.number().positive().default(0.15),

  ALIAS_TABLE_PATH: z.string().optional(),
  SNAPSHOT_RETENTION: positiveInt(2),
  DATASET_CSV_URL: z.string().url().optional(),
  DATASET_MAX_AGE_HOURS: num(24),
  DATASET_REFRESH_CRON: z.string().default("0 3 * * *"),

  SCRAPE_TIMEOUT_MS: positiveInt(20000),
  SCRAPE_RETRIES: z.coerce.number().int().min(0).default(2),
});

export type MatchWeights = {
  project: number;
  area: number;
  bedrooms: number;
  size: number;
  propertyType: number;
};

export type ScoringConfig = {
  weights: MatchWeights;
  masterProjectFactor: number;
  sizeTolerance: number;
  sizeDecay: number;
};

export type ResolverConfig = {
  minScore: number;
  margin: number;
  maxResults: number;
};

export type AppConfig = {
  env: string;
  port: number;
  databaseUrl: string;
  redisUrl: string;
  scoring: ScoringConfig;
  resolver: ResolverConfig;
  candidateLimit: number;
  aliasTablePath: string;
  snapshotRetention: number;
  dataset: {
    csvUrl?: string;
    maxAgeHours: number;
    refreshCron: string;
  };
  scrape: {
    timeoutMs: number;
    retries: number;
  };
};

/**
 * Reads configuration from an environment map. Throws with every invalid
 * variable listed so a bad deploy fails at startup.
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  // Blank values behave as unset.
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === "string" && value.trim() !== "") cleaned[key] = value.trim();
  }
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  const fallbackUrl = `postgres://${encodeURIComponent(e.POSTGRES_USER)}:${encodeURIComponent(e.POSTGRES_PASSWORD)}@${e.POSTGRES_HOST}:${e.POSTGRES_PORT}/${e.POSTGRES_DB}`;

  const weights: MatchWeights = {
    project: e.WEIGHT_PROJECT,
    area: e.WEIGHT_AREA,
    bedrooms: e.WEIGHT_BEDROOMS,
    size: e.WEIGHT_SIZE,
    propertyType: e.WEIGHT_PROPERTY_TYPE,
  };
  if (Object.values(weights).every((w) => w === 0)) {
    throw new Error("Invalid configuration: at least one WEIGHT_* must be positive");
  }

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL || fallbackUrl,
    redisUrl: e.REDIS_URL,
    scoring: {
      weights,
      masterProjectFactor: e.MASTER_PROJECT_FACTOR,
      sizeTolerance: e.SIZE_TOLERANCE,
      sizeDecay: e.SIZE_DECAY,
    },
    resolver: {
      minScore: e.MATCH_MIN_SCORE,
      margin: e.MATCH_SEPARATION_MARGIN,
      maxResults: e.MATCH_MAX_RESULTS,
    },
    candidateLimit: e.CANDIDATE_LIMIT,
    aliasTablePath: e.ALIAS_TABLE_PATH || path.join(process.cwd(), "config", "aliases.json"),
    snapshotRetention: e.SNAPSHOT_RETENTION,
    dataset: {
      csvUrl: e.DATASET_CSV_URL,
      maxAgeHours: e.DATASET_MAX_AGE_HOURS,
      refreshCron: e.DATASET_REFRESH_CRON,
    },
    scrape: {
      timeoutMs: e.SCRAPE_TIMEOUT_MS,
      retries: e.SCRAPE_RETRIES,
    },
  };
}

export const config = loadConfig(process.env);
