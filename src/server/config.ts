import "dotenv/config";
import { z } from "zod";

const parseEnvBool = (val: unknown, def: boolean): boolean => {
  if (typeof val === "boolean") return val;
  if (typeof val === "string") {
    const v = val.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(v)) return true;
    if (["0", "false", "no", "off", ""].includes(v)) return false;
  }
  if (typeof val === "number") return val !== 0;
  return def;
};

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  S3_DEFAULT_REGION: z.string().min(1).default("us-east-1"),
  S3_FORCE_PATH_STYLE: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
  LISTING_MAX_PAGES: z.coerce.number().int().positive().default(10),
  LISTING_MAX_RETRIES: z.coerce.number().int().positive().default(3),
  LISTING_RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(2000),
  LISTING_CANCEL_POLL_MS: z.coerce.number().int().positive().default(100),
  LISTING_PAGE_CAPACITY: z.coerce.number().int().min(1).max(1000).default(1000),
  VIEW_PAGE_SIZE: z.coerce.number().int().positive().default(1000),
  LISTING_EVENT_LOG_LIMIT: z.coerce.number().int().positive().default(500),
  LISTING_IDLE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
  LISTING_EVICTION_INTERVAL_SECONDS: z.coerce.number().int().positive().default(60),
  SENTRY_DSN: z.string().optional(),
  SENTRY_ENVIRONMENT: z.string().optional(),
  SENTRY_RELEASE: z.string().optional(),
  SENTRY_TRACES_SAMPLE_RATE: z.coerce.number().min(0).max(1).default(0.1),
  SENTRY_ENABLE_LOGS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
  SENTRY_ENABLE_METRICS: z.preprocess((v) => parseEnvBool(v, true), z.boolean()).default(true),
});

export type AppConfig = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("Invalid environment configuration", parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const config: AppConfig = parsed.data;

export const listingDefaults = {
  maxPages: config.LISTING_MAX_PAGES,
  maxAttempts: config.LISTING_MAX_RETRIES,
  backoffMs: config.LISTING_RETRY_BACKOFF_MS,
  cancelPollMs: config.LISTING_CANCEL_POLL_MS,
  pageCapacity: config.LISTING_PAGE_CAPACITY,
  viewPageSize: config.VIEW_PAGE_SIZE,
  eventLogLimit: config.LISTING_EVENT_LOG_LIMIT,
  idleTtlMs: config.LISTING_IDLE_TTL_SECONDS * 1000,
};

export type ListingDefaults = typeof listingDefaults;
