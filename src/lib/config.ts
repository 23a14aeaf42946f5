import { z } from "zod";
import type { RateLimiterOptions } from "@/lib/sync/rate-limiter";
import type { ScheduleIntervals } from "@/lib/sync/scheduler";
import type { BatchSizeLimits } from "@/lib/sync/types";

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const positiveNumber = (fallback: number) => z.coerce.number().positive().default(fallback);

export const envSchema = z.object({
  SHEET_ID: z.string({ required_error: "SHEET_ID is required" }).min(1),
  SHEET_RANGE: z.string({ required_error: "SHEET_RANGE is required" }).min(1),
  GOOGLE_TOKEN_FILE: z.string().default("./token.json"),
  ENCRYPTION_KEY: z.string().optional(),

  AMO_BASE_URL: z
    .string({ required_error: "AMO_BASE_URL is required" })
    .url()
    .transform((url) => url.replace(/\/+$/, "")),
  AMO_ACCESS_TOKEN: z.string({ required_error: "AMO_ACCESS_TOKEN is required" }).min(1),
  AMO_PIPELINE_ID: positiveInt(8237934),
  AMO_STATUS_ID: positiveInt(67260282),

  DATABASE_URL: z.string().default("file:./sync.db"),
  SHEET_BATCH_SIZE: z.coerce.number().int().min(1).max(1000).default(100),
  CRM_BATCH_SIZE: z.coerce.number().int().min(1).max(250).default(50),
  SHEET_RATE_CAPACITY: positiveInt(60),
  SHEET_RATE_PER_SECOND: positiveNumber(1),
  CRM_RATE_CAPACITY: positiveInt(7),
  CRM_RATE_PER_SECOND: positiveNumber(7),
  RATE_LIMIT_MAX_WAIT_MS: z.coerce.number().int().min(0).default(30_000),
  MAX_WRITE_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  HTTP_TIMEOUT_MS: positiveInt(30_000),
  PUSH_INTERVAL_MINUTES: positiveNumber(2),
  PULL_INTERVAL_MINUTES: positiveNumber(5),

  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  HOST: z.string().default("127.0.0.1"),
});

export interface AppConfig {
  sheets: { sheetId: string; range: string; tokenFile: string; encryptionKey?: string };
  amo: { baseUrl: string; accessToken: string; pipelineId: number; statusId: number };
  databaseUrl: string;
  batchSizes: BatchSizeLimits;
  rateLimits: Omit<RateLimiterOptions, "clock">;
  maxWriteAttempts: number;
  httpTimeoutMs: number;
  intervals: ScheduleIntervals;
  server: { port: number; host: string };
}

/** `KEY=` in a .env file means unset, not an empty value. */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration:\n  ${issues.join("\n  ")}`);
  }
  const e = parsed.data;

  return {
    sheets: {
      sheetId: e.SHEET_ID,
      range: e.SHEET_RANGE,
      tokenFile: e.GOOGLE_TOKEN_FILE,
      encryptionKey: e.ENCRYPTION_KEY,
    },
    amo: {
      baseUrl: e.AMO_BASE_URL,
      accessToken: e.AMO_ACCESS_TOKEN,
      pipelineId: e.AMO_PIPELINE_ID,
      statusId: e.AMO_STATUS_ID,
    },
    databaseUrl: e.DATABASE_URL,
    batchSizes: { SHEET: e.SHEET_BATCH_SIZE, CRM: e.CRM_BATCH_SIZE },
    rateLimits: {
      buckets: {
        SHEET: { capacity: e.SHEET_RATE_CAPACITY, refillPerSecond: e.SHEET_RATE_PER_SECOND },
        CRM: { capacity: e.CRM_RATE_CAPACITY, refillPerSecond: e.CRM_RATE_PER_SECOND },
      },
      maxWaitMs: e.RATE_LIMIT_MAX_WAIT_MS,
    },
    maxWriteAttempts: e.MAX_WRITE_ATTEMPTS,
    httpTimeoutMs: e.HTTP_TIMEOUT_MS,
    intervals: {
      SHEET_TO_CRM: e.PUSH_INTERVAL_MINUTES * 60_000,
      CRM_TO_SHEET: e.PULL_INTERVAL_MINUTES * 60_000,
    },
    server: { port: e.PORT, host: e.HOST },
  };
}
