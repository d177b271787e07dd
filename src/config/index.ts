import { config as loadEnv } from "dotenv";
import { z } from "zod";

loadEnv();

export const DEFAULT_TIMEZONE = "America/Bogota";

const numberFromEnv = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback);

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  LOG_FILE: z.string().optional(),
  TIMEZONE: z.string().default(DEFAULT_TIMEZONE),

  INFERENCE_ENABLED: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  INFERENCE_BASE_URL: z.string().url().default("http://localhost:11434/v1"),
  INFERENCE_API_KEY: z.string().default("ollama"),
  INFERENCE_MODEL: z.string().default("llama3.2:3b"),
  INFERENCE_TIMEOUT_MS: numberFromEnv(90_000),
  INFERENCE_MAX_RETRIES: z.coerce.number().int().positive().default(2),
  INFERENCE_BASE_DELAY_MS: numberFromEnv(2_000),
  ACCEPT_CONFIDENCE: z.coerce.number().min(0).max(1).default(0.6),

  CACHE_TTL_SECONDS: numberFromEnv(3_600),
  CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(1_000),
  CACHE_RETAIN_RATIO: z.coerce.number().gt(0).max(1).default(0.8),

  QUEUE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  TASK_RESULT_TTL_SECONDS: numberFromEnv(3_600),
  MAX_IMAGE_SIZE_MB: numberFromEnv(10),
  METRICS_WINDOW_SECONDS: numberFromEnv(3_600),

  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),
  RECORDS_TABLE: z.string().default("transactions"),
});

export interface ConfidencePenalties {
  invalidAmount: number;
  invalidCategory: number;
  invalidPaymentMethod: number;
}

export interface PatternConfidence {
  found: number;
  missing: number;
}

export interface InterpreterConfig {
  timeoutMs: number;
  maxRetries: number;
  baseDelayMs: number;
  acceptConfidence: number;
  penalties: ConfidencePenalties;
  /** Used when the pattern extractor is the primary source. */
  baselineConfidence: PatternConfidence;
  /** Used when the pattern extractor replaces a failed or weak inference. */
  fallbackConfidence: PatternConfidence;
}

export interface AppConfig {
  env: "development" | "production" | "test";
  timeZone: string;
  logging: {
    level: "error" | "warn" | "info" | "debug";
    file?: string;
  };
  inference: {
    enabled: boolean;
    baseUrl: string;
    apiKey: string;
    model: string;
  };
  interpreter: InterpreterConfig;
  cache: {
    ttlMs: number;
    maxEntries: number;
    retainRatio: number;
  };
  queue: {
    concurrency: number;
    resultTtlMs: number;
    maxImageBytes: number;
  };
  metrics: {
    windowMs: number;
  };
  storage: {
    supabaseUrl?: string;
    supabaseKey?: string;
    table: string;
  };
}

export function loadConfig(
  source: Record<string, string | undefined> = process.env
): AppConfig {
  const env = envSchema.parse(source);

  return {
    env: env.NODE_ENV,
    timeZone: env.TIMEZONE,
    logging: {
      level: env.LOG_LEVEL,
      file: env.LOG_FILE,
    },
    inference: {
      enabled: env.INFERENCE_ENABLED,
      baseUrl: env.INFERENCE_BASE_URL,
      apiKey: env.INFERENCE_API_KEY,
      model: env.INFERENCE_MODEL,
    },
    interpreter: {
      timeoutMs: env.INFERENCE_TIMEOUT_MS,
      maxRetries: env.INFERENCE_MAX_RETRIES,
      baseDelayMs: env.INFERENCE_BASE_DELAY_MS,
      acceptConfidence: env.ACCEPT_CONFIDENCE,
      penalties: {
        invalidAmount: 0.3,
        invalidCategory: 0.2,
        invalidPaymentMethod: 0.1,
      },
      baselineConfidence: { found: 0.8, missing: 0.2 },
      fallbackConfidence: { found: 0.6, missing: 0.2 },
    },
    cache: {
      ttlMs: env.CACHE_TTL_SECONDS * 1000,
      maxEntries: env.CACHE_MAX_ENTRIES,
      retainRatio: env.CACHE_RETAIN_RATIO,
    },
    queue: {
      concurrency: env.QUEUE_CONCURRENCY,
      resultTtlMs: env.TASK_RESULT_TTL_SECONDS * 1000,
      maxImageBytes: env.MAX_IMAGE_SIZE_MB * 1024 * 1024,
    },
    metrics: {
      windowMs: env.METRICS_WINDOW_SECONDS * 1000,
    },
    storage: {
      supabaseUrl: env.SUPABASE_URL,
      supabaseKey: env.SUPABASE_KEY,
      table: env.RECORDS_TABLE,
    },
  };
}

export const config = loadConfig();
