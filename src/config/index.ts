import dotenv from "dotenv";
import { existsSync, readFileSync } from "fs";
import path from "path";
import { z } from "zod";

dotenv.config(); // Load environment variables from .env file

const projectRoot = process.cwd();

// --- Reading package.json ---
const packageJsonPath = path.resolve(projectRoot, "package.json");
let pkg: { name: string; version: string } = {
  name: "research-pipeline-core",
  version: "0.0.0",
};

if (existsSync(packageJsonPath)) {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
    const PackageSchema = z.object({ name: z.string(), version: z.string() });
    const result = PackageSchema.safeParse(parsed);
    if (result.success) {
      pkg = result.data;
    }
  } catch (error: unknown) {
    if (process.stdout.isTTY) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(
        `Warning: Could not read package.json at ${packageJsonPath}. Using hardcoded defaults. Error: ${message}`,
      );
    }
  }
}
// --- End Reading package.json ---

/**
 * Zod schema for validating environment variables.
 * Provides type safety, validation and defaults for every tunable of the core.
 * @private
 */
const EnvSchema = z.object({
  /** Optional. Service name reported in logs. Defaults to `package.json` name. */
  SERVICE_NAME: z.string().optional(),
  /** Runtime environment (e.g., "development", "production"). Default: "development". */
  NODE_ENV: z.string().default("development"),
  /** Minimum logging level. See `LogLevel` in the logger utility. Default: "info". */
  LOG_LEVEL: z
    .enum(["debug", "info", "notice", "warning", "error", "crit", "alert", "emerg"])
    .default("info"),
  /** Directory for log files. Defaults to "logs" in the working directory. */
  LOGS_DIR: z.string().default(path.join(projectRoot, "logs")),

  /** Maximum number of cache entries before LRU eviction. Default: 1000. */
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  /** Default cache entry time-to-live in milliseconds. Default: 1 hour. */
  CACHE_DEFAULT_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),

  /** Consecutive failures before a circuit breaker opens. Default: 5. */
  BREAKER_FAILURE_THRESHOLD: z.coerce.number().int().positive().default(5),
  /** Cooldown before an open breaker lets a trial call through. Default: 60s. */
  BREAKER_RECOVERY_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 1000),

  RETRY_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  RETRY_INITIAL_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10000),
  RETRY_BACKOFF_BASE: z.coerce.number().min(1).default(2),

  /** Admitted jobs per client per window. Default: 10. */
  RATE_LIMIT_REQUESTS_PER_MINUTE: z.coerce.number().int().positive().default(10),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),

  /** Age after which finished or abandoned tasks are dropped. Default: 60 minutes. */
  TASK_MAX_AGE_MINUTES: z.coerce.number().positive().default(60),
  /** Interval of keepalive pings while a progress stream is idle. Default: 30s. */
  PROGRESS_KEEPALIVE_MS: z.coerce.number().int().positive().default(30 * 1000),
  /** Cron expression for the maintenance sweep. Default: every 5 minutes. */
  MAINTENANCE_SCHEDULE: z.string().default("*/5 * * * *"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Builds the application configuration from a set of environment variables.
 * Invalid variables are reported and replaced by their defaults.
 * @param env - The environment to read. Defaults to `process.env`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsedEnv = EnvSchema.safeParse(env);

  if (!parsedEnv.success && process.stdout.isTTY) {
    console.error(
      "❌ Invalid environment variables found:",
      parsedEnv.error.flatten().fieldErrors,
    );
  }

  const values: EnvConfig = parsedEnv.success ? parsedEnv.data : EnvSchema.parse({});

  return {
    /** Service name. Env `SERVICE_NAME` > `package.json` name. */
    serviceName: values.SERVICE_NAME || pkg.name,
    serviceVersion: pkg.version,
    /** Runtime environment. From `NODE_ENV`. */
    environment: values.NODE_ENV,
    /** Logging level. From `LOG_LEVEL`. */
    logLevel: values.LOG_LEVEL,
    /** Absolute path to the logs directory. From `LOGS_DIR`. */
    logsPath: path.isAbsolute(values.LOGS_DIR)
      ? values.LOGS_DIR
      : path.resolve(projectRoot, values.LOGS_DIR),

    cache: {
      maxSize: values.CACHE_MAX_SIZE,
      defaultTtlMs: values.CACHE_DEFAULT_TTL_MS,
    },

    circuitBreaker: {
      failureThreshold: values.BREAKER_FAILURE_THRESHOLD,
      recoveryTimeoutMs: values.BREAKER_RECOVERY_TIMEOUT_MS,
    },

    retry: {
      maxRetries: values.RETRY_MAX_RETRIES,
      initialDelayMs: values.RETRY_INITIAL_DELAY_MS,
      maxDelayMs: values.RETRY_MAX_DELAY_MS,
      backoffBase: values.RETRY_BACKOFF_BASE,
    },

    rateLimit: {
      requestsPerWindow: values.RATE_LIMIT_REQUESTS_PER_MINUTE,
      windowMs: values.RATE_LIMIT_WINDOW_MS,
    },

    tasks: {
      maxAgeMinutes: values.TASK_MAX_AGE_MINUTES,
      keepaliveMs: values.PROGRESS_KEEPALIVE_MS,
    },

    maintenance: {
      schedule: values.MAINTENANCE_SCHEDULE,
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

/**
 * Main application configuration object.
 * Aggregates settings from validated environment variables and `package.json`.
 */
export const config: AppConfig = loadConfig();

/**
 * Configured runtime environment ("development", "production", etc.).
 * Exported for convenience.
 */
export const environment: string = config.environment;
