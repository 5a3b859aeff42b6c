/**
 * Server Configuration
 *
 * Environment variables, validated once at startup. Importable by any module
 * that needs config without pulling in the full server.
 */

import { config as loadEnvFile } from "dotenv";
import { resolve, dirname, join } from "path";
import { homedir } from "os";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { LogLevel } from "@nudge/shared/logging";

// Load .env from the repository root
const __dirname = dirname(fileURLToPath(import.meta.url));
loadEnvFile({ path: resolve(__dirname, "../../.env") });

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// SCHEMA
// ============================================

const LOG_LEVEL_NAMES = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const satisfies readonly LogLevel[];

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),
  LOG_DIR: z.string().min(1).optional(),
  DB_DIR: z.string().min(1).optional(),
  SHORT_ACTION_THRESHOLD_SECONDS: z.coerce.number().int().nonnegative().default(60),
  FETCH_HORIZON_DAYS: z.coerce.number().int().positive().default(28),
  FETCH_RETRY_MS: z.coerce.number().int().positive().default(5_000),
  IDLE_RECHECK_SECONDS: z.coerce.number().int().positive().default(3_600),
});

// ============================================
// TYPES
// ============================================

export interface ServerConfig {
  env: "development" | "production" | "test";
  logLevel: LogLevel;
  logDir: string;
  dbPath: string;
  dispatcher: {
    /** Actions due within this window skip the store and fire from a timer */
    shortHorizonMs: number;
    /** Backoff after a failed store call in the run-loop */
    fetchRetryMs: number;
    /** An idle run-loop re-queries the store this often */
    idleRecheckMs: number;
  };
  store: {
    /** Only actions due within this window are candidates for the run-loop */
    horizonMs: number;
  };
}

export class ConfigError extends Error {
  public issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

// ============================================
// LOADING
// ============================================

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const dataDir = join(homedir(), ".nudge");

  return {
    env: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === "production" ? "info" : "debug"),
    logDir: values.LOG_DIR ?? join(dataDir, "logs"),
    dbPath: join(values.DB_DIR ?? join(dataDir, "data"), "nudge.db"),
    dispatcher: {
      shortHorizonMs: values.SHORT_ACTION_THRESHOLD_SECONDS * 1000,
      fetchRetryMs: values.FETCH_RETRY_MS,
      idleRecheckMs: values.IDLE_RECHECK_SECONDS * 1000,
    },
    store: {
      horizonMs: values.FETCH_HORIZON_DAYS * DAY_MS,
    },
  };
}
