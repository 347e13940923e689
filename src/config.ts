import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { isValidTimeZone } from "./utils.js";

// Load .env from the working directory when present; real env vars win.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath, override: false });

const LogLevel = z.enum(["debug", "info", "warn", "error"]);

const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  // Source
  FEED_URL: z.string().url().default("https://fintables.com/borsa-haber-akisi"),
  FEED_TAB: z.string().default("Öne çıkanlar"),

  // State
  STATE_PATH: z.string().min(1).default("data/state.json"),
  TIMEZONE: z.string().default("Europe/Istanbul"),

  // Posting budget
  MAX_PER_RUN: z.coerce.number().int().positive().default(5),
  MAX_POSTS_PER_DAY: z.coerce.number().int().positive().default(25),
  COOLDOWN_MINUTES: z.coerce.number().int().positive().default(15),
  POSTED_HISTORY_LIMIT: z.coerce.number().int().positive().default(5000),
  POST_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  POST_JITTER_MS: z.coerce.number().int().min(0).default(1000),

  // Extraction
  MIN_CONTENT_LENGTH: z.coerce.number().int().min(1).default(20),

  // Renderer
  RENDER_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  RENDER_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(3000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  LOG_LEVEL: LogLevel.default("info"),

  // X API (OAuth 1.0a user context). Any missing → simulation mode.
  X_API_KEY: optionalSecret,
  X_API_SECRET: optionalSecret,
  X_ACCESS_TOKEN: optionalSecret,
  X_ACCESS_SECRET: optionalSecret
});

export type AppConfig = z.infer<typeof envSchema>;

function validateConsistency(cfg: AppConfig): string[] {
  const errors: string[] = [];

  if (!isValidTimeZone(cfg.TIMEZONE)) {
    errors.push(`TIMEZONE is not a valid IANA time zone: ${cfg.TIMEZONE}`);
  }
  if (cfg.MAX_PER_RUN > cfg.POSTED_HISTORY_LIMIT) {
    errors.push("POSTED_HISTORY_LIMIT must be >= MAX_PER_RUN");
  }

  return errors;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new Error(`Config validation errors:\n${issues.map((e) => `  - ${e}`).join("\n")}`);
  }

  const cfg = parsed.data;
  const errors = validateConsistency(cfg);
  if (errors.length > 0) {
    throw new Error(`Config validation errors:\n${errors.map((e) => `  - ${e}`).join("\n")}`);
  }

  return cfg;
}

export function hasXCredentials(cfg: AppConfig): boolean {
  return Boolean(cfg.X_API_KEY && cfg.X_API_SECRET && cfg.X_ACCESS_TOKEN && cfg.X_ACCESS_SECRET);
}

export function missingXCredentials(cfg: AppConfig): string[] {
  const keys = ["X_API_KEY", "X_API_SECRET", "X_ACCESS_TOKEN", "X_ACCESS_SECRET"] as const;
  return keys.filter((k) => !cfg[k]);
}
