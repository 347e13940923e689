export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function ts() {
  return new Date().toISOString();
}

function isLogLevel(v: string): v is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

// Read on every call so tests and the entry point can change LOG_LEVEL after import.
function threshold(): number {
  const raw = (process.env.LOG_LEVEL ?? "info").trim().toLowerCase();
  return isLogLevel(raw) ? LEVEL_RANK[raw] : LEVEL_RANK.info;
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta)
};

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < threshold()) return;
  const base = { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // JSON line logs.
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(out));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
