/**
 * Shared helpers for the relay.
 */

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Base delay plus a uniform random jitter in [0, jitterMs).
 */
export function jitteredDelayMs(baseMs: number, jitterMs: number, random: () => number = Math.random): number {
  if (jitterMs <= 0) return Math.max(0, baseMs);
  return Math.max(0, baseMs) + Math.floor(random() * jitterMs);
}

/**
 * Calendar day ("YYYY-MM-DD") of `d` in the given IANA time zone.
 */
export function dayKey(d: Date, timeZone: string): string {
  // en-CA formats dates as YYYY-MM-DD.
  return new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit"
  }).format(d);
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export function truncateForLog(s: string, max = 300): string {
  return s.length <= max ? s : s.slice(0, max) + "...";
}
