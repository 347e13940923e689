import { logger } from "../logger.js";
import type { StateStore } from "./state.js";

export type CooldownStatus = "READY" | "COOLDOWN";

export const DEFAULT_BACKOFF_MINUTES = 15;

/**
 * READY → COOLDOWN on a rate-limit reply; back to READY once the clock passes
 * cooldownUntil. Expiry is checked, never scheduled.
 */
export class CooldownManager {
  constructor(
    private readonly store: StateStore,
    private readonly backoffMinutes: number = DEFAULT_BACKOFF_MINUTES
  ) {}

  until(): Date | null {
    const raw = this.store.state.cooldownUntil;
    if (!raw) return null;
    const ms = Date.parse(raw);
    return Number.isNaN(ms) ? null : new Date(ms);
  }

  status(now: Date): CooldownStatus {
    const until = this.until();
    if (until && now.getTime() < until.getTime()) return "COOLDOWN";
    return "READY";
  }

  remainingMs(now: Date): number {
    const until = this.until();
    return until ? Math.max(0, until.getTime() - now.getTime()) : 0;
  }

  /**
   * Clear an expired or unreadable cooldownUntil. In-memory only; the next
   * save persists it. Returns true when something was cleared.
   */
  release(now: Date): boolean {
    const raw = this.store.state.cooldownUntil;
    if (!raw || this.status(now) === "COOLDOWN") return false;
    this.store.update((s) => ({ ...s, cooldownUntil: null }));
    logger.info("cooldown.released", { was: raw });
    return true;
  }

  /**
   * Enter COOLDOWN for backoffMinutes from `now`, or until the poster's reset
   * time when that is later. Persists immediately.
   */
  async trip(now: Date, resetAt?: Date): Promise<Date> {
    let until = new Date(now.getTime() + this.backoffMinutes * 60_000);
    if (resetAt && resetAt.getTime() > until.getTime()) until = resetAt;

    this.store.update((s) => ({ ...s, cooldownUntil: until.toISOString() }));
    await this.store.save();

    logger.warn("cooldown.activated", {
      until: until.toISOString(),
      minutes: Math.round((until.getTime() - now.getTime()) / 60_000)
    });
    return until;
  }
}
