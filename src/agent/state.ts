import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { StateFileCorrupt } from "../errors.js";
import { errorMessage, logger } from "../logger.js";

/**
 * On disk (snake_case):
 * { "last_id", "posted", "cooldown_until", "count_today", "day" }
 *
 * Older deployments wrote a bare array of posted ids; it is upgraded on load.
 */
export type StateFile = {
  last_id: string | null;
  posted: string[];
  cooldown_until: string | null;
  count_today: number;
  day: string | null;
};

export type PersistedState = {
  /** Cursor: newest item id observed by the previous run. */
  lastSeenId: string | null;
  /** Oldest first; trimmed from the front. */
  postedIds: string[];
  /** ISO 8601; posting is suppressed until then. */
  cooldownUntil: string | null;
  dailyCount: number;
  /** "YYYY-MM-DD" the dailyCount belongs to. */
  day: string | null;
};

export function defaultState(): PersistedState {
  return {
    lastSeenId: null,
    postedIds: [],
    cooldownUntil: null,
    dailyCount: 0,
    day: null
  };
}

const nullableString = z
  .string()
  .nullable()
  .transform((v) => (v && v.trim() ? v : null))
  .catch(null);

// Every field falls back on its own so one bad value does not wipe the rest.
const StateFileSchema = z.object({
  last_id: nullableString,
  posted: z
    .array(z.unknown())
    .catch([])
    .transform((ids) => ids.filter((id): id is string => typeof id === "string" && id.length > 0)),
  cooldown_until: nullableString,
  count_today: z.number().int().min(0).catch(0),
  day: nullableString
});

/**
 * Map any parsed JSON value onto the current state shape.
 */
export function migrateState(raw: unknown): PersistedState {
  if (Array.isArray(raw)) {
    logger.info("state.migrate", { from: "legacy-array", ids: raw.length });
    return migrateState({ posted: raw });
  }
  if (!raw || typeof raw !== "object") {
    logger.warn("state.migrate unexpected shape; using defaults", { type: raw === null ? "null" : typeof raw });
    return defaultState();
  }

  const file = StateFileSchema.parse(raw);
  return {
    lastSeenId: file.last_id,
    postedIds: uniqueInOrder(file.posted),
    cooldownUntil: file.cooldown_until,
    dailyCount: file.count_today,
    day: file.day
  };
}

export function toStateFile(state: PersistedState): StateFile {
  return {
    last_id: state.lastSeenId,
    posted: [...state.postedIds],
    cooldown_until: state.cooldownUntil,
    count_today: state.dailyCount,
    day: state.day
  };
}

export async function readStateFile(filePath: string): Promise<PersistedState> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (err) {
    if (isNotFound(err)) {
      logger.info("state.init (no state file yet)", { path: filePath });
      return defaultState();
    }
    throw err;
  }

  try {
    return migrateState(JSON.parse(raw));
  } catch (err) {
    const corrupt = new StateFileCorrupt(filePath, { cause: err });
    logger.warn("state.corrupt; resetting to defaults", {
      path: filePath,
      error: corrupt.message,
      cause: errorMessage(err),
      head: raw.slice(0, 200)
    });
    return defaultState();
  }
}

export async function writeStateFile(filePath: string, state: PersistedState): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(toStateFile(state), null, 2) + "\n", "utf8");
}

export type SaveStateFn = (s: PersistedState) => Promise<void>;

/**
 * The single state value of a run. Loaded once, saved after every mutation,
 * last write wins.
 */
export class StateStore {
  private current: PersistedState;

  constructor(
    initial: PersistedState,
    private readonly saveFn: SaveStateFn
  ) {
    this.current = cloneState(initial);
  }

  static async open(filePath: string): Promise<StateStore> {
    const resolved = path.resolve(process.cwd(), filePath);
    const initial = await readStateFile(resolved);
    return new StateStore(initial, (s) => writeStateFile(resolved, s));
  }

  get state(): Readonly<PersistedState> {
    return this.current;
  }

  /** Apply a change in memory; call save() to persist it. */
  update(fn: (s: PersistedState) => PersistedState): PersistedState {
    this.current = fn(cloneState(this.current));
    return this.current;
  }

  async save(): Promise<void> {
    await this.saveFn(cloneState(this.current));
  }
}

export function rollDay(state: PersistedState, today: string): PersistedState {
  if (state.day === today) return state;
  return { ...state, day: today, dailyCount: 0 };
}

export function recordDailyPost(state: PersistedState, today: string): PersistedState {
  const next = rollDay(state, today);
  return { ...next, dailyCount: next.dailyCount + 1 };
}

function cloneState(s: PersistedState): PersistedState {
  return { ...s, postedIds: [...s.postedIds] };
}

function uniqueInOrder(ids: string[]): string[] {
  // Keep the last occurrence so re-posted ids count as recent.
  const seen = new Set<string>();
  const out: string[] = [];
  for (let i = ids.length - 1; i >= 0; i--) {
    const id = ids[i];
    if (id === undefined || seen.has(id)) continue;
    seen.add(id);
    out.push(id);
  }
  return out.reverse();
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
