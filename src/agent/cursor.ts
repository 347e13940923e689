import type { NewsItem } from "../feed/types.js";
import type { PersistedState } from "./state.js";

/** Upper bound for remembered post ids; older ids fall off first. */
export const MAX_POSTED_IDS = 5000;

export type CursorPhase = "INIT" | "STEADY";

export type CandidateSelection = {
  /** Oldest first: the posting order. */
  candidates: NewsItem[];
  /** Newest id in the snapshot, null for an empty snapshot. */
  newestId: string | null;
  /** Whether lastSeenId was present in the snapshot. */
  cursorFound: boolean;
  /** Items dropped because their id was already posted. */
  alreadyPosted: number;
};

export function cursorPhase(state: Pick<PersistedState, "lastSeenId">): CursorPhase {
  return state.lastSeenId === null ? "INIT" : "STEADY";
}

/**
 * Items newer than the cursor, minus anything already posted, oldest first.
 *
 * A cursor that is missing from the snapshot (feed rotated past it) makes the
 * whole snapshot eligible; the per-run budget bounds posting downstream.
 */
export function selectCandidates(
  items: NewsItem[],
  state: Pick<PersistedState, "lastSeenId" | "postedIds">
): CandidateSelection {
  const newestId = items[0]?.id ?? null;
  const fresh: NewsItem[] = [];
  let cursorFound = false;

  for (const item of items) {
    if (state.lastSeenId !== null && item.id === state.lastSeenId) {
      cursorFound = true;
      break;
    }
    fresh.push(item);
  }

  const posted = new Set(state.postedIds);
  const candidates = fresh.filter((item) => !posted.has(item.id));

  return {
    candidates: candidates.reverse(),
    newestId,
    cursorFound,
    alreadyPosted: fresh.length - candidates.length
  };
}

/**
 * The cursor always moves to the newest observed item, whether or not
 * every candidate was posted.
 */
export function advanceCursor(state: PersistedState, newestId: string | null): PersistedState {
  if (newestId === null || state.lastSeenId === newestId) return state;
  return { ...state, lastSeenId: newestId };
}

export function rememberPosted(state: PersistedState, id: string, max = MAX_POSTED_IDS): PersistedState {
  const postedIds = state.postedIds.filter((p) => p !== id);
  postedIds.push(id);
  while (postedIds.length > max) postedIds.shift();
  return { ...state, postedIds };
}
