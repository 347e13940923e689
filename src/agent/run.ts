import type { AppConfig } from "../config.js";
import { EmptyComposedTweet } from "../errors.js";
import { extractWithStats } from "../feed/extract.js";
import { defaultExtractionPolicy } from "../feed/policy.js";
import type { PageRenderer } from "../feed/renderer.js";
import type { ExtractionPolicy, RawBlock } from "../feed/types.js";
import { errorMessage, logger } from "../logger.js";
import { buildDraft } from "../social/compose.js";
import type { PostResult, SocialPoster } from "../social/poster.js";
import { dayKey, jitteredDelayMs, sleep as realSleep, truncateForLog } from "../utils.js";
import { CooldownManager } from "./cooldown.js";
import { advanceCursor, cursorPhase, MAX_POSTED_IDS, rememberPosted, selectCandidates } from "./cursor.js";
import { recordDailyPost, rollDay, type StateStore } from "./state.js";

export type RunSettings = {
  feedUrl: string;
  feedTab?: string;
  timeZone: string;
  maxPerRun: number;
  maxPostsPerDay: number;
  cooldownMinutes: number;
  postedHistoryLimit: number;
  postDelayMs: number;
  postJitterMs: number;
  renderRetries: number;
  renderRetryDelayMs: number;
};

export const DEFAULT_RUN_SETTINGS: RunSettings = {
  feedUrl: "https://fintables.com/borsa-haber-akisi",
  feedTab: "Öne çıkanlar",
  timeZone: "Europe/Istanbul",
  maxPerRun: 5,
  maxPostsPerDay: 25,
  cooldownMinutes: 15,
  postedHistoryLimit: MAX_POSTED_IDS,
  postDelayMs: 2000,
  postJitterMs: 1000,
  renderRetries: 3,
  renderRetryDelayMs: 3000
};

export function settingsFromConfig(cfg: AppConfig): RunSettings {
  return {
    feedUrl: cfg.FEED_URL,
    feedTab: cfg.FEED_TAB.trim() || undefined,
    timeZone: cfg.TIMEZONE,
    maxPerRun: cfg.MAX_PER_RUN,
    maxPostsPerDay: cfg.MAX_POSTS_PER_DAY,
    cooldownMinutes: cfg.COOLDOWN_MINUTES,
    postedHistoryLimit: cfg.POSTED_HISTORY_LIMIT,
    postDelayMs: cfg.POST_DELAY_MS,
    postJitterMs: cfg.POST_JITTER_MS,
    renderRetries: cfg.RENDER_RETRIES,
    renderRetryDelayMs: cfg.RENDER_RETRY_DELAY_MS
  };
}

export type RunDeps = {
  store: StateStore;
  renderer: PageRenderer;
  poster: SocialPoster;
  settings?: Partial<RunSettings>;
  policy?: ExtractionPolicy;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
};

export type RunStatus = "completed" | "cooldown" | "daily_cap" | "renderer_failed" | "no_items" | "rate_limited";

export type RunSummary = {
  status: RunStatus;
  extracted: number;
  candidates: number;
  posted: number;
  skipped: number;
  failed: number;
  postedIds: string[];
  cooldownUntil: string | null;
};

function summary(status: RunStatus, partial: Partial<RunSummary> = {}): RunSummary {
  return {
    status,
    extracted: 0,
    candidates: 0,
    posted: 0,
    skipped: 0,
    failed: 0,
    postedIds: [],
    cooldownUntil: null,
    ...partial
  };
}

/**
 * One pass: gate → snapshot → extract → select → compose → post.
 * Candidates go out oldest first until min(maxPerRun, daily budget) posts succeed.
 * State is saved after every successful post and once more at the end.
 */
export async function runOnce(deps: RunDeps): Promise<RunSummary> {
  const settings: RunSettings = { ...DEFAULT_RUN_SETTINGS, ...deps.settings };
  const now = deps.now ?? (() => new Date());
  const wait = deps.sleep ?? realSleep;
  const { store, poster } = deps;
  const cooldown = new CooldownManager(store, settings.cooldownMinutes);

  const startedAt = now();
  const today = dayKey(startedAt, settings.timeZone);
  store.update((s) => rollDay(s, today));

  if (cooldown.status(startedAt) === "COOLDOWN") {
    logger.info("run.cooldown; skipping this run", {
      until: store.state.cooldownUntil,
      remainingMs: cooldown.remainingMs(startedAt)
    });
    return summary("cooldown", { cooldownUntil: store.state.cooldownUntil });
  }
  cooldown.release(startedAt);

  const dailyBudget = settings.maxPostsPerDay - store.state.dailyCount;
  if (dailyBudget <= 0) {
    logger.info("run.daily_cap reached", { day: today, count: store.state.dailyCount, cap: settings.maxPostsPerDay });
    await store.save();
    return summary("daily_cap");
  }

  const blocks = await renderWithRetry(deps.renderer, settings, wait);
  if (!blocks) {
    await store.save();
    return summary("renderer_failed");
  }

  const { items, stats } = extractWithStats(blocks, deps.policy ?? defaultExtractionPolicy());
  if (items.length === 0) {
    logger.info("run.no_items", { blocks: stats.blocks, discarded: stats.discarded });
    await store.save();
    return summary("no_items");
  }

  const phase = cursorPhase(store.state);
  const selection = selectCandidates(items, store.state);
  const queue = selection.candidates;
  // Only successful posts count against the budget.
  const postBudget = Math.min(settings.maxPerRun, dailyBudget);
  logger.info("run.selected", {
    phase,
    extracted: items.length,
    candidates: queue.length,
    postBudget,
    alreadyPosted: selection.alreadyPosted,
    cursorFound: selection.cursorFound
  });
  if (phase === "STEADY" && !selection.cursorFound) {
    logger.warn("run.cursor_not_in_snapshot; treating the whole snapshot as new", {
      lastSeenId: store.state.lastSeenId
    });
  }

  let posted = 0;
  let skipped = 0;
  let failed = 0;
  let rateLimited = false;
  const postedIds: string[] = [];

  for (const [i, item] of queue.entries()) {
    if (posted >= postBudget) {
      logger.info("run.budget_spent", { posted, left: queue.length - i });
      break;
    }

    const draft = buildDraft(item);
    if (!draft) {
      skipped += 1;
      const err = new EmptyComposedTweet(item.id);
      logger.warn("run.skip_empty_tweet", { id: item.id, error: err.message, raw: truncateForLog(item.raw) });
      continue;
    }

    logger.info("run.posting", { id: item.id, codes: item.codes, text: draft.text });
    const result = await safePost(poster, draft.text);

    if (result.kind === "rate_limited") {
      await cooldown.trip(now(), result.resetAt);
      rateLimited = true;
      logger.warn("run.rate_limited; stopping posting loop", {
        id: item.id,
        remaining: queue.length - i
      });
      break;
    }

    if (result.kind === "error") {
      failed += 1;
      logger.error("run.post_failed", { id: item.id, error: result.message, raw: truncateForLog(item.raw) });
      continue;
    }

    posted += 1;
    postedIds.push(item.id);
    const postedDay = dayKey(now(), settings.timeZone);
    store.update((s) =>
      recordDailyPost(advanceCursor(rememberPosted(s, item.id, settings.postedHistoryLimit), selection.newestId), postedDay)
    );
    await store.save();

    const hasMore = i < queue.length - 1 && posted < postBudget;
    if (hasMore && poster.mode !== "simulation") {
      await wait(jitteredDelayMs(settings.postDelayMs, settings.postJitterMs));
    }
  }

  store.update((s) => advanceCursor(s, selection.newestId));
  await store.save();

  const out = summary(rateLimited ? "rate_limited" : "completed", {
    extracted: items.length,
    candidates: queue.length,
    posted,
    skipped,
    failed,
    postedIds,
    cooldownUntil: store.state.cooldownUntil
  });
  logger.info("run.done", { ...out });
  return out;
}

async function renderWithRetry(
  renderer: PageRenderer,
  settings: RunSettings,
  wait: (ms: number) => Promise<void>
): Promise<RawBlock[] | null> {
  for (let attempt = 1; attempt <= settings.renderRetries; attempt++) {
    try {
      logger.info("run.render", { attempt, of: settings.renderRetries, url: settings.feedUrl });
      return await renderer.render(settings.feedUrl, settings.feedTab || undefined);
    } catch (err) {
      logger.warn("run.render_failed", { attempt, error: errorMessage(err) });
      if (attempt < settings.renderRetries) await wait(settings.renderRetryDelayMs);
    }
  }
  logger.error("run.renderer_failure; ending run without posting", { attempts: settings.renderRetries });
  return null;
}

// A throwing poster is one failed item, not a failed run.
async function safePost(poster: SocialPoster, text: string): Promise<PostResult> {
  try {
    return await poster.post(text);
  } catch (err) {
    return { kind: "error", message: errorMessage(err) };
  }
}
