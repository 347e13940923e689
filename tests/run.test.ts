import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { runOnce, settingsFromConfig, type RunSettings } from "../src/agent/run.js";
import { defaultState, StateStore, type PersistedState } from "../src/agent/state.js";
import { loadConfig } from "../src/config.js";
import { extractNewsItems } from "../src/feed/extract.js";
import type { PageRenderer } from "../src/feed/renderer.js";
import type { RawBlock } from "../src/feed/types.js";
import type { PostResult, PosterMode, SocialPoster } from "../src/social/poster.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");
const TODAY = "2026-03-02";

const BLOCK_A = { text: "KAP • AAA Birinci şirket yeni bir sözleşme imzaladı." };
const BLOCK_B = { text: "KAP • BBB İkinci şirket bedelsiz sermaye artırımı yaptı." };
const BLOCK_C = { text: "KAP • CCC Üçüncü şirket temettü dağıtım kararı aldı." };
// Newest first, as the feed lists them.
const FEED: RawBlock[] = [BLOCK_C, BLOCK_B, BLOCK_A];

const idOf = (block: RawBlock): string => {
  const id = extractNewsItems([block])[0]?.id;
  if (!id) throw new Error(`no item in ${block.text}`);
  return id;
};

function fakeRenderer(snapshot: RawBlock[], failures = 0): PageRenderer & { calls: number } {
  return {
    calls: 0,
    async render() {
      this.calls += 1;
      if (this.calls <= failures) throw new Error("navigation timeout");
      return snapshot;
    }
  };
}

function fakePoster(results: Array<PostResult | Error> = [], mode: PosterMode = "x_api") {
  const texts: string[] = [];
  const poster: SocialPoster = {
    mode,
    async post(text: string) {
      texts.push(text);
      const next: PostResult | Error = results[texts.length - 1] ?? { kind: "ok" };
      if (next instanceof Error) throw next;
      return next;
    }
  };
  return { poster, texts };
}

function memoryStore(overrides: Partial<PersistedState> = {}) {
  const saves: PersistedState[] = [];
  const store = new StateStore({ ...defaultState(), ...overrides }, async (s) => {
    saves.push(s);
  });
  return { store, saves };
}

const FAST: Partial<RunSettings> = { postDelayMs: 0, postJitterMs: 0, renderRetryDelayMs: 0 };

function deps(
  store: StateStore,
  renderer: PageRenderer,
  poster: SocialPoster,
  settings: Partial<RunSettings> = {},
  sleep = vi.fn(async (_ms: number) => {})
) {
  return { store, renderer, poster, settings: { ...FAST, ...settings }, now: () => NOW, sleep };
}

describe("runOnce", () => {
  it("posts a single new item and records it", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, fakeRenderer([{ text: "KAP • AAA Şirket X bir anlaşma imzaladı." }]), poster));

    const id = idOf({ text: "KAP • AAA Şirket X bir anlaşma imzaladı." });
    expect(res.status).toBe("completed");
    expect(texts).toEqual(["📰 #AAA | Şirket X bir anlaşma imzaladı."]);
    expect(store.state).toEqual({ lastSeenId: id, postedIds: [id], cooldownUntil: null, dailyCount: 1, day: TODAY });
  });

  it("posts nothing on an identical second run", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster();
    const renderer = fakeRenderer(FEED);

    await runOnce(deps(store, renderer, poster));
    const before = { ...store.state };
    const second = await runOnce(deps(store, renderer, poster));

    expect(texts).toHaveLength(3);
    expect(second).toMatchObject({ status: "completed", candidates: 0, posted: 0 });
    expect(store.state).toEqual(before);
  });

  it("ends quietly when no row survives extraction", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, fakeRenderer([{ text: "KAP • BUGUN Şirket X bir anlaşma imzaladı." }]), poster));

    expect(res.status).toBe("no_items");
    expect(texts).toEqual([]);
    expect(store.state.lastSeenId).toBeNull();
  });

  it("posts oldest first and trips the cooldown on a rate limit", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster([{ kind: "ok" }, { kind: "rate_limited" }]);

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(res.status).toBe("rate_limited");
    expect(texts).toEqual([
      "📰 #AAA | Birinci şirket yeni bir sözleşme imzaladı.",
      "📰 #BBB | İkinci şirket bedelsiz sermaye artırımı yaptı."
    ]);
    expect(store.state.postedIds).toEqual([idOf(BLOCK_A)]);
    expect(store.state.lastSeenId).toBe(idOf(BLOCK_C));
    expect(store.state.cooldownUntil).toBe("2026-03-02T09:15:00.000Z");
    expect(res.cooldownUntil).toBe("2026-03-02T09:15:00.000Z");
  });

  it("composes long items within the platform limit", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster();
    const long = { text: `KAP • AAA ${"Şirket açıklaması ".repeat(20)}sona erdi.` };

    await runOnce(deps(store, fakeRenderer([long]), poster));

    expect(texts).toHaveLength(1);
    expect(texts[0]?.length).toBeLessThanOrEqual(280);
    expect(texts[0]?.endsWith("…")).toBe(true);
  });

  it("does nothing while a cooldown is active", async () => {
    const { store, saves } = memoryStore({ cooldownUntil: "2026-03-02T09:10:00.000Z" });
    const renderer = fakeRenderer(FEED);
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, renderer, poster));

    expect(res.status).toBe("cooldown");
    expect(renderer.calls).toBe(0);
    expect(texts).toEqual([]);
    expect(saves).toEqual([]);
  });

  it("clears an expired cooldown and posts", async () => {
    const { store } = memoryStore({ cooldownUntil: "2026-03-02T08:00:00.000Z" });
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(res.status).toBe("completed");
    expect(texts).toHaveLength(3);
    expect(store.state.cooldownUntil).toBeNull();
  });

  it("caps posts per run, oldest candidates first", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster, { maxPerRun: 2 }));

    expect(texts.map((t) => t.slice(0, 7))).toEqual(["📰 #AAA", "📰 #BBB"]);
    expect(res).toMatchObject({ status: "completed", candidates: 3, posted: 2 });
    expect(store.state.postedIds).toEqual([idOf(BLOCK_A), idOf(BLOCK_B)]);
    expect(store.state.lastSeenId).toBe(idOf(BLOCK_C));
  });

  it("does not spend the per-run budget on failed posts", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster([{ kind: "error", message: "HTTP 400: Invalid text" }]);

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster, { maxPerRun: 2 }));

    expect(texts).toHaveLength(3);
    expect(res).toMatchObject({ posted: 2, failed: 1 });
    expect(store.state.postedIds).toEqual([idOf(BLOCK_B), idOf(BLOCK_C)]);
  });

  it("stops waiting once the budget is spent", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const { poster, texts } = fakePoster();

    await runOnce(deps(memoryStore().store, fakeRenderer(FEED), poster, { maxPerRun: 2, postDelayMs: 2000 }, sleep));

    expect(texts).toHaveLength(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000]);
  });

  it("stops at the daily cap", async () => {
    const { store } = memoryStore({ dailyCount: 25, day: TODAY });
    const renderer = fakeRenderer(FEED);
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, renderer, poster));

    expect(res.status).toBe("daily_cap");
    expect(renderer.calls).toBe(0);
    expect(texts).toEqual([]);
  });

  it("limits posts to the remaining daily budget", async () => {
    const { store } = memoryStore({ dailyCount: 24, day: TODAY });
    const { poster, texts } = fakePoster();

    await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(texts).toHaveLength(1);
    expect(texts[0]?.startsWith("📰 #AAA")).toBe(true);
    expect(store.state.dailyCount).toBe(25);
  });

  it("resets the daily count on a new day", async () => {
    const { store } = memoryStore({ dailyCount: 25, day: "2026-03-01" });
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(res.status).toBe("completed");
    expect(texts).toHaveLength(3);
    expect(store.state).toMatchObject({ dailyCount: 3, day: TODAY });
  });

  it("retries the renderer and gives up without posting", async () => {
    const { store } = memoryStore();
    const renderer = fakeRenderer(FEED, 5);
    const { poster, texts } = fakePoster();
    const sleep = vi.fn(async (_ms: number) => {});

    const res = await runOnce(deps(store, renderer, poster, { renderRetries: 3, renderRetryDelayMs: 3000 }, sleep));

    expect(res.status).toBe("renderer_failed");
    expect(renderer.calls).toBe(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([3000, 3000]);
    expect(texts).toEqual([]);
  });

  it("recovers when a later render attempt succeeds", async () => {
    const { store } = memoryStore();
    const renderer = fakeRenderer(FEED, 2);
    const { poster, texts } = fakePoster();

    const res = await runOnce(deps(store, renderer, poster));

    expect(res.status).toBe("completed");
    expect(renderer.calls).toBe(3);
    expect(texts).toHaveLength(3);
  });

  it("keeps going after a failed or throwing post", async () => {
    const { store } = memoryStore();
    const { poster, texts } = fakePoster([{ kind: "error", message: "HTTP 400: Invalid text" }, new Error("boom")]);

    const res = await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(texts).toHaveLength(3);
    expect(res).toMatchObject({ status: "completed", posted: 1, failed: 2 });
    expect(store.state.postedIds).toEqual([idOf(BLOCK_C)]);
    expect(store.state.lastSeenId).toBe(idOf(BLOCK_C));
  });

  it("skips items that were already posted", async () => {
    const { store } = memoryStore({ postedIds: [idOf(BLOCK_B)] });
    const { poster, texts } = fakePoster();

    await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(texts.map((t) => t.slice(0, 7))).toEqual(["📰 #AAA", "📰 #CCC"]);
    expect(store.state.postedIds).toEqual([idOf(BLOCK_B), idOf(BLOCK_A), idOf(BLOCK_C)]);
  });

  it("persists after every post", async () => {
    const { store, saves } = memoryStore();
    const { poster } = fakePoster();

    await runOnce(deps(store, fakeRenderer(FEED), poster));

    expect(saves.map((s) => s.postedIds.length)).toEqual([1, 2, 3, 3]);
    expect(saves[0]?.lastSeenId).toBe(idOf(BLOCK_C));
  });

  it("waits between posts only when posting for real", async () => {
    const sleep = vi.fn(async (_ms: number) => {});
    const real = fakePoster([], "x_api");
    await runOnce(deps(memoryStore().store, fakeRenderer(FEED), real.poster, { postDelayMs: 2000 }, sleep));
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([2000, 2000]);

    const simulatedSleep = vi.fn(async (_ms: number) => {});
    const sim = fakePoster([], "simulation");
    await runOnce(deps(memoryStore().store, fakeRenderer(FEED), sim.poster, { postDelayMs: 2000 }, simulatedSleep));
    expect(sim.texts).toHaveLength(3);
    expect(simulatedSleep).not.toHaveBeenCalled();
  });
});

describe("runOnce with a state file", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "kap-relay-run-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes the snake_case state file", async () => {
    const file = path.join(dir, "state.json");
    const block = { text: "KAP • AAA Şirket X bir anlaşma imzaladı." };
    const { poster } = fakePoster([], "simulation");

    await runOnce(deps(await StateStore.open(file), fakeRenderer([block]), poster));

    const id = idOf(block);
    expect(JSON.parse(await readFile(file, "utf8"))).toEqual({
      last_id: id,
      posted: [id],
      cooldown_until: null,
      count_today: 1,
      day: TODAY
    });
  });
});

describe("settingsFromConfig", () => {
  it("maps configuration onto run settings", () => {
    const settings = settingsFromConfig(loadConfig({ FEED_TAB: " ", MAX_PER_RUN: "3", COOLDOWN_MINUTES: "30" }));

    expect(settings.feedTab).toBeUndefined();
    expect(settings.maxPerRun).toBe(3);
    expect(settings.cooldownMinutes).toBe(30);
    expect(settings.timeZone).toBe("Europe/Istanbul");
  });
});
