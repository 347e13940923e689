#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { runOnce, settingsFromConfig } from "./agent/run.js";
import { StateStore } from "./agent/state.js";
import { createExtractionPolicy } from "./feed/policy.js";
import { HttpPageRenderer } from "./feed/renderer.js";
import { logger } from "./logger.js";
import { createPoster } from "./social/poster.js";

async function main(): Promise<void> {
  const cfg = loadConfig();
  process.env.LOG_LEVEL = cfg.LOG_LEVEL;

  const poster = createPoster(cfg);
  logger.info("kap-relay starting", {
    feedUrl: cfg.FEED_URL,
    feedTab: cfg.FEED_TAB || null,
    statePath: cfg.STATE_PATH,
    posterMode: poster.mode,
    maxPerRun: cfg.MAX_PER_RUN,
    maxPostsPerDay: cfg.MAX_POSTS_PER_DAY
  });

  const store = await StateStore.open(cfg.STATE_PATH);
  const result = await runOnce({
    store,
    renderer: new HttpPageRenderer({ timeoutMs: cfg.HTTP_TIMEOUT_MS }),
    poster,
    settings: settingsFromConfig(cfg),
    policy: createExtractionPolicy({ minContentLength: cfg.MIN_CONTENT_LENGTH })
  });

  logger.info("kap-relay finished", { status: result.status, posted: result.posted });
}

main().catch((err) => {
  logger.error("fatal", {
    error: err instanceof Error ? err.message : String(err),
    stack: err instanceof Error ? err.stack : undefined
  });
  process.exitCode = 1;
});
