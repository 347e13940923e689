import type { AppConfig } from "../config.js";
import { hasXCredentials, missingXCredentials } from "../config.js";
import { logger } from "../logger.js";
import { createXPosterApi } from "./x_api.js";

export type PostResult =
  | { kind: "ok"; postId?: string }
  | { kind: "rate_limited"; resetAt?: Date }
  | { kind: "error"; message: string };

export type PosterMode = "x_api" | "simulation";

export type SocialPoster = {
  readonly mode: PosterMode;
  post(text: string): Promise<PostResult>;
};

/**
 * Stand-in used when credentials are missing: logs the text and reports
 * success so the rest of the pipeline (and the state) moves on.
 */
export function createSimulationPoster(): SocialPoster {
  return {
    mode: "simulation",
    async post(text: string) {
      logger.info("poster.simulation", { text, length: text.length });
      return { kind: "ok" };
    }
  };
}

export function createPoster(cfg: AppConfig): SocialPoster {
  if (!hasXCredentials(cfg)) {
    logger.warn("poster.credentials_missing; running in simulation mode", {
      missing: missingXCredentials(cfg)
    });
    return createSimulationPoster();
  }
  return createXPosterApi(cfg);
}
