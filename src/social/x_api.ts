import type { AppConfig } from "../config.js";
import { errorMessage, logger } from "../logger.js";
import { sleep } from "../utils.js";
import { oauth1Header, type OAuth1Credentials } from "./oauth1.js";
import type { PostResult, SocialPoster } from "./poster.js";

const CREATE_TWEET_URL = "https://api.twitter.com/2/tweets";

export type XCredentials = OAuth1Credentials;

export type XPosterOptions = {
  timeoutMs?: number;
  maxAttempts?: number;
  /** Injected in tests to skip real backoff waits. */
  sleepFn?: (ms: number) => Promise<void>;
};

/**
 * X API posting via OAuth 1.0a (user context).
 *
 * - 429 is reported as rate_limited right away; the caller owns the cooldown.
 * - Network errors and 5xx are retried with a short backoff.
 * - A "duplicate content" rejection counts as posted.
 */
export function createXPosterApi(cfg: AppConfig, opts: XPosterOptions = {}): SocialPoster {
  const creds: XCredentials = {
    consumerKey: must(cfg.X_API_KEY, "X_API_KEY"),
    consumerSecret: must(cfg.X_API_SECRET, "X_API_SECRET"),
    accessToken: must(cfg.X_ACCESS_TOKEN, "X_ACCESS_TOKEN"),
    accessSecret: must(cfg.X_ACCESS_SECRET, "X_ACCESS_SECRET")
  };
  const timeoutMs = opts.timeoutMs ?? cfg.HTTP_TIMEOUT_MS;

  return {
    mode: "x_api",
    post(text: string) {
      return postTweetXApi(creds, text, { ...opts, timeoutMs });
    }
  };
}

export async function postTweetXApi(creds: XCredentials, text: string, opts: XPosterOptions = {}): Promise<PostResult> {
  const maxAttempts = opts.maxAttempts ?? 3;
  const wait = opts.sleepFn ?? sleep;
  const method = "POST";
  const payload = JSON.stringify({ text });
  let lastError = "x_api exhausted retries";

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const authHeader = oauth1Header({ method, url: CREATE_TWEET_URL }, creds);

    let res: Response;
    try {
      res = await fetch(CREATE_TWEET_URL, {
        method,
        headers: {
          Authorization: authHeader,
          "Content-Type": "application/json",
          Accept: "application/json"
        },
        body: payload,
        signal: AbortSignal.timeout(opts.timeoutMs ?? 30_000)
      });
    } catch (e) {
      lastError = `network error: ${errorMessage(e)}`;
      logger.warn("x_api network error", { attempt, error: errorMessage(e) });
      if (attempt < maxAttempts) await wait(retryDelayMs(attempt));
      continue;
    }

    const raw = await res.text().catch(() => "");

    if (res.status === 429) {
      const resetAt = parseResetHeader(res.headers.get("x-rate-limit-reset"));
      logger.warn("x_api rate-limited", {
        attempt,
        resetAt: resetAt?.toISOString() ?? null,
        body: summarizeXError(raw)
      });
      return resetAt ? { kind: "rate_limited", resetAt } : { kind: "rate_limited" };
    }

    if (res.status >= 500 && res.status <= 599) {
      lastError = `HTTP ${res.status}: ${summarizeXError(raw)}`;
      logger.warn("x_api transient error", { attempt, status: res.status, body: summarizeXError(raw) });
      if (attempt < maxAttempts) await wait(retryDelayMs(attempt));
      continue;
    }

    if (!res.ok) {
      const summary = summarizeXError(raw);

      if (isDuplicateTweet(summary) || isDuplicateTweet(raw)) {
        logger.info("x_api rejected duplicate tweet; treating as posted", { status: res.status, detail: summary });
        return { kind: "ok" };
      }

      if (res.status === 401 || res.status === 403) {
        logger.error("x_api auth/permission error (check app permissions + regenerate user tokens)", {
          status: res.status,
          detail: summary,
          fix:
            "Ensure the X app has Read+Write permissions, then regenerate X_ACCESS_TOKEN/X_ACCESS_SECRET. " +
            "OAuth 1.0a user tokens are required (not the bearer token)."
        });
        return { kind: "error", message: `auth error ${res.status}: ${summary}` };
      }

      logger.error("x_api post failed", { status: res.status, attempt, detail: summary });
      return { kind: "error", message: `HTTP ${res.status}: ${summary}` };
    }

    const tweetId = extractTweetId(safeJsonParse(raw));
    if (!tweetId) {
      logger.error("x_api response missing tweet id", { status: res.status, detail: summarizeXError(raw) });
      return { kind: "error", message: "response missing tweet id" };
    }

    logger.info("x_api posted successfully", {
      attempt,
      tweetId,
      tweetUrl: `https://x.com/i/web/status/${tweetId}`
    });
    return { kind: "ok", postId: tweetId };
  }

  logger.error("x_api exhausted retries", { attempts: maxAttempts, error: lastError });
  return { kind: "error", message: lastError };
}

function retryDelayMs(attempt: number): number {
  if (attempt <= 1) return 1_000;
  if (attempt === 2) return 3_000;
  return 8_000;
}

function parseResetHeader(v: string | null): Date | undefined {
  if (!v) return undefined;
  const secs = parseInt(v, 10);
  return Number.isFinite(secs) && secs > 0 ? new Date(secs * 1000) : undefined;
}

function must(v: string | undefined, name: string): string {
  if (!v || !v.trim()) throw new Error(`${name} is required for the X API poster`);
  return v;
}

function safeJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function extractTweetId(parsed: unknown): string | null {
  if (!isRecord(parsed) || !isRecord(parsed.data)) return null;
  const id = parsed.data.id;
  return typeof id === "string" && id.trim() ? id : null;
}

export function summarizeXError(raw: string): string {
  const parsed = safeJsonParse(raw);
  if (isRecord(parsed)) {
    const errorList: unknown[] = Array.isArray(parsed.errors) ? parsed.errors : [];
    const first = errorList[0];
    const firstError: Record<string, unknown> = isRecord(first) ? first : {};
    const candidates = [
      parsed.detail,
      parsed.title,
      parsed.message,
      firstError.message,
      firstError.detail,
      firstError.title
    ];
    const msg = candidates.find((c): c is string => typeof c === "string" && c.trim().length > 0);
    if (msg) return msg.trim().slice(0, 300);
  }
  return raw.trim().slice(0, 300);
}

function isDuplicateTweet(msg: string): boolean {
  return msg.toLowerCase().includes("duplicate");
}
