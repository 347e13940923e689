import { readFileSync } from "node:fs";
import { z } from "zod";
import type { ContentCleanupRule, ExtractionPolicy } from "./types.js";

const BANNED_TOKENS_URL = new URL("../../config/banned-tokens.json", import.meta.url);

// Letters that may border a token; a code or marker must not touch one of these.
export const WORD_CHARS = "A-Za-zÇĞİÖŞÜçğıöşüÂâÎîÛû0-9";

export const DEFAULT_MIN_CONTENT_LENGTH = 20;

export function loadBannedTokens(url: URL = BANNED_TOKENS_URL): Set<string> {
  const raw: unknown = JSON.parse(readFileSync(url, "utf8"));
  const tokens = z.array(z.string().min(1)).parse(raw);
  return new Set(tokens.map(normalizeToken));
}

/** Upper-cases with Turkish rules so "hisse" and "HİSSE" compare equal. */
export function normalizeToken(token: string): string {
  return token.trim().toLocaleUpperCase("tr-TR");
}

export const DEFAULT_CLEANUP_RULES: ContentCleanupRule[] = [
  { name: "leading-punctuation", pattern: /^[\p{P}|\s]+/u, replacement: "" },
  {
    name: "relative-date-prefix",
    pattern: /^(?:Dün|Bugün|Yesterday|Today)(?:\s*,?\s*\d{1,2}[:.]\d{2})?(?=\s|$)\s*/iu,
    replacement: ""
  },
  { name: "clock-prefix", pattern: /^\d{1,2}:\d{2}\s+/u, replacement: "" },
  { name: "leading-punctuation-after-date", pattern: /^[\p{P}|\s]+/u, replacement: "" },
  {
    name: "relative-date-suffix",
    pattern: /(?:^|\s+)(?:Dün|Bugün|Yesterday|Today)(?:\s*,?\s*\d{1,2}[:.]\d{2})?$/iu,
    replacement: ""
  },
  { name: "date-time-suffix", pattern: /\s+\d{1,2}\s+\p{L}+\s+\d{1,2}:\d{2}$/u, replacement: "" },
  { name: "clock-suffix", pattern: /\s+\d{1,2}:\d{2}$/u, replacement: "" },
  { name: "disclaimer", pattern: /\s*Yatırım tavsiyesi değildir\.?/giu, replacement: " " },
  { name: "read-more", pattern: /\s*(?:Detaylar için tıklayınız|Devamını oku)(?:\.{1,3}|…)?/giu, replacement: " " },
  { name: "whitespace", pattern: /\s+/gu, replacement: " " }
];

export const DEFAULT_NON_NEWS_PATTERNS: RegExp[] = [/Fintables/i, /Günlük Bülten/i, /Analist/i, /Bülten/i];

let defaultPolicy: ExtractionPolicy | null = null;

/**
 * The KAP disclosure policy: "KAP • THYAO ..." or "KAP • AAA / BBB ...".
 */
export function defaultExtractionPolicy(): ExtractionPolicy {
  if (!defaultPolicy) {
    defaultPolicy = {
      marker: "KAP",
      markerPattern: `(?<![${WORD_CHARS}])KAP(?![${WORD_CHARS}])`,
      codePattern: `[A-ZÇĞİÖŞÜ]{3,6}[0-9]{0,2}(?![${WORD_CHARS}])`,
      separatorPattern: "[•/|,-]",
      bannedTokens: loadBannedTokens(),
      contentCleanupRules: DEFAULT_CLEANUP_RULES,
      nonNewsPatterns: DEFAULT_NON_NEWS_PATTERNS,
      minContentLength: DEFAULT_MIN_CONTENT_LENGTH
    };
  }
  return defaultPolicy;
}

export function createExtractionPolicy(overrides: Partial<ExtractionPolicy> = {}): ExtractionPolicy {
  const base = defaultExtractionPolicy();
  const merged: ExtractionPolicy = { ...base, ...overrides };
  // The marker itself is never a code.
  if (!merged.bannedTokens.has(normalizeToken(merged.marker))) {
    merged.bannedTokens = new Set([...merged.bannedTokens, normalizeToken(merged.marker)]);
  }
  return merged;
}

/**
 * Regex with the codes in groups 1 and 2 (group 2 optional).
 */
export function headerRegex(policy: ExtractionPolicy): RegExp {
  const code = `(${policy.codePattern})`;
  return new RegExp(
    `${policy.markerPattern}[^${WORD_CHARS}]*${code}(?:\\s*${policy.separatorPattern}\\s*${code})?`
  );
}
