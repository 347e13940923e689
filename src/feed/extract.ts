import { ExtractionNoise, InvalidCode } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import { truncateForLog } from "../utils.js";
import { fingerprintItem } from "./fingerprint.js";
import { defaultExtractionPolicy, headerRegex, normalizeToken } from "./policy.js";
import type { ExtractionPolicy, NewsItem, RawBlock } from "./types.js";

export type ExtractionStats = {
  blocks: number;
  items: number;
  discarded: number;
  duplicates: number;
};

/**
 * Turn a feed snapshot (newest-first) into NewsItems in the same order.
 * A block that fails for any reason is logged and skipped.
 */
export function extractNewsItems(blocks: RawBlock[], policy: ExtractionPolicy = defaultExtractionPolicy()): NewsItem[] {
  return extractWithStats(blocks, policy).items;
}

export function extractWithStats(
  blocks: RawBlock[],
  policy: ExtractionPolicy = defaultExtractionPolicy()
): { items: NewsItem[]; stats: ExtractionStats } {
  const header = headerRegex(policy);
  const items: NewsItem[] = [];
  const seen = new Set<string>();
  const stats: ExtractionStats = { blocks: blocks.length, items: 0, discarded: 0, duplicates: 0 };

  for (const [index, block] of blocks.entries()) {
    let item: NewsItem;
    try {
      item = parseBlock(block, policy, header);
    } catch (err) {
      stats.discarded += 1;
      logger.info("extract.discard", {
        index,
        reason: err instanceof Error ? err.name : "Error",
        detail: errorMessage(err),
        raw: truncateForLog(String(block?.text ?? ""))
      });
      continue;
    }

    if (seen.has(item.id)) {
      stats.duplicates += 1;
      continue;
    }
    seen.add(item.id);
    items.push(item);
  }

  stats.items = items.length;
  logger.info("extract.done", stats);
  return { items, stats };
}

export function parseBlock(block: RawBlock, policy: ExtractionPolicy, header: RegExp = headerRegex(policy)): NewsItem {
  const text = block.text.replace(/\s+/g, " ").trim();
  if (!text) throw new ExtractionNoise("empty block");

  const match = header.exec(text);
  if (!match) throw new ExtractionNoise(`no ${policy.marker} header`);

  const tokens = [match[1], match[2]].filter((t): t is string => typeof t === "string" && t.length > 0);
  const codes = validCodes(tokens, policy);
  if (codes.length === 0) throw new InvalidCode(tokens);

  for (const p of policy.nonNewsPatterns) {
    if (p.test(text)) throw new ExtractionNoise(`non-news row (${p.source})`);
  }

  const content = cleanContent(text.slice(match.index + match[0].length), policy);
  if (content.length < policy.minContentLength) {
    throw new ExtractionNoise(`content shorter than ${policy.minContentLength} chars`);
  }

  return {
    id: fingerprintItem({ marker: policy.marker, codes, content }),
    codes,
    content,
    raw: block.text
  };
}

export function validCodes(tokens: string[], policy: ExtractionPolicy): string[] {
  const out: string[] = [];
  for (const token of tokens) {
    const code = normalizeToken(token);
    if (policy.bannedTokens.has(code)) continue;
    if (out.includes(code)) continue;
    out.push(code);
  }
  return out;
}

export function cleanContent(text: string, policy: ExtractionPolicy): string {
  let out = text;
  for (const rule of policy.contentCleanupRules) {
    out = out.replace(rule.pattern, rule.replacement);
  }
  return out.trim();
}
