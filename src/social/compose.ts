import type { NewsItem } from "../feed/types.js";

/** X counts plain text up to 280; emoji weigh 2, which UTF-16 length matches. */
export const PLATFORM_LIMIT = 280;
export const MARKER_EMOJI = "📰";
export const ELLIPSIS = "…";
/** A first sentence shorter than this gets the second one appended. */
export const MIN_FIRST_SENTENCE = 40;

export type TweetDraft = {
  codes: string[];
  body: string;
  text: string;
};

export type ComposeOptions = {
  limit?: number;
  emoji?: string;
  minFirstSentence?: number;
};

export function composeHead(codes: string[], emoji = MARKER_EMOJI): string {
  return `${emoji} ${codes.map((c) => `#${c}`).join(" ")} | `;
}

// "A.Ş.", "T.A.Ş.", "Ltd." and friends end with a dot but not a sentence.
const ABBREVIATION = /(?:^|[\s(])(?:(?:\p{Lu}\.)+|(?:Ltd|Şti|Tic|San|vb|vs|Dr|Av|No|Sn)\.)$/u;
// "3. çeyrek", "2. el": an ordinal, when the next word is lowercase.
const ORDINAL = /(?:^|\s)\d{1,3}\.$/u;
const LOWERCASE_START = /^\p{Ll}/u;

function continuesSentence(prev: string, next: string): boolean {
  return ABBREVIATION.test(prev) || (ORDINAL.test(prev) && LOWERCASE_START.test(next));
}

/**
 * Split after ".", "!", "?" or "…" followed by whitespace.
 */
export function splitSentences(content: string): string[] {
  const pieces = content
    .split(/(?<=[.!?…])\s+/u)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);

  const out: string[] = [];
  for (const piece of pieces) {
    const prev = out[out.length - 1];
    if (prev !== undefined && continuesSentence(prev, piece)) {
      out[out.length - 1] = `${prev} ${piece}`;
    } else {
      out.push(piece);
    }
  }
  return out;
}

export function leadSentences(content: string, minFirst = MIN_FIRST_SENTENCE): string {
  const sentences = splitSentences(content);
  const first = sentences[0] ?? "";
  const second = sentences[1];
  if (first.length < minFirst && second) return `${first} ${second}`;
  return first;
}

/**
 * Fit `body` into `budget` code units, cutting at the last whitespace and
 * appending the ellipsis.
 */
export function truncateAtWord(body: string, budget: number): string {
  if (body.length <= budget) return body;
  const room = budget - ELLIPSIS.length;
  if (room <= 0) return ELLIPSIS.slice(0, Math.max(0, budget));

  const window = body.slice(0, room + 1);
  const lastSpace = window.search(/\s\S*$/u);
  let cut = lastSpace > 0 ? body.slice(0, lastSpace) : hardCut(body, room);
  cut = cut.trimEnd();
  if (!cut) cut = hardCut(body, room).trimEnd();
  return cut + ELLIPSIS;
}

function hardCut(s: string, n: number): string {
  let end = n;
  // Do not leave half of a surrogate pair behind.
  const code = s.charCodeAt(end - 1);
  if (code >= 0xd800 && code <= 0xdbff) end -= 1;
  return s.slice(0, end);
}

/**
 * "📰 #CODE [#CODE2] | <lead sentence(s)>", never longer than the limit.
 * Returns "" when there is nothing to post.
 */
export function composeTweet(codes: string[], content: string, opts: ComposeOptions = {}): string {
  const limit = opts.limit ?? PLATFORM_LIMIT;
  const cleaned = content.replace(/\s+/g, " ").trim();
  if (!cleaned || codes.length === 0) return "";

  const head = composeHead(codes, opts.emoji);
  if (head.length + ELLIPSIS.length >= limit) return "";

  const body = truncateAtWord(leadSentences(cleaned, opts.minFirstSentence), limit - head.length);
  if (!body.trim()) return "";
  return head + body;
}

export function buildDraft(item: Pick<NewsItem, "codes" | "content">, opts: ComposeOptions = {}): TweetDraft | null {
  const text = composeTweet(item.codes, item.content, opts);
  if (!text) return null;
  const head = composeHead(item.codes, opts.emoji);
  return { codes: [...item.codes], body: text.slice(head.length), text };
}
