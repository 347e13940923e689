/** One visible feed row as rendered, newest rows first. */
export type RawBlock = {
  text: string;
};

export type NewsItem = {
  /** Stable fingerprint of (marker, codes, normalized content). */
  id: string;
  /** 1–2 uppercase stock codes, in the order they appear. */
  codes: string[];
  content: string;
  /** Original block text, kept for debugging. */
  raw: string;
};

export type ContentCleanupRule = {
  name: string;
  pattern: RegExp;
  replacement: string;
};

export type ExtractionPolicy = {
  /** Literal tag identifying disclosure rows, also used in item ids. */
  marker: string;
  /** Regex source matching the marker as a whole word. */
  markerPattern: string;
  /** Regex source for one stock code (no capture groups). */
  codePattern: string;
  /** Regex source for the separator between two codes. */
  separatorPattern: string;
  bannedTokens: ReadonlySet<string>;
  contentCleanupRules: ContentCleanupRule[];
  /** Digest/newsletter rows; tested against the whole block. */
  nonNewsPatterns: RegExp[];
  minContentLength: number;
};
