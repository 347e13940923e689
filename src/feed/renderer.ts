import * as cheerio from "cheerio";
import { RendererError } from "../errors.js";
import { errorMessage, logger } from "../logger.js";
import type { RawBlock } from "./types.js";

export interface PageRenderer {
  /** Visible feed rows, newest first. */
  render(url: string, filterTabName?: string): Promise<RawBlock[]>;
}

export const ROW_SELECTOR = "[role='listitem'], li, article";
export const MIN_ROW_LENGTH = 35;

const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/118 Safari/537.36";

export type HttpRendererOptions = {
  timeoutMs?: number;
  userAgent?: string;
  minRowLength?: number;
};

/**
 * Fetches the page over HTTP and reads rows out of the server-rendered HTML.
 */
export class HttpPageRenderer implements PageRenderer {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly minRowLength: number;

  constructor(opts: HttpRendererOptions = {}) {
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.userAgent = opts.userAgent ?? DEFAULT_USER_AGENT;
    this.minRowLength = opts.minRowLength ?? MIN_ROW_LENGTH;
  }

  async render(url: string, filterTabName?: string): Promise<RawBlock[]> {
    let pageUrl = url;
    let html = await this.fetchHtml(pageUrl);

    const tab = filterTabName?.trim();
    if (tab) {
      const href = findTabHref(html, tab, pageUrl);
      if (href && href !== pageUrl) {
        pageUrl = href;
        html = await this.fetchHtml(pageUrl);
        logger.info("renderer.tab_selected", { tab, url: pageUrl });
      } else {
        logger.info("renderer.tab_missing; staying on default tab", { tab });
      }
    }

    const blocks = extractBlocks(html, this.minRowLength);
    logger.info("renderer.snapshot", { url: pageUrl, blocks: blocks.length });
    return blocks;
  }

  private async fetchHtml(url: string): Promise<string> {
    let res: Response;
    try {
      res = await fetch(url, {
        headers: {
          "User-Agent": this.userAgent,
          Accept: "text/html,application/xhtml+xml",
          "Accept-Language": "tr-TR,tr;q=0.9,en;q=0.8"
        },
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (err) {
      throw new RendererError(`fetch failed for ${url}: ${errorMessage(err)}`, undefined, { cause: err });
    }
    if (!res.ok) throw new RendererError(`HTTP ${res.status} for ${url}`, res.status);
    return await res.text();
  }
}

/**
 * Innermost row-like elements under <main> (or <body>), in document order.
 * Falls back to leaf <div>s when the page has no list markup.
 */
export function extractBlocks(html: string, minRowLength = MIN_ROW_LENGTH): RawBlock[] {
  const $ = cheerio.load(html);
  $("script, style, noscript, template").remove();
  $("br").replaceWith(" ");

  const main = $("main").first();
  const root = main.length > 0 ? main : $("body");

  // Pad every element so inline siblings ("KAP", "THYAO") do not glue together.
  root.find("*").each((_, el) => {
    $(el).prepend(" ").append(" ");
  });

  let rows = root.find(ROW_SELECTOR).filter((_, el) => $(el).find(ROW_SELECTOR).length === 0);
  if (rows.length === 0) {
    rows = root.find("div").filter((_, el) => $(el).find("div").length === 0);
  }

  const blocks: RawBlock[] = [];
  rows.each((_, el) => {
    const text = $(el).text().replace(/\s+/g, " ").trim();
    if (text.length >= minRowLength) blocks.push({ text });
  });
  return blocks;
}

/**
 * Absolute href of the link whose text is the tab name, if any.
 */
export function findTabHref(html: string, tabName: string, baseUrl: string): string | null {
  const $ = cheerio.load(html);
  const wanted = tabName.trim().toLocaleLowerCase("tr-TR");

  let href: string | null = null;
  $("a[href]").each((_, el) => {
    const label = $(el).text().replace(/\s+/g, " ").trim().toLocaleLowerCase("tr-TR");
    const raw = $(el).attr("href");
    if (label !== wanted || !raw) return;
    try {
      href = new URL(raw, baseUrl).toString();
      return false;
    } catch {
      logger.debug("renderer.tab_href_invalid", { href: raw });
      return;
    }
  });
  return href;
}
