import crypto from "node:crypto";

/**
 * Render-independent form of item content: case, spacing and a trailing
 * full stop do not affect the fingerprint.
 */
export function normalizeContent(content: string): string {
  return content
    .replace(/\s+/g, " ")
    .trim()
    .toLocaleLowerCase("tr-TR")
    .replace(/[.\s]+$/, "");
}

export function fingerprintItem(args: { marker: string; codes: string[]; content: string }): string {
  const marker = args.marker.trim().toUpperCase();
  const codes = args.codes.map((c) => c.trim());
  const data = [marker, codes.join(","), normalizeContent(args.content)].join("|");
  const hash = crypto.createHash("sha256").update(data).digest("hex").slice(0, 16);
  return `${marker.toLowerCase()}-${codes.join("-")}-${hash}`;
}
