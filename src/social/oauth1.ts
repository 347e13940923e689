import crypto from "node:crypto";

export type OAuth1Credentials = {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessSecret: string;
};

export type SignedRequest = {
  method: string;
  url: string;
};

/** Fixed values for tests; fresh ones are generated otherwise. */
export type OAuth1Stamp = {
  nonce?: string;
  timestamp?: string;
};

/** RFC 3986 unreserved set; encodeURIComponent also leaves !'()* bare. */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);
}

function byteOrder(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * METHOD&base-url&params, with params taken from the oauth fields and the
 * query string. JSON bodies are not signed.
 */
export function signatureBaseString(req: SignedRequest, oauthFields: Record<string, string>): string {
  const url = new URL(req.url);
  const pairs = [...Object.entries(oauthFields), ...url.searchParams.entries()]
    .map(([k, v]) => [percentEncode(k), percentEncode(v)] as const)
    .sort(([ak, av], [bk, bv]) => byteOrder(ak, bk) || byteOrder(av, bv));

  const params = pairs.map(([k, v]) => `${k}=${v}`).join("&");
  return [req.method.toUpperCase(), percentEncode(`${url.origin}${url.pathname}`), percentEncode(params)].join("&");
}

export function hmacSha1Signature(baseString: string, creds: OAuth1Credentials): string {
  const key = `${percentEncode(creds.consumerSecret)}&${percentEncode(creds.accessSecret)}`;
  return crypto.createHmac("sha1", key).update(baseString).digest("base64");
}

/**
 * Authorization header value for an OAuth 1.0a user-context request.
 */
export function oauth1Header(req: SignedRequest, creds: OAuth1Credentials, stamp: OAuth1Stamp = {}): string {
  const fields: Record<string, string> = {
    oauth_consumer_key: creds.consumerKey,
    oauth_nonce: stamp.nonce ?? crypto.randomBytes(16).toString("hex"),
    oauth_signature_method: "HMAC-SHA1",
    oauth_timestamp: stamp.timestamp ?? String(Math.floor(Date.now() / 1000)),
    oauth_token: creds.accessToken,
    oauth_version: "1.0"
  };
  fields.oauth_signature = hmacSha1Signature(signatureBaseString(req, fields), creds);

  const rendered = Object.entries(fields)
    .sort(([a], [b]) => byteOrder(a, b))
    .map(([k, v]) => `${percentEncode(k)}="${percentEncode(v)}"`);
  return `OAuth ${rendered.join(", ")}`;
}
