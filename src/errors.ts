export type RelayErrorCode =
  | "EXTRACTION_NOISE"
  | "INVALID_CODE"
  | "EMPTY_COMPOSED_TWEET"
  | "RENDERER_FAILURE"
  | "STATE_FILE_CORRUPT";

export class RelayError extends Error {
  readonly code: RelayErrorCode;
  constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
    this.code = code;
  }
}

/** A block that is not a disclosure row (or too noisy to be one). */
export class ExtractionNoise extends RelayError {
  constructor(message: string) {
    super("EXTRACTION_NOISE", message);
    this.name = "ExtractionNoise";
  }
}

/** A disclosure row whose code tokens were all rejected. */
export class InvalidCode extends RelayError {
  readonly tokens: string[];
  constructor(tokens: string[]) {
    super("INVALID_CODE", `no valid stock code among: ${tokens.join(", ") || "(none)"}`);
    this.name = "InvalidCode";
    this.tokens = tokens;
  }
}

export class EmptyComposedTweet extends RelayError {
  readonly itemId: string;
  constructor(itemId: string) {
    super("EMPTY_COMPOSED_TWEET", `composed tweet is empty for ${itemId}`);
    this.name = "EmptyComposedTweet";
    this.itemId = itemId;
  }
}

export class RendererError extends RelayError {
  readonly status?: number;
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("RENDERER_FAILURE", message, options);
    this.name = "RendererError";
    this.status = status;
  }
}

export class StateFileCorrupt extends RelayError {
  readonly path: string;
  constructor(path: string, options?: { cause?: unknown }) {
    super("STATE_FILE_CORRUPT", `state file is not valid JSON: ${path}`, options);
    this.name = "StateFileCorrupt";
    this.path = path;
  }
}
