/**
 * Typed errors for the OCR pipeline.
 *
 * Every error raised by the pipeline itself carries a `kind` tag; the retry
 * policy and the batch runner branch on the tag, not on the concrete class.
 */

export type ErrorKind =
  | "transient"
  | "permanent"
  | "malformed"
  | "service_unavailable";

/** HTTP statuses that are worth another attempt. */
export const RETRYABLE_HTTP_CODES: ReadonlySet<number> = new Set([
  408, 429, 500, 502, 503, 504,
]);

/** Transport-level error codes treated as transient (undici + libuv). */
const TRANSIENT_NETWORK_CODES: ReadonlySet<string> = new Set([
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
  "UND_ERR_SOCKET",
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
]);

export abstract class OcrError extends Error {
  abstract readonly kind: ErrorKind;
}

export class NetworkError extends OcrError {
  readonly kind = "transient";
  url: string;
  code: string | undefined;

  constructor(url: string, cause: unknown) {
    const code = errorCode(cause);
    super(`Network error for ${url}: ${describe(cause)}`, { cause });
    this.name = "NetworkError";
    this.url = url;
    this.code = code;
  }
}

export class RetryableHttpError extends OcrError {
  readonly kind = "transient";
  status: number;
  url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = "RetryableHttpError";
    this.status = status;
    this.url = url;
  }
}

export class HttpStatusError extends OcrError {
  readonly kind = "permanent";
  status: number;
  url: string;

  constructor(status: number, url: string) {
    super(`HTTP ${status} for ${url}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

export class MalformedPayloadError extends OcrError {
  readonly kind = "malformed";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "MalformedPayloadError";
  }
}

export class ServiceUnavailableError extends OcrError {
  readonly kind = "service_unavailable";

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ServiceUnavailableError";
  }
}

// ---------------------------------------------------------------------------
// Classification helpers
// ---------------------------------------------------------------------------

export function isRetryable(err: unknown): boolean {
  return err instanceof OcrError && err.kind === "transient";
}

/** `code` of an error or, failing that, of its `cause` (fetch wraps libuv errors). */
export function errorCode(err: unknown): string | undefined {
  if (!(err instanceof Error)) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if (err.cause !== undefined && err.cause !== err) return errorCode(err.cause);
  return undefined;
}

export function isTransientNetworkError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== undefined && TRANSIENT_NETWORK_CODES.has(code);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
