/**
 * Protocol errors — one tagged class for every remote failure.
 *
 * Callers switch on `kind`, never on class identity. In particular a login
 * rejected for a missing second factor is its own kind, so no generic
 * authentication handler can swallow it.
 */

import { SECOND_FACTOR_PREFIX } from "../errors/classify.js";

export type ProtocolErrorKind =
  | "rate_limit"
  | "network"
  | "timeout"
  | "authentication"
  | "two_factor_required"
  | "token_rejected"
  | "account_exists"
  | "invite_code"
  | "identity_mismatch"
  | "not_found"
  | "invalid_request"
  | "server";

export interface ProtocolErrorDetails {
  /** HTTP status, when the server answered. */
  status?: number;
  /** XRPC error name from the response body, e.g. "ExpiredToken". */
  xrpcError?: string;
  /** Server-provided retry hint, seconds. */
  retryAfterSec?: number;
  /** The XRPC method that failed. */
  nsid?: string;
}

export class ProtocolError extends Error {
  readonly kind: ProtocolErrorKind;
  readonly status?: number;
  readonly xrpcError?: string;
  readonly retryAfterSec?: number;
  readonly nsid?: string;

  constructor(kind: ProtocolErrorKind, message: string, details: ProtocolErrorDetails = {}) {
    super(message);
    this.name = "ProtocolError";
    this.kind = kind;
    this.status = details.status;
    this.xrpcError = details.xrpcError;
    this.retryAfterSec = details.retryAfterSec;
    this.nsid = details.nsid;
  }
}

export function isProtocolError(err: unknown, kind?: ProtocolErrorKind): err is ProtocolError {
  return err instanceof ProtocolError && (kind === undefined || err.kind === kind);
}

const ACCOUNT_EXISTS_ERRORS: ReadonlySet<string> = new Set([
  "AccountAlreadyExists",
  "HandleNotAvailable",
  "DidAlreadyExists",
]);

const TOKEN_REJECTED_ERRORS: ReadonlySet<string> = new Set([
  "ExpiredToken",
  "InvalidToken",
]);

const NOT_FOUND_ERRORS: ReadonlySet<string> = new Set([
  "BlobNotFound",
  "RepoNotFound",
  "RecordNotFound",
  "AccountNotFound",
]);

/**
 * Parse a Retry-After header (delta seconds or HTTP date), falling back to
 * RateLimit-Reset (epoch seconds).
 */
export function parseRetryAfter(headers: Headers, now: number): number | undefined {
  const retryAfter = headers.get("retry-after");
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) return seconds;
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, (date - now) / 1000);
  }
  const reset = headers.get("ratelimit-reset");
  if (reset !== null) {
    const epoch = Number(reset);
    if (Number.isFinite(epoch)) return Math.max(0, epoch - now / 1000);
  }
  return undefined;
}

/** Map a non-2xx XRPC response to a tagged error. */
export function errorFromResponse(
  nsid: string,
  status: number,
  body: { error?: string; message?: string },
  retryAfterSec: number | undefined,
): ProtocolError {
  const xrpcError = body.error;
  const text = body.message ?? xrpcError ?? "no message";
  const details: ProtocolErrorDetails = { status, xrpcError, nsid, retryAfterSec };

  if (status === 429 || xrpcError === "RateLimitExceeded") {
    return new ProtocolError("rate_limit", `HTTP 429 Rate limit exceeded on ${nsid}: ${text}`, details);
  }
  if (xrpcError === "AuthFactorTokenRequired") {
    return new ProtocolError("two_factor_required", `${SECOND_FACTOR_PREFIX}: ${text}`, details);
  }
  if (xrpcError !== undefined && TOKEN_REJECTED_ERRORS.has(xrpcError)) {
    return new ProtocolError("token_rejected", `Session token rejected by ${nsid}: ${text}`, details);
  }
  if (xrpcError === "InvalidInviteCode") {
    return new ProtocolError("invite_code", `Invalid invite code: ${text}`, details);
  }
  if (
    (xrpcError !== undefined && ACCOUNT_EXISTS_ERRORS.has(xrpcError)) ||
    /already exists/i.test(text)
  ) {
    return new ProtocolError("account_exists", `Account already exists: ${text}`, details);
  }
  if (status === 401 || status === 403 || xrpcError === "AuthenticationRequired") {
    return new ProtocolError("authentication", `Authentication failed on ${nsid}: ${text}`, details);
  }
  if (status === 404 || (xrpcError !== undefined && NOT_FOUND_ERRORS.has(xrpcError))) {
    return new ProtocolError("not_found", `Not found on ${nsid}: ${text}`, details);
  }
  if (status >= 500) {
    return new ProtocolError("server", `HTTP ${status} from ${nsid}: ${text}`, details);
  }
  return new ProtocolError("invalid_request", `HTTP ${status} from ${nsid}: ${text}`, details);
}
