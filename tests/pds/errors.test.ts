import { describe, it, expect } from "vitest";
import { errorFromResponse, isProtocolError, parseRetryAfter, ProtocolError } from "../../src/pds/errors.js";

const NSID = "com.atproto.repo.uploadBlob";

describe("errorFromResponse", () => {
  it("maps 429 to rate_limit and keeps the hint", () => {
    const err = errorFromResponse(NSID, 429, { error: "RateLimitExceeded", message: "slow down" }, 7);
    expect(err.kind).toBe("rate_limit");
    expect(err.retryAfterSec).toBe(7);
    expect(err.message).toBe("HTTP 429 Rate limit exceeded on com.atproto.repo.uploadBlob: slow down");
  });

  it("keeps a missing second factor apart from other authentication failures", () => {
    const err = errorFromResponse("com.atproto.server.createSession", 401, { error: "AuthFactorTokenRequired", message: "code sent" }, undefined);
    expect(err.kind).toBe("two_factor_required");
    expect(isProtocolError(err, "authentication")).toBe(false);
  });

  it.each([
    [400, "ExpiredToken", "token_rejected"],
    [400, "InvalidToken", "token_rejected"],
    [400, "InvalidInviteCode", "invite_code"],
    [400, "HandleNotAvailable", "account_exists"],
    [401, "AuthenticationRequired", "authentication"],
    [403, undefined, "authentication"],
    [400, "BlobNotFound", "not_found"],
    [404, undefined, "not_found"],
    [502, undefined, "server"],
    [400, "InvalidRequest", "invalid_request"],
  ] as const)("maps %i %s to %s", (status, xrpcError, kind) => {
    expect(errorFromResponse(NSID, status, { error: xrpcError }, undefined).kind).toBe(kind);
  });

  it("recognises an already-existing account from the message alone", () => {
    const err = errorFromResponse("com.atproto.server.createAccount", 400, { message: "User already exists" }, undefined);
    expect(err.kind).toBe("account_exists");
  });

  it("records status, error name and method", () => {
    const err = errorFromResponse(NSID, 500, { error: "InternalServerError" }, undefined);
    expect(err).toBeInstanceOf(ProtocolError);
    expect(err.status).toBe(500);
    expect(err.xrpcError).toBe("InternalServerError");
    expect(err.nsid).toBe(NSID);
    expect(err.message).toBe("HTTP 500 from com.atproto.repo.uploadBlob: InternalServerError");
  });
});

describe("parseRetryAfter", () => {
  const now = Date.parse("2026-03-01T12:00:00.000Z");

  it("reads delta seconds", () => {
    expect(parseRetryAfter(new Headers({ "retry-after": "5" }), now)).toBe(5);
  });

  it("reads an HTTP date", () => {
    const headers = new Headers({ "retry-after": "Sun, 01 Mar 2026 12:00:30 GMT" });
    expect(parseRetryAfter(headers, now)).toBe(30);
  });

  it("falls back to RateLimit-Reset epoch seconds", () => {
    const headers = new Headers({ "ratelimit-reset": String(now / 1000 + 12) });
    expect(parseRetryAfter(headers, now)).toBe(12);
  });

  it("never goes negative and ignores absent headers", () => {
    expect(parseRetryAfter(new Headers({ "ratelimit-reset": String(now / 1000 - 60) }), now)).toBe(0);
    expect(parseRetryAfter(new Headers(), now)).toBeUndefined();
  });
});
