import { describe, it, expect, vi, beforeEach } from "vitest";
import type { Mock } from "vitest";
import { createSessionManager, decodeJwtExpiry } from "../../src/session/manager.js";
import type { SessionManagerParams, SessionTokens } from "../../src/session/manager.js";
import { ProtocolError } from "../../src/pds/errors.js";
import { makeJwt, makeLogger } from "../helpers/fixtures.js";

const NOW = 1_700_000_000_000;
const nowSec = NOW / 1000;

describe("decodeJwtExpiry", () => {
  it("reads exp in milliseconds", () => {
    expect(decodeJwtExpiry(makeJwt(nowSec + 60))).toBe(NOW + 60_000);
  });

  it("returns null for opaque or broken tokens", () => {
    expect(decodeJwtExpiry("opaque-token")).toBeNull();
    expect(decodeJwtExpiry("a.!!!.c")).toBeNull();
    expect(decodeJwtExpiry(`a.${Buffer.from('{"sub":"x"}').toString("base64url")}.c`)).toBeNull();
  });
});

describe("SessionManager", () => {
  /** Stands in for the durable record both managers read from. */
  let stored: SessionTokens | null;
  let refresh: Mock<(refreshToken: string) => Promise<SessionTokens>>;

  beforeEach(() => {
    stored = null;
    refresh = vi.fn<(refreshToken: string) => Promise<SessionTokens>>();
  });

  function manager(overrides: Partial<SessionManagerParams> = {}) {
    return createSessionManager({
      role: "destination",
      migrationId: "mig_1",
      initial: stored,
      persist: (tokens) => {
        stored = tokens;
      },
      refresh,
      bufferMs: 60_000,
      logger: makeLogger(),
      clock: () => NOW,
      ...overrides,
    });
  }

  it("returns a fresh access token without refreshing", async () => {
    stored = { accessToken: makeJwt(nowSec + 3600), refreshToken: "refresh-1" };
    expect(await manager().ensureFresh()).toBe(stored.accessToken);
    expect(refresh).not.toHaveBeenCalled();
  });

  it("refreshes inside the safety buffer and persists the rotated pair", async () => {
    stored = { accessToken: makeJwt(nowSec + 30), refreshToken: "refresh-1" };
    const rotated = { accessToken: makeJwt(nowSec + 7200), refreshToken: "refresh-2" };
    refresh.mockResolvedValue(rotated);

    const session = manager();
    expect(await session.ensureFresh()).toBe(rotated.accessToken);
    expect(refresh).toHaveBeenCalledWith("refresh-1");
    expect(stored).toEqual(rotated);
    expect(session.getRefreshToken()).toBe("refresh-2");
  });

  it("lets the next stage start from the persisted tokens", async () => {
    stored = { accessToken: makeJwt(nowSec - 10), refreshToken: "refresh-1" };
    refresh.mockResolvedValue({ accessToken: makeJwt(nowSec + 7200), refreshToken: "refresh-2" });
    await manager().ensureFresh();

    // A later stage builds its own manager from the record.
    const later = manager();
    expect(later.getRefreshToken()).toBe("refresh-2");
    await later.ensureFresh();
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it("shares one refresh between concurrent callers", async () => {
    stored = { accessToken: makeJwt(nowSec - 10), refreshToken: "refresh-1" };
    let release: (tokens: SessionTokens) => void = () => {};
    refresh.mockReturnValue(new Promise((resolve) => {
      release = resolve;
    }));

    const session = manager();
    const waiting = [session.ensureFresh(), session.ensureFresh(), session.ensureFresh()];
    release({ accessToken: "fresh-access", refreshToken: "refresh-2" });

    expect(await Promise.all(waiting)).toEqual(["fresh-access", "fresh-access", "fresh-access"]);
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it("reports a rejected refresh token as expired credentials", async () => {
    stored = { accessToken: makeJwt(nowSec - 10), refreshToken: "refresh-used" };
    refresh.mockRejectedValue(
      new ProtocolError("token_rejected", "Session token rejected", { status: 400, xrpcError: "ExpiredToken" }),
    );

    await expect(manager().ensureFresh()).rejects.toMatchObject({
      kind: "token_rejected",
      xrpcError: "ExpiredToken",
      message: "Credentials expired: destination refresh token rejected (Session token rejected)",
    });
  });

  it("passes other refresh failures through", async () => {
    stored = { accessToken: makeJwt(nowSec - 10), refreshToken: "refresh-1" };
    refresh.mockRejectedValue(new ProtocolError("network", "NetworkError: refreshSession fetch failed"));
    await expect(manager().ensureFresh()).rejects.toMatchObject({ kind: "network" });
  });

  it("logs in with the password only when no tokens exist", async () => {
    const login = vi.fn(async () => ({ accessToken: "login-access", refreshToken: "login-refresh" }));

    expect(await manager({ login }).ensureFresh()).toBe("login-access");
    expect(login).toHaveBeenCalledTimes(1);
    expect(stored).toEqual({ accessToken: "login-access", refreshToken: "login-refresh" });
  });

  it("fails without tokens or a login fallback", async () => {
    await expect(manager({ role: "source" }).ensureFresh()).rejects.toMatchObject({
      kind: "token_rejected",
      message: "Credentials expired: no source refresh token available",
    });
  });

  it("treats opaque tokens as fresh", async () => {
    stored = { accessToken: "opaque", refreshToken: "refresh-1" };
    expect(await manager().ensureFresh()).toBe("opaque");
  });

  it("adopts tokens from account creation", async () => {
    const session = manager();
    await session.adopt({ accessToken: "created-access", refreshToken: "created-refresh" });
    expect(session.getAccessToken()).toBe("created-access");
    expect(stored).toEqual({ accessToken: "created-access", refreshToken: "created-refresh" });
  });
});
