/**
 * Session Manager — live tokens for one (migration, server role) pair.
 *
 * Tokens are rehydrated from the credential store when the manager is
 * built (once per stage execution). ensureFresh() refreshes with the
 * refresh token when the access token is missing or within the safety
 * buffer of its expiry, swaps both tokens, and awaits `persist` before
 * returning, so the next stage — in any process — starts from the rotated
 * pair instead of logging in again.
 *
 * Password login is a fallback the caller opts into (destination only);
 * the source is never logged into with anything but the tokens captured
 * from the user's own login.
 */

import type { Clock, Logger } from "../types.js";
import { systemClock, errorMessage, toRecord } from "../types.js";
import type { ServerRole } from "../migration/types.js";
import type { SessionTokens } from "../migration/credentials.js";
import { ProtocolError, isProtocolError } from "../pds/errors.js";

export type { SessionTokens };

export interface SessionManager {
  readonly role: ServerRole;
  getAccessToken(): string | null;
  getRefreshToken(): string | null;
  /** A usable access token, refreshing (and persisting) first if needed. */
  ensureFresh(): Promise<string>;
  /** Install tokens obtained elsewhere (account creation) and persist them. */
  adopt(tokens: SessionTokens): Promise<void>;
}

export interface SessionManagerParams {
  role: ServerRole;
  migrationId: string;
  /** Tokens as last persisted, or null. */
  initial: SessionTokens | null;
  /** Write both tokens back to the durable record. */
  persist: (tokens: SessionTokens) => void | Promise<void>;
  /** Refresh-token exchange against this server. */
  refresh: (refreshToken: string) => Promise<SessionTokens>;
  /** One-time password login, used only when no tokens exist yet. */
  login?: () => Promise<SessionTokens>;
  bufferMs: number;
  logger: Logger;
  clock?: Clock;
}

/**
 * `exp` claim of a JWT in epoch milliseconds, or null when the token is not
 * a decodable JWT. The signature is not checked; the server does that.
 */
export function decodeJwtExpiry(token: string): number | null {
  const parts = token.split(".");
  if (parts.length !== 3 || !parts[1]) return null;
  try {
    const payload = toRecord(JSON.parse(Buffer.from(parts[1], "base64url").toString("utf8")));
    return typeof payload.exp === "number" ? payload.exp * 1000 : null;
  } catch {
    return null;
  }
}

export function createSessionManager(params: SessionManagerParams): SessionManager {
  const { role, migrationId, logger, bufferMs } = params;
  const clock = params.clock ?? systemClock;
  const tag = `[mover:session] ${migrationId}/${role}`;

  let tokens: SessionTokens | null = params.initial;
  let inflight: Promise<string> | null = null;

  function isFresh(accessToken: string): boolean {
    const exp = decodeJwtExpiry(accessToken);
    // Opaque tokens carry no expiry; trust them until the server says otherwise.
    if (exp === null) return true;
    return exp - bufferMs > clock();
  }

  async function install(next: SessionTokens): Promise<void> {
    tokens = { accessToken: next.accessToken, refreshToken: next.refreshToken };
    await params.persist(tokens);
  }

  async function renew(): Promise<string> {
    if (tokens) {
      const current = tokens;
      logger.info(`${tag}: access token expired or expiring, refreshing`);
      let next: SessionTokens;
      try {
        next = await params.refresh(current.refreshToken);
      } catch (err) {
        if (isProtocolError(err, "token_rejected") || isProtocolError(err, "authentication")) {
          // A refresh token is single-use: a racing refresh elsewhere consumes it and ours is rejected.
          throw new ProtocolError(
            "token_rejected",
            `Credentials expired: ${role} refresh token rejected (${errorMessage(err)})`,
            { status: err.status, xrpcError: err.xrpcError, nsid: err.nsid },
          );
        }
        throw err;
      }
      await install(next);
      logger.info(`${tag}: session refreshed and persisted`);
      return next.accessToken;
    }

    if (params.login) {
      logger.info(`${tag}: no stored session, logging in with password`);
      const next = await params.login();
      await install(next);
      return next.accessToken;
    }

    throw new ProtocolError(
      "token_rejected",
      `Credentials expired: no ${role} refresh token available`,
    );
  }

  return {
    role,
    getAccessToken: () => tokens?.accessToken ?? null,
    getRefreshToken: () => tokens?.refreshToken ?? null,

    ensureFresh() {
      if (tokens && isFresh(tokens.accessToken)) {
        return Promise.resolve(tokens.accessToken);
      }
      // Concurrent callers (blob workers) share one refresh.
      if (!inflight) {
        inflight = renew().finally(() => {
          inflight = null;
        });
      }
      return inflight;
    },

    async adopt(next) {
      await install(next);
      logger.info(`${tag}: session installed`);
    },
  };
}
