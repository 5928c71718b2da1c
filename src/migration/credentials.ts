/**
 * Credential store — encrypted-at-rest secrets on the migration record.
 *
 * Each secret carries its own expiry; a getter returns null once that
 * expiry has passed even though the ciphertext is still stored. Clearing
 * is by purpose: source tokens go after the source is deactivated, the
 * identity-directory token right after it is used, everything but the
 * rotation key once the migration is complete.
 */

import type { Clock, Logger } from "../types.js";
import { systemClock } from "../types.js";
import type { MoverDatabase } from "../db/interface.js";
import type { SecretVault } from "../crypto/vault.js";
import type { CredentialTtlConfig } from "../config.js";
import type { MigrationSecrets, SecretName, ServerRole } from "./types.js";

export interface SessionTokens {
  accessToken: string;
  refreshToken: string;
}

export interface CredentialStore {
  setPassword(id: string, password: string, ttlMs?: number): void;
  getPassword(id: string): string | null;
  setSessionTokens(id: string, role: ServerRole, tokens: SessionTokens): void;
  /** Null unless both tokens are present and unexpired. */
  getSessionTokens(id: string, role: ServerRole): SessionTokens | null;
  setPlcToken(id: string, token: string): void;
  getPlcToken(id: string): string | null;
  setInviteCode(id: string, code: string): void;
  getInviteCode(id: string): string | null;
  /** Rotation keys never expire. */
  setRotationKey(id: string, privateKeyHex: string): void;
  getRotationKey(id: string): string | null;
  /** True when ciphertext is stored, whether or not it has expired. */
  hasCiphertext(id: string, name: SecretName): boolean;
  expiresAt(id: string, name: SecretName): number | null;
  clearSourceTokens(id: string): void;
  clearPlcToken(id: string): void;
  /** Everything except the rotation key. */
  clearCredentials(id: string): void;
}

interface CredentialStoreParams {
  db: MoverDatabase;
  vault: SecretVault;
  ttl: CredentialTtlConfig;
  logger: Logger;
  clock?: Clock;
}

const TOKEN_NAMES: Readonly<Record<ServerRole, { access: SecretName; refresh: SecretName }>> = {
  source: { access: "sourceAccessToken", refresh: "sourceRefreshToken" },
  destination: { access: "destinationAccessToken", refresh: "destinationRefreshToken" },
};

export function createCredentialStore(params: CredentialStoreParams): CredentialStore {
  const { db, vault, ttl, logger } = params;
  const clock = params.clock ?? systemClock;

  function loadSecrets(id: string): MigrationSecrets {
    const record = db.migrations.get(id);
    if (!record) throw new Error(`migration not found: ${id}`);
    return record.secrets;
  }

  function write(id: string, mutate: (secrets: MigrationSecrets) => void): void {
    const secrets = { ...loadSecrets(id) };
    mutate(secrets);
    db.migrations.update(id, { secrets, updatedAt: clock() });
  }

  function put(id: string, entries: ReadonlyArray<readonly [SecretName, string]>, expiresAt: number | null): void {
    write(id, (secrets) => {
      for (const [name, plaintext] of entries) {
        secrets[name] = { ciphertext: vault.seal(plaintext), expiresAt };
      }
    });
  }

  function read(id: string, name: SecretName): string | null {
    const sealed = loadSecrets(id)[name];
    if (!sealed) return null;
    if (sealed.expiresAt !== null && sealed.expiresAt <= clock()) return null;
    return vault.open(sealed.ciphertext);
  }

  function clear(id: string, names: readonly SecretName[], why: string): void {
    write(id, (secrets) => {
      for (const name of names) delete secrets[name];
    });
    logger.info(`[mover:credentials] ${id}: cleared ${names.join(", ")} (${why})`);
  }

  return {
    setPassword(id, password, ttlMs) {
      put(id, [["password", password]], clock() + (ttlMs ?? ttl.passwordTtlMs));
    },
    getPassword: (id) => read(id, "password"),

    setSessionTokens(id, role, tokens) {
      const names = TOKEN_NAMES[role];
      put(
        id,
        [[names.access, tokens.accessToken], [names.refresh, tokens.refreshToken]],
        clock() + ttl.sessionTtlMs,
      );
    },
    getSessionTokens(id, role) {
      const names = TOKEN_NAMES[role];
      const accessToken = read(id, names.access);
      const refreshToken = read(id, names.refresh);
      return accessToken !== null && refreshToken !== null ? { accessToken, refreshToken } : null;
    },

    setPlcToken(id, token) {
      put(id, [["plcToken", token]], clock() + ttl.plcTokenTtlMs);
    },
    getPlcToken: (id) => read(id, "plcToken"),

    setInviteCode(id, code) {
      put(id, [["inviteCode", code]], clock() + ttl.inviteCodeTtlMs);
    },
    getInviteCode: (id) => read(id, "inviteCode"),

    setRotationKey(id, privateKeyHex) {
      put(id, [["rotationKey", privateKeyHex]], null);
    },
    getRotationKey: (id) => read(id, "rotationKey"),

    hasCiphertext: (id, name) => loadSecrets(id)[name] !== undefined,
    expiresAt: (id, name) => loadSecrets(id)[name]?.expiresAt ?? null,

    clearSourceTokens(id) {
      clear(id, ["sourceAccessToken", "sourceRefreshToken"], "source deactivated");
    },
    clearPlcToken(id) {
      clear(id, ["plcToken"], "single-use token consumed");
    },
    clearCredentials(id) {
      clear(
        id,
        [
          "password",
          "sourceAccessToken",
          "sourceRefreshToken",
          "destinationAccessToken",
          "destinationRefreshToken",
          "plcToken",
          "inviteCode",
        ],
        "migration finished",
      );
    },
  };
}
