import { describe, it, expect, beforeEach } from "vitest";
import { createMemoryDatabase } from "../../src/db/memory.js";
import type { MoverDatabase } from "../../src/db/interface.js";
import { createSecretVault } from "../../src/crypto/vault.js";
import { createCredentialStore } from "../../src/migration/credentials.js";
import type { CredentialStore } from "../../src/migration/credentials.js";
import { makeConfig, makeLogger, makeRecord, TEST_MASTER_KEY } from "../helpers/fixtures.js";

const HOUR = 3_600_000;

describe("CredentialStore", () => {
  let db: MoverDatabase;
  let store: CredentialStore;
  let now: number;

  beforeEach(() => {
    db = createMemoryDatabase();
    db.migrations.insert(makeRecord());
    now = 10 * HOUR;
    store = createCredentialStore({
      db,
      vault: createSecretVault(TEST_MASTER_KEY),
      ttl: makeConfig().credentials,
      logger: makeLogger(),
      clock: () => now,
    });
  });

  it("keeps secrets encrypted on the record", () => {
    store.setPassword("mig_1", "test-secret");
    const sealed = db.migrations.get("mig_1")!.secrets.password;
    expect(sealed?.ciphertext).not.toContain("test-secret");
    expect(store.getPassword("mig_1")).toBe("test-secret");
  });

  it("expires each secret on its own clock", () => {
    store.setPassword("mig_1", "test-secret");
    store.setPlcToken("mig_1", "plc-code");

    now += HOUR;
    expect(store.getPlcToken("mig_1")).toBeNull();
    expect(store.hasCiphertext("mig_1", "plcToken")).toBe(true);
    expect(store.getPassword("mig_1")).toBe("test-secret");

    now += 47 * HOUR;
    expect(store.getPassword("mig_1")).toBeNull();
  });

  it("honours a per-call password ttl", () => {
    store.setPassword("mig_1", "test-secret", 1000);
    expect(store.expiresAt("mig_1", "password")).toBe(10 * HOUR + 1000);
  });

  it("returns session tokens only as a complete pair", () => {
    expect(store.getSessionTokens("mig_1", "source")).toBeNull();
    store.setSessionTokens("mig_1", "source", { accessToken: "acc", refreshToken: "ref" });
    expect(store.getSessionTokens("mig_1", "source")).toEqual({ accessToken: "acc", refreshToken: "ref" });
    expect(store.getSessionTokens("mig_1", "destination")).toBeNull();
  });

  it("never expires the rotation key and keeps it through clearCredentials", () => {
    store.setRotationKey("mig_1", "11".repeat(32));
    store.setPassword("mig_1", "test-secret");
    store.setInviteCode("mig_1", "invite-123");
    store.setSessionTokens("mig_1", "destination", { accessToken: "acc", refreshToken: "ref" });

    store.clearCredentials("mig_1");
    now += 1000 * HOUR;

    expect(store.expiresAt("mig_1", "rotationKey")).toBeNull();
    expect(store.getRotationKey("mig_1")).toBe("11".repeat(32));
    expect(Object.keys(db.migrations.get("mig_1")!.secrets)).toEqual(["rotationKey"]);
  });

  it("clears only the source tokens", () => {
    store.setSessionTokens("mig_1", "source", { accessToken: "s-acc", refreshToken: "s-ref" });
    store.setSessionTokens("mig_1", "destination", { accessToken: "d-acc", refreshToken: "d-ref" });
    store.clearSourceTokens("mig_1");

    expect(store.getSessionTokens("mig_1", "source")).toBeNull();
    expect(store.getSessionTokens("mig_1", "destination")).toEqual({ accessToken: "d-acc", refreshToken: "d-ref" });
  });

  it("clears the single-use identity-directory token", () => {
    store.setPlcToken("mig_1", "plc-code");
    store.clearPlcToken("mig_1");
    expect(store.hasCiphertext("mig_1", "plcToken")).toBe(false);
  });

  it("throws for an unknown migration", () => {
    expect(() => store.getPassword("ghost")).toThrow("migration not found: ghost");
  });
});
