import { describe, it, expect } from "vitest";
import { createSecretVault, VaultError } from "../../src/crypto/vault.js";
import { TEST_MASTER_KEY } from "../helpers/fixtures.js";

describe("createSecretVault", () => {
  it("opens what it sealed", () => {
    const vault = createSecretVault(TEST_MASTER_KEY);
    const sealed = vault.seal("test-secret");
    expect(sealed).not.toContain("test-secret");
    expect(vault.open(sealed)).toBe("test-secret");
  });

  it("uses a fresh nonce per seal", () => {
    const vault = createSecretVault(TEST_MASTER_KEY);
    expect(vault.seal("same")).not.toBe(vault.seal("same"));
  });

  it("rejects a malformed master key", () => {
    expect(() => createSecretVault("abc")).toThrow(VaultError);
    expect(() => createSecretVault("zz".repeat(32))).toThrow("master key must be 64 hex characters (32 bytes)");
  });

  it("refuses a secret sealed under another key", () => {
    const sealed = createSecretVault(TEST_MASTER_KEY).seal("test-secret");
    const other = createSecretVault("cd".repeat(32));
    expect(() => other.open(sealed)).toThrow("sealed secret failed authentication");
  });

  it("refuses tampered ciphertext", () => {
    const vault = createSecretVault(TEST_MASTER_KEY);
    const raw = Buffer.from(vault.seal("test-secret"), "base64");
    raw[14] = (raw[14] ?? 0) ^ 0xff;
    expect(() => vault.open(raw.toString("base64"))).toThrow(VaultError);
  });

  it("refuses a truncated value", () => {
    const vault = createSecretVault(TEST_MASTER_KEY);
    expect(() => vault.open(Buffer.alloc(10).toString("base64"))).toThrow("sealed secret is truncated");
  });
});
