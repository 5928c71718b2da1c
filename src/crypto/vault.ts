/**
 * Secret vault — AES-256-GCM sealing for secrets at rest.
 *
 * Sealed layout (base64): nonce(12) || ciphertext || authTag(16).
 * The master key never leaves this module.
 */

import { randomBytes, createCipheriv, createDecipheriv } from "node:crypto";

const NONCE_BYTES = 12;
const TAG_BYTES = 16;

export interface SecretVault {
  seal(plaintext: string): string;
  open(sealed: string): string;
}

export class VaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "VaultError";
  }
}

export function createSecretVault(masterKeyHex: string): SecretVault {
  if (!/^[0-9a-fA-F]{64}$/.test(masterKeyHex)) {
    throw new VaultError("master key must be 64 hex characters (32 bytes)");
  }
  const key = Buffer.from(masterKeyHex, "hex");

  function seal(plaintext: string): string {
    const nonce = randomBytes(NONCE_BYTES);
    const cipher = createCipheriv("aes-256-gcm", key, nonce);
    const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
    const authTag = cipher.getAuthTag();
    return Buffer.concat([nonce, ciphertext, authTag]).toString("base64");
  }

  function open(sealed: string): string {
    const raw = Buffer.from(sealed, "base64");
    if (raw.length < NONCE_BYTES + TAG_BYTES) {
      throw new VaultError("sealed secret is truncated");
    }
    const nonce = raw.subarray(0, NONCE_BYTES);
    const authTag = raw.subarray(raw.length - TAG_BYTES);
    const ciphertext = raw.subarray(NONCE_BYTES, raw.length - TAG_BYTES);

    const decipher = createDecipheriv("aes-256-gcm", key, nonce);
    decipher.setAuthTag(authTag);
    try {
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
    } catch {
      throw new VaultError("sealed secret failed authentication");
    }
  }

  return { seal, open };
}
