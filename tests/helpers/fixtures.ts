/**
 * Test helper — shared loggers, config and records.
 */

import { vi } from "vitest";
import { resolveMoverConfig } from "../../src/config.js";
import type { MoverConfig } from "../../src/config.js";
import type { Logger } from "../../src/types.js";
import type { MigrationRecord, NewMigrationInput } from "../../src/migration/types.js";

/** AES-256 key made of a repeated placeholder byte. */
export const TEST_MASTER_KEY = "ab".repeat(32);

export const TEST_DID = "did:plc:abcdefghijklmnopqrstuvwx";

export function makeLogger(): Logger {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
}

/** Every line passed to any level of a vi.fn() logger. */
export function loggedLines(logger: Logger): string[] {
  const lines: string[] = [];
  for (const fn of [logger.info, logger.warn, logger.error, logger.debug]) {
    if (fn && vi.isMockFunction(fn)) {
      for (const call of fn.mock.calls) lines.push(String(call[0]));
    }
  }
  return lines;
}

export function makeConfig(overrides: Record<string, unknown> = {}): Readonly<MoverConfig> {
  return resolveMoverConfig({ masterKey: TEST_MASTER_KEY, ...overrides });
}

export function newInput(overrides: Partial<NewMigrationInput> = {}): NewMigrationInput {
  return {
    did: TEST_DID,
    sourceHost: "https://old.example.com",
    destinationHost: "https://new.example.com",
    sourceHandle: "alice.old.example.com",
    destinationHandle: "alice.new.example.com",
    email: "alice@example.com",
    ...overrides,
  };
}

/** Unsigned JWT whose payload carries `exp` (epoch seconds). */
export function makeJwt(expSec: number, sub = TEST_DID): string {
  const encode = (v: unknown) => Buffer.from(JSON.stringify(v)).toString("base64url");
  return `${encode({ alg: "ES256K", typ: "JWT" })}.${encode({ sub, exp: expSec })}.c2lnbmF0dXJl`;
}

/** A stored-shape record, for exercising storage without the manager. */
export function makeRecord(overrides: Partial<MigrationRecord> = {}): MigrationRecord {
  return {
    id: "mig_1",
    publicToken: "MIG-AAAAAAAAAAAAAAAA",
    did: TEST_DID,
    direction: "outbound",
    sourceHost: "https://old.example.com",
    destinationHost: "https://new.example.com",
    sourceHandle: "alice.old.example.com",
    destinationHandle: "alice.new.example.com",
    email: "alice@example.com",
    locale: "en",
    status: "pending_account",
    progress: {},
    secrets: {},
    currentJobStep: null,
    currentJobAttempt: 0,
    currentJobMaxAttempts: 0,
    retryCount: 0,
    lastError: null,
    errorCode: null,
    createdAt: 1000,
    updatedAt: 1000,
    ...overrides,
  };
}
