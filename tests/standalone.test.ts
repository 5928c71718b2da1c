import { describe, it, expect, vi, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { startMover, type MoverInstance } from "../src/standalone.js";
import { createSqliteDatabase } from "../src/db/sqlite.js";
import type { MigrationNotifier } from "../src/notify/notifier.js";
import { makeConfig, makeRecord } from "./helpers/fixtures.js";

let instance: MoverInstance | null = null;
let dataDir: string | null = null;

afterEach(async () => {
  if (instance) {
    await instance.stop();
    instance = null;
  }
  if (dataDir) {
    fs.rmSync(dataDir, { recursive: true, force: true });
    dataDir = null;
  }
});

function quietNotifier(): MigrationNotifier {
  return {
    rotationKeyIssued: vi.fn(async () => {}),
    plcTokenRequested: vi.fn(async () => {}),
    migrationCompleted: vi.fn(async () => {}),
    migrationFailed: vi.fn(async () => {}),
  };
}

describe("startMover (standalone)", () => {
  it("boots with an in-memory config", async () => {
    instance = await startMover({ config: makeConfig({ logLevel: "error" }), notifier: quietNotifier() });

    expect(instance.config.dbBackend).toBe("memory");
    expect(instance.db.backend).toBe("memory");
    expect(instance.manager.list()).toEqual([]);
    expect(instance.engine.scheduler.pendingCount).toBe(0);
  });

  it("resumes an unfinished migration from disk", async () => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "mover-standalone-test-"));
    const seed = createSqliteDatabase(dataDir);
    seed.migrate();
    seed.migrations.insert(makeRecord({
      status: "pending_plc",
      progress: { plcTokenRequestedAt: "2026-01-01T00:00:00.000Z" },
    }));
    seed.close();

    const notifier = quietNotifier();
    const rotationKey = { did: "did:key:zTestRotationKey", privateKeyHex: "11".repeat(32) };
    instance = await startMover({
      config: makeConfig({ dbBackend: "sqlite", dataDir, logLevel: "error" }),
      notifier,
      keys: { generate: async () => rotationKey },
    });

    await vi.waitFor(() => expect(notifier.rotationKeyIssued).toHaveBeenCalledTimes(1));
    await instance.engine.idle();

    const record = instance.manager.require("mig_1");
    expect(record.status).toBe("pending_plc");
    expect(record.progress.rotationKeyPublic).toBe("did:key:zTestRotationKey");
    expect(record.progress.rotationKeyNotifiedAt).toBeDefined();
  });
});
