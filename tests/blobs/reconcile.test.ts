import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { reconcileBlobs } from "../../src/blobs/reconcile.js";
import type { ReconcileOptions } from "../../src/blobs/reconcile.js";
import { ProtocolError } from "../../src/pds/errors.js";
import { TEST_DID, makeLogger } from "../helpers/fixtures.js";

const DONE = new Date("2026-01-02T03:04:05.000Z");

function fakeSource(unavailable: string[] = []) {
  return {
    getBlob: vi.fn(async (_did: string, cid: string, destPath: string) => {
      if (unavailable.includes(cid)) throw new ProtocolError("not_found", `Not found on getBlob: ${cid}`);
      await fs.promises.writeFile(destPath, cid);
      return cid.length;
    }),
  };
}

function fakeDestination(status: { expectedBlobs: number; importedBlobs: number }, missing: string[]) {
  return {
    uploadBlob: vi.fn(async (_filePath: string) => {}),
    checkAccountStatus: vi.fn(async () => ({ activated: false, validDid: true, ...status })),
    listAllMissingBlobs: vi.fn(async (_pageSize: number) => missing),
  };
}

describe("reconcileBlobs", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "mover-reconcile-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function options(overrides: Partial<ReconcileOptions> & Pick<ReconcileOptions, "destination">): ReconcileOptions {
    return {
      did: TEST_DID,
      source: fakeSource(),
      scratchDir: path.join(tmpDir, "blobs"),
      workers: 2,
      maxAttempts: 2,
      baseDelayMs: 1,
      checkpointEvery: 10,
      onCheckpoint: () => {},
      logger: makeLogger(),
      label: "mig_1",
      sleep: async () => {},
      pageSize: 100,
      now: () => DONE,
      ...overrides,
    };
  }

  it("re-sends exactly the blobs the destination reports missing", async () => {
    const source = fakeSource();
    const destination = fakeDestination({ expectedBlobs: 3, importedBlobs: 1 }, ["id2", "id3"]);

    const report = await reconcileBlobs(options({ source, destination }));

    expect(source.getBlob.mock.calls.map((c) => c[1]).sort()).toEqual(["id2", "id3"]);
    expect(destination.uploadBlob).toHaveBeenCalledTimes(2);
    expect(destination.listAllMissingBlobs).toHaveBeenCalledWith(100);
    expect(report).toEqual({
      status: "complete",
      expectedBlobs: 3,
      importedBlobs: 1,
      missingCount: 2,
      recovered: 2,
      stillMissing: [],
      completedAt: "2026-01-02T03:04:05.000Z",
    });
  });

  it("stops early when the counts already match", async () => {
    const destination = fakeDestination({ expectedBlobs: 4, importedBlobs: 4 }, []);

    const report = await reconcileBlobs(options({ destination }));

    expect(destination.listAllMissingBlobs).not.toHaveBeenCalled();
    expect(report).toEqual({
      status: "complete",
      expectedBlobs: 4,
      importedBlobs: 4,
      missingCount: 0,
      completedAt: "2026-01-02T03:04:05.000Z",
    });
  });

  it("reports partial when some blobs cannot be recovered", async () => {
    const source = fakeSource(["gone"]);
    const destination = fakeDestination({ expectedBlobs: 5, importedBlobs: 3 }, ["gone", "kept"]);

    const report = await reconcileBlobs(options({ source, destination }));

    expect(report).toMatchObject({ status: "partial", missingCount: 2, recovered: 1, stillMissing: ["gone"] });
  });

  it("is skipped when the status check fails", async () => {
    const destination = fakeDestination({ expectedBlobs: 0, importedBlobs: 0 }, []);
    destination.checkAccountStatus.mockRejectedValue(new Error("HTTP 502 from com.atproto.server.checkAccountStatus"));

    const report = await reconcileBlobs(options({ destination }));

    expect(report).toEqual({
      status: "skipped",
      error: "Account status check failed: HTTP 502 from com.atproto.server.checkAccountStatus",
    });
  });

  it("is skipped when the missing listing fails", async () => {
    const destination = fakeDestination({ expectedBlobs: 3, importedBlobs: 2 }, []);
    destination.listAllMissingBlobs.mockRejectedValue(new Error("connection reset"));

    const report = await reconcileBlobs(options({ destination }));

    expect(report).toEqual({
      status: "skipped",
      error: "Missing blob listing failed: connection reset",
      expectedBlobs: 3,
      importedBlobs: 2,
    });
  });
});
