import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { transferBlobs } from "../../src/blobs/transfer.js";
import type { BlobTransferOptions, TransferSnapshot } from "../../src/blobs/transfer.js";
import { ProtocolError } from "../../src/pds/errors.js";
import { TEST_DID, loggedLines, makeLogger } from "../helpers/fixtures.js";

/** Source that writes `content:<cid>`; `failures` maps a CID to the errors its next calls throw. */
function fakeSource(failures: Map<string, Error[]> = new Map()) {
  return {
    getBlob: vi.fn(async (_did: string, cid: string, destPath: string) => {
      const next = failures.get(cid)?.shift();
      if (next) throw next;
      const content = `content:${cid}`;
      await fs.promises.writeFile(destPath, content);
      return content.length;
    }),
  };
}

function fakeDestination() {
  const received: string[] = [];
  return {
    received,
    uploadBlob: vi.fn(async (filePath: string) => {
      received.push(await fs.promises.readFile(filePath, "utf8"));
    }),
  };
}

describe("transferBlobs", () => {
  let scratchDir: string;
  let checkpoints: TransferSnapshot[];
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    scratchDir = path.join(fs.mkdtempSync(path.join(os.tmpdir(), "mover-blobs-test-")), "blobs");
    checkpoints = [];
    sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  });

  afterEach(() => {
    fs.rmSync(path.dirname(scratchDir), { recursive: true, force: true });
  });

  function options(overrides: Partial<BlobTransferOptions>): BlobTransferOptions {
    return {
      did: TEST_DID,
      source: fakeSource(),
      destination: fakeDestination(),
      scratchDir,
      workers: 2,
      maxAttempts: 3,
      baseDelayMs: 100,
      checkpointEvery: 2,
      onCheckpoint: (snapshot) => checkpoints.push(snapshot),
      logger: makeLogger(),
      label: "mig_1",
      sleep,
      ...overrides,
    };
  }

  it("moves every blob and counts bytes", async () => {
    const destination = fakeDestination();
    const result = await transferBlobs(["a", "b", "c"], options({ destination }));

    expect(result.total).toBe(3);
    expect(result.completed).toBe(3);
    expect(result.bytesTransferred).toBe(3 * "content:a".length);
    expect(result.failed).toEqual([]);
    expect([...destination.received].sort()).toEqual(["content:a", "content:b", "content:c"]);
    expect(result.blobProgress.b).toMatchObject({ id: "b", totalSize: 9, bytesTransferred: 9 });
  });

  it("records a blob that fails every attempt and carries on", async () => {
    const source = fakeSource(new Map([
      ["id2", [new Error("boom 1"), new Error("boom 2"), new Error("boom 3")]],
    ]));
    const destination = fakeDestination();
    const logger = makeLogger();

    const result = await transferBlobs(["id1", "id2", "id3"], options({ source, destination, logger }));

    expect(result.failed).toEqual(["id2"]);
    expect(result.completed).toBe(2);
    expect(source.getBlob.mock.calls.filter((c) => c[1] === "id2")).toHaveLength(3);
    expect([...destination.received].sort()).toEqual(["content:id1", "content:id3"]);
    expect(loggedLines(logger)).toContain("[mover:blobs] mig_1: blob id2 failed after 3 attempts: boom 3");
  });

  it("recovers from a transient failure with exponential backoff", async () => {
    const source = fakeSource(new Map([["a", [new Error("reset"), new Error("reset")]]]));

    const result = await transferBlobs(["a"], options({ source }));

    expect(result.failed).toEqual([]);
    expect(result.completed).toBe(1);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
  });

  it("waits longer after a rate limit", async () => {
    const source = fakeSource(new Map([["a", [new ProtocolError("rate_limit", "HTTP 429 Rate limit exceeded")]]]));

    await transferBlobs(["a"], options({ source }));

    // base * 2^(attempt + 1) on the first attempt
    expect(sleep).toHaveBeenCalledWith(400);
  });

  it("skips a blob the source no longer has without retrying", async () => {
    const source = fakeSource(new Map([["gone", [new ProtocolError("not_found", "Not found on getBlob")]]]));

    const result = await transferBlobs(["gone", "kept"], options({ source }));

    expect(result.failed).toEqual(["gone"]);
    expect(source.getBlob.mock.calls.filter((c) => c[1] === "gone")).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("checkpoints every Nth completion and once at the end", async () => {
    await transferBlobs(["a", "b", "c", "d", "e"], options({ workers: 1 }));

    expect(checkpoints.map((c) => c.completed)).toEqual([2, 4, 5]);
    expect(checkpoints.at(-1)?.total).toBe(5);
  });

  it("never runs more workers than configured", async () => {
    let active = 0;
    let peak = 0;
    const source = {
      getBlob: async (_did: string, cid: string, destPath: string) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        await fs.promises.writeFile(destPath, cid);
        active--;
        return cid.length;
      },
    };

    const result = await transferBlobs(["a", "b", "c", "d", "e", "f"], options({ source, workers: 3 }));

    expect(result.completed).toBe(6);
    expect(peak).toBe(3);
  });

  it("leaves no scratch files behind", async () => {
    const source = fakeSource(new Map([["b", [new Error("x"), new Error("y"), new Error("z")]]]));
    await transferBlobs(["a", "b"], options({ source }));
    expect(fs.readdirSync(scratchDir)).toEqual([]);
  });

  it("handles an empty list", async () => {
    const result = await transferBlobs([], options({}));
    expect(result).toEqual({ total: 0, completed: 0, bytesTransferred: 0, failed: [], blobProgress: {} });
    expect(checkpoints).toHaveLength(1);
  });
});
