/**
 * Blob transfer — moves content-addressed blobs from source to destination
 * through local scratch files with a fixed-size worker pool.
 *
 * Partial-failure tolerant: a blob that fails every attempt is added to the
 * failure set and the pass carries on. Counters are only touched between
 * awaits, so updates from concurrent workers never interleave.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger, Sleep } from "../types.js";
import { errorMessage, realSleep } from "../types.js";
import type { BlobProgressEntry } from "../migration/types.js";
import type { PdsClient } from "../pds/client.js";
import { isProtocolError } from "../pds/errors.js";
import { backoffDelayMs } from "../pds/retry.js";

export interface TransferSnapshot {
  total: number;
  completed: number;
  bytesTransferred: number;
  failed: string[];
  blobProgress: Record<string, BlobProgressEntry>;
}

export interface BlobTransferOptions {
  did: string;
  source: Pick<PdsClient, "getBlob">;
  destination: Pick<PdsClient, "uploadBlob">;
  scratchDir: string;
  workers: number;
  maxAttempts: number;
  baseDelayMs: number;
  /** Checkpoint after every Nth completed blob (and once at the end). */
  checkpointEvery: number;
  onCheckpoint: (snapshot: TransferSnapshot) => void;
  logger: Logger;
  /** Label for log lines, usually the migration id. */
  label: string;
  sleep?: Sleep;
}

function scratchPath(dir: string, cid: string): string {
  return path.join(dir, cid.replace(/[^a-zA-Z0-9]/g, "_"));
}

export async function transferBlobs(cids: readonly string[], opts: BlobTransferOptions): Promise<TransferSnapshot> {
  const { logger, label } = opts;
  const sleep = opts.sleep ?? realSleep;
  await fs.promises.mkdir(opts.scratchDir, { recursive: true });

  const state: TransferSnapshot = {
    total: cids.length,
    completed: 0,
    bytesTransferred: 0,
    failed: [],
    blobProgress: {},
  };

  function snapshot(): TransferSnapshot {
    return {
      ...state,
      failed: [...state.failed],
      blobProgress: { ...state.blobProgress },
    };
  }

  async function moveOnce(cid: string): Promise<number> {
    const file = scratchPath(opts.scratchDir, cid);
    try {
      const size = await opts.source.getBlob(opts.did, cid, file);
      state.blobProgress[cid] = { id: cid, totalSize: size, bytesTransferred: 0, lastUpdate: new Date().toISOString() };
      await opts.destination.uploadBlob(file);
      return size;
    } finally {
      await fs.promises.rm(file, { force: true });
    }
  }

  async function moveWithRetry(cid: string): Promise<void> {
    for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
      try {
        const size = await moveOnce(cid);
        state.completed += 1;
        state.bytesTransferred += size;
        state.blobProgress[cid] = { id: cid, totalSize: size, bytesTransferred: size, lastUpdate: new Date().toISOString() };
        if (state.completed % opts.checkpointEvery === 0) {
          opts.onCheckpoint(snapshot());
        }
        return;
      } catch (err) {
        // The source no longer has it; retrying cannot help.
        if (isProtocolError(err, "not_found")) {
          logger.warn(`[mover:blobs] ${label}: blob ${cid} not found on source, skipping`);
          break;
        }
        if (attempt >= opts.maxAttempts) {
          logger.error(`[mover:blobs] ${label}: blob ${cid} failed after ${attempt} attempts: ${errorMessage(err)}`);
          break;
        }
        // Rate limits wait longer than transient network failures.
        const exponent = isProtocolError(err, "rate_limit") ? attempt + 1 : attempt - 1;
        const delayMs = backoffDelayMs(exponent, { baseDelayMs: opts.baseDelayMs, maxDelayMs: Number.MAX_SAFE_INTEGER });
        logger.warn(
          `[mover:blobs] ${label}: blob ${cid} attempt ${attempt}/${opts.maxAttempts} failed: ${errorMessage(err)}; retrying in ${delayMs}ms`,
        );
        await sleep(delayMs);
      }
    }
    state.failed.push(cid);
  }

  const queue = [...cids];
  const executing: Promise<void>[] = [];

  while (queue.length > 0 || executing.length > 0) {
    while (queue.length > 0 && executing.length < opts.workers) {
      const cid = queue.shift();
      if (cid === undefined) break;
      const promise: Promise<void> = moveWithRetry(cid).then(() => {
        executing.splice(executing.indexOf(promise), 1);
      });
      executing.push(promise);
    }
    if (executing.length > 0) {
      await Promise.race(executing);
    }
  }

  const result = snapshot();
  opts.onCheckpoint(result);
  logger.info(
    `[mover:blobs] ${label}: ${result.completed}/${result.total} blobs moved (${result.bytesTransferred} bytes), ${result.failed.length} failed`,
  );
  return result;
}
