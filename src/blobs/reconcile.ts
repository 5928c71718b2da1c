/**
 * Post-transfer reconciliation. Asks the destination how many blobs it
 * expects versus holds and re-sends exactly the ones it reports missing.
 *
 * Advisory only: every failure ends up in the returned report, never as a
 * thrown error.
 */

import type { ReconciliationReport } from "../migration/types.js";
import type { PdsClient } from "../pds/client.js";
import { errorMessage } from "../types.js";
import type { BlobTransferOptions } from "./transfer.js";
import { transferBlobs } from "./transfer.js";

export interface ReconcileOptions extends Omit<BlobTransferOptions, "destination"> {
  destination: Pick<PdsClient, "uploadBlob" | "checkAccountStatus" | "listAllMissingBlobs">;
  pageSize: number;
  now?: () => Date;
}

export async function reconcileBlobs(opts: ReconcileOptions): Promise<ReconciliationReport> {
  const { logger, label } = opts;
  const now = opts.now ?? (() => new Date());

  let expectedBlobs: number;
  let importedBlobs: number;
  try {
    ({ expectedBlobs, importedBlobs } = await opts.destination.checkAccountStatus());
  } catch (err) {
    logger.warn(`[mover:blobs] ${label}: reconciliation skipped: ${errorMessage(err)}`);
    return { status: "skipped", error: `Account status check failed: ${errorMessage(err)}` };
  }

  if (expectedBlobs === importedBlobs) {
    logger.info(`[mover:blobs] ${label}: destination holds all ${importedBlobs} expected blobs`);
    return { status: "complete", expectedBlobs, importedBlobs, missingCount: 0, completedAt: now().toISOString() };
  }

  let missing: string[];
  try {
    missing = await opts.destination.listAllMissingBlobs(opts.pageSize);
  } catch (err) {
    logger.warn(`[mover:blobs] ${label}: could not list missing blobs: ${errorMessage(err)}`);
    return {
      status: "skipped",
      error: `Missing blob listing failed: ${errorMessage(err)}`,
      expectedBlobs,
      importedBlobs,
    };
  }

  logger.info(
    `[mover:blobs] ${label}: destination expects ${expectedBlobs}, holds ${importedBlobs}; retrying ${missing.length} missing`,
  );

  let stillMissing: string[];
  let recovered: number;
  try {
    const result = await transferBlobs(missing, opts);
    stillMissing = result.failed;
    recovered = result.completed;
  } catch (err) {
    // Scratch directory or similar local failure: nothing was recovered.
    logger.warn(`[mover:blobs] ${label}: reconciliation transfer failed: ${errorMessage(err)}`);
    return {
      status: "partial",
      error: errorMessage(err),
      expectedBlobs,
      importedBlobs,
      missingCount: missing.length,
      recovered: 0,
      stillMissing: missing,
      completedAt: now().toISOString(),
    };
  }

  return {
    status: stillMissing.length === 0 ? "complete" : "partial",
    expectedBlobs,
    importedBlobs,
    missingCount: missing.length,
    recovered,
    stillMissing,
    completedAt: now().toISOString(),
  };
}
