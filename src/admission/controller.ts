/**
 * Admission controller — caps how many migrations move bulk data at once.
 *
 * A migration occupies a slot while it sits in a heavy-I/O status with a
 * transfer started and not yet finished (blobsStartedAt set, blobsFinishedAt
 * unset). Migrations parked in the status after a denial hold no slot, so
 * waiters never starve each other. Occupancy is read from the store on
 * every call; there is no in-memory counter to drift.
 */

import type { AdmissionConfig } from "../config.js";
import type { MoverDatabase } from "../db/interface.js";
import type { Logger } from "../types.js";
import { HEAVY_IO_STATUSES } from "../migration/types.js";
import type { MemoryCeilingParams } from "./memory.js";
import { createMemoryCeiling } from "./memory.js";

export interface AdmissionDecision {
  admitted: boolean;
  occupied: number;
  ceiling: number;
}

export interface AdmissionController {
  /** True when `migrationId` may start its heavy-I/O stage now. */
  admit(migrationId: string): boolean;
  decide(migrationId: string): AdmissionDecision;
  ceiling(): number;
  /** Migrations currently in heavy-I/O statuses, admitted or waiting. */
  heavyIoCount(): number;
  readonly retryDelayMs: number;
}

export interface AdmissionControllerParams {
  db: MoverDatabase;
  config: AdmissionConfig;
  logger: Logger;
  /** Overrides the configured policy (tests). */
  ceiling?: () => number;
  memory?: Pick<MemoryCeilingParams, "readFile" | "clock">;
}

export function createAdmissionController(params: AdmissionControllerParams): AdmissionController {
  const { db, config, logger } = params;

  const ceiling: () => number = params.ceiling
    ?? (config.policy === "memory"
      ? createMemoryCeiling({ config, logger, ...params.memory })
      : () => config.maxConcurrent);

  function occupiedBy(excludeId: string): number {
    return db.migrations
      .list({ statuses: HEAVY_IO_STATUSES })
      .filter((m) => m.id !== excludeId && m.progress.blobsStartedAt !== undefined && m.progress.blobsFinishedAt === undefined)
      .length;
  }

  function decide(migrationId: string): AdmissionDecision {
    const limit = ceiling();
    const occupied = occupiedBy(migrationId);
    const admitted = occupied < limit;
    if (!admitted) {
      logger.info(`[mover:admission] ${migrationId}: deferred, ${occupied}/${limit} heavy-I/O slots in use`);
    }
    return { admitted, occupied, ceiling: limit };
  }

  return {
    admit: (migrationId) => decide(migrationId).admitted,
    decide,
    ceiling,
    heavyIoCount: () => db.migrations.countByStatus(HEAVY_IO_STATUSES),
    retryDelayMs: config.retryDelayMs,
  };
}
