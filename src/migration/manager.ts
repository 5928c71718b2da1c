/**
 * Migration Manager — the durable state machine for migrations.
 *
 * Every status change goes through here: it validates the edge against
 * VALID_STATUS_TRANSITIONS, applies it with a compare-and-set on the stored
 * status (so a cancel racing a stage handler cannot be overwritten), appends
 * to the transition log and notifies subscribers (the engine enqueues the
 * next stage from that callback).
 */

import type { Clock, Logger } from "../types.js";
import { systemClock, errorMessage } from "../types.js";
import type { MoverDatabase, MigrationFilter, MigrationUpdateFields } from "../db/interface.js";
import { DuplicateActiveMigrationError } from "../db/interface.js";
import type { ErrorKind } from "../errors/kinds.js";
import type {
  MigrationRecord,
  MigrationStatus,
  MigrationTransition,
  NewMigrationInput,
  ProgressData,
} from "./types.js";
import {
  STAGE_SEQUENCE,
  isCancellable,
  isTerminalStatus,
  isValidTransition,
  nextStatus,
  statusOrdinal,
} from "./types.js";
import {
  cleanHandle,
  generatePublicToken,
  isValidDid,
  isValidEmail,
  isValidHandle,
  normaliseHost,
} from "./validation.js";
import { uniqueId } from "../utils/id.js";

export type MigrationStateErrorCode =
  | "not_found"
  | "validation"
  | "duplicate_active"
  | "invalid_transition"
  | "not_cancellable"
  | "irreversible";

export class MigrationStateError extends Error {
  readonly code: MigrationStateErrorCode;

  constructor(code: MigrationStateErrorCode, message: string) {
    super(message);
    this.name = "MigrationStateError";
    this.code = code;
  }
}

export type TransitionListener = (record: MigrationRecord, from: MigrationStatus) => void;

export interface MigrationManager {
  create(input: NewMigrationInput): MigrationRecord;
  get(id: string): MigrationRecord | null;
  /** @throws MigrationStateError not_found */
  require(id: string): MigrationRecord;
  getByToken(publicToken: string): MigrationRecord | null;
  list(filter?: MigrationFilter): MigrationRecord[];
  /**
   * Move `id` from `from` to `to`. Returns null when the stored status is no
   * longer `from` (another writer got there first).
   * @throws MigrationStateError invalid_transition
   */
  transition(id: string, from: MigrationStatus, to: MigrationStatus, reason: string): MigrationRecord | null;
  /** Transition to the next status on the forward sequence. */
  advance(id: string, from: MigrationStatus, reason?: string): MigrationRecord | null;
  /** Returns null when the migration is already terminal. */
  markFailed(id: string, message: string, code: ErrorKind): MigrationRecord | null;
  /** @throws MigrationStateError not_cancellable */
  cancel(id: string, reason?: string): MigrationRecord;
  /** Record a failure that will be retried, without leaving the current status. */
  recordError(id: string, message: string, code: ErrorKind): void;
  updateProgress(id: string, patch: Partial<ProgressData>): MigrationRecord;
  updateBlobProgress(id: string, blobId: string, totalSize: number, bytesTransferred: number): void;
  startJobAttempt(id: string, step: MigrationStatus, attempt: number, maxAttempts: number): void;
  /** @throws MigrationStateError irreversible when the identity-directory stage was entered and no outcome is recorded */
  remove(id: string): void;
  history(id: string): MigrationTransition[];
  subscribe(listener: TransitionListener): () => void;
}

interface MigrationManagerParams {
  db: MoverDatabase;
  logger: Logger;
  clock?: Clock;
}

export function createMigrationManager(params: MigrationManagerParams): MigrationManager {
  const { db, logger } = params;
  const clock = params.clock ?? systemClock;
  const listeners = new Set<TransitionListener>();

  function isoNow(): string {
    return new Date(clock()).toISOString();
  }

  function requireRecord(id: string): MigrationRecord {
    const record = db.migrations.get(id);
    if (!record) throw new MigrationStateError("not_found", `migration not found: ${id}`);
    return record;
  }

  function notify(record: MigrationRecord, from: MigrationStatus): void {
    for (const listener of listeners) {
      try {
        listener(record, from);
      } catch (err) {
        logger.error(`[mover:store] transition listener failed for ${record.id}: ${errorMessage(err)}`);
      }
    }
  }

  function create(input: NewMigrationInput): MigrationRecord {
    const did = input.did.trim();
    const sourceHandle = cleanHandle(input.sourceHandle);
    const destinationHandle = cleanHandle(input.destinationHandle);
    const email = input.email.trim();
    const sourceHost = normaliseHost(input.sourceHost);
    const destinationHost = normaliseHost(input.destinationHost);

    const problems: string[] = [];
    if (!isValidDid(did)) problems.push(`did is invalid: ${did}`);
    if (!isValidHandle(sourceHandle)) problems.push(`source handle is invalid: ${sourceHandle}`);
    if (!isValidHandle(destinationHandle)) problems.push(`destination handle is invalid: ${destinationHandle}`);
    if (!isValidEmail(email)) problems.push("email is invalid");
    if (!sourceHost) problems.push(`source host is invalid: ${input.sourceHost}`);
    if (!destinationHost) problems.push(`destination host is invalid: ${input.destinationHost}`);
    if (!sourceHost || !destinationHost || problems.length > 0) {
      throw new MigrationStateError("validation", problems.join("; "));
    }

    const now = clock();
    const record: MigrationRecord = {
      id: uniqueId("mig"),
      publicToken: generatePublicToken(),
      did,
      direction: input.direction ?? "outbound",
      sourceHost,
      destinationHost,
      sourceHandle,
      destinationHandle,
      email,
      locale: input.locale ?? "en",
      status: "pending_account",
      progress: {},
      secrets: {},
      currentJobStep: null,
      currentJobAttempt: 0,
      currentJobMaxAttempts: 0,
      retryCount: 0,
      lastError: null,
      errorCode: null,
      createdAt: now,
      updatedAt: now,
    };

    try {
      db.migrations.insert(record);
    } catch (err) {
      if (err instanceof DuplicateActiveMigrationError) {
        throw new MigrationStateError("duplicate_active", err.message);
      }
      throw err;
    }

    logger.info(`[mover:store] created ${record.id} (${record.publicToken}) for ${did}: ${sourceHost} → ${destinationHost}`);
    return record;
  }

  function transition(
    id: string,
    from: MigrationStatus,
    to: MigrationStatus,
    reason: string,
  ): MigrationRecord | null {
    if (!isValidTransition(from, to)) {
      throw new MigrationStateError(
        "invalid_transition",
        `invalid transition: ${from} → ${to} for ${id}`,
      );
    }

    const now = clock();
    const fields: MigrationUpdateFields = { status: to, updatedAt: now };
    if (to === "completed") {
      fields.lastError = null;
      fields.errorCode = null;
    }

    if (!db.migrations.updateIfStatus(id, from, fields)) {
      const current = db.migrations.get(id);
      if (!current) throw new MigrationStateError("not_found", `migration not found: ${id}`);
      logger.warn(`[mover:store] ${id}: expected ${from}, found ${current.status}; ${from} → ${to} not applied`);
      return null;
    }

    db.transitions.insert({ migrationId: id, fromStatus: from, toStatus: to, reason, timestamp: now });
    const record = requireRecord(id);
    logger.info(`[mover:store] ${id}: ${from} → ${to} (${reason})`);
    notify(record, from);
    return record;
  }

  function advance(id: string, from: MigrationStatus, reason?: string): MigrationRecord | null {
    const to = nextStatus(from);
    if (!to) {
      throw new MigrationStateError("invalid_transition", `no status follows ${from} for ${id}`);
    }
    return transition(id, from, to, reason ?? `${from} complete`);
  }

  function markFailed(id: string, message: string, code: ErrorKind): MigrationRecord | null {
    // Retry the compare-and-set if a concurrent advance lands between read and write.
    for (let i = 0; i < 3; i++) {
      const record = requireRecord(id);
      if (isTerminalStatus(record.status)) {
        logger.warn(`[mover:store] ${id}: already ${record.status}, not marking failed (${message})`);
        return null;
      }
      const now = clock();
      const applied = db.migrations.updateIfStatus(id, record.status, {
        status: "failed",
        lastError: message,
        errorCode: code,
        retryCount: record.retryCount + 1,
        updatedAt: now,
      });
      if (applied) {
        db.transitions.insert({ migrationId: id, fromStatus: record.status, toStatus: "failed", reason: `[${code}] ${message}`, timestamp: now });
        logger.error(`[mover:store] ${id}: ${record.status} → failed [${code}] ${message}`);
        const failed = requireRecord(id);
        notify(failed, record.status);
        return failed;
      }
    }
    throw new Error(`could not mark ${id} failed: status kept changing`);
  }

  function cancel(id: string, reason = "Migration cancelled by user"): MigrationRecord {
    const record = requireRecord(id);
    if (!isCancellable(record.status)) {
      throw new MigrationStateError(
        "not_cancellable",
        `migration ${id} cannot be cancelled in status ${record.status}`,
      );
    }
    const now = clock();
    const applied = db.migrations.updateIfStatus(id, record.status, {
      status: "cancelled",
      lastError: reason,
      errorCode: "cancelled",
      updatedAt: now,
    });
    if (!applied) {
      // Status moved underneath us; re-check against the new one.
      return cancel(id, reason);
    }
    db.transitions.insert({ migrationId: id, fromStatus: record.status, toStatus: "cancelled", reason, timestamp: now });
    logger.info(`[mover:store] ${id}: ${record.status} → cancelled (${reason})`);
    const cancelled = requireRecord(id);
    notify(cancelled, record.status);
    return cancelled;
  }

  function recordError(id: string, message: string, code: ErrorKind): void {
    db.migrations.update(id, { lastError: message, errorCode: code, updatedAt: clock() });
  }

  function updateProgress(id: string, patch: Partial<ProgressData>): MigrationRecord {
    const record = requireRecord(id);
    const progress: ProgressData = { ...record.progress, ...patch };
    db.migrations.update(id, { progress, updatedAt: clock() });
    return { ...record, progress };
  }

  function updateBlobProgress(id: string, blobId: string, totalSize: number, bytesTransferred: number): void {
    const record = requireRecord(id);
    const blobProgress = { ...record.progress.blobProgress };
    blobProgress[blobId] = { id: blobId, totalSize, bytesTransferred, lastUpdate: isoNow() };
    db.migrations.update(id, { progress: { ...record.progress, blobProgress }, updatedAt: clock() });
  }

  function startJobAttempt(id: string, step: MigrationStatus, attempt: number, maxAttempts: number): void {
    db.migrations.update(id, {
      currentJobStep: step,
      currentJobAttempt: attempt,
      currentJobMaxAttempts: maxAttempts,
      updatedAt: clock(),
    });
  }

  function remove(id: string): void {
    const record = requireRecord(id);
    if (!isTerminalStatus(record.status) && statusOrdinal(record.status) >= statusOrdinal("pending_activation")) {
      throw new MigrationStateError(
        "irreversible",
        `migration ${id} entered identity-directory submission; it cannot be deleted before a terminal outcome`,
      );
    }
    db.migrations.delete(id);
    logger.info(`[mover:store] deleted ${id} (${record.status})`);
  }

  return {
    create,
    get: (id) => db.migrations.get(id),
    require: requireRecord,
    getByToken: (publicToken) => db.migrations.getByToken(publicToken),
    list: (filter) => db.migrations.list(filter),
    transition,
    advance,
    markFailed,
    cancel,
    recordError,
    updateProgress,
    updateBlobProgress,
    startJobAttempt,
    remove,
    history: (id) => db.transitions.list({ migrationId: id }),
    subscribe(listener) {
      listeners.add(listener);
      return () => listeners.delete(listener);
    },
  };
}

// --- Derived views ---

const STAGE_PERCENT: Readonly<Record<MigrationStatus, number>> = {
  pending_account: 0,
  account_created: 10,
  pending_repo: 20,
  pending_blobs: 20,
  pending_prefs: 70,
  pending_plc: 80,
  pending_activation: 90,
  completed: 100,
  failed: 0,
  cancelled: 0,
};

/** Fraction of blob work done, from counters when known, else from per-blob byte entries. */
function blobFraction(progress: ProgressData): number {
  if (progress.blobsTotal !== undefined && progress.blobsTotal > 0) {
    return Math.min(1, (progress.blobsCompleted ?? 0) / progress.blobsTotal);
  }
  const entries = Object.values(progress.blobProgress ?? {});
  const total = entries.reduce((sum, e) => sum + e.totalSize, 0);
  if (total <= 0) return 0;
  const done = entries.reduce((sum, e) => sum + Math.min(e.bytesTransferred, e.totalSize), 0);
  return done / total;
}

export function progressPercentage(record: MigrationRecord): number {
  const base = STAGE_PERCENT[record.status];
  if (record.status !== "pending_blobs") return base;
  return Math.floor(base + 50 * blobFraction(record.progress));
}

/**
 * Seconds left in the blob stage, extrapolated from blobs moved since the
 * stage started. Null outside pending_blobs or before any throughput exists.
 */
export function estimatedTimeRemaining(record: MigrationRecord, now: number): number | null {
  const { blobsStartedAt, blobsTotal, blobsCompleted } = record.progress;
  if (record.status !== "pending_blobs" || !blobsStartedAt || blobsTotal === undefined) return null;
  const done = blobsCompleted ?? 0;
  const elapsedSec = (now - Date.parse(blobsStartedAt)) / 1000;
  if (done <= 0 || elapsedSec <= 0 || blobsTotal <= done) return null;
  const rate = done / elapsedSec;
  return Math.ceil((blobsTotal - done) / rate);
}

export function attemptsRemaining(record: MigrationRecord): number {
  return Math.max(0, record.currentJobMaxAttempts - record.currentJobAttempt);
}

export function canCancel(record: MigrationRecord): boolean {
  return isCancellable(record.status);
}

/** True once the stage sequence has reached `stage` (or gone past it). */
export function hasReached(record: MigrationRecord, stage: MigrationStatus): boolean {
  const ordinal = statusOrdinal(record.status);
  return ordinal >= 0 && ordinal >= STAGE_SEQUENCE.indexOf(stage);
}
