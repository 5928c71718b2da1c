/**
 * Migration Engine
 *
 * Drives every migration through its stages. A stage job reloads the
 * record, skips when the status is no longer its stage, runs the handler
 * and maps the outcome:
 *
 *   advance → transition to the next status (the transition listener
 *             enqueues the next stage)
 *   wait    → nothing; an external call moves the status on
 *   defer   → same job again after a delay, no attempt used
 *   failure → retried with backoff while the failure is retryable and
 *             attempts remain, otherwise the migration is marked failed
 */

import { randomBytes } from "node:crypto";
import type { MoverConfig } from "../config.js";
import type { Clock, Logger, Sleep } from "../types.js";
import { errorMessage, systemClock } from "../types.js";
import type { AdmissionController } from "../admission/controller.js";
import type { CredentialStore } from "../migration/credentials.js";
import type { MigrationManager } from "../migration/manager.js";
import { MigrationStateError } from "../migration/manager.js";
import type { MigrationRecord, MigrationStatus, NewMigrationInput } from "../migration/types.js";
import { isTerminalStatus, statusOrdinal } from "../migration/types.js";
import type { MigrationNotifier } from "../notify/notifier.js";
import type { RotationKeyGenerator } from "../keys/rotation.js";
import { explainFailure } from "../errors/classify.js";
import type { ErrorKind } from "../errors/kinds.js";
import type { PdsClientFactory } from "../pds/factory.js";
import { ProtocolError } from "../pds/errors.js";
import { backoffDelayMs } from "../pds/retry.js";
import type { StageJob } from "./scheduler.js";
import { StageScheduler } from "./scheduler.js";
import type { StageContext, StageHandler } from "./stages.js";
import { STAGE_HANDLERS, requestPlcToken, toTokens } from "./stages.js";
import { toStageFailure } from "./errors.js";

export type StageOutcome =
  | "advanced"
  | "waiting"
  | "deferred"
  | "retry_scheduled"
  | "failed"
  | "skipped";

/** What the user supplies when starting a migration. */
export interface SubmissionCredentials {
  /** The user's real password on the source; used once to capture a session and never stored. */
  sourcePassword: string;
  /** One-time code when the source demands a second factor. */
  authFactorToken?: string;
  /** Password for the destination account; generated when omitted. */
  destinationPassword?: string;
  inviteCode?: string;
}

export interface MigrationEngine {
  /** Subscribe to transitions, start the queue and resume unfinished migrations. */
  start(): number;
  stop(): void;
  /**
   * Capture a source session with the user's password, open the migration
   * and queue its first stage.
   * @throws ProtocolError two_factor_required when the source wants a one-time code
   */
  submit(input: NewMigrationInput, credentials: SubmissionCredentials): Promise<MigrationRecord>;
  /** Store the confirmation code and move pending_plc → pending_activation. */
  submitPlcToken(id: string, token: string): MigrationRecord;
  /** Ask the source to send a fresh confirmation code (pending_plc only). */
  requestNewPlcToken(id: string): Promise<void>;
  cancel(id: string, reason?: string): MigrationRecord;
  /** Re-enqueue every non-terminal migration at its current status. */
  resumeAll(): number;
  runStage(job: StageJob): Promise<StageOutcome>;
  /** Resolves once no stage job is ready or running. */
  idle(): Promise<void>;
  readonly scheduler: StageScheduler;
}

export interface MigrationEngineParams {
  config: Readonly<MoverConfig>;
  manager: MigrationManager;
  credentials: CredentialStore;
  admission: AdmissionController;
  keys: RotationKeyGenerator;
  notifier: MigrationNotifier;
  clients: PdsClientFactory;
  logger: Logger;
  clock?: Clock;
  /** Sleep used inside blob retries. */
  sleep?: Sleep;
  /** Stage handler overrides (tests). */
  handlers?: Partial<Record<MigrationStatus, StageHandler>>;
}

function generatePassword(): string {
  return randomBytes(18).toString("base64url");
}

export function createMigrationEngine(params: MigrationEngineParams): MigrationEngine {
  const { config, manager, credentials, notifier, logger } = params;
  const clock = params.clock ?? systemClock;
  const handlers = { ...STAGE_HANDLERS, ...params.handlers };

  const ctx: StageContext = {
    config,
    manager,
    credentials,
    admission: params.admission,
    keys: params.keys,
    notifier,
    clients: params.clients,
    logger,
    clock,
    sleep: params.sleep,
  };

  const scheduler = new StageScheduler({
    run: async (job) => {
      await runStage(job);
    },
    concurrency: config.workerConcurrency,
    logger,
  });

  let unsubscribe: (() => void) | null = null;

  function enqueueCurrent(record: MigrationRecord): boolean {
    if (isTerminalStatus(record.status) || !handlers[record.status]) return false;
    return scheduler.enqueue({ migrationId: record.id, stage: record.status, attempt: 1 });
  }

  async function fail(id: string, message: string, kind: ErrorKind): Promise<void> {
    const failed = manager.markFailed(id, message, kind);
    if (!failed) return;
    try {
      await notifier.migrationFailed(failed, explainFailure({ code: kind, message }));
    } catch (err) {
      logger.error(`[mover:engine] ${id}: failure notice not delivered: ${errorMessage(err)}`);
    }
  }

  async function runStage(job: StageJob): Promise<StageOutcome> {
    const { migrationId: id, stage } = job;
    const record = manager.get(id);
    if (!record) {
      logger.warn(`[mover:engine] ${stage} for ${id}: migration no longer exists`);
      return "skipped";
    }
    if (isTerminalStatus(record.status)) {
      logger.info(`[mover:engine] ${id}: ${record.status}; ${stage} not run`);
      return "skipped";
    }
    if (record.status !== stage) {
      const ahead = statusOrdinal(record.status) > statusOrdinal(stage);
      if (ahead) {
        logger.info(`[mover:engine] ${id}: already at ${record.status}; ${stage} not run`);
      } else {
        logger.warn(`[mover:engine] ${id}: at ${record.status}, not yet ${stage}; job dropped`);
      }
      return "skipped";
    }

    const handler = handlers[stage];
    if (!handler) {
      logger.warn(`[mover:engine] ${id}: no handler for ${stage}`);
      return "skipped";
    }

    const maxAttempts = config.stageRetry.maxAttempts;
    manager.startJobAttempt(id, stage, job.attempt, maxAttempts);
    logger.info(`[mover:engine] ${id}: running ${stage} (attempt ${job.attempt}/${maxAttempts})`);

    try {
      const result = await handler(ctx, record);
      switch (result.type) {
        case "advance": {
          const advanced = manager.advance(id, stage);
          if (!advanced) return "skipped";
          if (result.afterAdvance) await result.afterAdvance(advanced);
          return "advanced";
        }
        case "wait":
          return "waiting";
        case "defer":
          logger.info(`[mover:engine] ${id}: ${stage} deferred ${result.delayMs}ms (${result.reason})`);
          scheduler.enqueue(job, result.delayMs);
          return "deferred";
      }
    } catch (err) {
      const failure = toStageFailure(err);
      const current = manager.get(id);
      if (!current || current.status !== stage) {
        // Cancelled or otherwise moved while the handler ran; the result no longer matters.
        logger.warn(`[mover:engine] ${id}: ${stage} failed after status moved on: ${failure.message}`);
        return "skipped";
      }
      if (failure.retryable && job.attempt < maxAttempts) {
        const delayMs = backoffDelayMs(job.attempt - 1, config.stageRetry);
        manager.recordError(id, failure.message, failure.kind);
        logger.warn(
          `[mover:engine] ${id}: ${stage} attempt ${job.attempt}/${maxAttempts} failed [${failure.kind}]: ${failure.message}; retrying in ${delayMs}ms`,
        );
        scheduler.enqueue({ ...job, attempt: job.attempt + 1 }, delayMs);
        return "retry_scheduled";
      }
      await fail(id, failure.message, failure.kind);
      return "failed";
    }
  }

  function resumeAll(): number {
    let queued = 0;
    for (const record of manager.list()) {
      if (enqueueCurrent(record)) queued++;
    }
    logger.info(`[mover:engine] resumed ${queued} migration(s)`);
    return queued;
  }

  async function submit(input: NewMigrationInput, creds: SubmissionCredentials): Promise<MigrationRecord> {
    const record = manager.create(input);
    try {
      const source = params.clients(record.sourceHost);
      const session = await source.createSession(record.sourceHandle, creds.sourcePassword, creds.authFactorToken);
      if (session.did !== record.did) {
        throw new ProtocolError(
          "identity_mismatch",
          `DID mismatch: requested ${record.did} but ${record.sourceHost} authenticated ${session.did}`,
        );
      }
      credentials.setSessionTokens(record.id, "source", toTokens(session));
    } catch (err) {
      // Nothing has happened remotely yet; drop the record so the user can resubmit.
      manager.remove(record.id);
      throw err;
    }

    credentials.setPassword(record.id, creds.destinationPassword ?? generatePassword());
    if (creds.inviteCode) credentials.setInviteCode(record.id, creds.inviteCode.trim());

    enqueueCurrent(record);
    return record;
  }

  function submitPlcToken(id: string, token: string): MigrationRecord {
    const record = manager.require(id);
    if (record.status !== "pending_plc") {
      throw new MigrationStateError("invalid_transition", `migration ${id} is ${record.status}, not waiting for a confirmation code`);
    }
    const code = token.trim();
    if (code.length === 0) {
      throw new MigrationStateError("validation", "confirmation code is empty");
    }
    credentials.setPlcToken(id, code);
    const moved = manager.transition(id, "pending_plc", "pending_activation", "confirmation code submitted");
    if (!moved) {
      throw new MigrationStateError("invalid_transition", `migration ${id} left pending_plc before the code was stored`);
    }
    return moved;
  }

  async function requestNewPlcToken(id: string): Promise<void> {
    const record = manager.require(id);
    if (record.status !== "pending_plc") {
      throw new MigrationStateError("invalid_transition", `migration ${id} is ${record.status}, not waiting for a confirmation code`);
    }
    await requestPlcToken(ctx, record);
  }

  function cancel(id: string, reason?: string): MigrationRecord {
    const cancelled = manager.cancel(id, reason);
    credentials.clearCredentials(id);
    return cancelled;
  }

  return {
    start() {
      if (!unsubscribe) {
        unsubscribe = manager.subscribe((record) => {
          enqueueCurrent(record);
        });
      }
      return resumeAll();
    },
    stop() {
      unsubscribe?.();
      unsubscribe = null;
      scheduler.stop();
    },
    submit,
    submitPlcToken,
    requestNewPlcToken,
    cancel,
    resumeAll,
    runStage,
    idle: () => scheduler.idle(),
    scheduler,
  };
}
