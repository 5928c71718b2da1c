/**
 * Stage handlers — one per pending status.
 *
 * A handler receives the freshly loaded record (already checked to be at
 * its stage), talks to the two servers, records progress and tells the
 * engine what happens next. It never changes the status itself. Every
 * handler is safe to re-run from the top: milestones already recorded in
 * progress are skipped.
 */

import fs from "node:fs";
import path from "node:path";
import type { MoverConfig } from "../config.js";
import type { Clock, Logger, Sleep } from "../types.js";
import { errorMessage } from "../types.js";
import type { AdmissionController } from "../admission/controller.js";
import type { CredentialStore, SessionTokens } from "../migration/credentials.js";
import type { MigrationManager } from "../migration/manager.js";
import type { MigrationRecord, MigrationStatus, ServerRole } from "../migration/types.js";
import type { MigrationNotifier } from "../notify/notifier.js";
import type { RotationKeyGenerator } from "../keys/rotation.js";
import { rotationKeyDid } from "../keys/rotation.js";
import type { PdsClient, SessionResult } from "../pds/client.js";
import type { PdsClientFactory } from "../pds/factory.js";
import type { SessionManager } from "../session/manager.js";
import { createSessionManager } from "../session/manager.js";
import { transferBlobs } from "../blobs/transfer.js";
import type { TransferSnapshot } from "../blobs/transfer.js";
import { reconcileBlobs } from "../blobs/reconcile.js";
import { ProtocolError } from "../pds/errors.js";
import type { ProtocolErrorKind } from "../pds/errors.js";
import { StageError, toStageFailure } from "./errors.js";

export interface StageContext {
  config: Readonly<MoverConfig>;
  manager: MigrationManager;
  credentials: CredentialStore;
  admission: AdmissionController;
  keys: RotationKeyGenerator;
  notifier: MigrationNotifier;
  clients: PdsClientFactory;
  logger: Logger;
  clock: Clock;
  sleep?: Sleep;
}

export type StageResult =
  /** Move to the next status; `afterAdvance` runs once the transition is stored. */
  | { type: "advance"; afterAdvance?: (record: MigrationRecord) => Promise<void> }
  /** Stay in this status until something outside the engine moves it. */
  | { type: "wait" }
  /** Run this stage again after `delayMs` without using an attempt. */
  | { type: "defer"; delayMs: number; reason: string };

export type StageHandler = (ctx: StageContext, record: MigrationRecord) => Promise<StageResult>;

const FAILED_BLOBS_MANIFEST = "FAILED_BLOB_UPLOADS.txt";

export function toTokens(session: SessionResult): SessionTokens {
  return { accessToken: session.accessJwt, refreshToken: session.refreshJwt };
}

export function migrationScratchDir(config: Pick<MoverConfig, "scratchDir">, migrationId: string): string {
  return path.join(config.scratchDir, migrationId);
}

function isoNow(ctx: StageContext): string {
  return new Date(ctx.clock()).toISOString();
}

export interface Connection {
  /** Unauthenticated client: session exchanges and public reads. */
  bare: PdsClient;
  /** Client whose calls carry the session's access token. */
  client: PdsClient;
  session: SessionManager;
}

/**
 * Client and session for one server. The source is only ever reached with
 * the tokens captured at submission; the destination may fall back to a
 * password login with the generated account password.
 */
export function connect(ctx: StageContext, record: MigrationRecord, role: ServerRole): Connection {
  const host = role === "source" ? record.sourceHost : record.destinationHost;
  const bare = ctx.clients(host);

  const login = role === "destination"
    ? async (): Promise<SessionTokens> => {
        const password = ctx.credentials.getPassword(record.id);
        if (!password) {
          throw new StageError("credentials_need_reauth", "Credentials expired: destination password is no longer available", false);
        }
        return toTokens(await bare.createSession(record.did, password));
      }
    : undefined;

  const session = createSessionManager({
    role,
    migrationId: record.id,
    initial: ctx.credentials.getSessionTokens(record.id, role),
    persist: (tokens) => ctx.credentials.setSessionTokens(record.id, role, tokens),
    refresh: async (refreshToken) => toTokens(await bare.refreshSession(refreshToken)),
    login,
    bufferMs: ctx.config.sessionRefreshBufferMs,
    logger: ctx.logger,
    clock: ctx.clock,
  });

  return { bare, client: ctx.clients(host, () => session.ensureFresh()), session };
}

// --- pending_account ---

const createAccountStage: StageHandler = async (ctx, record) => {
  const { logger } = ctx;
  if (record.progress.accountCreatedAt || record.progress.accountVerifiedAt) {
    return { type: "advance" };
  }

  const destination = connect(ctx, record, "destination");

  if (record.direction === "inbound") {
    await destination.session.ensureFresh();
    const repo = await destination.bare.describeRepo(record.did);
    if (!repo) {
      throw new StageError("generic", "Account does not exist on target PDS", false);
    }
    ctx.manager.updateProgress(record.id, { accountVerifiedAt: isoNow(ctx) });
    logger.info(`[mover:engine] ${record.id}: ${record.did} found on ${record.destinationHost}`);
    return { type: "advance" };
  }

  const password = ctx.credentials.getPassword(record.id);
  if (!password) {
    throw new StageError("credentials_need_reauth", "Credentials expired: destination password is no longer available", false);
  }

  const server = await destination.bare.describeServer();
  const inviteCode = ctx.credentials.getInviteCode(record.id) ?? undefined;
  if (server.inviteCodeRequired && !inviteCode) {
    throw new StageError("invite_code", `Invalid invite code: ${record.destinationHost} requires an invite code`, false);
  }

  const source = connect(ctx, record, "source");
  const serviceAuthToken = await source.client.getServiceAuth(server.did, "com.atproto.server.createAccount");

  const session = await destination.bare.createAccount({
    did: record.did,
    handle: record.destinationHandle,
    email: record.email,
    password,
    inviteCode,
    serviceAuthToken,
  });
  await destination.session.adopt(toTokens(session));

  ctx.manager.updateProgress(record.id, { accountCreatedAt: isoNow(ctx) });
  logger.info(`[mover:engine] ${record.id}: account ${record.destinationHandle} created on ${record.destinationHost}`);
  return { type: "advance" };
};

// --- account_created ---

const accountCreatedStage: StageHandler = async () => ({ type: "advance" });

// --- pending_repo ---

const repoStage: StageHandler = async (ctx, record) => {
  const dir = migrationScratchDir(ctx.config, record.id);
  await fs.promises.mkdir(dir, { recursive: true });
  const carPath = path.join(dir, "repo.car");

  const source = connect(ctx, record, "source");
  const destination = connect(ctx, record, "destination");

  try {
    const bytes = await source.client.exportRepo(record.did, carPath);
    ctx.manager.updateProgress(record.id, { repoExportedBytes: bytes });
    ctx.logger.info(`[mover:engine] ${record.id}: exported repository (${bytes} bytes)`);
    await destination.client.importRepo(carPath);
  } finally {
    await fs.promises.rm(carPath, { force: true });
  }

  ctx.manager.updateProgress(record.id, { repoImportedAt: isoNow(ctx) });
  return { type: "advance" };
};

// --- pending_blobs ---

async function writeFailedManifest(file: string, record: MigrationRecord, failed: readonly string[], at: string): Promise<void> {
  const lines = [
    `# Blobs that could not be moved for ${record.did}`,
    `# ${record.sourceHost} → ${record.destinationHost}, ${at}`,
    ...failed,
    "",
  ];
  await fs.promises.writeFile(file, lines.join("\n"), "utf8");
}

const blobsStage: StageHandler = async (ctx, record) => {
  const { config, manager, logger } = ctx;

  // Admission and claiming the slot happen in the same tick.
  const decision = ctx.admission.decide(record.id);
  if (!decision.admitted) {
    manager.updateProgress(record.id, { admissionDeferrals: (record.progress.admissionDeferrals ?? 0) + 1 });
    return {
      type: "defer",
      delayMs: ctx.admission.retryDelayMs,
      reason: `${decision.occupied}/${decision.ceiling} heavy-I/O slots in use`,
    };
  }
  manager.updateProgress(record.id, { blobsStartedAt: record.progress.blobsStartedAt ?? isoNow(ctx) });

  const source = connect(ctx, record, "source");
  const destination = connect(ctx, record, "destination");
  const dir = migrationScratchDir(config, record.id);

  const cids = await source.client.listAllBlobs(record.did, config.blobs.pageSize);
  manager.updateProgress(record.id, { blobsTotal: cids.length, blobsCompleted: 0, bytesTransferred: 0, failedBlobs: [] });
  logger.info(`[mover:engine] ${record.id}: ${cids.length} blobs to move`);

  const shared = {
    did: record.did,
    source: source.client,
    scratchDir: path.join(dir, "blobs"),
    workers: config.blobs.workers,
    maxAttempts: config.blobs.maxAttempts,
    baseDelayMs: config.blobs.baseDelayMs,
    checkpointEvery: config.blobs.checkpointEvery,
    logger,
    label: record.id,
    sleep: ctx.sleep,
  };

  const result = await transferBlobs(cids, {
    ...shared,
    destination: destination.client,
    onCheckpoint: (snapshot: TransferSnapshot) => {
      manager.updateProgress(record.id, {
        blobsCompleted: snapshot.completed,
        bytesTransferred: snapshot.bytesTransferred,
        failedBlobs: snapshot.failed,
        blobProgress: snapshot.blobProgress,
        lastProgressUpdate: isoNow(ctx),
      });
    },
  });

  const reconciliation = await reconcileBlobs({
    ...shared,
    destination: destination.client,
    pageSize: config.blobs.pageSize,
    now: () => new Date(ctx.clock()),
    onCheckpoint: (snapshot: TransferSnapshot) => {
      logger.debug?.(`[mover:blobs] ${record.id}: reconciliation ${snapshot.completed}/${snapshot.total}`);
    },
  });

  // Anything reconciliation still could not move joins the bulk-pass failures.
  const failed = [...new Set([...result.failed, ...(reconciliation.stillMissing ?? [])])];

  const finishedAt = isoNow(ctx);
  let failedBlobsManifest: string | undefined;
  if (failed.length > 0) {
    failedBlobsManifest = path.join(dir, FAILED_BLOBS_MANIFEST);
    await fs.promises.mkdir(dir, { recursive: true });
    await writeFailedManifest(failedBlobsManifest, record, failed, finishedAt);
    logger.warn(`[mover:engine] ${record.id}: ${failed.length} blob(s) could not be moved; listed in ${failedBlobsManifest}`);
  }

  manager.updateProgress(record.id, {
    failedBlobs: failed,
    failedBlobsManifest,
    reconciliation,
    blobsFinishedAt: finishedAt,
  });
  return { type: "advance" };
};

// --- pending_prefs ---

const preferencesStage: StageHandler = async (ctx, record) => {
  if (record.progress.preferencesImportedAt) return { type: "advance" };
  try {
    const source = connect(ctx, record, "source");
    const destination = connect(ctx, record, "destination");
    const preferences = await source.client.getPreferences();
    await destination.client.putPreferences(preferences);
    ctx.manager.updateProgress(record.id, { preferencesImportedAt: isoNow(ctx) });
    ctx.logger.info(`[mover:engine] ${record.id}: ${preferences.length} preference(s) copied`);
  } catch (err) {
    // Settings are not worth failing a migration over.
    ctx.manager.updateProgress(record.id, { preferencesError: errorMessage(err) });
    ctx.logger.warn(`[mover:engine] ${record.id}: preferences not copied: ${errorMessage(err)}`);
  }
  return { type: "advance" };
};

// --- pending_plc ---

async function ensureRotationKey(ctx: StageContext, record: MigrationRecord): Promise<void> {
  const { credentials, manager, logger } = ctx;
  let current = record;

  if (!credentials.hasCiphertext(record.id, "rotationKey")) {
    const key = await ctx.keys.generate();
    credentials.setRotationKey(record.id, key.privateKeyHex);
    current = manager.updateProgress(record.id, { rotationKeyPublic: key.did, rotationKeyGeneratedAt: isoNow(ctx) });
    logger.info(`[mover:engine] ${record.id}: rotation key ${key.did} generated`);
  }

  if (current.progress.rotationKeyNotifiedAt) return;
  const privateKeyHex = credentials.getRotationKey(record.id);
  const did = current.progress.rotationKeyPublic;
  if (!privateKeyHex || !did) return;
  try {
    await ctx.notifier.rotationKeyIssued(current, { did, privateKeyHex });
    manager.updateProgress(record.id, { rotationKeyNotifiedAt: isoNow(ctx) });
  } catch (err) {
    logger.warn(`[mover:engine] ${record.id}: rotation key notice not delivered: ${errorMessage(err)}`);
  }
}

/** Ask the source to email the user a confirmation code. */
export async function requestPlcToken(ctx: StageContext, record: MigrationRecord): Promise<void> {
  const source = connect(ctx, record, "source");
  try {
    await source.client.requestPlcOperationSignature();
  } catch (err) {
    throw new StageError(toStageFailure(err).kind, `Failed to request PLC token: ${errorMessage(err)}`, false);
  }
  const updated = ctx.manager.updateProgress(record.id, { plcTokenRequestedAt: isoNow(ctx) });
  ctx.logger.info(`[mover:engine] ${record.id}: confirmation code requested from ${record.sourceHost}`);
  try {
    await ctx.notifier.plcTokenRequested(updated);
  } catch (err) {
    ctx.logger.warn(`[mover:engine] ${record.id}: confirmation notice not delivered: ${errorMessage(err)}`);
  }
}

const plcStage: StageHandler = async (ctx, record) => {
  // The recovery key must exist before anything irreversible is requested.
  await ensureRotationKey(ctx, record);
  if (!record.progress.plcTokenRequestedAt) {
    await requestPlcToken(ctx, ctx.manager.require(record.id));
  }
  return { type: "wait" };
};

// --- pending_activation ---

/** Transport trouble that a later attempt with the same code can get past. */
const TRANSIENT_BEFORE_SUBMISSION: ReadonlySet<ProtocolErrorKind> = new Set<ProtocolErrorKind>([
  "rate_limit",
  "network",
  "timeout",
  "token_rejected",
]);

function beforeSubmission(err: unknown): Error {
  if (err instanceof ProtocolError && TRANSIENT_BEFORE_SUBMISSION.has(err.kind)) return err;
  // A rejected or unusable code will not sign on a retry; the user needs a fresh one.
  return new StageError(
    "plc_pre_submission_failure",
    `PLC update failed (before submission) - ${toStageFailure(err).message}`,
    false,
  );
}

async function updateIdentity(ctx: StageContext, record: MigrationRecord): Promise<void> {
  const { credentials, manager, logger } = ctx;
  const { progress } = record;

  if (progress.plcOperationSubmittedAt) {
    // Submitted before a crash or failure, with no recorded outcome.
    throw new StageError(
      "critical_plc",
      `CRITICAL: PLC update failed after submission - outcome of the submission at ${progress.plcOperationSubmittedAt} is unknown`,
      false,
    );
  }

  const token = credentials.getPlcToken(record.id);
  if (!token) {
    const message = credentials.hasCiphertext(record.id, "plcToken")
      ? "PLC token has expired; request a new confirmation code"
      : "PLC token is missing; request a new confirmation code";
    throw new StageError("plc_token_expired", message, false);
  }

  let rotationDid = progress.rotationKeyPublic;
  const privateKeyHex = credentials.getRotationKey(record.id);
  if (!rotationDid && privateKeyHex) rotationDid = await rotationKeyDid(privateKeyHex);
  if (!rotationDid) {
    throw new StageError("plc_pre_submission_failure", "PLC update failed (before submission) - no rotation key on record", false);
  }

  const source = connect(ctx, record, "source");
  const destination = connect(ctx, record, "destination");

  let operation: Record<string, unknown>;
  try {
    const recommended = await destination.client.getRecommendedDidCredentials();
    const rotationKeys = [rotationDid, ...recommended.rotationKeys.filter((k) => k !== rotationDid)];
    operation = await source.client.signPlcOperation(token, { ...recommended, rotationKeys });
  } catch (err) {
    throw beforeSubmission(err);
  }
  manager.updateProgress(record.id, { plcOperationSignedAt: isoNow(ctx) });
  credentials.clearPlcToken(record.id);

  // From here on the directory may already hold the new operation.
  manager.updateProgress(record.id, { plcOperationSubmittedAt: isoNow(ctx) });
  try {
    await destination.client.submitPlcOperation(operation);
  } catch (err) {
    throw new StageError("critical_plc", `CRITICAL: PLC update failed after submission - ${errorMessage(err)}`, false);
  }
  manager.updateProgress(record.id, { plcOperationCompletedAt: isoNow(ctx) });
  logger.info(`[mover:engine] ${record.id}: identity directory now points at ${record.destinationHost}`);
}

const activationStage: StageHandler = async (ctx, record) => {
  const { credentials, manager, logger } = ctx;

  if (!record.progress.plcOperationCompletedAt) {
    await updateIdentity(ctx, record);
  }

  if (!record.progress.accountActivatedAt) {
    const destination = connect(ctx, record, "destination");
    await destination.client.activateAccount();
    manager.updateProgress(record.id, { accountActivatedAt: isoNow(ctx) });
    logger.info(`[mover:engine] ${record.id}: account activated on ${record.destinationHost}`);
  }

  if (!record.progress.accountDeactivatedAt && !record.progress.sourceDeactivationError) {
    try {
      const source = connect(ctx, record, "source");
      await source.client.deactivateAccount();
      manager.updateProgress(record.id, { accountDeactivatedAt: isoNow(ctx) });
    } catch (err) {
      // The destination is live; a still-active source is not a failed migration.
      manager.updateProgress(record.id, { sourceDeactivationError: errorMessage(err) });
      logger.warn(`[mover:engine] ${record.id}: source not deactivated: ${errorMessage(err)}`);
    }
  }
  credentials.clearSourceTokens(record.id);

  const password = credentials.getPassword(record.id);
  manager.updateProgress(record.id, { completedAt: isoNow(ctx) });

  return {
    type: "advance",
    afterAdvance: async (completed) => {
      try {
        await ctx.notifier.migrationCompleted(completed, password);
      } catch (err) {
        logger.error(`[mover:engine] ${record.id}: completion notice not delivered: ${errorMessage(err)}`);
      }
      credentials.clearCredentials(record.id);
    },
  };
};

export const STAGE_HANDLERS: Readonly<Partial<Record<MigrationStatus, StageHandler>>> = {
  pending_account: createAccountStage,
  account_created: accountCreatedStage,
  pending_repo: repoStage,
  pending_blobs: blobsStage,
  pending_prefs: preferencesStage,
  pending_plc: plcStage,
  pending_activation: activationStage,
};
