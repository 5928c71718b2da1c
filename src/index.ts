/**
 * pds-mover — moves an account (identity, repository, media, preferences)
 * from one personal data server to another.
 *
 * Provides:
 * - Migration state machine (pending_account → ... → pending_activation → completed)
 * - Encrypted per-secret credential store with independent expiries
 * - Session managers that refresh and persist rotated tokens
 * - Rate-limit-aware XRPC client for both servers
 * - Bounded blob transfer with post-transfer reconciliation
 * - Admission control for heavy-I/O stages
 * - Error classification and recovery advice
 */

export { startMover, type MoverInstance, type StartMoverOptions } from "./standalone.js";
export { loadMoverConfig, resolveMoverConfig, type MoverConfig } from "./config.js";
export { createMoverLogger, type MoverLoggerOptions, type LogLevel } from "./logger.js";
export type { Logger, Clock, Sleep } from "./types.js";

export { createDatabase, createMemoryDatabase, createSqliteDatabase, type MoverDatabase } from "./db/index.js";
export { createSecretVault, VaultError, type SecretVault } from "./crypto/vault.js";

export * from "./migration/types.js";
export {
  createMigrationManager,
  MigrationStateError,
  progressPercentage,
  estimatedTimeRemaining,
  attemptsRemaining,
  canCancel,
  hasReached,
  type MigrationManager,
} from "./migration/manager.js";
export { createCredentialStore, type CredentialStore, type SessionTokens } from "./migration/credentials.js";
export { cleanHandle, isValidHandle, isValidDid, isValidEmail, isPublicToken } from "./migration/validation.js";

export { createSessionManager, decodeJwtExpiry, type SessionManager } from "./session/manager.js";
export { ProtocolError, isProtocolError, type ProtocolErrorKind } from "./pds/errors.js";
export { createXrpcClient, type XrpcClient } from "./pds/xrpc.js";
export { createPdsClient, type PdsClient } from "./pds/client.js";
export { createPdsClientFactory, type PdsClientFactory } from "./pds/factory.js";

export { transferBlobs, type TransferSnapshot } from "./blobs/transfer.js";
export { reconcileBlobs } from "./blobs/reconcile.js";
export { createAdmissionController, type AdmissionController } from "./admission/controller.js";
export { createSecp256k1KeyGenerator, type RotationKeyGenerator } from "./keys/rotation.js";
export { createLoggingNotifier, type MigrationNotifier } from "./notify/notifier.js";

export { classifyError, explainError, explainFailure, needsSecondFactor, type ErrorAdvice } from "./errors/classify.js";
export type { ErrorKind, Severity, RecoveryAction } from "./errors/kinds.js";

export { createMigrationEngine, type MigrationEngine, type SubmissionCredentials } from "./orchestrator/engine.js";
export { StageError } from "./orchestrator/errors.js";
export { StageScheduler, type StageJob } from "./orchestrator/scheduler.js";
