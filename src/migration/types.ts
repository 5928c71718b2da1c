/**
 * Migration — Type Definitions
 *
 * Status graph (linear, one stage handler per pending status):
 *   pending_account → account_created → pending_repo → pending_blobs →
 *   pending_prefs → pending_plc → pending_activation → completed
 *
 * Any non-terminal status may move to failed. Only statuses strictly before
 * pending_plc may move to cancelled.
 */

import type { ErrorKind } from "../errors/kinds.js";

// --- Statuses ---

export type MigrationStatus =
  | "pending_account"
  | "account_created"
  | "pending_repo"
  | "pending_blobs"
  | "pending_prefs"
  | "pending_plc"
  | "pending_activation"
  | "completed"
  | "failed"
  | "cancelled";

/** The forward sequence, in order. Position is the status ordinal. */
export const STAGE_SEQUENCE: readonly MigrationStatus[] = [
  "pending_account",
  "account_created",
  "pending_repo",
  "pending_blobs",
  "pending_prefs",
  "pending_plc",
  "pending_activation",
  "completed",
] as const;

export const MIGRATION_STATUSES: readonly MigrationStatus[] = [
  ...STAGE_SEQUENCE,
  "failed",
  "cancelled",
];

export const TERMINAL_STATUSES: ReadonlySet<MigrationStatus> = new Set([
  "completed",
  "failed",
  "cancelled",
]);

/** Statuses whose stage moves bulk data; counted by the admission controller. */
export const HEAVY_IO_STATUSES: readonly MigrationStatus[] = ["pending_blobs"];

export function isMigrationStatus(v: unknown): v is MigrationStatus {
  return typeof v === "string" && (MIGRATION_STATUSES as readonly string[]).includes(v);
}

export function isTerminalStatus(status: MigrationStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

/**
 * Position on the forward sequence, or -1 for failed/cancelled, which sit
 * off the sequence and are never "past" or "before" a stage.
 */
export function statusOrdinal(status: MigrationStatus): number {
  return STAGE_SEQUENCE.indexOf(status);
}

/** Cancellation is only possible strictly before the identity-directory stage. */
export function isCancellable(status: MigrationStatus): boolean {
  const ordinal = statusOrdinal(status);
  return ordinal >= 0 && ordinal < statusOrdinal("pending_plc");
}

/** Valid status transitions. Terminal statuses have none. */
export const VALID_STATUS_TRANSITIONS: Readonly<Record<MigrationStatus, readonly MigrationStatus[]>> = {
  pending_account: ["account_created", "failed", "cancelled"],
  account_created: ["pending_repo", "failed", "cancelled"],
  pending_repo: ["pending_blobs", "failed", "cancelled"],
  pending_blobs: ["pending_prefs", "failed", "cancelled"],
  pending_prefs: ["pending_plc", "failed", "cancelled"],
  pending_plc: ["pending_activation", "failed"],
  pending_activation: ["completed", "failed"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isValidTransition(from: MigrationStatus, to: MigrationStatus): boolean {
  return VALID_STATUS_TRANSITIONS[from].includes(to);
}

/** The status that follows `status` on the forward sequence, if any. */
export function nextStatus(status: MigrationStatus): MigrationStatus | null {
  const ordinal = statusOrdinal(status);
  if (ordinal < 0 || ordinal >= STAGE_SEQUENCE.length - 1) return null;
  return STAGE_SEQUENCE[ordinal + 1] ?? null;
}

// --- Record ---

/** outbound: create a new account on the destination. inbound: re-claim an existing one. */
export type MigrationDirection = "outbound" | "inbound";

export type ServerRole = "source" | "destination";

export type SecretName =
  | "password"
  | "sourceAccessToken"
  | "sourceRefreshToken"
  | "destinationAccessToken"
  | "destinationRefreshToken"
  | "plcToken"
  | "inviteCode"
  | "rotationKey";

/** One encrypted secret and its own expiry (null = never expires). */
export interface SealedSecret {
  ciphertext: string;
  expiresAt: number | null;
}

export type MigrationSecrets = Partial<Record<SecretName, SealedSecret>>;

export interface BlobProgressEntry {
  id: string;
  totalSize: number;
  bytesTransferred: number;
  lastUpdate: string;
}

export type ReconciliationStatus = "complete" | "partial" | "skipped";

export interface ReconciliationReport {
  status: ReconciliationStatus;
  error?: string;
  expectedBlobs?: number;
  importedBlobs?: number;
  missingCount?: number;
  recovered?: number;
  stillMissing?: string[];
  completedAt?: string;
}

/**
 * Per-stage counters and milestones. Timestamps are ISO strings so the
 * map round-trips through JSON unchanged.
 */
export interface ProgressData {
  accountCreatedAt?: string;
  accountVerifiedAt?: string;
  repoExportedBytes?: number;
  repoImportedAt?: string;
  blobsStartedAt?: string;
  blobsTotal?: number;
  blobsCompleted?: number;
  bytesTransferred?: number;
  blobProgress?: Record<string, BlobProgressEntry>;
  failedBlobs?: string[];
  failedBlobsManifest?: string;
  lastProgressUpdate?: string;
  blobsFinishedAt?: string;
  reconciliation?: ReconciliationReport;
  admissionDeferrals?: number;
  preferencesImportedAt?: string;
  preferencesError?: string;
  rotationKeyPublic?: string;
  rotationKeyGeneratedAt?: string;
  rotationKeyNotifiedAt?: string;
  plcTokenRequestedAt?: string;
  plcOperationSignedAt?: string;
  plcOperationSubmittedAt?: string;
  plcOperationCompletedAt?: string;
  accountActivatedAt?: string;
  accountDeactivatedAt?: string;
  sourceDeactivationError?: string;
  completedAt?: string;
}

export interface MigrationRecord {
  id: string;
  /** Opaque public handle for status lookups; unrelated to the DID. */
  publicToken: string;
  did: string;
  direction: MigrationDirection;
  sourceHost: string;
  destinationHost: string;
  sourceHandle: string;
  destinationHandle: string;
  email: string;
  locale: string;
  status: MigrationStatus;
  progress: ProgressData;
  secrets: MigrationSecrets;
  /** Stage whose job is (or last was) running, for retry display. */
  currentJobStep: MigrationStatus | null;
  currentJobAttempt: number;
  currentJobMaxAttempts: number;
  /** Number of times the migration has been marked failed. */
  retryCount: number;
  lastError: string | null;
  errorCode: ErrorKind | null;
  createdAt: number;
  updatedAt: number;
}

export interface MigrationTransition {
  migrationId: string;
  fromStatus: MigrationStatus;
  toStatus: MigrationStatus;
  reason: string;
  timestamp: number;
}

/** Fields a caller supplies when opening a migration. */
export interface NewMigrationInput {
  did: string;
  direction?: MigrationDirection;
  sourceHost: string;
  destinationHost: string;
  sourceHandle: string;
  destinationHandle: string;
  email: string;
  locale?: string;
}
