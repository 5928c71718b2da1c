/**
 * Mover configuration resolution.
 *
 * The config is resolved once at process start into a deep-frozen struct and
 * passed down to every component; nothing reads process.env ad hoc.
 *
 * Two loading modes:
 *   1. Embedded:    resolveMoverConfig(raw) — the host passes an untyped record
 *   2. Standalone:  loadMoverConfig() — reads from file / env directly
 */

import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { isLogLevel } from "./logger.js";
import type { LogLevel } from "./logger.js";
import { toRecord } from "./types.js";

export type DatabaseBackend = "memory" | "sqlite";

/** How the admission ceiling is computed. */
export type AdmissionPolicy = "static" | "memory";

export interface RequestRetryConfig {
  /** Retries after the first call on a rate-limit signal. */
  maxRetries: number;
  /** Base of the exponential delay when the server gives no retry-after hint. */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound of the random fraction added to every wait. */
  jitter: number;
}

export interface StageRetryConfig {
  /** Total attempts per stage, including the first. */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
}

export interface CredentialTtlConfig {
  passwordTtlMs: number;
  sessionTtlMs: number;
  plcTokenTtlMs: number;
  inviteCodeTtlMs: number;
}

export interface BlobTransferConfig {
  /** Fixed worker pool size per migration. */
  workers: number;
  /** Attempts per blob before it lands in the failure set. */
  maxAttempts: number;
  /** Persist progress every Nth completed blob. */
  checkpointEvery: number;
  /** Page size for cursor-paginated blob listings. */
  pageSize: number;
  /** Base of the per-blob exponential backoff. */
  baseDelayMs: number;
}

export interface AdmissionConfig {
  policy: AdmissionPolicy;
  /** Ceiling used by the static policy. */
  maxConcurrent: number;
  /** Delay before a denied stage job runs again. */
  retryDelayMs: number;
  memoryPerJobMb: number;
  reserveMb: number;
  minConcurrent: number;
  maxConcurrentCap: number;
  /** Ceiling used by the memory policy when no memory source is readable. */
  fallbackConcurrent: number;
  cacheMs: number;
}

export interface MoverConfig {
  dataDir: string;
  dbBackend: DatabaseBackend;
  logLevel: LogLevel;
  /** 64 hex chars; AES-256 key for secrets at rest. */
  masterKey: string;
  /** Where repository exports and blobs are staged between download and upload. */
  scratchDir: string;
  /** Stage jobs in flight per process. */
  workerConcurrency: number;
  requestTimeoutMs: number;
  blobTimeoutMs: number;
  sessionRefreshBufferMs: number;
  requestRetry: RequestRetryConfig;
  stageRetry: StageRetryConfig;
  credentials: CredentialTtlConfig;
  blobs: BlobTransferConfig;
  admission: AdmissionConfig;
}

const HOUR_MS = 60 * 60 * 1000;

function positiveNumber(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isFinite(v) && v > 0 ? v : fallback;
}

function positiveInt(v: unknown, fallback: number): number {
  return typeof v === "number" && Number.isInteger(v) && v > 0 ? v : fallback;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

export function resolveMoverConfig(raw?: Record<string, unknown> | null): Readonly<MoverConfig> {
  const r = raw ?? {};
  const dataDir = typeof r.dataDir === "string" ? r.dataDir : ".mover";

  const requestRaw = toRecord(r.requestRetry);
  const stageRaw = toRecord(r.stageRetry);
  const credentialsRaw = toRecord(r.credentials);
  const blobsRaw = toRecord(r.blobs);
  const admissionRaw = toRecord(r.admission);

  const dbBackend: DatabaseBackend = r.dbBackend === "sqlite" ? "sqlite" : "memory";
  const policy: AdmissionPolicy = admissionRaw.policy === "memory" ? "memory" : "static";

  const jitter = typeof requestRaw.jitter === "number" && requestRaw.jitter >= 0 && requestRaw.jitter <= 1
    ? requestRaw.jitter
    : 0.25;

  return deepFreeze({
    dataDir,
    dbBackend,
    logLevel: isLogLevel(r.logLevel) ? r.logLevel : "info",
    masterKey: typeof r.masterKey === "string" ? r.masterKey.trim() : "",
    scratchDir: typeof r.scratchDir === "string" ? r.scratchDir : path.join(dataDir, "scratch"),
    workerConcurrency: positiveInt(r.workerConcurrency, 10),
    requestTimeoutMs: positiveNumber(r.requestTimeoutMs, 60_000),
    blobTimeoutMs: positiveNumber(r.blobTimeoutMs, 300_000),
    sessionRefreshBufferMs: positiveNumber(r.sessionRefreshBufferMs, 60_000),
    requestRetry: {
      // 0 is meaningful here: disable request-level retries entirely
      maxRetries: typeof requestRaw.maxRetries === "number" && Number.isInteger(requestRaw.maxRetries) && requestRaw.maxRetries >= 0
        ? requestRaw.maxRetries
        : 4,
      baseDelayMs: positiveNumber(requestRaw.baseDelayMs, 2_000),
      maxDelayMs: positiveNumber(requestRaw.maxDelayMs, 60_000),
      jitter,
    },
    stageRetry: {
      maxAttempts: positiveInt(stageRaw.maxAttempts, 3),
      baseDelayMs: positiveNumber(stageRaw.baseDelayMs, 30_000),
      maxDelayMs: positiveNumber(stageRaw.maxDelayMs, 600_000),
      backoffFactor: positiveNumber(stageRaw.backoffFactor, 2),
    },
    credentials: {
      passwordTtlMs: positiveNumber(credentialsRaw.passwordTtlMs, 48 * HOUR_MS),
      sessionTtlMs: positiveNumber(credentialsRaw.sessionTtlMs, 48 * HOUR_MS),
      plcTokenTtlMs: positiveNumber(credentialsRaw.plcTokenTtlMs, HOUR_MS),
      inviteCodeTtlMs: positiveNumber(credentialsRaw.inviteCodeTtlMs, 48 * HOUR_MS),
    },
    blobs: {
      workers: positiveInt(blobsRaw.workers, 5),
      maxAttempts: positiveInt(blobsRaw.maxAttempts, 3),
      checkpointEvery: positiveInt(blobsRaw.checkpointEvery, 10),
      pageSize: positiveInt(blobsRaw.pageSize, 500),
      baseDelayMs: positiveNumber(blobsRaw.baseDelayMs, 2_000),
    },
    admission: {
      policy,
      maxConcurrent: positiveInt(admissionRaw.maxConcurrent, 8),
      retryDelayMs: positiveNumber(admissionRaw.retryDelayMs, 30_000),
      memoryPerJobMb: positiveNumber(admissionRaw.memoryPerJobMb, 300),
      reserveMb: positiveNumber(admissionRaw.reserveMb, 4096),
      minConcurrent: positiveInt(admissionRaw.minConcurrent, 4),
      maxConcurrentCap: positiveInt(admissionRaw.maxConcurrentCap, 30),
      fallbackConcurrent: positiveInt(admissionRaw.fallbackConcurrent, 8),
      cacheMs: positiveNumber(admissionRaw.cacheMs, 30_000),
    },
  });
}

/**
 * Default config file search paths (highest priority first):
 *   1. $MOVER_CONFIG env
 *   2. ./mover.json (cwd)
 *   3. ~/.mover/mover.json
 */
function resolveConfigPath(): string | null {
  if (process.env.MOVER_CONFIG) {
    return process.env.MOVER_CONFIG;
  }
  const cwdPath = path.resolve("mover.json");
  if (fs.existsSync(cwdPath)) return cwdPath;

  const homePath = path.join(os.homedir(), ".mover", "mover.json");
  if (fs.existsSync(homePath)) return homePath;

  return null;
}

/**
 * Load config from the file system (standalone mode).
 * Falls back to defaults if no config file is found.
 */
export function loadMoverConfig(): Readonly<MoverConfig> {
  const configPath = resolveConfigPath();
  if (!configPath) {
    return resolveMoverConfig({});
  }

  const raw: unknown = JSON.parse(fs.readFileSync(configPath, "utf8"));
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new Error(`Invalid mover config at ${configPath}: expected a JSON object`);
  }
  return resolveMoverConfig(toRecord(raw));
}
