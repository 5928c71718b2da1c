/**
 * SQLite database backend using better-sqlite3.
 * Synchronous API — every write is durable before the call returns, which
 * is what lets a stage handler resume from the last written status.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import type {
  MigrationFilter,
  MigrationStore,
  MigrationUpdateFields,
  MoverDatabase,
  TransitionFilter,
  TransitionStore,
} from "./interface.js";
import { DuplicateActiveMigrationError } from "./interface.js";
import type {
  MigrationRecord,
  MigrationSecrets,
  MigrationTransition,
  ProgressData,
} from "../migration/types.js";
import { isMigrationStatus } from "../migration/types.js";
import { isErrorKind } from "../errors/kinds.js";

// --- Schema ---

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS migrations (
  id TEXT PRIMARY KEY,
  publicToken TEXT NOT NULL UNIQUE,
  did TEXT NOT NULL,
  direction TEXT NOT NULL DEFAULT 'outbound',
  sourceHost TEXT NOT NULL,
  destinationHost TEXT NOT NULL,
  sourceHandle TEXT NOT NULL,
  destinationHandle TEXT NOT NULL,
  email TEXT NOT NULL,
  locale TEXT NOT NULL DEFAULT 'en',
  status TEXT NOT NULL,
  progress TEXT NOT NULL DEFAULT '{}',
  secrets TEXT NOT NULL DEFAULT '{}',
  currentJobStep TEXT,
  currentJobAttempt INTEGER NOT NULL DEFAULT 0,
  currentJobMaxAttempts INTEGER NOT NULL DEFAULT 0,
  retryCount INTEGER NOT NULL DEFAULT 0,
  lastError TEXT,
  errorCode TEXT,
  createdAt INTEGER NOT NULL,
  updatedAt INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_migrations_did ON migrations(did);
CREATE INDEX IF NOT EXISTS idx_migrations_status ON migrations(status);
CREATE UNIQUE INDEX IF NOT EXISTS idx_migrations_active_did ON migrations(did)
  WHERE status NOT IN ('completed', 'failed', 'cancelled');

CREATE TABLE IF NOT EXISTS migration_transitions (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  migrationId TEXT NOT NULL,
  fromStatus TEXT NOT NULL,
  toStatus TEXT NOT NULL,
  reason TEXT NOT NULL,
  timestamp INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_transitions_migrationId ON migration_transitions(migrationId);
CREATE INDEX IF NOT EXISTS idx_transitions_timestamp ON migration_transitions(timestamp);
`;

// --- Row types (what SQLite returns) ---

interface MigrationRow {
  id: string;
  publicToken: string;
  did: string;
  direction: string;
  sourceHost: string;
  destinationHost: string;
  sourceHandle: string;
  destinationHandle: string;
  email: string;
  locale: string;
  status: string;
  progress: string;
  secrets: string;
  currentJobStep: string | null;
  currentJobAttempt: number;
  currentJobMaxAttempts: number;
  retryCount: number;
  lastError: string | null;
  errorCode: string | null;
  createdAt: number;
  updatedAt: number;
}

interface TransitionRow {
  migrationId: string;
  fromStatus: string;
  toStatus: string;
  reason: string;
  timestamp: number;
}

interface CountRow {
  count: number;
}

// --- Conversions ---

function safeParseJson(raw: string | null | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === "object" && parsed !== null && !Array.isArray(parsed)
      ? parsed as Record<string, unknown>
      : {};
  } catch {
    return {};
  }
}

function rowToMigration(row: MigrationRow): MigrationRecord {
  // An unknown status would break ordinal comparisons; refuse it loudly.
  if (!isMigrationStatus(row.status)) {
    throw new Error(`migration ${row.id} has unknown status '${row.status}'`);
  }
  return {
    id: row.id,
    publicToken: row.publicToken,
    did: row.did,
    direction: row.direction === "inbound" ? "inbound" : "outbound",
    sourceHost: row.sourceHost,
    destinationHost: row.destinationHost,
    sourceHandle: row.sourceHandle,
    destinationHandle: row.destinationHandle,
    email: row.email,
    locale: row.locale,
    status: row.status,
    progress: safeParseJson(row.progress) as ProgressData,
    secrets: safeParseJson(row.secrets) as MigrationSecrets,
    currentJobStep: isMigrationStatus(row.currentJobStep) ? row.currentJobStep : null,
    currentJobAttempt: row.currentJobAttempt,
    currentJobMaxAttempts: row.currentJobMaxAttempts,
    retryCount: row.retryCount,
    lastError: row.lastError,
    errorCode: isErrorKind(row.errorCode) ? row.errorCode : null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function rowToTransition(row: TransitionRow): MigrationTransition | null {
  if (!isMigrationStatus(row.fromStatus) || !isMigrationStatus(row.toStatus)) return null;
  return {
    migrationId: row.migrationId,
    fromStatus: row.fromStatus,
    toStatus: row.toStatus,
    reason: row.reason,
    timestamp: row.timestamp,
  };
}

/** Column values for an update; JSON columns are serialised here. */
function toColumnValues(fields: MigrationUpdateFields): Record<string, unknown> {
  const values: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    values[key] = key === "progress" || key === "secrets" ? JSON.stringify(value) : value;
  }
  return values;
}

const UPDATABLE_COLUMNS: ReadonlySet<string> = new Set([
  "direction", "sourceHost", "destinationHost", "sourceHandle", "destinationHandle",
  "email", "locale", "status", "progress", "secrets", "currentJobStep",
  "currentJobAttempt", "currentJobMaxAttempts", "retryCount", "lastError",
  "errorCode", "updatedAt",
]);

// --- Store implementations ---

function createSqliteMigrationStore(db: Database.Database): MigrationStore {
  const stmts = {
    insert: db.prepare(`
      INSERT INTO migrations (
        id, publicToken, did, direction, sourceHost, destinationHost, sourceHandle,
        destinationHandle, email, locale, status, progress, secrets, currentJobStep,
        currentJobAttempt, currentJobMaxAttempts, retryCount, lastError, errorCode,
        createdAt, updatedAt
      ) VALUES (
        @id, @publicToken, @did, @direction, @sourceHost, @destinationHost, @sourceHandle,
        @destinationHandle, @email, @locale, @status, @progress, @secrets, @currentJobStep,
        @currentJobAttempt, @currentJobMaxAttempts, @retryCount, @lastError, @errorCode,
        @createdAt, @updatedAt
      )
    `),
    get: db.prepare(`SELECT * FROM migrations WHERE id = ?`),
    getByToken: db.prepare(`SELECT * FROM migrations WHERE publicToken = ?`),
    activeByDid: db.prepare(`
      SELECT * FROM migrations
      WHERE did = ? AND status NOT IN ('completed', 'failed', 'cancelled')
      LIMIT 1
    `),
    delete: db.prepare(`DELETE FROM migrations WHERE id = ?`),
  };

  function buildUpdate(fields: MigrationUpdateFields): { sets: string[]; values: Record<string, unknown> } {
    const values = toColumnValues(fields);
    const sets = Object.keys(values)
      .filter((key) => UPDATABLE_COLUMNS.has(key))
      .map((key) => `${key} = @${key}`);
    return { sets, values };
  }

  return {
    insert(record) {
      try {
        stmts.insert.run({
          ...record,
          progress: JSON.stringify(record.progress),
          secrets: JSON.stringify(record.secrets),
        });
      } catch (err) {
        if (
          err instanceof Database.SqliteError &&
          err.code === "SQLITE_CONSTRAINT_UNIQUE" &&
          err.message.includes("migrations.did")
        ) {
          throw new DuplicateActiveMigrationError(record.did);
        }
        throw err;
      }
    },

    get(id) {
      const row = stmts.get.get(id) as MigrationRow | undefined;
      return row ? rowToMigration(row) : null;
    },

    getByToken(publicToken) {
      const row = stmts.getByToken.get(publicToken) as MigrationRow | undefined;
      return row ? rowToMigration(row) : null;
    },

    findActiveByDid(did) {
      const row = stmts.activeByDid.get(did) as MigrationRow | undefined;
      return row ? rowToMigration(row) : null;
    },

    list(filter?: MigrationFilter) {
      const conditions: string[] = [];
      const values: Record<string, unknown> = {};

      if (filter?.did) {
        conditions.push("did = @did");
        values.did = filter.did;
      }
      if (filter?.status) {
        conditions.push("status = @status");
        values.status = filter.status;
      }
      if (filter?.statuses) {
        if (filter.statuses.length === 0) return [];
        const names = filter.statuses.map((s, i) => {
          values[`s${i}`] = s;
          return `@s${i}`;
        });
        conditions.push(`status IN (${names.join(", ")})`);
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      if (filter?.limit) {
        values._limit = Math.floor(filter.limit);
      }
      const limitClause = filter?.limit ? "LIMIT @_limit" : "";
      const sql = `SELECT * FROM migrations ${where} ORDER BY createdAt ASC ${limitClause}`;

      const rows = db.prepare(sql).all(values) as MigrationRow[];
      return rows.map(rowToMigration);
    },

    countByStatus(statuses) {
      if (statuses.length === 0) return 0;
      const placeholders = statuses.map(() => "?").join(", ");
      const row = db
        .prepare(`SELECT COUNT(*) as count FROM migrations WHERE status IN (${placeholders})`)
        .get(...statuses) as CountRow;
      return row.count;
    },

    update(id, fields) {
      const { sets, values } = buildUpdate(fields);
      if (sets.length === 0) return;
      const result = db
        .prepare(`UPDATE migrations SET ${sets.join(", ")} WHERE id = @id`)
        .run({ ...values, id });
      if (result.changes === 0) throw new Error(`migration not found: ${id}`);
    },

    updateIfStatus(id, expected, fields) {
      const { sets, values } = buildUpdate(fields);
      if (sets.length === 0) return false;
      const result = db
        .prepare(`UPDATE migrations SET ${sets.join(", ")} WHERE id = @id AND status = @_expected`)
        .run({ ...values, id, _expected: expected });
      return result.changes === 1;
    },

    delete(id) {
      stmts.delete.run(id);
    },
  };
}

function createSqliteTransitionStore(db: Database.Database): TransitionStore {
  const stmts = {
    insert: db.prepare(`
      INSERT INTO migration_transitions (migrationId, fromStatus, toStatus, reason, timestamp)
      VALUES (@migrationId, @fromStatus, @toStatus, @reason, @timestamp)
    `),
  };

  return {
    insert(entry) {
      stmts.insert.run(entry);
    },

    list(filter?: TransitionFilter) {
      const conditions: string[] = [];
      const values: Record<string, unknown> = {};

      if (filter?.migrationId) {
        conditions.push("migrationId = @migrationId");
        values.migrationId = filter.migrationId;
      }
      if (filter?.since !== undefined) {
        conditions.push("timestamp >= @since");
        values.since = filter.since;
      }

      const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
      if (filter?.limit) {
        values._limit = Math.floor(filter.limit);
      }
      const limitClause = filter?.limit ? "LIMIT @_limit" : "";
      const sql = `SELECT * FROM migration_transitions ${where} ORDER BY id ASC ${limitClause}`;

      const rows = db.prepare(sql).all(values) as TransitionRow[];
      return rows
        .map(rowToTransition)
        .filter((t): t is MigrationTransition => t !== null);
    },
  };
}

export function createSqliteDatabase(dataDir: string): MoverDatabase {
  fs.mkdirSync(dataDir, { recursive: true });

  const dbPath = path.join(dataDir, "mover.db");
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  let migrations: MigrationStore | null = null;
  let transitions: TransitionStore | null = null;

  return {
    backend: "sqlite",

    get migrations() {
      if (!migrations) migrations = createSqliteMigrationStore(db);
      return migrations;
    },
    get transitions() {
      if (!transitions) transitions = createSqliteTransitionStore(db);
      return transitions;
    },

    migrate() {
      db.exec(SCHEMA_SQL);
      migrations = null;
      transitions = null;
    },

    close() {
      db.close();
    },
  };
}
