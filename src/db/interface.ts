/**
 * Database interface — backend-agnostic storage abstraction.
 *
 * All persistence goes through this interface. Implementations:
 * - SQLite (default for deployments)
 * - In-memory (testing)
 *
 * Every read returns a copy; mutating a returned record never changes
 * stored state.
 */

import type {
  MigrationRecord,
  MigrationStatus,
  MigrationTransition,
} from "../migration/types.js";

// --- Query filters ---

export interface MigrationFilter {
  did?: string;
  status?: MigrationStatus;
  statuses?: readonly MigrationStatus[];
  limit?: number;
}

export interface TransitionFilter {
  migrationId?: string;
  since?: number;
  limit?: number;
}

/** Mutable columns. Identity fields (id, did, publicToken, createdAt) never change. */
export type MigrationUpdateFields = Partial<Omit<MigrationRecord, "id" | "did" | "publicToken" | "createdAt">>;

/** Thrown by insert when the DID already has a non-terminal migration. */
export class DuplicateActiveMigrationError extends Error {
  readonly did: string;

  constructor(did: string) {
    super(`${did} already has an active migration in progress`);
    this.name = "DuplicateActiveMigrationError";
    this.did = did;
  }
}

// --- Stores ---

export interface MigrationStore {
  /** @throws DuplicateActiveMigrationError */
  insert(record: MigrationRecord): void;
  get(id: string): MigrationRecord | null;
  getByToken(publicToken: string): MigrationRecord | null;
  /** The DID's single non-terminal migration, if any. */
  findActiveByDid(did: string): MigrationRecord | null;
  list(filter?: MigrationFilter): MigrationRecord[];
  countByStatus(statuses: readonly MigrationStatus[]): number;
  update(id: string, fields: MigrationUpdateFields): void;
  /**
   * Apply `fields` only if the stored status still equals `expected`.
   * Returns false (and writes nothing) when another writer moved it first.
   */
  updateIfStatus(id: string, expected: MigrationStatus, fields: MigrationUpdateFields): boolean;
  delete(id: string): void;
}

export interface TransitionStore {
  insert(entry: MigrationTransition): void;
  list(filter?: TransitionFilter): MigrationTransition[];
}

// --- Database ---

export interface MoverDatabase {
  readonly backend: "memory" | "sqlite";
  readonly migrations: MigrationStore;
  readonly transitions: TransitionStore;
  /** Create tables / run migrations. */
  migrate(): void;
  close(): void;
}
