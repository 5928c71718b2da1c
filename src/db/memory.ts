/**
 * In-memory database backend. For tests and single-process dry runs.
 */

import type {
  MigrationFilter,
  MigrationStore,
  MoverDatabase,
  TransitionFilter,
  TransitionStore,
} from "./interface.js";
import { DuplicateActiveMigrationError } from "./interface.js";
import type { MigrationRecord, MigrationTransition } from "../migration/types.js";
import { isTerminalStatus } from "../migration/types.js";

function cloneRecord(record: MigrationRecord): MigrationRecord {
  return structuredClone(record);
}

function matchesMigrationFilter(record: MigrationRecord, filter?: MigrationFilter): boolean {
  if (!filter) return true;
  if (filter.did !== undefined && record.did !== filter.did) return false;
  if (filter.status !== undefined && record.status !== filter.status) return false;
  if (filter.statuses !== undefined && !filter.statuses.includes(record.status)) return false;
  return true;
}

function applyLimit<T>(items: T[], limit?: number): T[] {
  return limit !== undefined && limit > 0 ? items.slice(0, limit) : items;
}

function createMemoryMigrationStore(): MigrationStore {
  const store = new Map<string, MigrationRecord>();

  function findActiveByDid(did: string): MigrationRecord | null {
    for (const record of store.values()) {
      if (record.did === did && !isTerminalStatus(record.status)) return cloneRecord(record);
    }
    return null;
  }

  return {
    insert(record) {
      if (store.has(record.id)) throw new Error(`migration already exists: ${record.id}`);
      if (!isTerminalStatus(record.status) && findActiveByDid(record.did)) {
        throw new DuplicateActiveMigrationError(record.did);
      }
      store.set(record.id, cloneRecord(record));
    },
    get(id) {
      const record = store.get(id);
      return record ? cloneRecord(record) : null;
    },
    getByToken(publicToken) {
      for (const record of store.values()) {
        if (record.publicToken === publicToken) return cloneRecord(record);
      }
      return null;
    },
    findActiveByDid,
    list(filter) {
      const results = Array.from(store.values())
        .filter((r) => matchesMigrationFilter(r, filter))
        .sort((a, b) => a.createdAt - b.createdAt)
        .map(cloneRecord);
      return applyLimit(results, filter?.limit);
    },
    countByStatus(statuses) {
      let count = 0;
      for (const record of store.values()) {
        if (statuses.includes(record.status)) count++;
      }
      return count;
    },
    update(id, fields) {
      const existing = store.get(id);
      if (!existing) throw new Error(`migration not found: ${id}`);
      store.set(id, cloneRecord({ ...existing, ...fields }));
    },
    updateIfStatus(id, expected, fields) {
      const existing = store.get(id);
      if (!existing || existing.status !== expected) return false;
      store.set(id, cloneRecord({ ...existing, ...fields }));
      return true;
    },
    delete(id) {
      store.delete(id);
    },
  };
}

function createMemoryTransitionStore(): TransitionStore {
  const entries: MigrationTransition[] = [];

  return {
    insert(entry) {
      entries.push({ ...entry });
    },
    list(filter?: TransitionFilter) {
      const results = entries
        .filter((e) => filter?.migrationId === undefined || e.migrationId === filter.migrationId)
        .filter((e) => filter?.since === undefined || e.timestamp >= filter.since)
        .map((e) => ({ ...e }));
      return applyLimit(results, filter?.limit);
    },
  };
}

export function createMemoryDatabase(): MoverDatabase {
  return {
    backend: "memory",
    migrations: createMemoryMigrationStore(),
    transitions: createMemoryTransitionStore(),
    migrate() { /* no-op */ },
    close() { /* no-op */ },
  };
}
