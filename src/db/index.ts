/**
 * Database factory — creates the appropriate backend based on config.
 */

export type {
  MoverDatabase,
  MigrationStore,
  TransitionStore,
  MigrationFilter,
  TransitionFilter,
  MigrationUpdateFields,
} from "./interface.js";
export { DuplicateActiveMigrationError } from "./interface.js";
export { createMemoryDatabase } from "./memory.js";
export { createSqliteDatabase } from "./sqlite.js";
export type { DatabaseBackend } from "../config.js";

import type { MoverConfig } from "../config.js";
import type { MoverDatabase } from "./interface.js";
import { createMemoryDatabase } from "./memory.js";
import { createSqliteDatabase } from "./sqlite.js";

export function createDatabase(config: Pick<MoverConfig, "dbBackend" | "dataDir">): MoverDatabase {
  switch (config.dbBackend) {
    case "memory":
      return createMemoryDatabase();

    case "sqlite":
      return createSqliteDatabase(config.dataDir);

    default: {
      const unknownBackend: never = config.dbBackend;
      throw new Error(`unknown database backend: ${String(unknownBackend)}`);
    }
  }
}
