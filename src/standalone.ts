/**
 * Standalone runtime.
 *
 * Wires config, logger, storage, the secret vault and the engine into one
 * process and resumes every unfinished migration.
 *
 * Usage:
 *   import { startMover } from "./standalone.js";
 *   const mover = await startMover();              // config from file
 *   const mover = await startMover({ config });    // explicit config
 */

import path from "node:path";
import { loadMoverConfig } from "./config.js";
import type { MoverConfig } from "./config.js";
import { createMoverLogger } from "./logger.js";
import type { MoverLoggerOptions } from "./logger.js";
import type { Logger } from "./types.js";
import { createDatabase } from "./db/index.js";
import type { MoverDatabase } from "./db/index.js";
import { createSecretVault } from "./crypto/vault.js";
import { createMigrationManager } from "./migration/manager.js";
import type { MigrationManager } from "./migration/manager.js";
import { createCredentialStore } from "./migration/credentials.js";
import { createAdmissionController } from "./admission/controller.js";
import { createSecp256k1KeyGenerator } from "./keys/rotation.js";
import type { RotationKeyGenerator } from "./keys/rotation.js";
import { createLoggingNotifier } from "./notify/notifier.js";
import type { MigrationNotifier } from "./notify/notifier.js";
import { createPdsClientFactory } from "./pds/factory.js";
import type { PdsClientFactory } from "./pds/factory.js";
import { createMigrationEngine } from "./orchestrator/engine.js";
import type { MigrationEngine } from "./orchestrator/engine.js";

export interface MoverInstance {
  config: Readonly<MoverConfig>;
  db: MoverDatabase;
  manager: MigrationManager;
  engine: MigrationEngine;
  logger: Logger;
  /** Stop scheduling and close the database. Running stage jobs finish first. */
  stop: () => Promise<void>;
}

export interface StartMoverOptions {
  /** Config override. If not provided, loaded from file. */
  config?: Readonly<MoverConfig>;
  loggerOptions?: MoverLoggerOptions;
  /** Replaces the logging notifier (e.g. with a mailer). */
  notifier?: MigrationNotifier;
  keys?: RotationKeyGenerator;
  clients?: PdsClientFactory;
}

export async function startMover(opts?: StartMoverOptions): Promise<MoverInstance> {
  const config = opts?.config ?? loadMoverConfig();
  const logger = createMoverLogger({
    level: config.logLevel,
    file: config.dbBackend === "sqlite" ? path.join(config.dataDir, "mover.log") : undefined,
    ...opts?.loggerOptions,
  });

  logger.info(`[mover:standalone] starting (db: ${config.dbBackend}, admission: ${config.admission.policy})`);

  // --- Storage ---
  const db = createDatabase(config);
  db.migrate();

  // --- Core modules ---
  const vault = createSecretVault(config.masterKey);
  const manager = createMigrationManager({ db, logger });
  const credentials = createCredentialStore({ db, vault, ttl: config.credentials, logger });
  const admission = createAdmissionController({ db, config: config.admission, logger });

  // --- Engine ---
  const engine = createMigrationEngine({
    config,
    manager,
    credentials,
    admission,
    keys: opts?.keys ?? createSecp256k1KeyGenerator(),
    notifier: opts?.notifier ?? createLoggingNotifier(logger),
    clients: opts?.clients ?? createPdsClientFactory({ config, logger }),
    logger,
  });
  const resumed = engine.start();
  logger.info(`[mover:standalone] ready, ${resumed} migration(s) resumed`);

  // --- Shutdown ---
  const stop = async () => {
    logger.info("[mover:standalone] shutting down...");
    engine.stop();
    await engine.idle();
    db.close();
    logger.info("[mover:standalone] shutdown complete");
  };

  return { config, db, manager, engine, logger, stop };
}
