/**
 * User-facing notifications. Delivery (email, templating, localisation)
 * lives outside this package; the engine only calls this interface.
 */

import type { MigrationRecord } from "../migration/types.js";
import type { ErrorAdvice } from "../errors/classify.js";
import type { Logger } from "../types.js";

export interface MigrationNotifier {
  /** The recovery key exists and must reach the user before the directory update. */
  rotationKeyIssued(migration: MigrationRecord, rotationKey: { did: string; privateKeyHex: string }): Promise<void>;
  /** The source server has emailed a confirmation code the user must submit. */
  plcTokenRequested(migration: MigrationRecord): Promise<void>;
  /** The destination password is handed over once, here. */
  migrationCompleted(migration: MigrationRecord, destinationPassword: string | null): Promise<void>;
  migrationFailed(migration: MigrationRecord, advice: ErrorAdvice): Promise<void>;
}

/** Logs each notification. Secrets are reduced to a presence flag. */
export function createLoggingNotifier(logger: Logger): MigrationNotifier {
  return {
    async rotationKeyIssued(migration, rotationKey) {
      logger.info(`[mover:notify] ${migration.id}: rotation key ${rotationKey.did} issued to ${migration.email}`);
    },
    async plcTokenRequested(migration) {
      logger.info(`[mover:notify] ${migration.id}: confirmation code requested; ${migration.email} should check their inbox`);
    },
    async migrationCompleted(migration, destinationPassword) {
      logger.info(
        `[mover:notify] ${migration.id}: ${migration.did} now lives on ${migration.destinationHost}` +
          (destinationPassword ? " (password enclosed)" : ""),
      );
    },
    async migrationFailed(migration, advice) {
      logger.warn(`[mover:notify] ${migration.id}: ${advice.title} [${advice.severity}]`);
    },
  };
}
