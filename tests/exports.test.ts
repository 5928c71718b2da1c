/**
 * Verify that the public API is reachable from the main entry point.
 */
import { describe, it, expect } from "vitest";
import * as mod from "../src/index.js";

describe("public API exports", () => {
  it.each([
    ["startMover", mod.startMover],
    ["loadMoverConfig", mod.loadMoverConfig],
    ["resolveMoverConfig", mod.resolveMoverConfig],
    ["createMoverLogger", mod.createMoverLogger],
    ["createDatabase", mod.createDatabase],
    ["createSecretVault", mod.createSecretVault],
    ["createMigrationManager", mod.createMigrationManager],
    ["createCredentialStore", mod.createCredentialStore],
    ["createSessionManager", mod.createSessionManager],
    ["createPdsClientFactory", mod.createPdsClientFactory],
    ["transferBlobs", mod.transferBlobs],
    ["reconcileBlobs", mod.reconcileBlobs],
    ["createAdmissionController", mod.createAdmissionController],
    ["classifyError", mod.classifyError],
    ["explainFailure", mod.explainFailure],
    ["needsSecondFactor", mod.needsSecondFactor],
    ["createMigrationEngine", mod.createMigrationEngine],
    ["StageScheduler", mod.StageScheduler],
    ["ProtocolError", mod.ProtocolError],
    ["MigrationStateError", mod.MigrationStateError],
  ])("exports %s", (_name, value) => {
    expect(typeof value).toBe("function");
  });

  it("exports the status sequence", () => {
    expect(mod.STAGE_SEQUENCE[0]).toBe("pending_account");
    expect(mod.STAGE_SEQUENCE.at(-1)).toBe("completed");
  });
});
