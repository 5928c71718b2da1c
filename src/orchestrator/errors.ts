/**
 * Stage failures and how a thrown value maps onto the error taxonomy.
 */

import type { ErrorKind } from "../errors/kinds.js";
import { SECOND_FACTOR_PREFIX, classifyError, explainError, needsSecondFactor } from "../errors/classify.js";
import type { ProtocolErrorKind } from "../pds/errors.js";
import { ProtocolError } from "../pds/errors.js";
import { MigrationStateError } from "../migration/manager.js";
import { errorMessage } from "../types.js";

/** A stage failure whose kind and retry decision are already known. */
export class StageError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;

  constructor(kind: ErrorKind, message: string, retryable: boolean) {
    super(message);
    this.name = "StageError";
    this.kind = kind;
    this.retryable = retryable;
  }
}

export interface StageFailure {
  kind: ErrorKind;
  retryable: boolean;
  message: string;
}

const PROTOCOL_KINDS: Readonly<Record<ProtocolErrorKind, { kind: ErrorKind; retryable?: boolean }>> = {
  rate_limit: { kind: "rate_limit" },
  network: { kind: "network" },
  timeout: { kind: "network" },
  token_rejected: { kind: "credentials_need_reauth" },
  authentication: { kind: "authentication" },
  // Message keeps its "Second factor required" prefix; see needsSecondFactor.
  two_factor_required: { kind: "authentication", retryable: false },
  account_exists: { kind: "account_exists" },
  invite_code: { kind: "invite_code" },
  // The wrong account may exist now: an orphan for support to clean up.
  identity_mismatch: { kind: "account_exists", retryable: false },
  not_found: { kind: "blob_not_found" },
  invalid_request: { kind: "generic" },
  server: { kind: "generic" },
};

export function toStageFailure(err: unknown): StageFailure {
  if (err instanceof StageError) {
    return { kind: err.kind, retryable: err.retryable, message: err.message };
  }
  if (err instanceof ProtocolError) {
    const mapped = PROTOCOL_KINDS[err.kind];
    const message = err.kind === "two_factor_required" && !needsSecondFactor({ message: err.message })
      ? `${SECOND_FACTOR_PREFIX}: ${err.message}`
      : err.message;
    return {
      kind: mapped.kind,
      retryable: mapped.retryable ?? explainError(mapped.kind).retryable,
      message,
    };
  }
  if (err instanceof MigrationStateError) {
    return { kind: "generic", retryable: false, message: err.message };
  }
  const message = errorMessage(err);
  const kind = classifyError({ message });
  return { kind, retryable: explainError(kind).retryable, message };
}
