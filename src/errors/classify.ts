/**
 * Error classification & recovery advisory.
 *
 * classifyError prefers an explicit machine-readable code. Only when none is
 * attached does it fall back to patterns over the message, and every pattern
 * is anchored at the start of the message: a wrapped "Repo import failed:
 * PLC token has expired" is not a token problem.
 */

import type { ErrorKind, RecoveryAction, Severity } from "./kinds.js";
import { isErrorKind } from "./kinds.js";

export interface ErrorAdvice {
  kind: ErrorKind;
  title: string;
  severity: Severity;
  actions: readonly RecoveryAction[];
  /** Whether a stage-level retry can change the outcome. */
  retryable: boolean;
}

const ADVICE: Readonly<Record<ErrorKind, Omit<ErrorAdvice, "kind">>> = {
  credentials_need_reauth: {
    title: "Session Expired — Re-authentication Required",
    severity: "warning",
    actions: ["reauthenticate"],
    retryable: true,
  },
  plc_token_expired: {
    title: "PLC Token Expired",
    severity: "warning",
    actions: ["request_new_plc_token"],
    retryable: false,
  },
  plc_pre_submission_failure: {
    title: "PLC Update Could Not Complete",
    severity: "warning",
    actions: ["request_new_plc_token"],
    retryable: false,
  },
  critical_plc: {
    title: "PLC Directory Update Failed",
    severity: "critical",
    actions: ["contact_support"],
    retryable: false,
  },
  rate_limit: {
    title: "Rate Limited by Server",
    severity: "warning",
    actions: ["retry"],
    retryable: true,
  },
  network: {
    title: "Network Connection Error",
    severity: "error",
    actions: ["retry"],
    retryable: true,
  },
  authentication: {
    title: "Authentication Failed",
    severity: "error",
    actions: ["reauthenticate"],
    retryable: false,
  },
  account_exists: {
    title: "Account Already Exists on Target PDS",
    severity: "error",
    actions: ["contact_support"],
    retryable: false,
  },
  invite_code: {
    title: "Invalid or Expired Invite Code",
    severity: "error",
    actions: ["start_new_migration"],
    retryable: false,
  },
  blob_not_found: {
    title: "Some Blobs Not Found",
    severity: "error",
    actions: ["retry", "contact_support"],
    retryable: true,
  },
  data_corruption: {
    title: "Data Transfer Corruption",
    severity: "error",
    actions: ["retry", "contact_support"],
    retryable: true,
  },
  disk_space: {
    title: "Disk Space Exhausted",
    severity: "error",
    actions: ["retry", "contact_support"],
    retryable: true,
  },
  cancelled: {
    title: "Migration Cancelled",
    severity: "warning",
    actions: ["start_new_migration"],
    retryable: false,
  },
  generic: {
    title: "Migration Error",
    severity: "error",
    actions: ["retry", "contact_support"],
    retryable: true,
  },
};

/** Start of every message for a login that still wants a one-time code. */
export const SECOND_FACTOR_PREFIX = "Second factor required";

/**
 * Ordered: the first match wins, so narrower families sit above the
 * broader ones that could share a prefix.
 */
const MESSAGE_PATTERNS: ReadonlyArray<readonly [RegExp, ErrorKind]> = [
  [/^CRITICAL: PLC update failed/, "critical_plc"],
  [/^PLC update failed \(before submission\)/i, "plc_pre_submission_failure"],
  [/^(PLC token (has expired|is missing)|PLC confirmation code expired)/i, "plc_token_expired"],
  [/^Credentials expired:/i, "credentials_need_reauth"],
  [/^(HTTP 429|Rate limit|RateLimitExceeded)/i, "rate_limit"],
  [/^(NetworkError|Network (unreachable|error)|Connection (timed out|refused|reset)|Request timed out)/i, "network"],
  [/^Second factor required/i, "authentication"],
  [/^(Authentication failed|HTTP 401)/i, "authentication"],
  [/^(Account already exists|DID already exists)/i, "account_exists"],
  [/^Invalid invite code/i, "invite_code"],
  [/^Blob not found/i, "blob_not_found"],
  [/^(Corrupt|Data corruption)/i, "data_corruption"],
  [/^(Disk full|No space left|ENOSPC)/i, "disk_space"],
  [/^Migration cancelled/i, "cancelled"],
];

export interface ClassifiableError {
  code?: string | null;
  message: string;
}

export function classifyError(error: ClassifiableError): ErrorKind {
  if (error.code && error.code.length > 0 && isErrorKind(error.code)) {
    return error.code;
  }
  const message = error.message.trim();
  for (const [pattern, kind] of MESSAGE_PATTERNS) {
    if (pattern.test(message)) return kind;
  }
  return "generic";
}

export function explainError(kind: ErrorKind): ErrorAdvice {
  return { kind, ...ADVICE[kind] };
}

/**
 * A login rejected only for want of a one-time code. Still `authentication`
 * by kind, but the user should be asked for the code, not a new password.
 */
export function needsSecondFactor(error: ClassifiableError): boolean {
  return /^Second factor required/i.test(error.message.trim());
}

/** explainError for a stored failure, with the second-factor case titled apart. */
export function explainFailure(error: ClassifiableError): ErrorAdvice {
  const advice = explainError(classifyError(error));
  if (advice.kind === "authentication" && needsSecondFactor(error)) {
    return { ...advice, title: "Sign-in Code Required" };
  }
  return advice;
}
