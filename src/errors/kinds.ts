/**
 * Closed failure taxonomy. Stored on the migration as `errorCode` and
 * consumed by the engine (retry or fail) and by anything rendering status.
 */

export type ErrorKind =
  | "credentials_need_reauth"
  | "plc_token_expired"
  | "plc_pre_submission_failure"
  | "critical_plc"
  | "rate_limit"
  | "network"
  | "authentication"
  | "account_exists"
  | "invite_code"
  | "blob_not_found"
  | "data_corruption"
  | "disk_space"
  | "cancelled"
  | "generic";

export const ERROR_KINDS: readonly ErrorKind[] = [
  "credentials_need_reauth",
  "plc_token_expired",
  "plc_pre_submission_failure",
  "critical_plc",
  "rate_limit",
  "network",
  "authentication",
  "account_exists",
  "invite_code",
  "blob_not_found",
  "data_corruption",
  "disk_space",
  "cancelled",
  "generic",
] as const;

export function isErrorKind(v: unknown): v is ErrorKind {
  return typeof v === "string" && (ERROR_KINDS as readonly string[]).includes(v);
}

export type Severity = "warning" | "error" | "critical";

export type RecoveryAction =
  | "reauthenticate"
  | "request_new_plc_token"
  | "retry"
  | "start_new_migration"
  | "contact_support";
