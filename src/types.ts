/**
 * Shared primitives threaded through every component.
 */

/** Minimal logger surface. Every factory takes one; nothing reaches for a global. */
export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  debug?(msg: string): void;
}

/** Millisecond wall clock. Injected so expiry logic can be tested without waiting. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/** Injected delay primitive (rate-limit backoff, blob retry backoff). */
export type Sleep = (ms: number) => Promise<void>;

export const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/** Safely coerce an unknown value to a string-keyed record. */
export function toRecord(v: unknown): Record<string, unknown> {
  if (typeof v === "object" && v !== null && !Array.isArray(v)) {
    return v as Record<string, unknown>;
  }
  return {};
}

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
