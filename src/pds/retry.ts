/**
 * Request-level retry.
 *
 * Only rate-limit signals are retried here; every other failure goes
 * straight back to the caller, whose stage-level retry decides what to do.
 *
 * Wait per retry:
 *   server hint:  retryAfterSec * (1 + jitter * random())
 *   no hint:      min(baseDelayMs * 2^attempt, maxDelayMs) * (1 + jitter * random())
 */

import type { Logger, Sleep } from "../types.js";
import { realSleep } from "../types.js";
import type { RequestRetryConfig } from "../config.js";
import { isProtocolError } from "./errors.js";

export interface RateLimitRetryOptions {
  policy: RequestRetryConfig;
  logger: Logger;
  /** Label for log lines, usually the XRPC method. */
  label: string;
  sleep?: Sleep;
  random?: () => number;
}

export function rateLimitDelayMs(
  attempt: number,
  retryAfterSec: number | undefined,
  policy: RequestRetryConfig,
  random: () => number,
): number {
  const base = retryAfterSec !== undefined
    ? retryAfterSec * 1000
    : Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
  return base * (1 + policy.jitter * random());
}

export async function withRateLimitRetry<T>(
  fn: () => Promise<T>,
  opts: RateLimitRetryOptions,
): Promise<T> {
  const { policy, logger, label } = opts;
  const sleep = opts.sleep ?? realSleep;
  const random = opts.random ?? Math.random;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isProtocolError(err, "rate_limit")) throw err;
      if (attempt >= policy.maxRetries) {
        logger.warn(`[mover:xrpc] ${label}: rate limited, ${policy.maxRetries} retries exhausted`);
        throw err;
      }
      const delayMs = rateLimitDelayMs(attempt, err.retryAfterSec, policy, random);
      logger.warn(
        `[mover:xrpc] ${label}: rate limited (retry ${attempt + 1}/${policy.maxRetries}), waiting ${Math.round(delayMs)}ms`,
      );
      await sleep(delayMs);
    }
  }
}

/** Stage / blob backoff: min(base * factor^attempt, max). */
export function backoffDelayMs(
  attempt: number,
  policy: { baseDelayMs: number; maxDelayMs: number; backoffFactor?: number },
): number {
  const factor = policy.backoffFactor ?? 2;
  return Math.min(policy.baseDelayMs * factor ** attempt, policy.maxDelayMs);
}
