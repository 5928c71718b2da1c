/**
 * Builds PDS clients for a host from the process configuration.
 */

import type { MoverConfig } from "../config.js";
import type { Clock, Logger, Sleep } from "../types.js";
import type { PdsClient } from "./client.js";
import { createPdsClient } from "./client.js";
import { createXrpcClient } from "./xrpc.js";

/** A client for `host`; authenticated calls ask `auth` for a bearer token. */
export type PdsClientFactory = (host: string, auth?: () => Promise<string>) => PdsClient;

export interface PdsClientFactoryParams {
  config: Pick<MoverConfig, "requestRetry" | "requestTimeoutMs" | "blobTimeoutMs">;
  logger: Logger;
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
  clock?: Clock;
}

export function createPdsClientFactory(params: PdsClientFactoryParams): PdsClientFactory {
  const { config, logger } = params;
  return (host, auth) =>
    createPdsClient({
      xrpc: createXrpcClient({
        serviceUrl: host,
        logger,
        retry: config.requestRetry,
        timeoutMs: config.requestTimeoutMs,
        blobTimeoutMs: config.blobTimeoutMs,
        fetch: params.fetch,
        sleep: params.sleep,
        random: params.random,
        clock: params.clock,
      }),
      logger,
      auth,
    });
}
