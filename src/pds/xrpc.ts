/**
 * XRPC transport — HTTP plumbing shared by every protocol operation.
 *
 * Each call is one fetch with its own timeout, wrapped in the rate-limit
 * retry. Request bodies are rebuilt per attempt so streamed uploads can be
 * retried. Failures come back as ProtocolError; nothing else escapes.
 */

import fs from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Clock, Logger, Sleep } from "../types.js";
import { errorMessage, systemClock, toRecord } from "../types.js";
import type { RequestRetryConfig } from "../config.js";
import { ProtocolError, errorFromResponse, parseRetryAfter } from "./errors.js";
import { withRateLimitRetry } from "./retry.js";

export type QueryParams = Record<string, string | number | boolean | undefined>;

/** A bearer token, or a provider resolved right before each attempt. */
export type TokenSource = string | (() => Promise<string>);

export interface XrpcRequest {
  method: "GET" | "POST";
  params?: QueryParams;
  /** JSON body. */
  body?: unknown;
  /** Raw body read from a file (repository import, blob upload). */
  file?: { path: string; contentType: string };
  token?: TokenSource;
  /** Use the long blob timeout. */
  bulk?: boolean;
}

export interface XrpcClient {
  readonly serviceUrl: string;
  /** JSON response (empty body → {}). */
  call(nsid: string, req: XrpcRequest): Promise<Record<string, unknown>>;
  /** Stream the response body to `destPath`; resolves with bytes written. */
  download(nsid: string, req: XrpcRequest, destPath: string): Promise<number>;
}

export interface XrpcClientOptions {
  serviceUrl: string;
  logger: Logger;
  retry: RequestRetryConfig;
  timeoutMs: number;
  blobTimeoutMs: number;
  fetch?: typeof fetch;
  sleep?: Sleep;
  random?: () => number;
  clock?: Clock;
}

export function createXrpcClient(opts: XrpcClientOptions): XrpcClient {
  const { logger } = opts;
  const serviceUrl = opts.serviceUrl.replace(/\/+$/, "");
  const fetchImpl = opts.fetch ?? fetch;
  const clock = opts.clock ?? systemClock;

  function buildUrl(nsid: string, params?: QueryParams): string {
    const url = new URL(`${serviceUrl}/xrpc/${nsid}`);
    for (const [key, value] of Object.entries(params ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async function send(nsid: string, req: XrpcRequest): Promise<Response> {
    const headers: Record<string, string> = {};
    if (req.token !== undefined) {
      const token = typeof req.token === "string" ? req.token : await req.token();
      headers.authorization = `Bearer ${token}`;
    }

    const init: RequestInit = {
      method: req.method,
      headers,
      signal: AbortSignal.timeout(req.bulk ? opts.blobTimeoutMs : opts.timeoutMs),
    };
    if (req.file) {
      const stat = await fs.promises.stat(req.file.path);
      headers["content-type"] = req.file.contentType;
      headers["content-length"] = String(stat.size);
      init.body = fs.createReadStream(req.file.path);
      init.duplex = "half";
    } else if (req.body !== undefined) {
      headers["content-type"] = "application/json";
      init.body = JSON.stringify(req.body);
    }

    let res: Response;
    try {
      res = await fetchImpl(buildUrl(nsid, req.params), init);
    } catch (err) {
      if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
        throw new ProtocolError("timeout", `Request timed out: ${nsid}`, { nsid });
      }
      const cause = err instanceof Error && err.cause instanceof Error ? `: ${err.cause.message}` : "";
      throw new ProtocolError("network", `NetworkError: ${nsid} ${errorMessage(err)}${cause}`, { nsid });
    }

    if (!res.ok) {
      const text = await res.text().catch(() => "");
      let body: { error?: string; message?: string } = {};
      try {
        const parsed = toRecord(JSON.parse(text));
        body = {
          error: typeof parsed.error === "string" ? parsed.error : undefined,
          message: typeof parsed.message === "string" ? parsed.message : undefined,
        };
      } catch {
        body = { message: text.slice(0, 200) || res.statusText };
      }
      throw errorFromResponse(nsid, res.status, body, parseRetryAfter(res.headers, clock()));
    }
    return res;
  }

  function retrying<T>(nsid: string, fn: () => Promise<T>): Promise<T> {
    return withRateLimitRetry(fn, {
      policy: opts.retry,
      logger,
      label: `${serviceUrl} ${nsid}`,
      sleep: opts.sleep,
      random: opts.random,
    });
  }

  async function call(nsid: string, req: XrpcRequest): Promise<Record<string, unknown>> {
    return retrying(nsid, async () => {
      const res = await send(nsid, req);
      const text = await res.text();
      logger.debug?.(`[mover:xrpc] ${req.method} ${serviceUrl} ${nsid} → ${res.status}`);
      if (text.length === 0) return {};
      try {
        return toRecord(JSON.parse(text));
      } catch {
        throw new ProtocolError("invalid_request", `Invalid JSON from ${nsid}`, { nsid, status: res.status });
      }
    });
  }

  async function download(nsid: string, req: XrpcRequest, destPath: string): Promise<number> {
    return retrying(nsid, async () => {
      const res = await send(nsid, { ...req, bulk: true });
      if (!res.body) {
        throw new ProtocolError("invalid_request", `Empty body from ${nsid}`, { nsid, status: res.status });
      }
      try {
        await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(destPath));
      } catch (err) {
        await fs.promises.rm(destPath, { force: true });
        throw new ProtocolError("network", `NetworkError: ${nsid} stream interrupted: ${errorMessage(err)}`, { nsid });
      }
      const { size } = await fs.promises.stat(destPath);
      logger.debug?.(`[mover:xrpc] ${serviceUrl} ${nsid} → ${destPath} (${size} bytes)`);
      return size;
    });
  }

  return { serviceUrl, call, download };
}
