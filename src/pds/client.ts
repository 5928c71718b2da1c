/**
 * PDS client — the fixed operation set the engine needs from a hosting
 * server, over XRPC.
 *
 * Session operations take tokens explicitly; every other authenticated call
 * asks the injected `auth` provider (the session manager's ensureFresh) for
 * a bearer right before each attempt, so a refresh mid-stage is picked up.
 */

import type { Logger } from "../types.js";
import { toRecord } from "../types.js";
import { ProtocolError, isProtocolError } from "./errors.js";
import type { XrpcClient } from "./xrpc.js";

export interface SessionResult {
  did: string;
  handle: string;
  accessJwt: string;
  refreshJwt: string;
}

export interface ServerDescription {
  did: string;
  inviteCodeRequired: boolean;
  availableUserDomains: string[];
}

export interface RepoDescription {
  did: string;
  handle: string;
}

export interface CidPage {
  cids: string[];
  cursor?: string;
}

export interface AccountStatus {
  activated: boolean;
  validDid: boolean;
  expectedBlobs: number;
  importedBlobs: number;
}

/** Identity-directory credentials the destination wants in the new operation. */
export interface DidCredentials {
  rotationKeys: string[];
  alsoKnownAs: string[];
  verificationMethods: Record<string, unknown>;
  services: Record<string, unknown>;
}

export interface CreateAccountInput {
  did: string;
  handle: string;
  email: string;
  password: string;
  inviteCode?: string;
  /** Service-auth token minted by the source, proving control of the DID. */
  serviceAuthToken: string;
}

export interface PdsClient {
  readonly serviceUrl: string;
  createSession(identifier: string, password: string, authFactorToken?: string): Promise<SessionResult>;
  refreshSession(refreshJwt: string): Promise<SessionResult>;
  describeServer(): Promise<ServerDescription>;
  getServiceAuth(aud: string, lxm: string): Promise<string>;
  /** Null when the server does not host the repository. */
  describeRepo(did: string): Promise<RepoDescription | null>;
  exportRepo(did: string, destPath: string): Promise<number>;
  importRepo(carPath: string): Promise<void>;
  listBlobs(did: string, cursor?: string, limit?: number): Promise<CidPage>;
  /** Every page of listBlobs, de-duplicated, in first-seen order. */
  listAllBlobs(did: string, pageSize: number): Promise<string[]>;
  getBlob(did: string, cid: string, destPath: string): Promise<number>;
  uploadBlob(filePath: string, mimeType?: string): Promise<void>;
  getPreferences(): Promise<unknown[]>;
  putPreferences(preferences: unknown[]): Promise<void>;
  requestPlcOperationSignature(): Promise<void>;
  getRecommendedDidCredentials(): Promise<DidCredentials>;
  signPlcOperation(token: string, credentials: DidCredentials): Promise<Record<string, unknown>>;
  submitPlcOperation(operation: Record<string, unknown>): Promise<void>;
  /** @throws ProtocolError identity_mismatch when the server answers for another DID */
  createAccount(input: CreateAccountInput): Promise<SessionResult>;
  activateAccount(): Promise<void>;
  deactivateAccount(): Promise<void>;
  checkAccountStatus(): Promise<AccountStatus>;
  listMissingBlobs(cursor?: string, limit?: number): Promise<CidPage>;
  listAllMissingBlobs(pageSize: number): Promise<string[]>;
}

export interface PdsClientOptions {
  xrpc: XrpcClient;
  logger: Logger;
  /** Bearer provider for authenticated calls. */
  auth?: () => Promise<string>;
}

function requireString(nsid: string, rec: Record<string, unknown>, key: string): string {
  const value = rec[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ProtocolError("invalid_request", `Malformed response from ${nsid}: missing ${key}`, { nsid });
  }
  return value;
}

function stringArray(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : [];
}

function count(v: unknown): number {
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

function toSession(nsid: string, rec: Record<string, unknown>): SessionResult {
  return {
    did: requireString(nsid, rec, "did"),
    handle: typeof rec.handle === "string" ? rec.handle : "",
    accessJwt: requireString(nsid, rec, "accessJwt"),
    refreshJwt: requireString(nsid, rec, "refreshJwt"),
  };
}

function toCidPage(rec: Record<string, unknown>, field: "cids" | "blobs"): CidPage {
  const raw = rec[field];
  const cids = field === "cids"
    ? stringArray(raw)
    : (Array.isArray(raw) ? raw : [])
        .map((b) => toRecord(b).cid)
        .filter((c): c is string => typeof c === "string");
  const cursor = typeof rec.cursor === "string" && rec.cursor.length > 0 ? rec.cursor : undefined;
  return { cids, cursor };
}

export function createPdsClient(opts: PdsClientOptions): PdsClient {
  const { xrpc, logger } = opts;

  function auth(): Promise<string> {
    if (!opts.auth) {
      return Promise.reject(new ProtocolError("authentication", `Authentication failed: no session for ${xrpc.serviceUrl}`));
    }
    return opts.auth();
  }

  /** Walk an opaque cursor until it runs out or repeats. */
  async function collect(fetchPage: (cursor?: string) => Promise<CidPage>): Promise<string[]> {
    const seen = new Set<string>();
    const cursors = new Set<string>();
    let cursor: string | undefined;
    do {
      const page = await fetchPage(cursor);
      for (const cid of page.cids) seen.add(cid);
      cursor = page.cursor;
      if (cursor !== undefined) {
        if (cursors.has(cursor)) break;
        cursors.add(cursor);
      }
    } while (cursor !== undefined);
    return [...seen];
  }

  const client: PdsClient = {
    serviceUrl: xrpc.serviceUrl,

    async createSession(identifier, password, authFactorToken) {
      const nsid = "com.atproto.server.createSession";
      const res = await xrpc.call(nsid, {
        method: "POST",
        body: authFactorToken ? { identifier, password, authFactorToken } : { identifier, password },
      });
      return toSession(nsid, res);
    },

    async refreshSession(refreshJwt) {
      const nsid = "com.atproto.server.refreshSession";
      return toSession(nsid, await xrpc.call(nsid, { method: "POST", token: refreshJwt }));
    },

    async describeServer() {
      const nsid = "com.atproto.server.describeServer";
      const res = await xrpc.call(nsid, { method: "GET" });
      return {
        did: requireString(nsid, res, "did"),
        inviteCodeRequired: res.inviteCodeRequired === true,
        availableUserDomains: stringArray(res.availableUserDomains),
      };
    },

    async getServiceAuth(aud, lxm) {
      const nsid = "com.atproto.server.getServiceAuth";
      const res = await xrpc.call(nsid, { method: "GET", params: { aud, lxm }, token: auth });
      return requireString(nsid, res, "token");
    },

    async describeRepo(did) {
      const nsid = "com.atproto.repo.describeRepo";
      try {
        const res = await xrpc.call(nsid, { method: "GET", params: { repo: did } });
        return { did: requireString(nsid, res, "did"), handle: typeof res.handle === "string" ? res.handle : "" };
      } catch (err) {
        if (isProtocolError(err, "not_found")) return null;
        // describeRepo answers 400 RepoNotFound / RepoDeactivated on most servers
        if (isProtocolError(err, "invalid_request") && err.xrpcError?.startsWith("Repo")) return null;
        throw err;
      }
    },

    exportRepo(did, destPath) {
      return xrpc.download("com.atproto.sync.getRepo", { method: "GET", params: { did }, token: auth }, destPath);
    },

    async importRepo(carPath) {
      await xrpc.call("com.atproto.repo.importRepo", {
        method: "POST",
        file: { path: carPath, contentType: "application/vnd.ipld.car" },
        token: auth,
        bulk: true,
      });
    },

    async listBlobs(did, cursor, limit) {
      const res = await xrpc.call("com.atproto.sync.listBlobs", {
        method: "GET",
        params: { did, cursor, limit },
        token: auth,
      });
      return toCidPage(res, "cids");
    },

    listAllBlobs(did, pageSize) {
      return collect((cursor) => client.listBlobs(did, cursor, pageSize));
    },

    getBlob(did, cid, destPath) {
      return xrpc.download("com.atproto.sync.getBlob", { method: "GET", params: { did, cid }, token: auth }, destPath);
    },

    async uploadBlob(filePath, mimeType) {
      await xrpc.call("com.atproto.repo.uploadBlob", {
        method: "POST",
        file: { path: filePath, contentType: mimeType ?? "application/octet-stream" },
        token: auth,
        bulk: true,
      });
    },

    async getPreferences() {
      const res = await xrpc.call("app.bsky.actor.getPreferences", { method: "GET", token: auth });
      return Array.isArray(res.preferences) ? res.preferences : [];
    },

    async putPreferences(preferences) {
      await xrpc.call("app.bsky.actor.putPreferences", { method: "POST", body: { preferences }, token: auth });
    },

    async requestPlcOperationSignature() {
      await xrpc.call("com.atproto.identity.requestPlcOperationSignature", { method: "POST", token: auth });
    },

    async getRecommendedDidCredentials() {
      const res = await xrpc.call("com.atproto.identity.getRecommendedDidCredentials", { method: "GET", token: auth });
      return {
        rotationKeys: stringArray(res.rotationKeys),
        alsoKnownAs: stringArray(res.alsoKnownAs),
        verificationMethods: toRecord(res.verificationMethods),
        services: toRecord(res.services),
      };
    },

    async signPlcOperation(token, credentials) {
      const nsid = "com.atproto.identity.signPlcOperation";
      const res = await xrpc.call(nsid, { method: "POST", body: { token, ...credentials }, token: auth });
      const operation = toRecord(res.operation);
      if (Object.keys(operation).length === 0) {
        throw new ProtocolError("invalid_request", `Malformed response from ${nsid}: missing operation`, { nsid });
      }
      return operation;
    },

    async submitPlcOperation(operation) {
      await xrpc.call("com.atproto.identity.submitPlcOperation", { method: "POST", body: { operation }, token: auth });
    },

    async createAccount(input) {
      const nsid = "com.atproto.server.createAccount";
      const res = await xrpc.call(nsid, {
        method: "POST",
        token: input.serviceAuthToken,
        body: {
          did: input.did,
          handle: input.handle,
          email: input.email,
          password: input.password,
          ...(input.inviteCode ? { inviteCode: input.inviteCode } : {}),
        },
      });
      if (typeof res.did === "string" && res.did !== input.did) {
        throw new ProtocolError(
          "identity_mismatch",
          `DID mismatch: requested ${input.did} but ${xrpc.serviceUrl} created ${res.did}`,
          { nsid },
        );
      }
      if (typeof res.did !== "string") {
        logger.warn(`[mover:xrpc] ${nsid} on ${xrpc.serviceUrl} returned no did; cannot confirm ${input.did}`);
      }
      return {
        did: input.did,
        handle: typeof res.handle === "string" ? res.handle : input.handle,
        accessJwt: requireString(nsid, res, "accessJwt"),
        refreshJwt: requireString(nsid, res, "refreshJwt"),
      };
    },

    async activateAccount() {
      await xrpc.call("com.atproto.server.activateAccount", { method: "POST", token: auth });
    },

    async deactivateAccount() {
      await xrpc.call("com.atproto.server.deactivateAccount", { method: "POST", body: {}, token: auth });
    },

    async checkAccountStatus() {
      const res = await xrpc.call("com.atproto.server.checkAccountStatus", { method: "GET", token: auth });
      return {
        activated: res.activated === true,
        validDid: res.validDid === true,
        expectedBlobs: count(res.expectedBlobs),
        importedBlobs: count(res.importedBlobs),
      };
    },

    async listMissingBlobs(cursor, limit) {
      const res = await xrpc.call("com.atproto.repo.listMissingBlobs", {
        method: "GET",
        params: { cursor, limit },
        token: auth,
      });
      return toCidPage(res, "blobs");
    },

    listAllMissingBlobs(pageSize) {
      return collect((cursor) => client.listMissingBlobs(cursor, pageSize));
    },
  };

  return client;
}
