/**
 * Input validation and normalisation for new migrations.
 */

import { randomInt } from "node:crypto";

const PUBLIC_TOKEN_PREFIX = "MIG";
const PUBLIC_TOKEN_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";
const PUBLIC_TOKEN_LENGTH = 16;

const DID_PLC = /^did:plc:[a-z2-7]{24}$/;
const DID_WEB = /^did:web:[a-zA-Z0-9.-]+(%3A[0-9]+)?$/;
const EMAIL = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const HANDLE_LABEL = /^[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?$/;

// LRM, RLM, embeddings/overrides, isolates
const BIDI_CONTROLS = /[\u200E\u200F\u202A-\u202E\u2066-\u2069]/g;

/** Opaque public token, e.g. MIG-7Q2K0ZJ4XW9BD1CA. */
export function generatePublicToken(): string {
  let suffix = "";
  for (let i = 0; i < PUBLIC_TOKEN_LENGTH; i++) {
    suffix += PUBLIC_TOKEN_ALPHABET[randomInt(PUBLIC_TOKEN_ALPHABET.length)];
  }
  return `${PUBLIC_TOKEN_PREFIX}-${suffix}`;
}

export function isPublicToken(v: string): boolean {
  return /^MIG-[A-Z0-9]{16}$/.test(v);
}

/**
 * Normalise a user-typed handle: trim, drop a leading "@", strip bidi
 * control characters pasted from rich text, lowercase.
 */
export function cleanHandle(raw: string): string {
  return raw.trim().replace(/^@/, "").replace(BIDI_CONTROLS, "").toLowerCase();
}

export function isValidHandle(handle: string): boolean {
  if (handle.length === 0 || handle.length > 253) return false;
  const labels = handle.split(".");
  if (labels.length < 2) return false;
  return labels.every((label) => HANDLE_LABEL.test(label));
}

export function isValidDid(did: string): boolean {
  return DID_PLC.test(did) || DID_WEB.test(did);
}

export function isValidEmail(email: string): boolean {
  return EMAIL.test(email);
}

/** Normalise a server address to an origin without trailing slash. */
export function normaliseHost(raw: string): string | null {
  const trimmed = raw.trim();
  const withScheme = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  try {
    const url = new URL(withScheme);
    return url.origin;
  } catch {
    return null;
  }
}
