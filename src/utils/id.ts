import { randomBytes } from "node:crypto";

/** Internal record id: prefix, base36 timestamp, 48 random bits. Sorts roughly by creation. */
export function uniqueId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${randomBytes(6).toString("hex")}`;
}
