/**
 * URL-safe random identifiers for sessions and control requests.
 * Uses crypto.randomBytes with base64url encoding (A-Za-z0-9_-).
 */
import { randomBytes } from "node:crypto";

export function generateId(size: number): string {
  // base64url yields 4 chars per 3 bytes; request enough bytes for `size` chars.
  return randomBytes(Math.ceil(size * 0.75))
    .toString("base64url")
    .slice(0, size);
}

/** Session ids are never reused within a process; 21 chars is ~126 bits. */
export function generateSessionId(): string {
  return generateId(21);
}
