/**
 * @llamahost/auth - Utility functions
 */

import { createHash, randomBytes } from "crypto";

function hashApiKey(key: string): string {
  return createHash("sha256").update(key).digest("hex");
}

/**
 * Short, non-reversible identifier for a key, for logs
 */
export function keyFingerprint(key: string): string {
  return hashApiKey(key).substring(0, 8);
}

/**
 * Generate a new API key with a given prefix
 * @param prefix - Key prefix (e.g., "sk" for standard keys, "sk-admin" for admin keys)
 */
export function generateApiKey(prefix: string = "sk"): {
  key: string;
  prefix: string;
  hash: string;
} {
  const secureBytes = randomBytes(32).toString("hex");
  const key = `${prefix}-${secureBytes}`;
  const keyPrefix = key.substring(0, 8);
  const hash = hashApiKey(key);
  return { key, prefix: keyPrefix, hash };
}

/**
 * Parse comma-separated keys, dropping blanks
 */
export function parseKeyList(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((key) => key.trim())
    .filter(Boolean);
}

/**
 * Extract the token from an `Authorization: Bearer <token>` header value.
 * Returns null for a missing header, another scheme or an empty token.
 */
export function parseBearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
  return match ? match[1] : null;
}
