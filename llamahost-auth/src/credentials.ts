/**
 * @llamahost/auth - Credential store
 *
 * Holds the standard and admin key sets as SHA-256 digests. Lookups hash the
 * presented token once and compare it against every configured digest with
 * timingSafeEqual, without stopping at the first match.
 */

import { createHash, timingSafeEqual } from "crypto";
import type { CredentialSet, CredentialTier } from "./types.js";

export interface CredentialStore {
  /** Whether the token grants at least the given tier */
  isValid(token: string, tier: CredentialTier): boolean;
  /** Highest tier the token grants, or null for an unknown token */
  resolveTier(token: string): CredentialTier | null;
  readonly standardKeyCount: number;
  readonly adminKeyCount: number;
}

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

function digestKeys(keys: readonly string[]): Buffer[] {
  return keys.filter((key) => key.length > 0).map(digest);
}

function matchesAny(candidate: Buffer, digests: readonly Buffer[]): boolean {
  let matched = false;
  for (const known of digests) {
    if (timingSafeEqual(candidate, known)) {
      matched = true;
    }
  }
  return matched;
}

export function createCredentialStore(set: CredentialSet): CredentialStore {
  const standard = digestKeys(set.standardKeys);
  const admin = digestKeys(set.adminKeys);

  function resolveTier(token: string): CredentialTier | null {
    if (!token) return null;
    const candidate = digest(token);
    const isAdmin = matchesAny(candidate, admin);
    const isStandard = matchesAny(candidate, standard);
    if (isAdmin) return "admin";
    if (isStandard) return "standard";
    return null;
  }

  function isValid(token: string, tier: CredentialTier): boolean {
    const granted = resolveTier(token);
    if (granted === null) return false;
    return tier === "standard" || granted === "admin";
  }

  return {
    isValid,
    resolveTier,
    standardKeyCount: standard.length,
    adminKeyCount: admin.length,
  };
}
